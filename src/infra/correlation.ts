import { AsyncLocalStorage } from "node:async_hooks";

/**
 * Identifiers attached to every log entry emitted while a session handles a
 * message or a plan executes. Nested scopes inherit the fields of their
 * parent so a tool call logged deep inside the router still reports the
 * session and chat it belongs to.
 */
export interface CorrelationContext {
  session_id?: string;
  chat_id?: string;
  plan_id?: string;
  action_id?: string;
}

const storage = new AsyncLocalStorage<CorrelationContext>();

/** Runs {@link callback} with {@link fields} merged into the active context. */
export function runWithCorrelation<T>(fields: CorrelationContext, callback: () => T): T {
  const parent = storage.getStore();
  return storage.run({ ...parent, ...fields }, callback);
}

export function getCorrelationContext(): CorrelationContext | undefined {
  return storage.getStore();
}
