/**
 * Error taxonomy shared by the engine. Each category carries a stable code and
 * a default message so sessions can surface consistent diagnostics to clients
 * and logs can be filtered by category.
 */
export const ENGINE_ERROR_TAXONOMY = {
  VALIDATION_ERROR: { code: "E-VALIDATION", message: "Invalid input" },
  PERSISTENCE_FAILURE: { code: "E-PERSISTENCE", message: "Persistence failure" },
  TEMPLATE_RESOLUTION_FAILURE: { code: "E-TEMPLATE", message: "Template variable could not be resolved" },
  TOOL_UNREACHABLE: { code: "E-TOOL-UNREACHABLE", message: "Tool server unreachable" },
  TOOL_TIMEOUT: { code: "E-TOOL-TIMEOUT", message: "Tool call timed out" },
  TOOL_AUTH_REQUIRED: { code: "E-TOOL-AUTH", message: "Tool server rejected the credential" },
  TOOL_ERROR: { code: "E-TOOL-ERROR", message: "Tool reported an error" },
  NOT_FOUND: { code: "E-NOT-FOUND", message: "Resource not found" },
  SESSION_CLOSED: { code: "E-SESSION-CLOSED", message: "Session closed" },
  PLANNER_FAILURE: { code: "E-PLANNER", message: "Planner failed to produce a plan" },
} as const;

export type EngineErrorCategory = keyof typeof ENGINE_ERROR_TAXONOMY;

/**
 * Failure kinds recorded on actions and carried by tool result envelopes.
 * They are the lower-case projection of the tool and engine categories.
 */
export type ErrorKind =
  | "unreachable"
  | "auth_required"
  | "tool_error"
  | "timeout"
  | "template_resolution"
  | "persistence";

export const ERROR_KINDS: readonly ErrorKind[] = [
  "unreachable",
  "auth_required",
  "tool_error",
  "timeout",
  "template_resolution",
  "persistence",
] as const;

export interface EngineErrorOptions {
  hint?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** Base class of every typed error thrown by the engine. */
export class EngineError extends Error {
  readonly category: EngineErrorCategory;
  readonly code: string;
  readonly hint?: string;
  readonly details?: Record<string, unknown>;

  constructor(category: EngineErrorCategory, message?: string, options: EngineErrorOptions = {}) {
    const taxonomy = ENGINE_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "EngineError";
    this.category = category;
    this.code = taxonomy.code;
    this.hint = options.hint;
    this.details = options.details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends EngineError {
  constructor(message?: string, options: EngineErrorOptions = {}) {
    super("VALIDATION_ERROR", message, options);
    this.name = "ValidationError";
  }
}

/**
 * Raised when a durable write fails. Before execution this is the single
 * fatal outcome of a request: the plan is never executed.
 */
export class PersistenceError extends EngineError {
  constructor(message?: string, options: EngineErrorOptions = {}) {
    super("PERSISTENCE_FAILURE", message, options);
    this.name = "PersistenceError";
  }
}

export class NotFoundError extends EngineError {
  constructor(message?: string, options: EngineErrorOptions = {}) {
    super("NOT_FOUND", message, options);
    this.name = "NotFoundError";
  }
}

export class SessionClosedError extends EngineError {
  constructor(message?: string, options: EngineErrorOptions = {}) {
    super("SESSION_CLOSED", message, options);
    this.name = "SessionClosedError";
  }
}

export class PlannerError extends EngineError {
  constructor(message?: string, options: EngineErrorOptions = {}) {
    super("PLANNER_FAILURE", message, options);
    this.name = "PlannerError";
  }
}

/** Maps an error kind to the taxonomy category describing it. */
export function categoryForKind(kind: ErrorKind): EngineErrorCategory {
  switch (kind) {
    case "unreachable":
      return "TOOL_UNREACHABLE";
    case "auth_required":
      return "TOOL_AUTH_REQUIRED";
    case "timeout":
      return "TOOL_TIMEOUT";
    case "tool_error":
      return "TOOL_ERROR";
    case "template_resolution":
      return "TEMPLATE_RESOLUTION_FAILURE";
    case "persistence":
      return "PERSISTENCE_FAILURE";
  }
}

/** Flattened view of an arbitrary throwable, safe to log or send to clients. */
export interface ErrorDescription {
  name: string;
  message: string;
  code: string | null;
  category: EngineErrorCategory | null;
  hint: string | null;
}

export function describeError(error: unknown): ErrorDescription {
  if (error instanceof EngineError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      category: error.category,
      hint: error.hint ?? null,
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, code: null, category: null, hint: null };
  }
  return { name: "Error", message: String(error), code: null, category: null, hint: null };
}

/** A `{{identifier.path}}` placeholder matched no completed action and no memory entry. */
export class TemplateResolutionError extends EngineError {
  readonly identifier: string;
  readonly path: string | null;
  readonly strategies: readonly string[];

  constructor(identifier: string, path: string | null, strategies: readonly string[], message?: string) {
    const reference = path ? `${identifier}.${path}` : identifier;
    super("TEMPLATE_RESOLUTION_FAILURE", message ?? `unable to resolve {{${reference}}} (tried: ${strategies.join(", ")})`, {
      details: { identifier, path, strategies: [...strategies] },
    });
    this.name = "TemplateResolutionError";
    this.identifier = identifier;
    this.path = path;
    this.strategies = strategies;
  }
}

/** Failure raised by a tool server connection and classified by {@link kind}. */
export class ToolInvocationError extends EngineError {
  readonly kind: ErrorKind;
  readonly tool: string;

  constructor(kind: ErrorKind, tool: string, message?: string, options: EngineErrorOptions = {}) {
    super(categoryForKind(kind), message, { ...options, details: { ...options.details, tool, kind } });
    this.name = "ToolInvocationError";
    this.kind = kind;
    this.tool = tool;
  }
}
