import type { ToolServerConfig, ToolServerRegistry } from "../config/toolServers.js";
import { ToolInvocationError, type ErrorKind } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { JsonObject, JsonValue } from "../persistence/types.js";
import { runtimeClearTimeout, runtimeSetTimeout, sleep as runtimeSleep } from "../runtime/timers.js";
import { classifyToolError, type ToolServerConnection, type ToolServerConnector } from "./connection.js";
import type { CredentialProvider } from "./credentials.js";
import { computeBackoffDelay, resolveRetryPolicy, type RetryPolicy } from "./retry.js";

export interface ToolFailure {
  kind: ErrorKind;
  message: string;
  server: string | null;
}

/** Outcome of a tool call. Failures are values, never thrown. */
export type ToolResultEnvelope =
  | { ok: true; value: JsonValue; error: null; attempts: number }
  | { ok: false; value: null; error: ToolFailure; attempts: number };

export interface InvokeOptions {
  /** Per attempt timeout; defaults to the router's. */
  timeoutMs?: number;
  /** Hard cancellation: aborts the in-flight attempt and any pending backoff. */
  signal?: AbortSignal;
}

export interface PrepareReport {
  ready: string[];
  failed: Array<{ server: string; kind: ErrorKind; message: string }>;
  unrouted: string[];
}

export interface ToolRouterOptions {
  registry: ToolServerRegistry;
  connector: ToolServerConnector;
  credentials: CredentialProvider;
  logger?: StructuredLogger;
  retry?: Partial<RetryPolicy>;
  defaultTimeoutMs?: number;
  /** Backoff sleeper; tests replace it to skip real delays. */
  sleep?: (delayMs: number, signal?: AbortSignal) => Promise<void>;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Routes tool names to tool servers and performs calls with timeout, bounded
 * retries and a single credential refresh. One router serves one session, so
 * connections are never shared across sessions.
 */
export class ToolRouter {
  private readonly registry: ToolServerRegistry;
  private readonly connector: ToolServerConnector;
  private readonly credentials: CredentialProvider;
  private readonly logger?: StructuredLogger;
  private readonly policy: RetryPolicy;
  private readonly defaultTimeoutMs: number;
  private readonly sleep: (delayMs: number, signal?: AbortSignal) => Promise<void>;
  private readonly connections = new Map<string, Promise<ToolServerConnection>>();
  /** Credentials handed back by `refresh`, used for every later connect. */
  private readonly refreshedCredentials = new Map<string, string | null>();
  private discovery: Promise<Map<string, string>> | null = null;
  private closed = false;

  constructor(options: ToolRouterOptions) {
    this.registry = options.registry;
    this.connector = options.connector;
    this.credentials = options.credentials;
    this.logger = options.logger;
    this.policy = resolveRetryPolicy(options.retry);
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.sleep = options.sleep ?? runtimeSleep;
  }

  get retryPolicy(): Readonly<RetryPolicy> {
    return this.policy;
  }

  /**
   * Server responsible for {@link tool}: static route, then discovery through
   * `tools/list`, then the default server.
   */
  async resolveServer(tool: string): Promise<string | null> {
    const routed = this.registry.staticRoutes.get(tool);
    if (routed) {
      return routed;
    }
    const discovered = (await this.discover()).get(tool);
    if (discovered) {
      return discovered;
    }
    return this.registry.defaultServer;
  }

  /** Opens the connections needed by {@link toolNames}. Failures are reported, not thrown. */
  async prepare(toolNames: readonly string[]): Promise<PrepareReport> {
    const servers = new Set<string>();
    const unrouted: string[] = [];
    for (const tool of new Set(toolNames)) {
      const server = await this.resolveServer(tool);
      if (server) {
        servers.add(server);
      } else {
        unrouted.push(tool);
      }
    }

    const report: PrepareReport = { ready: [], failed: [], unrouted };
    for (const server of servers) {
      try {
        await this.connection(server);
        report.ready.push(server);
      } catch (error) {
        const kind = classifyToolError(error);
        const message = error instanceof Error ? error.message : String(error);
        report.failed.push({ server, kind, message });
        this.logger?.warn("tool_server_prepare_failed", { server, kind, message });
      }
    }
    return report;
  }

  async invoke(tool: string, args: JsonObject, options: InvokeOptions = {}): Promise<ToolResultEnvelope> {
    if (this.closed) {
      return failure("unreachable", "tool router is closed", null, 0);
    }
    const server = await this.resolveServer(tool);
    if (!server) {
      this.logger?.warn("tool_unrouted", { tool });
      return failure("tool_error", `no tool server provides ${tool}`, null, 0);
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    let attempts = 0;
    let retries = 0;
    let refreshed = false;

    for (;;) {
      attempts += 1;
      const startedAt = Date.now();
      try {
        const value = await this.attempt(server, tool, args, timeoutMs, options.signal);
        this.logger?.info("tool_call_succeeded", { tool, server, attempts, duration_ms: Date.now() - startedAt });
        return { ok: true, value, error: null, attempts };
      } catch (error) {
        const kind = classifyToolError(error);
        const message = error instanceof Error ? error.message : String(error);

        if (options.signal?.aborted) {
          return failure(kind, message, server, attempts);
        }

        if (kind === "auth_required" && !refreshed) {
          refreshed = true;
          this.logger?.warn("tool_credential_refresh", { tool, server });
          await this.resetConnection(server);
          try {
            this.refreshedCredentials.set(server, await this.credentials.refresh(this.serverConfig(server)));
          } catch (refreshError) {
            const reason = refreshError instanceof Error ? refreshError.message : String(refreshError);
            this.logger?.error("tool_credential_refresh_failed", { tool, server, message: reason });
            return failure("auth_required", `credential refresh failed: ${reason}`, server, attempts);
          }
          continue;
        }

        if ((kind === "unreachable" || kind === "timeout") && retries < this.policy.maxRetries) {
          const delayMs = computeBackoffDelay(this.policy, retries);
          retries += 1;
          this.logger?.warn("tool_call_retry", { tool, server, kind, attempt: attempts, delay_ms: delayMs, message });
          await this.resetConnection(server);
          try {
            await this.sleep(delayMs, options.signal);
          } catch (sleepError) {
            const reason = sleepError instanceof Error ? sleepError.message : "tool call cancelled";
            return failure(kind, reason, server, attempts);
          }
          continue;
        }

        this.logger?.error("tool_call_failed", { tool, server, kind, attempts, message });
        return failure(kind, message, server, attempts);
      }
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    const servers = Array.from(this.connections.keys());
    await Promise.all(servers.map((server) => this.resetConnection(server)));
  }

  private async attempt(
    server: string,
    tool: string,
    args: JsonObject,
    timeoutMs: number,
    signal: AbortSignal | undefined,
  ): Promise<JsonValue> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) {
      throw new ToolInvocationError("unreachable", tool, "tool call cancelled");
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    let timer: ReturnType<typeof runtimeSetTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = runtimeSetTimeout(() => {
        reject(new ToolInvocationError("timeout", tool, `tool ${tool} timed out after ${timeoutMs}ms`));
        controller.abort();
      }, timeoutMs);
    });
    const cancelled = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(new ToolInvocationError("unreachable", tool, "tool call cancelled")),
        { once: true },
      );
    });
    // Losing racers settle later; keep their rejections handled.
    deadline.catch(() => undefined);
    cancelled.catch(() => undefined);

    try {
      const call = this.connection(server).then((connection) => connection.callTool(tool, args, controller.signal));
      return await Promise.race([call, deadline, cancelled]);
    } finally {
      if (timer !== undefined) {
        runtimeClearTimeout(timer);
      }
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private connection(server: string): Promise<ToolServerConnection> {
    const existing = this.connections.get(server);
    if (existing) {
      return existing;
    }
    const config = this.serverConfig(server);
    const credential = this.refreshedCredentials.has(server)
      ? Promise.resolve(this.refreshedCredentials.get(server) ?? null)
      : this.credentials.getCredential(config);
    const pending = credential
      .then((value) => this.connector.connect(config, value))
      .then((connection) => {
        this.logger?.debug("tool_server_connected", { server });
        return connection;
      });
    this.connections.set(server, pending);
    pending.catch(() => {
      if (this.connections.get(server) === pending) {
        this.connections.delete(server);
      }
    });
    return pending;
  }

  private async resetConnection(server: string): Promise<void> {
    const pending = this.connections.get(server);
    if (!pending) {
      return;
    }
    this.connections.delete(server);
    try {
      const connection = await pending;
      await connection.close();
    } catch (error) {
      this.logger?.debug("tool_server_close_failed", {
        server,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private serverConfig(server: string): ToolServerConfig {
    const config = this.registry.servers.find((candidate) => candidate.name === server);
    if (!config) {
      throw new ToolInvocationError("tool_error", server, `tool server ${server} is not configured`);
    }
    return config;
  }

  /** Lists the tools of every server not fully covered by static routes, once. */
  private discover(): Promise<Map<string, string>> {
    if (!this.discovery) {
      this.discovery = this.runDiscovery();
    }
    return this.discovery;
  }

  private async runDiscovery(): Promise<Map<string, string>> {
    const routes = new Map<string, string>();
    let complete = true;
    for (const server of this.registry.servers) {
      try {
        const connection = await this.connection(server.name);
        for (const tool of await connection.listTools()) {
          if (!routes.has(tool)) {
            routes.set(tool, server.name);
          }
        }
      } catch (error) {
        complete = false;
        this.logger?.warn("tool_discovery_failed", {
          server: server.name,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
    this.logger?.debug("tool_discovery_completed", { tools: routes.size, complete });
    if (!complete) {
      // Servers that failed are listed again on the next lookup.
      this.discovery = null;
    }
    return routes;
  }
}

function failure(kind: ErrorKind, message: string, server: string | null, attempts: number): ToolResultEnvelope {
  return { ok: false, value: null, error: { kind, message, server }, attempts };
}
