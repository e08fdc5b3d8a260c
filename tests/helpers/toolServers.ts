import { parseToolServerConfig, type ToolServerConfig, type ToolServerRegistry } from "../../src/config/toolServers.js";
import type { CredentialProvider } from "../../src/tools/credentials.js";
import type { ToolServerConnection, ToolServerConnector } from "../../src/tools/connection.js";
import type { JsonObject, JsonValue } from "../../src/persistence/types.js";

export type ToolHandler = (args: JsonObject, signal?: AbortSignal) => JsonValue | Promise<JsonValue>;

export interface RecordedCall {
  server: string;
  tool: string;
  args: JsonObject;
}

/** Scripted tool server; handlers run in process and every call is recorded. */
export class FakeToolServer {
  readonly calls: RecordedCall[] = [];
  readonly credentials: Array<string | null> = [];
  connects = 0;
  closes = 0;
  /** When set, `connect` rejects with this error. */
  connectError: Error | null = null;

  constructor(
    readonly name: string,
    private readonly handlers: Record<string, ToolHandler>,
  ) {}

  get toolNames(): string[] {
    return Object.keys(this.handlers);
  }

  handler(tool: string): ToolHandler | undefined {
    return this.handlers[tool];
  }
}

class FakeConnection implements ToolServerConnection {
  constructor(private readonly target: FakeToolServer) {}

  get server(): string {
    return this.target.name;
  }

  async listTools(): Promise<string[]> {
    return this.target.toolNames;
  }

  async callTool(tool: string, args: JsonObject, signal?: AbortSignal): Promise<JsonValue> {
    this.target.calls.push({ server: this.target.name, tool, args });
    const handler = this.target.handler(tool);
    if (!handler) {
      throw new Error(`unknown tool ${tool}`);
    }
    return handler(args, signal);
  }

  async close(): Promise<void> {
    this.target.closes += 1;
  }
}

export class FakeConnector implements ToolServerConnector {
  private readonly servers: Map<string, FakeToolServer>;

  constructor(servers: FakeToolServer[]) {
    this.servers = new Map(servers.map((server) => [server.name, server]));
  }

  async connect(server: ToolServerConfig, credential: string | null): Promise<ToolServerConnection> {
    const target = this.servers.get(server.name);
    if (!target) {
      throw new Error(`no fake server named ${server.name}`);
    }
    target.connects += 1;
    target.credentials.push(credential);
    if (target.connectError) {
      throw target.connectError;
    }
    return new FakeConnection(target);
  }
}

/** Hands out `test-secret` until the first refresh, `test-secret-refreshed` after. */
export class StaticCredentials implements CredentialProvider {
  refreshes = 0;

  async getCredential(): Promise<string | null> {
    return this.refreshes > 0 ? "test-secret-refreshed" : "test-secret";
  }

  async refresh(): Promise<string | null> {
    this.refreshes += 1;
    return this.getCredential();
  }
}

/** Keeps serving `test-secret`; only `refresh` hands out a new value. */
export class RotatingCredentials implements CredentialProvider {
  constructor(private readonly rotate: () => Promise<string | null>) {}

  async getCredential(): Promise<string | null> {
    return "test-secret";
  }

  async refresh(): Promise<string | null> {
    return this.rotate();
  }
}

export interface ServerDeclaration {
  name: string;
  /** Static routes; omit to rely on discovery. */
  tools?: string[];
}

export function registryOf(servers: ServerDeclaration[], defaultServer?: string): ToolServerRegistry {
  return parseToolServerConfig({
    servers: servers.map((server) => ({
      name: server.name,
      url: `http://127.0.0.1:4100/${server.name}`,
      tools: server.tools ?? [],
    })),
    ...(defaultServer ? { defaultServer } : {}),
  });
}

/** Sleeper that records requested delays and resolves immediately. */
export function recordingSleep(): { delays: number[]; sleep: (delayMs: number, signal?: AbortSignal) => Promise<void> } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (delayMs: number, signal?: AbortSignal) => {
      delays.push(delayMs);
      if (signal?.aborted) {
        throw signal.reason instanceof Error ? signal.reason : new Error("sleep aborted");
      }
    },
  };
}
