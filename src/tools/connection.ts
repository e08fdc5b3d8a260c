import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport, StreamableHTTPError } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolResultSchema, ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";

import type { ToolServerConfig } from "../config/toolServers.js";
import { ToolInvocationError, type ErrorKind } from "../errors.js";
import { toJsonValue } from "../persistence/json.js";
import type { JsonObject, JsonValue } from "../persistence/types.js";

/** Live session with one tool server. */
export interface ToolServerConnection {
  readonly server: string;
  listTools(): Promise<string[]>;
  callTool(tool: string, args: JsonObject, signal?: AbortSignal): Promise<JsonValue>;
  close(): Promise<void>;
}

/** Opens connections; the router owns their lifecycle. */
export interface ToolServerConnector {
  connect(server: ToolServerConfig, credential: string | null): Promise<ToolServerConnection>;
}

export type TransportFactory = (server: ToolServerConfig, credential: string | null) => Transport;

export interface McpToolServerConnectorOptions {
  clientName?: string;
  clientVersion?: string;
  /** Overrides the Streamable HTTP transport (in-process servers in tests). */
  createTransport?: TransportFactory;
}

/** Streamable HTTP transport carrying the credential as a bearer token. */
export function createStreamableHttpTransport(server: ToolServerConfig, credential: string | null): Transport {
  const headers: Record<string, string> = {};
  if (credential) {
    headers.Authorization = `Bearer ${credential}`;
  }
  return new StreamableHTTPClientTransport(new URL(server.url), { requestInit: { headers } });
}

/** Connects to MCP tool servers over Streamable HTTP. */
export class McpToolServerConnector implements ToolServerConnector {
  private readonly clientName: string;
  private readonly clientVersion: string;
  private readonly createTransport: TransportFactory;

  constructor(options: McpToolServerConnectorOptions = {}) {
    this.clientName = options.clientName ?? "actionflow";
    this.clientVersion = options.clientVersion ?? "1.0.0";
    this.createTransport = options.createTransport ?? createStreamableHttpTransport;
  }

  async connect(server: ToolServerConfig, credential: string | null): Promise<ToolServerConnection> {
    const client = new Client({ name: this.clientName, version: this.clientVersion });
    try {
      await client.connect(this.createTransport(server, credential));
    } catch (error) {
      throw toInvocationError(error, `${server.name}/connect`);
    }
    return new McpToolServerConnection(server.name, client);
  }
}

export class McpToolServerConnection implements ToolServerConnection {
  constructor(
    readonly server: string,
    private readonly client: Client,
  ) {}

  async listTools(): Promise<string[]> {
    const names: string[] = [];
    let cursor: string | undefined;
    try {
      do {
        const page = await this.client.listTools(cursor ? { cursor } : undefined);
        names.push(...page.tools.map((tool) => tool.name));
        cursor = page.nextCursor;
      } while (cursor);
    } catch (error) {
      throw toInvocationError(error, `${this.server}/tools/list`);
    }
    return names;
  }

  async callTool(tool: string, args: JsonObject, signal?: AbortSignal): Promise<JsonValue> {
    let raw: unknown;
    try {
      raw = await this.client.callTool({ name: tool, arguments: args }, CallToolResultSchema, { signal });
    } catch (error) {
      throw toInvocationError(error, tool);
    }
    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ToolInvocationError("tool_error", tool, `tool ${tool} returned an invalid result`);
    }
    const texts = parsed.data.content.flatMap((item) => (item.type === "text" ? [item.text] : []));
    if (parsed.data.isError) {
      throw new ToolInvocationError("tool_error", tool, texts.join("\n") || `tool ${tool} reported an error`);
    }
    if (parsed.data.structuredContent !== undefined) {
      return toJsonValue(parsed.data.structuredContent);
    }
    return decodeTextContent(texts);
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

/**
 * Text content is decoded as JSON when it parses; other text is wrapped as
 * `{ text }` so results stay objects for path lookups.
 */
export function decodeTextContent(texts: readonly string[]): JsonValue {
  if (texts.length === 0) {
    return null;
  }
  const joined = texts.join("\n");
  try {
    return toJsonValue(JSON.parse(joined));
  } catch {
    return { text: joined };
  }
}

const NETWORK_ERROR_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EHOSTUNREACH", "ETIMEDOUT", "EPIPE"]);

/** Maps transport, protocol and network failures onto an {@link ErrorKind}. */
export function classifyToolError(error: unknown): ErrorKind {
  if (error instanceof ToolInvocationError) {
    return error.kind;
  }
  if (error instanceof StreamableHTTPError) {
    const status = error.code ?? 0;
    if (status === 401 || status === 403) {
      return "auth_required";
    }
    if (status === 408) {
      return "timeout";
    }
    if (status === 0 || status === 429 || status >= 500) {
      return "unreachable";
    }
    return "tool_error";
  }
  if (error instanceof McpError) {
    if (error.code === ErrorCode.RequestTimeout) {
      return "timeout";
    }
    if (error.code === ErrorCode.ConnectionClosed) {
      return "unreachable";
    }
    return "tool_error";
  }
  if (error instanceof Error) {
    if (error.name === "UnauthorizedError") {
      return "auth_required";
    }
    if (error.name === "TimeoutError") {
      return "timeout";
    }
    if (error instanceof TypeError || hasNetworkCode(error) || hasNetworkCode(error.cause)) {
      return "unreachable";
    }
  }
  return "tool_error";
}

function hasNetworkCode(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    NETWORK_ERROR_CODES.has(error.code)
  );
}

function toInvocationError(error: unknown, tool: string): ToolInvocationError {
  if (error instanceof ToolInvocationError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ToolInvocationError(classifyToolError(error), tool, message, { cause: error });
}
