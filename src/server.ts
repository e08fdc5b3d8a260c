#!/usr/bin/env node
import { pathToFileURL } from "node:url";
import process from "node:process";

import { readOptionalString } from "./config/env.js";
import { parseRuntimeOptions, type RuntimeOptions } from "./config/options.js";
import { emptyToolServerRegistry, loadToolServerConfig } from "./config/toolServers.js";
import { describeError } from "./errors.js";
import { StructuredLogger } from "./logger.js";
import { ChatMemoryStore } from "./memory/store.js";
import { openDatabase } from "./persistence/database.js";
import { SqliteMemoryRepository } from "./persistence/memoryRepository.js";
import { SqlitePlanRepository } from "./persistence/planRepository.js";
import { HttpPlanner } from "./planner/httpPlanner.js";
import { PlanManager } from "./plans/planManager.js";
import { startGateway, type StartedGateway } from "./server/websocket.js";
import { SessionManager } from "./sessions/sessionManager.js";
import { McpToolServerConnector } from "./tools/connection.js";
import { EnvCredentialProvider } from "./tools/credentials.js";
import { ToolRouter } from "./tools/router.js";

export interface RunningRuntime {
  gateway: StartedGateway;
  sessions: SessionManager;
  /** Stops accepting clients, drains sessions and releases the database. */
  shutdown(): Promise<void>;
}

/**
 * Wires persistence, memory, planner, routers and the WebSocket gateway from
 * parsed runtime options.
 */
export async function startRuntime(options: RuntimeOptions, logger: StructuredLogger): Promise<RunningRuntime> {
  if (!options.plannerUrl) {
    throw new Error("A planner endpoint is required (set PLANNER_URL or pass --planner-url).");
  }

  const database = openDatabase({ path: options.databasePath });
  const plans = new PlanManager({
    plans: new SqlitePlanRepository({ database }),
    memory: new ChatMemoryStore({ repository: new SqliteMemoryRepository({ database }), logger: logger.child("memory") }),
    logger: logger.child("plans"),
  });

  const registry = options.toolServersPath
    ? await loadToolServerConfig(options.toolServersPath)
    : emptyToolServerRegistry();
  logger.info("tool_servers_loaded", {
    servers: registry.servers.map((server) => server.name),
    default_server: registry.defaultServer,
    static_routes: registry.staticRoutes.size,
  });

  const planner = new HttpPlanner({
    url: options.plannerUrl,
    timeoutMs: options.plannerTimeoutMs,
    apiKey: readOptionalString("PLANNER_API_KEY") ?? null,
    logger: logger.child("planner"),
  });
  const connector = new McpToolServerConnector();
  const credentials = new EnvCredentialProvider();

  const sessions = new SessionManager({
    planner,
    plans,
    toolTimeoutMs: options.toolTimeoutMs,
    logger: logger.child("sessions"),
    createRouter: () =>
      new ToolRouter({
        registry,
        connector,
        credentials,
        logger: logger.child("router"),
        retry: { maxRetries: options.toolRetries },
        defaultTimeoutMs: options.toolTimeoutMs,
      }),
  });

  const gateway = await startGateway({
    host: options.host,
    port: options.port,
    sessions,
    logger: logger.child("gateway"),
    healthCheck: () => {
      database.prepare("SELECT 1").get();
    },
  });

  return {
    gateway,
    sessions,
    shutdown: async () => {
      await gateway.close();
      await sessions.closeAll();
      database.close();
    },
  };
}

async function main(): Promise<void> {
  const bootstrapLogger = new StructuredLogger();
  let options: RuntimeOptions;
  try {
    options = parseRuntimeOptions(process.argv.slice(2));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    bootstrapLogger.error("cli_options_invalid", { message });
    process.exit(1);
  }

  const logger = new StructuredLogger({ logFile: options.logFile, minLevel: options.logLevel });
  let runtime: RunningRuntime;
  try {
    runtime = await startRuntime(options, logger);
  } catch (error) {
    logger.error("runtime_start_failed", describeError(error));
    await logger.flush();
    process.exit(1);
  }

  logger.info("runtime_started", {
    host: options.host,
    port: runtime.gateway.port,
    database: options.databasePath,
  });

  let stopping = false;
  const stop = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.warn("shutdown_signal", { signal });
    try {
      await runtime.shutdown();
    } catch (error) {
      logger.error("shutdown_failed", describeError(error));
    }
    await logger.flush();
    process.exit(0);
  };
  process.on("SIGINT", () => void stop("SIGINT"));
  process.on("SIGTERM", () => void stop("SIGTERM"));
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  void main();
}
