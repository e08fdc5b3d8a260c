export * from "./errors.js";
export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { parseRuntimeOptions, readRuntimeDefaults, type RuntimeOptions } from "./config/options.js";
export {
  loadToolServerConfig,
  parseToolServerConfig,
  type ToolServerConfig,
  type ToolServerRegistry,
} from "./config/toolServers.js";
export type {
  ActionRecord,
  ActionStatus,
  ChatRecord,
  JsonObject,
  JsonValue,
  MemoryEntry,
  MemorySearchQuery,
  MemoryStats,
  PlanFailureReason,
  PlanRecord,
  PlanStatus,
} from "./persistence/types.js";
export { openDatabase, type OpenDatabaseOptions, type SqliteDatabase } from "./persistence/database.js";
export { SqlitePlanRepository, type PlanRepository } from "./persistence/planRepository.js";
export { SqliteMemoryRepository, type MemoryRepository } from "./persistence/memoryRepository.js";
export { ChatMemoryStore, type ChatMemory, type MemoryPut } from "./memory/store.js";
export { generateTags } from "./memory/tags.js";
export { resolveArguments, resolveTemplates, type TemplateContext } from "./templates/resolver.js";
export { PlanManager, type PlanExecutionResult, type PlanSnapshot, type ToolInvoker } from "./plans/planManager.js";
export type { ActionStatusEvent, PlanEvent, PlanStatusEvent } from "./plans/events.js";
export { parsePlannedActions, type PlannedAction } from "./plans/validation.js";
export type { ChatTurn, Planner } from "./planner/planner.js";
export { HttpPlanner, type HttpPlannerOptions } from "./planner/httpPlanner.js";
export { ToolRouter, type ToolResultEnvelope, type ToolRouterOptions } from "./tools/router.js";
export { McpToolServerConnector, type ToolServerConnection, type ToolServerConnector } from "./tools/connection.js";
export { EnvCredentialProvider, type CredentialProvider } from "./tools/credentials.js";
export { Session, type SessionState } from "./sessions/session.js";
export { SessionManager, type SessionInfo } from "./sessions/sessionManager.js";
export type { OutboundEvent } from "./sessions/protocol.js";
export { startGateway, type StartedGateway } from "./server/websocket.js";
export { startRuntime, type RunningRuntime } from "./server.js";
