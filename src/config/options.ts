import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { DEFAULT_RETRY_POLICY } from "../tools/retry.js";
import { readEnum, readInt, readOptionalString, readString } from "./env.js";

/**
 * Runtime configuration of the gateway process. Defaults come from the
 * environment; CLI flags override them.
 */
export interface RuntimeOptions {
  host: string;
  port: number;
  /** SQLite file; `:memory:` keeps everything in process. */
  databasePath: string;
  /** JSON file describing the tool servers. */
  toolServersPath: string | null;
  logFile: string | null;
  logLevel: LogLevel;
  /** Per tool call timeout. */
  toolTimeoutMs: number;
  /** Retries granted to unreachable or timed out tool calls. */
  toolRetries: number;
  plannerUrl: string | null;
  plannerTimeoutMs: number;
}

const FLAG_WITH_VALUE = new Set([
  "--host",
  "--port",
  "--database",
  "--tool-servers",
  "--log-file",
  "--log-level",
  "--tool-timeout-ms",
  "--tool-retries",
  "--planner-url",
]);

function parsePositiveInteger(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || !Number.isInteger(num) || num <= 0) {
    throw new Error(`Value ${value} for ${flag} must be a positive integer.`);
  }
  return num;
}

function parseNonNegativeInteger(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || !Number.isInteger(num) || num < 0) {
    throw new Error(`Value ${value} for ${flag} must be a non-negative integer.`);
  }
  return num;
}

function parseLogLevel(value: string, flag: string): LogLevel {
  const lower = value.trim().toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === lower);
  if (!level) {
    throw new Error(`Value ${value} for ${flag} must be one of ${LOG_LEVELS.join(", ")}.`);
  }
  return level;
}

function requireNonEmpty(value: string, flag: string): string {
  const trimmed = value.trim();
  if (!trimmed.length) {
    throw new Error(`Flag ${flag} cannot be empty.`);
  }
  return trimmed;
}

/** Defaults derived from `ACTIONFLOW_*` and `PLANNER_URL`. */
export function readRuntimeDefaults(): RuntimeOptions {
  return {
    host: readString("ACTIONFLOW_HOST", "127.0.0.1"),
    port: readInt("ACTIONFLOW_PORT", 8080, { min: 1, max: 65_535 }),
    databasePath: readString("ACTIONFLOW_DATABASE", "./data/actionflow.db"),
    toolServersPath: readOptionalString("ACTIONFLOW_TOOL_SERVERS") ?? null,
    logFile: readOptionalString("ACTIONFLOW_LOG_FILE") ?? null,
    logLevel: readEnum("ACTIONFLOW_LOG_LEVEL", LOG_LEVELS, "info"),
    toolTimeoutMs: readInt("ACTIONFLOW_TOOL_TIMEOUT_MS", 30_000, { min: 1 }),
    toolRetries: readInt("ACTIONFLOW_TOOL_RETRIES", DEFAULT_RETRY_POLICY.maxRetries, { min: 0, max: 10 }),
    plannerUrl: readOptionalString("PLANNER_URL") ?? null,
    plannerTimeoutMs: readInt("ACTIONFLOW_PLANNER_TIMEOUT_MS", 60_000, { min: 1 }),
  };
}

/**
 * Parses `process.argv.slice(2)` on top of {@link defaults}. Flags accept both
 * `--flag value` and `--flag=value`; unknown flags are rejected.
 */
export function parseRuntimeOptions(argv: string[], defaults: RuntimeOptions = readRuntimeDefaults()): RuntimeOptions {
  const options: RuntimeOptions = { ...defaults };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg.startsWith("--")) {
      continue;
    }

    const [flag, inlineValue] = arg.split("=", 2);
    if (!FLAG_WITH_VALUE.has(flag)) {
      throw new Error(`Unknown flag ${flag}.`);
    }
    let value = inlineValue;
    if (value === undefined || value === "") {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`Flag ${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--host":
        options.host = requireNonEmpty(value, flag);
        break;
      case "--port":
        options.port = parsePositiveInteger(value, flag);
        break;
      case "--database":
        options.databasePath = requireNonEmpty(value, flag);
        break;
      case "--tool-servers":
        options.toolServersPath = requireNonEmpty(value, flag);
        break;
      case "--log-file":
        options.logFile = requireNonEmpty(value, flag);
        break;
      case "--log-level":
        options.logLevel = parseLogLevel(value, flag);
        break;
      case "--tool-timeout-ms":
        options.toolTimeoutMs = parsePositiveInteger(value, flag);
        break;
      case "--tool-retries":
        options.toolRetries = parseNonNegativeInteger(value, flag);
        break;
      case "--planner-url":
        options.plannerUrl = requireNonEmpty(value, flag);
        break;
    }
  }

  return options;
}
