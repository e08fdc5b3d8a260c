import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { getCorrelationContext, type CorrelationContext } from "./infra/correlation.js";

/** Placeholder written in place of redacted values. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are replaced when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "x-api-key",
  "api_key",
  "token",
  "access_token",
  "refresh_token",
  "bearer",
  "password",
  "cookie",
]);

/**
 * Parses `ACTIONFLOW_LOG_REDACT`. The variable accepts comma separated
 * directives such as `"on"`, `"off"` or `"on,sk-"`: toggles switch redaction,
 * any other entry is a literal substring scrubbed from string values. Custom
 * substrings without an explicit toggle enable redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  const directives = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  let enabled: boolean | undefined;
  const tokens: Array<string> = [];
  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB
const DEFAULT_MAX_FILE_COUNT = 5;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_WEIGHT: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry extends CorrelationContext {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical files kept next to the active one. */
  readonly maxFileCount?: number;
  /** Entries below this level are dropped. Defaults to `debug`. */
  readonly minLevel?: LogLevel;
  /** Literal substrings or patterns scrubbed from string values. */
  readonly redactSecrets?: Array<string | RegExp>;
  /** Overrides the toggle parsed from `ACTIONFLOW_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Disables the stdout sink (tests, embedded usage). */
  readonly silent?: boolean;
  /** Invoked with a copy of every emitted entry. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Component name stamped on every entry. */
  readonly component?: string;
}

/**
 * Structured logger writing JSON lines to stdout and optionally mirroring them
 * to a file. File writes are chained on a single promise so entries keep
 * their emission order; the active file rotates once it grows past
 * {@link LoggerOptions.maxFileSizeBytes}.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly minLevel: LogLevel;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly silent: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly component?: string;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;
  /** Set on child loggers: entries are handed to the parent's sinks. */
  private forward?: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.minLevel = options.minLevel ?? "debug";
    const directives = parseRedactionDirectives(process.env.ACTIONFLOW_LOG_REDACT);
    this.redactSecrets = Array.from(new Set([...directives.tokens, ...(options.redactSecrets ?? [])]));
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.silent = options.silent ?? false;
    this.entryListener = options.onEntry;
    this.component = options.component;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /**
   * Returns a logger sharing this instance's sinks and settings but stamping
   * {@link component} on its entries.
   */
  child(component: string): StructuredLogger {
    const child = new StructuredLogger({
      minLevel: this.minLevel,
      redactionEnabled: this.redactionEnabled,
      redactSecrets: this.redactSecrets,
      silent: true,
      component,
    });
    child.forward = (entry) => this.emit(entry);
    return child;
  }

  /** Resolves once every pending file write has completed. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.minLevel]) {
      return;
    }
    const correlation = getCorrelationContext() ?? {};
    const safePayload = payload !== undefined ? this.redact(payload) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.component ? { component: this.component } : {}),
      ...correlation,
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    this.emit(entry);
  }

  private emit(entry: LogEntry): void {
    if (this.forward) {
      this.forward(entry);
      return;
    }
    const line = `${JSON.stringify(entry)}\n`;
    if (!this.silent) {
      process.stdout.write(line);
    }
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      } catch (error) {
        this.logDirectoryReady = false;
        process.stderr.write(
          `${JSON.stringify({
            timestamp: new Date().toISOString(),
            level: "error",
            message: "log_file_write_failed",
            payload: { message: error instanceof Error ? error.message : String(error) },
          })}\n`,
        );
      }
    });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize: number;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }
    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private redact(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value);
  }

  private deepRedact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrub(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }

  private scrub(value: string): string {
    let sanitised = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string" && pattern.length > 0) {
        sanitised = sanitised.split(pattern).join(REDACTION_TOKEN);
      } else if (pattern instanceof RegExp) {
        sanitised = sanitised.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitised;
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
}
