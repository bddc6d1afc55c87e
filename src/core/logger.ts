/**
 * Structured Logging
 * Leveled logger with pluggable handlers. Child loggers carry
 * session and stage context through a workflow run.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "pretty" | "json";

export interface LogContext {
  sessionId?: string;
  stage?: string;
  provider?: string;
  component?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export type LogHandler = (entry: LogEntry) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m",
  info: "\x1b[36m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};
const RESET = "\x1b[0m";

// Shown in the bracketed tag rather than the trailing context dump
const TAG_KEYS = ["component", "sessionId", "stage", "provider"] as const;

function splitContext(context: LogContext | undefined): { tag: string; rest: Record<string, unknown> } {
  if (!context) return { tag: "", rest: {} };
  const rest: Record<string, unknown> = { ...context };
  const parts: string[] = [];
  for (const key of TAG_KEYS) {
    const value = context[key];
    if (typeof value === "string") {
      parts.push(key === "sessionId" ? value.slice(0, 8) : value);
      delete rest[key];
    }
  }
  return { tag: parts.length > 0 ? ` [${parts.join(" ")}]` : "", rest };
}

/**
 * Human-readable console output with colors
 */
export const prettyHandler: LogHandler = (entry) => {
  const { tag, rest } = splitContext(entry.context);
  const time = entry.timestamp.slice(11, 19);
  const extra = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
  const line = `${COLORS[entry.level]}${time} ${entry.level.toUpperCase().padEnd(5)}${RESET}${tag} ${entry.message}${extra}`;

  if (entry.level === "error") {
    console.error(line);
    if (entry.error) {
      console.error(`  ${entry.error.name}${entry.error.code ? ` (${entry.error.code})` : ""}: ${entry.error.message}`);
    }
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

/**
 * One JSON object per line on stderr, for log shippers
 */
export const jsonHandler: LogHandler = (entry) => {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
};

let currentLevel: LogLevel = "info";
const handlers: LogHandler[] = [prettyHandler];

function toEntry(level: LogLevel, message: string, context?: LogContext, error?: unknown): LogEntry {
  const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };

  if (context && Object.keys(context).length > 0) {
    entry.context = context;
  }

  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    entry.error = { name: error.name, message: error.message, code, stack: error.stack };
  } else if (error !== undefined) {
    entry.error = { name: "NonError", message: String(error) };
  }

  return entry;
}

function emit(entry: LogEntry): void {
  if (LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[currentLevel]) return;

  for (const handler of handlers) {
    try {
      handler(entry);
    } catch (e) {
      console.error("Logger handler error:", e);
    }
  }
}

export class ChildLogger {
  constructor(private readonly baseContext: LogContext) {}

  private with(context?: LogContext): LogContext {
    return { ...this.baseContext, ...context };
  }

  debug(message: string, context?: LogContext): void {
    emit(toEntry("debug", message, this.with(context)));
  }

  info(message: string, context?: LogContext): void {
    emit(toEntry("info", message, this.with(context)));
  }

  warn(message: string, context?: LogContext): void {
    emit(toEntry("warn", message, this.with(context)));
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    emit(toEntry("error", message, this.with(context), error));
  }

  /**
   * Log a metric (latency, attempts, fragment counts)
   */
  metric(name: string, value: number, context?: LogContext): void {
    emit(toEntry("info", `METRIC: ${name}=${value}`, this.with({ ...context, metric: name, value })));
  }

  child(additionalContext: LogContext): ChildLogger {
    return new ChildLogger(this.with(additionalContext));
  }
}

const root = new ChildLogger({});

export const logger = {
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  setFormat(format: LogFormat): void {
    handlers.length = 0;
    handlers.push(format === "json" ? jsonHandler : prettyHandler);
  },

  addHandler(handler: LogHandler): void {
    handlers.push(handler);
  },

  /**
   * Replace all handlers, console included
   */
  setHandlers(next: LogHandler[]): void {
    handlers.length = 0;
    handlers.push(...next);
  },

  debug: (message: string, context?: LogContext) => root.debug(message, context),
  info: (message: string, context?: LogContext) => root.info(message, context),
  warn: (message: string, context?: LogContext) => root.warn(message, context),
  error: (message: string, error?: unknown, context?: LogContext) => root.error(message, error, context),
  metric: (name: string, value: number, context?: LogContext) => root.metric(name, value, context),
  child: (context: LogContext) => root.child(context),
};
