import { isReadabilityError } from "../errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    code?: number;
    message: string;
    operation?: string;
    stack?: string;
  };
}

/** Where formatted lines go. Defaults to the console; tests swap in a collector. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerConfig {
  prefix: string;
  minLevel: LogLevel;
  includeTimestamp: boolean;
  structuredOutput: boolean;
  sink: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "debug":
      console.debug(line);
      break;
    default:
      console.log(line);
  }
};

const DEFAULT_CONFIG: LoggerConfig = {
  prefix: "[readability]",
  minLevel: "info",
  includeTimestamp: false,
  structuredOutput: false,
  sink: consoleSink,
};

function describeError(error: unknown): LogEntry["error"] | undefined {
  if (isReadabilityError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      operation: error.context.operation,
      stack: error.stack,
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return undefined;
}

/**
 * Structured logger for the readability plugin.
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.minLevel];
  }

  private formatLine(entry: LogEntry): string {
    if (this.config.structuredOutput) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];
    if (this.config.includeTimestamp) {
      parts.push(`[${entry.timestamp}]`);
    }
    parts.push(this.config.prefix);
    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      const contextStr = Object.entries(entry.context)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(" ");
      parts.push(`| ${contextStr}`);
    }
    if (entry.error) {
      const code = entry.error.code !== undefined ? ` (${entry.error.code})` : "";
      parts.push(`| ${entry.error.name}${code}: ${entry.error.message}`);
    }

    return parts.join(" ");
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
    };
    if (context && Object.keys(context).length > 0) entry.context = context;
    const described = describeError(error);
    if (described) entry.error = described;

    this.config.sink(level, this.formatLine(entry));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>, error?: unknown): void {
    this.log("warn", message, context, error);
  }

  error(message: string, context?: Record<string, unknown>, error?: unknown): void {
    this.log("error", message, context, error);
  }

  child(additionalContext: Record<string, unknown>): ContextualLogger {
    return new ContextualLogger(this, additionalContext);
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }
}

/**
 * Logger with persistent context (component, operation, document id).
 * Children of children merge their context left to right.
 */
export class ContextualLogger {
  constructor(
    private parent: Logger,
    private context: Record<string, unknown>
  ) {}

  debug(message: string, additionalContext?: Record<string, unknown>): void {
    this.parent.debug(message, { ...this.context, ...additionalContext });
  }

  info(message: string, additionalContext?: Record<string, unknown>): void {
    this.parent.info(message, { ...this.context, ...additionalContext });
  }

  warn(message: string, additionalContext?: Record<string, unknown>, error?: unknown): void {
    this.parent.warn(message, { ...this.context, ...additionalContext }, error);
  }

  error(message: string, additionalContext?: Record<string, unknown>, error?: unknown): void {
    this.parent.error(message, { ...this.context, ...additionalContext }, error);
  }

  child(additionalContext: Record<string, unknown>): ContextualLogger {
    return new ContextualLogger(this.parent, { ...this.context, ...additionalContext });
  }
}

export const logger = new Logger();

export function createLogger(context: Record<string, unknown>): ContextualLogger {
  return logger.child(context);
}

if (typeof process !== "undefined" && process.env) {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(envLevel)) {
    logger.configure({ minLevel: envLevel });
  }
  if (process.env.READABILITY_STRUCTURED_LOGS === "true") {
    logger.configure({ structuredOutput: true });
  }
}
