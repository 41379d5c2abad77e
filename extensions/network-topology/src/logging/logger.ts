/**
 * Network Topology Logging
 *
 * Structured, level-filtered logging with subsystem names and child
 * loggers. Pipeline phases receive a logger explicitly; library callers
 * that pass none get a silent logger.
 */

// =============================================================================
// Logger Types
// =============================================================================

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type TopologyLogLevel = (typeof LOG_LEVELS)[number];

export type TopologyLogEntry = {
  timestamp: Date;
  level: TopologyLogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
};

export type LogFormatter = (entry: TopologyLogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: TopologyLogEntry): void;
}

export interface TopologyLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>, err?: unknown): void;
  fatal(message: string, meta?: Record<string, unknown>, err?: unknown): void;

  child(name: string): TopologyLogger;
  setLevel(level: TopologyLogLevel): void;
  getLevel(): TopologyLogLevel;
  isLevelEnabled(level: TopologyLogLevel): boolean;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<TopologyLogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

/**
 * Check if a level should be logged given a minimum level
 */
export function shouldLog(level: TopologyLogLevel, minLevel: TopologyLogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<TopologyLogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stderr.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  return (entry: TopologyLogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      const ts = entry.timestamp.toISOString();
      parts.push(colors ? `${COLORS.dim}${ts}${COLORS.reset}` : ts);
    }

    const levelStr = entry.level.toUpperCase().padEnd(5);
    parts.push(colors ? `${LEVEL_COLORS[entry.level]}${levelStr}${COLORS.reset}` : levelStr);
    parts.push(colors ? `${COLORS.blue}[${entry.subsystem}]${COLORS.reset}` : `[${entry.subsystem}]`);
    parts.push(entry.message);

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      const metaStr = JSON.stringify(entry.metadata);
      parts.push(colors ? `${COLORS.dim}${metaStr}${COLORS.reset}` : metaStr);
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) parts.push(`\n${entry.error.stack}`);
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

/**
 * Console transport. Writes to stderr by default so that reports printed to
 * stdout stay clean.
 */
export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private minLevel: TopologyLogLevel;
  private stream: "stdout" | "stderr";

  constructor(options?: { formatter?: LogFormatter; minLevel?: TopologyLogLevel; stream?: "stdout" | "stderr" }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.minLevel = options?.minLevel ?? "trace";
    this.stream = options?.stream ?? "stderr";
  }

  write(entry: TopologyLogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    const formatted = this.formatter(entry);
    if (this.stream === "stderr" || entry.level === "error" || entry.level === "fatal") {
      console.error(formatted);
    } else if (entry.level === "warn") {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

/** Keeps entries in memory; used by tests and by callers that render logs themselves. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: TopologyLogEntry[] = [];

  write(entry: TopologyLogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: TopologyLogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

function describeError(err: unknown): TopologyLogEntry["error"] {
  if (err instanceof Error) return { name: err.name, message: err.message, stack: err.stack };
  if (err === undefined) return undefined;
  return { name: "Error", message: String(err) };
}

export class TopologyLoggerImpl implements TopologyLogger {
  readonly subsystem: string;
  private level: TopologyLogLevel;
  private transports: LogTransport[];

  constructor(options: { subsystem: string; level?: TopologyLogLevel; transports?: LogTransport[] }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>, err?: unknown): void {
    this.log("error", message, meta, err);
  }

  fatal(message: string, meta?: Record<string, unknown>, err?: unknown): void {
    this.log("fatal", message, meta, err);
  }

  child(name: string): TopologyLogger {
    return new TopologyLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
    });
  }

  setLevel(level: TopologyLogLevel): void {
    this.level = level;
  }

  getLevel(): TopologyLogLevel {
    return this.level;
  }

  isLevelEnabled(level: TopologyLogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private log(level: TopologyLogLevel, message: string, meta?: Record<string, unknown>, err?: unknown): void {
    if (!shouldLog(level, this.level)) return;

    const entry: TopologyLogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message,
      metadata: meta,
      error: describeError(err),
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

// =============================================================================
// Logger Factories
// =============================================================================

export function createTopologyLogger(
  subsystem: string,
  options?: { level?: TopologyLogLevel; transports?: LogTransport[] },
): TopologyLogger {
  return new TopologyLoggerImpl({
    subsystem: `topology/${subsystem}`,
    level: options?.level ?? "info",
    transports: options?.transports,
  });
}

/** A logger with no transports. */
export function createSilentLogger(): TopologyLogger {
  return new TopologyLoggerImpl({ subsystem: "topology", level: "fatal", transports: [] });
}
