/**
 * Structured Logging
 *
 * JSON log entries with a level, a message and flat context. Messages may
 * carry `{field}` placeholders that are filled from the context.
 *
 * Writing an entry never throws: when the sink fails the entry goes to the
 * fallback sink (stderr by default), and an entry that neither accepts is
 * counted in `droppedCount()`.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * const catalogLogger = logger.child({ database: 'MovieDB' });
 * catalogLogger.info('deleted movie {movieId}', { movieId: 4 });
 * // {"timestamp":"...","level":"info","message":"deleted movie 4","context":{"database":"MovieDB","movieId":4}}
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Levels
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_RANK;
}

/**
 * Level named by the LOG_LEVEL environment variable, or `fallback` when it
 * is unset or not a level
 */
export function getLogLevelFromEnv(fallback: LogLevel = 'warn'): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(envLevel) ? envLevel : fallback;
}

// =============================================================================
// Entries and Sinks
// =============================================================================

export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface ConsoleSinkOptions {
  /** Write to stderr instead of stdout */
  stderr?: boolean;
}

/**
 * One JSON line per entry on the console
 */
export class ConsoleSink implements LogSink {
  private readonly stderr: boolean;

  constructor(options: ConsoleSinkOptions = {}) {
    this.stderr = options.stderr ?? false;
  }

  write(entry: LogEntry): void {
    const line = JSON.stringify(entry);
    if (this.stderr) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Discards every entry
 */
export class NoOpSink implements LogSink {
  write(_entry: LogEntry): void {
    // Intentionally empty
  }
}

/**
 * Keeps entries in memory, oldest first
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Logger
// =============================================================================

export interface LoggerConfig {
  /** Minimum level written (default: LOG_LEVEL, then "warn") */
  level?: LogLevel;
  /** Default: ConsoleSink on stdout */
  sink?: LogSink;
  /** Receives entries the sink rejected. Default: ConsoleSink on stderr */
  fallbackSink?: LogSink;
  /** Merged into every entry's context */
  context?: Record<string, unknown>;
}

export interface StructuredLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;

  /** Logger writing to the same sinks with extra context on every entry */
  child(context: Record<string, unknown>): StructuredLogger;

  getLevel(): LogLevel;
  setLevel(level: LogLevel): void;

  /** Entries rejected by both sinks, across this logger and its children */
  droppedCount(): number;
}

/** Sinks and counters shared by a logger and its children */
interface LoggerOutput {
  sink: LogSink;
  fallbackSink: LogSink;
  dropped: number;
}

function formatMessage(template: string, context: Record<string, unknown>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    key in context ? String(context[key]) : match
  );
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

class Logger implements StructuredLogger {
  constructor(
    private readonly output: LoggerOutput,
    private level: LogLevel,
    private readonly context: Record<string, unknown>
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  child(context: Record<string, unknown>): StructuredLogger {
    return new Logger(this.output, this.level, { ...this.context, ...context });
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  droppedCount(): number {
    return this.output.dropped;
  }

  private log(level: LogLevel, template: string, context?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
      return;
    }

    const merged = { ...this.context, ...context };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: formatMessage(template, merged),
    };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }

    this.write(entry);
  }

  private write(entry: LogEntry): void {
    let failure: unknown;
    try {
      this.output.sink.write(entry);
      return;
    } catch (error) {
      failure = error;
    }

    try {
      this.output.fallbackSink.write({
        ...entry,
        context: { ...entry.context, sinkError: describeFailure(failure) },
      });
    } catch {
      this.output.dropped++;
    }
  }
}

/**
 * Create a root logger
 */
export function createLogger(config: LoggerConfig = {}): StructuredLogger {
  const output: LoggerOutput = {
    sink: config.sink ?? new ConsoleSink(),
    fallbackSink: config.fallbackSink ?? new ConsoleSink({ stderr: true }),
    dropped: 0,
  };
  return new Logger(output, config.level ?? getLogLevelFromEnv(), config.context ?? {});
}
