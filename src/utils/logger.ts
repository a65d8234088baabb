/**
 * Leveled logging for tf-tag-guard
 *
 * Everything goes to stderr so that `--json` output on stdout stays clean
 * for whatever consumes it in the pipeline.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details (if applicable) */
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON lines (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Context merged into every entry */
  context?: Record<string, unknown>;
  /** Where formatted lines are written (default: stderr) */
  write?: (line: string) => void;
}

// =============================================================================
// Constants
// =============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Parse a level name from the environment, ignoring unknown values
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const lower = value.toLowerCase();
  return lower === 'debug' || lower === 'info' || lower === 'warn' || lower === 'error'
    ? lower
    : undefined;
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private config: Required<Omit<LoggerConfig, 'context'>> & { context: Record<string, unknown> };

  constructor(config: LoggerConfig = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      context: config.context ?? {},
      write: config.write ?? ((line) => console.error(line)),
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const merged = { ...this.config.context, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  /**
   * Format entry for output
   */
  formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) return;
    this.config.write(this.formatEntry(this.createEntry(level, message, context, error)));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({ ...this.config, context: { ...this.config.context, ...context } });
  }

  /**
   * Update logger configuration
   */
  setConfig(config: Partial<Omit<LoggerConfig, 'context'>>): void {
    Object.assign(this.config, config);
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

/**
 * Default logger, configured from TAG_GUARD_LOG_LEVEL / TAG_GUARD_LOG_JSON
 */
export const logger = new Logger({
  level: parseLogLevel(process.env.TAG_GUARD_LOG_LEVEL),
  json: process.env.TAG_GUARD_LOG_JSON === 'true',
});

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return new Logger(config);
}
