/**
 * Structured logging for the XSQL engine.
 *
 * A lightweight, zero-dependency structured logger with levels, JSON output,
 * bound context fields and a global debug mode toggle.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

/** Logger configuration */
export interface XsqlLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler */
  readonly handler?: (entry: LogEntry) => void;
  /** Write entries as JSON lines to stderr */
  readonly json?: boolean;
  /** Fields merged into every entry's context */
  readonly bindings?: Record<string, unknown>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Enable/disable global debug mode for all XSQL loggers */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

export function isDebugMode(): boolean {
  return globalDebug;
}

/**
 * Structured logger for XSQL modules.
 *
 * @example
 * ```typescript
 * const log = createLogger({ module: 'executor', level: 'debug' });
 *
 * log.debug('Stage started', { stage: 'filter' });
 *
 * const end = log.time('filter');
 * // ... evaluate predicates ...
 * end({ rows: 12 }); // logs "filter completed" with durationMs
 * ```
 */
export class XsqlLogger {
  private readonly level: LogLevel;
  private readonly module: string;
  private readonly handler?: (entry: LogEntry) => void;
  private readonly json: boolean;
  private readonly bindings: Record<string, unknown>;

  constructor(private readonly config: XsqlLoggerConfig = {}) {
    this.level = config.debug ? 'debug' : (config.level ?? 'info');
    this.module = config.module ?? 'xsql';
    this.handler = config.handler;
    this.json = config.json ?? false;
    this.bindings = config.bindings ?? {};
  }

  /** Create a child logger with a sub-module prefix and extra bound fields */
  child(subModule: string, bindings: Record<string, unknown> = {}): XsqlLogger {
    return new XsqlLogger({
      ...this.config,
      module: `${this.module}:${subModule}`,
      bindings: { ...this.bindings, ...bindings },
    });
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
    this.log('error', message, {
      ...context,
      ...(error ? { error: { name: error.name, message: error.message } } : {}),
    });
  }

  /**
   * Start a timer. Returns a function that logs completion with duration.
   */
  time(operation: string): (context?: Record<string, unknown>) => number {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
      return durationMs;
    };
  }

  isLevelEnabled(level: LogLevel): boolean {
    const effectiveLevel = globalDebug ? 'debug' : this.level;
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[effectiveLevel];
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;

    const merged = { ...this.bindings, ...context };
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
    };

    if (this.handler) {
      this.handler(entry);
      return;
    }

    if (this.json) {
      process.stderr.write(`${JSON.stringify(entry)}\n`);
    }
    // Silent with no handler and no JSON output
  }
}

/** Factory function to create an XsqlLogger */
export function createLogger(config?: XsqlLoggerConfig): XsqlLogger {
  return new XsqlLogger(config);
}
