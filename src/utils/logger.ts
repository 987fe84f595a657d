/**
 * Structured logging utility.
 *
 * Every component of the research engine logs through this module so that
 * stderr carries one JSON object per line. Stdout stays free for command
 * output and for the MCP stdio transport.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information, only emitted in debug mode
 * - `info`: Normal operation (sessions started, steps validated)
 * - `warn`: Conditions that do not fail the call but need attention
 * - `error`: Failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry as written to stderr.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the log entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "GuidedResearchEngine"
   */
  readonly component: string;

  /**
   * Short snake_case name of the event.
   * @example "step_validated"
   */
  readonly event: string;

  /** Additional structured data for the entry. */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /**
   * Sink for serialized lines. Defaults to process.stderr.
   */
  readonly write?: (line: string) => void;
}

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'GuidedResearchEngine', debugMode: true });
 * logger.info('session_started', { sessionId: 'abc' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly write: (line: string) => void;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.write =
      options.write ??
      ((line: string): void => {
        process.stderr.write(line);
      });
  }

  /**
   * Creates a logger for another component sharing this logger's settings.
   *
   * @param component - Name of the child component.
   * @returns A new Logger.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, write: this.write });
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /** Logs an info-level message. */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /** Logs a warning-level message. */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /** Logs an error-level message. */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const base: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
    };

    const entry: LogEntry = data === undefined ? base : { ...base, data };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Circular structures and BigInt values cannot be serialized.
      line = JSON.stringify({
        ...base,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    this.write(line + '\n');
  }
}
