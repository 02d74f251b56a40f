/**
 * Structured logging for the binding generator.
 *
 * Every entry is one JSON line on stderr, so generated source written to
 * stdout stays clean.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: per-step detail, only written in debug mode
 * - `info`: normal progress such as a registry being read
 * - `warn`: conditions that do not stop generation, e.g. an unknown extension
 * - `error`: failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  readonly level: LogLevel;

  /**
   * Name of the component that wrote the entry.
   * @example "resolver"
   */
  readonly component: string;

  /**
   * Snake-case event name.
   * @example "registry_resolved"
   */
  readonly event: string;

  /**
   * Structured context for the event.
   * @example { enums: 12, commands: 4 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Options for creating a Logger.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
}

/**
 * Structured logger that writes JSON lines to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'glbindgen', debugMode: true });
 * logger.info('registry_read', { path: 'gl.xml', commands: 3000 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /**
   * Returns a logger for a sub-component that shares this logger's debug mode.
   *
   * @param component - Name appended to this logger's component, e.g. `resolver`.
   */
  child(component: string): Logger {
    return new Logger({ component: `${this.component}:${component}`, debugMode: this.debugMode });
  }

  /**
   * Logs a debug-level message. A no-op unless debug mode is enabled.
   *
   * @param event - Event name.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Event name.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Event name.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Event name.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: new Date().toISOString(), level, component: this.component, event }
        : { timestamp: new Date().toISOString(), level, component: this.component, event, data };

    process.stderr.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry, replacing data that JSON cannot represent (cycles,
 * bigint values) with a marker so the line is always valid JSON.
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Default logger for the `glbindgen` component with debug output disabled.
 */
export const logger = new Logger({ component: 'glbindgen', debugMode: false });
