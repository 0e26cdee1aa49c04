/**
 * Simple Logger with component-based namespacing and global log level filtering.
 *
 * - No transports (just console.error)
 * - No formatters (simple structured format)
 * - No log rotation (LSP clients capture stderr themselves)
 * - Global level filtering only (no per-component filtering)
 */

/**
 * Log levels - numeric for comparison.
 * Lower levels are more severe.
 */
export enum LogLevel {
  OFF = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
  TRACE = 5,
}

const LEVEL_NAMES = new Map<string, LogLevel>([
  ['off', LogLevel.OFF],
  ['error', LogLevel.ERROR],
  ['warn', LogLevel.WARN],
  ['info', LogLevel.INFO],
  ['debug', LogLevel.DEBUG],
  ['trace', LogLevel.TRACE],
]);

/**
 * Parse a level name such as `"debug"` (case-insensitive).
 *
 * @returns The level, or `undefined` for an unknown name.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_NAMES.get(name.trim().toLowerCase());
}

const LEVEL_LABELS: Record<Exclude<LogLevel, LogLevel.OFF>, string> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.TRACE]: 'TRACE',
};

/**
 * Logger class with component-based namespacing.
 *
 * All output goes to console.error (stderr); stdout belongs to the
 * LSP stream when the server runs over stdio.
 *
 * @example
 * ```ts
 * const log = new Logger('EngineBridge');
 * Logger.setLevel(LogLevel.DEBUG);
 * log.debug('Writing request', { method: 'hover' });
 * ```
 */
export class Logger {
  /**
   * Global log level - only logs at or below this level are output.
   * Default: WARN
   */
  static globalLevel: LogLevel = LogLevel.WARN;

  static setLevel(level: LogLevel): void {
    Logger.globalLevel = level;
  }

  private readonly component: string;

  /**
   * @param component - Component name for namespacing (e.g., 'EngineBridge', 'Completion')
   */
  constructor(component: string) {
    this.component = component;
  }

  /**
   * True when a message at `level` would be written.
   */
  static isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.OFF && level <= Logger.globalLevel;
  }

  private log(level: Exclude<LogLevel, LogLevel.OFF>, message: string, context?: object): void {
    if (!Logger.isEnabled(level)) {
      return;
    }
    const suffix = context ? ` ${JSON.stringify(context)}` : '';
    console.error(`[${new Date().toISOString()}][${LEVEL_LABELS[level]}][${this.component}] ${message}${suffix}`);
  }

  error(msg: string, ctx?: object): void {
    this.log(LogLevel.ERROR, msg, ctx);
  }

  warn(msg: string, ctx?: object): void {
    this.log(LogLevel.WARN, msg, ctx);
  }

  info(msg: string, ctx?: object): void {
    this.log(LogLevel.INFO, msg, ctx);
  }

  debug(msg: string, ctx?: object): void {
    this.log(LogLevel.DEBUG, msg, ctx);
  }

  /** Per-line traffic; only written at TRACE */
  trace(msg: string, ctx?: object): void {
    this.log(LogLevel.TRACE, msg, ctx);
  }
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
