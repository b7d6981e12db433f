/**
 * Structured debug logging for Watchpoint.
 *
 * Observers, registries and scopes trace their activity at `debug` level.
 * Entries reach a custom handler or JSON console output, and only when the
 * logger's level admits them or global debug mode is on.
 *
 * @module observability/logger
 */

/** Log level; Watchpoint itself only emits `debug` */
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
export interface WatchpointLoggerConfig {
  /** Minimum level that is emitted (default: 'info', which hides Watchpoint's traces) */
  readonly level?: LogLevel;
  /** Module name prefix */
  readonly module?: string;
  /** Receives every emitted entry */
  readonly handler?: (entry: LogEntry) => void;
  /** Write emitted entries to the console as JSON when there is no handler */
  readonly json?: boolean;
}

let globalDebug = false;

/** Emit debug traces from every Watchpoint logger, whatever its level */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

/**
 * Structured logger for Watchpoint modules.
 *
 * @example
 * ```typescript
 * const log = createLogger({ module: 'dashboard', level: 'debug', json: true });
 * const registry = createObserverRegistry({ logger: log });
 * // {"level":"debug","message":"Observer added","module":"dashboard:registry",...}
 * ```
 */
export class WatchpointLogger {
  readonly module: string;
  private readonly level: LogLevel;
  private readonly handler: ((entry: LogEntry) => void) | undefined;
  private readonly json: boolean;

  constructor(config: WatchpointLoggerConfig = {}) {
    this.module = config.module ?? 'watchpoint';
    this.level = config.level ?? 'info';
    this.handler = config.handler;
    this.json = config.json ?? false;
  }

  /** Same output, with `:subModule` appended to the module name */
  child(subModule: string): WatchpointLogger {
    return new WatchpointLogger({
      module: `${this.module}:${subModule}`,
      level: this.level,
      handler: this.handler,
      json: this.json,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!globalDebug && this.level !== 'debug') return;

    const entry: LogEntry = {
      level: 'debug',
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(context ? { context } : {}),
    };

    if (this.handler) {
      this.handler(entry);
    } else if (this.json) {
      console.log(JSON.stringify(entry));
    }
  }
}

export function createLogger(config?: WatchpointLoggerConfig): WatchpointLogger {
  return new WatchpointLogger(config);
}
