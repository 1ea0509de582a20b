/**
 * Component logger
 *
 * Every module creates its own logger with `createLogger('Component')`.
 * Debug output is off unless debug mode is enabled, either with
 * `setDebugMode(true)` or the FRAMEPIPE_DEBUG environment variable.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: number;
  level: LogLevel;
  component: string;
  msg: string;
  meta?: Record<string, unknown>;
  error?: { name: string; message: string; stack?: string };
}

type LogListener = (entry: LogEntry) => void;

const COLORS: Record<LogLevel | 'reset' | 'dim', string> = {
  debug: '\x1b[34m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  reset: '\x1b[0m',
  dim: '\x1b[2m',
};

let debugMode = process.env.FRAMEPIPE_DEBUG === '1' || process.env.FRAMEPIPE_DEBUG === 'true';
let silent = false;
const listeners = new Set<LogListener>();

/**
 * Enable or disable debug-level output for every logger
 */
export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

/**
 * Suppress console output (listeners still receive entries)
 */
export function setSilent(value: boolean): void {
  silent = value;
}

function outputFormat(): 'json' | 'pretty' {
  return process.env.FRAMEPIPE_LOG_FORMAT === 'json' ? 'json' : 'pretty';
}

function serializeError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'Error', message: String(error) };
}

export class Logger {
  constructor(private readonly component: string) {}

  /**
   * Subscribe to every log entry; returns an unsubscribe function
   */
  static addListener(listener: LogListener): () => void {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    if (!debugMode) return;
    this.output('debug', msg, meta);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.output('info', msg, meta);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.output('warn', msg, meta);
  }

  error(msg: string, error?: unknown, meta?: Record<string, unknown>): void {
    this.output('error', msg, meta, error);
  }

  child(component: string): Logger {
    return new Logger(`${this.component}:${component}`);
  }

  private output(level: LogLevel, msg: string, meta?: Record<string, unknown>, error?: unknown): void {
    const entry: LogEntry = { ts: Date.now(), level, component: this.component, msg };
    if (meta && Object.keys(meta).length > 0) {
      entry.meta = meta;
    }
    if (error !== undefined) {
      entry.error = serializeError(error);
    }

    if (!silent) {
      if (outputFormat() === 'json') {
        console.log(JSON.stringify(entry));
      } else {
        prettyPrint(entry);
      }
    }

    for (const listener of listeners) {
      try {
        listener(entry);
      } catch (err) {
        console.error('Log listener failed:', err);
      }
    }
  }
}

function prettyPrint(entry: LogEntry): void {
  const time = new Date(entry.ts).toISOString().slice(11, 23);
  const { dim, reset } = COLORS;
  const line = `${dim}${time}${reset} ${COLORS[entry.level]}${entry.level.toUpperCase().padEnd(5)}${reset} [${entry.component}] ${entry.msg}`;
  const write = entry.level === 'error' || entry.level === 'warn' ? console.error : console.log;

  write(line);
  if (entry.meta) {
    write(`${dim}${JSON.stringify(entry.meta)}${reset}`);
  }
  if (entry.error) {
    write(entry.error.stack ?? `${entry.error.name}: ${entry.error.message}`);
  }
}

/**
 * Create a logger for a component
 */
export function createLogger(component: string): Logger {
  return new Logger(component);
}
