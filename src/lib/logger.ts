import { APP_CONFIG, LogLevel } from './config';

type LogContext = Record<string, unknown>;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface StructuredLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

interface LogRecord {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: string;
  stack?: string;
}

function writeLine(record: LogRecord): void {
  const line = JSON.stringify(record);
  switch (record.level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

/**
 * One logger per module scope. Every entry carries `{ module: scope }` ahead of
 * the call's own context; the unscoped instance writes audit entries.
 */
class ScopedLogger implements StructuredLogger {
  constructor(
    private readonly scope: string | null,
    private readonly threshold: LogLevel,
  ) {}

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.write('error', message, context, error);
  }

  audit(action: string, context: LogContext): void {
    this.write('info', `audit.${action}`, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (SEVERITY[level] < SEVERITY[this.threshold]) return;

    const merged: LogContext = this.scope ? { module: this.scope, ...context } : { ...context };
    writeLine({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
      ...(error ? { error: error.message, stack: error.stack } : {}),
    });
  }
}

const scoped = new Map<string, ScopedLogger>();
let unscoped: ScopedLogger | null = null;

function base(): ScopedLogger {
  if (!unscoped) unscoped = new ScopedLogger(null, APP_CONFIG.logLevel);
  return unscoped;
}

/** JSON-lines logger for `scope`; instances are shared per scope. */
export function getLogger(scope?: string): StructuredLogger {
  if (!scope) return base();
  let found = scoped.get(scope);
  if (!found) {
    found = new ScopedLogger(scope, APP_CONFIG.logLevel);
    scoped.set(scope, found);
  }
  return found;
}

/** Emits an `audit.*` entry when audit logging is enabled. */
export function audit(enabled: boolean, action: string, context: LogContext): void {
  if (enabled) base().audit(action, context);
}
