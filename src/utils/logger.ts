import { Logger, LogLevel } from '../types/index.js';

/**
 * Diagnostic logger. Lines carry an ISO timestamp, a level tag and, when given,
 * structured meta as indented JSON. User-facing output goes through the
 * OutputPort instead.
 */

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

const TAGS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '🐛 [DEBUG]',
  [LogLevel.INFO]: 'ℹ️  [INFO] ',
  [LogLevel.WARN]: '⚠️  [WARN] ',
  [LogLevel.ERROR]: '❌ [ERROR]'
};

const SINKS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.DEBUG]: line => console.debug(line),
  [LogLevel.INFO]: line => console.info(line),
  [LogLevel.WARN]: line => console.warn(line),
  [LogLevel.ERROR]: line => console.error(line)
};

/** Errors stringify to {}; spell out the useful fields */
function serializeMeta(meta: unknown): string {
  if (meta instanceof Error) {
    return JSON.stringify({ ...meta, name: meta.name, message: meta.message, stack: meta.stack }, null, 2);
  }
  if (typeof meta === 'object' && meta !== null) {
    return JSON.stringify(meta, null, 2);
  }
  return String(meta);
}

class ConsoleLogger implements Logger {
  constructor(private level: LogLevel) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (SEVERITY[level] < SEVERITY[this.level]) {
      return;
    }

    let line = `${new Date().toISOString()} ${TAGS[level]} ${message}`;
    if (meta !== undefined && meta !== null && meta !== '') {
      const serialized = serializeMeta(meta);
      line += typeof meta === 'object' ? `\n${serialized}` : ` ${serialized}`;
    }
    SINKS[level](line);
  }
}

function levelFromEnvironment(env: NodeJS.ProcessEnv): LogLevel {
  if (env.ENVSNAP_VERBOSE === '1') {
    return LogLevel.DEBUG;
  }
  return env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.ERROR;
}

export const logger = new ConsoleLogger(levelFromEnvironment(process.env));
