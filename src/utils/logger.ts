import pico from 'picocolors';
import { ENV_VARS } from '../constants/index.js';
import { LogLevel, type Logger } from '../types/index.js';

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.SILENT]: 4
};

const LABELS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: pico.dim('[debug]'),
  [LogLevel.INFO]: pico.cyan('[info] '),
  [LogLevel.WARN]: pico.yellow('[warn] '),
  [LogLevel.ERROR]: pico.red('[error]'),
  [LogLevel.SILENT]: ''
};

/**
 * Diagnostic log on stderr. User-facing messages go through OutputPort;
 * this carries solver decisions, cache hits and build invocations.
 */
class ConsoleLogger implements Logger {
  private level: LogLevel;

  constructor(level: LogLevel) {
    this.level = level;
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (this.level === LogLevel.SILENT || SEVERITY[level] < SEVERITY[this.level]) {
      return;
    }
    let line = `${pico.dim(new Date().toISOString())} ${LABELS[level]} ${message}`;
    if (meta !== undefined && meta !== null && meta !== '') {
      line += typeof meta === 'object'
        ? `\n${JSON.stringify(meta, errorReplacer, 2)}`
        : ` ${String(meta)}`;
    }
    process.stderr.write(line + '\n');
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

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

// JSON.stringify turns an Error into {}
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

export const logger = new ConsoleLogger(process.env[ENV_VARS.VERBOSE] === '1' ? LogLevel.DEBUG : LogLevel.WARN);
