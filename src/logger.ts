// src/logger.ts

import { LogContext, LoggerInstance, LogLevel } from './types/headset-types.js';

type LogField = 'timestamp' | 'level' | 'logger' | 'token' | 'path' | 'kind' | 'responseTime';

type WatchCallback = (data: { level: LogLevel; args: unknown[]; context: LogContext }) => void;

const LOG_FIELDS: readonly LogField[] = [
  'timestamp',
  'level',
  'logger',
  'token',
  'path',
  'kind',
  'responseTime',
];

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'token', 'path', 'responseTime'];
  private mutedPaths: Set<string> = new Set();
  private watchCallback: WatchCallback | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Formats a log message according to the specified level and context.
   * @returns Header followed by the formatted arguments
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && context.logger) {
      headerParts.push(`[${String(context.logger)}]`);
    }
    if (this.logFormat.includes('token') && context.token != null) {
      headerParts.push(`[#${String(context.token)}]`);
    }
    if (this.logFormat.includes('kind') && context.kind != null) {
      headerParts.push(`[${String(context.kind)}]`);
    }
    if (this.logFormat.includes('path') && context.path != null) {
      headerParts.push(`[${String(context.path)}]`);
    }
    if (this.logFormat.includes('responseTime') && context.responseTime != null) {
      headerParts.push(`[RT:${String(context.responseTime)}ms]`);
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    const contextToPrint: LogContext = { ...context };
    for (const field of LOG_FIELDS) {
      delete contextToPrint[field];
    }
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    return [`${color}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    if (context.path != null && this.mutedPaths.has(context.path)) return false;

    const category = context.logger;
    if (category) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none') return false;
      if (categoryLevel) {
        return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
      }
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;
    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const [head = '', ...rest] = this.format(level, args, context);
    console[level](head, ...rest);
  }

  /**
   * Splits the arguments into the message parts and a trailing context object.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra });
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => LOG_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${LOG_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  mute(path: string): void {
    this.mutedPaths.add(path);
  }

  watch(callback: WatchCallback): void {
    this.watchCallback = callback;
  }

  getCounts(): Record<LogLevel, number> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger instance with category.
   * @param name - Logger name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Error) &&
    Object.values(value).every(
      v => v === undefined || ['string', 'number', 'boolean'].includes(typeof v)
    )
  );
}

/** Logger shared by every module of the library. Quiet unless raised. */
export const headsetLogger = new Logger();
headsetLogger.setLevel('error');

export default Logger;
