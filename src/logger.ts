// src/logger.ts

import { LogContext, LogField, LoggerInstance, LogLevel } from './types/gauge-types.js';

type WatchCallback = (data: { level: LogLevel; args: unknown[]; context: LogContext }) => void;

const VALID_FIELDS: readonly LogField[] = [
  'timestamp',
  'level',
  'logger',
  'command',
  'response',
  'responseTime',
  'path',
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

  private groupLevel: number = 0;
  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'command', 'responseTime'];
  private customFormatters: Partial<Record<LogField, (value: unknown) => string>> = {};
  private watchCallback: WatchCallback | null = null;
  private logRateLimit: number = 0;
  private lastLogTime: number = 0;

  private getIndent(): string {
    return '  '.repeat(this.groupLevel);
  }

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  private formatField(field: LogField, value: unknown, fallback: (v: unknown) => string): string {
    const formatter = this.customFormatters[field] ?? fallback;
    return formatter(value);
  }

  /**
   * Formats a log message according to the specified level and context.
   * @returns Header followed by the formatted arguments
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && merged.logger) {
      headerParts.push(this.formatField('logger', merged.logger, v => `[${String(v)}]`));
    }
    if (this.logFormat.includes('path') && merged.path != null) {
      headerParts.push(this.formatField('path', merged.path, v => `[P:${String(v)}]`));
    }
    if (this.logFormat.includes('command') && merged.command != null) {
      headerParts.push(this.formatField('command', merged.command, v => `[C:${String(v)}]`));
    }
    if (this.logFormat.includes('response') && merged.response != null) {
      headerParts.push(
        this.formatField('response', merged.response, v => `[R:${JSON.stringify(v)}]`)
      );
    }
    if (this.logFormat.includes('responseTime') && merged.responseTime != null) {
      headerParts.push(
        this.formatField('responseTime', merged.responseTime, v => `[RT:${String(v)}ms]`)
      );
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    // context fields that did not make it into the header go at the end
    const contextToPrint: LogContext = { ...context };
    for (const field of this.logFormat) {
      delete contextToPrint[field];
    }
    delete contextToPrint.logger;
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    return [`${color}${headerParts.join('')}${reset}`, this.getIndent(), ...formattedArgs];
  }

  /**
   * Determines whether a message passes the global and category levels.
   */
  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    const category = context.logger;
    if (category !== undefined && category in this.categoryLevels) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === undefined || categoryLevel === 'none') return false;
      return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const now: number = Date.now();
    if (now - this.lastLogTime < this.logRateLimit && level !== 'error' && level !== 'warn')
      return;
    this.lastLogTime = now;

    const [head = '', indent = '', ...rest] = this.format(level, args, context);
    // console.trace would print a stack trace
    const method = level === 'trace' ? 'debug' : level;
    console[method](head + indent, ...rest);
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

  trace(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('trace', newArgs, context);
  }

  debug(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('debug', newArgs, context);
  }

  info(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('info', newArgs, context);
  }

  warn(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('warn', newArgs, context);
  }

  error(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('error', newArgs, context);
  }

  group(): void {
    this.groupLevel++;
  }

  groupEnd(): void {
    if (this.groupLevel > 0) this.groupLevel--;
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

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setRateLimit(ms: number): void {
    if (ms < 0) throw new Error('Rate limit must be a non-negative number');
    this.logRateLimit = ms;
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => VALID_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FIELDS.join(', ')}`);
    }
    this.logFormat = fields;
  }

  setCustomFormatter(field: LogField, formatter: (value: unknown) => string): void {
    if (!VALID_FIELDS.includes(field) || field === 'timestamp' || field === 'level') {
      throw new Error(`Invalid formatter field: ${String(field)}`);
    }
    this.customFormatters[field] = formatter;
  }

  watch(callback: WatchCallback): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Readonly<Record<LogLevel, number>> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger instance bound to a category.
   * @param name - Category name, printed in the header
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    const emit = (level: LogLevel, args: unknown[]): void => {
      const { args: newArgs, context } = this.splitArgsAndContext(args);
      this.output(level, newArgs, { ...context, logger: name });
    };
    return {
      trace: (...args: unknown[]) => emit('trace', args),
      debug: (...args: unknown[]) => emit('debug', args),
      info: (...args: unknown[]) => emit('info', args),
      warn: (...args: unknown[]) => emit('warn', args),
      error: (...args: unknown[]) => emit('error', args),
      group: () => this.group(),
      groupEnd: () => this.groupEnd(),
      setLevel: (lvl: LogLevel | 'none') => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (value instanceof Error) return false;
  return Object.values(value).every(
    v => v === undefined || ['string', 'number', 'boolean'].includes(typeof v)
  );
}

export = Logger;
