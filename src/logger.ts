export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel,
  context?: string,
  silent?: boolean,
}

const LEVEL_PRIORITY: { [key in LogLevel]: number } = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  level: LogLevel;
  context: string;
  silent: boolean;
  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'warn';
    this.context = options.context ?? '';
    this.silent = options.silent ?? false;
  }
  format(level: LogLevel, message: string,
    data?: { [key: string]: unknown },
  ): string {
    let output = `[${level}]`;
    if (this.context !== '') output += ` (${this.context})`;
    output += ' ' + message;
    if (data != null) output += ' ' + JSON.stringify(data);
    return output;
  }
  shouldLog(level: LogLevel): boolean {
    return !this.silent && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }
  debug(message: string, data?: { [key: string]: unknown }): void {
    if (this.shouldLog('debug')) console.log(this.format('debug', message, data));
  }
  info(message: string, data?: { [key: string]: unknown }): void {
    if (this.shouldLog('info')) console.log(this.format('info', message, data));
  }
  warn(message: string, data?: { [key: string]: unknown }): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, data));
    }
  }
  error(message: string, data?: { [key: string]: unknown }): void {
    if (this.shouldLog('error')) {
      console.error(this.format('error', message, data));
    }
  }
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context !== '' ? `${this.context}:${context}` : context,
      silent: this.silent,
    });
  }
}
