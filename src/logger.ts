import * as fs from 'fs';
import * as path from 'path';
import { loadConfig, LogLevel } from './config.js';

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type MessageLevel = Exclude<LogLevel, 'silent'>;

export interface LoggerOptions {
  logsDir: string;
  level?: LogLevel;
}

class Logger {
  private readonly logsDir: string;
  private readonly level: LogLevel;
  private static instance: Logger | undefined;

  constructor(options: LoggerOptions) {
    this.logsDir = options.logsDir;
    this.level = options.level ?? 'info';
  }

  get logFile(): string {
    return path.join(this.logsDir, this.getLogFileName());
  }

  private getLogFileName(): string {
    const dateStr = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
    return `server-${dateStr}.log`;
  }

  private formatMessage(level: MessageLevel, message: string, args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.length > 0 ? ' ' + args.map(arg =>
      typeof arg === 'object' && arg !== null ? JSON.stringify(arg, null, 2) : String(arg)
    ).join(' ') : '';
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${formattedArgs}`;
  }

  private writeToFile(formattedMessage: string): void {
    try {
      fs.mkdirSync(this.logsDir, { recursive: true });
      fs.appendFileSync(this.logFile, formattedMessage + '\n');
    } catch (error) {
      // stderr is free: stdout carries the MCP protocol
      console.error('Failed to write to log file:', error instanceof Error ? error.message : String(error));
    }
  }

  isEnabled(level: MessageLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  private log(level: MessageLevel, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) {
      return;
    }
    this.writeToFile(this.formatMessage(level, message, args));
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  logToolCall(toolName: string, params: unknown): void {
    this.info(`Tool called: ${toolName}`, { params });
  }

  logToolError(toolName: string, error: Error, context?: unknown): void {
    this.error(`Tool error in ${toolName}`, {
      error: error.message,
      stack: error.stack,
      context
    });
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      const config = loadConfig();
      Logger.instance = new Logger({ logsDir: config.logsDir, level: config.logLevel });
    }
    return Logger.instance;
  }
}

export { Logger };
