/**
 * Minimal structured logger. Core code programs to this interface; the MCP
 * entry point plugs in ConsoleLogger.
 */
export interface Logger {
  debug?(msg: string, ctx?: Record<string, unknown>): void;
  info(msg: string, ctx?: Record<string, unknown>): void;
  warn(msg: string, ctx?: Record<string, unknown>): void;
  error(msg: string, ctx?: Record<string, unknown>): void;
}

type Level = 'debug' | 'info' | 'warn' | 'error';

// Every level goes to stderr: stdout carries the MCP protocol
export class ConsoleLogger implements Logger {
  private prefix: string;

  constructor(prefix = 'adb-session') {
    this.prefix = prefix;
  }

  private log(level: Level, msg: string, ctx?: Record<string, unknown>): void {
    const formatted = `[${this.prefix}] ${level === 'info' ? '' : `${level}: `}${msg}`;
    if (ctx) {
      console.error(formatted, ctx);
    } else {
      console.error(formatted);
    }
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.log('debug', msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.log('info', msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.log('warn', msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.log('error', msg, ctx);
  }
}

export const noopLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};
