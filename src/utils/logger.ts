import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { config } from '../config/env.js';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
};

export function isLogLevel(level: string): level is LogLevel {
  return level in levels;
}

class Logger {
  private server?: McpServer;
  private currentLevel: LogLevel;

  constructor(level: LogLevel) {
    this.currentLevel = level;
  }

  /**
   * Forward log records to the connected MCP client as
   * `notifications/message`. Only meaningful when one server owns the
   * process (stdio); HTTP sessions log to stderr.
   */
  setServer(server: McpServer | undefined): void {
    this.server = server;
  }

  setLevel(level: string): void {
    if (isLogLevel(level)) {
      this.currentLevel = level;
    }
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return levels[level] >= levels[this.currentLevel];
  }

  private async log(level: LogLevel, loggerName: string, data: unknown): Promise<void> {
    if (!this.shouldLog(level)) {
      return;
    }

    if (this.server?.isConnected()) {
      try {
        await this.server.server.sendLoggingMessage({ level, logger: loggerName, data });
        return;
      } catch (error) {
        // Client went away mid-write; fall through to stderr
        data = { data, forwardError: error instanceof Error ? error.message : String(error) };
      }
    }

    const timestamp = new Date().toISOString();
    const payload = typeof data === 'object' ? JSON.stringify(data) : String(data);
    // stdout belongs to the stdio transport
    console.error(`[${timestamp}] ${level.toUpperCase()} ${loggerName}: ${payload}`);
  }

  async debug(loggerName: string, data?: unknown): Promise<void> {
    await this.log('debug', loggerName, data ?? {});
  }
  async info(loggerName: string, data?: unknown): Promise<void> {
    await this.log('info', loggerName, data ?? {});
  }
  async warning(loggerName: string, data?: unknown): Promise<void> {
    await this.log('warning', loggerName, data ?? {});
  }
  async error(loggerName: string, data?: unknown): Promise<void> {
    await this.log('error', loggerName, data ?? {});
  }
}

export const logger = new Logger(config.LOG_LEVEL);
