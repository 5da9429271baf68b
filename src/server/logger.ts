/**
 * Logging utility for MCP server
 *
 * @module server/logger
 * @license BSD-3-Clause
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { LoggingLevel } from '@modelcontextprotocol/sdk/types.js';

const levels: LoggingLevel[] = ['debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency'];

/**
 * Logger for MCP server with severity-based filtering
 *
 * Sends `notifications/message` through the MCP server when the message
 * severity meets the configured threshold. Messages emitted before a
 * transport is connected are dropped.
 *
 * @export
 * @class Logger
 */
export class Logger {
  private level: LoggingLevel;
  private logger: string;
  private server: Server;

  /**
   * @param {Server} server - MCP server instance for sending log messages
   * @param {LoggingLevel} level - Minimum severity to emit
   * @param {string} [logger] - Logger name reported to the client
   */
  constructor(server: Server, level: LoggingLevel, logger: string = 'lsp-mcp-adapter') {
    this.level = level;
    this.logger = logger;
    this.server = server;
  }

  /**
   * Sends structured logging message via MCP protocol
   *
   * @param {LoggingLevel} level - Log severity level
   * @param {string} message - Log message content
   */
  async log(level: LoggingLevel, message: string): Promise<void> {
    if (levels.indexOf(level) < levels.indexOf(this.level) || !this.server.transport) {
      return;
    }
    try {
      await this.server.sendLoggingMessage({ level, logger: this.logger, data: message });
    } catch (error) {
      process.stderr.write(`Failed to send log message: ${error}\n`);
    }
  }

  debug(message: string): Promise<void> {
    return this.log('debug', message);
  }

  info(message: string): Promise<void> {
    return this.log('info', message);
  }

  warning(message: string): Promise<void> {
    return this.log('warning', message);
  }

  error(message: string): Promise<void> {
    return this.log('error', message);
  }
}
