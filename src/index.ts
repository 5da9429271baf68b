#!/usr/bin/env node
/**
 * MCP Server Entry Point
 *
 * @module index
 * @license BSD-3-Clause
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from './server/config.js';
import { McpServer } from './server/mcp.js';

/**
 * Checks if an error is an EPIPE error that should be handled gracefully
 *
 * EPIPE (Broken Pipe) errors occur when the MCP client or the language
 * server disconnects unexpectedly.
 *
 * @param {unknown} err - Error object to check
 * @returns {boolean} True if error is EPIPE
 */
function isEpipeError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  return err.message.includes('EPIPE') || ('code' in err && err.code === 'EPIPE');
}

/**
 * Main entry point for the LSP-MCP adapter
 *
 * Environment:
 * - LSP_FILE_PATH: optional path to the configuration JSON file
 *
 * EPIPE errors are logged without terminating the process, other uncaught
 * exceptions and configuration errors exit with code 1. SIGINT and SIGTERM
 * stop the active language server before exiting.
 */
async function main(): Promise<void> {
  process.on('uncaughtException', (error) => {
    console.error('Uncaught exception:', error.message);
    if (isEpipeError(error)) {
      console.error('EPIPE error caught, continuing operation.');
      return;
    }
    console.error('Fatal error:', error);
    process.exit(1);
  });
  process.on('unhandledRejection', (reason) => {
    if (isEpipeError(reason)) {
      console.error('EPIPE rejection caught, continuing operation.');
      return;
    }
    console.error('Unhandled rejection:', reason);
  });
  const config = Config.load(process.env.LSP_FILE_PATH);
  const mcpServer = new McpServer(config);
  const shutdown = (signal: NodeJS.Signals) => {
    console.error(`Received ${signal}, stopping language server.`);
    mcpServer.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Failed to stop language server:', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  await mcpServer.connect(new StdioServerTransport());
}

main().catch((error) => {
  console.error('Fatal error in main():', error);
  process.exit(1);
});
