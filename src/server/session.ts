/**
 * Language Server Session Manager
 *
 * @module server/session
 * @license BSD-3-Clause
 */

import gracefulFs from 'graceful-fs';
import { resolve } from 'node:path';
import { promisify } from 'node:util';
import pLimit, { LimitFunction } from 'p-limit';
import { Backend, Capability } from './capability.js';
import { Client } from './client.js';
import { Config, Language, LANGUAGES, LanguageConfig, Settings } from './config.js';
import { ToolError } from './error.js';
import { Logger } from './logger.js';

const statAsync = promisify(gracefulFs.stat);

/**
 * Summary of the active session reported to the agent
 *
 * @interface SessionInfo
 */
export interface SessionInfo {
  capabilities: string[];
  language: Language;
  pid?: number;
  server?: {
    name: string;
    version?: string;
  };
  server_args: string[];
  server_command: string;
  started_at: string;
  workspace_root: string;
}

/**
 * Live connection to one language server for one workspace
 *
 * @interface Session
 */
export interface Session {
  backend: Backend;
  info: SessionInfo;
}

/**
 * Caller supplied session parameters
 *
 * @interface StartOptions
 * @property {string[]} args - Server command line arguments
 * @property {string} command - Server executable
 * @property {string} language - Language name as given by the caller
 * @property {string} workspaceRoot - Workspace directory
 */
export interface StartOptions {
  args: string[];
  command: string;
  language: string;
  workspaceRoot: string;
}

/**
 * Validated parameters handed to a connector
 *
 * @interface ConnectOptions
 */
export interface ConnectOptions {
  args: string[];
  command: string;
  language: Language;
  languageConfig: LanguageConfig;
  logger: Logger;
  settings: Settings;
  workspaceRoot: string;
}

/**
 * Starts a language server and returns its session
 */
export type Connector = (options: ConnectOptions) => Promise<Session>;

/**
 * Default connector spawning the language server process
 *
 * @param {ConnectOptions} options - Validated session parameters
 * @returns {Promise<Session>} Session backed by `Capability` over a `Client`
 */
export async function connect(options: ConnectOptions): Promise<Session> {
  const { args, command, language, languageConfig, logger, settings, workspaceRoot } = options;
  const client = await Client.start({ args, command, language: languageConfig, logger, settings, workspaceRoot });
  const backend = new Capability(client, settings.maxConcurrentFileReads);
  const info: SessionInfo = {
    capabilities: [...backend.capabilities].sort(),
    language,
    server_args: args,
    server_command: command,
    started_at: new Date().toISOString(),
    workspace_root: client.workspace.root
  };
  if (client.pid !== undefined) {
    info.pid = client.pid;
  }
  if (client.serverInfo) {
    info.server = client.serverInfo;
  }
  return { backend, info };
}

/**
 * Language Server Session Manager
 *
 * Holds at most one session. Starting and stopping go through a single
 * queue, so two language server connections never coexist.
 *
 * @class SessionManager
 */
export class SessionManager {
  private config: Config;
  private connector: Connector;
  private logger: Logger;
  private queue: LimitFunction = pLimit(1);
  private session: Session | null = null;

  /**
   * @param {Config} config - Validated configuration
   * @param {Logger} logger - Logger for session events
   * @param {Connector} [connector] - Starts language servers, replaced by fakes in tests
   */
  constructor(config: Config, logger: Logger, connector: Connector = connect) {
    this.config = config;
    this.connector = connector;
    this.logger = logger;
  }

  /**
   * Disconnects and forgets the active session
   *
   * @private
   * @param {Session} session - Session to stop
   * @returns {Promise<void>}
   */
  private async close(session: Session): Promise<void> {
    this.session = null;
    try {
      await session.backend.disconnect();
      await this.logger.info(`Stopped '${session.info.server_command}' language server for '${session.info.workspace_root}' workspace.`);
    } catch (error) {
      await this.logger.warning(`Failed to stop '${session.info.server_command}' language server: ${error instanceof Error ? error.message : error}`);
    }
  }

  /**
   * Ensures the workspace root is an existing directory
   *
   * @private
   * @param {string} root - Absolute workspace root
   * @returns {Promise<void>}
   * @throws {ToolError} `invalid_workspace` for a missing path or a non-directory
   */
  private async validateWorkspace(root: string): Promise<void> {
    try {
      const stats = await statAsync(root);
      if (stats.isDirectory()) {
        return;
      }
    } catch (error) {
      throw new ToolError('invalid_workspace', `Workspace '${root}' does not exist.`, { cause: error });
    }
    throw new ToolError('invalid_workspace', `Workspace '${root}' is not a directory.`);
  }

  /**
   * Active session
   *
   * @returns {Session} The active session
   * @throws {ToolError} `no_session` when no session is active
   */
  current(): Session {
    if (!this.session) {
      throw new ToolError('no_session', 'No active language server session, call init_lsp_client first.');
    }
    return this.session;
  }

  /**
   * Whether a session is active
   *
   * @returns {boolean} True when a session is active
   */
  isActive(): boolean {
    return this.session !== null;
  }

  /**
   * Starts a session for a workspace
   *
   * An active session is rejected unless `force` is set or the configured
   * session policy is `replace`, in which case it is shut down first.
   * The new server must announce the language's required capabilities.
   *
   * @param {StartOptions} options - Caller supplied session parameters
   * @param {boolean} [force] - Replace an active session
   * @returns {Promise<SessionInfo>} Summary of the new session
   * @throws {ToolError} `unsupported_language`, `invalid_workspace`,
   * `session_active`, `missing_capabilities` or connector failures
   */
  start(options: StartOptions, force: boolean = false): Promise<SessionInfo> {
    return this.queue(async () => {
      const language = Config.toLanguage(options.language);
      if (!language) {
        throw new ToolError('unsupported_language', `Unsupported '${options.language}' language, expected one of: ${LANGUAGES.join(', ')}.`);
      }
      const workspaceRoot = resolve(options.workspaceRoot);
      await this.validateWorkspace(workspaceRoot);
      const settings = this.config.getSettings();
      if (this.session) {
        if (!force && settings.sessionPolicy !== 'replace') {
          throw new ToolError('session_active', `Language server session already active for '${this.session.info.workspace_root}' workspace, call shutdown_lsp_client first or set force.`);
        }
        await this.close(this.session);
      }
      const languageConfig = this.config.getLanguageConfig(language);
      const session = await this.connector({
        args: options.args,
        command: options.command,
        language,
        languageConfig,
        logger: this.logger,
        settings,
        workspaceRoot
      });
      const missing = languageConfig.required.filter(capability => !session.backend.capabilities.has(capability));
      if (missing.length) {
        await this.close(session);
        throw new ToolError('missing_capabilities', `Language server '${options.command}' does not support required capabilities: ${missing.join(', ')}.`);
      }
      this.session = session;
      await this.logger.info(`Started '${options.command}' language server for '${workspaceRoot}' workspace.`);
      return session.info;
    });
  }

  /**
   * Stops the active session
   *
   * @returns {Promise<SessionInfo | null>} Summary of the stopped session, or null when none was active
   */
  stop(): Promise<SessionInfo | null> {
    return this.queue(async () => {
      if (!this.session) {
        return null;
      }
      const { info } = this.session;
      await this.close(this.session);
      return info;
    });
  }
}
