/**
 * Process Manager and Communication Client
 *
 * @module server/client
 * @license BSD-3-Clause
 */

import { deepmerge } from 'deepmerge-ts';
import fg from 'fast-glob';
import gracefulFs from 'graceful-fs';
import { ChildProcessWithoutNullStreams, spawn } from 'node:child_process';
import { dirname, extname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { promisify } from 'node:util';
import {
  CancellationTokenSource,
  createMessageConnection,
  MessageConnection,
  StreamMessageReader,
  StreamMessageWriter
} from 'vscode-jsonrpc/node.js';
import {
  ClientCapabilities,
  ConfigurationParams,
  ConfigurationRequest,
  DidChangeTextDocumentNotification,
  DidOpenTextDocumentNotification,
  ExitNotification,
  InitializedNotification,
  InitializeParams,
  InitializeRequest,
  LogMessageNotification,
  LogMessageParams,
  RegistrationRequest,
  ShowMessageNotification,
  ShowMessageParams,
  ShowMessageRequest,
  ShutdownRequest,
  UnregistrationRequest,
  WorkDoneProgressCreateRequest
} from 'vscode-languageserver-protocol';
import { z } from 'zod';
import { Connection } from './capability.js';
import { LanguageConfig, Settings } from './config.js';
import { Workspace } from './document.js';
import { ToolError } from './error.js';
import { Logger } from './logger.js';

/**
 * Text and version of a document the server holds open
 *
 * @interface OpenDocument
 * @property {string} text - Text last sent to the server
 * @property {number} version - Document version, bumped on every change
 */
interface OpenDocument {
  text: string;
  version: number;
}

/**
 * Options for starting a language server
 *
 * @interface ClientOptions
 * @property {string[]} args - Command line arguments for the server process
 * @property {string} command - Executable command starting the language server
 * @property {LanguageConfig} language - Language table entry for the session
 * @property {Logger} logger - Logger receiving server output
 * @property {Settings} settings - Runtime settings
 * @property {string} workspaceRoot - Absolute workspace root directory
 */
export interface ClientOptions {
  args: string[];
  command: string;
  language: LanguageConfig;
  logger: Logger;
  settings: Settings;
  workspaceRoot: string;
}

const InitializeResultSchema = z.object({
  capabilities: z.record(z.string(), z.unknown()),
  serverInfo: z.object({
    name: z.string(),
    version: z.string().optional()
  }).optional()
});

const excludes = [
  'bin', 'build', 'cache', 'coverage', 'dist', 'log', 'node_modules', 'obj', 'out', 'target', 'temp', 'tmp', 'venv'
];

const readFileAsync = promisify(gracefulFs.readFile);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Process Manager and Communication Client
 *
 * Owns one language server process for one workspace: spawns it, performs
 * the LSP handshake over a JSON-RPC stdio connection, keeps documents open
 * and shuts it down.
 *
 * @class Client
 */
export class Client implements Connection {
  capabilities: Record<string, unknown> = {};
  serverInfo?: { name: string; version?: string };
  readonly workspace: Workspace;
  private connection: MessageConnection;
  private exited: boolean = false;
  private openedFiles: Map<string, OpenDocument> = new Map();
  private options: ClientOptions;
  private process: ChildProcessWithoutNullStreams;

  /**
   * Private constructor, instances come from `Client.start`
   *
   * @private
   */
  private constructor(options: ClientOptions, process: ChildProcessWithoutNullStreams) {
    this.options = options;
    this.process = process;
    this.workspace = new Workspace(options.workspaceRoot);
    this.connection = this.createConnection();
    this.setProcessHandlers();
  }

  /**
   * Process identifier of the language server
   *
   * @returns {number | undefined} Process identifier, undefined when the spawn failed
   */
  get pid(): number | undefined {
    return this.process.pid;
  }

  /**
   * Creates the JSON-RPC message connection over the process stdio
   *
   * Answers the server-to-client requests a headless client must handle
   * and forwards server messages to the logger.
   *
   * @private
   * @returns {MessageConnection} Listening connection
   */
  private createConnection(): MessageConnection {
    const { command, language, logger } = this.options;
    const connection = createMessageConnection(
      new StreamMessageReader(this.process.stdout),
      new StreamMessageWriter(this.process.stdin)
    );
    connection.onError(([error]) => {
      void logger.error(`Language server '${command}' error: ${error.message}`);
    });
    connection.onClose(() => {
      this.exited = true;
    });
    connection.onRequest(ConfigurationRequest.method, (params: ConfigurationParams) => {
      return params.items.map(item => {
        let value: unknown = language.configuration ?? {};
        for (const key of item.section ? item.section.split('.') : []) {
          value = isRecord(value) ? value[key] : undefined;
        }
        return value ?? null;
      });
    });
    connection.onRequest(RegistrationRequest.method, () => null);
    connection.onRequest(UnregistrationRequest.method, () => null);
    connection.onRequest(ShowMessageRequest.method, () => null);
    connection.onRequest(WorkDoneProgressCreateRequest.method, () => null);
    connection.onNotification(LogMessageNotification.method, (params: LogMessageParams) => {
      void logger.debug(`[${command}] ${params.message}`);
    });
    connection.onNotification(ShowMessageNotification.method, (params: ShowMessageParams) => {
      void logger.info(`[${command}] ${params.message}`);
    });
    connection.listen();
    return connection;
  }

  /**
   * Document language identifier for a file
   *
   * @private
   * @param {string} path - Absolute file path
   * @returns {string} Language identifier sent with `textDocument/didOpen`
   */
  private documentLanguage(path: string): string {
    const { language } = this.options;
    return language.documentIds[extname(path)] ?? language.languageId;
  }

  /**
   * Runs the LSP initialization handshake
   *
   * Opens the first workspace file of the language afterwards, so servers
   * that build their project lazily answer workspace requests.
   *
   * @private
   * @returns {Promise<void>}
   * @throws {ToolError} `server_start_failed` on an invalid initialize response
   */
  private async initialize(): Promise<void> {
    const { language } = this.options;
    const rootUri = this.workspace.toUri(this.workspace.root);
    const initParams: InitializeParams = {
      capabilities: this.setClientCapabilities(),
      clientInfo: {
        name: 'lsp-mcp-adapter',
        version: Client.version()
      },
      initializationOptions: language.configuration ?? {},
      processId: process.pid,
      rootPath: this.workspace.root,
      rootUri,
      workspaceFolders: [{ name: 'main', uri: rootUri }]
    };
    const response = await this.sendRequest(InitializeRequest.method, initParams);
    const result = InitializeResultSchema.safeParse(response);
    if (!result.success) {
      throw new ToolError('server_start_failed', `Invalid '${InitializeRequest.method}' response from '${this.options.command}' language server.`);
    }
    this.capabilities = result.data.capabilities;
    this.serverInfo = result.data.serverInfo;
    await this.connection.sendNotification(InitializedNotification.method, {});
    const extensions = language.extensions;
    const pattern = extensions.length === 1 ? `**/*${extensions[0]}` : `**/*{${extensions.join(',')}}`;
    const [first] = await this.findFiles([pattern]);
    if (first) {
      await this.openFile(first);
    }
  }

  /**
   * Sets LSP client capabilities for initialization
   *
   * Covers the navigation features used by the tools, merged with the
   * language's configured overrides.
   *
   * @private
   * @returns {ClientCapabilities} Capabilities sent with `initialize`
   */
  private setClientCapabilities(): ClientCapabilities {
    const capabilities: ClientCapabilities = {
      general: { positionEncodings: ['utf-16'] },
      textDocument: {
        declaration: { dynamicRegistration: false, linkSupport: true },
        definition: { dynamicRegistration: false, linkSupport: true },
        documentSymbol: {
          dynamicRegistration: false,
          hierarchicalDocumentSymbolSupport: true,
          symbolKind: {
            valueSet: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16, 17, 18, 19, 20, 21, 22, 23, 24, 25, 26]
          }
        },
        hover: {
          dynamicRegistration: false,
          contentFormat: ['markdown', 'plaintext']
        },
        implementation: { dynamicRegistration: false, linkSupport: true },
        references: { dynamicRegistration: false },
        synchronization: { dynamicRegistration: false },
        typeDefinition: { dynamicRegistration: false, linkSupport: true }
      },
      window: { workDoneProgress: true },
      workspace: {
        configuration: true,
        symbol: {
          dynamicRegistration: false,
          symbolKind: {
            valueSet: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16, 17, 18, 19, 20, 21, 22, 23, 24, 25, 26]
          }
        },
        workspaceFolders: true
      }
    };
    return deepmerge(capabilities, this.options.language.capabilities ?? {});
  }

  /**
   * Tracks process termination and stderr output
   *
   * @private
   */
  private setProcessHandlers(): void {
    const { command, logger } = this.options;
    this.process.stderr.setEncoding('utf8');
    this.process.stderr.on('data', (chunk: string) => {
      void logger.debug(`[${command}] ${chunk.trimEnd()}`);
    });
    this.process.stdin.on('error', (error) => {
      void logger.warning(`Language server '${command}' input closed: ${error.message}`);
    });
    this.process.on('error', (error) => {
      this.exited = true;
      void logger.error(`Language server '${command}' process error: ${error.message}`);
    });
    this.process.on('exit', (code, signal) => {
      this.exited = true;
      this.openedFiles.clear();
      void logger.info(`Language server '${command}' exited (${signal ?? `code ${code}`}).`);
    });
  }

  /**
   * Finds workspace files matching glob patterns using fast-glob
   *
   * Patterns without a slash match file base names. Hidden entries and
   * common build/dependency directories are excluded.
   *
   * @private
   * @param {string[]} patterns - Glob patterns relative to the workspace root
   * @returns {Promise<string[]>} Absolute file paths
   */
  private async findFiles(patterns: string[]): Promise<string[]> {
    return await fg(patterns, {
      absolute: true,
      baseNameMatch: true,
      cwd: this.workspace.root,
      ignore: ['**/.*', ...excludes.map(pattern => `**/${pattern}`)],
      onlyFiles: true,
      suppressErrors: true
    });
  }

  /**
   * Synchronizes a file with the language server
   *
   * The first call sends `textDocument/didOpen`. Later calls re-read the file
   * and send its full text with `textDocument/didChange` when it changed on disk.
   *
   * @param {string} path - Absolute file path
   * @returns {Promise<void>}
   * @throws {ToolError} When the file cannot be read
   */
  async openFile(path: string): Promise<void> {
    const uri = this.workspace.toUri(path);
    let text: string;
    try {
      text = await readFileAsync(path, 'utf8');
    } catch (error) {
      throw new ToolError('file_not_found', `Failed to read '${path}' file: ${error instanceof Error ? error.message : error}`);
    }
    const opened = this.openedFiles.get(uri);
    if (!opened) {
      this.openedFiles.set(uri, { text, version: 1 });
      await this.connection.sendNotification(DidOpenTextDocumentNotification.method, {
        textDocument: {
          languageId: this.documentLanguage(path),
          text,
          uri,
          version: 1
        }
      });
      return;
    }
    if (opened.text === text) {
      return;
    }
    opened.text = text;
    opened.version++;
    await this.connection.sendNotification(DidChangeTextDocumentNotification.method, {
      contentChanges: [{ text }],
      textDocument: { uri, version: opened.version }
    });
  }

  /**
   * Sends a JSON-RPC request bounded by the configured timeout
   *
   * Abort or timeout cancels the request on the server through
   * `$/cancelRequest` and fails the call without waiting for its answer.
   *
   * @param {string} method - LSP method name
   * @param {unknown} params - Method parameters
   * @param {AbortSignal} [signal] - Abort signal of the originating tool call
   * @returns {Promise<unknown>} Raw response payload
   * @throws {ToolError} `cancelled`, `timeout` or `server_error`
   */
  async sendRequest(method: string, params: unknown, signal?: AbortSignal): Promise<unknown> {
    const { command, settings } = this.options;
    if (this.exited) {
      throw new ToolError('server_error', `Language server '${command}' is not running.`);
    }
    if (signal?.aborted) {
      throw new ToolError('cancelled', `Request '${method}' was cancelled.`);
    }
    const source = new CancellationTokenSource();
    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;
    const interrupted = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        source.cancel();
        reject(new ToolError('timeout', `Request '${method}' timed out after ${settings.timeoutMs}ms.`));
      }, settings.timeoutMs);
      onAbort = () => {
        source.cancel();
        reject(new ToolError('cancelled', `Request '${method}' was cancelled.`));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
    try {
      return await Promise.race([
        this.connection.sendRequest<unknown>(method, params, source.token),
        interrupted
      ]);
    } catch (error) {
      if (error instanceof ToolError) {
        throw error;
      }
      throw new ToolError('server_error', `Request failed for '${method}' method: ${error instanceof Error ? error.message : error}`, { cause: error });
    } finally {
      clearTimeout(timer);
      if (onAbort) {
        signal?.removeEventListener('abort', onAbort);
      }
      source.dispose();
    }
  }

  /**
   * Starts a language server and completes the LSP handshake
   *
   * @static
   * @param {ClientOptions} options - Command, workspace and language of the session
   * @returns {Promise<Client>} Initialized client
   * @throws {ToolError} `server_start_failed` when the process cannot be
   * spawned, exits early or fails the handshake
   */
  static async start(options: ClientOptions): Promise<Client> {
    const { args, command, language, workspaceRoot } = options;
    const childProcess = spawn(command, args, {
      cwd: workspaceRoot,
      env: { ...process.env, ...language.env }
    });
    const failure = new Promise<never>((_, reject) => {
      childProcess.once('error', (error) => {
        reject(new ToolError('server_start_failed', `Failed to start '${command}' language server: ${error.message}`));
      });
      childProcess.once('exit', (code, signal) => {
        reject(new ToolError('server_start_failed', `Language server '${command}' exited during startup (${signal ?? `code ${code}`}).`));
      });
    });
    const client = new Client(options, childProcess);
    try {
      await Promise.race([client.initialize(), failure]);
    } catch (error) {
      client.exited = true;
      await client.stop();
      if (error instanceof ToolError && error.code === 'server_start_failed') {
        throw error;
      }
      throw new ToolError('server_start_failed', `Failed to initialize '${command}' language server: ${error instanceof Error ? error.message : error}`, { cause: error });
    }
    return client;
  }

  /**
   * Stops the language server using the graceful shutdown sequence
   *
   * Sends the LSP shutdown request, waits for the grace period, sends the
   * exit notification and gives the process the grace period to exit.
   * A process still alive is terminated with SIGTERM, then SIGKILL.
   *
   * @returns {Promise<void>}
   */
  async stop(): Promise<void> {
    const { command, logger, settings } = this.options;
    if (!this.exited) {
      try {
        await this.sendRequest(ShutdownRequest.method, undefined);
        await new Promise(resolve => setTimeout(resolve, settings.shutdownGracePeriodMs));
        await this.connection.sendNotification(ExitNotification.method);
        await this.waitForExit(settings.shutdownGracePeriodMs);
      } catch (error) {
        await logger.warning(`Language server '${command}' did not shut down cleanly: ${error instanceof Error ? error.message : error}`);
      }
    }
    this.connection.dispose();
    this.openedFiles.clear();
    if (this.process.pid === undefined || !this.isRunning()) {
      return;
    }
    const timeout = Math.max(settings.shutdownGracePeriodMs, 1000);
    this.process.kill('SIGTERM');
    if (await this.waitForExit(timeout)) {
      return;
    }
    await logger.warning(`Language server '${command}' ignored SIGTERM, sending SIGKILL.`);
    this.process.kill('SIGKILL');
    await this.waitForExit(timeout);
  }

  /**
   * Whether the server process has neither exited nor been killed by a signal
   *
   * @private
   * @returns {boolean} True while the process runs
   */
  private isRunning(): boolean {
    return this.process.exitCode === null && this.process.signalCode === null;
  }

  /**
   * Waits for the server process to exit
   *
   * @private
   * @param {number} timeout - Maximum wait in milliseconds
   * @returns {Promise<boolean>} True when the process exited in time
   */
  private waitForExit(timeout: number): Promise<boolean> {
    if (!this.isRunning()) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const handleExit = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.process.removeListener('exit', handleExit);
        resolve(false);
      }, timeout);
      this.process.once('exit', handleExit);
    });
  }

  /**
   * Gets package version from package.json
   *
   * @static
   * @returns {string} Package version string, or `0.0.0` when unreadable
   */
  static version(): string {
    try {
      const packagePath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');
      const packageJson: unknown = JSON.parse(gracefulFs.readFileSync(packagePath, 'utf8'));
      return isRecord(packageJson) && typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
    } catch (error) {
      process.stderr.write(`Failed to read package.json version: ${error}\n`);
      return '0.0.0';
    }
  }
}
