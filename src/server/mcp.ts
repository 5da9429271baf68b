/**
 * MCP Server implementation
 *
 * @module server/mcp
 * @license BSD-3-Clause
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequest,
  CallToolRequestSchema,
  CallToolResult,
  ListToolsRequestSchema,
  Tool
} from '@modelcontextprotocol/sdk/types.js';
import gracefulFs from 'graceful-fs';
import { promisify } from 'node:util';
import { z } from 'zod';
import { DefinitionMode, ReferenceMode, SymbolLocator } from './capability.js';
import { Client } from './client.js';
import { Config, Settings } from './config.js';
import { Workspace } from './document.js';
import { ToolError } from './error.js';
import { Logger } from './logger.js';
import {
  renderDefinition,
  renderError,
  renderHover,
  renderOutline,
  renderReferences,
  renderSearch,
  renderSession,
  renderShutdown
} from './markdown.js';
import { Connector, Session, SessionManager } from './session.js';
import {
  DefinitionResult,
  HoverResult,
  McpTool,
  OutlineResult,
  ReferencesResult,
  SearchResult,
  SessionResult,
  ShutdownResult
} from './tool.js';

const statAsync = promisify(gracefulFs.stat);

const locator = {
  character: z.number().int().min(0).optional(),
  file_path: z.string().min(1),
  line: z.number().int().min(0).optional(),
  symbol_name: z.string().min(1).optional()
};

const hasTarget = (args: { line?: number; symbol_name?: string }): boolean =>
  args.symbol_name !== undefined || args.line !== undefined;

const missingTarget = 'Either symbol_name or line is required';

const DefinitionSchema = z.object({
  ...locator,
  include_code: z.boolean().default(true),
  mode: z.enum(['definition', 'declaration', 'type_definition']).default('definition')
}).refine(hasTarget, missingTarget);

const HoverSchema = z.object(locator).refine(hasTarget, missingTarget);

const InitSchema = z.object({
  force: z.boolean().default(false),
  language: z.string().min(1),
  server_args: z.array(z.string()).default([]),
  server_command: z.string().min(1),
  workspace_root: z.string().min(1)
});

const OutlineSchema = z.object({
  file_path: z.string().min(1)
});

const ReferencesSchema = z.object({
  ...locator,
  context_lines: z.number().int().min(0).optional(),
  max_items: z.number().int().min(0).optional(),
  mode: z.enum(['references', 'implementations']).default('references')
}).refine(hasTarget, missingTarget);

const SearchSchema = z.object({
  file_pattern: z.string().min(1).optional(),
  max_items: z.number().int().min(0).optional(),
  query: z.string()
});

const ShutdownSchema = z.object({});

const definitionCapabilities: Record<DefinitionMode, string> = {
  declaration: 'declarationProvider',
  definition: 'definitionProvider',
  type_definition: 'typeDefinitionProvider'
};

const referenceCapabilities: Record<ReferenceMode, string> = {
  implementations: 'implementationProvider',
  references: 'referencesProvider'
};

/**
 * Validated tool handler
 *
 * @param {unknown} args - Raw tool arguments
 * @param {AbortSignal} [signal] - Abort signal of the MCP request
 */
type ToolHandler = (args: unknown, signal?: AbortSignal) => Promise<CallToolResult>;

/**
 * MCP Server implementation bridging a language server session with Model Context Protocol
 *
 * Each tool validates its arguments, checks the session and capability
 * preconditions, makes one backend call and bounds the result. Failures
 * are returned as tool results with `isError` set and never thrown to the
 * transport.
 *
 * @class McpServer
 */
export class McpServer {
  private logger: Logger;
  private server: Server;
  private sessions: SessionManager;
  private settings: Settings;
  private tool: McpTool;
  private toolHandler: Map<string, ToolHandler>;
  private tools: Tool[];

  /**
   * Creates a new McpServer instance with configuration and tool setup
   *
   * @param {Config} config - Validated configuration
   * @param {Connector} [connector] - Language server connector, defaults to spawning the server process
   */
  constructor(config: Config, connector?: Connector) {
    this.settings = config.getSettings();
    this.server = new Server(
      { name: 'lsp-mcp-adapter', version: Client.version() },
      { capabilities: { logging: {}, tools: {} } }
    );
    this.logger = new Logger(this.server, this.settings.loggingLevel);
    this.sessions = new SessionManager(config, this.logger, connector);
    this.tool = new McpTool(this.settings);
    this.toolHandler = new Map<string, ToolHandler>();
    this.tools = [];
    this.setupToolHandlers();
    this.setupHandlers();
  }

  /**
   * Builds the failure result of a tool call
   *
   * @private
   * @param {ToolError} error - Failure to report
   * @returns {CallToolResult} Result with `isError` set
   */
  private failure(error: ToolError): CallToolResult {
    const payload = error.toPayload();
    const text = this.settings.responseFormat === 'markdown' ? renderError(payload) : JSON.stringify(payload, null, 2);
    return { content: [{ type: 'text', text }], isError: true };
  }

  /**
   * Resolves the definition, declaration or type definition of a symbol
   *
   * @private
   * @param {z.output<typeof DefinitionSchema>} args - Validated arguments
   * @param {AbortSignal} [signal] - Abort signal of the MCP request
   * @returns {Promise<CallToolResult>} Definition result
   */
  private async getDefinition(args: z.output<typeof DefinitionSchema>, signal?: AbortSignal): Promise<CallToolResult> {
    const session = this.sessions.current();
    this.requireCapability(session, definitionCapabilities[args.mode], 'get_definition');
    const symbolLocator = await this.resolveLocator(session, args);
    const items = await session.backend.definition(symbolLocator, args.mode, args.include_code, signal);
    return this.respond<DefinitionResult>({ items, mode: args.mode, symbol: args.symbol_name ?? null }, renderDefinition);
  }

  /**
   * Retrieves hover information for a symbol
   *
   * @private
   * @param {z.output<typeof HoverSchema>} args - Validated arguments
   * @param {AbortSignal} [signal] - Abort signal of the MCP request
   * @returns {Promise<CallToolResult>} Hover result
   */
  private async getHoverInfo(args: z.output<typeof HoverSchema>, signal?: AbortSignal): Promise<CallToolResult> {
    const session = this.sessions.current();
    this.requireCapability(session, 'hoverProvider', 'get_hover_info');
    const symbolLocator = await this.resolveLocator(session, args);
    const hover = await session.backend.hover(symbolLocator, signal);
    return this.respond<HoverResult>({ file_path: this.workspace(session).display(symbolLocator.file), hover }, renderHover);
  }

  /**
   * Retrieves the full symbol tree of a file
   *
   * @private
   * @param {z.output<typeof OutlineSchema>} args - Validated arguments
   * @param {AbortSignal} [signal] - Abort signal of the MCP request
   * @returns {Promise<CallToolResult>} Outline result
   */
  private async getOutline(args: z.output<typeof OutlineSchema>, signal?: AbortSignal): Promise<CallToolResult> {
    const session = this.sessions.current();
    this.requireCapability(session, 'documentSymbolProvider', 'get_outline');
    const file = await this.resolveFile(session, args.file_path);
    const items = await session.backend.outline(file, signal);
    return this.respond<OutlineResult>({ file_path: this.workspace(session).display(file), items }, renderOutline);
  }

  /**
   * Finds references or implementations of a symbol, truncated to `max_items`
   *
   * @private
   * @param {z.output<typeof ReferencesSchema>} args - Validated arguments
   * @param {AbortSignal} [signal] - Abort signal of the MCP request
   * @returns {Promise<CallToolResult>} References result
   */
  private async getReferences(args: z.output<typeof ReferencesSchema>, signal?: AbortSignal): Promise<CallToolResult> {
    const session = this.sessions.current();
    this.requireCapability(session, referenceCapabilities[args.mode], 'find_references');
    const symbolLocator = await this.resolveLocator(session, args);
    const limit = args.max_items ?? this.settings.maxItems;
    const contextLines = args.context_lines ?? this.settings.contextLines;
    const listing = await session.backend.references(symbolLocator, args.mode, limit, contextLines, signal);
    return this.respond<ReferencesResult>({
      items: listing.items.slice(0, limit),
      mode: args.mode,
      symbol: args.symbol_name ?? null,
      total: listing.total
    }, renderReferences);
  }

  /**
   * Searches workspace symbols, truncated to `max_items`
   *
   * @private
   * @param {z.output<typeof SearchSchema>} args - Validated arguments
   * @param {AbortSignal} [signal] - Abort signal of the MCP request
   * @returns {Promise<CallToolResult>} Search result
   */
  private async getSearchWorkspace(args: z.output<typeof SearchSchema>, signal?: AbortSignal): Promise<CallToolResult> {
    const session = this.sessions.current();
    this.requireCapability(session, 'workspaceSymbolProvider', 'search_workspace');
    const limit = args.max_items ?? this.settings.maxItems;
    const listing = await session.backend.workspaceSymbols(args.query, args.file_pattern, limit, signal);
    return this.respond<SearchResult>({
      file_pattern: args.file_pattern ?? null,
      items: listing.items.slice(0, limit),
      query: args.query,
      total: listing.total
    }, renderSearch);
  }

  /**
   * Routes incoming MCP tool requests to the tool registry
   *
   * @private
   * @param {CallToolRequest} request - MCP tool call request
   * @param {AbortSignal} [signal] - Abort signal of the MCP request
   * @returns {Promise<CallToolResult>} Tool result
   */
  private async handleRequest(request: CallToolRequest, signal?: AbortSignal): Promise<CallToolResult> {
    return await this.callTool(request.params.name, request.params.arguments, signal);
  }

  /**
   * Handles tool listing requests from MCP clients
   *
   * @private
   * @returns {Promise<{ tools: Tool[] }>} Registered tool definitions
   */
  private async handleTools(): Promise<{ tools: Tool[] }> {
    return { tools: this.tools };
  }

  /**
   * Starts a language server session
   *
   * @private
   * @param {z.output<typeof InitSchema>} args - Validated arguments
   * @returns {Promise<CallToolResult>} Session result
   */
  private async initClient(args: z.output<typeof InitSchema>): Promise<CallToolResult> {
    const session = await this.sessions.start({
      args: args.server_args,
      command: args.server_command,
      language: args.language,
      workspaceRoot: args.workspace_root
    }, args.force);
    return this.respond<SessionResult>({ session }, renderSession);
  }

  /**
   * Registers a tool with its argument schema
   *
   * @private
   * @param {Tool} tool - Tool definition listed to clients
   * @param {T} schema - Argument schema
   * @param {Function} handler - Handler receiving validated arguments
   */
  private register<T extends z.ZodType>(tool: Tool, schema: T, handler: (args: z.output<T>, signal?: AbortSignal) => Promise<CallToolResult>): void {
    this.tools.push(tool);
    this.toolHandler.set(tool.name, async (args, signal) => {
      return await handler(this.validate(schema, args, tool.name), signal);
    });
  }

  /**
   * Fails when the session's server does not announce a capability
   *
   * @private
   * @param {Session} session - Active session
   * @param {string} capability - Server capability name
   * @param {string} toolName - Tool name, for the error message
   * @throws {ToolError} `unsupported_capability`
   */
  private requireCapability(session: Session, capability: string, toolName: string): void {
    if (!session.backend.capabilities.has(capability)) {
      throw new ToolError('unsupported_capability', `Language server '${session.info.server_command}' does not support '${capability}' capability required by '${toolName}' tool.`);
    }
  }

  /**
   * Resolves a caller supplied path to an existing file inside the workspace
   *
   * @private
   * @param {Session} session - Active session
   * @param {string} filePath - Caller supplied path
   * @returns {Promise<string>} Absolute path of an existing file inside the workspace
   * @throws {ToolError} `invalid_argument` or `file_not_found`
   */
  private async resolveFile(session: Session, filePath: string): Promise<string> {
    const workspace = this.workspace(session);
    const path = workspace.resolve(filePath);
    if (!workspace.contains(path)) {
      throw new ToolError('invalid_argument', `File '${filePath}' is outside the '${workspace.root}' workspace.`);
    }
    let isFile: boolean;
    try {
      isFile = (await statAsync(path)).isFile();
    } catch (error) {
      throw new ToolError('file_not_found', `File '${filePath}' does not exist.`, { cause: error });
    }
    if (!isFile) {
      throw new ToolError('file_not_found', `Path '${filePath}' is not a file.`);
    }
    return path;
  }

  /**
   * Builds the symbol locator of a tool call
   *
   * @private
   * @param {Session} session - Active session
   * @param {z.output<typeof HoverSchema>} args - Locator arguments
   * @returns {Promise<SymbolLocator>} Locator with a resolved file
   */
  private async resolveLocator(session: Session, args: z.output<typeof HoverSchema>): Promise<SymbolLocator> {
    const result: SymbolLocator = { file: await this.resolveFile(session, args.file_path) };
    if (args.symbol_name !== undefined) {
      result.symbol = args.symbol_name;
    }
    if (args.line !== undefined) {
      result.line = args.line;
    }
    if (args.character !== undefined) {
      result.character = args.character;
    }
    return result;
  }

  /**
   * Encodes a tool result in the configured response format
   *
   * @private
   * @param {T} data - Result envelope
   * @param {Function} render - Markdown renderer for the envelope
   * @returns {CallToolResult} Text result
   */
  private respond<T>(data: T, render: (data: T) => string): CallToolResult {
    const text = this.settings.responseFormat === 'markdown' ? render(data) : JSON.stringify(data, null, 2);
    return { content: [{ type: 'text', text }] };
  }

  /**
   * Sets up MCP request handlers for tool operations
   *
   * @private
   */
  private setupHandlers(): void {
    this.server.setRequestHandler(CallToolRequestSchema, (request, extra) => this.handleRequest(request, extra.signal));
    this.server.setRequestHandler(ListToolsRequestSchema, this.handleTools.bind(this));
  }

  /**
   * Sets up the tool registry
   *
   * @private
   */
  private setupToolHandlers(): void {
    this.register(this.tool.initClient(), InitSchema, this.initClient.bind(this));
    this.register(this.tool.getDefinition(), DefinitionSchema, this.getDefinition.bind(this));
    this.register(this.tool.getReferences(), ReferencesSchema, this.getReferences.bind(this));
    this.register(this.tool.getOutline(), OutlineSchema, this.getOutline.bind(this));
    this.register(this.tool.getHoverInfo(), HoverSchema, this.getHoverInfo.bind(this));
    this.register(this.tool.getSearchWorkspace(), SearchSchema, this.getSearchWorkspace.bind(this));
    this.register(this.tool.shutdownClient(), ShutdownSchema, this.shutdownClient.bind(this));
  }

  /**
   * Stops the active session, succeeding when none is active
   *
   * @private
   * @returns {Promise<CallToolResult>} Shutdown result
   */
  private async shutdownClient(): Promise<CallToolResult> {
    const session = await this.sessions.stop();
    return this.respond<ShutdownResult>(session ? { session, shutdown: true } : { shutdown: false }, renderShutdown);
  }

  /**
   * Validates tool arguments using Zod schemas
   *
   * @private
   * @param {T} schema - Argument schema
   * @param {unknown} args - Raw arguments
   * @param {string} toolName - Tool name, for the error message
   * @returns {z.output<T>} Validated arguments
   * @throws {ToolError} `invalid_argument` listing every issue
   */
  private validate<T extends z.ZodType>(schema: T, args: unknown, toolName: string): z.output<T> {
    const result = schema.safeParse(args ?? {});
    if (!result.success) {
      const issues = result.error.issues.map(issue =>
        issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      );
      throw new ToolError('invalid_argument', `Invalid '${toolName}' arguments: ${issues.join(', ')}`);
    }
    return result.data;
  }

  /**
   * Workspace of a session
   *
   * @private
   * @param {Session} session - Active session
   * @returns {Workspace} Path helpers bound to the session root
   */
  private workspace(session: Session): Workspace {
    return new Workspace(session.info.workspace_root);
  }

  /**
   * Calls a tool by name
   *
   * @param {string} name - Tool name
   * @param {unknown} args - Raw tool arguments
   * @param {AbortSignal} [signal] - Abort signal cancelling language server requests
   * @returns {Promise<CallToolResult>} Tool result, with `isError` set on failure
   */
  async callTool(name: string, args: unknown, signal?: AbortSignal): Promise<CallToolResult> {
    try {
      const handler = this.toolHandler.get(name);
      if (!handler) {
        throw new ToolError('invalid_argument', `Unknown '${name}' tool.`);
      }
      await this.logger.debug(`Calling '${name}' tool.`);
      return await handler(args, signal);
    } catch (error) {
      const failure = ToolError.from(error, `Tool '${name}' failed`);
      if (failure.category === 'upstream') {
        await this.logger.error(`Tool '${name}' failed: ${failure.message}`);
      }
      return this.failure(failure);
    }
  }

  /**
   * Stops the active session and closes the MCP connection
   *
   * @returns {Promise<void>}
   */
  async close(): Promise<void> {
    await this.sessions.stop();
    await this.server.close();
  }

  /**
   * Connects the MCP server to stdio transport
   *
   * @param {StdioServerTransport} transport - Stdio transport for MCP communication
   * @returns {Promise<void>}
   */
  async connect(transport: StdioServerTransport): Promise<void> {
    transport.onerror = (error) => {
      process.stderr.write(`MCP transport error: ${error.message}\n`);
    };
    await this.server.connect(transport);
  }

  /**
   * Lists the registered tools
   *
   * @returns {Tool[]} Tool definitions in registration order
   */
  listTools(): Tool[] {
    return this.tools;
  }
}
