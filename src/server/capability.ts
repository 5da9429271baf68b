/**
 * Language Server Capabilities
 *
 * High-level navigation operations over one initialized language server
 * connection: symbol location, definitions, references, outlines, hover
 * and workspace symbol search.
 *
 * @module server/capability
 * @license BSD-3-Clause
 */

import gracefulFs from 'graceful-fs';
import micromatch from 'micromatch';
import { posix } from 'node:path';
import { promisify } from 'node:util';
import pLimit, { LimitFunction } from 'p-limit';
import {
  DeclarationRequest,
  DefinitionRequest,
  DocumentSymbolRequest,
  HoverRequest,
  ImplementationRequest,
  ReferencesRequest,
  SymbolKind,
  TypeDefinitionRequest,
  WorkspaceSymbolRequest
} from 'vscode-languageserver-protocol';
import { z } from 'zod';
import { Document, TextPosition, Workspace } from './document.js';
import { ToolError } from './error.js';
import {
  DocumentSymbolNode,
  DocumentSymbolResultSchema,
  HoverResultSchema,
  LocationsResultSchema,
  LspLocation,
  LspRange,
  SymbolInformationNode,
  WorkspaceSymbolNode,
  WorkspaceSymbolResultSchema
} from './protocol.js';

export type DefinitionMode = 'definition' | 'declaration' | 'type_definition';

export type ReferenceMode = 'references' | 'implementations';

/**
 * Symbol to resolve within a file
 *
 * @interface SymbolLocator
 * @property {string} file - Absolute file path
 * @property {string} [symbol] - Symbol name, optionally dotted (`User.validate`)
 * @property {number} [line] - Zero-based line restricting the lookup
 * @property {number} [character] - Zero-based column on `line`
 */
export interface SymbolLocator {
  character?: number;
  file: string;
  line?: number;
  symbol?: string;
}

export interface DefinitionItem {
  code?: string;
  file_path: string;
  kind?: string;
  name?: string;
  path?: string[];
  range: LspRange;
}

export interface ReferenceItem {
  code?: string;
  file_path: string;
  range: LspRange;
  scope?: {
    kind: string;
    path: string[];
  };
}

export interface OutlineItem {
  children: OutlineItem[];
  detail?: string;
  kind: string;
  name: string;
  path: string[];
  range: LspRange;
  selection_range: LspRange;
}

export interface HoverInfo {
  contents: string;
  range: LspRange;
}

/**
 * Workspace symbol match
 *
 * @interface SearchItem
 * @property {string} [container] - Name of the enclosing symbol reported by the server
 * @property {string} file_path - Workspace-relative file path
 * @property {string} kind - Symbol kind name
 * @property {string} name - Symbol name
 * @property {string[]} path - Qualified symbol path, container first
 * @property {LspRange} [range] - Symbol range, absent for location-only results
 * @property {string} [signature] - Declaration line of the symbol
 */
export interface SearchItem {
  container?: string;
  file_path: string;
  kind: string;
  name: string;
  path: string[];
  range?: LspRange;
  signature?: string;
}

/**
 * Truncated result list with the count before truncation
 *
 * @interface Listing
 */
export interface Listing<T> {
  items: T[];
  total: number;
}

/**
 * Operations a session offers to the tool adapter
 *
 * @interface Backend
 */
export interface Backend {
  readonly capabilities: ReadonlySet<string>;
  definition(locator: SymbolLocator, mode: DefinitionMode, includeCode: boolean, signal?: AbortSignal): Promise<DefinitionItem[]>;
  disconnect(): Promise<void>;
  hover(locator: SymbolLocator, signal?: AbortSignal): Promise<HoverInfo | null>;
  outline(file: string, signal?: AbortSignal): Promise<OutlineItem[]>;
  references(locator: SymbolLocator, mode: ReferenceMode, limit: number, contextLines: number, signal?: AbortSignal): Promise<Listing<ReferenceItem>>;
  workspaceSymbols(query: string, pattern: string | undefined, limit: number, signal?: AbortSignal): Promise<Listing<SearchItem>>;
}

/**
 * Language server connection consumed by `Capability`
 *
 * @interface Connection
 */
export interface Connection {
  readonly capabilities: Record<string, unknown>;
  readonly workspace: Workspace;
  openFile(path: string): Promise<void>;
  sendRequest(method: string, params: unknown, signal?: AbortSignal): Promise<unknown>;
  stop(): Promise<void>;
}

const definitionMethods: Record<DefinitionMode, string> = {
  declaration: DeclarationRequest.method,
  definition: DefinitionRequest.method,
  type_definition: TypeDefinitionRequest.method
};

const statAsync = promisify(gracefulFs.stat);

const symbolKinds = new Map<number, string>(
  Object.entries(SymbolKind).map(([name, value]): [number, string] => [value, name])
);

/**
 * Readable name of an LSP symbol kind
 *
 * @param {number} kind - Numeric `SymbolKind`
 * @returns {string} Kind name such as `Class`, or `Unknown(n)`
 */
export function kindName(kind: number): string {
  return symbolKinds.get(kind) ?? `Unknown(${kind})`;
}

/**
 * Matches a workspace-relative path against a glob
 *
 * Patterns without a slash match the base name only.
 *
 * @param {string} path - Path with `/` separators
 * @param {string} pattern - Glob pattern
 * @returns {boolean} Whether the path matches
 */
export function matchesPattern(path: string, pattern: string): boolean {
  const subject = pattern.includes('/') ? path : posix.basename(path);
  return micromatch.isMatch(subject, pattern, { dot: true });
}

function comparePosition(a: TextPosition, b: TextPosition): number {
  return a.line === b.line ? a.character - b.character : a.line - b.line;
}

function containsPosition(range: LspRange, position: TextPosition): boolean {
  return comparePosition(range.start, position) <= 0 && comparePosition(position, range.end) <= 0;
}

function containsRange(outer: LspRange, inner: LspRange): boolean {
  return containsPosition(outer, inner.start) && containsPosition(outer, inner.end);
}

/**
 * Innermost outline item around a position
 *
 * @param {OutlineItem[]} items - Outline tree
 * @param {TextPosition} position - Position to look up
 * @param {'range' | 'selection'} by - `range` matches the symbol body, `selection` only its name
 * @returns {OutlineItem | null} Deepest matching item, or null
 */
export function enclosingSymbol(items: OutlineItem[], position: TextPosition, by: 'range' | 'selection'): OutlineItem | null {
  for (const item of items) {
    if (!containsPosition(item.range, position) && !containsPosition(item.selection_range, position)) {
      continue;
    }
    const child = enclosingSymbol(item.children, position, by);
    if (child) {
      return child;
    }
    if (by === 'range' || containsPosition(item.selection_range, position)) {
      return item;
    }
  }
  return null;
}

/**
 * Finds the first outline item whose path ends with the given segments
 *
 * Names are compared without a trailing parameter list, since some servers
 * report methods as `validate()`.
 *
 * @param {OutlineItem[]} items - Outline tree
 * @param {string[]} segments - Symbol path segments
 * @returns {OutlineItem | null} Matching item in depth-first order, or null
 */
export function findSymbolPath(items: OutlineItem[], segments: string[]): OutlineItem | null {
  const bare = (name: string) => name.replace(/\(.*\)$/, '');
  for (const item of items) {
    const tail = item.path.slice(-segments.length).map(bare);
    if (tail.length === segments.length && tail.every((name, index) => name === segments[index])) {
      return item;
    }
    const child = findSymbolPath(item.children, segments);
    if (child) {
      return child;
    }
  }
  return null;
}

/**
 * Builds the outline tree from either document symbol response format
 *
 * `SymbolInformation` lists carry no hierarchy and are nested by range
 * containment.
 *
 * @param {DocumentSymbolNode[] | SymbolInformationNode[]} symbols - Validated `textDocument/documentSymbol` result
 * @returns {OutlineItem[]} Root outline items
 */
export function buildOutline(symbols: DocumentSymbolNode[] | SymbolInformationNode[]): OutlineItem[] {
  const fromDocumentSymbol = (symbol: DocumentSymbolNode, parent: string[]): OutlineItem => {
    const path = [...parent, symbol.name];
    const item: OutlineItem = {
      children: (symbol.children ?? []).map(child => fromDocumentSymbol(child, path)),
      kind: kindName(symbol.kind),
      name: symbol.name,
      path,
      range: symbol.range,
      selection_range: symbol.selectionRange
    };
    if (symbol.detail) {
      item.detail = symbol.detail;
    }
    return item;
  };
  const roots: OutlineItem[] = [];
  const flat: SymbolInformationNode[] = [];
  for (const symbol of symbols) {
    if ('location' in symbol) {
      flat.push(symbol);
    } else {
      roots.push(fromDocumentSymbol(symbol, []));
    }
  }
  const sorted = flat
    .map((symbol, index) => ({ index, symbol }))
    .sort((a, b) =>
      comparePosition(a.symbol.location.range.start, b.symbol.location.range.start) ||
      comparePosition(b.symbol.location.range.end, a.symbol.location.range.end) ||
      a.index - b.index
    );
  for (const { symbol } of sorted) {
    const range = symbol.location.range;
    let siblings = roots;
    let parent: string[] = [];
    for (let container = siblings.find(node => containsRange(node.range, range)); container; container = siblings.find(node => containsRange(node.range, range))) {
      parent = container.path;
      siblings = container.children;
    }
    siblings.push({
      children: [],
      kind: kindName(symbol.kind),
      name: symbol.name,
      path: [...parent, symbol.name],
      range,
      selection_range: range
    });
  }
  return roots;
}

/**
 * Flattens hover contents to text
 *
 * @param {MarkupContent | MarkedString | MarkedString[]} contents - Hover contents of any LSP shape
 * @returns {string} Hover text, markdown where the server sent markdown
 */
export function hoverText(contents: NonNullable<z.infer<typeof HoverResultSchema>>['contents']): string {
  const marked = (value: string | { language: string; value: string }) =>
    typeof value === 'string' ? value : `\`\`\`${value.language}\n${value.value}\n\`\`\``;
  if (Array.isArray(contents)) {
    return contents.map(marked).filter(Boolean).join('\n\n');
  }
  if (typeof contents === 'object' && 'kind' in contents) {
    return contents.value;
  }
  return marked(contents);
}

/**
 * Normalizes definition-like results to plain locations
 *
 * @param {Location | Location[] | LocationLink[] | null} result - Validated definition result
 * @returns {LspLocation[]} Locations, link targets resolved to their selection range
 */
export function toLocations(result: z.infer<typeof LocationsResultSchema>): LspLocation[] {
  if (!result) {
    return [];
  }
  if (!Array.isArray(result)) {
    return [result];
  }
  return result.map(entry => 'targetUri' in entry
    ? { range: entry.targetSelectionRange, uri: entry.targetUri }
    : entry
  );
}

/**
 * Per-call memo of documents and outlines, so one call reads each file once
 *
 * @class CallScope
 */
class CallScope {
  private documents: Map<string, Promise<Document>> = new Map();
  private load: (path: string) => Promise<OutlineItem[]>;
  private outlines: Map<string, Promise<OutlineItem[]>> = new Map();

  constructor(load: (path: string) => Promise<OutlineItem[]>) {
    this.load = load;
  }

  document(path: string): Promise<Document> {
    let document = this.documents.get(path);
    if (!document) {
      document = Document.read(path);
      this.documents.set(path, document);
    }
    return document;
  }

  outline(path: string): Promise<OutlineItem[]> {
    let outline = this.outlines.get(path);
    if (!outline) {
      outline = this.load(path);
      this.outlines.set(path, outline);
    }
    return outline;
  }
}

/**
 * Language Server Capabilities
 *
 * Implements `Backend` on top of a `Connection`, translating symbol
 * locators into LSP positions and LSP results into tool records.
 *
 * @class Capability
 */
export class Capability implements Backend {
  readonly capabilities: ReadonlySet<string>;
  private connection: Connection;
  private fileReadLimit: LimitFunction;
  private workspace: Workspace;

  /**
   * @param {Connection} connection - Initialized language server connection
   * @param {number} maxConcurrentFileReads - Bound on files described concurrently
   */
  constructor(connection: Connection, maxConcurrentFileReads: number) {
    this.connection = connection;
    this.fileReadLimit = pLimit(maxConcurrentFileReads);
    this.workspace = connection.workspace;
    this.capabilities = new Set(
      Object.entries(connection.capabilities)
        .filter(([, value]) => value !== undefined && value !== null && value !== false)
        .map(([name]) => name)
    );
  }

  /**
   * Builds a call scope whose outlines honour the call's abort signal
   *
   * @private
   * @param {AbortSignal} [signal] - Abort signal of the tool call
   * @returns {CallScope} Fresh call scope
   */
  private createScope(signal?: AbortSignal): CallScope {
    return new CallScope(path => this.requestOutline(path, signal));
  }

  /**
   * Describes a definition location with its enclosing symbol and source
   *
   * @private
   * @param {LspLocation} location - Location returned by the server
   * @param {boolean} includeCode - Attach the source of the enclosing symbol
   * @param {CallScope} scope - Call scope
   * @returns {Promise<DefinitionItem>} Definition record
   */
  private async describeDefinition(location: LspLocation, includeCode: boolean, scope: CallScope): Promise<DefinitionItem> {
    const item: DefinitionItem = { file_path: this.workspace.displayUri(location.uri), range: location.range };
    const path = await this.localFile(location.uri);
    if (!path) {
      return item;
    }
    const symbol = this.capabilities.has('documentSymbolProvider')
      ? enclosingSymbol(await scope.outline(path), location.range.start, 'selection')
      : null;
    if (symbol) {
      item.name = symbol.name;
      item.kind = symbol.kind;
      item.path = symbol.path;
    }
    if (includeCode) {
      const document = await scope.document(path);
      item.code = document.snippet(symbol ? symbol.range : location.range);
    }
    return item;
  }

  /**
   * Describes a reference location with its enclosing scope and context lines
   *
   * @private
   * @param {LspLocation} location - Location returned by the server
   * @param {number} contextLines - Lines of context around the reference
   * @param {CallScope} scope - Call scope
   * @returns {Promise<ReferenceItem>} Reference record
   */
  private async describeReference(location: LspLocation, contextLines: number, scope: CallScope): Promise<ReferenceItem> {
    const item: ReferenceItem = { file_path: this.workspace.displayUri(location.uri), range: location.range };
    const path = await this.localFile(location.uri);
    if (!path) {
      return item;
    }
    if (this.capabilities.has('documentSymbolProvider')) {
      const symbol = enclosingSymbol(await scope.outline(path), location.range.start, 'range');
      if (symbol) {
        item.scope = { kind: symbol.kind, path: symbol.path };
      }
    }
    const document = await scope.document(path);
    item.code = document.snippet(location.range, contextLines);
    return item;
  }

  /**
   * Describes a workspace symbol with its qualified path and declaration line
   *
   * @private
   * @param {WorkspaceSymbolNode} symbol - Validated workspace symbol
   * @returns {Promise<SearchItem>} Search result record
   */
  private async describeSymbol(symbol: WorkspaceSymbolNode): Promise<SearchItem> {
    const item: SearchItem = {
      file_path: this.workspace.displayUri(symbol.location.uri),
      kind: kindName(symbol.kind),
      name: symbol.name,
      path: symbol.containerName ? [...symbol.containerName.split('.'), symbol.name] : [symbol.name]
    };
    if (symbol.containerName) {
      item.container = symbol.containerName;
    }
    if (!('range' in symbol.location)) {
      return item;
    }
    const range = symbol.location.range;
    item.range = range;
    const path = await this.localFile(symbol.location.uri);
    if (path) {
      const document = await Document.read(path);
      const line = range.start.line < document.lines.length ? document.lines[range.start.line].trim() : '';
      if (line) {
        item.signature = line;
      }
    }
    return item;
  }

  /**
   * Local path of a result URI when it names an existing file
   *
   * @private
   * @param {string} uri - Document URI from a server result
   * @returns {Promise<string | null>} Absolute path, or null for non-file URIs and missing files
   */
  private async localFile(uri: string): Promise<string | null> {
    const path = this.workspace.fromUri(uri);
    if (!path) {
      return null;
    }
    try {
      return (await statAsync(path)).isFile() ? path : null;
    } catch {
      return null;
    }
  }

  /**
   * Resolves a symbol locator to a position in its file
   *
   * Dotted names go through the outline; plain names use the outline first
   * and fall back to the first whole-word occurrence in the text.
   *
   * @private
   * @param {SymbolLocator} locator - Symbol to resolve
   * @param {CallScope} scope - Call scope
   * @returns {Promise<TextPosition | null>} Position, or null when the symbol does not occur
   */
  private async locate(locator: SymbolLocator, scope: CallScope): Promise<TextPosition | null> {
    const document = await scope.document(locator.file);
    if (!locator.symbol) {
      if (locator.line === undefined) {
        return null;
      }
      if (locator.character !== undefined) {
        return locator.line < document.lines.length ? { character: locator.character, line: locator.line } : null;
      }
      return document.lineStart(locator.line);
    }
    const segments = locator.symbol.split('.').filter(Boolean);
    const name = segments[segments.length - 1] ?? locator.symbol;
    if (locator.line !== undefined) {
      return document.findWord(name, locator.line, locator.character);
    }
    if (this.capabilities.has('documentSymbolProvider')) {
      const symbol = findSymbolPath(await scope.outline(locator.file), segments);
      if (symbol) {
        return symbol.selection_range.start;
      }
    }
    return document.findWord(name);
  }

  /**
   * Validates a language server result against its schema
   *
   * @private
   * @param {T} schema - Response schema
   * @param {unknown} value - Raw response
   * @param {string} method - LSP method, for the error message
   * @returns {z.output<T>} Validated response
   * @throws {ToolError} When the payload does not match
   */
  private parse<T extends z.ZodType>(schema: T, value: unknown, method: string): z.output<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ');
      throw new ToolError('server_error', `Unexpected '${method}' response: ${issues}`);
    }
    return result.data;
  }

  /**
   * Requests and builds the outline of one file
   *
   * @private
   * @param {string} path - Absolute file path
   * @param {AbortSignal} [signal] - Abort signal of the tool call
   * @returns {Promise<OutlineItem[]>} Outline tree
   */
  private async requestOutline(path: string, signal?: AbortSignal): Promise<OutlineItem[]> {
    await this.connection.openFile(path);
    const params = { textDocument: { uri: this.workspace.toUri(path) } };
    const response = await this.connection.sendRequest(DocumentSymbolRequest.method, params, signal);
    const result = this.parse(DocumentSymbolResultSchema, response, DocumentSymbolRequest.method);
    return result ? buildOutline(result) : [];
  }

  /**
   * Sends a position request for a located symbol
   *
   * @private
   * @param {string} method - Definition-like LSP method
   * @param {unknown} params - Text document position params
   * @param {AbortSignal} [signal] - Abort signal of the tool call
   * @returns {Promise<LspLocation[]>} Normalized locations
   */
  private async requestLocations(method: string, params: unknown, signal?: AbortSignal): Promise<LspLocation[]> {
    const response = await this.connection.sendRequest(method, params, signal);
    return toLocations(this.parse(LocationsResultSchema, response, method));
  }

  /**
   * Resolves the definition, declaration or type definition of a symbol
   *
   * @param {SymbolLocator} locator - Symbol to resolve
   * @param {DefinitionMode} mode - Which definition request to send
   * @param {boolean} includeCode - Attach the source of each target symbol
   * @param {AbortSignal} [signal] - Abort signal of the tool call
   * @returns {Promise<DefinitionItem[]>} Targets, empty when the symbol does not occur
   */
  async definition(locator: SymbolLocator, mode: DefinitionMode, includeCode: boolean, signal?: AbortSignal): Promise<DefinitionItem[]> {
    const scope = this.createScope(signal);
    const position = await this.locate(locator, scope);
    if (!position) {
      return [];
    }
    await this.connection.openFile(locator.file);
    const method = definitionMethods[mode];
    const locations = await this.requestLocations(method, {
      position,
      textDocument: { uri: this.workspace.toUri(locator.file) }
    }, signal);
    return Promise.all(locations.map(location =>
      this.fileReadLimit(() => this.describeDefinition(location, includeCode, scope))
    ));
  }

  /**
   * Stops the underlying language server
   *
   * @returns {Promise<void>}
   */
  async disconnect(): Promise<void> {
    await this.connection.stop();
  }

  /**
   * Hover information for a symbol
   *
   * When the server sends no range, the range spans the symbol name.
   *
   * @param {SymbolLocator} locator - Symbol to resolve
   * @param {AbortSignal} [signal] - Abort signal of the tool call
   * @returns {Promise<HoverInfo | null>} Hover, or null when the server has none
   */
  async hover(locator: SymbolLocator, signal?: AbortSignal): Promise<HoverInfo | null> {
    const scope = this.createScope(signal);
    const position = await this.locate(locator, scope);
    if (!position) {
      return null;
    }
    await this.connection.openFile(locator.file);
    const params = { position, textDocument: { uri: this.workspace.toUri(locator.file) } };
    const response = await this.connection.sendRequest(HoverRequest.method, params, signal);
    const result = this.parse(HoverResultSchema, response, HoverRequest.method);
    const contents = result ? hoverText(result.contents) : '';
    if (!result || !contents.trim()) {
      return null;
    }
    const length = locator.symbol ? (locator.symbol.split('.').pop() ?? '').length : 0;
    return {
      contents,
      range: result.range ?? {
        end: { character: position.character + length, line: position.line },
        start: position
      }
    };
  }

  /**
   * Outline of one file
   *
   * @param {string} file - Absolute file path
   * @param {AbortSignal} [signal] - Abort signal of the tool call
   * @returns {Promise<OutlineItem[]>} Outline tree
   */
  async outline(file: string, signal?: AbortSignal): Promise<OutlineItem[]> {
    return this.requestOutline(file, signal);
  }

  /**
   * Finds references or implementations of a symbol
   *
   * Only the first `limit` locations are described; `total` counts them all.
   *
   * @param {SymbolLocator} locator - Symbol to resolve
   * @param {ReferenceMode} mode - References or implementations
   * @param {number} limit - Maximum number of described locations
   * @param {number} contextLines - Lines of context around each location
   * @param {AbortSignal} [signal] - Abort signal of the tool call
   * @returns {Promise<Listing<ReferenceItem>>} Described locations with the full count
   */
  async references(locator: SymbolLocator, mode: ReferenceMode, limit: number, contextLines: number, signal?: AbortSignal): Promise<Listing<ReferenceItem>> {
    const scope = this.createScope(signal);
    const position = await this.locate(locator, scope);
    if (!position) {
      return { items: [], total: 0 };
    }
    await this.connection.openFile(locator.file);
    const textDocument = { uri: this.workspace.toUri(locator.file) };
    const locations = mode === 'references'
      ? await this.requestLocations(ReferencesRequest.method, { context: { includeDeclaration: true }, position, textDocument }, signal)
      : await this.requestLocations(ImplementationRequest.method, { position, textDocument }, signal);
    const items = await Promise.all(locations.slice(0, Math.max(0, limit)).map(location =>
      this.fileReadLimit(() => this.describeReference(location, contextLines, scope))
    ));
    return { items, total: locations.length };
  }

  /**
   * Searches symbols across the workspace
   *
   * @param {string} query - Symbol query sent to the server
   * @param {string | undefined} pattern - Glob on the workspace-relative file path
   * @param {number} limit - Maximum number of results
   * @param {AbortSignal} [signal] - Abort signal of the tool call
   * @returns {Promise<Listing<SearchItem>>} Matches in server order with the count before truncation
   */
  async workspaceSymbols(query: string, pattern: string | undefined, limit: number, signal?: AbortSignal): Promise<Listing<SearchItem>> {
    const response = await this.connection.sendRequest(WorkspaceSymbolRequest.method, { query }, signal);
    let symbols: WorkspaceSymbolNode[] = this.parse(WorkspaceSymbolResultSchema, response, WorkspaceSymbolRequest.method) ?? [];
    if (pattern) {
      symbols = symbols.filter(symbol => matchesPattern(this.workspace.displayUri(symbol.location.uri), pattern));
    }
    const items = await Promise.all(symbols.slice(0, Math.max(0, limit)).map(symbol =>
      this.fileReadLimit(() => this.describeSymbol(symbol))
    ));
    return { items, total: symbols.length };
  }
}
