/**
 * MCP Tool Definitions
 *
 * @module server/tool
 * @license BSD-3-Clause
 */

import { Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  DefinitionItem,
  DefinitionMode,
  HoverInfo,
  OutlineItem,
  ReferenceItem,
  ReferenceMode,
  SearchItem
} from './capability.js';
import { LANGUAGES, Settings } from './config.js';
import { SessionInfo } from './session.js';

export interface DefinitionResult {
  items: DefinitionItem[];
  mode: DefinitionMode;
  symbol: string | null;
}

export interface HoverResult {
  file_path: string;
  hover: HoverInfo | null;
}

export interface OutlineResult {
  file_path: string;
  items: OutlineItem[];
}

/**
 * Truncated references, `total` counts them before truncation
 *
 * @interface ReferencesResult
 */
export interface ReferencesResult {
  items: ReferenceItem[];
  mode: ReferenceMode;
  symbol: string | null;
  total: number;
}

export interface SearchResult {
  file_pattern: string | null;
  items: SearchItem[];
  query: string;
  total: number;
}

export interface SessionResult {
  session: SessionInfo;
}

export interface ShutdownResult {
  session?: SessionInfo;
  shutdown: boolean;
}

const locatorProperties = {
  character: { type: 'integer', minimum: 0, description: 'Character position on `line` (zero-based)' },
  file_path: { type: 'string', description: 'Path to the file, absolute or relative to the workspace root' },
  line: { type: 'integer', minimum: 0, description: 'Line number (zero-based), restricts the symbol lookup to this line' },
  symbol_name: { type: 'string', description: 'Symbol name, optionally qualified with its container (`User.validate`)' }
};

/**
 * MCP Tool Definitions for language server navigation
 *
 * Tool schemas carry the configured defaults, so the agent sees the
 * values applied when an argument is omitted.
 *
 * @class McpTool
 */
export class McpTool {
  private settings: Settings;

  /**
   * @param {Settings} settings - Runtime settings providing argument defaults
   */
  constructor(settings: Settings) {
    this.settings = settings;
  }

  /**
   * Creates MCP tool for symbol definitions
   *
   * @returns {Tool} MCP tool definition for definition, declaration and type definition lookup
   */
  getDefinition(): Tool {
    return {
      name: 'get_definition',
      description: 'Find where a symbol is defined, declared or where its type is defined, with the source of the target symbol',
      inputSchema: {
        type: 'object',
        properties: {
          ...locatorProperties,
          include_code: { type: 'boolean', default: true, description: 'Attach the source text of the target symbol' },
          mode: {
            type: 'string',
            enum: ['definition', 'declaration', 'type_definition'],
            default: 'definition',
            description: 'Navigation mode'
          }
        },
        required: ['file_path']
      }
    };
  }

  /**
   * Creates MCP tool for hover information
   *
   * @returns {Tool} MCP tool definition for type and documentation lookup
   */
  getHoverInfo(): Tool {
    return {
      name: 'get_hover_info',
      description: 'Get type information and documentation for a symbol',
      inputSchema: {
        type: 'object',
        properties: locatorProperties,
        required: ['file_path']
      }
    };
  }

  /**
   * Creates MCP tool for file outlines
   *
   * @returns {Tool} MCP tool definition for hierarchical document symbols
   */
  getOutline(): Tool {
    return {
      name: 'get_outline',
      description: 'List the symbol tree of a file (classes, functions, methods, variables) with their ranges',
      inputSchema: {
        type: 'object',
        properties: {
          file_path: locatorProperties.file_path
        },
        required: ['file_path']
      }
    };
  }

  /**
   * Creates MCP tool for references and implementations
   *
   * @returns {Tool} MCP tool definition for usage site lookup
   */
  getReferences(): Tool {
    return {
      name: 'find_references',
      description: 'Find references to a symbol or implementations of an interface or abstract method, with surrounding source lines',
      inputSchema: {
        type: 'object',
        properties: {
          ...locatorProperties,
          context_lines: {
            type: 'integer',
            minimum: 0,
            default: this.settings.contextLines,
            description: 'Source lines attached above and below each reference'
          },
          max_items: {
            type: 'integer',
            minimum: 0,
            default: this.settings.maxItems,
            description: 'Maximum number of references to return'
          },
          mode: {
            type: 'string',
            enum: ['references', 'implementations'],
            default: 'references',
            description: 'Navigation mode'
          }
        },
        required: ['file_path']
      }
    };
  }

  /**
   * Creates MCP tool for workspace symbol search
   *
   * @returns {Tool} MCP tool definition for symbol search across the workspace
   */
  getSearchWorkspace(): Tool {
    return {
      name: 'search_workspace',
      description: 'Search symbols by name across the workspace, in the order returned by the language server',
      inputSchema: {
        type: 'object',
        properties: {
          file_pattern: {
            type: 'string',
            description: 'Glob restricting results to matching files, patterns without `/` match file names (`*.py`)'
          },
          max_items: {
            type: 'integer',
            minimum: 0,
            default: this.settings.maxItems,
            description: 'Maximum number of symbols to return'
          },
          query: { type: 'string', description: 'Symbol name or fragment to search for' }
        },
        required: ['query']
      }
    };
  }

  /**
   * Creates MCP tool starting a language server session
   *
   * @returns {Tool} MCP tool definition for session initialization
   */
  initClient(): Tool {
    return {
      name: 'init_lsp_client',
      description: 'Start a language server for a workspace, required before any other tool',
      inputSchema: {
        type: 'object',
        properties: {
          force: {
            type: 'boolean',
            default: false,
            description: 'Shut down an active session before starting the new one'
          },
          language: { type: 'string', description: `Workspace language, one of: ${LANGUAGES.join(', ')}` },
          server_args: {
            type: 'array',
            items: { type: 'string' },
            default: [],
            description: 'Language server command line arguments (`--stdio`)'
          },
          server_command: { type: 'string', description: 'Language server executable (`pyright-langserver`)' },
          workspace_root: { type: 'string', description: 'Absolute path to the workspace directory' }
        },
        required: ['language', 'server_command', 'workspace_root']
      }
    };
  }

  /**
   * Creates MCP tool stopping the language server session
   *
   * @returns {Tool} MCP tool definition for session shutdown
   */
  shutdownClient(): Tool {
    return {
      name: 'shutdown_lsp_client',
      description: 'Stop the active language server session, succeeds when no session is active',
      inputSchema: {
        type: 'object',
        properties: {}
      }
    };
  }
}
