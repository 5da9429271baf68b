/**
 * Configuration Parser and Validator
 *
 * @module server/config
 * @license BSD-3-Clause
 */

import gracefulFs from 'graceful-fs';
import { ClientCapabilities } from 'vscode-languageserver-protocol';
import { z } from 'zod';

/**
 * Languages accepted by `init_lsp_client`
 */
export const LANGUAGES = ['python', 'typescript', 'javascript', 'rust', 'go', 'java', 'cpp', 'c'] as const;

export type Language = typeof LANGUAGES[number];

export type LoggingLevel = 'debug' | 'info' | 'notice' | 'warning' | 'error' | 'critical' | 'alert' | 'emergency';

/**
 * Language table entry describing how documents are opened and which
 * server capabilities a session requires
 *
 * @interface LanguageConfig
 * @property {Partial<ClientCapabilities>} [capabilities] - LSP client capability overrides sent on initialize
 * @property {Record<string, unknown>} [configuration] - Answer to `workspace/configuration` and initialization options
 * @property {Record<string, string>} documentIds - Document language identifiers keyed by file extension
 * @property {Record<string, string>} [env] - Extra environment variables for the server process
 * @property {string[]} extensions - File extensions owned by the language
 * @property {string} languageId - Default document language identifier
 * @property {string[]} required - Server capabilities that must be announced on initialize
 */
export interface LanguageConfig {
  capabilities?: Partial<ClientCapabilities>;
  configuration?: Record<string, unknown>;
  documentIds: Record<string, string>;
  env?: Record<string, string>;
  extensions: string[];
  languageId: string;
  required: string[];
}

/**
 * Runtime settings with defaults applied
 *
 * @interface Settings
 */
export interface Settings {
  contextLines: number;
  loggingLevel: LoggingLevel;
  maxConcurrentFileReads: number;
  maxItems: number;
  responseFormat: 'json' | 'markdown';
  sessionPolicy: 'reject' | 'replace';
  shutdownGracePeriodMs: number;
  timeoutMs: number;
}

const navigation = ['definitionProvider', 'referencesProvider', 'documentSymbolProvider', 'hoverProvider'];

const defaultLanguages: Record<Language, LanguageConfig> = {
  c: { documentIds: {}, extensions: ['.c', '.h'], languageId: 'c', required: navigation },
  cpp: {
    documentIds: {},
    extensions: ['.cc', '.cpp', '.cxx', '.h', '.hh', '.hpp', '.hxx'],
    languageId: 'cpp',
    required: navigation
  },
  go: { documentIds: {}, extensions: ['.go'], languageId: 'go', required: navigation },
  java: { documentIds: {}, extensions: ['.java'], languageId: 'java', required: navigation },
  javascript: {
    documentIds: { '.jsx': 'javascriptreact' },
    extensions: ['.cjs', '.js', '.jsx', '.mjs'],
    languageId: 'javascript',
    required: navigation
  },
  python: { documentIds: {}, extensions: ['.py', '.pyi'], languageId: 'python', required: navigation },
  rust: { documentIds: {}, extensions: ['.rs'], languageId: 'rust', required: navigation },
  typescript: {
    documentIds: { '.tsx': 'typescriptreact' },
    extensions: ['.cts', '.mts', '.ts', '.tsx'],
    languageId: 'typescript',
    required: navigation
  }
};

const defaultSettings: Settings = {
  contextLines: 3,
  loggingLevel: 'info',
  maxConcurrentFileReads: 10,
  maxItems: 50,
  responseFormat: 'json',
  sessionPolicy: 'reject',
  shutdownGracePeriodMs: 100,
  timeoutMs: 60000
};

/**
 * Configuration Parser and Validator
 *
 * Merges an optional JSON configuration file over the built-in language
 * table and settings defaults.
 *
 * @export
 * @class Config
 */
export class Config {
  private languages: Record<Language, LanguageConfig>;
  private settings: Settings;
  private static readonly LanguageConfigSchema = z.object({
    capabilities: z.custom<Partial<ClientCapabilities>>(
      (value) => typeof value === 'object' && value !== null && !Array.isArray(value),
      { message: 'Expected client capabilities object' }
    ).optional(),
    configuration: z.record(z.string(), z.unknown()).optional(),
    documentIds: z.record(z.string(), z.string()).optional(),
    env: z.record(z.string(), z.string()).optional(),
    extensions: z.array(z.string().startsWith('.')).min(1).optional(),
    languageId: z.string().min(1).optional(),
    required: z.array(z.string()).optional()
  }).strict();
  private static readonly SettingsSchema = z.object({
    contextLines: z.number().int().nonnegative().optional(),
    loggingLevel: z.enum(['debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency']).optional(),
    maxConcurrentFileReads: z.number().int().positive().optional(),
    maxItems: z.number().int().nonnegative().optional(),
    responseFormat: z.enum(['json', 'markdown']).optional(),
    sessionPolicy: z.enum(['reject', 'replace']).optional(),
    shutdownGracePeriodMs: z.number().int().nonnegative().optional(),
    timeoutMs: z.number().int().positive().optional()
  }).strict();
  private static readonly ConfigSchema = z.object({
    languages: z.partialRecord(z.enum(LANGUAGES), Config.LanguageConfigSchema).optional(),
    settings: Config.SettingsSchema.optional()
  }).strict();

  /**
   * Private constructor, instances come from `Config.load` or `Config.parse`
   *
   * @private
   */
  private constructor(languages: Record<Language, LanguageConfig>, settings: Settings) {
    this.languages = languages;
    this.settings = settings;
  }

  /**
   * Loads configuration from file, or built-in defaults without a path
   *
   * @static
   * @param {string} [configPath] - Path to configuration JSON file
   * @returns {Config} Validated Config instance
   * @throws {Error} If file cannot be read or configuration is invalid
   */
  static load(configPath?: string): Config {
    if (!configPath) {
      return Config.parse({});
    }
    try {
      const configData = gracefulFs.readFileSync(configPath, 'utf-8');
      return Config.parse(JSON.parse(configData));
    } catch (error) {
      throw new Error(`Failed to load '${configPath}' configuration file: ${error instanceof Error ? error.message : error}`);
    }
  }

  /**
   * Validates a parsed configuration object
   *
   * @static
   * @param {unknown} data - Parsed JSON configuration
   * @returns {Config} Validated Config instance
   * @throws {Error} If configuration is invalid
   */
  static parse(data: unknown): Config {
    const result = Config.ConfigSchema.safeParse(data);
    if (!result.success) {
      const errors = result.error.issues.map((e: z.core.$ZodIssue) =>
        `${e.path.join('.')}: ${e.message}`
      ).join(', ');
      throw new Error(`Invalid configuration: ${errors}`);
    }
    const languages = { ...defaultLanguages };
    for (const language of LANGUAGES) {
      const override = result.data.languages?.[language];
      if (override) {
        const base = defaultLanguages[language];
        languages[language] = {
          capabilities: override.capabilities,
          configuration: override.configuration,
          documentIds: { ...base.documentIds, ...override.documentIds },
          env: override.env,
          extensions: override.extensions ?? base.extensions,
          languageId: override.languageId ?? base.languageId,
          required: override.required ?? base.required
        };
      }
    }
    const settings = result.data.settings ?? {};
    return new Config(languages, {
      contextLines: settings.contextLines ?? defaultSettings.contextLines,
      loggingLevel: settings.loggingLevel ?? defaultSettings.loggingLevel,
      maxConcurrentFileReads: settings.maxConcurrentFileReads ?? defaultSettings.maxConcurrentFileReads,
      maxItems: settings.maxItems ?? defaultSettings.maxItems,
      responseFormat: settings.responseFormat ?? defaultSettings.responseFormat,
      sessionPolicy: settings.sessionPolicy ?? defaultSettings.sessionPolicy,
      shutdownGracePeriodMs: settings.shutdownGracePeriodMs ?? defaultSettings.shutdownGracePeriodMs,
      timeoutMs: settings.timeoutMs ?? defaultSettings.timeoutMs
    });
  }

  /**
   * Gets language table entry
   *
   * @param {Language} language - Supported language tag
   * @returns {LanguageConfig} Built-in entry merged with configured overrides
   */
  getLanguageConfig(language: Language): LanguageConfig {
    return this.languages[language];
  }

  /**
   * Gets runtime settings
   *
   * @returns {Settings} Settings with defaults applied
   */
  getSettings(): Settings {
    return this.settings;
  }

  /**
   * Normalizes a caller supplied language tag
   *
   * @param {string} value - Language tag in any letter case
   * @returns {Language | undefined} Supported language, or undefined when not in the table
   */
  static toLanguage(value: string): Language | undefined {
    const normalized = value.trim().toLowerCase();
    return LANGUAGES.find(language => language === normalized);
  }
}
