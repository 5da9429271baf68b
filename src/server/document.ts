/**
 * Source Document Helpers
 *
 * @module server/document
 * @license BSD-3-Clause
 */

import gracefulFs from 'graceful-fs';
import { isAbsolute, relative, resolve, sep } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { promisify } from 'node:util';
import { LspRange } from './protocol.js';

const readFileAsync = promisify(gracefulFs.readFile);

/**
 * Zero-based document position
 *
 * @interface TextPosition
 */
export interface TextPosition {
  character: number;
  line: number;
}

/**
 * Source file text split into lines
 *
 * @class Document
 */
export class Document {
  readonly lines: string[];
  readonly path: string;

  constructor(path: string, text: string) {
    this.path = path;
    this.lines = text.length ? text.split(/\r?\n/) : [];
  }

  /**
   * Reads a document from disk
   *
   * @param {string} path - Absolute file path
   * @returns {Promise<Document>} Document with its lines
   */
  static async read(path: string): Promise<Document> {
    const text = await readFileAsync(path, 'utf8');
    return new Document(path, text);
  }

  /**
   * Finds the first whole-word occurrence of an identifier
   *
   * @param {string} word - Identifier to search for
   * @param {number} [line] - Restricts the search to one line when given
   * @param {number} [character] - Restricts the search to matches at or after this column
   * @returns {TextPosition | null} Position of the first character, or null when absent
   */
  findWord(word: string, line?: number, character: number = 0): TextPosition | null {
    if (!word) {
      return null;
    }
    const escaped = word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const pattern = new RegExp(`(?<![\\w$])${escaped}(?![\\w$])`, 'g');
    const first = line ?? 0;
    const last = line ?? this.lines.length - 1;
    for (let index = first; index <= last && index < this.lines.length; index++) {
      pattern.lastIndex = index === line ? character : 0;
      const match = pattern.exec(this.lines[index]);
      if (match) {
        return { character: match.index, line: index };
      }
    }
    return null;
  }

  /**
   * Position of the first non-blank character on a line
   *
   * @param {number} line - Zero-based line number
   * @returns {TextPosition | null} Position, or null past the last line
   */
  lineStart(line: number): TextPosition | null {
    if (line < 0 || line >= this.lines.length) {
      return null;
    }
    const character = this.lines[line].search(/\S/);
    return { character: character === -1 ? 0 : character, line };
  }

  /**
   * Source text covering a range's lines, widened by context lines
   *
   * @param {LspRange} range - Range to extract
   * @param {number} [context] - Extra lines above and below
   * @returns {string} Lines joined with `\n`
   */
  snippet(range: LspRange, context: number = 0): string {
    const start = Math.max(0, range.start.line - context);
    const end = Math.min(this.lines.length - 1, range.end.line + context);
    return this.lines.slice(start, end + 1).join('\n');
  }
}

/**
 * Path helpers bound to one workspace root
 *
 * @class Workspace
 */
export class Workspace {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /**
   * Tests whether an absolute path lies inside the workspace
   *
   * @param {string} path - Absolute path
   */
  contains(path: string): boolean {
    const relation = relative(this.root, path);
    return relation === '' || (!relation.startsWith('..') && !isAbsolute(relation));
  }

  /**
   * Path reported to the agent: workspace relative with `/` separators
   * when inside the root, absolute otherwise
   *
   * @param {string} path - Absolute path
   */
  display(path: string): string {
    if (!this.contains(path)) {
      return path;
    }
    return relative(this.root, path).split(sep).join('/');
  }

  /**
   * Converts a `file://` URI to its display path, leaving other URIs as they are
   *
   * @param {string} uri - Document URI
   */
  displayUri(uri: string): string {
    const path = this.fromUri(uri);
    return path ? this.display(path) : uri;
  }

  /**
   * Absolute path of a `file://` URI
   *
   * @param {string} uri - Document URI
   * @returns {string | null} Absolute path, or null for other schemes
   */
  fromUri(uri: string): string | null {
    if (!uri.startsWith('file:')) {
      return null;
    }
    return fileURLToPath(uri);
  }

  /**
   * Resolves a caller supplied path against the workspace root
   *
   * @param {string} filePath - Absolute or workspace relative path
   */
  resolve(filePath: string): string {
    return resolve(this.root, filePath);
  }

  toUri(path: string): string {
    return pathToFileURL(path).toString();
  }
}
