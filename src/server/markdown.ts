/**
 * Markdown Response Rendering
 *
 * Renders tool results as markdown when `responseFormat` is `markdown`.
 * Blocks are separated by blank lines; source excerpts are fenced with the
 * file extension as language.
 *
 * @module server/markdown
 * @license BSD-3-Clause
 */

import { extname } from 'node:path';
import { OutlineItem } from './capability.js';
import { ErrorPayload } from './error.js';
import {
  DefinitionResult,
  HoverResult,
  OutlineResult,
  ReferencesResult,
  SearchResult,
  SessionResult,
  ShutdownResult
} from './tool.js';

function fence(filePath: string, code: string): string {
  return `\`\`\`${extname(filePath).slice(1)}\n${code}\n\`\`\``;
}

function title(mode: string): string {
  return mode.split('_').map(word => word.charAt(0).toUpperCase() + word.slice(1)).join(' ');
}

export function renderDefinition(result: DefinitionResult): string {
  const blocks = [`# ${title(result.mode)} Result`];
  if (!result.items.length) {
    blocks.push(`No ${result.mode.replace('_', ' ')} found.`);
  }
  for (const item of result.items) {
    blocks.push(item.path && item.kind
      ? `## \`${item.file_path}\`: ${item.path.join('.')} (\`${item.kind}\`)`
      : `## \`${item.file_path}\`:${item.range.start.line}`
    );
    if (item.code) {
      blocks.push(`### Content\n${fence(item.file_path, item.code)}`);
    }
  }
  return blocks.join('\n\n');
}

export function renderError(payload: ErrorPayload): string {
  const { category, code, message } = payload.error;
  return `# Error\n\n**${category}** \`${code}\`: ${message}`;
}

export function renderHover(result: HoverResult): string {
  if (!result.hover) {
    return 'No hover information available.';
  }
  const { start } = result.hover.range;
  return [
    '# Hover Information',
    `**File**: \`${result.file_path}\`\n**Position**: Line ${start.line}, Character ${start.character}`,
    '---',
    result.hover.contents
  ].join('\n\n');
}

/**
 * Renders the outline tree depth first, indenting nested symbols
 */
export function renderOutline(result: OutlineResult): string {
  const blocks = [`# Outline for \`${result.file_path}\``];
  if (!result.items.length) {
    blocks.push('No symbols found.');
  }
  const walk = (items: OutlineItem[], depth: number): void => {
    const indent = '  '.repeat(depth);
    for (const item of items) {
      blocks.push(`${indent}## ${item.path.join('.')} (\`${item.kind}\`)`);
      if (item.detail) {
        blocks.push(`${indent}${item.detail}`);
      }
      walk(item.children, depth + 1);
    }
  };
  walk(result.items, 0);
  return blocks.join('\n\n');
}

export function renderReferences(result: ReferencesResult): string {
  const blocks = [
    `# ${title(result.mode)} Found`,
    `Total ${result.mode}: ${result.total} | Showing: ${result.items.length}`
  ];
  for (const item of result.items) {
    blocks.push(`### ${item.file_path}:${item.range.start.line}`);
    if (item.scope) {
      blocks.push(`In \`${item.scope.path.join('.')}\` (\`${item.scope.kind}\`)`);
    }
    if (item.code) {
      blocks.push(fence(item.file_path, item.code));
    }
  }
  return blocks.join('\n\n');
}

export function renderSearch(result: SearchResult): string {
  const blocks = [
    `# Search Results for '${result.query}'`,
    `Total results: ${result.total} | Showing: ${result.items.length}`
  ];
  for (const item of result.items) {
    const line = item.range ? `:${item.range.start.line}` : '';
    blocks.push(`### \`${item.file_path}${line}\`: ${item.path.join('.')} (\`${item.kind}\`)`);
    if (item.signature) {
      blocks.push(fence(item.file_path, item.signature));
    }
  }
  return blocks.join('\n\n');
}

export function renderSession(result: SessionResult): string {
  const { session } = result;
  const server = session.server
    ? `${session.server.name}${session.server.version ? ` ${session.server.version}` : ''}`
    : session.server_command;
  return [
    '# Language Server Started',
    [
      `**Workspace**: \`${session.workspace_root}\``,
      `**Language**: ${session.language}`,
      `**Server**: ${server} (\`${[session.server_command, ...session.server_args].join(' ')}\`)`,
      `**Capabilities**: ${session.capabilities.join(', ')}`
    ].join('\n')
  ].join('\n\n');
}

export function renderShutdown(result: ShutdownResult): string {
  if (!result.shutdown || !result.session) {
    return 'No active language server session.';
  }
  return `# Language Server Stopped\n\n**Workspace**: \`${result.session.workspace_root}\``;
}
