import path from 'path';
import { JsonObject } from '../core/types';
import { parseCommand } from './bash-parser';
import { parseToolInput } from './tool-input';

function isPathLike(token: string): boolean {
  return token.startsWith('/') || token.startsWith('./') || token.startsWith('~/') || token.startsWith('..');
}

function stopsPrefix(token: string): boolean {
  return token.startsWith('-') || isPathLike(token) || token.startsWith('"') || token.startsWith("'");
}

/** Leading tokens of the first non-`cd` sub-command, up to the first flag, path or quoted token. */
export function inferBashPrefix(command: string): string {
  const first = parseCommand(command).find((part) => part.type !== 'cd');
  if (!first) return '';

  const [head, ...rest] = first.command.split(' ');
  const tokens = [head];
  for (const token of rest) {
    if (stopsPrefix(token)) break;
    tokens.push(token);
  }
  return tokens.join(' ');
}

function hostOf(url: string): string | undefined {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host || undefined;
  } catch {
    return undefined;
  }
}

/**
 * Pattern text covering a concrete invocation, used when a human approves with "remember".
 *
 * @example inferPattern('Bash', { command: 'npm run test -- --watch' }) // 'Bash(npm run test:*)'
 */
export function inferPattern(toolName: string, raw: JsonObject): string {
  const input = parseToolInput(toolName, raw);
  switch (input.kind) {
    case 'bash': {
      const prefix = input.command ? inferBashPrefix(input.command) : '';
      return prefix ? `Bash(${prefix}:*)` : 'Bash(*)';
    }
    case 'file': {
      if (!input.filePath) return `${input.tool}()`;
      const dir = path.posix.dirname(input.filePath);
      if (dir === '.') return `${input.tool}(**)`;
      return `${input.tool}(${dir === '/' ? '' : dir}/**)`;
    }
    case 'web-fetch': {
      const host = input.url ? hostOf(input.url) : undefined;
      return host ? `WebFetch(domain:${host})` : 'WebFetch(*)';
    }
    case 'web-search':
      return 'WebSearch';
    case 'search':
      return input.tool;
    case 'other':
      return input.toolName;
  }
}
