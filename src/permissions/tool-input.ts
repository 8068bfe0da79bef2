import { z } from 'zod';
import { JsonObject } from '../core/types';

const BashInputSchema = z.object({ command: z.string(), description: z.string().optional() }).passthrough();
const FileInputSchema = z.object({ file_path: z.string() }).passthrough();
const WebFetchInputSchema = z.object({ url: z.string(), prompt: z.string().optional() }).passthrough();
const WebSearchInputSchema = z.object({ query: z.string() }).passthrough();
const SearchInputSchema = z.object({ pattern: z.string().optional(), path: z.string().optional() }).passthrough();

export const FILE_TOOLS = ['Read', 'Write', 'Edit', 'MultiEdit'] as const;
export const WRITE_TOOLS = ['Write', 'Edit', 'MultiEdit'] as const;

export type FileToolName = (typeof FILE_TOOLS)[number];

/**
 * Typed view of a tool's input. A field the grammar needs but the input lacks (or carries
 * with the wrong type) is `undefined`, so matching can fail closed.
 */
export type ToolInput =
  | { kind: 'bash'; command?: string }
  | { kind: 'file'; tool: FileToolName; filePath?: string }
  | { kind: 'web-fetch'; url?: string }
  | { kind: 'web-search'; query?: string }
  | { kind: 'search'; tool: 'Grep' | 'Glob'; pattern?: string; path?: string }
  | { kind: 'other'; toolName: string; raw: JsonObject };

export type ArgumentFamily = 'bash' | 'path' | 'web-fetch' | 'web-search' | 'generic';

export function isFileTool(toolName: string): toolName is FileToolName {
  return (FILE_TOOLS as readonly string[]).includes(toolName);
}

export function isWriteTool(toolName: string): boolean {
  return (WRITE_TOOLS as readonly string[]).includes(toolName);
}

export function argumentFamily(toolName: string): ArgumentFamily {
  if (toolName === 'Bash') return 'bash';
  if (isFileTool(toolName)) return 'path';
  if (toolName === 'WebFetch') return 'web-fetch';
  if (toolName === 'WebSearch') return 'web-search';
  return 'generic';
}

export function parseToolInput(toolName: string, raw: JsonObject): ToolInput {
  if (toolName === 'Bash') {
    const parsed = BashInputSchema.safeParse(raw);
    return { kind: 'bash', command: parsed.success ? parsed.data.command : undefined };
  }
  if (isFileTool(toolName)) {
    const parsed = FileInputSchema.safeParse(raw);
    return { kind: 'file', tool: toolName, filePath: parsed.success ? parsed.data.file_path : undefined };
  }
  if (toolName === 'WebFetch') {
    const parsed = WebFetchInputSchema.safeParse(raw);
    return { kind: 'web-fetch', url: parsed.success ? parsed.data.url : undefined };
  }
  if (toolName === 'WebSearch') {
    const parsed = WebSearchInputSchema.safeParse(raw);
    return { kind: 'web-search', query: parsed.success ? parsed.data.query : undefined };
  }
  if (toolName === 'Grep' || toolName === 'Glob') {
    const parsed = SearchInputSchema.safeParse(raw);
    return {
      kind: 'search',
      tool: toolName,
      pattern: parsed.success ? parsed.data.pattern : undefined,
      path: parsed.success ? parsed.data.path : undefined,
    };
  }
  return { kind: 'other', toolName, raw };
}
