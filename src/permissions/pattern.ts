import os from 'os';
import path from 'path';
import { EngineError, errorMessage } from '../core/errors';
import { JsonObject } from '../core/types';
import { hasSubstitution, isCdWithinWorkingDir, normalizeCommand, parseCommand } from './bash-parser';
import { inferPattern } from './inference';
import { isSafeOutputFilter } from './safe-commands';
import { ArgumentFamily, ToolInput, argumentFamily, parseToolInput } from './tool-input';
import { MatchContext, PermissionDecision } from './types';

type ArgumentMatcher = (input: ToolInput, ctx: MatchContext) => boolean;

/** A parsed permission rule. Built once by `parsePermissionPattern`, matched many times. */
export interface PermissionPattern {
  readonly raw: string;
  readonly toolName: string;
  /** Text between the parentheses; undefined for a bare tool name. */
  readonly argument?: string;
  matchesTool(toolName: string): boolean;
  /** Compiled argument matchers by argument family; absent family never matches. */
  readonly argumentMatchers: ReadonlyMap<ArgumentFamily, ArgumentMatcher>;
}

const ALL_FAMILIES: ArgumentFamily[] = ['bash', 'path', 'web-fetch', 'web-search', 'generic'];
const TOOL_NAME = /^[A-Za-z0-9_.:-]+$/;

function invalid(raw: string, reason: string): EngineError {
  return new EngineError('INVALID_PATTERN', `Invalid permission pattern "${raw}": ${reason}`);
}

// ---------------------------------------------------------------------------
// Paths

/** True when `value`, raw or after up to three rounds of percent-decoding, has a `..` segment. */
export function hasPathTraversal(value: string): boolean {
  let current = value;
  for (let round = 0; round < 4; round++) {
    if (current.split(/[\\/]/).includes('..')) return true;
    let decoded: string;
    try {
      decoded = decodeURIComponent(current);
    } catch {
      return false;
    }
    if (decoded === current) return false;
    current = decoded;
  }
  return false;
}

export function normalizePath(value: string): string {
  const collapsed = value.replace(/^\/{2,}/, '/');
  const normalized = path.posix.normalize(collapsed);
  return normalized.length > 1 ? normalized.replace(/\/+$/, '') : normalized;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function globBody(glob: string): string {
  let out = '';
  for (let i = 0; i < glob.length; i++) {
    const char = glob[i];
    if (char === '*' && glob[i + 1] === '*') {
      out += '.*';
      i++;
    } else if (char === '*') {
      out += '[^/]*';
    } else if (char === '?') {
      out += '[^/]';
    } else {
      out += escapeRegExp(char);
    }
  }
  return out;
}

/** `dir/**` matches `dir` itself and everything below it; `**` alone matches any path. */
export function globToRegExp(glob: string): RegExp {
  if (glob.endsWith('/**')) {
    return new RegExp(`^${globBody(glob.slice(0, -3))}(?:/.*)?$`);
  }
  return new RegExp(`^${globBody(glob)}$`);
}

function expandHome(value: string): string {
  if (value === '~') return os.homedir();
  if (value.startsWith('~/')) return path.posix.join(os.homedir(), value.slice(2));
  return value;
}

function compilePathMatcher(raw: string, arg: string): ArgumentMatcher {
  if (arg === '') {
    return (input) => input.kind === 'file' && input.filePath === '';
  }
  if (hasPathTraversal(arg)) throw invalid(raw, 'path patterns may not contain ".."');

  const glob = normalizePath(expandHome(arg));
  const regex = globToRegExp(glob);
  const anyPath = arg === '*' || glob === '**';
  const patternAbsolute = glob.startsWith('/');

  return (input, ctx) => {
    if (input.kind !== 'file' || input.filePath === undefined || input.filePath === '') return false;
    if (hasPathTraversal(input.filePath)) return false;
    if (anyPath) return true;

    let candidate = normalizePath(input.filePath);
    const candidateAbsolute = candidate.startsWith('/');
    if (ctx.cwd && patternAbsolute && !candidateAbsolute) {
      candidate = normalizePath(path.posix.join(ctx.cwd, candidate));
    } else if (ctx.cwd && !patternAbsolute && candidateAbsolute) {
      const relative = path.posix.relative(normalizePath(ctx.cwd), candidate);
      if (relative === '' || relative.startsWith('..') || relative.startsWith('/')) return false;
      candidate = relative;
    }
    return regex.test(candidate);
  };
}

// ---------------------------------------------------------------------------
// Bash

function compileBashMatcher(raw: string, arg: string): ArgumentMatcher {
  if (arg === '') {
    return (input) => input.kind === 'bash' && input.command !== undefined && input.command.trim() === '';
  }
  if (arg === '*') {
    return (input) => input.kind === 'bash' && input.command !== undefined && input.command.trim() !== '';
  }
  if (arg.endsWith(':*')) {
    const prefix = normalizeCommand(arg.slice(0, -2));
    if (!prefix) throw invalid(raw, 'empty command prefix');
    return (input, ctx) => input.kind === 'bash' && input.command !== undefined && matchesPrefix(input.command, prefix, ctx);
  }
  const exact = normalizeCommand(arg);
  return (input) => input.kind === 'bash' && input.command !== undefined && normalizeCommand(input.command) === exact;
}

/**
 * Every sub-command must start with `prefix`. `cd` inside the working directory is skipped and
 * pipeline parts may instead be safe output filters, as long as one part carries the prefix.
 * Commands with command or process substitution never match.
 */
function matchesPrefix(command: string, prefix: string, ctx: MatchContext): boolean {
  if (hasSubstitution(command)) return false;
  const parts = parseCommand(command);
  let matched = false;
  for (const part of parts) {
    if (part.command.startsWith(prefix)) {
      matched = true;
      continue;
    }
    if (part.type === 'cd' && ctx.cwd && isCdWithinWorkingDir(part.command, ctx.cwd)) continue;
    if (part.type === 'pipeline-part' && isSafeOutputFilter(part.command)) continue;
    return false;
  }
  return matched;
}

// ---------------------------------------------------------------------------
// Web

function hostnameOf(url: string): string | undefined {
  try {
    return new URL(url).hostname.toLowerCase().replace(/\.$/, '');
  } catch {
    return undefined;
  }
}

/** Host equals `domain` or ends in `.domain`; a bare substring is not enough. */
export function matchesDomain(url: string, domain: string): boolean {
  const host = hostnameOf(url);
  if (!host) return false;
  const wanted = domain.toLowerCase().replace(/\.$/, '');
  return host === wanted || host.endsWith(`.${wanted}`);
}

function compileWebFetchMatcher(raw: string, arg: string): ArgumentMatcher {
  if (arg === '') return (input) => input.kind === 'web-fetch' && input.url === '';
  if (arg === '*') return (input) => input.kind === 'web-fetch' && input.url !== undefined && input.url !== '';
  if (!arg.startsWith('domain:')) throw invalid(raw, 'WebFetch takes "domain:<host>" or "*"');

  const domain = arg.slice('domain:'.length).trim();
  if (!domain) throw invalid(raw, 'empty domain');
  return (input) => input.kind === 'web-fetch' && input.url !== undefined && matchesDomain(input.url, domain);
}

function compileWebSearchMatcher(raw: string, arg: string): ArgumentMatcher {
  if (arg === '') return (input) => input.kind === 'web-search' && input.query === '';
  if (arg === '*') return (input) => input.kind === 'web-search' && input.query !== undefined;
  if (!arg.startsWith('query:')) throw invalid(raw, 'WebSearch takes "query:<regex>" or "*"');

  let regex: RegExp;
  try {
    regex = new RegExp(arg.slice('query:'.length));
  } catch (error) {
    throw invalid(raw, errorMessage(error));
  }
  return (input) => input.kind === 'web-search' && input.query !== undefined && regex.test(input.query);
}

// ---------------------------------------------------------------------------
// Tools without an argument grammar

function isEmptyValue(value: unknown): boolean {
  return value === '' || value === undefined || value === null;
}

function genericValues(input: ToolInput): unknown[] {
  switch (input.kind) {
    case 'search':
      return [input.pattern, input.path];
    case 'other':
      return Object.values(input.raw);
    default:
      return [];
  }
}

function compileGenericMatcher(raw: string, arg: string): ArgumentMatcher {
  if (arg === '') return (input) => genericValues(input).every(isEmptyValue);
  if (arg === '*') return () => true;
  throw invalid(raw, 'this tool only takes "()" or "(*)"');
}

const COMPILERS: Record<ArgumentFamily, (raw: string, arg: string) => ArgumentMatcher> = {
  bash: compileBashMatcher,
  path: compilePathMatcher,
  'web-fetch': compileWebFetchMatcher,
  'web-search': compileWebSearchMatcher,
  generic: compileGenericMatcher,
};

// ---------------------------------------------------------------------------

function compileToolMatcher(raw: string, name: string): (toolName: string) => boolean {
  if (!name.includes('|')) {
    if (!TOOL_NAME.test(name)) throw invalid(raw, `bad tool name "${name}"`);
    return (toolName) => toolName === name;
  }
  let regex: RegExp;
  try {
    regex = new RegExp(`^(?:${name})$`);
  } catch (error) {
    throw invalid(raw, errorMessage(error));
  }
  return (toolName) => regex.test(toolName);
}

/**
 * Parse `ToolName` or `ToolName(arg)`. Throws `EngineError('INVALID_PATTERN')`.
 * A name containing `|` is a regex alternation over tool names; its argument is compiled for
 * every argument family that accepts it.
 */
export function parsePermissionPattern(text: string): PermissionPattern {
  const raw = text.trim();
  if (!raw) throw invalid(text, 'empty pattern');

  const open = raw.indexOf('(');
  if (open === -1) {
    return {
      raw,
      toolName: raw,
      matchesTool: compileToolMatcher(raw, raw),
      argumentMatchers: new Map(),
    };
  }

  if (!raw.endsWith(')')) throw invalid(raw, 'missing closing ")"');
  const name = raw.slice(0, open).trim();
  if (!name) throw invalid(raw, 'missing tool name');
  const argument = raw.slice(open + 1, -1).trim();
  const matchesTool = compileToolMatcher(raw, name);

  const argumentMatchers = new Map<ArgumentFamily, ArgumentMatcher>();
  if (!name.includes('|')) {
    const family = argumentFamily(name);
    argumentMatchers.set(family, COMPILERS[family](raw, argument));
  } else {
    const failures: string[] = [];
    for (const family of ALL_FAMILIES) {
      try {
        argumentMatchers.set(family, COMPILERS[family](raw, argument));
      } catch (error) {
        failures.push(errorMessage(error));
      }
    }
    if (argumentMatchers.size === 0) throw invalid(raw, failures[0] ?? 'no tool accepts this argument');
  }

  return { raw, toolName: name, argument, matchesTool, argumentMatchers };
}

/** Like `parsePermissionPattern`, but logs and returns undefined for invalid text. */
export function tryParsePermissionPattern(text: string, source = 'permissions'): PermissionPattern | undefined {
  try {
    return parsePermissionPattern(text);
  } catch (error) {
    console.warn(`[permissions] Ignoring invalid pattern from ${source}: ${errorMessage(error)}`);
    return undefined;
  }
}

/** Compile stored pattern text; invalid entries are logged and left out. */
export function compilePatterns(texts: readonly string[], source?: string): PermissionPattern[] {
  const patterns: PermissionPattern[] = [];
  for (const text of texts) {
    const pattern = tryParsePermissionPattern(text, source);
    if (pattern) patterns.push(pattern);
  }
  return patterns;
}

export function matchesPattern(
  pattern: PermissionPattern,
  toolName: string,
  input: JsonObject,
  ctx: MatchContext = {}
): boolean {
  if (!pattern.matchesTool(toolName)) return false;
  if (pattern.argument === undefined) return true;

  const matcher = pattern.argumentMatchers.get(argumentFamily(toolName));
  if (!matcher) return false;
  try {
    return matcher(parseToolInput(toolName, input), ctx);
  } catch (error) {
    console.warn(`[permissions] Pattern "${pattern.raw}" failed while matching: ${errorMessage(error)}`);
    return false;
  }
}

export function findMatch(
  patterns: readonly PermissionPattern[],
  toolName: string,
  input: JsonObject,
  ctx: MatchContext = {}
): PermissionPattern | undefined {
  return patterns.find((pattern) => matchesPattern(pattern, toolName, input, ctx));
}

/** Allow on any matching pattern, otherwise ask with the pattern that would cover the call. */
export function checkPermission(
  toolName: string,
  input: JsonObject,
  patterns: readonly PermissionPattern[],
  ctx: MatchContext = {}
): PermissionDecision {
  const match = findMatch(patterns, toolName, input, ctx);
  if (match) {
    return { behavior: 'allow', reason: `Matched allow pattern ${match.raw}`, matchedPattern: match.raw };
  }
  return { behavior: 'ask', reason: 'No allow pattern matched', inferredPattern: inferPattern(toolName, input) };
}
