import { z } from 'zod';
import tables from './safe-commands.json';
import { ParsedCommand, hasSubstitution, isCdWithinWorkingDir, normalizeCommand, parseCommand } from './bash-parser';

const SafeCommandTablesSchema = z.object({
  commands: z.array(z.string()),
  subcommands: z.record(z.array(z.string())),
  pipelineFilters: z.array(z.string()),
});

const TABLES = SafeCommandTablesSchema.parse(tables);
const SAFE_COMMANDS = new Set(TABLES.commands);
const SAFE_SUBCOMMANDS = new Map(Object.entries(TABLES.subcommands).map(([name, list]) => [name, new Set(list)]));
const PIPELINE_FILTERS = new Set(TABLES.pipelineFilters);

/** Stdout redirection (`>`, `>>`, `1>`), leaving `2>` and `2>&1` alone. */
const STDOUT_REDIRECT = /(?<!2)>(?!&1)/;

const FIND_ACTIONS = new Set(['-delete', '-exec', '-execdir', '-ok', '-okdir', '-fprint', '-fprint0', '-fprintf', '-fls']);

/** awk programs can run commands through `system()` or pipe into one. */
const AWK_EXEC = /system\s*\(|\|/;

// Always denied, whatever the allow lists say.
const DANGEROUS_PATTERNS = [
  /rm\s+-rf\s+\/($|\s)/, // rm -rf /
  /(^|\s)sudo\s+/,
  /(^|\s)(shutdown|reboot)(\s|$)/,
  /mkfs\./,
  /dd\s+.*of=\/dev\//,
  /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/, // fork bomb
  /chmod\s+(-R\s+)?777\s+\/($|\s)/,
  /(curl|wget)\s+.*\|\s*(bash|sh|zsh)(\s|$)/,
  />\s*\/dev\/sd[a-z]/,
  /(^|\s)(mkswap|swapon)(\s|$)/,
];

function words(command: string): string[] {
  return normalizeCommand(command).split(' ').filter(Boolean);
}

export function isDangerousCommand(command: string): boolean {
  return DANGEROUS_PATTERNS.some((pattern) => pattern.test(command));
}

function hasDangerousFlags(command: string, name: string, args: string[]): boolean {
  if (STDOUT_REDIRECT.test(command)) return true;
  if (name === 'find' && args.some((arg) => FIND_ACTIONS.has(arg))) return true;
  if (name === 'sed' && args.some((arg) => arg === '-i' || arg.startsWith('-i') || arg === '--in-place')) return true;
  if (name === 'awk' && AWK_EXEC.test(command)) return true;
  return false;
}

/** A single (non-compound) command that only reads. */
export function isCommandSafe(command: string): boolean {
  if (hasSubstitution(command)) return false;
  const [name, ...args] = words(command);
  if (!name || !SAFE_COMMANDS.has(name)) return false;
  if (hasDangerousFlags(command, name, args)) return false;

  const subcommands = SAFE_SUBCOMMANDS.get(name);
  if (subcommands) {
    return args.length > 0 && subcommands.has(args[0]);
  }
  return true;
}

export function isSafeOutputFilter(command: string): boolean {
  if (hasSubstitution(command)) return false;
  const [name, ...args] = words(command);
  if (!name || !PIPELINE_FILTERS.has(name)) return false;
  return !hasDangerousFlags(command, name, args);
}

function isSafePart(parsed: ParsedCommand, cwd?: string): boolean {
  if (parsed.type === 'cd') return cwd !== undefined && isCdWithinWorkingDir(parsed.command, cwd);
  if (parsed.type === 'pipeline-part' && isSafeOutputFilter(parsed.command)) return true;
  return isCommandSafe(parsed.command);
}

/**
 * A possibly compound bash command made only of read-only parts: safe commands, safe
 * pipeline filters and `cd` within the working directory.
 */
export function isSafeBashCommand(command: string, cwd?: string): boolean {
  if (hasSubstitution(command)) return false;
  const parsed = parseCommand(command);
  if (parsed.length === 0) return false;
  return parsed.every((part) => isSafePart(part, cwd));
}
