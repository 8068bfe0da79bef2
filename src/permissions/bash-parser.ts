import path from 'path';

export type CommandType = 'simple' | 'cd' | 'pipeline-part';

export interface ParsedCommand {
  command: string;
  type: CommandType;
}

/** Collapse runs of whitespace to single spaces and trim. */
export function normalizeCommand(command: string): string {
  return command.trim().replace(/\s+/g, ' ');
}

type Splitter = (command: string, index: number) => number;

/**
 * Split on operators outside single or double quotes. A backslash outside single quotes escapes
 * the next character. `operatorLength` returns how many characters the operator at `index`
 * spans, or 0 when there is none.
 */
function splitOutsideQuotes(command: string, operatorLength: Splitter): string[] {
  const parts: string[] = [];
  let buffer = '';
  let inSingle = false;
  let inDouble = false;
  let escaped = false;

  for (let i = 0; i < command.length; i++) {
    const char = command[i];
    if (escaped) {
      escaped = false;
    } else if (char === '\\' && !inSingle) {
      escaped = true;
    } else if (char === "'" && !inDouble) {
      inSingle = !inSingle;
    } else if (char === '"' && !inSingle) {
      inDouble = !inDouble;
    } else if (!inSingle && !inDouble) {
      const length = operatorLength(command, i);
      if (length > 0) {
        parts.push(buffer);
        buffer = '';
        i += length - 1;
        continue;
      }
    }
    buffer += char;
  }
  parts.push(buffer);
  return parts;
}

// `&` next to `>` is a redirection (`2>&1`, `&>`), not a background separator.
const logicalOperator: Splitter = (command, i) => {
  const char = command[i];
  const next = command[i + 1];
  if (char === ';' || char === '\n' || char === '\r') return 1;
  if (char === '&' && next === '&') return 2;
  if (char === '&' && command[i - 1] !== '>' && next !== '>') return 1;
  if (char === '|' && next === '|') return 2;
  return 0;
};

const pipeOperator: Splitter = (command, i) => {
  if (command[i] !== '|') return 0;
  if (command[i + 1] === '|' || command[i - 1] === '|') return 0;
  return 1;
};

/** Command or process substitution runs a nested command the sub-command split cannot see. */
export function hasSubstitution(command: string): boolean {
  return /\$\(|`|<\(|>\(/.test(command);
}

function commandType(command: string, inPipeline: boolean): CommandType {
  if (command.split(/\s+/)[0] === 'cd') return 'cd';
  return inPipeline ? 'pipeline-part' : 'simple';
}

/**
 * Parse a compound shell command into its sub-commands. `&&`, `||`, `;`, `&` and newlines
 * separate commands; `|` separates pipeline parts, which bind tighter.
 */
export function parseCommand(command: string): ParsedCommand[] {
  if (!command.trim()) return [];

  const result: ParsedCommand[] = [];
  for (const segment of splitOutsideQuotes(command, logicalOperator)) {
    const parts = splitOutsideQuotes(segment, pipeOperator)
      .map((part) => normalizeCommand(part))
      .filter(Boolean);
    const inPipeline = parts.length > 1;
    for (const part of parts) {
      result.push({ command: part, type: commandType(part, inPipeline) });
    }
  }
  return result;
}

/** Whether `cd <dir>` stays inside `workingDir`. A bare `cd` or `~` target is outside. */
export function isCdWithinWorkingDir(cdCommand: string, workingDir: string): boolean {
  const parts = normalizeCommand(cdCommand).split(' ');
  if (parts[0] !== 'cd' || parts.length < 2) return false;

  const target = parts[1].replace(/^(['"])(.*)\1$/, '$2');
  if (target.startsWith('~') || target === '-') return false;

  const root = path.posix.normalize(workingDir).replace(/\/+$/, '') || '/';
  const absolute = target.startsWith('/') ? path.posix.normalize(target) : path.posix.normalize(path.posix.join(root, target));
  const resolved = absolute.length > 1 ? absolute.replace(/\/+$/, '') : absolute;
  return resolved === root || resolved.startsWith(root === '/' ? '/' : `${root}/`);
}
