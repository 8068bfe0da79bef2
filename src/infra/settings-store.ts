import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { EngineError, errorMessage } from '../core/errors';

const RuleEntriesSchema = z.array(z.unknown());

const SettingsFileSchema = z
  .object({
    permissions: z.record(z.unknown()).optional(),
  })
  .passthrough();

type SettingsFile = z.infer<typeof SettingsFileSchema>;

export interface PermissionRules {
  allow: string[];
  deny: string[];
  ask: string[];
}

export type RuleList = keyof PermissionRules;

const RULE_LISTS: RuleList[] = ['allow', 'deny', 'ask'];

/** Durable, project-scoped permission rules. */
export interface SettingsStore {
  readonly filePath: string;
  readRules(): Promise<PermissionRules>;
  /** Append `pattern` to `list`; resolves false when it was already present. */
  appendRule(list: RuleList, pattern: string): Promise<boolean>;
}

export function settingsPath(projectDir: string): string {
  return path.join(projectDir, '.claude', 'settings.local.json');
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// Writes to one file are chained here, whichever store instance issues them.
const writeLocks = new Map<string, Promise<unknown>>();

function withFileLock<T>(filePath: string, task: () => Promise<T>): Promise<T> {
  const previous = writeLocks.get(filePath) ?? Promise.resolve();
  const next = previous.then(task, task);
  const settled = next.then(
    () => undefined,
    () => undefined
  );
  writeLocks.set(filePath, settled);
  void settled.then(() => {
    if (writeLocks.get(filePath) === settled) writeLocks.delete(filePath);
  });
  return next;
}

/**
 * `settings.local.json` under the project's `.claude` directory. Keys other than
 * `permissions.allow/deny/ask` are preserved on write.
 */
export class SettingsFileStore implements SettingsStore {
  readonly filePath: string;

  constructor(projectDir: string, filePath: string = settingsPath(projectDir)) {
    this.filePath = filePath;
  }

  /** Entries that are not strings, and lists that are not arrays, are logged and left out. */
  async readRules(): Promise<PermissionRules> {
    const permissions = (await this.readFile()).permissions ?? {};
    const rules: PermissionRules = { allow: [], deny: [], ask: [] };
    for (const list of RULE_LISTS) {
      const entries = this.entries(permissions, list);
      if (!entries) {
        console.warn(`[permissions] Ignoring permissions.${list} in ${this.filePath}: expected an array`);
        continue;
      }
      entries.forEach((entry, index) => {
        if (typeof entry === 'string') {
          rules[list].push(entry);
        } else {
          console.warn(`[permissions] Ignoring non-string entry permissions.${list}[${index}] in ${this.filePath}`);
        }
      });
    }
    return rules;
  }

  /** Stored entries, including ones `readRules` skips, are written back unchanged. */
  appendRule(list: RuleList, pattern: string): Promise<boolean> {
    return withFileLock(this.filePath, async () => {
      const settings = await this.readFile();
      const permissions = { ...(settings.permissions ?? {}) };
      const entries = this.entries(permissions, list);
      if (!entries) {
        throw new EngineError('INVALID_CONFIG', `Settings file ${this.filePath}: permissions.${list} is not an array`);
      }
      if (entries.includes(pattern)) return false;

      for (const name of RULE_LISTS) {
        if (permissions[name] === undefined) permissions[name] = [];
      }
      permissions[list] = [...entries, pattern];
      await this.writeAtomic({ ...settings, permissions });
      return true;
    });
  }

  /** The raw entries of one list; undefined when the value is not an array. */
  private entries(permissions: Record<string, unknown>, list: RuleList): unknown[] | undefined {
    const value = permissions[list];
    if (value === undefined) return [];
    const parsed = RuleEntriesSchema.safeParse(value);
    return parsed.success ? parsed.data : undefined;
  }

  private async readFile(): Promise<SettingsFile> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissing(error)) return {};
      throw error;
    }
    if (!text.trim()) return {};

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new EngineError('INVALID_CONFIG', `Settings file ${this.filePath} is not valid JSON: ${errorMessage(error)}`);
    }
    const parsed = SettingsFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new EngineError('INVALID_CONFIG', `Settings file ${this.filePath} is malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async writeAtomic(content: unknown): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const temp = `${this.filePath}.${randomUUID()}.tmp`;
    await fs.writeFile(temp, JSON.stringify(content, null, 2) + '\n');
    try {
      await fs.rename(temp, this.filePath);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw error;
    }
  }
}
