import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { EngineError, errorMessage } from '../core/errors';
import { SessionInfo, Timeline } from '../core/types';

const SessionInfoSchema = z.object({
  sessionId: z.string(),
  workingDirectory: z.string(),
  agentSessionId: z.string().optional(),
  parentId: z.string().optional(),
  name: z.string().optional(),
  createdAt: z.string(),
});

const TimelineSchema = z.object({
  seq: z.number(),
  event: z.object({ type: z.string(), seq: z.number() }).passthrough(),
});

/** A timeline entry read back from disk; only the envelope is validated. */
export type PersistedTimeline = z.infer<typeof TimelineSchema>;

export interface Store {
  /** Append one raw wire line to the session transcript. */
  appendTranscript(sessionId: string, line: string): Promise<void>;
  readTranscript(sessionId: string): Promise<string[]>;

  appendEvent(sessionId: string, timeline: Timeline): Promise<void>;
  readEvents(sessionId: string, since?: number): AsyncIterable<PersistedTimeline>;

  saveInfo(sessionId: string, info: SessionInfo): Promise<void>;
  loadInfo(sessionId: string): Promise<SessionInfo | undefined>;

  exists(sessionId: string): Promise<boolean>;
  delete(sessionId: string): Promise<void>;
  list(prefix?: string): Promise<string[]>;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readText(file: string): Promise<string | undefined> {
  try {
    return await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (isMissing(error)) return undefined;
    throw error;
  }
}

function splitLines(data: string): string[] {
  return data.split('\n').filter((line) => line.trim());
}

/**
 * One directory per session under `baseDir`:
 * `transcript.jsonl` (raw wire lines), `events.jsonl` (event timeline) and `info.json`.
 */
export class JSONStore implements Store {
  private writes = new Map<string, Promise<void>>();

  constructor(private baseDir: string) {}

  private async getPath(sessionId: string, file: string): Promise<string> {
    const dir = path.join(this.baseDir, sessionId);
    await fs.mkdir(dir, { recursive: true });
    return path.join(dir, file);
  }

  /** Appends to one file run in call order. */
  private serialize(key: string, task: () => Promise<void>): Promise<void> {
    const previous = this.writes.get(key) ?? Promise.resolve();
    const next = previous.catch(() => undefined).then(task);
    this.writes.set(key, next);
    return next.finally(() => {
      if (this.writes.get(key) === next) this.writes.delete(key);
    });
  }

  appendTranscript(sessionId: string, line: string): Promise<void> {
    return this.serialize(`${sessionId}/transcript`, async () => {
      await fs.appendFile(await this.getPath(sessionId, 'transcript.jsonl'), line + '\n');
    });
  }

  async readTranscript(sessionId: string): Promise<string[]> {
    const data = await readText(path.join(this.baseDir, sessionId, 'transcript.jsonl'));
    return data === undefined ? [] : splitLines(data);
  }

  appendEvent(sessionId: string, timeline: Timeline): Promise<void> {
    return this.serialize(`${sessionId}/events`, async () => {
      await fs.appendFile(await this.getPath(sessionId, 'events.jsonl'), JSON.stringify(timeline) + '\n');
    });
  }

  /** Persisted timeline entries; lines that do not parse are skipped. */
  async *readEvents(sessionId: string, since?: number): AsyncIterable<PersistedTimeline> {
    const data = await readText(path.join(this.baseDir, sessionId, 'events.jsonl'));
    if (data === undefined) return;

    for (const line of splitLines(data)) {
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        console.warn(`[store] Skipping corrupt event line for ${sessionId}`);
        continue;
      }
      const parsed = TimelineSchema.safeParse(json);
      if (!parsed.success) continue;
      if (since !== undefined && parsed.data.seq < since) continue;
      yield parsed.data;
    }
  }

  async saveInfo(sessionId: string, info: SessionInfo): Promise<void> {
    await fs.writeFile(await this.getPath(sessionId, 'info.json'), JSON.stringify(info, null, 2));
  }

  /** Throws `STORE_CORRUPT` when `info.json` is not valid JSON; a wrong shape reads as missing. */
  async loadInfo(sessionId: string): Promise<SessionInfo | undefined> {
    const file = path.join(this.baseDir, sessionId, 'info.json');
    const data = await readText(file);
    if (data === undefined) return undefined;

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (error) {
      throw new EngineError('STORE_CORRUPT', `Session info ${file} is not valid JSON: ${errorMessage(error)}`, error);
    }
    const parsed = SessionInfoSchema.safeParse(json);
    return parsed.success ? parsed.data : undefined;
  }

  async exists(sessionId: string): Promise<boolean> {
    try {
      await fs.access(path.join(this.baseDir, sessionId));
      return true;
    } catch {
      return false;
    }
  }

  /** Waits for queued appends of the session so they cannot recreate the directory. */
  async delete(sessionId: string): Promise<void> {
    const queued = Array.from(this.writes.entries())
      .filter(([key]) => key.startsWith(`${sessionId}/`))
      .map(([, write]) => write.catch(() => undefined));
    await Promise.all(queued);
    const dir = path.join(this.baseDir, sessionId);
    await fs.rm(dir, { recursive: true, force: true });
  }

  async list(prefix?: string): Promise<string[]> {
    let dirs: string[];
    try {
      dirs = await fs.readdir(this.baseDir);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
    return prefix ? dirs.filter((d) => d.startsWith(prefix)) : dirs;
  }
}
