import { promises as fs } from 'fs';
import path from 'path';
import fg from 'fast-glob';

/** Directory name the agent CLI uses for a project: `/` and `_` become `-`. */
export function encodeProjectDir(cwd: string): string {
  return cwd.replace(/[/_]/g, '-');
}

export function agentTranscriptPath(root: string, cwd: string, agentSessionId: string): string {
  return path.join(root, encodeProjectDir(cwd), `${agentSessionId}.jsonl`);
}

async function readLines(file: string): Promise<string[]> {
  const data = await fs.readFile(file, 'utf-8');
  return data.split('\n').filter((line) => line.trim());
}

/**
 * Reads the agent's own transcript of a session. Looks in the project directory first and then
 * in any project directory under `root` (a session resumed from another cwd).
 */
export class TranscriptLoader {
  constructor(private readonly root: string) {}

  async locate(cwd: string, agentSessionId: string): Promise<string | undefined> {
    const direct = agentTranscriptPath(this.root, cwd, agentSessionId);
    try {
      await fs.access(direct);
      return direct;
    } catch {
      const matches = await fg(`*/${fg.escapePath(agentSessionId)}.jsonl`, {
        cwd: this.root,
        absolute: true,
        onlyFiles: true,
      });
      return matches[0];
    }
  }

  async load(cwd: string, agentSessionId: string): Promise<string[] | undefined> {
    const file = await this.locate(cwd, agentSessionId);
    if (!file) return undefined;
    return readLines(file);
  }
}
