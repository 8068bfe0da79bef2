import { promises as fs } from 'fs';
import path from 'path';
import ignore from 'ignore';
import { normalizePath } from './pattern';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Rules of the `.gitignore` at the root of a working directory. */
export class GitignoreMatcher {
  private constructor(
    private readonly root: string,
    private readonly rules: ReturnType<typeof ignore>
  ) {}

  static fromRules(root: string, text: string): GitignoreMatcher {
    return new GitignoreMatcher(normalizePath(root), ignore().add(text));
  }

  /** A missing `.gitignore` ignores nothing. */
  static async load(root: string): Promise<GitignoreMatcher> {
    let text = '';
    try {
      text = await fs.readFile(path.join(root, '.gitignore'), 'utf-8');
    } catch (error) {
      if (!isMissing(error)) throw error;
    }
    return GitignoreMatcher.fromRules(root, text);
  }

  /** Paths outside the root are never ignored. */
  ignores(filePath: string): boolean {
    if (!filePath) return false;
    const absolute = filePath.startsWith('/')
      ? normalizePath(filePath)
      : normalizePath(path.posix.join(this.root, filePath));
    const relative = path.posix.relative(this.root, absolute);
    if (!relative || relative.startsWith('..') || path.posix.isAbsolute(relative)) return false;
    return this.rules.ignores(relative);
  }
}
