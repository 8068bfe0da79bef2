import { SettingsStore } from '../infra/settings-store';
import { PermissionPattern, compilePatterns, parsePermissionPattern } from './pattern';

/**
 * Compiled view of a project's durable allow/deny lists, shared by every session working in
 * that project. Reads see a consistent array; writes go through the settings store.
 */
export class ProjectRules {
  private allowPatterns: PermissionPattern[] = [];
  private denyPatterns: PermissionPattern[] = [];
  private loaded?: Promise<void>;

  constructor(readonly store: SettingsStore) {}

  get allow(): readonly PermissionPattern[] {
    return this.allowPatterns;
  }

  get deny(): readonly PermissionPattern[] {
    return this.denyPatterns;
  }

  /** Load once; later calls share the first load. A failed load is retried by the next call. */
  load(): Promise<void> {
    if (!this.loaded) {
      const loading = this.reload();
      this.loaded = loading;
      loading.catch(() => {
        if (this.loaded === loading) this.loaded = undefined;
      });
    }
    return this.loaded;
  }

  async reload(): Promise<void> {
    const rules = await this.store.readRules();
    this.allowPatterns = compilePatterns(rules.allow, this.store.filePath);
    this.denyPatterns = compilePatterns(rules.deny, this.store.filePath);
  }

  /** Persist an allow pattern. Throws `INVALID_PATTERN` before touching the file. */
  async addAllow(text: string): Promise<PermissionPattern> {
    const pattern = parsePermissionPattern(text);
    await this.store.appendRule('allow', pattern.raw);
    if (!this.allowPatterns.some((existing) => existing.raw === pattern.raw)) {
      this.allowPatterns = [...this.allowPatterns, pattern];
    }
    return pattern;
  }
}
