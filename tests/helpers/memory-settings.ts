import { PermissionRules, RuleList, SettingsStore } from '../../src/infra/settings-store';

/** In-memory durable rules for tests that do not exercise the settings file. */
export class MemorySettingsStore implements SettingsStore {
  readonly filePath = 'memory://settings.local.json';
  readonly rules: PermissionRules;
  appendCalls = 0;

  constructor(rules: Partial<PermissionRules> = {}) {
    this.rules = { allow: [...(rules.allow ?? [])], deny: [...(rules.deny ?? [])], ask: [...(rules.ask ?? [])] };
  }

  async readRules(): Promise<PermissionRules> {
    return { allow: [...this.rules.allow], deny: [...this.rules.deny], ask: [...this.rules.ask] };
  }

  async appendRule(list: RuleList, pattern: string): Promise<boolean> {
    this.appendCalls++;
    if (this.rules[list].includes(pattern)) return false;
    this.rules[list].push(pattern);
    return true;
  }
}
