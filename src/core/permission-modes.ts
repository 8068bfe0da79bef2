import { JsonObject } from './types';
import { PermissionBehavior } from '../permissions/types';

export interface PermissionModeContext {
  toolName: string;
  input: JsonObject;
  /** Pattern that would cover this call if the user chose to remember it. */
  inferredPattern: string;
}

/** Decides a call no rule covered. */
export type PermissionModeHandler = (ctx: PermissionModeContext) => PermissionBehavior;

export class PermissionModeRegistry {
  private handlers = new Map<string, PermissionModeHandler>();
  private customModes = new Set<string>();

  register(mode: string, handler: PermissionModeHandler, isBuiltIn = false) {
    this.handlers.set(mode, handler);
    if (!isBuiltIn) {
      this.customModes.add(mode);
    }
  }

  get(mode: string): PermissionModeHandler | undefined {
    return this.handlers.get(mode);
  }

  list(): string[] {
    return Array.from(this.handlers.keys());
  }

  isBuiltIn(mode: string): boolean {
    return this.handlers.has(mode) && !this.customModes.has(mode);
  }
}

export const permissionModes = new PermissionModeRegistry();

// 内置模式
permissionModes.register('ask', () => 'ask', true);
permissionModes.register('deny', () => 'deny', true);
permissionModes.register('allow', () => 'allow', true);
