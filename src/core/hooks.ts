import { Conversation, JsonObject } from './types';

export interface ToolCall {
  requestId: string;
  toolName: string;
  input: JsonObject;
  toolUseId?: string;
}

export interface ToolCallContext {
  sessionId: string;
  workingDirectory: string;
}

export interface ToolResultInfo {
  toolUseId: string;
  content: string;
  isError: boolean;
}

/** A hook's verdict on a tool call; undefined leaves the decision to the policy. */
export type HookDecision =
  | { behavior: 'allow'; updatedInput?: JsonObject; reason?: string }
  | { behavior: 'deny'; reason?: string }
  | undefined;

export interface Hooks {
  preToolUse?: (call: ToolCall, ctx: ToolCallContext) => HookDecision | Promise<HookDecision>;
  postToolUse?: (result: ToolResultInfo, ctx: ToolCallContext) => void | Promise<void>;
  messagesChanged?: (snapshot: Conversation) => void | Promise<void>;
}

export type HookName = keyof Hooks;

export interface RegisteredHook {
  origin: 'session' | 'pool';
  names: HookName[];
}

export class HookManager {
  private hooks: Array<{ hooks: Hooks; origin: 'session' | 'pool' }> = [];

  register(hooks: Hooks, origin: 'session' | 'pool' = 'session') {
    this.hooks.push({ hooks, origin });
  }

  getRegistered(): ReadonlyArray<RegisteredHook> {
    return this.hooks.map(({ hooks, origin }) => {
      const names: HookName[] = [];
      if (hooks.preToolUse) names.push('preToolUse');
      if (hooks.postToolUse) names.push('postToolUse');
      if (hooks.messagesChanged) names.push('messagesChanged');
      return { origin, names };
    });
  }

  /** First hook returning a decision wins. */
  async runPreToolUse(call: ToolCall, ctx: ToolCallContext): Promise<HookDecision> {
    for (const { hooks } of this.hooks) {
      if (hooks.preToolUse) {
        const result = await hooks.preToolUse(call, ctx);
        if (result) return result;
      }
    }
    return undefined;
  }

  async runPostToolUse(result: ToolResultInfo, ctx: ToolCallContext): Promise<void> {
    for (const { hooks } of this.hooks) {
      if (hooks.postToolUse) {
        await hooks.postToolUse(result, ctx);
      }
    }
  }

  async runMessagesChanged(snapshot: Conversation) {
    for (const { hooks } of this.hooks) {
      if (hooks.messagesChanged) {
        await hooks.messagesChanged(snapshot);
      }
    }
  }
}
