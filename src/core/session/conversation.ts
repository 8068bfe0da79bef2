import { randomUUID } from 'crypto';
import { CumulativeResetScope } from '../config';
import {
  Attachment,
  CompletionFragment,
  Conversation,
  ConversationMessage,
  ErrorFragment,
  ResponseFragment,
  SessionState,
  StatusFragment,
  TextFragment,
  TokenUsage,
  ToolResultFragment,
  ToolUseFragment,
  UnknownFragment,
} from '../types';
import { renderText } from './text';

export const INTERRUPTED_MESSAGE = 'Interrupted by user';

export interface ConversationDelta {
  /** Messages created or updated by this fragment, in order. */
  changed: ConversationMessage[];
  createdIds: string[];
  turnComplete: boolean;
  nextState?: SessionState;
  toolUse?: { fragment: ToolUseFragment; messageId: string };
  toolResult?: { fragment: ToolResultFragment; orphaned: boolean };
  completion?: CompletionFragment;
  status?: StatusFragment;
  unknown?: UnknownFragment;
  error?: string;
}

export function emptyConversation(): Conversation {
  return {
    messages: [],
    totalInputTokens: 0,
    totalOutputTokens: 0,
    totalCacheReadTokens: 0,
    totalCacheCreationTokens: 0,
    totalCostUsd: 0,
    currentContextInputTokens: 0,
    currentContextCacheReadTokens: 0,
    currentContextCacheCreationTokens: 0,
    orphanedToolResults: [],
  };
}

function emptyDelta(): ConversationDelta {
  return { changed: [], createdIds: [], turnComplete: false };
}

/**
 * Folds decoded fragments into one session's conversation, strictly in arrival order.
 * Owns the id of the currently open streaming assistant message.
 */
export class ConversationStateMachine {
  private conversation: Conversation;
  private openMessageId?: string;
  private pendingWireId?: string;
  private toolUseIndex = new Map<string, string>();

  constructor(
    private readonly resetScope: CumulativeResetScope = 'segment',
    initial: Conversation = emptyConversation()
  ) {
    this.conversation = initial;
    for (const message of initial.messages) this.indexToolUses(message);
  }

  get current(): Conversation {
    return this.conversation;
  }

  get openMessage(): ConversationMessage | undefined {
    if (!this.openMessageId) return undefined;
    return this.findMessage(this.openMessageId);
  }

  /** Deep copy safe to hand to observers. */
  snapshot(): Conversation {
    return structuredClone(this.conversation);
  }

  render(message: ConversationMessage): string {
    return renderText(message, this.resetScope);
  }

  apply(fragment: ResponseFragment): ConversationDelta {
    const delta = emptyDelta();
    if (fragment.agentSessionId) this.conversation.agentSessionId = fragment.agentSessionId;
    if (fragment.usage) this.applyUsage(fragment.usage);

    switch (fragment.kind) {
      case 'text':
        this.applyText(fragment, delta);
        break;
      case 'tool-use':
        this.applyToolUse(fragment, delta);
        break;
      case 'tool-result':
        this.applyToolResult(fragment, delta);
        break;
      case 'user-message':
        if (!fragment.isReplay) {
          this.closeOpenMessage();
          this.append(
            this.createMessage({ role: 'user', messageType: 'userMessage', responses: [fragment], complete: true }),
            delta
          );
        }
        break;
      case 'compact-boundary':
        this.append(
          this.createMessage({ role: 'system', messageType: 'compactBoundary', responses: [fragment], complete: true }),
          delta
        );
        break;
      case 'compact-summary': {
        const message = this.createMessage({
          role: 'user',
          messageType: 'compactSummary',
          responses: [fragment],
          complete: true,
        });
        message.isCompactSummary = true;
        message.isVisibleInTranscriptOnly = fragment.isVisibleInTranscriptOnly;
        this.append(message, delta);
        break;
      }
      case 'completion':
        this.applyCompletion(fragment, delta);
        break;
      case 'error':
        this.applyError(fragment, delta);
        break;
      case 'status':
        if (fragment.subtype === 'message_start' && fragment.messageId) {
          this.startWireMessage(fragment.messageId);
        }
        delta.status = fragment;
        break;
      case 'meta':
        break;
      case 'unknown':
        delta.unknown = fragment;
        break;
    }

    return delta;
  }

  /** Record user input sent by this engine. */
  addUserMessage(text: string, attachments?: Attachment[]): ConversationDelta {
    const delta = emptyDelta();
    this.closeOpenMessage();
    const message = this.createMessage({
      role: 'user',
      messageType: 'userMessage',
      responses: [{ kind: 'user-message', content: text, isReplay: false }],
      complete: true,
    });
    if (attachments && attachments.length > 0) message.attachments = attachments;
    this.append(message, delta);
    return delta;
  }

  /** Finalize the in-flight turn and append an interruption marker. */
  markAborted(): ConversationDelta {
    const delta = emptyDelta();
    const open = this.openMessage;
    if (open) {
      this.finalize(open);
      delta.changed.push(open);
    }
    this.closeOpenMessage();
    const marker = this.createMessage({
      role: 'system',
      messageType: 'status',
      responses: [{ kind: 'status', subtype: 'aborted', message: INTERRUPTED_MESSAGE }],
      complete: true,
    });
    marker.error = INTERRUPTED_MESSAGE;
    this.append(marker, delta);
    delta.turnComplete = true;
    delta.nextState = 'IDLE';
    return delta;
  }

  /** Finalize whatever message is still streaming, e.g. after replaying a transcript. */
  settle(): ConversationDelta {
    const delta = emptyDelta();
    const open = this.openMessage;
    if (open) {
      this.finalize(open);
      delta.changed.push(open);
    }
    this.closeOpenMessage();
    this.pendingWireId = undefined;
    return delta;
  }

  /** Record an engine-side failure, such as a subprocess that failed to start. */
  recordError(message: string): ConversationDelta {
    return this.apply({ kind: 'error', message });
  }

  clearError(): void {
    this.conversation.currentError = undefined;
  }

  private applyUsage(usage: TokenUsage): void {
    const c = this.conversation;
    c.totalInputTokens += usage.inputTokens;
    c.totalOutputTokens += usage.outputTokens;
    c.totalCacheReadTokens += usage.cacheReadInputTokens;
    c.totalCacheCreationTokens += usage.cacheCreationInputTokens;
    c.currentContextInputTokens = usage.inputTokens;
    c.currentContextCacheReadTokens = usage.cacheReadInputTokens;
    c.currentContextCacheCreationTokens = usage.cacheCreationInputTokens;
  }

  private applyText(fragment: TextFragment, delta: ConversationDelta): void {
    const message = this.ensureOpenAssistant(fragment.messageId, delta);
    message.responses.push(fragment);
    delta.nextState = 'RECEIVING_RESPONSE';

    if (fragment.stopReason === 'end_turn') {
      this.finalize(message);
      this.closeOpenMessage();
      delta.turnComplete = true;
      delta.nextState = 'IDLE';
    }
    this.touch(message, delta);
  }

  private applyToolUse(fragment: ToolUseFragment, delta: ConversationDelta): void {
    const message = this.ensureOpenAssistant(fragment.messageId, delta);
    message.responses.push(fragment);
    this.toolUseIndex.set(fragment.toolUseId, message.id);
    delta.toolUse = { fragment, messageId: message.id };
    delta.nextState = 'PROCESSING';
    this.touch(message, delta);
  }

  private applyToolResult(fragment: ToolResultFragment, delta: ConversationDelta): void {
    delta.nextState = 'PROCESSING';
    const holderId = this.toolUseIndex.get(fragment.toolUseId);
    const holder = holderId ? this.findMessage(holderId) : undefined;

    if (holder && this.isMutable(holder)) {
      holder.responses.push(fragment);
      delta.toolResult = { fragment, orphaned: false };
      this.touch(holder, delta);
      return;
    }

    const orphaned = holder === undefined;
    if (orphaned) this.conversation.orphanedToolResults.push(fragment.toolUseId);
    this.append(
      this.createMessage({ role: 'user', messageType: 'normal', responses: [fragment], complete: true }),
      delta
    );
    delta.toolResult = { fragment, orphaned };
  }

  private applyCompletion(fragment: CompletionFragment, delta: ConversationDelta): void {
    if (fragment.costUsd !== undefined) this.conversation.totalCostUsd += fragment.costUsd;

    const errorText = fragment.isError ? fragment.resultText || fragment.stopReason : undefined;
    let message = this.openMessage;
    if (!message && (errorText !== undefined || !this.lastAssistantCompleted())) {
      message = this.createMessage({ role: 'assistant', messageType: 'completion', responses: [], complete: false });
      this.append(message, delta);
    }
    if (message) {
      message.responses.push(fragment);
      if (errorText !== undefined) message.error = errorText;
      this.finalize(message);
      this.touch(message, delta);
    }
    this.closeOpenMessage();
    if (errorText !== undefined) {
      this.conversation.currentError = errorText;
      delta.error = errorText;
    }

    delta.completion = fragment;
    delta.turnComplete = true;
    delta.nextState = fragment.isError ? 'ERROR' : 'IDLE';
  }

  private applyError(fragment: ErrorFragment, delta: ConversationDelta): void {
    let message = this.openMessage;
    if (message) {
      message.responses.push(fragment);
    } else {
      message = this.createMessage({ role: 'system', messageType: 'error', responses: [fragment], complete: false });
      this.append(message, delta);
    }
    message.error = fragment.message;
    this.finalize(message);
    this.closeOpenMessage();
    this.touch(message, delta);

    this.conversation.currentError = fragment.message;
    delta.error = fragment.message;
    delta.nextState = 'ERROR';
  }

  private ensureOpenAssistant(wireId: string | undefined, delta: ConversationDelta): ConversationMessage {
    const open = this.openMessage;
    if (open && open.role === 'assistant' && !open.isComplete) {
      if (!wireId || open.wireMessageId === wireId) return open;
      if (!open.wireMessageId) {
        open.wireMessageId = wireId;
        return open;
      }
    }

    const declared = wireId ?? this.pendingWireId;
    this.pendingWireId = undefined;
    const message = this.createMessage({
      role: 'assistant',
      messageType: 'normal',
      responses: [],
      complete: false,
      wireId: declared,
    });
    this.append(message, delta);
    this.openMessageId = message.id;
    return message;
  }

  private startWireMessage(wireId: string): void {
    const open = this.openMessage;
    if (open && open.wireMessageId === wireId) return;
    if (open && !open.wireMessageId) {
      open.wireMessageId = wireId;
      return;
    }
    this.closeOpenMessage();
    this.pendingWireId = wireId;
  }

  /** True when the latest message is an assistant message that already ended its turn. */
  private lastAssistantCompleted(): boolean {
    const last = this.conversation.messages[this.conversation.messages.length - 1];
    return last !== undefined && last.role === 'assistant' && last.isComplete;
  }

  private closeOpenMessage(): void {
    this.openMessageId = undefined;
  }

  private finalize(message: ConversationMessage): void {
    message.isStreaming = false;
    message.isComplete = true;
  }

  private isMutable(message: ConversationMessage): boolean {
    if (message.isComplete) return false;
    const last = this.conversation.messages[this.conversation.messages.length - 1];
    return message === last || message.id === this.openMessageId;
  }

  private createMessage(opts: {
    role: ConversationMessage['role'];
    messageType: ConversationMessage['messageType'];
    responses: ResponseFragment[];
    complete: boolean;
    wireId?: string;
  }): ConversationMessage {
    const message: ConversationMessage = {
      id: opts.wireId ?? `msg-${randomUUID()}`,
      role: opts.role,
      messageType: opts.messageType,
      responses: opts.responses,
      isStreaming: !opts.complete,
      isComplete: opts.complete,
      timestamp: Date.now(),
    };
    if (opts.wireId) message.wireMessageId = opts.wireId;
    return message;
  }

  private append(message: ConversationMessage, delta: ConversationDelta): void {
    this.conversation.messages.push(message);
    this.indexToolUses(message);
    delta.createdIds.push(message.id);
    this.touch(message, delta);
  }

  private touch(message: ConversationMessage, delta: ConversationDelta): void {
    if (!delta.changed.includes(message)) delta.changed.push(message);
  }

  private indexToolUses(message: ConversationMessage): void {
    for (const fragment of message.responses) {
      if (fragment.kind === 'tool-use') this.toolUseIndex.set(fragment.toolUseId, message.id);
    }
  }

  private findMessage(id: string): ConversationMessage | undefined {
    for (let i = this.conversation.messages.length - 1; i >= 0; i--) {
      if (this.conversation.messages[i].id === id) return this.conversation.messages[i];
    }
    return undefined;
  }
}
