import { Conversation, ConversationMessage, ToolResultFragment, ToolUseFragment } from '../types';

export interface ToolInvocation {
  toolCall: ToolUseFragment;
  toolResult?: ToolResultFragment;
  messageId: string;
}

export function hasResult(invocation: ToolInvocation): boolean {
  return invocation.toolResult !== undefined;
}

export function isError(invocation: ToolInvocation): boolean {
  return invocation.toolResult?.isError ?? false;
}

/**
 * Human-readable tool name. `mcp__server-name__tool` becomes `Server Name: tool`.
 */
export function displayName(toolName: string): string {
  if (!toolName.startsWith('mcp__')) return toolName;
  const rest = toolName.slice('mcp__'.length);
  const split = rest.indexOf('__');
  if (split <= 0) return toolName;

  const server = rest
    .slice(0, split)
    .split(/[-_]/)
    .filter(Boolean)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(' ');
  return `${server}: ${rest.slice(split + 2)}`;
}

/** Pair every ToolUse in a message with its ToolResult by `toolUseId`. */
export function toolInvocations(message: ConversationMessage): ToolInvocation[] {
  const results = new Map<string, ToolResultFragment>();
  for (const fragment of message.responses) {
    if (fragment.kind === 'tool-result') results.set(fragment.toolUseId, fragment);
  }

  const invocations: ToolInvocation[] = [];
  for (const fragment of message.responses) {
    if (fragment.kind === 'tool-use') {
      invocations.push({ toolCall: fragment, toolResult: results.get(fragment.toolUseId), messageId: message.id });
    }
  }
  return invocations;
}

/** Results in a message whose ToolUse is not in the same message. */
export function unpairedResults(message: ConversationMessage): ToolResultFragment[] {
  const uses = new Set<string>();
  for (const fragment of message.responses) {
    if (fragment.kind === 'tool-use') uses.add(fragment.toolUseId);
  }
  return message.responses.filter(
    (fragment): fragment is ToolResultFragment => fragment.kind === 'tool-result' && !uses.has(fragment.toolUseId)
  );
}

/** Conversation-wide pairing, for results that landed in a later message. */
export function conversationToolInvocations(conversation: Conversation): ToolInvocation[] {
  const results = new Map<string, ToolResultFragment>();
  for (const message of conversation.messages) {
    for (const fragment of message.responses) {
      if (fragment.kind === 'tool-result' && !results.has(fragment.toolUseId)) {
        results.set(fragment.toolUseId, fragment);
      }
    }
  }

  const invocations: ToolInvocation[] = [];
  for (const message of conversation.messages) {
    for (const fragment of message.responses) {
      if (fragment.kind === 'tool-use') {
        invocations.push({ toolCall: fragment, toolResult: results.get(fragment.toolUseId), messageId: message.id });
      }
    }
  }
  return invocations;
}
