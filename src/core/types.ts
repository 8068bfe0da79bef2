// Core data structures for the agent session engine

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  cacheReadInputTokens: number;
  cacheCreationInputTokens: number;
}

export type JsonObject = Record<string, unknown>;

interface FragmentBase {
  /** Wire message id declared by the line (assistant `message.id`). */
  messageId?: string;
  /** Agent-side session id (`session_id`), used for `--resume`. */
  agentSessionId?: string;
  /** Side-channel token counters; only the first fragment of a line carries them. */
  usage?: TokenUsage;
}

export type TextFragment = FragmentBase & {
  kind: 'text';
  content: string;
  isPartial: boolean;
  isCumulative: boolean;
  stopReason?: string;
};

export type UserMessageFragment = FragmentBase & {
  kind: 'user-message';
  content: string;
  isReplay: boolean;
};

export type ToolUseFragment = FragmentBase & {
  kind: 'tool-use';
  toolName: string;
  parameters: JsonObject;
  toolUseId: string;
  stopReason?: string;
};

export type ToolResultFragment = FragmentBase & {
  kind: 'tool-result';
  toolUseId: string;
  content: string;
  isError: boolean;
};

export type CompactBoundaryFragment = FragmentBase & {
  kind: 'compact-boundary';
  trigger: string;
  preTokens: number;
  content: string;
};

export type CompactSummaryFragment = FragmentBase & {
  kind: 'compact-summary';
  content: string;
  isVisibleInTranscriptOnly: boolean;
};

export type CompletionFragment = FragmentBase & {
  kind: 'completion';
  stopReason: string;
  isError: boolean;
  resultText?: string;
  costUsd?: number;
  durationMs?: number;
};

export type ErrorFragment = FragmentBase & {
  kind: 'error';
  message: string;
  details?: string;
};

export type StatusFragment = FragmentBase & {
  kind: 'status';
  subtype: string;
  message?: string;
};

export type MetaFragment = FragmentBase & {
  kind: 'meta';
  model?: string;
  tools: string[];
};

export type UnknownFragment = FragmentBase & {
  kind: 'unknown';
  type: string;
  raw: JsonObject;
};

export type ResponseFragment =
  | TextFragment
  | UserMessageFragment
  | ToolUseFragment
  | ToolResultFragment
  | CompactBoundaryFragment
  | CompactSummaryFragment
  | CompletionFragment
  | ErrorFragment
  | StatusFragment
  | MetaFragment
  | UnknownFragment;

export type Attachment =
  | { type: 'image'; path?: string; data?: string; mediaType?: string }
  | { type: 'document'; text: string; title?: string }
  | { type: 'file'; path: string };

export type MessageRole = 'user' | 'assistant' | 'system';

export type MessageType =
  | 'normal'
  | 'compactBoundary'
  | 'compactSummary'
  | 'status'
  | 'meta'
  | 'completion'
  | 'error'
  | 'unknown'
  | 'userMessage';

export interface ConversationMessage {
  id: string;
  /** Id declared on the wire, when one has been seen for this message. */
  wireMessageId?: string;
  role: MessageRole;
  messageType: MessageType;
  responses: ResponseFragment[];
  isStreaming: boolean;
  /** Once true the message is never mutated again. */
  isComplete: boolean;
  timestamp: number;
  attachments?: Attachment[];
  error?: string;
  isCompactSummary?: boolean;
  isVisibleInTranscriptOnly?: boolean;
}

export interface TokenTotals {
  totalInputTokens: number;
  totalOutputTokens: number;
  totalCacheReadTokens: number;
  totalCacheCreationTokens: number;
  totalCostUsd: number;
}

export interface ContextCounters {
  currentContextInputTokens: number;
  currentContextCacheReadTokens: number;
  currentContextCacheCreationTokens: number;
}

export interface Conversation extends TokenTotals, ContextCounters {
  messages: ConversationMessage[];
  currentError?: string;
  agentSessionId?: string;
  orphanedToolResults: string[];
}

export type SessionState = 'IDLE' | 'SENDING_MESSAGE' | 'PROCESSING' | 'RECEIVING_RESPONSE' | 'ERROR';

export type HistorySource = 'store' | 'agent-transcript' | 'none';

export type SessionEventPayload =
  | { type: 'connected'; pid?: number; agentSessionId?: string }
  | { type: 'history'; source: HistorySource; messages: ConversationMessage[] }
  | { type: 'message'; message: ConversationMessage; isNew: boolean }
  | { type: 'status'; state: SessionState; previous?: SessionState; detail?: string }
  | { type: 'tool-use'; toolUseId: string; toolName: string; parameters: JsonObject; messageId: string }
  | { type: 'tool-result'; toolUseId: string; content: string; isError: boolean; orphaned: boolean }
  | {
      type: 'permission-request';
      requestId: string;
      toolName: string;
      input: JsonObject;
      inferredPattern: string;
      reason: string;
    }
  | { type: 'permission-timeout'; requestId: string; toolName: string }
  | { type: 'agent-spawned'; agentId: string; parentId?: string; name?: string }
  | { type: 'agent-terminated'; agentId: string; reason: string }
  | { type: 'done'; stopReason: string; totals: TokenTotals }
  | { type: 'aborted'; exitCode: number | null; forced: boolean }
  | { type: 'error'; message: string; code?: string }
  | { type: 'unknown'; wireType: string; raw: JsonObject };

export type SessionEventKind = SessionEventPayload['type'];

export interface EventMeta {
  seq: number;
  eventId: string;
  timestamp: number;
  sessionId: string;
}

type WithMeta<T> = T extends unknown ? T & EventMeta : never;

export type SessionEvent = WithMeta<SessionEventPayload>;

export const ALL_EVENT_KINDS: SessionEventKind[] = [
  'connected',
  'history',
  'message',
  'status',
  'tool-use',
  'tool-result',
  'permission-request',
  'permission-timeout',
  'agent-spawned',
  'agent-terminated',
  'done',
  'aborted',
  'error',
  'unknown',
];

export interface Timeline {
  seq: number;
  event: SessionEvent;
}

export interface SubscribeOptions {
  since?: number;
  kinds?: SessionEventKind[];
}

export interface SessionInfo {
  sessionId: string;
  workingDirectory: string;
  agentSessionId?: string;
  parentId?: string;
  name?: string;
  createdAt: string;
}

export interface SessionStatus {
  sessionId: string;
  state: SessionState;
  isAborting: boolean;
  isRunning: boolean;
  hasQueuedMessage: boolean;
  messageCount: number;
  pendingPermissions: number;
  seq: number;
}
