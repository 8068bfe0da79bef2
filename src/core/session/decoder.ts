import { z } from 'zod';
import {
  CompactBoundaryFragment,
  CompactSummaryFragment,
  CompletionFragment,
  JsonObject,
  ResponseFragment,
  TokenUsage,
  ToolResultFragment,
} from '../types';
import { decodeEntities, decodeEntitiesDeep } from './entities';

const EnvelopeSchema = z
  .object({
    type: z.string(),
    subtype: z.string().optional(),
    session_id: z.string().optional(),
  })
  .passthrough();

const UsageSchema = z
  .object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional(),
    cache_read_input_tokens: z.number().optional(),
    cache_creation_input_tokens: z.number().optional(),
  })
  .passthrough();

/** Lines carried by the control channel rather than the conversation stream. */
const CONTROL_TYPES = new Set(['control_request', 'control_response', 'control_cancel_request', 'keep_alive']);

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: JsonObject, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

function readBoolean(source: JsonObject, ...keys: string[]): boolean | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'boolean') return value;
  }
  return undefined;
}

function readNumber(source: JsonObject, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
  }
  return undefined;
}

function readRecord(source: JsonObject, key: string): JsonObject | undefined {
  const value = source[key];
  return isRecord(value) ? value : undefined;
}

/** Parse one raw line into a JSON object, or undefined when it is not structured data. */
export function parseLine(raw: string): JsonObject | undefined {
  const trimmed = raw.trim();
  if (!trimmed) return undefined;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Token counters reported by a line. `message.usage` is preferred over a top-level
 * `usage`; all-zero counters mean nothing was reported.
 */
export function extractUsage(payload: JsonObject): TokenUsage | undefined {
  const message = readRecord(payload, 'message');
  const source = (message && readRecord(message, 'usage')) ?? readRecord(payload, 'usage');
  if (!source) return undefined;

  const parsed = UsageSchema.safeParse(source);
  if (!parsed.success) return undefined;

  const usage: TokenUsage = {
    inputTokens: parsed.data.input_tokens ?? 0,
    outputTokens: parsed.data.output_tokens ?? 0,
    cacheReadInputTokens: parsed.data.cache_read_input_tokens ?? 0,
    cacheCreationInputTokens: parsed.data.cache_creation_input_tokens ?? 0,
  };
  const reported =
    usage.inputTokens + usage.outputTokens + usage.cacheReadInputTokens + usage.cacheCreationInputTokens;
  return reported > 0 ? usage : undefined;
}

export function extractMessageId(payload: JsonObject): string | undefined {
  const message = readRecord(payload, 'message');
  return message ? readString(message, 'id') : undefined;
}

function textOfBlocks(content: unknown): string {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return '';
  const parts: string[] = [];
  for (const block of content) {
    if (isRecord(block) && block.type === 'text') {
      const text = readString(block, 'text');
      if (text !== undefined) parts.push(text);
    }
  }
  return parts.join('\n');
}

function decodeUser(payload: JsonObject): ResponseFragment[] {
  if (readBoolean(payload, 'isMeta', 'is_meta')) return [];

  const message = readRecord(payload, 'message');
  const content = message ? message.content : payload.content;

  if (readBoolean(payload, 'isCompactSummary', 'is_compact_summary')) {
    const summary: CompactSummaryFragment = {
      kind: 'compact-summary',
      content: textOfBlocks(content),
      isVisibleInTranscriptOnly:
        readBoolean(payload, 'isVisibleInTranscriptOnly', 'is_visible_in_transcript_only') ?? true,
    };
    return [summary];
  }

  if (Array.isArray(content)) {
    const results: ToolResultFragment[] = [];
    for (const block of content) {
      if (!isRecord(block) || block.type !== 'tool_result') continue;
      results.push({
        kind: 'tool-result',
        toolUseId: readString(block, 'tool_use_id') ?? '',
        content: decodeEntities(textOfBlocks(block.content)),
        isError: readBoolean(block, 'is_error') ?? false,
      });
    }
    if (results.length > 0) return results;
  }

  return [
    {
      kind: 'user-message',
      content: textOfBlocks(content),
      isReplay: readBoolean(payload, 'isReplay', 'is_replay') ?? false,
    },
  ];
}

function decodeAssistant(payload: JsonObject): ResponseFragment[] {
  const message = readRecord(payload, 'message');
  if (!message) return [];
  const content = message.content;
  if (typeof content === 'string') {
    return content ? [{ kind: 'text', content: decodeEntities(content), isPartial: false, isCumulative: true }] : [];
  }
  if (!Array.isArray(content)) return [];

  const fragments: ResponseFragment[] = [];
  content.forEach((block, index) => {
    if (!isRecord(block)) return;
    if (block.type === 'text') {
      const text = readString(block, 'text') ?? '';
      if (text) fragments.push({ kind: 'text', content: decodeEntities(text), isPartial: false, isCumulative: true });
    } else if (block.type === 'tool_use') {
      const input = block.input;
      fragments.push({
        kind: 'tool-use',
        toolName: decodeEntities(readString(block, 'name') ?? ''),
        parameters: isRecord(input) ? decodeEntitiesDeep(input) : {},
        toolUseId: readString(block, 'id') ?? `${readString(payload, 'uuid') ?? 'tool'}-${index}`,
      });
    }
  });

  const stopReason = readString(message, 'stop_reason');
  const last = fragments[fragments.length - 1];
  if (stopReason && last && (last.kind === 'text' || last.kind === 'tool-use')) {
    last.stopReason = stopReason;
  }
  return fragments;
}

function decodeSystem(payload: JsonObject, subtype: string | undefined): ResponseFragment[] {
  if (subtype === 'init') {
    const tools = Array.isArray(payload.tools) ? payload.tools.filter((t): t is string => typeof t === 'string') : [];
    return [{ kind: 'meta', model: readString(payload, 'model'), tools }];
  }
  if (subtype === 'compact_boundary') {
    const metadata = readRecord(payload, 'compactMetadata') ?? readRecord(payload, 'compact_metadata') ?? payload;
    const boundary: CompactBoundaryFragment = {
      kind: 'compact-boundary',
      trigger: readString(metadata, 'trigger') ?? readString(payload, 'trigger') ?? 'auto',
      preTokens: readNumber(metadata, 'preTokens', 'pre_tokens') ?? readNumber(payload, 'preTokens', 'pre_tokens') ?? 0,
      content: readString(payload, 'content') ?? 'Conversation compacted',
    };
    return [boundary];
  }
  return [{ kind: 'status', subtype: subtype ?? 'unknown', message: readString(payload, 'message', 'status') }];
}

function decodeResult(payload: JsonObject, subtype: string | undefined): ResponseFragment[] {
  const succeeded = subtype === 'success' && readBoolean(payload, 'is_error') !== true;
  const completion: CompletionFragment = {
    kind: 'completion',
    stopReason: succeeded ? 'end_turn' : subtype ?? 'error',
    isError: !succeeded,
    resultText: readString(payload, 'result'),
    costUsd: readNumber(payload, 'total_cost_usd'),
    durationMs: readNumber(payload, 'duration_ms'),
  };
  return [completion];
}

function decodeStreamEvent(payload: JsonObject): ResponseFragment[] {
  const event = readRecord(payload, 'event');
  if (!event) return [];
  if (event.type === 'message_start') {
    const message = readRecord(event, 'message');
    const messageId = message ? readString(message, 'id') : undefined;
    return messageId ? [{ kind: 'status', subtype: 'message_start', messageId }] : [];
  }
  if (event.type !== 'content_block_delta') return [];
  const delta = readRecord(event, 'delta');
  const text = delta ? readString(delta, 'text') : undefined;
  if (!text) return [];
  return [{ kind: 'text', content: text, isPartial: true, isCumulative: false }];
}

function decodeError(payload: JsonObject): ResponseFragment[] {
  const nested = readRecord(payload, 'error');
  const message =
    readString(payload, 'error', 'message') ?? (nested ? readString(nested, 'message') : undefined) ?? 'Unknown error';
  return [{ kind: 'error', message, details: readString(payload, 'details', 'description') }];
}

function decodePayload(payload: JsonObject, type: string, subtype: string | undefined): ResponseFragment[] {
  switch (type) {
    case 'user':
      return decodeUser(payload);
    case 'assistant':
      return decodeAssistant(payload);
    case 'system':
      return decodeSystem(payload, subtype);
    case 'result':
      return decodeResult(payload, subtype);
    case 'stream_event':
      return decodeStreamEvent(payload);
    case 'error':
      return decodeError(payload);
    default:
      if (CONTROL_TYPES.has(type)) return [];
      return [{ kind: 'unknown', type, raw: payload }];
  }
}

export interface DecodeOptions {
  /** Called for lines that look like protocol output (mention `"type"`) but fail to parse. */
  onMalformed?: (raw: string) => void;
}

/**
 * Decode one protocol line into response fragments. Never throws: lines that are not JSON
 * objects, or carry no `type`, yield nothing.
 */
export function decodeLine(raw: string, opts: DecodeOptions = {}): ResponseFragment[] {
  const payload = parseLine(raw);
  if (!payload) {
    if (raw.includes('"type"')) opts.onMalformed?.(raw);
    return [];
  }

  const envelope = EnvelopeSchema.safeParse(payload);
  if (!envelope.success) return [];

  const { type, subtype, session_id: agentSessionId } = envelope.data;
  let fragments: ResponseFragment[];
  try {
    fragments = decodePayload(payload, type, subtype);
  } catch (err) {
    console.warn(`[decoder] failed to decode ${type} line:`, err);
    return [{ kind: 'unknown', type, raw: payload }];
  }
  if (fragments.length === 0) return fragments;

  const messageId = type === 'assistant' ? extractMessageId(payload) : undefined;
  for (const fragment of fragments) {
    if (messageId) fragment.messageId = messageId;
    if (agentSessionId) fragment.agentSessionId = agentSessionId;
  }

  const usage = extractUsage(payload);
  if (usage) fragments[0].usage = usage;

  return fragments;
}
