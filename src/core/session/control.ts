import { z } from 'zod';
import { JsonObject } from '../types';
import { parseLine } from './decoder';

const CanUseToolSchema = z
  .object({
    subtype: z.literal('can_use_tool'),
    tool_name: z.string().min(1),
    input: z.record(z.unknown()).default({}),
    tool_use_id: z.string().optional(),
  })
  .passthrough();

const ControlRequestSchema = z.object({
  type: z.literal('control_request'),
  request_id: z.string().min(1),
  request: z.object({ subtype: z.string() }).passthrough(),
});

export type ControlRequest =
  | { kind: 'can-use-tool'; requestId: string; toolName: string; input: JsonObject; toolUseId?: string }
  | { kind: 'unsupported'; requestId: string; subtype: string };

/**
 * Parse a line from the agent's stdout as a control request. Returns undefined for lines that
 * are not control requests; throws a zod error for a control request with a bad shape.
 */
export function parseControlRequest(raw: string): ControlRequest | undefined {
  const payload = parseLine(raw);
  if (!payload || payload.type !== 'control_request') return undefined;

  const envelope = ControlRequestSchema.parse(payload);
  if (envelope.request.subtype !== 'can_use_tool') {
    return { kind: 'unsupported', requestId: envelope.request_id, subtype: envelope.request.subtype };
  }

  const request = CanUseToolSchema.parse(envelope.request);
  return {
    kind: 'can-use-tool',
    requestId: envelope.request_id,
    toolName: request.tool_name,
    input: request.input,
    toolUseId: request.tool_use_id,
  };
}

export type PermissionResult =
  | { behavior: 'allow'; updatedInput: JsonObject }
  | { behavior: 'deny'; message: string; interrupt?: boolean };

function line(message: JsonObject): string {
  return JSON.stringify(message) + '\n';
}

export function permissionResponse(requestId: string, result: PermissionResult): string {
  const response =
    result.behavior === 'allow'
      ? { behavior: 'allow', updatedInput: result.updatedInput }
      : { behavior: 'deny', message: result.message, interrupt: result.interrupt ?? false };
  return line({
    type: 'control_response',
    response: { subtype: 'success', request_id: requestId, response },
  });
}

export function errorResponse(requestId: string, error: string): string {
  return line({
    type: 'control_response',
    response: { subtype: 'error', request_id: requestId, error },
  });
}

/** Outgoing user turn in the stream-json input format. */
export function userMessageLine(content: JsonObject[]): string {
  return line({ type: 'user', message: { role: 'user', content } });
}
