export type EngineErrorCode =
  | 'PROCESS_START_FAILED'
  | 'PROCESS_NOT_RUNNING'
  | 'ATTACHMENT_READ'
  | 'CONTROL_PROTOCOL'
  | 'CONVERSATION_LOAD'
  | 'STORE_CORRUPT'
  | 'INVALID_PATTERN'
  | 'INVALID_CONFIG'
  | 'SESSION_NOT_FOUND'
  | 'SESSION_CLOSED'
  | 'SESSION_EXISTS'
  | 'POOL_FULL'
  | 'PERMISSION_REQUEST_NOT_FOUND';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.code = code;
    this.name = 'EngineError';
  }
}

export function assert(condition: unknown, code: EngineErrorCode, message: string): asserts condition {
  if (!condition) {
    throw new EngineError(code, message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
