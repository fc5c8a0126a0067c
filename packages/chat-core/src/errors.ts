export type ChatCoreErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NO_JSON_FOUND'
  | 'MALFORMED_JSON'
  | 'NETWORK_TIMEOUT'
  | 'NETWORK_ERROR'
  | 'AUTH_ERROR'
  | 'RATE_LIMITED'
  | 'REMOTE_ERROR';

export interface ChatCoreErrorDetails {
  status?: number;
  body?: string;
  cause?: unknown;
}

export class ChatCoreError extends Error {
  readonly code: ChatCoreErrorCode;

  readonly status?: number;

  readonly body?: string;

  constructor(code: ChatCoreErrorCode, message: string, details: ChatCoreErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'ChatCoreError';
    this.code = code;
    this.status = details.status;
    this.body = details.body;
  }
}

export function isChatCoreError(value: unknown): value is ChatCoreError {
  return value instanceof ChatCoreError;
}
