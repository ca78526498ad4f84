import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

export enum DocsErrorCode {
  PARSE_ERROR = 'PARSE_ERROR',
  INVALID_REQUEST = 'INVALID_REQUEST',
  METHOD_NOT_FOUND = 'METHOD_NOT_FOUND',
  TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
  INVALID_PARAMS = 'INVALID_PARAMS',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  CONFIG_INVALID = 'CONFIG_INVALID',
  CORPUS_UNAVAILABLE = 'CORPUS_UNAVAILABLE',
}

// Unknown tools share the method-not-found number; `data.kind` tells them apart.
const RPC_CODES: Record<DocsErrorCode, number> = {
  [DocsErrorCode.PARSE_ERROR]: ErrorCode.ParseError,
  [DocsErrorCode.INVALID_REQUEST]: ErrorCode.InvalidRequest,
  [DocsErrorCode.METHOD_NOT_FOUND]: ErrorCode.MethodNotFound,
  [DocsErrorCode.TOOL_NOT_FOUND]: ErrorCode.MethodNotFound,
  [DocsErrorCode.INVALID_PARAMS]: ErrorCode.InvalidParams,
  [DocsErrorCode.INTERNAL_ERROR]: ErrorCode.InternalError,
  [DocsErrorCode.CONFIG_INVALID]: ErrorCode.InternalError,
  [DocsErrorCode.CORPUS_UNAVAILABLE]: ErrorCode.InternalError,
};

export class DocsError extends Error {
  readonly code: DocsErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: DocsErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'DocsError';
    this.code = code;
    this.context = context;
  }

  get rpcCode(): number {
    return RPC_CODES[this.code];
  }
}

// Structural checks: errors raised by node internals may come from another realm.
export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

export function isNotFoundError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export function toDocsError(err: unknown): DocsError {
  if (err instanceof DocsError) return err;
  return new DocsError(DocsErrorCode.INTERNAL_ERROR, errorMessage(err));
}
