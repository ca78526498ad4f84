import { z } from 'zod';
import type { DocsError } from '../shared/errors.js';

export const JSONRPC_VERSION = '2.0';

export const RequestIdSchema = z.union([z.string(), z.number(), z.null()]);
export type RequestId = z.infer<typeof RequestIdSchema>;

// `params` stays loose here; each method validates its own shape.
export const RequestEnvelopeSchema = z.object({
  jsonrpc: z.string(),
  method: z.string().min(1),
  params: z.unknown().optional(),
  id: RequestIdSchema.optional(),
});
export type RequestEnvelope = z.infer<typeof RequestEnvelopeSchema>;

export interface RpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface SuccessEnvelope {
  jsonrpc: typeof JSONRPC_VERSION;
  result: unknown;
  id: RequestId;
}

export interface ErrorEnvelope {
  jsonrpc: typeof JSONRPC_VERSION;
  error: RpcErrorObject;
  id: RequestId;
}

export type ResponseEnvelope = SuccessEnvelope | ErrorEnvelope;

export function successEnvelope(id: RequestId, result: unknown): SuccessEnvelope {
  return { jsonrpc: JSONRPC_VERSION, result, id };
}

export function errorEnvelope(id: RequestId, err: DocsError): ErrorEnvelope {
  return {
    jsonrpc: JSONRPC_VERSION,
    error: {
      code: err.rpcCode,
      message: err.message,
      data: { kind: err.code, ...err.context },
    },
    id,
  };
}

/** Best-effort id of a message that failed envelope validation; null when unreadable. */
export function readRequestId(message: unknown): RequestId {
  if (typeof message !== 'object' || message === null || !('id' in message)) return null;
  const id = RequestIdSchema.safeParse(message.id);
  return id.success ? id.data : null;
}
