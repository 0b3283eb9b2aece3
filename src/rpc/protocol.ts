/**
 * Wire format of the line-delimited request/response channel
 */

import { ErrorCode, JSONRPC_VERSION } from '@modelcontextprotocol/sdk/types.js';

export const PROTOCOL_VERSION = '1.0';

export { ErrorCode };

export type RequestId = number | string | null;

export interface SuccessResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId;
  result: {
    version: typeof PROTOCOL_VERSION;
    data: unknown;
  };
}

export interface ErrorResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId;
  error: {
    code: number;
    message: string;
    data?: unknown;
  };
}

export type GatewayResponse = SuccessResponse | ErrorResponse;

export function successResponse(id: RequestId, data: unknown): SuccessResponse {
  return {
    jsonrpc: JSONRPC_VERSION,
    id,
    result: { version: PROTOCOL_VERSION, data },
  };
}

export function errorResponse(id: RequestId, code: number, message: string, data?: unknown): ErrorResponse {
  const error: ErrorResponse['error'] = { code, message };
  if (data !== undefined) {
    error.data = data;
  }
  return { jsonrpc: JSONRPC_VERSION, id, error };
}

export function isRequestId(value: unknown): value is RequestId {
  return value === null || typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}
