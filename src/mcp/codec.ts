// This module converts framed payloads into typed JSON-RPC envelopes and back.

import type {
  JsonRpcFailure,
  JsonRpcId,
  JsonRpcMessage,
  JsonRpcReply,
  JsonRpcSuccess
} from '../types/mcp.js';
import { ProtocolError, normalizeError } from '../utils/errors.js';
import { isJsonObject, parseJson } from '../utils/json.js';

export type DecodeResult =
  | { ok: true; message: JsonRpcMessage }
  | { ok: false; error: ProtocolError; id: JsonRpcId | null };

type RpcParams = Record<string, unknown> | unknown[];

// Numeric ids outside the safe integer range do not survive JSON.parse unchanged, so they cannot be echoed back.
function isJsonRpcId(value: unknown): value is JsonRpcId {
  return typeof value === 'string' || (typeof value === 'number' && Number.isSafeInteger(value));
}

function isParams(value: unknown): value is RpcParams {
  return Array.isArray(value) || isJsonObject(value);
}

function invalid(message: string, id: JsonRpcId | null): DecodeResult {
  return { ok: false, error: new ProtocolError('invalid_request', message), id };
}

// This function validates one payload against the JSON-RPC 2.0 envelope rules.
export function decodeMessage(payload: string): DecodeResult {
  let value: unknown;
  try {
    value = parseJson(payload, 'inbound message');
  } catch (error) {
    return { ok: false, error: normalizeError(error), id: null };
  }

  if (Array.isArray(value)) {
    return invalid('Batch messages are not supported.', null);
  }

  if (!isJsonObject(value)) {
    return invalid('Message must be a JSON object.', null);
  }

  const rawId = value.id;
  const id = isJsonRpcId(rawId) ? rawId : null;
  if (value.jsonrpc !== '2.0') {
    return invalid('jsonrpc must be exactly "2.0".', id);
  }

  const hasMethod = 'method' in value;
  const hasResult = 'result' in value;
  const hasError = 'error' in value;
  if ([hasMethod, hasResult, hasError].filter(Boolean).length !== 1) {
    return invalid('Message must carry exactly one of method, result or error.', id);
  }

  // Only error responses may echo a null id, for failures that could not be correlated.
  if ('id' in value && !isJsonRpcId(rawId) && !(hasError && rawId === null)) {
    return invalid('id must be a string or a safe integer.', null);
  }

  if (hasMethod) {
    const { method, params } = value;
    if (typeof method !== 'string') {
      return invalid('method must be a string.', id);
    }

    if (params !== undefined && !isParams(params)) {
      return invalid('params must be an object or an array.', id);
    }

    if (isJsonRpcId(rawId)) {
      return { ok: true, message: { kind: 'request', id: rawId, method, params } };
    }

    return { ok: true, message: { kind: 'notification', method, params } };
  }

  if (hasResult) {
    if (!isJsonRpcId(rawId)) {
      return invalid('Response id must be a string or a safe integer.', null);
    }
    return { ok: true, message: { kind: 'response', id: rawId, result: value.result } };
  }

  const error = value.error;
  if (
    !isJsonObject(error) ||
    typeof error.code !== 'number' ||
    !Number.isInteger(error.code) ||
    typeof error.message !== 'string'
  ) {
    return invalid('error must be an object with an integer code and a string message.', id);
  }

  return {
    ok: true,
    message: {
      kind: 'error',
      id,
      error: { code: error.code, message: error.message, data: error.data }
    }
  };
}

// This helper creates a canonical success envelope.
export function rpcResult(id: JsonRpcId, result: unknown): JsonRpcSuccess {
  return { kind: 'response', id, result };
}

// This helper creates a canonical JSON-RPC error payload from a protocol failure.
export function rpcError(id: JsonRpcId | null, error: ProtocolError): JsonRpcFailure {
  return {
    kind: 'error',
    id,
    error: {
      code: error.code,
      message: error.message,
      data: error.details
    }
  };
}

// This function serializes an outbound envelope; the internal kind tag never reaches the wire.
export function encodeMessage(reply: JsonRpcReply): string {
  if (reply.kind === 'response') {
    return JSON.stringify({
      jsonrpc: '2.0',
      id: reply.id,
      result: reply.result === undefined ? null : reply.result
    });
  }

  return JSON.stringify({
    jsonrpc: '2.0',
    id: reply.id,
    error: reply.error
  });
}
