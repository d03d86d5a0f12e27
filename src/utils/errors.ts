// This module provides the typed error taxonomy that is mapped into JSON-RPC errors and per-path results.

import type { DomainErrorKind } from '../types/domain.js';

export type ProtocolErrorKind =
  | 'parse_error'
  | 'invalid_request'
  | 'method_not_found'
  | 'invalid_params'
  | 'internal_error'
  | 'not_initialized'
  | 'shutting_down'
  | 'policy_denied';

// This table keeps JSON-RPC codes in one place so every transport reports identical errors.
export const RPC_ERROR_CODES: Readonly<Record<ProtocolErrorKind, number>> = {
  parse_error: -32700,
  invalid_request: -32600,
  method_not_found: -32601,
  invalid_params: -32602,
  internal_error: -32603,
  not_initialized: -32002,
  policy_denied: -32001,
  shutting_down: -32000
};

// A failure that terminates one request with a JSON-RPC error response.
export class ProtocolError extends Error {
  public readonly kind: ProtocolErrorKind;
  public readonly details?: unknown;

  public constructor(kind: ProtocolErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = 'ProtocolError';
    this.kind = kind;
    this.details = details;
  }

  public get code(): number {
    return RPC_ERROR_CODES[this.kind];
  }
}

// A failure attributable to one filesystem target; recovered into data instead of failing the call.
export class DomainError extends Error {
  public readonly kind: DomainErrorKind;
  public readonly detail?: string;
  public readonly path?: string;

  public constructor(kind: DomainErrorKind, detail?: string, path?: string) {
    super(detail ? `${kind}: ${detail}` : kind);
    this.name = 'DomainError';
    this.kind = kind;
    this.detail = detail;
    this.path = path;
  }
}

// A failure of the byte-stream boundaries; fatal to the connection but never to the process.
export class FramingError extends Error {
  public readonly reason: string;

  public constructor(reason: string) {
    super(`Framing error: ${reason}`);
    this.name = 'FramingError';
    this.reason = reason;
  }
}

const ERRNO_KINDS: Readonly<Record<string, DomainErrorKind>> = {
  ENOENT: 'NotFound',
  EACCES: 'PermissionDenied',
  EPERM: 'PermissionDenied',
  EEXIST: 'AlreadyExists',
  ENOTEMPTY: 'NotEmpty',
  EXDEV: 'CrossDevice',
  EISDIR: 'Unsupported',
  ENOTDIR: 'Unsupported',
  ELOOP: 'Unsupported',
  ENOTSUP: 'Unsupported',
  EOPNOTSUPP: 'Unsupported',
  EINVAL: 'InvalidInput',
  ENAMETOOLONG: 'InvalidInput'
};

// This helper reads the errno code from Node system errors without trusting the error shape.
export function errnoCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }

  return typeof error.code === 'string' ? error.code : undefined;
}

// This helper reads a string property from a Node system error.
function errnoField(error: unknown, field: 'syscall' | 'path'): string | undefined {
  if (typeof error !== 'object' || error === null || !(field in error)) {
    return undefined;
  }

  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

// This helper maps OS failures onto domain kinds and returns null for error classes that are internal faults.
export function toDomainError(error: unknown, path?: string): DomainError | null {
  if (error instanceof DomainError) {
    return error;
  }

  const code = errnoCode(error);
  const kind = code ? ERRNO_KINDS[code] : undefined;
  if (!kind) {
    return null;
  }

  // Inside a per-path record the path is already reported, so not-found needs no detail.
  const target = path ?? errnoField(error, 'path');
  if (kind === 'NotFound') {
    return new DomainError(kind, path === undefined ? target : undefined, target);
  }

  const syscall = errnoField(error, 'syscall') ?? 'operation';
  const detail = path === undefined && target ? `${syscall} failed (${code}) for ${target}` : `${syscall} failed (${code})`;
  return new DomainError(kind, detail, target);
}

// This helper normalizes unknown failures into a ProtocolError without leaking internals.
export function normalizeError(error: unknown): ProtocolError {
  if (error instanceof ProtocolError) {
    return error;
  }

  if (error instanceof Error) {
    return new ProtocolError('internal_error', error.message);
  }

  return new ProtocolError('internal_error', 'An unexpected error occurred.');
}
