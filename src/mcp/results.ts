// This module builds tool results and the per-path partial-failure envelope.

import type { DomainErrorKind, PathResult, PathStatus } from '../types/domain.js';
import type { ToolCallResult } from '../types/mcp.js';
import { toDomainError } from '../utils/errors.js';

// This helper wraps structured output as one json content item.
export function jsonResult(value: unknown): ToolCallResult {
  return {
    content: [{ type: 'json', value }]
  };
}

// This helper wraps plain text output as one text content item.
export function textResult(text: string): ToolCallResult {
  return {
    content: [{ type: 'text', text }]
  };
}

// A single-target failure is reported to the client as data, not as a protocol error.
export function errorTextResult(text: string): ToolCallResult {
  return {
    content: [{ type: 'text', text }],
    isError: true
  };
}

export function formatStatus(kind: DomainErrorKind, detail?: string): PathStatus {
  return detail ? `error: ${kind}: ${detail}` : `error: ${kind}`;
}

export interface PathOutcome<TPayload extends object> {
  exists: boolean;
  payload: TPayload;
}

// This helper turns a failure into an error record; errors that are not domain failures are rethrown.
export function failedPathResult<TPayload extends object>(
  path: string,
  error: unknown,
  payload: TPayload
): PathResult<TPayload> {
  const domainError = toDomainError(error, path);
  if (!domainError) {
    throw error;
  }

  return {
    path,
    status: formatStatus(domainError.kind, domainError.detail),
    exists: domainError.kind !== 'NotFound',
    ...payload
  };
}

// This function settles one path: domain failures become an error record, anything else propagates as a fault.
export async function settlePath<TPayload extends object>(
  path: string,
  operation: () => Promise<PathOutcome<TPayload>>,
  onError: () => TPayload
): Promise<PathResult<TPayload>> {
  try {
    const outcome = await operation();
    return { path, status: 'ok', exists: outcome.exists, ...outcome.payload };
  } catch (error) {
    return failedPathResult(path, error, onError());
  }
}

// This function runs one operation per path sequentially and keeps the input order.
export async function collectPathResults<TPayload extends object>(
  paths: readonly string[],
  operation: (path: string) => Promise<PathOutcome<TPayload>>,
  onError: (path: string) => TPayload
): Promise<Array<PathResult<TPayload>>> {
  const results: Array<PathResult<TPayload>> = [];
  for (const path of paths) {
    results.push(
      await settlePath(
        path,
        () => operation(path),
        () => onError(path)
      )
    );
  }
  return results;
}
