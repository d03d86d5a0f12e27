// This utility module keeps JSON parse/stringify operations safe and explicit.

import { ProtocolError } from './errors.js';

// This helper parses inbound JSON and emits a controlled parse error on malformed content.
export function parseJson(value: string, label: string): unknown {
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new ProtocolError('parse_error', `Failed to parse JSON for ${label}.`, {
      originalMessage: error instanceof Error ? error.message : 'unknown'
    });
  }
}

// This helper narrows parsed JSON to a plain object without trusting its shape.
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
