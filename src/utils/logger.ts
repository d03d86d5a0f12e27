// This module configures pino for both transports and shapes tool arguments before they are logged.

import pino, { type Logger, type LoggerOptions } from 'pino';

const MAX_DEPTH = 4;
const MAX_PATH_CHARS = 512;
const MAX_LIST_ITEMS = 20;

// File contents and edit payloads are logged by size only.
const BULKY_KEYS = new Set(['content', 'text', 'search']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clip(value: string): string {
  return value.length <= MAX_PATH_CHARS ? value : `${value.slice(0, MAX_PATH_CHARS)}...[+${value.length - MAX_PATH_CHARS}]`;
}

// Path lists are capped; a call over thousands of paths logs the first few and a count.
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (depth > MAX_DEPTH) {
    return '[nested]';
  }
  if (typeof value === 'string') {
    return clip(value);
  }
  if (Array.isArray(value)) {
    const shown = value.slice(0, MAX_LIST_ITEMS).map((item) => sanitizeForLog(item, depth + 1));
    return value.length > MAX_LIST_ITEMS ? [...shown, `[+${value.length - MAX_LIST_ITEMS} more]`] : shown;
  }
  if (isRecord(value)) {
    const target: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      target[key] = BULKY_KEYS.has(key) && typeof entry === 'string' ? `[chars:${entry.length}]` : sanitizeForLog(entry, depth + 1);
    }
    return target;
  }
  return value;
}

export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { name: error.name, message: error.message, code, stack: error.stack };
  }

  return { message: String(error) };
}

// Shared by the stdio logger and fastify so both transports emit the same record shape.
export function buildLoggerOptions(level: string): LoggerOptions {
  return {
    level,
    base: {
      service: 'fileio-mcp'
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}

// Stdout carries protocol frames in stdio mode, so this logger always writes to stderr.
export function createStderrLogger(level: string): Logger {
  return pino(buildLoggerOptions(level), pino.destination(2));
}
