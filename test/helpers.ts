// This module holds shared fixtures for the test suites: silent logging, temp directories and controllable tools.

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import pino, { type Logger } from 'pino';
import { z } from 'zod';
import type { ToolPolicy } from '../src/mcp/policy.js';
import { createToolRegistry, defineTool, type ToolRegistry } from '../src/mcp/registry.js';
import { jsonResult, textResult } from '../src/mcp/results.js';
import { McpSession } from '../src/mcp/session.js';
import type { JsonRpcId, JsonRpcReply } from '../src/types/mcp.js';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'fileio-test-'));
}

export async function removeTempDir(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
}

// Tool calls wait on a named gate until the test opens it.
export class Gates {
  public readonly started: string[] = [];
  private readonly waiting = new Map<string, () => void>();
  private readonly opened = new Set<string>();

  public wait(key: string): Promise<void> {
    this.started.push(key);
    if (this.opened.has(key)) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.set(key, resolve);
    });
  }

  public open(key: string): void {
    this.opened.add(key);
    const resolve = this.waiting.get(key);
    if (resolve) {
      this.waiting.delete(key);
      resolve();
    }
  }
}

export function createTestRegistry(gates: Gates = new Gates()): ToolRegistry {
  return createToolRegistry([
    defineTool({
      name: 'test_echo',
      description: 'Echo the given value.',
      schema: z.object({ value: z.string() }),
      handler: async (args) => jsonResult(args)
    }),
    defineTool({
      name: 'test_wait',
      description: 'Wait until the named gate opens.',
      schema: z.object({ key: z.string() }),
      handler: async (args) => {
        await gates.wait(args.key);
        return textResult(args.key);
      }
    }),
    defineTool({
      name: 'test_fail',
      description: 'Fail with an internal fault.',
      schema: z.object({}),
      handler: async () => {
        throw new Error('boom');
      }
    }),
    defineTool({
      name: 'test_danger',
      description: 'Pretend to do something destructive.',
      schema: z.object({}),
      dangerous: true,
      handler: async () => textResult('done')
    })
  ]);
}

export interface SessionHarness {
  session: McpSession;
  replies: JsonRpcReply[];
  send(message: Record<string, unknown>): void;
  replyFor(id: JsonRpcId | null): JsonRpcReply | undefined;
  initialize(): void;
}

export interface HarnessOptions {
  registry?: ToolRegistry;
  policy?: ToolPolicy;
  maxInFlight?: number;
  shutdownTimeoutMs?: number;
}

export function createSessionHarness(options: HarnessOptions = {}): SessionHarness {
  const replies: JsonRpcReply[] = [];
  const session = new McpSession({
    registry: options.registry ?? createTestRegistry(),
    policy: options.policy,
    logger: silentLogger(),
    maxInFlight: options.maxInFlight ?? 4,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? 1_000,
    send: (reply) => {
      replies.push(reply);
    }
  });

  const send = (message: Record<string, unknown>): void => {
    session.handlePayload(JSON.stringify({ jsonrpc: '2.0', ...message }));
  };

  return {
    session,
    replies,
    send,
    replyFor: (id) => replies.find((reply) => reply.id === id),
    initialize: () => {
      send({ id: 'init', method: 'initialize', params: { protocolVersion: '2025-06-18', capabilities: {} } });
      send({ method: 'notifications/initialized' });
    }
  };
}
