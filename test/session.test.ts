// This test suite verifies the session lifecycle, request correlation, concurrency limits and graceful shutdown.

import { describe, expect, it, vi } from 'vitest';
import { McpSession } from '../src/mcp/session.js';
import { SUPPORTED_PROTOCOL_VERSIONS } from '../src/version.js';
import { Gates, createSessionHarness, createTestRegistry, silentLogger } from './helpers.js';

describe('session initialization', () => {
  it('rejects requests before initialize with not_initialized', async () => {
    const harness = createSessionHarness();

    harness.send({ id: 1, method: 'tools/list' });

    await vi.waitFor(() => expect(harness.replies).toHaveLength(1));
    expect(harness.replies[0]).toMatchObject({ kind: 'error', id: 1, error: { code: -32002 } });
    expect(harness.session.state).toBe('uninitialized');
  });

  it('negotiates a supported protocol version and waits for the initialized notification', async () => {
    const harness = createSessionHarness();

    harness.send({
      id: 1,
      method: 'initialize',
      params: { protocolVersion: '2024-11-05', capabilities: { roots: {} }, clientInfo: { name: 'test-client' } }
    });
    expect(harness.session.state).toBe('initializing');

    await vi.waitFor(() => expect(harness.replies).toHaveLength(1));
    expect(harness.replies[0]).toEqual({
      kind: 'response',
      id: 1,
      result: {
        protocolVersion: '2024-11-05',
        capabilities: { tools: { listChanged: false } },
        serverInfo: { name: 'fileio-mcp', version: '0.3.0' }
      }
    });
    expect(harness.session.protocolVersion).toBe('2024-11-05');
    expect(harness.session.capabilities).toEqual({ roots: {} });

    harness.send({ method: 'notifications/initialized' });
    expect(harness.session.state).toBe('ready');
    expect(harness.replies).toHaveLength(1);
  });

  it('accepts the short initialized notification name', () => {
    const harness = createSessionHarness();

    harness.send({ id: 1, method: 'initialize', params: { protocolVersion: '2025-11-25' } });
    harness.send({ method: 'initialized' });

    expect(harness.session.state).toBe('ready');
  });

  it('rejects an unsupported protocol version and stays uninitialized', async () => {
    const harness = createSessionHarness();

    harness.send({ id: 1, method: 'initialize', params: { protocolVersion: '1999-01-01' } });

    await vi.waitFor(() => expect(harness.replies).toHaveLength(1));
    expect(harness.replies[0]).toEqual({
      kind: 'error',
      id: 1,
      error: {
        code: -32602,
        message: 'Unsupported protocol version: 1999-01-01',
        data: { requested: '1999-01-01', supported: [...SUPPORTED_PROTOCOL_VERSIONS] }
      }
    });
    expect(harness.session.state).toBe('uninitialized');
  });

  it('answers requests sent before the initialized notification with not_initialized', async () => {
    const harness = createSessionHarness();

    harness.send({ id: 1, method: 'initialize', params: { protocolVersion: '2025-06-18' } });
    harness.send({ id: 2, method: 'tools/list' });
    harness.send({ id: 3, method: 'initialize', params: { protocolVersion: '2025-06-18' } });

    await vi.waitFor(() => expect(harness.replies).toHaveLength(3));
    expect(harness.replyFor(2)).toMatchObject({ kind: 'error', error: { code: -32002 } });
    expect(harness.replyFor(3)).toMatchObject({ kind: 'error', error: { code: -32600 } });
  });

  it('rejects a second initialize once ready', async () => {
    const harness = createSessionHarness();
    harness.initialize();

    harness.send({ id: 5, method: 'initialize', params: { protocolVersion: '2025-06-18' } });

    await vi.waitFor(() => expect(harness.replyFor(5)).toBeDefined());
    expect(harness.replyFor(5)).toEqual({
      kind: 'error',
      id: 5,
      error: { code: -32600, message: 'Session is already initialized.' }
    });
    expect(harness.session.state).toBe('ready');
  });
});

describe('ready session', () => {
  it('answers ping with an empty result', async () => {
    const harness = createSessionHarness();
    harness.initialize();

    harness.send({ id: 'p', method: 'ping' });

    await vi.waitFor(() => expect(harness.replyFor('p')).toEqual({ kind: 'response', id: 'p', result: {} }));
  });

  it('lists tools in registration order with their danger tags', async () => {
    const harness = createSessionHarness();
    harness.initialize();

    harness.send({ id: 1, method: 'tools/list' });

    await vi.waitFor(() => expect(harness.replyFor(1)).toBeDefined());
    const reply = harness.replyFor(1);
    expect(reply?.kind).toBe('response');
    if (reply?.kind === 'response') {
      expect(reply.result).toMatchObject({
        tools: [
          { name: 'test_echo', annotations: { destructiveHint: false } },
          { name: 'test_wait', annotations: { destructiveHint: false } },
          { name: 'test_fail', annotations: { destructiveHint: false } },
          { name: 'test_danger', annotations: { destructiveHint: true } }
        ]
      });
    }
  });

  it('returns tool output as the call result', async () => {
    const harness = createSessionHarness();
    harness.initialize();

    harness.send({ id: 2, method: 'tools/call', params: { name: 'test_echo', arguments: { value: 'hi' } } });

    await vi.waitFor(() => expect(harness.replyFor(2)).toBeDefined());
    expect(harness.replyFor(2)).toEqual({
      kind: 'response',
      id: 2,
      result: { content: [{ type: 'json', value: { value: 'hi' } }] }
    });
  });

  it.each([
    { params: { name: 'missing_tool', arguments: {} }, code: -32601 },
    { params: { name: 'test_echo', arguments: { value: 5 } }, code: -32602 },
    { params: { arguments: {} }, code: -32602 },
    { params: { name: 'test_fail', arguments: {} }, code: -32603 }
  ])('maps tool call failures to code $code', async ({ params, code }) => {
    const harness = createSessionHarness();
    harness.initialize();

    harness.send({ id: 3, method: 'tools/call', params });

    await vi.waitFor(() => expect(harness.replyFor(3)).toBeDefined());
    expect(harness.replyFor(3)).toMatchObject({ kind: 'error', id: 3, error: { code } });
    expect(harness.session.state).toBe('ready');
  });

  it('reports unknown methods as method_not_found', async () => {
    const harness = createSessionHarness();
    harness.initialize();

    harness.send({ id: 4, method: 'resources/list' });

    await vi.waitFor(() => expect(harness.replyFor(4)).toBeDefined());
    expect(harness.replyFor(4)).toEqual({
      kind: 'error',
      id: 4,
      error: { code: -32601, message: 'Unknown method: resources/list' }
    });
  });

  it('answers malformed payloads with a null-id error and keeps the session open', async () => {
    const harness = createSessionHarness();
    harness.initialize();

    harness.session.handlePayload('{not json');
    harness.send({ id: 'after', method: 'ping' });

    await vi.waitFor(() => expect(harness.replyFor('after')).toBeDefined());
    expect(harness.replyFor(null)).toMatchObject({ kind: 'error', id: null, error: { code: -32700 } });
    expect(harness.session.state).toBe('ready');
  });

  it('refuses numeric ids that cannot be echoed back unchanged', async () => {
    const harness = createSessionHarness();
    harness.initialize();

    harness.session.handlePayload('{"jsonrpc":"2.0","id":9007199254740993,"method":"ping"}');
    harness.send({ id: 'after', method: 'ping' });

    await vi.waitFor(() => expect(harness.replyFor('after')).toBeDefined());
    expect(harness.replyFor(null)).toEqual({
      kind: 'error',
      id: null,
      error: { code: -32600, message: 'id must be a string or a safe integer.' }
    });
    expect(harness.replyFor(9007199254740992)).toBeUndefined();
  });

  it('ignores responses and unknown notifications from the client', async () => {
    const harness = createSessionHarness();
    harness.initialize();

    harness.send({ id: 9, result: {} });
    harness.send({ method: 'notifications/cancelled', params: { requestId: 1 } });
    harness.send({ id: 'last', method: 'ping' });

    await vi.waitFor(() => expect(harness.replyFor('last')).toBeDefined());
    expect(harness.replies.map((reply) => reply.id)).toEqual(['init', 'last']);
  });
});

describe('request correlation and concurrency', () => {
  it('sends replies as calls complete, not in arrival order', async () => {
    const gates = new Gates();
    const harness = createSessionHarness({ registry: createTestRegistry(gates) });
    harness.initialize();

    harness.send({ id: 'a', method: 'tools/call', params: { name: 'test_wait', arguments: { key: 'slow' } } });
    harness.send({ id: 2, method: 'tools/call', params: { name: 'test_wait', arguments: { key: 'fast' } } });
    await vi.waitFor(() => expect(gates.started).toEqual(['slow', 'fast']));

    gates.open('fast');
    await vi.waitFor(() => expect(harness.replyFor(2)).toBeDefined());
    expect(harness.replyFor('a')).toBeUndefined();

    gates.open('slow');
    await vi.waitFor(() => expect(harness.replyFor('a')).toBeDefined());
    expect(harness.replies.map((reply) => reply.id)).toEqual(['init', 2, 'a']);
    expect(harness.replyFor('a')).toEqual({
      kind: 'response',
      id: 'a',
      result: { content: [{ type: 'text', text: 'slow' }] }
    });
  });

  it('rejects a duplicate in-flight id without disturbing the original call', async () => {
    const gates = new Gates();
    const harness = createSessionHarness({ registry: createTestRegistry(gates) });
    harness.initialize();

    harness.send({ id: 7, method: 'tools/call', params: { name: 'test_wait', arguments: { key: 'first' } } });
    harness.send({ id: 7, method: 'ping' });
    harness.send({ id: '7', method: 'ping' });

    await vi.waitFor(() => expect(harness.replyFor('7')).toBeDefined());
    expect(harness.replyFor(7)).toEqual({
      kind: 'error',
      id: 7,
      error: { code: -32600, message: 'Request id 7 is already in flight.' }
    });

    gates.open('first');
    await vi.waitFor(() => expect(harness.replies).toHaveLength(4));
    expect(harness.replies[3]).toEqual({
      kind: 'response',
      id: 7,
      result: { content: [{ type: 'text', text: 'first' }] }
    });
  });

  it('allows an id to be reused once its request has completed', async () => {
    const harness = createSessionHarness();
    harness.initialize();

    harness.send({ id: 1, method: 'ping' });
    await vi.waitFor(() => expect(harness.replyFor(1)).toBeDefined());
    harness.send({ id: 1, method: 'ping' });

    await vi.waitFor(() => expect(harness.replies.filter((reply) => reply.id === 1)).toHaveLength(2));
    expect(harness.replies.filter((reply) => reply.id === 1).every((reply) => reply.kind === 'response')).toBe(true);
  });

  it('caps concurrent tool executions at maxInFlight', async () => {
    const gates = new Gates();
    const harness = createSessionHarness({ registry: createTestRegistry(gates), maxInFlight: 1 });
    harness.initialize();

    harness.send({ id: 1, method: 'tools/call', params: { name: 'test_wait', arguments: { key: 'one' } } });
    harness.send({ id: 2, method: 'tools/call', params: { name: 'test_wait', arguments: { key: 'two' } } });
    harness.send({ id: 3, method: 'ping' });

    await vi.waitFor(() => expect(harness.replyFor(3)).toBeDefined());
    await vi.waitFor(() => expect(gates.started).toEqual(['one']));
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(gates.started).toEqual(['one']);

    gates.open('one');
    await vi.waitFor(() => expect(gates.started).toEqual(['one', 'two']));
    gates.open('two');
    await vi.waitFor(() => expect(harness.replyFor(2)).toBeDefined());
  });
});

describe('session shutdown', () => {
  it('drains in-flight calls before acknowledging shutdown', async () => {
    const gates = new Gates();
    const harness = createSessionHarness({ registry: createTestRegistry(gates) });
    harness.initialize();

    harness.send({ id: 1, method: 'tools/call', params: { name: 'test_wait', arguments: { key: 'work' } } });
    await vi.waitFor(() => expect(gates.started).toEqual(['work']));

    harness.send({ id: 2, method: 'shutdown' });
    expect(harness.session.state).toBe('shutting_down');
    harness.send({ id: 3, method: 'tools/list' });

    await vi.waitFor(() => expect(harness.replyFor(3)).toBeDefined());
    expect(harness.replyFor(3)).toEqual({
      kind: 'error',
      id: 3,
      error: { code: -32000, message: 'Session is shutting down.' }
    });
    expect(harness.replyFor(2)).toBeUndefined();

    gates.open('work');
    await expect(harness.session.closed).resolves.toBe('shutdown');
    expect(harness.session.state).toBe('closed');
    expect(harness.replies.map((reply) => reply.id)).toEqual(['init', 3, 1, 2]);
    expect(harness.replyFor(2)).toEqual({ kind: 'response', id: 2, result: {} });
  });

  it('acknowledges shutdown after the timeout and drops late replies', async () => {
    const gates = new Gates();
    const harness = createSessionHarness({ registry: createTestRegistry(gates), shutdownTimeoutMs: 20 });
    harness.initialize();

    harness.send({ id: 1, method: 'tools/call', params: { name: 'test_wait', arguments: { key: 'stuck' } } });
    await vi.waitFor(() => expect(gates.started).toEqual(['stuck']));
    harness.send({ id: 2, method: 'shutdown' });

    await expect(harness.session.closed).resolves.toBe('shutdown_timeout');
    expect(harness.replyFor(2)).toEqual({ kind: 'response', id: 2, result: {} });

    gates.open('stuck');
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(harness.replyFor(1)).toBeUndefined();
  });

  it('treats shutdown before initialization as not initialized', async () => {
    const harness = createSessionHarness();

    harness.send({ id: 1, method: 'shutdown' });

    await vi.waitFor(() => expect(harness.replies).toHaveLength(1));
    expect(harness.replies[0]).toMatchObject({ kind: 'error', id: 1, error: { code: -32002 } });
    expect(harness.session.state).toBe('uninitialized');
  });

  it('closes with end_of_input after in-flight work completes', async () => {
    const gates = new Gates();
    const harness = createSessionHarness({ registry: createTestRegistry(gates) });
    harness.initialize();

    harness.send({ id: 1, method: 'tools/call', params: { name: 'test_wait', arguments: { key: 'tail' } } });
    await vi.waitFor(() => expect(gates.started).toEqual(['tail']));

    const ended = harness.session.end();
    gates.open('tail');
    await ended;

    await expect(harness.session.closed).resolves.toBe('end_of_input');
    expect(harness.replyFor(1)).toMatchObject({ kind: 'response', id: 1 });
  });

  it('stops processing input once aborted', () => {
    const harness = createSessionHarness();
    harness.session.abort('framing_error');

    harness.send({ id: 1, method: 'initialize', params: { protocolVersion: '2025-06-18' } });

    expect(harness.session.state).toBe('closed');
    expect(harness.replies).toEqual([]);
  });

  it('closes with transport_error when a reply cannot be sent', async () => {
    const session = new McpSession({
      registry: createTestRegistry(),
      logger: silentLogger(),
      maxInFlight: 1,
      shutdownTimeoutMs: 100,
      send: () => {
        throw new Error('pipe closed');
      }
    });

    session.handlePayload('{"jsonrpc":"2.0","id":1,"method":"ping"}');

    await expect(session.closed).resolves.toBe('transport_error');
  });
});
