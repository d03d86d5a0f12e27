// This module implements the per-connection MCP lifecycle and request correlation on top of the codec.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { JsonRpcId, JsonRpcMessage, JsonRpcReply, JsonRpcRequest } from '../types/mcp.js';
import { ProtocolError, normalizeError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { Semaphore } from '../utils/semaphore.js';
import {
  MCP_SERVER_NAME,
  MCP_SERVER_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
  isSupportedProtocolVersion,
  type SupportedProtocolVersion
} from '../version.js';
import { decodeMessage, rpcError, rpcResult } from './codec.js';
import { allowAllPolicy, type ToolPolicy } from './policy.js';
import type { ToolRegistry } from './registry.js';

export type SessionState = 'uninitialized' | 'initializing' | 'ready' | 'shutting_down' | 'closed';

export type SessionCloseReason = 'shutdown' | 'shutdown_timeout' | 'end_of_input' | 'framing_error' | 'transport_error' | 'server_closing';

export interface McpSessionOptions {
  registry: ToolRegistry;
  policy?: ToolPolicy;
  logger: FastifyBaseLogger;
  maxInFlight: number;
  shutdownTimeoutMs: number;
  // Called once per outbound envelope; must write it as one frame.
  send: (reply: JsonRpcReply) => void;
  sessionId?: string;
}

const initializeParamsSchema = z.object({
  protocolVersion: z.string().min(1),
  capabilities: z.record(z.unknown()).default({}),
  clientInfo: z
    .object({
      name: z.string(),
      version: z.string().optional()
    })
    .passthrough()
    .optional()
});

const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.unknown().optional()
});

const INITIALIZED_NOTIFICATIONS = new Set(['initialized', 'notifications/initialized']);

// 1 and "1" are different ids, so the key keeps the JSON type.
function idKey(id: JsonRpcId): string {
  return `${typeof id}:${id}`;
}

// This helper validates method params with zod and maps failures to invalid_params.
function parseParams<S extends z.ZodTypeAny>(schema: S, request: JsonRpcRequest): z.output<S> {
  const parsed = schema.safeParse(request.params ?? {});
  if (!parsed.success) {
    throw new ProtocolError('invalid_params', `Invalid params for ${request.method}.`, parsed.error.flatten());
  }
  return parsed.data;
}

export class McpSession {
  public readonly id: string;
  private currentState: SessionState = 'uninitialized';
  private negotiatedVersion: SupportedProtocolVersion | null = null;
  private clientCapabilities: Record<string, unknown> = {};
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly toolSlots: Semaphore;
  private readonly registry: ToolRegistry;
  private readonly policy: ToolPolicy;
  private readonly logger: FastifyBaseLogger;
  private readonly shutdownTimeoutMs: number;
  private readonly send: (reply: JsonRpcReply) => void;
  private resolveClosed: (reason: SessionCloseReason) => void = () => undefined;
  public readonly closed: Promise<SessionCloseReason> = new Promise((resolve) => {
    this.resolveClosed = resolve;
  });

  public constructor(options: McpSessionOptions) {
    this.id = options.sessionId ?? randomUUID();
    this.registry = options.registry;
    this.policy = options.policy ?? allowAllPolicy;
    this.logger = options.logger.child({ sessionId: this.id });
    this.shutdownTimeoutMs = options.shutdownTimeoutMs;
    this.send = options.send;
    this.toolSlots = new Semaphore(options.maxInFlight);

    this.logger.info(
      {
        event: 'mcp_session_opened',
        policy: this.policy.name,
        maxInFlight: options.maxInFlight
      },
      'mcp_session_opened'
    );
  }

  public get state(): SessionState {
    return this.currentState;
  }

  public get protocolVersion(): SupportedProtocolVersion | null {
    return this.negotiatedVersion;
  }

  public get capabilities(): Readonly<Record<string, unknown>> {
    return this.clientCapabilities;
  }

  public get inFlightCount(): number {
    return this.inFlight.size;
  }

  // This method accepts one framed payload; it never throws and never blocks on tool execution.
  public handlePayload(payload: string): void {
    if (this.currentState === 'closed') {
      return;
    }

    const decoded = decodeMessage(payload);
    if (!decoded.ok) {
      this.logger.warn(
        {
          event: 'mcp_rpc_decode_failed',
          code: decoded.error.code,
          reason: decoded.error.message,
          rpcRequestId: decoded.id
        },
        'mcp_rpc_decode_failed'
      );
      this.transmit(rpcError(decoded.id, decoded.error));
      return;
    }

    this.handleMessage(decoded.message);
  }

  public handleMessage(message: JsonRpcMessage): void {
    if (this.currentState === 'closed') {
      return;
    }

    switch (message.kind) {
      case 'request':
        this.acceptRequest(message);
        return;
      case 'notification':
        this.handleNotification(message.method);
        return;
      case 'response':
      case 'error':
        // The server never originates requests, so nothing can be waiting for these.
        this.logger.debug(
          { event: 'mcp_client_reply_ignored', rpcRequestId: message.id, kind: message.kind },
          'mcp_client_reply_ignored'
        );
        return;
    }
  }

  // Called when the input side ends: in-flight work finishes (bounded) before the session closes.
  public async end(): Promise<void> {
    if (this.currentState === 'closed') {
      return;
    }

    const drained = await this.drain([...this.inFlight.values()]);
    this.close(drained ? 'end_of_input' : 'shutdown_timeout');
  }

  // Closes immediately; replies of work still running are dropped.
  public abort(reason: SessionCloseReason): void {
    this.close(reason);
  }

  private handleNotification(method: string): void {
    if (INITIALIZED_NOTIFICATIONS.has(method) && this.currentState === 'initializing') {
      this.transition('ready');
      return;
    }

    this.logger.debug({ event: 'mcp_notification_ignored', method, state: this.currentState }, 'mcp_notification_ignored');
  }

  private acceptRequest(request: JsonRpcRequest): void {
    const key = idKey(request.id);
    if (this.inFlight.has(key)) {
      this.logger.warn({ event: 'mcp_rpc_duplicate_id', rpcRequestId: request.id }, 'mcp_rpc_duplicate_id');
      this.transmit(
        rpcError(request.id, new ProtocolError('invalid_request', `Request id ${JSON.stringify(request.id)} is already in flight.`))
      );
      return;
    }

    const task = this.runRequest(request).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, task);
  }

  private async runRequest(request: JsonRpcRequest): Promise<void> {
    const startedAt = Date.now();
    this.logger.info(
      {
        event: 'mcp_rpc_request_received',
        rpcRequestId: request.id,
        method: request.method,
        state: this.currentState
      },
      'mcp_rpc_request_received'
    );

    try {
      if (request.method === 'shutdown' && this.currentState === 'ready') {
        await this.shutdown(request);
        return;
      }

      const result = await this.execute(request);
      this.logger.info(
        {
          event: 'mcp_rpc_request_completed',
          rpcRequestId: request.id,
          method: request.method,
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_completed'
      );
      this.transmit(rpcResult(request.id, result));
    } catch (error) {
      const protocolError = normalizeError(error);
      const level = protocolError.kind === 'internal_error' ? 'error' : 'warn';
      this.logger[level](
        {
          event: 'mcp_rpc_request_failed',
          rpcRequestId: request.id,
          method: request.method,
          durationMs: Date.now() - startedAt,
          code: protocolError.code,
          error: errorForLog(error)
        },
        'mcp_rpc_request_failed'
      );
      this.transmit(rpcError(request.id, protocolError));
    }
  }

  // This method routes one request by lifecycle state; it returns the result or throws a ProtocolError.
  private async execute(request: JsonRpcRequest): Promise<unknown> {
    switch (this.currentState) {
      case 'uninitialized':
        if (request.method === 'initialize') {
          return this.initialize(request);
        }
        throw new ProtocolError('not_initialized', `Session is not initialized; ${request.method} is not allowed yet.`);

      case 'initializing':
        if (request.method === 'initialize') {
          throw new ProtocolError('invalid_request', 'Session is already initialized.');
        }
        throw new ProtocolError('not_initialized', 'Waiting for the initialized notification.');

      case 'shutting_down':
      case 'closed':
        throw new ProtocolError('shutting_down', 'Session is shutting down.');

      case 'ready':
        return this.executeReady(request);
    }
  }

  private async executeReady(request: JsonRpcRequest): Promise<unknown> {
    switch (request.method) {
      case 'initialize':
        throw new ProtocolError('invalid_request', 'Session is already initialized.');
      case 'ping':
        return {};
      case 'tools/list':
        return { tools: this.registry.list() };
      case 'tools/call':
        return this.callTool(request);
      default:
        throw new ProtocolError('method_not_found', `Unknown method: ${request.method}`);
    }
  }

  private initialize(request: JsonRpcRequest): unknown {
    const params = parseParams(initializeParamsSchema, request);
    if (!isSupportedProtocolVersion(params.protocolVersion)) {
      throw new ProtocolError('invalid_params', `Unsupported protocol version: ${params.protocolVersion}`, {
        requested: params.protocolVersion,
        supported: [...SUPPORTED_PROTOCOL_VERSIONS]
      });
    }

    this.negotiatedVersion = params.protocolVersion;
    this.clientCapabilities = params.capabilities;
    this.logger.info(
      {
        event: 'mcp_session_initialized',
        protocolVersion: params.protocolVersion,
        clientInfo: sanitizeForLog(params.clientInfo ?? null)
      },
      'mcp_session_initialized'
    );
    this.transition('initializing');

    return {
      protocolVersion: params.protocolVersion,
      capabilities: {
        tools: {
          listChanged: false
        }
      },
      serverInfo: {
        name: MCP_SERVER_NAME,
        version: MCP_SERVER_VERSION
      }
    };
  }

  // Tool calls wait for a slot in arrival order; the policy is consulted before any slot is taken.
  private async callTool(request: JsonRpcRequest): Promise<unknown> {
    const params = parseParams(toolCallParamsSchema, request);
    const tool = this.registry.get(params.name);
    if (!tool) {
      throw new ProtocolError('method_not_found', `Unknown tool: ${params.name}`);
    }

    this.policy.authorize({ name: tool.name, dangerous: tool.dangerous });

    const release = await this.toolSlots.acquire();
    try {
      if (this.currentState === 'closed') {
        throw new ProtocolError('shutting_down', 'Session closed before the call started.');
      }

      return await this.registry.dispatch(params.name, params.arguments, {
        requestId: request.id,
        logger: this.logger.child({ rpcRequestId: request.id, toolName: params.name })
      });
    } finally {
      release();
    }
  }

  // The acknowledgement is sent only after earlier requests have answered, or after the timeout.
  private async shutdown(request: JsonRpcRequest): Promise<void> {
    this.transition('shutting_down');
    const ownKey = idKey(request.id);
    const pending = [...this.inFlight.entries()].filter(([key]) => key !== ownKey).map(([, task]) => task);

    const drained = await this.drain(pending);
    if (!drained) {
      this.logger.warn(
        { event: 'mcp_session_shutdown_timeout', timeoutMs: this.shutdownTimeoutMs, abandoned: pending.length },
        'mcp_session_shutdown_timeout'
      );
    }

    this.transmit(rpcResult(request.id, {}));
    this.close(drained ? 'shutdown' : 'shutdown_timeout');
  }

  // Resolves true when every task settled within the shutdown timeout.
  private async drain(tasks: Array<Promise<void>>): Promise<boolean> {
    if (tasks.length === 0) {
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), this.shutdownTimeoutMs);
    });

    try {
      return await Promise.race([Promise.allSettled(tasks).then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private transition(next: SessionState): void {
    const previous = this.currentState;
    this.currentState = next;
    this.logger.info({ event: 'mcp_session_state_changed', from: previous, to: next }, 'mcp_session_state_changed');
  }

  private transmit(reply: JsonRpcReply): void {
    if (this.currentState === 'closed') {
      this.logger.debug({ event: 'mcp_rpc_reply_dropped', rpcRequestId: reply.id }, 'mcp_rpc_reply_dropped');
      return;
    }

    try {
      this.send(reply);
    } catch (error) {
      this.logger.error({ event: 'mcp_transport_send_failed', error: errorForLog(error) }, 'mcp_transport_send_failed');
      this.close('transport_error');
    }
  }

  private close(reason: SessionCloseReason): void {
    if (this.currentState === 'closed') {
      return;
    }

    this.transition('closed');
    this.logger.info({ event: 'mcp_session_closed', reason, abandoned: this.inFlight.size }, 'mcp_session_closed');
    this.resolveClosed(reason);
  }
}
