// This module bridges one WebSocket connection to one MCP session; each message is exactly one payload.

import { TextDecoder } from 'node:util';
import { encodeMessage } from '../mcp/codec.js';
import { McpSession } from '../mcp/session.js';
import { errorForLog } from '../utils/logger.js';
import type { TransportDeps } from './stdio.js';

export type SocketData = Buffer | ArrayBuffer | Buffer[];

// The subset of a ws socket the bridge relies on, so tests can drive it with an in-process stand-in.
export interface SessionSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  ping(): void;
  terminate(): void;
  on(event: 'message', listener: (data: SocketData, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'pong', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export interface WebSocketBridgeDeps extends TransportDeps {
  heartbeatIntervalMs: number;
}

const SOCKET_OPEN = 1;
const CLOSE_NORMAL = 1000;
const CLOSE_INVALID_PAYLOAD = 1007;

const utf8 = new TextDecoder('utf-8', { fatal: true });

// Fragmented messages arrive as Buffer[] and are joined before decoding.
function toBuffer(data: SocketData): Buffer {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (Buffer.isBuffer(data)) {
    return data;
  }
  return Buffer.from(data);
}

// This function starts a session for an accepted socket and tears both down together.
export function attachWebSocketSession(socket: SessionSocket, deps: WebSocketBridgeDeps): McpSession {
  const logger = deps.logger.child({ transport: 'websocket' });
  const session = new McpSession({
    registry: deps.registry,
    policy: deps.policy,
    logger,
    maxInFlight: deps.limits.maxInFlight,
    shutdownTimeoutMs: deps.limits.shutdownTimeoutMs,
    send: (reply) => {
      if (socket.readyState !== SOCKET_OPEN) {
        throw new Error(`WebSocket is not open (readyState ${socket.readyState}).`);
      }
      socket.send(encodeMessage(reply));
    }
  });

  let alive = true;
  const heartbeat =
    deps.heartbeatIntervalMs > 0
      ? setInterval(() => {
          if (!alive) {
            logger.warn({ event: 'websocket_heartbeat_missed', sessionId: session.id }, 'websocket_heartbeat_missed');
            session.abort('transport_error');
            socket.terminate();
            return;
          }
          alive = false;
          socket.ping();
        }, deps.heartbeatIntervalMs)
      : undefined;

  socket.on('pong', () => {
    alive = true;
  });

  socket.on('message', (data) => {
    let payload: string;
    try {
      payload = utf8.decode(toBuffer(data));
    } catch {
      logger.error({ event: 'websocket_framing_error', reason: 'invalid UTF-8', sessionId: session.id }, 'websocket_framing_error');
      session.abort('framing_error');
      socket.close(CLOSE_INVALID_PAYLOAD, 'Payload is not valid UTF-8');
      return;
    }

    session.handlePayload(payload);
  });

  socket.on('error', (error) => {
    logger.error({ event: 'websocket_error', sessionId: session.id, error: errorForLog(error) }, 'websocket_error');
    session.abort('transport_error');
  });

  socket.on('close', () => {
    clearInterval(heartbeat);
    session.abort('end_of_input');
  });

  void session.closed.then((reason) => {
    clearInterval(heartbeat);
    logger.info({ event: 'websocket_session_closed', sessionId: session.id, reason }, 'websocket_session_closed');
    if (socket.readyState === SOCKET_OPEN) {
      socket.close(CLOSE_NORMAL, reason);
    }
  });

  return session;
}
