// This module wires the WebSocket endpoint, the health route and session lifecycle into one fastify app.

import websocket from '@fastify/websocket';
import Fastify, { type FastifyInstance } from 'fastify';
import type { ServerConfig } from './config/config.js';
import { policyFromConfig } from './mcp/policy.js';
import type { ToolRegistry } from './mcp/registry.js';
import type { McpSession } from './mcp/session.js';
import { attachWebSocketSession } from './transport/websocket.js';
import { buildLoggerOptions, errorForLog } from './utils/logger.js';
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';

export interface ServerResources {
  app: FastifyInstance;
  sessions: ReadonlySet<McpSession>;
}

// This function builds and configures the WebSocket application; it does not listen yet.
export async function createServer(config: ServerConfig, registry: ToolRegistry): Promise<ServerResources> {
  const app = Fastify({
    logger: buildLoggerOptions(config.logLevel),
    disableRequestLogging: true
  });
  const sessions = new Set<McpSession>();
  const policy = policyFromConfig(config.dangerousTools);

  // Open sessions finish their in-flight calls (bounded by the shutdown timeout) before sockets are closed.
  async function drainSessions(): Promise<void> {
    const draining = [...sessions].map(async (session) => {
      try {
        await session.end();
      } catch (error) {
        app.log.error(
          { event: 'websocket_session_drain_failed', sessionId: session.id, error: errorForLog(error) },
          'websocket_session_drain_failed'
        );
      }
    });
    await Promise.all(draining);

    for (const client of app.websocketServer.clients) {
      client.close(1001, 'server shutting down');
    }
    await new Promise<void>((resolve) => {
      app.websocketServer.close(() => resolve());
    });
  }

  await app.register(websocket, {
    options: {
      maxPayload: config.maxFrameBytes
    },
    preClose: drainSessions
  });

  app.get('/health', async () => ({
    status: 'ok',
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
    sessions: sessions.size
  }));

  app.get('/ws', { websocket: true }, (socket, request) => {
    const session = attachWebSocketSession(socket, {
      registry,
      policy,
      logger: request.log,
      heartbeatIntervalMs: config.heartbeatIntervalMs,
      limits: {
        maxFrameBytes: config.maxFrameBytes,
        maxInFlight: config.maxInFlight,
        shutdownTimeoutMs: config.shutdownTimeoutMs
      }
    });

    sessions.add(session);
    request.log.info({ event: 'websocket_session_accepted', sessionId: session.id, remoteAddress: request.ip }, 'websocket_session_accepted');
    void session.closed.then(() => {
      sessions.delete(session);
    });
  });

  return { app, sessions };
}
