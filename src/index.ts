#!/usr/bin/env node
// This is the process entrypoint that selects the transport and handles graceful shutdown.

import { parseArgs } from 'node:util';
import { ConfigError, loadConfig, type CliOverrides, type ServerConfig } from './config/config.js';
import { policyFromConfig } from './mcp/policy.js';
import { buildFileioRegistry } from './mcp/tools.js';
import { createServer } from './server.js';
import { StdioTransport } from './transport/stdio.js';
import { createStderrLogger, errorForLog } from './utils/logger.js';

// This helper reads --mode/--host/--port; a leading "serve" subcommand is accepted and ignored.
function parseCliOverrides(argv: string[]): CliOverrides {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      mode: { type: 'string' },
      host: { type: 'string' },
      port: { type: 'string' }
    }
  });

  const [command] = positionals;
  if (command !== undefined && command !== 'serve') {
    throw new ConfigError([`unknown command: ${command}`]);
  }

  return { transport: values.mode, host: values.host, port: values.port };
}

async function runStdio(config: ServerConfig): Promise<void> {
  const logger = createStderrLogger(config.logLevel);
  const transport = new StdioTransport(process.stdin, process.stdout, {
    registry: buildFileioRegistry(),
    policy: policyFromConfig(config.dangerousTools),
    logger,
    limits: config
  });

  // This helper drains the session on container stop events before the process exits.
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ event: 'shutdown_started', signal }, 'shutdown_started');
    await transport.stop();
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  logger.info({ event: 'server_started', transport: 'stdio' }, 'server_started');
  const { reason } = await transport.run();
  logger.info({ event: 'shutdown_completed', reason }, 'shutdown_completed');
  process.exit(reason === 'framing_error' || reason === 'transport_error' ? 1 : 0);
}

async function runWebSocket(config: ServerConfig): Promise<void> {
  const { app } = await createServer(config, buildFileioRegistry());

  // This helper closes the server, which drains every open session first.
  async function shutdown(signal: string): Promise<void> {
    app.log.info({ event: 'shutdown_started', signal }, 'shutdown_started');
    await app.close();
    app.log.info({ event: 'shutdown_completed', signal }, 'shutdown_completed');
    process.exit(0);
  }

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  await app.listen({ host: config.host, port: config.port });
  app.log.info({ event: 'server_started', transport: 'websocket', host: config.host, port: config.port }, 'server_started');
}

async function main(): Promise<void> {
  const config = loadConfig(process.env, parseCliOverrides(process.argv.slice(2)));
  if (config.transport === 'websocket') {
    await runWebSocket(config);
    return;
  }
  await runStdio(config);
}

main().catch((error: unknown) => {
  const logger = createStderrLogger('error');
  logger.error({ event: 'server_start_failed', error: errorForLog(error) }, 'server_start_failed');
  process.exit(1);
});
