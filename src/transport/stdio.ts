// This module binds one MCP session to a byte-stream pair such as process stdin/stdout.

import type { Readable, Writable } from 'node:stream';
import type { FastifyBaseLogger } from 'fastify';
import { encodeMessage } from '../mcp/codec.js';
import type { ToolPolicy } from '../mcp/policy.js';
import type { ToolRegistry } from '../mcp/registry.js';
import { McpSession, type SessionCloseReason } from '../mcp/session.js';
import type { JsonRpcReply } from '../types/mcp.js';
import type { FramingError } from '../utils/errors.js';
import { errorForLog } from '../utils/logger.js';
import { StreamFramer, type FramerOutput } from './framing.js';

export interface SessionLimits {
  maxFrameBytes: number;
  maxInFlight: number;
  shutdownTimeoutMs: number;
}

export interface TransportDeps {
  registry: ToolRegistry;
  policy: ToolPolicy;
  logger: FastifyBaseLogger;
  limits: SessionLimits;
}

export interface StdioRunResult {
  reason: SessionCloseReason;
}

export class StdioTransport {
  public readonly session: McpSession;
  private readonly framer: StreamFramer;
  private readonly logger: FastifyBaseLogger;
  private readonly input: Readable;
  private readonly output: Writable;
  private awaitingDrain = false;
  private stopped = false;

  public constructor(input: Readable, output: Writable, deps: TransportDeps) {
    this.input = input;
    this.output = output;
    this.logger = deps.logger.child({ transport: 'stdio' });
    this.framer = new StreamFramer({ maxFrameBytes: deps.limits.maxFrameBytes });
    this.session = new McpSession({
      registry: deps.registry,
      policy: deps.policy,
      logger: this.logger,
      maxInFlight: deps.limits.maxInFlight,
      shutdownTimeoutMs: deps.limits.shutdownTimeoutMs,
      send: (reply) => this.write(reply)
    });
  }

  // Resolves once the session is closed, whatever closed it.
  public async run(): Promise<StdioRunResult> {
    this.input.on('data', this.onData);
    this.input.once('end', this.onEnd);
    this.input.once('error', this.onInputError);
    this.output.on('error', this.onOutputError);

    try {
      const reason = await this.session.closed;
      return { reason };
    } finally {
      this.detach();
    }
  }

  // Used on process signals: stop reading and let in-flight work answer before closing.
  public async stop(): Promise<void> {
    this.stopped = true;
    this.input.removeListener('data', this.onData);
    this.input.pause();
    await this.session.end();
  }

  private readonly onData = (chunk: Buffer | string): void => {
    this.deliver(this.framer.push(chunk));
  };

  private readonly onDrain = (): void => {
    this.awaitingDrain = false;
    if (!this.stopped) {
      this.input.resume();
    }
  };

  private readonly onEnd = (): void => {
    if (!this.deliver(this.framer.finish())) {
      return;
    }

    this.session.end().catch((error: unknown) => {
      this.logger.error({ event: 'stdio_drain_failed', error: errorForLog(error) }, 'stdio_drain_failed');
    });
  };

  private readonly onInputError = (error: Error): void => {
    this.logger.error({ event: 'stdio_input_error', error: errorForLog(error) }, 'stdio_input_error');
    this.session.abort('transport_error');
  };

  private readonly onOutputError = (error: Error): void => {
    this.logger.error({ event: 'stdio_output_error', error: errorForLog(error) }, 'stdio_output_error');
    this.session.abort('transport_error');
  };

  // Returns false when the stream had to be abandoned because of a framing error.
  private deliver(output: FramerOutput): boolean {
    for (const frame of output.frames) {
      this.session.handlePayload(frame);
    }

    if (output.error) {
      this.failFraming(output.error);
      return false;
    }
    return true;
  }

  private failFraming(error: FramingError): void {
    this.logger.error(
      { event: 'stdio_framing_error', reason: error.reason, framing: this.framer.mode },
      'stdio_framing_error'
    );
    this.input.removeListener('data', this.onData);
    this.session.abort('framing_error');
  }

  // One write per envelope keeps concurrent replies from interleaving on the wire.
  // While the client is not reading, no further requests are taken in.
  private write(reply: JsonRpcReply): void {
    const flushed = this.output.write(this.framer.encode(encodeMessage(reply)));
    if (!flushed && !this.awaitingDrain) {
      this.awaitingDrain = true;
      this.input.pause();
      this.output.once('drain', this.onDrain);
    }
  }

  private detach(): void {
    this.input.removeListener('data', this.onData);
    this.input.removeListener('end', this.onEnd);
    this.input.removeListener('error', this.onInputError);
    this.output.removeListener('error', this.onOutputError);
    this.output.removeListener('drain', this.onDrain);
    this.stopped = true;
  }
}
