// This module owns the immutable tool catalog and dispatches validated calls to handlers.

import type { FastifyBaseLogger } from 'fastify';
import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { JsonRpcId, McpTool, ToolCallResult } from '../types/mcp.js';
import { ProtocolError, toDomainError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { errorTextResult } from './results.js';

export interface ToolContext {
  requestId: JsonRpcId;
  logger: FastifyBaseLogger;
}

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly dangerous: boolean;
  readonly inputSchema: Record<string, unknown>;
  run(args: unknown, context: ToolContext): Promise<ToolCallResult>;
}

export interface ToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  schema: S;
  dangerous?: boolean;
  handler: (args: z.output<S>, context: ToolContext) => Promise<ToolCallResult>;
}

// This helper binds a zod schema to its handler so arguments are validated before any filesystem access.
export function defineTool<S extends z.ZodTypeAny>(tool: ToolSpec<S>): ToolDefinition {
  const inputSchema: Record<string, unknown> = { ...zodToJsonSchema(tool.schema, { $refStrategy: 'none' }) };
  delete inputSchema.$schema;

  return Object.freeze({
    name: tool.name,
    description: tool.description,
    dangerous: tool.dangerous ?? false,
    inputSchema,
    run: async (args: unknown, context: ToolContext): Promise<ToolCallResult> => {
      const parsed = tool.schema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new ProtocolError('invalid_params', `Invalid arguments for ${tool.name}.`, parsed.error.flatten());
      }
      return tool.handler(parsed.data, context);
    }
  });
}

// This helper summarizes tool output for logs without dumping file contents.
function summarizeToolOutput(output: ToolCallResult): Record<string, unknown> {
  return {
    isError: output.isError ?? false,
    items: output.content.map((item) =>
      item.type === 'json'
        ? { type: 'json', records: Array.isArray(item.value) ? item.value.length : 1 }
        : { type: 'text', chars: item.text.length }
    )
  };
}

export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, ToolDefinition>;
  private readonly catalog: readonly McpTool[];

  public constructor(definitions: readonly ToolDefinition[]) {
    const tools = new Map<string, ToolDefinition>();
    for (const definition of definitions) {
      if (tools.has(definition.name)) {
        throw new Error(`Duplicate tool name: ${definition.name}`);
      }
      tools.set(definition.name, definition);
    }

    this.tools = tools;
    this.catalog = Object.freeze(
      definitions.map((definition) => ({
        name: definition.name,
        description: definition.description,
        inputSchema: definition.inputSchema,
        annotations: {
          destructiveHint: definition.dangerous
        }
      }))
    );
  }

  public get size(): number {
    return this.tools.size;
  }

  // Registration order is preserved so repeated listings are identical.
  public list(): McpTool[] {
    return [...this.catalog];
  }

  public get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  public isDangerous(name: string): boolean {
    return this.tools.get(name)?.dangerous ?? false;
  }

  // This method runs one tool call; single-target domain failures come back as isError results.
  public async dispatch(name: string, args: unknown, context: ToolContext): Promise<ToolCallResult> {
    const startedAt = Date.now();
    const tool = this.tools.get(name);
    if (!tool) {
      context.logger.warn(
        {
          event: 'mcp_tool_not_found',
          toolName: name,
          rpcRequestId: context.requestId
        },
        'mcp_tool_not_found'
      );
      throw new ProtocolError('method_not_found', `Unknown tool: ${name}`);
    }

    context.logger.info(
      {
        event: 'mcp_tool_execution_started',
        toolName: name,
        rpcRequestId: context.requestId,
        args: sanitizeForLog(args)
      },
      'mcp_tool_execution_started'
    );

    try {
      const result = await tool.run(args, context);
      context.logger.info(
        {
          event: 'mcp_tool_execution_completed',
          toolName: name,
          rpcRequestId: context.requestId,
          durationMs: Date.now() - startedAt,
          result: summarizeToolOutput(result)
        },
        'mcp_tool_execution_completed'
      );
      return result;
    } catch (error) {
      const domainError = toDomainError(error);
      if (domainError) {
        context.logger.warn(
          {
            event: 'mcp_tool_execution_rejected',
            toolName: name,
            rpcRequestId: context.requestId,
            durationMs: Date.now() - startedAt,
            kind: domainError.kind,
            path: domainError.path
          },
          'mcp_tool_execution_rejected'
        );
        return errorTextResult(domainError.message);
      }

      context.logger.error(
        {
          event: 'mcp_tool_execution_failed',
          toolName: name,
          rpcRequestId: context.requestId,
          durationMs: Date.now() - startedAt,
          error: errorForLog(error)
        },
        'mcp_tool_execution_failed'
      );
      throw error;
    }
  }
}

export function createToolRegistry(definitions: readonly ToolDefinition[]): ToolRegistry {
  return new ToolRegistry(definitions);
}
