// This file defines JSON-RPC envelopes and MCP payload types shared by every transport.

export type JsonRpcId = string | number;

export interface JsonRpcRequest {
  kind: 'request';
  id: JsonRpcId;
  method: string;
  params?: Record<string, unknown> | unknown[];
}

export interface JsonRpcNotification {
  kind: 'notification';
  method: string;
  params?: Record<string, unknown> | unknown[];
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccess {
  kind: 'response';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcFailure {
  kind: 'error';
  id: JsonRpcId | null;
  error: JsonRpcError;
}

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcSuccess | JsonRpcFailure;

// Outbound envelopes only ever answer a request.
export type JsonRpcReply = JsonRpcSuccess | JsonRpcFailure;

export interface McpTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  annotations: {
    destructiveHint: boolean;
  };
}

export type ToolContent = { type: 'json'; value: unknown } | { type: 'text'; text: string };

// This type captures the normalized MCP tool output format returned to the client.
export interface ToolCallResult {
  content: ToolContent[];
  isError?: boolean;
}
