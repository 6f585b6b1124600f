/**
 * MCP protocol types (JSON-RPC 2.0 subset used by the tool handler)
 */

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id?: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export type JsonRpcResponse =
  | { jsonrpc: "2.0"; id: JsonRpcId; result: unknown }
  | { jsonrpc: "2.0"; id: JsonRpcId; error: JsonRpcErrorObject };

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface TextContent {
  type: "text";
  text: string;
}

export interface ToolCallResult {
  content: TextContent[];
  isError?: boolean;
}

/**
 * MCP tool call arguments
 */
export interface RunRspecParams {
  file: string; // e.g. "spec/models/user_spec.rb:37"
}

export interface RunCargoTestsParams {
  pattern?: string;
  args?: string[];
}

export interface RunCypressParams {
  spec: string;
}
