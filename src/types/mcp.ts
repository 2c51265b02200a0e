/**
 * Model Context Protocol (MCP) Types
 */

export interface MCPRequest {
  jsonrpc: '2.0';
  id?: string | number;
  method: string;
  params?: unknown;
}

export interface MCPResponse {
  jsonrpc: '2.0';
  id?: string | number;
  result?: MCPResult;
  error?: MCPError;
}

export interface MCPError {
  code: number;
  message: string;
  data?: unknown;
}

export interface MCPInputSchema {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
}

export interface MCPToolDefinition {
  name: string;
  description: string;
  inputSchema: MCPInputSchema;
}

export interface MCPToolCall {
  name: string;
  arguments: Record<string, unknown>;
}

export interface MCPToolResult {
  content: Array<{
    type: 'text' | 'image' | 'resource';
    text?: string;
    data?: string;
    mimeType?: string;
  }>;
  isError?: boolean;
}

export interface MCPInitializeResult {
  protocolVersion: string;
  capabilities: {
    tools: Record<string, never>;
  };
  serverInfo: {
    name: string;
    version: string;
  };
}

export interface MCPToolsListResult {
  tools: MCPToolDefinition[];
}

export type MCPResult = MCPInitializeResult | MCPToolsListResult | MCPToolResult;

export interface MCPTool extends MCPToolDefinition {
  execute(args: Record<string, unknown>, context: MCPContext): Promise<unknown>;
}

export interface MCPContext {
  userArn: string;
  userId: string;
  requestId?: string;
}

export interface MCPServerConfig {
  name: string;
  version: string;
  tools: MCPTool[];
}
