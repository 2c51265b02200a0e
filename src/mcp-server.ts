/**
 * MCP Server Implementation
 * Handles MCP protocol requests and tool execution
 */

import {
  MCPContext,
  MCPError,
  MCPInitializeResult,
  MCPRequest,
  MCPResponse,
  MCPResult,
  MCPServerConfig,
  MCPTool,
  MCPToolResult,
  MCPToolsListResult,
} from './types/mcp';
import { logger } from './utils/logger';

export const MCP_PROTOCOL_VERSION = '2024-11-05';

export const MCP_ERROR_CODES = {
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  TOOL_EXECUTION_FAILED: -32000,
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMCPError(value: unknown): value is MCPError {
  return isRecord(value) && typeof value.code === 'number' && typeof value.message === 'string';
}

export class MCPServer {
  private tools: Map<string, MCPTool>;
  private name: string;
  private version: string;

  constructor(config: MCPServerConfig) {
    this.name = config.name;
    this.version = config.version;
    this.tools = new Map(config.tools.map((tool) => [tool.name, tool]));

    logger.info(`MCP Server initialized: ${this.name} v${this.version}`);
    logger.info(`Registered tools: ${Array.from(this.tools.keys()).join(', ')}`);
  }

  async handleRequest(request: MCPRequest, context: MCPContext): Promise<MCPResponse> {
    logger.info(`Handling MCP request: ${request.method}`, { requestId: context.requestId });

    try {
      let result: MCPResult;

      switch (request.method) {
        case 'initialize':
          result = this.handleInitialize();
          break;

        case 'tools/list':
          result = this.handleToolsList();
          break;

        case 'tools/call':
          result = await this.handleToolCall(request.params, context);
          break;

        default:
          throw this.createError(MCP_ERROR_CODES.METHOD_NOT_FOUND, `Method not found: ${request.method}`);
      }

      return {
        jsonrpc: '2.0',
        id: request.id,
        result,
      };
    } catch (error) {
      logger.error('Error handling MCP request', error);

      // Los MCPError lanzados por el propio servidor se devuelven tal cual
      const mcpError: MCPError = isMCPError(error)
        ? error
        : this.createError(
            MCP_ERROR_CODES.INTERNAL_ERROR,
            error instanceof Error ? error.message : String(error)
          );

      return {
        jsonrpc: '2.0',
        id: request.id,
        error: mcpError,
      };
    }
  }

  private handleInitialize(): MCPInitializeResult {
    return {
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: {
        tools: {},
      },
      serverInfo: {
        name: this.name,
        version: this.version,
      },
    };
  }

  private handleToolsList(): MCPToolsListResult {
    const toolsList = Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));

    return {
      tools: toolsList,
    };
  }

  private async handleToolCall(params: unknown, context: MCPContext): Promise<MCPToolResult> {
    if (!isRecord(params) || typeof params.name !== 'string' || !params.name) {
      throw this.createError(MCP_ERROR_CODES.INVALID_PARAMS, 'Invalid params: name is required');
    }

    const name = params.name;
    const args = isRecord(params.arguments) ? params.arguments : {};

    const tool = this.tools.get(name);
    if (!tool) {
      throw this.createError(MCP_ERROR_CODES.INVALID_PARAMS, `Tool not found: ${name}`);
    }

    logger.info(`Executing tool: ${name}`, { userId: context.userId });

    try {
      const result = await tool.execute(args, context);

      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    } catch (error) {
      logger.error(`Tool execution failed: ${name}`, error);
      throw this.createError(
        MCP_ERROR_CODES.TOOL_EXECUTION_FAILED,
        `Tool execution failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private createError(code: number, message: string, data?: unknown): MCPError {
    return {
      code,
      message,
      ...(data !== undefined && { data }),
    };
  }

  formatSSEResponse(data: unknown): string {
    return `data: ${JSON.stringify(data)}\n\n`;
  }
}
