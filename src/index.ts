/**
 * AWS Lambda Handler for MCP Server
 * Supports both direct Lambda invocation and Function URL requests with AWS IAM authentication
 */

import { Context } from 'aws-lambda';
import { loadServiceConfig } from './config/service-config';
import { MCPServer } from './mcp-server';
import { createSearchSimilarIncidentsTool } from './tools/search-similar-incidents';
import { MCPRequest, MCPResponse } from './types/mcp';
import { logger } from './utils/logger';

export { IncidentRelevancePipeline } from './pipeline/incident-pipeline';
export { resolveRelevanceConfig } from './config/relevance-config';
export type { RelevanceConfig, RelevanceConfigInput } from './config/relevance-config';
export * from './types/incident';

/**
 * Evento de Lambda Function URL (solo los campos que usa el handler)
 */
export interface FunctionUrlEvent {
  body?: string;
  requestContext: {
    http: { method: string };
    authorizer?: {
      iam?: {
        userArn?: string;
        userId?: string;
        accountId?: string;
      };
    };
  };
}

export type HandlerEvent = FunctionUrlEvent | MCPRequest;

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export interface ErrorBody {
  error: string;
  message: string;
  requestId?: string;
}

export type HandlerResult = HttpResponse | MCPResponse | ErrorBody;

const JSON_HEADERS = { 'Content-Type': 'application/json' };

function isFunctionUrlEvent(event: HandlerEvent): event is FunctionUrlEvent {
  return 'requestContext' in event && typeof event.requestContext === 'object' && event.requestContext !== null;
}

/**
 * Construye la petición JSON-RPC a partir del cuerpo recibido; null si falta `method`.
 * Un `id` que no sea string ni número se descarta.
 */
function toMCPRequest(value: unknown): MCPRequest | null {
  if (typeof value !== 'object' || value === null || !('method' in value)) {
    return null;
  }
  if (typeof value.method !== 'string' || value.method.length === 0) {
    return null;
  }

  const request: MCPRequest = { jsonrpc: '2.0', method: value.method };
  if ('id' in value && (typeof value.id === 'string' || typeof value.id === 'number')) {
    request.id = value.id;
  }
  if ('params' in value) {
    request.params = value.params;
  }
  return request;
}

function httpError(statusCode: number, body: ErrorBody): HttpResponse {
  return {
    statusCode,
    headers: JSON_HEADERS,
    body: JSON.stringify(body),
  };
}

/**
 * Servidor MCP por defecto: uno por contenedor, construido desde el entorno
 */
let mcpServer: MCPServer | null = null;

export function getMCPServer(): MCPServer {
  if (!mcpServer) {
    mcpServer = new MCPServer({
      name: 'incident-relevance-analyzer',
      version: '1.0.0',
      tools: [createSearchSimilarIncidentsTool(loadServiceConfig(process.env))],
    });
  }
  return mcpServer;
}

export function createHandler(getServer: () => MCPServer) {
  return async (event: HandlerEvent, context: Context): Promise<HandlerResult> => {
    const requestId = context.awsRequestId;
    logger.info('Lambda invocation started', { requestId });

    const isDirectInvoke = !isFunctionUrlEvent(event);

    try {
      let userArn = 'direct-invoke';
      let userId = 'direct-invoke';
      let accountId = context.invokedFunctionArn?.split(':')[4] || 'unknown';
      let mcpRequest: unknown;

      if (!isFunctionUrlEvent(event)) {
        // Invocación directa: el evento es la propia petición MCP
        logger.info('Direct Lambda invocation detected', { requestId });
        mcpRequest = event;
      } else {
        // Preflight CORS
        if (event.requestContext.http.method === 'OPTIONS') {
          return {
            statusCode: 200,
            headers: {
              'Access-Control-Allow-Origin': '*',
              'Access-Control-Allow-Methods': 'POST, OPTIONS',
              'Access-Control-Allow-Headers': '*',
            },
            body: '',
          };
        }

        const iam = event.requestContext.authorizer?.iam;
        if (!iam) {
          logger.warn('Unauthorized request - no authentication provided', { requestId });
          return {
            statusCode: 403,
            headers: JSON_HEADERS,
            body: JSON.stringify({
              error: 'Unauthorized',
              message: 'AWS IAM authentication required',
            }),
          };
        }

        userArn = iam.userArn || 'unknown';
        userId = iam.userId || 'unknown';
        accountId = iam.accountId || 'unknown';
        logger.info('Authenticated via IAM Function URL', { userArn, userId, accountId });

        try {
          mcpRequest = JSON.parse(event.body || '{}');
        } catch (error) {
          logger.error('Invalid JSON in request body', error);
          return httpError(400, { error: 'Bad Request', message: 'Invalid JSON in request body' });
        }
      }

      const parsedRequest = toMCPRequest(mcpRequest);
      if (!parsedRequest) {
        logger.error('Missing method in MCP request');
        const errorResponse: ErrorBody = {
          error: 'Bad Request',
          message: 'Missing method in MCP request',
        };
        return isDirectInvoke ? errorResponse : httpError(400, errorResponse);
      }

      const mcpResponse = await getServer().handleRequest(parsedRequest, {
        userArn,
        userId,
        requestId,
      });

      logger.info('MCP request processed successfully', {
        method: parsedRequest.method,
        requestId,
        accountId,
        invocationType: isDirectInvoke ? 'direct' : 'http',
      });

      if (isDirectInvoke) {
        return mcpResponse;
      }
      return {
        statusCode: 200,
        headers: {
          ...JSON_HEADERS,
          'Access-Control-Allow-Origin': '*',
        },
        body: JSON.stringify(mcpResponse),
      };
    } catch (error) {
      logger.error('Unhandled error in Lambda handler', error);

      const errorResponse: ErrorBody = {
        error: 'Internal Server Error',
        message: error instanceof Error ? error.message : 'Unknown error occurred',
        requestId,
      };

      return isDirectInvoke ? errorResponse : httpError(500, errorResponse);
    }
  };
}

export const handler = createHandler(getMCPServer);
