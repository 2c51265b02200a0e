/**
 * Pruebas - Lambda handler (invocación directa y Function URL)
 */

import { Context } from 'aws-lambda';
import { createHandler, FunctionUrlEvent } from '../index';
import { MCPServer } from '../mcp-server';
import { MCPContext, MCPTool } from '../types/mcp';

const lambdaContext: Context = {
  callbackWaitsForEmptyEventLoop: true,
  functionName: 'incident-relevance-analyzer',
  functionVersion: '$LATEST',
  invokedFunctionArn: 'arn:aws:lambda:eu-west-1:123456789012:function:incident-relevance-analyzer',
  memoryLimitInMB: '512',
  awsRequestId: 'req-test-1',
  logGroupName: '/aws/lambda/incident-relevance-analyzer',
  logStreamName: 'test-stream',
  getRemainingTimeInMillis: () => 30000,
  done: () => undefined,
  fail: () => undefined,
  succeed: () => undefined,
};

class WhoAmITool implements MCPTool {
  name = 'whoami';
  description = 'Devuelve el contexto recibido';
  inputSchema = { type: 'object' as const, properties: {} };

  async execute(_args: Record<string, unknown>, context: MCPContext): Promise<MCPContext> {
    return context;
  }
}

function urlEvent(overrides: Partial<FunctionUrlEvent> & { method?: string } = {}): FunctionUrlEvent {
  const { method = 'POST', ...rest } = overrides;
  return {
    requestContext: {
      http: { method },
      authorizer: { iam: { userArn: 'arn:aws:iam::123456789012:user/test-user', userId: 'AIDTEST', accountId: '123456789012' } },
    },
    ...rest,
  };
}

describe('Lambda handler', () => {
  const server = new MCPServer({ name: 'test-server', version: '1.0.0', tools: [new WhoAmITool()] });
  const handler = createHandler(() => server);

  test('La invocación directa devuelve la respuesta MCP sin envoltorio HTTP', async () => {
    const result = await handler({ jsonrpc: '2.0', id: 1, method: 'tools/list' }, lambdaContext);

    expect(result).toMatchObject({
      jsonrpc: '2.0',
      id: 1,
      result: { tools: [{ name: 'whoami' }] },
    });
  });

  test('La invocación directa usa un contexto de usuario fijo', async () => {
    const result = await handler(
      { jsonrpc: '2.0', id: 2, method: 'tools/call', params: { name: 'whoami' } },
      lambdaContext
    );

    expect(result).toMatchObject({ result: { content: [{ type: 'text' }] } });
    expect(JSON.stringify(result)).toContain('direct-invoke');
  });

  test('Una invocación directa sin método devuelve Bad Request', async () => {
    const result = await handler({ jsonrpc: '2.0', method: '' }, lambdaContext);

    expect(result).toEqual({ error: 'Bad Request', message: 'Missing method in MCP request' });
  });

  test('Debe responder al preflight CORS', async () => {
    const result = await handler(urlEvent({ method: 'OPTIONS' }), lambdaContext);

    expect(result).toEqual({
      statusCode: 200,
      headers: {
        'Access-Control-Allow-Origin': '*',
        'Access-Control-Allow-Methods': 'POST, OPTIONS',
        'Access-Control-Allow-Headers': '*',
      },
      body: '',
    });
  });

  test('Sin autenticación IAM debe responder 403', async () => {
    const result = await handler(
      { requestContext: { http: { method: 'POST' } }, body: '{"method":"tools/list"}' },
      lambdaContext
    );

    expect(result).toEqual({
      statusCode: 403,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ error: 'Unauthorized', message: 'AWS IAM authentication required' }),
    });
  });

  test('Un cuerpo que no es JSON debe responder 400', async () => {
    const result = await handler(urlEvent({ body: '{not json' }), lambdaContext);

    expect(result).toEqual({
      statusCode: 400,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ error: 'Bad Request', message: 'Invalid JSON in request body' }),
    });
  });

  test('Un cuerpo sin método debe responder 400', async () => {
    const result = await handler(urlEvent({ body: '{"jsonrpc":"2.0","id":1}' }), lambdaContext);

    expect(result).toMatchObject({ statusCode: 400 });
    expect(result).toHaveProperty(
      'body',
      JSON.stringify({ error: 'Bad Request', message: 'Missing method in MCP request' })
    );
  });

  test('Debe completar jsonrpc y descartar un id que no sea string ni número', async () => {
    const result = await handler(urlEvent({ body: '{"id":{"nested":1},"method":"tools/list"}' }), lambdaContext);

    expect(result).toMatchObject({ statusCode: 200 });
    const body: unknown = JSON.parse('body' in result ? result.body : '{}');
    expect(body).toMatchObject({ jsonrpc: '2.0', result: { tools: [{ name: 'whoami' }] } });
    expect(body).not.toHaveProperty('id');
  });

  test('Una petición HTTP autenticada devuelve 200 con la respuesta MCP', async () => {
    const result = await handler(
      urlEvent({ body: JSON.stringify({ jsonrpc: '2.0', id: 3, method: 'tools/call', params: { name: 'whoami' } }) }),
      lambdaContext
    );

    expect(result).toMatchObject({
      statusCode: 200,
      headers: { 'Content-Type': 'application/json', 'Access-Control-Allow-Origin': '*' },
    });
    expect(result).toHaveProperty('body');
    const body = 'body' in result ? result.body : '';
    expect(body).toContain('AIDTEST');
    expect(body).toContain('req-test-1');
  });

  test('Si el servidor no puede construirse debe responder 500', async () => {
    const failing = createHandler(() => {
      throw new Error('BEDROCK_KNOWLEDGE_BASE_ID environment variable is required');
    });

    const httpResult = await failing(urlEvent({ body: '{"jsonrpc":"2.0","method":"tools/list"}' }), lambdaContext);
    const directResult = await failing({ jsonrpc: '2.0', method: 'tools/list' }, lambdaContext);

    const expectedBody = {
      error: 'Internal Server Error',
      message: 'BEDROCK_KNOWLEDGE_BASE_ID environment variable is required',
      requestId: 'req-test-1',
    };
    expect(httpResult).toEqual({
      statusCode: 500,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(expectedBody),
    });
    expect(directResult).toEqual(expectedBody);
  });
});
