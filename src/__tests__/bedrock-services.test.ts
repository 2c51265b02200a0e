/**
 * Pruebas - Servicios de Bedrock (con clientes falsos en proceso)
 */

import { RetrieveCommand } from '@aws-sdk/client-bedrock-agent-runtime';
import { InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { emptyAnalyticsSnapshot } from '../pipeline/analytics-aggregator';
import { BedrockKBService } from '../services/bedrock-kb-service';
import { BedrockLLMService, parseSummaryResponse } from '../services/bedrock-llm-service';

function modelBody(text: string, usage = { input_tokens: 120, output_tokens: 30 }): Uint8Array {
  return new TextEncoder().encode(
    JSON.stringify({
      content: [{ type: 'text', text }],
      usage,
    })
  );
}

describe('BedrockKBService', () => {
  test('Debe convertir los resultados de Retrieve en hits', async () => {
    const send = jest.fn(async (_command: RetrieveCommand) => ({
      retrievalResults: [
        {
          content: { text: 'Database outage in region A' },
          score: 0.82,
          metadata: { number: 'INC1', state: 'Closed' },
        },
        {
          content: { text: 'Printer jam' },
        },
      ],
    }));
    const service = new BedrockKBService({ knowledgeBaseId: 'kb-test', region: 'eu-west-1' }, { send });

    const { results } = await service.retrieve({ query: 'database outage', maxResults: 5 });

    expect(results).toEqual([
      {
        payload: { number: 'INC1', state: 'Closed', content: 'Database outage in region A' },
        score: 0.82,
      },
      { payload: { content: 'Printer jam' }, score: 0 },
    ]);
  });

  test('Debe enviar la consulta con el número de resultados pedido', async () => {
    const send = jest.fn(async (_command: RetrieveCommand) => ({ retrievalResults: [] }));
    const service = new BedrockKBService({ knowledgeBaseId: 'kb-test', region: 'eu-west-1' }, { send });

    await service.retrieve({ query: 'vpn down', maxResults: 12 });

    const command = send.mock.calls[0][0];
    expect(command.input).toMatchObject({
      knowledgeBaseId: 'kb-test',
      retrievalQuery: { text: 'vpn down' },
      retrievalConfiguration: {
        vectorSearchConfiguration: { numberOfResults: 12, overrideSearchType: 'HYBRID' },
      },
    });
  });

  test('Debe devolver una lista vacía si Bedrock no trae resultados', async () => {
    const service = new BedrockKBService(
      { knowledgeBaseId: 'kb-test', region: 'eu-west-1' },
      { send: async () => ({ retrievalResults: undefined }) }
    );

    await expect(service.retrieve({ query: 'x', maxResults: 1 })).resolves.toEqual({ results: [] });
  });

  test('Debe leer la guía de solución del fragmento más cercano', async () => {
    const send = jest.fn(async (_command: RetrieveCommand) => ({
      retrievalResults: [
        { content: { text: '1. Revisar el clúster\n2. Reiniciar el nodo' } },
        { content: { text: '   ' } },
      ],
    }));
    const service = new BedrockKBService({ knowledgeBaseId: 'kb-solutions', region: 'eu-west-1' }, { send });

    const guide = await service.retrieveSolutionGuide('database outage');

    expect(guide).toBe('1. Revisar el clúster\n2. Reiniciar el nodo');
    expect(send.mock.calls[0][0].input).toMatchObject({
      knowledgeBaseId: 'kb-solutions',
      retrievalConfiguration: { vectorSearchConfiguration: { numberOfResults: 1 } },
    });
  });

  test('Debe envolver los errores del cliente', async () => {
    const service = new BedrockKBService(
      { knowledgeBaseId: 'kb-test', region: 'eu-west-1' },
      {
        send: async () => {
          throw new Error('AccessDenied');
        },
      }
    );

    await expect(service.retrieve({ query: 'x', maxResults: 1 })).rejects.toThrow(
      'Knowledge Base retrieval failed: AccessDenied'
    );
  });
});

describe('parseSummaryResponse', () => {
  test('Debe extraer el JSON aunque venga rodeado de texto', () => {
    const summary = parseSummaryResponse({
      content: [
        {
          type: 'text',
          text: 'Aquí está el resumen:\n{"summary": "Reinicios de BD", "resolution_steps": ["Reiniciar el clúster"]}\nFin.',
        },
      ],
      usage: { input_tokens: 100, output_tokens: 25 },
    });

    expect(summary).toEqual({
      summary: 'Reinicios de BD',
      closure_highlights: [],
      resolution_steps: ['Reiniciar el clúster'],
      usage: { inputTokens: 100, outputTokens: 25, totalTokens: 125 },
    });
  });

  test('Debe fallar si no hay JSON en la respuesta', () => {
    expect(() =>
      parseSummaryResponse({
        content: [{ type: 'text', text: 'sin datos' }],
        usage: { input_tokens: 1, output_tokens: 1 },
      })
    ).toThrow('No se pudo parsear la respuesta del LLM');
  });

  test('Debe rechazar una respuesta sin la forma esperada', () => {
    expect(() => parseSummaryResponse({ content: [] })).toThrow();
    expect(() =>
      parseSummaryResponse({
        content: [{ type: 'text', text: '{"closure_highlights": []}' }],
        usage: { input_tokens: 1, output_tokens: 1 },
      })
    ).toThrow();
  });
});

describe('BedrockLLMService', () => {
  const params = {
    query: 'database outage',
    incidents: [],
    analytics: emptyAnalyticsSnapshot(),
    solutionGuide: '',
  };

  test('Debe invocar el modelo con el prompt y devolver el resumen', async () => {
    const send = jest.fn(async (_command: InvokeModelCommand) => ({
      body: modelBody('{"summary": "ok", "closure_highlights": ["a"], "resolution_steps": ["b"]}'),
    }));
    const service = new BedrockLLMService({ modelId: 'model-test', region: 'eu-west-1' }, { send });

    const summary = await service.summarizeIncidents(params);

    expect(summary).toEqual({
      summary: 'ok',
      closure_highlights: ['a'],
      resolution_steps: ['b'],
      usage: { inputTokens: 120, outputTokens: 30, totalTokens: 150 },
    });

    const command = send.mock.calls[0][0];
    expect(command.input.modelId).toBe('model-test');
    const body: unknown = JSON.parse(String(command.input.body));
    expect(body).toMatchObject({
      anthropic_version: 'bedrock-2023-05-31',
      max_tokens: 2048,
      temperature: 0.3,
      messages: [{ role: 'user', content: expect.stringContaining('# CONSULTA\ndatabase outage') }],
    });
  });

  test('Debe incluir la guía de solución en el prompt', async () => {
    const send = jest.fn(async (_command: InvokeModelCommand) => ({
      body: modelBody('{"summary": "ok"}'),
    }));
    const service = new BedrockLLMService({ modelId: 'model-test', region: 'eu-west-1' }, { send });

    await service.summarizeIncidents({ ...params, solutionGuide: 'Reiniciar el nodo primario' });

    const body: unknown = JSON.parse(String(send.mock.calls[0][0].input.body));
    expect(body).toMatchObject({
      messages: [{ content: expect.stringContaining('# GUÍA DE SOLUCIÓN\nReiniciar el nodo primario\n') }],
    });
  });

  test('Debe respetar max_tokens y temperature configurados', async () => {
    const send = jest.fn(async (_command: InvokeModelCommand) => ({
      body: modelBody('{"summary": "ok"}'),
    }));
    const service = new BedrockLLMService(
      { modelId: 'model-test', region: 'eu-west-1', maxTokens: 512, temperature: 0 },
      { send }
    );

    await service.summarizeIncidents(params);

    const body: unknown = JSON.parse(String(send.mock.calls[0][0].input.body));
    expect(body).toMatchObject({ max_tokens: 512, temperature: 0 });
  });

  test('Debe envolver los errores de parseo', async () => {
    const service = new BedrockLLMService(
      { modelId: 'model-test', region: 'eu-west-1' },
      { send: async () => ({ body: modelBody('no json here') }) }
    );

    await expect(service.summarizeIncidents(params)).rejects.toThrow(
      'LLM summarization failed: No se pudo parsear la respuesta del LLM'
    );
  });
});
