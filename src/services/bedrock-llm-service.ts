/**
 * Bedrock LLM Service
 * Resume las incidencias relevantes con un modelo Claude vía Bedrock Runtime
 */

import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import { IncidentSummarizer, IncidentSummary, SummaryRequest } from '../types/search';
import { logger } from '../utils/logger';
import { buildSummaryPrompt } from './prompt-builder';

export interface BedrockLLMConfig {
  modelId: string;
  region: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Subconjunto del cliente que usa el servicio (BedrockRuntimeClient lo cumple)
 */
export interface ModelInvocationClient {
  send(command: InvokeModelCommand): Promise<{ body?: Uint8Array }>;
}

const ModelResponseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })).min(1),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }),
});

const SummaryPayloadSchema = z.object({
  summary: z.string(),
  closure_highlights: z.array(z.string()).default([]),
  resolution_steps: z.array(z.string()).default([]),
});

export class BedrockLLMService implements IncidentSummarizer {
  private client: ModelInvocationClient;
  private modelId: string;
  private maxTokens: number;
  private temperature: number;

  constructor(config: BedrockLLMConfig, client?: ModelInvocationClient) {
    this.client = client || new BedrockRuntimeClient({ region: config.region });
    this.modelId = config.modelId;
    this.maxTokens = config.maxTokens || 2048;
    this.temperature = config.temperature ?? 0.3;
    logger.info(`BedrockLLMService initialized with model: ${config.modelId}`);
  }

  async summarizeIncidents(params: SummaryRequest): Promise<IncidentSummary> {
    const startTime = Date.now();

    try {
      const prompt = buildSummaryPrompt(params);

      const command = new InvokeModelCommand({
        modelId: this.modelId,
        contentType: 'application/json',
        accept: 'application/json',
        body: JSON.stringify({
          anthropic_version: 'bedrock-2023-05-31',
          max_tokens: this.maxTokens,
          temperature: this.temperature,
          messages: [
            {
              role: 'user',
              content: prompt,
            },
          ],
        }),
      });

      logger.debug('Invoking LLM for incident summary', {
        incidents: params.incidents.length,
        withSolutionGuide: params.solutionGuide.length > 0,
      });

      const response = await this.client.send(command);
      const responseBody: unknown = JSON.parse(new TextDecoder().decode(response.body));

      const summary = parseSummaryResponse(responseBody);

      const duration = Date.now() - startTime;
      logger.info(`LLM summary completed in ${duration}ms, tokens: ${summary.usage.totalTokens}`);

      return summary;
    } catch (error) {
      logger.error('Error summarizing incidents with LLM', error);
      throw new Error(`LLM summarization failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

export function parseSummaryResponse(responseBody: unknown): IncidentSummary {
  const response = ModelResponseSchema.parse(responseBody);
  const text = response.content.find((block) => block.text !== undefined)?.text || '';

  // El modelo a veces envuelve el JSON en texto; nos quedamos con el objeto
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new Error('No se pudo parsear la respuesta del LLM');
  }

  const payload = SummaryPayloadSchema.parse(JSON.parse(jsonMatch[0]));

  return {
    summary: payload.summary,
    closure_highlights: payload.closure_highlights,
    resolution_steps: payload.resolution_steps,
    usage: {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens,
    },
  };
}
