/**
 * Bedrock Knowledge Base Service
 * Recupera incidencias históricas del vector store vía la API Retrieve de Bedrock
 */

import {
  BedrockAgentRuntimeClient,
  RetrieveCommand,
  RetrieveCommandInput,
  RetrieveCommandOutput,
} from '@aws-sdk/client-bedrock-agent-runtime';
import { RetrievalHit } from '../types/incident';
import { IncidentRetriever, SolutionGuideRetriever } from '../types/search';
import { logger } from '../utils/logger';

export interface BedrockKBConfig {
  knowledgeBaseId: string;
  region: string;
}

/**
 * Subconjunto del cliente que usa el servicio (BedrockAgentRuntimeClient lo cumple)
 */
export interface KnowledgeBaseClient {
  send(command: RetrieveCommand): Promise<Pick<RetrieveCommandOutput, 'retrievalResults'>>;
}

// La guía de solución se toma del fragmento más cercano
const SOLUTION_GUIDE_RESULTS = 1;

export class BedrockKBService implements IncidentRetriever, SolutionGuideRetriever {
  private client: KnowledgeBaseClient;
  private knowledgeBaseId: string;

  constructor(config: BedrockKBConfig, client?: KnowledgeBaseClient) {
    this.client = client || new BedrockAgentRuntimeClient({ region: config.region });
    this.knowledgeBaseId = config.knowledgeBaseId;
    logger.info(`BedrockKBService initialized with KB: ${config.knowledgeBaseId}`);
  }

  async retrieve(params: { query: string; maxResults: number }): Promise<{ results: RetrievalHit[] }> {
    const startTime = Date.now();

    try {
      const input: RetrieveCommandInput = {
        knowledgeBaseId: this.knowledgeBaseId,
        retrievalQuery: {
          text: params.query,
        },
        retrievalConfiguration: {
          vectorSearchConfiguration: {
            numberOfResults: params.maxResults,
            overrideSearchType: 'HYBRID', // vectorial + keywords
          },
        },
      };

      logger.debug('Retrieving from Knowledge Base', { query: params.query, maxResults: params.maxResults });

      const response = await this.client.send(new RetrieveCommand(input));

      // El texto del chunk viaja como `content`; el normalizador lo usa si el
      // metadata no trae descripción
      const results: RetrievalHit[] = (response.retrievalResults || []).map((result) => ({
        payload: {
          ...(result.metadata || {}),
          content: result.content?.text || '',
        },
        score: result.score || 0,
      }));

      const duration = Date.now() - startTime;
      logger.info(`KB retrieval completed in ${duration}ms, found ${results.length} results`);

      return { results };
    } catch (error) {
      logger.error('Error retrieving from Knowledge Base', error);
      throw new Error(`Knowledge Base retrieval failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Texto de los fragmentos recuperados, separados por una línea en blanco
   */
  async retrieveSolutionGuide(query: string): Promise<string> {
    const { results } = await this.retrieve({ query, maxResults: SOLUTION_GUIDE_RESULTS });
    return results
      .map((hit) => hit.payload.content)
      .filter((text): text is string => typeof text === 'string' && text.trim().length > 0)
      .join('\n\n');
  }
}
