/**
 * MCP Tool: search_similar_incidents
 * Recupera incidencias similares, separa las relevantes, agrega analítica y
 * (opcionalmente) resume cómo se resolvieron
 */

import { z } from 'zod';
import { formatIssues } from '../config/relevance-config';
import { ServiceConfig } from '../config/service-config';
import { IncidentRelevancePipeline } from '../pipeline/incident-pipeline';
import { BedrockKBService } from '../services/bedrock-kb-service';
import { BedrockLLMService } from '../services/bedrock-llm-service';
import { MCPContext, MCPInputSchema, MCPTool } from '../types/mcp';
import {
  IncidentRetriever,
  IncidentSearchResult,
  IncidentSummarizer,
  SearchIncidentsInput,
  SolutionGuideRetriever,
} from '../types/search';
import { logger } from '../utils/logger';

export const MAX_RESULTS_LIMIT = 100;

const SearchInputSchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
  max_results: z.number().int().min(1).max(MAX_RESULTS_LIMIT).optional(),
  summarize: z.boolean().optional(),
});

export interface SearchSimilarIncidentsDeps {
  retriever: IncidentRetriever;
  summarizer: IncidentSummarizer;
  /** Opcional: sin él los pasos de resolución no tienen guía */
  solutionGuide?: SolutionGuideRetriever;
  pipeline: IncidentRelevancePipeline;
  defaultMaxResults: number;
}

export class SearchSimilarIncidentsTool implements MCPTool {
  name = 'search_similar_incidents';
  description =
    'Busca incidencias similares en la base de conocimiento, separa las realmente relevantes para la consulta, ' +
    'devuelve analítica agregada (estados, resolutores, grupos, clases de CI) y un resumen de cómo se resolvieron';

  inputSchema: MCPInputSchema;

  private retriever: IncidentRetriever;
  private summarizer: IncidentSummarizer;
  private solutionGuide?: SolutionGuideRetriever;
  private pipeline: IncidentRelevancePipeline;
  private defaultMaxResults: number;

  constructor(deps: SearchSimilarIncidentsDeps) {
    this.retriever = deps.retriever;
    this.summarizer = deps.summarizer;
    this.solutionGuide = deps.solutionGuide;
    this.pipeline = deps.pipeline;
    this.defaultMaxResults = deps.defaultMaxResults;

    this.inputSchema = {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'Descripción libre de la incidencia a analizar',
        },
        max_results: {
          type: 'number',
          description: `Número de incidencias a recuperar del histórico (1-${MAX_RESULTS_LIMIT})`,
          default: this.defaultMaxResults,
          minimum: 1,
          maximum: MAX_RESULTS_LIMIT,
        },
        summarize: {
          type: 'boolean',
          description: 'Si true, resume con IA las incidencias relevantes',
          default: true,
        },
      },
      required: ['query'],
    };

    logger.info('SearchSimilarIncidentsTool initialized');
  }

  async execute(args: Record<string, unknown>, context: MCPContext): Promise<IncidentSearchResult> {
    const startTime = Date.now();
    const input = this.parseInput(args);
    const maxResults = input.max_results ?? this.defaultMaxResults;

    logger.info(`[${context.userId}] Searching for similar incidents`);
    logger.debug('Input arguments', input);

    try {
      // Paso 1: Recuperar candidatos del vector store
      const kbStart = Date.now();
      const { results } = await this.retriever.retrieve({ query: input.query, maxResults });
      const kbTime = Date.now() - kbStart;

      // Paso 2: Clasificar y agregar
      const pipelineResult = this.pipeline.run({
        hits: results,
        query: input.query,
        topK: maxResults,
      });
      const { relevant, non_relevant } = pipelineResult.classification;

      logger.info(
        `[${context.userId}] Relevance outcome ${pipelineResult.outcome}: ${relevant.length} relevant, ${non_relevant.length} non-relevant`
      );

      // Paso 3: Resumir solo si hay incidencias relevantes
      let summary: IncidentSearchResult['summary'] = null;
      let llmTime = 0;
      let totalTokens = 0;
      let solutionGuideUsed = false;
      if (input.summarize !== false && pipelineResult.outcome === 'DONE') {
        const solutionGuide = await this.loadSolutionGuide(input.query, context);
        solutionGuideUsed = solutionGuide.length > 0;

        const llmStart = Date.now();
        const result = await this.summarizer.summarizeIncidents({
          query: input.query,
          incidents: relevant,
          analytics: pipelineResult.analytics,
          solutionGuide,
        });
        llmTime = Date.now() - llmStart;
        totalTokens = result.usage.totalTokens;
        summary = {
          summary: result.summary,
          closure_highlights: result.closure_highlights,
          resolution_steps: result.resolution_steps,
        };
      }

      const totalTime = Date.now() - startTime;
      logger.info(`[${context.userId}] Search completed successfully in ${totalTime}ms`);

      return {
        query: input.query,
        outcome: pipelineResult.outcome,
        threshold: pipelineResult.threshold,
        relevant_incidents: relevant,
        non_relevant_incidents: non_relevant.map((incident) => ({
          incident_id: incident.incident_id,
          similarity_score: incident.similarity_score,
        })),
        analytics: pipelineResult.analytics,
        summary,
        metadata: {
          processing_time_ms: totalTime,
          kb_query_time_ms: kbTime,
          llm_time_ms: llmTime,
          total_tokens: totalTokens,
          skipped_hits:
            pipelineResult.normalization.skipped_missing_id + pipelineResult.normalization.skipped_duplicates,
          solution_guide_used: solutionGuideUsed,
        },
      };
    } catch (error) {
      logger.error(`[${context.userId}] Error searching similar incidents`, error);
      throw new Error(
        `Failed to search similar incidents: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  /**
   * Un fallo al leer la guía no impide el resumen: se sigue sin guía
   */
  private async loadSolutionGuide(query: string, context: MCPContext): Promise<string> {
    if (!this.solutionGuide) {
      return '';
    }
    try {
      return (await this.solutionGuide.retrieveSolutionGuide(query)).trim();
    } catch (error) {
      logger.error(`[${context.userId}] Failed to load solution guide, continuing without it`, error);
      return '';
    }
  }

  private parseInput(args: Record<string, unknown>): SearchIncidentsInput {
    const parsed = SearchInputSchema.safeParse(args);
    if (!parsed.success) {
      throw new Error(`Invalid arguments: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }
}

/**
 * Construye la herramienta con los servicios de Bedrock a partir de la configuración
 */
export function createSearchSimilarIncidentsTool(config: ServiceConfig): SearchSimilarIncidentsTool {
  return new SearchSimilarIncidentsTool({
    retriever: new BedrockKBService({
      knowledgeBaseId: config.knowledgeBaseId,
      region: config.region,
    }),
    solutionGuide: config.solutionsKnowledgeBaseId
      ? new BedrockKBService({
          knowledgeBaseId: config.solutionsKnowledgeBaseId,
          region: config.region,
        })
      : undefined,
    summarizer: new BedrockLLMService({
      modelId: config.modelId,
      region: config.region,
    }),
    pipeline: new IncidentRelevancePipeline({ relevance: config.relevance }),
    defaultMaxResults: config.topK,
  });
}
