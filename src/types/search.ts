/**
 * Incident Search Types
 */

import {
  AnalyticsSnapshot,
  IncidentRecord,
  PipelineOutcome,
  RetrievalHit,
  ThresholdEstimate,
} from './incident';

export interface SearchIncidentsInput {
  query: string;
  max_results?: number;
  summarize?: boolean;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface IncidentSummary {
  summary: string;
  closure_highlights: string[];
  resolution_steps: string[];
  usage: TokenUsage;
}

/**
 * Fuente de hits (Bedrock Knowledge Base en producción)
 */
export interface IncidentRetriever {
  retrieve(params: { query: string; maxResults: number }): Promise<{ results: RetrievalHit[] }>;
}

/**
 * Guía de solución para la consulta (segunda base de conocimiento en producción)
 */
export interface SolutionGuideRetriever {
  retrieveSolutionGuide(query: string): Promise<string>;
}

export interface SummaryRequest {
  query: string;
  incidents: readonly IncidentRecord[];
  analytics: AnalyticsSnapshot;
  /** Texto de la guía; cadena vacía si no hay */
  solutionGuide: string;
}

/**
 * Resumen de las incidencias relevantes (LLM en producción)
 */
export interface IncidentSummarizer {
  summarizeIncidents(params: SummaryRequest): Promise<IncidentSummary>;
}

export interface ExcludedIncident {
  incident_id: string;
  similarity_score: number;
}

export interface IncidentSearchResult {
  query: string;
  outcome: PipelineOutcome;
  threshold: ThresholdEstimate | null;
  relevant_incidents: IncidentRecord[];
  non_relevant_incidents: ExcludedIncident[];
  analytics: AnalyticsSnapshot;
  summary: Omit<IncidentSummary, 'usage'> | null;
  metadata: {
    processing_time_ms: number;
    kb_query_time_ms: number;
    llm_time_ms: number;
    total_tokens: number;
    skipped_hits: number;
    solution_guide_used: boolean;
  };
}
