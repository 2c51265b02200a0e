/**
 * Incident Relevance Types
 */

/**
 * Hit devuelto por el vector store (payload arbitrario + score de similitud)
 */
export interface RetrievalHit {
  payload: Record<string, unknown>;
  score: number;
}

/**
 * Campos de texto de una incidencia histórica (siempre presentes, '' por defecto)
 */
export interface IncidentFields {
  incident_id: string;
  description: string;
  closure_notes: string;
  assignment_group: string;
  ci_class: string;
  resolved_by: string;
  state: string;

  // Información descriptiva para el prompt
  job_name: string;
  impact: string;
  assigned_to: string;
  configuration_item: string;
  opened_by: string;
  closed_by: string;
  opened_time: string;
  resolved_time: string;
  closed_time: string;
  priority: string;
  urgency: string;
}

export type IncidentField = keyof IncidentFields;

/**
 * Incidencia normalizada (inmutable una vez construida)
 */
export type IncidentRecord = Readonly<IncidentFields> & {
  readonly similarity_score: number;
};

/**
 * Claves del payload a probar, en orden, para cada campo canónico
 */
export type PayloadFieldMapping = Readonly<Record<IncidentField, readonly string[]>>;

export interface NormalizationResult {
  records: IncidentRecord[];
  skipped_missing_id: number;
  skipped_duplicates: number;
}

export interface ThresholdEstimate {
  mean: number;
  threshold: number;
}

/**
 * Partición de un lote en relevantes / no relevantes (orden de ranking preservado)
 */
export interface ClassificationResult {
  relevant: IncidentRecord[];
  non_relevant: IncidentRecord[];
}

export type StateBucket = 'Closed' | 'Open' | 'Other';

export interface CountEntry {
  name: string;
  count: number;
}

/**
 * Analítica agregada sobre las incidencias relevantes
 */
export interface AnalyticsSnapshot {
  state_counts: Record<StateBucket, number>;
  top_resolvers: CountEntry[];
  top_assignment_groups: CountEntry[];
  top_ci_classes: CountEntry[];
  related_count: number;
  non_related_count: number;
  resolution_rate_percent: number;
}

export type PipelineOutcome = 'EMPTY' | 'NO_RELEVANT' | 'DONE';

export interface PipelineInput {
  hits: RetrievalHit[];
  query: string;
  /** Tamaño de lote pedido al vector store; base de non_related_count */
  topK?: number;
}

export interface PipelineResult {
  outcome: PipelineOutcome;
  threshold: ThresholdEstimate | null;
  classification: ClassificationResult;
  analytics: AnalyticsSnapshot;
  normalization: {
    skipped_missing_id: number;
    skipped_duplicates: number;
  };
}

/**
 * Estados agrupados en cada bucket (comparación tras trim + lower-case)
 */
export const CLOSED_STATES: ReadonlySet<string> = new Set(['closed', 'resolved', 'done', 'completed']);
export const OPEN_STATES: ReadonlySet<string> = new Set([
  'open',
  'in_progress',
  'assigned',
  'pending',
  'new',
  'active',
]);
