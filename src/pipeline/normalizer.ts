/**
 * Incident Record Normalizer
 * Convierte hits del vector store en IncidentRecord canónicos
 */

import {
  IncidentField,
  IncidentRecord,
  NormalizationResult,
  PayloadFieldMapping,
  RetrievalHit,
} from '../types/incident';
import { logger } from '../utils/logger';

/**
 * Mapeo por defecto: admite las distintas versiones del payload de incidencias
 * (export de ServiceNow, carga legacy y documentos de la Knowledge Base)
 */
export const DEFAULT_FIELD_MAPPING: PayloadFieldMapping = {
  incident_id: ['number', 'incident_number', 'incident_id', 'incident'],
  description: ['description', 'incident_description', 'content'],
  closure_notes: ['closure_notes', 'resolution'],
  assignment_group: ['assignment_group'],
  ci_class: ['ci_class'],
  resolved_by: ['resolved_by'],
  state: ['state'],
  job_name: ['job_name'],
  impact: ['impact'],
  assigned_to: ['assigned_to'],
  configuration_item: ['configuration_item'],
  opened_by: ['opened_by'],
  closed_by: ['closed_by'],
  opened_time: ['opened_time', 'opened_at'],
  resolved_time: ['resolved', 'resolved_time', 'resolved_at'],
  closed_time: ['closed', 'closed_time', 'closed_at'],
  priority: ['priority'],
  urgency: ['urgency'],
};

function toText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if ((typeof value === 'number' && Number.isFinite(value)) || typeof value === 'boolean') {
    return String(value);
  }
  return '';
}

function pickField(payload: Record<string, unknown>, keys: readonly string[]): string {
  for (const key of keys) {
    const text = toText(payload[key]);
    if (text.trim().length > 0) {
      return text;
    }
  }
  return '';
}

/**
 * Construye un IncidentRecord a partir de un hit.
 * Devuelve null si el payload no trae identificador.
 */
export function normalizeHit(
  hit: RetrievalHit,
  mapping: PayloadFieldMapping = DEFAULT_FIELD_MAPPING
): IncidentRecord | null {
  const pick = (field: IncidentField): string => pickField(hit.payload, mapping[field]);

  const incidentId = pick('incident_id').trim();
  if (!incidentId) {
    return null;
  }

  return Object.freeze({
    incident_id: incidentId,
    description: pick('description'),
    closure_notes: pick('closure_notes'),
    assignment_group: pick('assignment_group'),
    ci_class: pick('ci_class'),
    resolved_by: pick('resolved_by'),
    state: pick('state'),
    job_name: pick('job_name'),
    impact: pick('impact'),
    assigned_to: pick('assigned_to'),
    configuration_item: pick('configuration_item'),
    opened_by: pick('opened_by'),
    closed_by: pick('closed_by'),
    opened_time: pick('opened_time'),
    resolved_time: pick('resolved_time'),
    closed_time: pick('closed_time'),
    priority: pick('priority'),
    urgency: pick('urgency'),
    similarity_score: hit.score,
  });
}

export function normalizeHits(
  hits: readonly RetrievalHit[],
  mapping: PayloadFieldMapping = DEFAULT_FIELD_MAPPING
): NormalizationResult {
  const records: IncidentRecord[] = [];
  const seen = new Set<string>();
  let skippedMissingId = 0;
  let skippedDuplicates = 0;

  for (const hit of hits) {
    const record = normalizeHit(hit, mapping);
    if (!record) {
      skippedMissingId++;
      continue;
    }
    // El primer hit (mejor ranking) gana
    if (seen.has(record.incident_id)) {
      skippedDuplicates++;
      continue;
    }
    seen.add(record.incident_id);
    records.push(record);
  }

  if (skippedMissingId > 0 || skippedDuplicates > 0) {
    logger.warn('Skipped retrieval hits during normalization', {
      total: hits.length,
      kept: records.length,
      skipped_missing_id: skippedMissingId,
      skipped_duplicates: skippedDuplicates,
    });
  }

  return {
    records,
    skipped_missing_id: skippedMissingId,
    skipped_duplicates: skippedDuplicates,
  };
}
