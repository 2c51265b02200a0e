/**
 * Incident Relevance Pipeline
 * normalizar → umbral → clasificar → agregar, para una única consulta.
 * Síncrono y sin estado entre llamadas: cada run reserva sus propios contadores.
 */

import {
  RelevanceConfig,
  RelevanceConfigInput,
  resolveRelevanceConfig,
} from '../config/relevance-config';
import {
  ClassificationResult,
  PayloadFieldMapping,
  PipelineInput,
  PipelineOutcome,
  PipelineResult,
  ThresholdEstimate,
} from '../types/incident';
import { logger } from '../utils/logger';
import { aggregateAnalytics, emptyAnalyticsSnapshot } from './analytics-aggregator';
import { DEFAULT_FIELD_MAPPING, normalizeHits } from './normalizer';
import { classifyIncidents } from './relevance-classifier';
import { estimateThreshold } from './threshold';

export interface IncidentRelevancePipelineOptions {
  relevance?: RelevanceConfigInput;
  fieldMapping?: PayloadFieldMapping;
}

export class IncidentRelevancePipeline {
  private readonly config: Readonly<RelevanceConfig>;
  private readonly fieldMapping: PayloadFieldMapping;

  constructor(options: IncidentRelevancePipelineOptions = {}) {
    this.config = resolveRelevanceConfig(options.relevance);
    this.fieldMapping = options.fieldMapping || DEFAULT_FIELD_MAPPING;
  }

  get relevanceConfig(): Readonly<RelevanceConfig> {
    return this.config;
  }

  run(input: PipelineInput): PipelineResult {
    if (input.hits.length === 0) {
      logger.debug('Empty retrieval batch, skipping relevance pipeline');
      return this.shortCircuit('EMPTY', null, { relevant: [], non_relevant: [] }, 0, 0);
    }

    const normalized = normalizeHits(input.hits, this.fieldMapping);
    if (normalized.records.length === 0) {
      return this.shortCircuit(
        'EMPTY',
        null,
        { relevant: [], non_relevant: [] },
        normalized.skipped_missing_id,
        normalized.skipped_duplicates
      );
    }

    const estimate = estimateThreshold(
      normalized.records.map((record) => record.similarity_score),
      this.config
    );
    const classification = classifyIncidents(
      normalized.records,
      input.query,
      estimate.threshold,
      this.config
    );

    logger.debug('Relevance split computed', {
      mean_score: estimate.mean,
      threshold: estimate.threshold,
      relevant: classification.relevant.length,
      non_relevant: classification.non_relevant.length,
    });

    if (classification.relevant.length === 0) {
      return this.shortCircuit(
        'NO_RELEVANT',
        estimate,
        classification,
        normalized.skipped_missing_id,
        normalized.skipped_duplicates
      );
    }

    return {
      outcome: 'DONE',
      threshold: estimate,
      classification,
      analytics: aggregateAnalytics(
        classification.relevant,
        { batchSize: input.topK ?? input.hits.length },
        this.config
      ),
      normalization: {
        skipped_missing_id: normalized.skipped_missing_id,
        skipped_duplicates: normalized.skipped_duplicates,
      },
    };
  }

  private shortCircuit(
    outcome: Exclude<PipelineOutcome, 'DONE'>,
    threshold: ThresholdEstimate | null,
    classification: ClassificationResult,
    skippedMissingId: number,
    skippedDuplicates: number
  ): PipelineResult {
    return {
      outcome,
      threshold,
      classification,
      analytics: emptyAnalyticsSnapshot(),
      normalization: {
        skipped_missing_id: skippedMissingId,
        skipped_duplicates: skippedDuplicates,
      },
    };
  }
}
