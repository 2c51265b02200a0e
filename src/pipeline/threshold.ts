/**
 * Score Threshold Estimator
 */

import { RelevanceConfig } from '../config/relevance-config';
import { ThresholdEstimate } from '../types/incident';

/**
 * Umbral dinámico: max(media * multiplicador, suelo).
 * Se recalcula por consulta; nunca se cachea entre lotes.
 */
export function estimateThreshold(
  scores: readonly number[],
  config: Pick<RelevanceConfig, 'thresholdFloor' | 'thresholdMultiplier'>
): ThresholdEstimate {
  if (scores.length === 0) {
    throw new Error('Cannot estimate a relevance threshold for an empty batch');
  }

  const mean = scores.reduce((sum, score) => sum + score, 0) / scores.length;
  const threshold = Math.max(mean * config.thresholdMultiplier, config.thresholdFloor);

  return { mean, threshold };
}
