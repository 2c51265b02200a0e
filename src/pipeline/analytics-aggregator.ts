/**
 * Analytics Aggregator
 * Conteos por estado, resolutor, grupo de asignación y clase de CI sobre las
 * incidencias relevantes.
 */

import { RelevanceConfig } from '../config/relevance-config';
import {
  AnalyticsSnapshot,
  CLOSED_STATES,
  CountEntry,
  IncidentRecord,
  OPEN_STATES,
  StateBucket,
} from '../types/incident';

export interface AggregateOptions {
  /** Tamaño del lote recuperado (top_k); sin él non_related_count es 0 */
  batchSize?: number;
}

export function classifyState(state: string): StateBucket {
  const normalized = state.trim().toLowerCase();
  if (CLOSED_STATES.has(normalized)) {
    return 'Closed';
  }
  if (OPEN_STATES.has(normalized)) {
    return 'Open';
  }
  return 'Other';
}

function increment(counter: Map<string, number>, key: string): void {
  counter.set(key, (counter.get(key) || 0) + 1);
}

/**
 * Top N por conteo descendente; en empate gana el primero visto
 * (el Map conserva el orden de inserción y Array.prototype.sort es estable)
 */
export function topN(counter: ReadonlyMap<string, number>, limit: number): CountEntry[] {
  return Array.from(counter, ([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export function roundToOneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}

export function emptyAnalyticsSnapshot(): AnalyticsSnapshot {
  return {
    state_counts: { Closed: 0, Open: 0, Other: 0 },
    top_resolvers: [],
    top_assignment_groups: [],
    top_ci_classes: [],
    related_count: 0,
    non_related_count: 0,
    resolution_rate_percent: 0,
  };
}

export function aggregateAnalytics(
  relevant: readonly IncidentRecord[],
  options: AggregateOptions,
  config: Pick<RelevanceConfig, 'topN'>
): AnalyticsSnapshot {
  const stateCounts: Record<StateBucket, number> = { Closed: 0, Open: 0, Other: 0 };
  const resolvers = new Map<string, number>();
  const groups = new Map<string, number>();
  const ciClasses = new Map<string, number>();

  for (const incident of relevant) {
    const bucket = classifyState(incident.state);
    stateCounts[bucket]++;

    // Solo cuenta como resolución si está cerrada y tiene resolutor
    const resolvedBy = incident.resolved_by.trim();
    if (bucket === 'Closed' && resolvedBy) {
      increment(resolvers, resolvedBy);
    }

    const group = incident.assignment_group.trim();
    if (group) {
      increment(groups, group);
    }

    const ciClass = incident.ci_class.trim();
    if (ciClass) {
      increment(ciClasses, ciClass);
    }
  }

  const relatedCount = relevant.length;
  const nonRelatedCount =
    options.batchSize === undefined ? 0 : Math.max(options.batchSize - relatedCount, 0);
  const resolutionRate =
    relatedCount === 0 ? 0 : roundToOneDecimal((stateCounts.Closed / relatedCount) * 100);

  return {
    state_counts: stateCounts,
    top_resolvers: topN(resolvers, config.topN.resolvers),
    top_assignment_groups: topN(groups, config.topN.assignmentGroups),
    top_ci_classes: topN(ciClasses, config.topN.ciClasses),
    related_count: relatedCount,
    non_related_count: nonRelatedCount,
    resolution_rate_percent: resolutionRate,
  };
}
