/**
 * Relevance Classifier
 * Separa un lote en relevantes / no relevantes: primero por score, y para los
 * que no alcanzan el umbral, por solapamiento de keywords con la consulta.
 */

import { RelevanceConfig } from '../config/relevance-config';
import { ClassificationResult, IncidentRecord } from '../types/incident';

/**
 * Palabras de la consulta (en minúsculas, sin repetir) con más de
 * `minKeywordLength` caracteres
 */
export function extractKeywords(query: string, minKeywordLength: number): Set<string> {
  const keywords = new Set<string>();
  for (const word of query.split(/\s+/)) {
    // Longitud en caracteres, no en unidades UTF-16
    if ([...word].length > minKeywordLength) {
      keywords.add(word.toLowerCase());
    }
  }
  return keywords;
}

export function keywordMatchRatio(
  record: Pick<IncidentRecord, 'description' | 'closure_notes'>,
  keywords: ReadonlySet<string>
): number {
  const searchText = `${record.description} ${record.closure_notes}`.toLowerCase();

  let matches = 0;
  for (const keyword of keywords) {
    if (searchText.includes(keyword)) {
      matches++;
    }
  }

  return matches / Math.max(keywords.size, 1);
}

export function isRelevant(
  record: IncidentRecord,
  threshold: number,
  keywords: ReadonlySet<string>,
  config: Pick<RelevanceConfig, 'keywordMatchRatio'>
): boolean {
  if (record.similarity_score >= threshold) {
    return true;
  }
  return keywordMatchRatio(record, keywords) >= config.keywordMatchRatio;
}

export function classifyIncidents(
  records: readonly IncidentRecord[],
  query: string,
  threshold: number,
  config: Pick<RelevanceConfig, 'keywordMatchRatio' | 'minKeywordLength'>
): ClassificationResult {
  const keywords = extractKeywords(query, config.minKeywordLength);
  const result: ClassificationResult = { relevant: [], non_relevant: [] };

  for (const record of records) {
    if (isRelevant(record, threshold, keywords, config)) {
      result.relevant.push(record);
    } else {
      result.non_relevant.push(record);
    }
  }

  return result;
}
