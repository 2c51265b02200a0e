/**
 * Configuración del servicio, leída una sola vez del entorno de la Lambda
 */

import { z } from 'zod';
import {
  RelevanceConfig,
  RelevanceConfigInput,
  formatIssues,
  resolveRelevanceConfig,
} from './relevance-config';

export interface ServiceConfig {
  knowledgeBaseId: string;
  /** Base de conocimiento con las guías de solución; sin ella no se consultan */
  solutionsKnowledgeBaseId?: string;
  modelId: string;
  region: string;
  topK: number;
  relevance: Readonly<RelevanceConfig>;
}

// Una variable vacía o solo con espacios cuenta como no definida
const toNumberOrUnset = (value: unknown): unknown => {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value.trim() === '' ? undefined : Number(value);
  }
  return value;
};

const optionalNumber = z.preprocess(toNumberOrUnset, z.number().optional());

const requiredString = (name: string) =>
  z
    .string({ required_error: `${name} environment variable is required` })
    .trim()
    .min(1, `${name} environment variable is required`);

const ServiceEnvSchema = z.object({
  BEDROCK_KNOWLEDGE_BASE_ID: requiredString('BEDROCK_KNOWLEDGE_BASE_ID'),
  BEDROCK_SOLUTIONS_KB_ID: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().trim().optional()
  ),
  BEDROCK_MODEL_ID: requiredString('BEDROCK_MODEL_ID'),
  BEDROCK_REGION: z.string().trim().min(1).default('eu-west-1'),
  SEARCH_TOP_K: z.preprocess(toNumberOrUnset, z.number().int().min(1).max(100).default(40)),
  RELEVANCE_THRESHOLD_FLOOR: optionalNumber,
  RELEVANCE_THRESHOLD_MULTIPLIER: optionalNumber,
  RELEVANCE_KEYWORD_MATCH_RATIO: optionalNumber,
  RELEVANCE_MIN_KEYWORD_LENGTH: optionalNumber,
});

export function loadServiceConfig(env: Record<string, string | undefined>): ServiceConfig {
  const parsed = ServiceEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid service configuration: ${formatIssues(parsed.error)}`);
  }

  const values = parsed.data;
  const overrides: RelevanceConfigInput = {};
  if (values.RELEVANCE_THRESHOLD_FLOOR !== undefined) {
    overrides.thresholdFloor = values.RELEVANCE_THRESHOLD_FLOOR;
  }
  if (values.RELEVANCE_THRESHOLD_MULTIPLIER !== undefined) {
    overrides.thresholdMultiplier = values.RELEVANCE_THRESHOLD_MULTIPLIER;
  }
  if (values.RELEVANCE_KEYWORD_MATCH_RATIO !== undefined) {
    overrides.keywordMatchRatio = values.RELEVANCE_KEYWORD_MATCH_RATIO;
  }
  if (values.RELEVANCE_MIN_KEYWORD_LENGTH !== undefined) {
    overrides.minKeywordLength = values.RELEVANCE_MIN_KEYWORD_LENGTH;
  }

  return {
    knowledgeBaseId: values.BEDROCK_KNOWLEDGE_BASE_ID,
    solutionsKnowledgeBaseId: values.BEDROCK_SOLUTIONS_KB_ID,
    modelId: values.BEDROCK_MODEL_ID,
    region: values.BEDROCK_REGION,
    topK: values.SEARCH_TOP_K,
    relevance: resolveRelevanceConfig(overrides),
  };
}
