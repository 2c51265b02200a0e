/**
 * Parámetros del clasificador de relevancia y de la analítica
 */

import { z } from 'zod';

const TopNSchema = z.object({
  resolvers: z.number().int().min(1).default(10),
  assignmentGroups: z.number().int().min(1).default(8),
  ciClasses: z.number().int().min(1).default(6),
});

export const RelevanceConfigSchema = z.object({
  /** Umbral absoluto mínimo de similitud */
  thresholdFloor: z.number().min(0).max(1).default(0.6),
  /** Fracción de la media del lote usada como umbral relativo */
  thresholdMultiplier: z.number().finite().min(0).default(0.7),
  /** Ratio mínimo de keywords de la consulta presentes en el texto */
  keywordMatchRatio: z.number().min(0).max(1).default(0.3),
  /** Las keywords deben tener MÁS caracteres que este valor */
  minKeywordLength: z.number().int().min(0).default(2),
  topN: TopNSchema.default({}),
});

export type RelevanceConfig = z.output<typeof RelevanceConfigSchema>;
export type RelevanceConfigInput = z.input<typeof RelevanceConfigSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join(', ');
}

/**
 * Combina overrides con los valores por defecto y valida.
 * Una configuración inválida se rechaza aquí, nunca se corrige en silencio.
 */
export function resolveRelevanceConfig(overrides: RelevanceConfigInput = {}): Readonly<RelevanceConfig> {
  const parsed = RelevanceConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new Error(`Invalid relevance configuration: ${formatIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}

export const DEFAULT_RELEVANCE_CONFIG: Readonly<RelevanceConfig> = resolveRelevanceConfig();
