/**
 * Construcción del prompt de resumen a partir de las incidencias relevantes
 */

import { AnalyticsSnapshot, CountEntry, IncidentField, IncidentRecord } from '../types/incident';
import { SummaryRequest } from '../types/search';

const INCIDENT_LABELS: ReadonlyArray<[IncidentField, string]> = [
  ['incident_id', 'ID'],
  ['job_name', 'Job'],
  ['description', 'Descripción'],
  ['impact', 'Impacto'],
  ['closure_notes', 'Notas de cierre'],
  ['assigned_to', 'Asignada a'],
  ['assignment_group', 'Grupo de asignación'],
  ['configuration_item', 'Elemento de configuración'],
  ['ci_class', 'Clase de CI'],
  ['opened_by', 'Abierta por'],
  ['resolved_by', 'Resuelta por'],
  ['closed_by', 'Cerrada por'],
  ['opened_time', 'Apertura'],
  ['resolved_time', 'Resolución'],
  ['closed_time', 'Cierre'],
  ['priority', 'Prioridad'],
  ['urgency', 'Urgencia'],
  ['state', 'Estado'],
];

// Valores que el origen usa como "sin dato"
const PLACEHOLDER_VALUES: ReadonlySet<string> = new Set(['n/a', 'none', 'null', 'unknown']);

export function hasValue(value: string): boolean {
  const trimmed = value.trim();
  return trimmed.length > 0 && !PLACEHOLDER_VALUES.has(trimmed.toLowerCase());
}

export function formatIncident(incident: IncidentRecord, index: number): string {
  const lines = [
    `### Incidencia ${index + 1} (Similitud: ${(incident.similarity_score * 100).toFixed(1)}%)`,
  ];
  for (const [field, label] of INCIDENT_LABELS) {
    const value = incident[field];
    if (hasValue(value)) {
      lines.push(`**${label}**: ${value.trim()}`);
    }
  }
  return lines.join('\n');
}

export function buildClosureDigest(incidents: readonly IncidentRecord[]): string {
  return incidents
    .filter((incident) => hasValue(incident.closure_notes))
    .map((incident) => `- ${incident.incident_id}: ${incident.closure_notes.trim()}`)
    .join('\n');
}

function formatCounts(entries: readonly CountEntry[]): string {
  return entries.map((entry) => `${entry.name} (${entry.count})`).join(', ');
}

export function buildAnalyticsDigest(analytics: AnalyticsSnapshot): string {
  const lines = [
    `- Incidencias relacionadas: ${analytics.related_count} (descartadas: ${analytics.non_related_count})`,
    `- Estados: ${analytics.state_counts.Closed} cerradas, ${analytics.state_counts.Open} abiertas, ${analytics.state_counts.Other} otras`,
    `- Tasa de resolución: ${analytics.resolution_rate_percent}%`,
  ];
  if (analytics.top_resolvers.length > 0) {
    lines.push(`- Principales resolutores: ${formatCounts(analytics.top_resolvers)}`);
  }
  if (analytics.top_assignment_groups.length > 0) {
    lines.push(`- Principales grupos: ${formatCounts(analytics.top_assignment_groups)}`);
  }
  if (analytics.top_ci_classes.length > 0) {
    lines.push(`- Clases de CI: ${formatCounts(analytics.top_ci_classes)}`);
  }
  return lines.join('\n');
}

export function buildSummaryPrompt(params: SummaryRequest): string {
  const incidentsText =
    params.incidents.length > 0
      ? params.incidents.map((incident, i) => formatIncident(incident, i)).join('\n\n')
      : 'No se encontraron incidencias relevantes.';
  const closureDigest = buildClosureDigest(params.incidents) || 'Sin notas de cierre.';
  const solutionGuide = params.solutionGuide.trim() || 'Sin guía de solución disponible.';

  return `Eres un asistente de soporte de incidencias. Resume cómo se resolvieron en el pasado las incidencias similares a la consulta del usuario.

# CONSULTA
${params.query}

# INCIDENCIAS RELEVANTES DEL HISTÓRICO
${incidentsText}

# NOTAS DE CIERRE
${closureDigest}

# ANALÍTICA
${buildAnalyticsDigest(params.analytics)}

# GUÍA DE SOLUCIÓN
${solutionGuide}

# INSTRUCCIONES
1. **RESUMEN**: Qué tienen en común estas incidencias y cómo se resolvieron
2. **NOTAS DE CIERRE**: Puntos clave extraídos de las notas de cierre
3. **PASOS DE RESOLUCIÓN**: Pasos concretos y ordenados tomados de la guía de solución; si no hay guía, deja la lista vacía
No inventes valores que no aparezcan en los datos.

IMPORTANTE: Responde ÚNICAMENTE en formato JSON válido, sin texto adicional antes o después:

{
  "summary": "Resumen de las incidencias...",
  "closure_highlights": ["Punto clave 1...", "Punto clave 2..."],
  "resolution_steps": ["Paso 1...", "Paso 2..."]
}`;
}
