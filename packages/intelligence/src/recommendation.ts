import { asArray, asRecord, asString, isRecord, type JsonObject } from '@alertline/core';

export const RECOMMENDATION_TYPES = ['memory', 'disk', 'cpu', 'process', 'network', 'general'] as const;
export type RecommendationType = (typeof RECOMMENDATION_TYPES)[number];

export const RECOMMENDATION_PRIORITIES = ['low', 'medium', 'high', 'critical'] as const;
export type RecommendationPriority = (typeof RECOMMENDATION_PRIORITIES)[number];

/** Ordinal used to find the most urgent recommendation */
export const PRIORITY_RANK: Readonly<Record<RecommendationPriority, number>> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

/**
 * A single recommendation from an intelligence provider
 */
export interface Recommendation {
  type: RecommendationType;
  priority: RecommendationPriority;
  /** Short title */
  title: string;
  description: string;
  /** Structured supporting data, e.g. top processes */
  details: JsonObject;
  /** Suggested remediation steps */
  actions: string[];
  incidentId: number | null;
}

export function isRecommendationPriority(value: string): value is RecommendationPriority {
  return RECOMMENDATION_PRIORITIES.some((priority) => priority === value);
}

function isRecommendationType(value: string): value is RecommendationType {
  return RECOMMENDATION_TYPES.some((type) => type === value);
}

export function normalizePriority(value: unknown): RecommendationPriority {
  const priority = asString(value).trim().toLowerCase();
  return isRecommendationPriority(priority) ? priority : 'low';
}

/**
 * Plain-record form of whatever a provider returned.
 *
 * Providers may hand back class instances, loose objects or bare strings;
 * downstream nodes only ever see this shape.
 */
export function toRecommendationRecord(value: unknown): Recommendation {
  if (!isRecord(value)) {
    return {
      type: 'general',
      priority: 'low',
      title: asString(value, 'Recommendation'),
      description: '',
      details: {},
      actions: [],
      incidentId: null,
    };
  }

  const type = asString(value['type']).toLowerCase();
  const incidentId = value['incidentId'] ?? value['incident_id'];

  return {
    type: isRecommendationType(type) ? type : 'general',
    priority: normalizePriority(value['priority']),
    title: asString(value['title']) || asString(value['summary']) || 'Recommendation',
    description: asString(value['description']),
    details: asRecord(value['details']),
    actions: asArray(value['actions']).filter((action): action is string => typeof action === 'string'),
    incidentId: typeof incidentId === 'number' ? incidentId : null,
  };
}

/**
 * Highest priority among the recommendations, or undefined for none
 */
export function highestPriority(recommendations: readonly Recommendation[]): RecommendationPriority | undefined {
  let highest: RecommendationPriority | undefined;
  for (const { priority } of recommendations) {
    if (highest === undefined || PRIORITY_RANK[priority] > PRIORITY_RANK[highest]) {
      highest = priority;
    }
  }
  return highest;
}
