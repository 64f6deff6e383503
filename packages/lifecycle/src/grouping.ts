import type { NormalizedAlert, NormalizedPayload } from '@alertline/core';

/**
 * Key that decides which alerts share an incident.
 *
 * Checker alerts group per checker and host; otherwise the source's own
 * group key wins, and failing that the alert name within its source.
 */
export function groupingKeyFor(alert: NormalizedAlert, payload: Pick<NormalizedPayload, 'source' | 'groupKey'>): string {
  const checker = alert.labels['checker'];
  if (checker) {
    return `checker:${checker}@${alert.labels['hostname'] ?? ''}`;
  }
  if (payload.groupKey) {
    return `group:${payload.source}:${payload.groupKey}`;
  }
  return `name:${payload.source}:${alert.name}`;
}
