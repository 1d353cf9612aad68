import { AggregateResult, ChangeDetection } from './types';

/**
 * Ids of the locations reported as available in a poll cycle.
 */
export function availableLocationIds(aggregate: AggregateResult): Set<string> {
  return new Set(
    aggregate.outcomes
      .filter(outcome => outcome.status === 'available')
      .map(outcome => outcome.locationId)
  );
}

/**
 * Compare a poll cycle against the locations already announced.
 * Pure logic: the caller owns the seen set and replaces it with `newSeen`.
 *
 * - `toNotify`: available now, not announced before.
 * - `newSeen`: exactly the locations available now. Locations that dropped out
 *   are forgotten, and a cycle without any availability clears the set so a
 *   re-appearing location is announced again.
 */
export function detectChanges(
  previousSeen: ReadonlySet<string>,
  aggregate: AggregateResult,
): ChangeDetection {
  const currentAvailable = availableLocationIds(aggregate);

  const toNotify = new Set<string>();
  for (const id of currentAvailable) {
    if (!previousSeen.has(id)) {
      toNotify.add(id);
    }
  }

  return { toNotify, newSeen: currentAvailable };
}
