/**
 * Candidate selection helpers
 *
 * Ties always resolve to the earliest candidate in iteration order, so
 * callers must keep their candidate lists in insertion order.
 */

import type { Job } from '../core/job.js';

/**
 * First candidate with the smallest key
 */
export function selectMin<T>(candidates: readonly T[], key: (candidate: T) => number): T | undefined {
  let best: T | undefined;
  let bestKey = Infinity;

  for (const candidate of candidates) {
    const candidateKey = key(candidate);
    // Strictly smaller: an equal key never displaces an earlier candidate
    if (best === undefined || candidateKey < bestKey) {
      best = candidate;
      bestKey = candidateKey;
    }
  }

  return best;
}

/**
 * Stable sort by arrival time (ties keep input order)
 */
export function sortByArrival(jobs: readonly Job[]): Job[] {
  return [...jobs].sort((a, b) => a.arrivalTime - b.arrivalTime);
}

/**
 * Earliest arrival time among jobs, or undefined for an empty list
 */
export function nextArrival(jobs: readonly Job[]): number | undefined {
  const earliest = selectMin(jobs, (job) => job.arrivalTime);
  return earliest?.arrivalTime;
}

/**
 * Remove one element from an array by identity
 */
export function removeItem<T>(items: T[], item: T): void {
  const index = items.indexOf(item);
  if (index !== -1) {
    items.splice(index, 1);
  }
}
