import type { Span } from '../types/index.js';

/**
 * Whether two spans conflict. Touching spans conflict too: `[0, 5)` and
 * `[5, 9)` count as overlapping.
 */
export function spansConflict(a: Pick<Span, 'start' | 'end'>, b: Pick<Span, 'start' | 'end'>): boolean {
  return a.start <= b.end && a.end >= b.start;
}

/**
 * Deduplicates raw candidates with a first-claimed-wins policy.
 *
 * Candidates are visited in arrival order (recognizer first, then rules in
 * table order). A candidate is accepted when it conflicts with no span
 * accepted so far; otherwise it is dropped and never reconsidered. An
 * earlier, broader rule can therefore shadow a later, more specific one.
 *
 * @param candidates - Raw spans in evaluation order
 * @returns Accepted spans sorted ascending by start
 */
export function resolveOverlaps(candidates: readonly Span[]): Span[] {
  const accepted: Span[] = [];

  for (const candidate of candidates) {
    if (accepted.some((existing) => spansConflict(candidate, existing))) continue;
    accepted.push(candidate);
  }

  return accepted.sort((a, b) => a.start - b.start);
}
