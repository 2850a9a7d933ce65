import type { Classification, Span } from '../types/index.js';

/** Replacement written in place of a masked span */
export function maskTag(classification: Classification): string {
  return `[${classification}]`;
}

/**
 * Replaces every span with its bracketed classification tag.
 *
 * Offsets refer to the original text, so substitution runs from the
 * rightmost span to the leftmost: a replacement never shifts the offsets of
 * spans still waiting to be applied.
 *
 * @param text - Original text
 * @param entities - Non-overlapping spans, in any order
 */
export function applyMask(
  text: string,
  entities: ReadonlyArray<Pick<Span, 'start' | 'end' | 'classification'>>,
): string {
  const rightToLeft = [...entities].sort((a, b) => b.start - a.start);

  let result = text;
  for (const entity of rightToLeft) {
    result = result.slice(0, entity.start) + maskTag(entity.classification) + result.slice(entity.end);
  }

  return result;
}
