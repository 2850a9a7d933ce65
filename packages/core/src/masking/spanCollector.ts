import { RecognizerUnavailableError } from '../errors.js';
import { isPersonLabel } from '../recognizer/types.js';
import type { NamedEntityRecognizer, RecognizedEntity } from '../recognizer/types.js';
import type { CompiledRule, Span } from '../types/index.js';
import { findMatches } from './patternRegistry.js';

export interface CollectOptions {
  /**
   * When set, a recognizer failure is reported here and collection continues
   * with rule matches only. When unset, the failure is thrown.
   */
  onRecognizerFailure?: (err: RecognizerUnavailableError) => void;
}

/**
 * Person spans from the recognizer, in the recognizer's order.
 *
 * @throws RecognizerUnavailableError if the recognizer throws or reports an
 *   offset outside the text
 */
export function collectRecognizerSpans(text: string, recognizer: NamedEntityRecognizer): Span[] {
  let recognized: ReadonlyArray<RecognizedEntity>;
  try {
    recognized = recognizer.recognize(text);
  } catch (err) {
    if (err instanceof RecognizerUnavailableError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new RecognizerUnavailableError(`Recognizer "${recognizer.id}" failed: ${message}`, { cause: err });
  }

  const spans: Span[] = [];
  for (const entity of recognized) {
    if (!isPersonLabel(entity.label)) continue;

    const { start, end } = entity;
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end > text.length || start >= end) {
      throw new RecognizerUnavailableError(
        `Recognizer "${recognizer.id}" returned invalid span [${start}, ${end}) for text of length ${text.length}`,
      );
    }

    spans.push({
      start,
      end,
      classification: 'full_name',
      literal: text.slice(start, end),
      source: { kind: 'recognizer', recognizerId: recognizer.id },
    });
  }

  return spans;
}

/** Rule matches, rule by rule in table order, each rule's matches left to right */
export function collectRuleSpans(text: string, rules: readonly CompiledRule[]): Span[] {
  const spans: Span[] = [];

  for (const rule of rules) {
    for (const match of findMatches(rule, text)) {
      spans.push({
        start: match.start,
        end: match.end,
        classification: rule.label,
        literal: match.literal,
        source: { kind: 'rule', rule: rule.name },
      });
    }
  }

  return spans;
}

/**
 * Runs the recognizer, then every rule, over the same text and returns all
 * raw candidates in that evaluation order. Candidates may overlap; nothing
 * is deduplicated or re-sorted here.
 */
export function collectSpans(
  text: string,
  recognizer: NamedEntityRecognizer,
  rules: readonly CompiledRule[],
  options: CollectOptions = {},
): Span[] {
  let personSpans: Span[];
  try {
    personSpans = collectRecognizerSpans(text, recognizer);
  } catch (err) {
    if (!options.onRecognizerFailure || !(err instanceof RecognizerUnavailableError)) throw err;
    options.onRecognizerFailure(err);
    personSpans = [];
  }

  return [...personSpans, ...collectRuleSpans(text, rules)];
}
