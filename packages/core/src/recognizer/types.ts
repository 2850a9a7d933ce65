/**
 * A span reported by a named-entity recognizer.
 * Offsets are half-open character offsets into the text passed to recognize().
 */
export interface RecognizedEntity {
  /** Character offset where the entity starts */
  start: number;
  /** Character offset where the entity ends (exclusive) */
  end: number;
  /** Label assigned by the recognizer, e.g. "PERSON", "DATE" */
  label: string;
}

/**
 * Capability interface for a statistical named-entity recognizer.
 * The masking core only keeps entities labelled as persons; every other
 * label a recognizer reports is ignored.
 */
export interface NamedEntityRecognizer {
  /** Identifier used in logs, e.g. "wink-eng-lite-web" */
  id: string;
  /**
   * Return every entity found in the text, in the recognizer's own order.
   * Implementations must not keep state between calls.
   */
  recognize(text: string): ReadonlyArray<RecognizedEntity>;
}

/**
 * Lazily produces a recognizer, e.g. by loading a model package.
 * Called once by MaskingEngine.start().
 */
export type RecognizerLoader = () => NamedEntityRecognizer | Promise<NamedEntityRecognizer>;

/** Label value that maps recognizer output to the full_name classification */
export const PERSON_LABEL = 'person';

/**
 * Whether a recognizer label denotes a person. Recognizers disagree on casing
 * ("PERSON", "Person", "person"), so the comparison ignores it.
 */
export function isPersonLabel(label: string): boolean {
  return label.toLowerCase() === PERSON_LABEL;
}
