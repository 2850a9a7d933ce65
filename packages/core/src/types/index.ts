import type { Logger } from 'pino';
import type { NamedEntityRecognizer, RecognizerLoader } from '../recognizer/types.js';

/** Every label a masked span can carry, in no particular order */
export const CLASSIFICATIONS = [
  'full_name',
  'email',
  'phone_number',
  'dob',
  'aadhar_num',
  'credit_debit_no',
  'cvv_no',
  'expiry_no',
] as const;

/** Label written into the masked text as `[<classification>]` */
export type Classification = (typeof CLASSIFICATIONS)[number];

/** Which detector produced a span. Used for precedence and diagnostics only. */
export type SpanSource =
  | { kind: 'recognizer'; recognizerId: string }
  | { kind: 'rule'; rule: string };

/**
 * A detected sensitive region of the input text.
 * `literal` is always the verbatim slice `text.slice(start, end)`.
 */
export interface Span {
  readonly start: number;
  readonly end: number;
  readonly classification: Classification;
  readonly literal: string;
  readonly source: SpanSource;
}

/** Caller-facing form of an accepted span. Carries no detector information. */
export interface Entity {
  start: number;
  end: number;
  classification: Classification;
  literal: string;
}

/** Result of a single mask() call */
export interface MaskResult {
  /** Input text with every accepted span replaced by `[<classification>]` */
  maskedText: string;
  /** Accepted spans, ascending by start, pairwise non-overlapping */
  entities: Entity[];
}

/**
 * Declarative form of a pattern rule. Sources are compiled once, at
 * engine start, so a broken pattern is caught before any request is served.
 */
export interface RuleDefinition {
  /** Unique rule name, e.g. "phone_international" */
  name: string;
  /** Classification applied to every match of this rule */
  label: Classification;
  /** Regular expression source */
  source: string;
  /** Extra flags, e.g. "i". The global flag is always added. */
  flags?: string;
}

/** A rule whose pattern has been compiled */
export interface CompiledRule {
  readonly name: string;
  readonly label: Classification;
  readonly regex: RegExp;
}

/** A single regex hit before it becomes a Span */
export interface RuleMatch {
  start: number;
  end: number;
  literal: string;
}

/**
 * What to do when the recognizer throws.
 * - `none`: fail the mask() call with RecognizerUnavailableError
 * - `patterns-only`: log a warning and mask with the pattern rules alone
 */
export type RecognizerFallback = 'none' | 'patterns-only';

/**
 * Configuration for creating a masking engine.
 */
export interface MaskingEngineConfig {
  /** Recognizer instance, or a loader invoked by start() */
  recognizer: NamedEntityRecognizer | RecognizerLoader;
  /** Rule table override (defaults to DEFAULT_RULES) */
  rules?: RuleDefinition[];
  /** Version tag reported for an overridden rule table (defaults to 'custom') */
  rulesetVersion?: string;
  /** Recognizer failure policy (defaults to 'none') */
  recognizerFallback?: RecognizerFallback;
  /** Logger for lifecycle and per-call diagnostics. Literals are never logged. */
  logger?: Logger;
}

/**
 * Masking engine returned by createMaskingEngine().
 * start() must resolve before mask() is called.
 */
export interface MaskingEngine {
  /** Compile the rule table and load the recognizer. Safe to call twice. */
  start(): Promise<void>;
  /** Release the recognizer and rule table. mask() fails afterwards. */
  stop(): void;
  /** Whether start() has completed and stop() has not been called */
  isReady(): boolean;
  /** Detect, resolve and mask sensitive spans in the text */
  mask(text: string): MaskResult;
  /** Version tag of the rule table this engine was configured with */
  readonly ruleset: string;
}
