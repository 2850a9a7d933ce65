// Recognizer contract
export type {
  NamedEntityRecognizer,
  RecognizedEntity,
  RecognizerLoader,
} from './recognizer/types.js';
export { isPersonLabel, PERSON_LABEL } from './recognizer/types.js';

// Shared types
export { CLASSIFICATIONS } from './types/index.js';
export type {
  Classification,
  Span,
  SpanSource,
  Entity,
  MaskResult,
  RuleDefinition,
  CompiledRule,
  RuleMatch,
  RecognizerFallback,
  MaskingEngineConfig,
  MaskingEngine,
} from './types/index.js';

// Errors
export {
  MailsiftError,
  RecognizerUnavailableError,
  InvalidRulePatternError,
  EngineNotReadyError,
} from './errors.js';

// Masking pipeline
export { createMaskingEngine } from './masking/index.js';
export { compileRules, findMatches, DEFAULT_RULES, RULESET_VERSION } from './masking/index.js';
export { collectSpans, collectRecognizerSpans, collectRuleSpans } from './masking/index.js';
export type { CollectOptions } from './masking/index.js';
export { resolveOverlaps, spansConflict } from './masking/index.js';
export { applyMask, maskTag } from './masking/index.js';
