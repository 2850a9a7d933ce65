export { createMaskingEngine } from './engine.js';
export { compileRules, findMatches, DEFAULT_RULES, RULESET_VERSION } from './patternRegistry.js';
export { collectSpans, collectRecognizerSpans, collectRuleSpans } from './spanCollector.js';
export type { CollectOptions } from './spanCollector.js';
export { resolveOverlaps, spansConflict } from './overlapResolver.js';
export { applyMask, maskTag } from './masker.js';
