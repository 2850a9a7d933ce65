import { InvalidRulePatternError } from '../errors.js';
import { CLASSIFICATIONS } from '../types/index.js';
import type { Classification, CompiledRule, RuleDefinition, RuleMatch } from '../types/index.js';

/** Bumped whenever a rule is added, removed, reordered or its pattern changes */
export const RULESET_VERSION = '2024.1';

/**
 * Default rule table. Order is part of the precedence contract: when two
 * rules match overlapping text, the rule listed first keeps the span.
 * The three international phone formats run after every other rule and are
 * case-sensitive.
 */
export const DEFAULT_RULES: readonly RuleDefinition[] = [
  {
    name: 'full_name',
    label: 'full_name',
    source: String.raw`\b(?:Mr|Mrs|Ms|Dr|Prof)\. [A-Z][a-z]+(?: [A-Z][a-z]+)?\b`,
    flags: 'i',
  },
  {
    name: 'email',
    label: 'email',
    source: String.raw`\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b`,
    flags: 'i',
  },
  {
    name: 'phone_number',
    label: 'phone_number',
    source: String.raw`(?:\+\d{1,3}[- ]?)?\(?\d{3}\)?[- ]?\d{3}[- ]?\d{4}\b`,
    flags: 'i',
  },
  {
    name: 'dob',
    label: 'dob',
    source: String.raw`\b\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b`,
    flags: 'i',
  },
  {
    // Exactly three groups: a 4x4 card number must not yield a 12-digit prefix here.
    name: 'aadhar_num',
    label: 'aadhar_num',
    source: String.raw`(?<!\d[ -]?)\b\d{4}[ -]?\d{4}[ -]?\d{4}\b(?![ -]?\d)`,
    flags: 'i',
  },
  {
    name: 'credit_debit_no',
    label: 'credit_debit_no',
    source: String.raw`\b\d{4}(?:[ -]?\d{4}){3}\b`,
    flags: 'i',
  },
  {
    name: 'cvv_no',
    label: 'cvv_no',
    source: String.raw`\bCVV:? \d{3,4}\b|\bCVV \d{3,4}\b|\b\d{3,4} CVV\b`,
    flags: 'i',
  },
  {
    name: 'expiry_no',
    label: 'expiry_no',
    source: String.raw`\b(?:0[1-9]|1[0-2])[/-]\d{2,4}\b|\bExp:? \d{2}[/-]\d{2,4}\b`,
    flags: 'i',
  },
  {
    name: 'phone_international',
    label: 'phone_number',
    source: String.raw`\+\d{1,3}[-\s]?\d{1,3}[-\s]?\d{3,4}[-\s]?\d{3,4}\b`,
  },
  {
    name: 'phone_asian',
    label: 'phone_number',
    source: String.raw`\+\d{1,3}[-\s]?\d{2}[-\s]?\d{4}[-\s]?\d{4}\b`,
  },
  {
    name: 'phone_european',
    label: 'phone_number',
    source: String.raw`\+\d{1,3}[-\s]?\d{2}[-\s]?\d{3,4}[-\s]?\d{4}\b`,
  },
];

function isClassification(value: string): value is Classification {
  return (CLASSIFICATIONS as readonly string[]).includes(value);
}

/**
 * Compiles a rule table, preserving its order.
 *
 * @throws InvalidRulePatternError if a pattern does not compile, if a rule
 *   has no name or an unknown label, or if two rules share a name
 */
export function compileRules(definitions: readonly RuleDefinition[]): CompiledRule[] {
  const names = new Set<string>();
  const compiled: CompiledRule[] = [];

  for (const def of definitions) {
    if (!def.name || typeof def.name !== 'string') {
      throw new InvalidRulePatternError(String(def.name), 'rule must have a non-empty string name');
    }
    if (names.has(def.name)) {
      throw new InvalidRulePatternError(def.name, 'duplicate rule name');
    }
    names.add(def.name);
    if (!isClassification(def.label)) {
      throw new InvalidRulePatternError(def.name, `unknown classification "${String(def.label)}"`);
    }

    const flags = def.flags ?? '';
    let regex: RegExp;
    try {
      regex = new RegExp(def.source, flags.includes('g') ? flags : `g${flags}`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new InvalidRulePatternError(def.name, message, { cause: err });
    }

    compiled.push({ name: def.name, label: def.label, regex });
  }

  return compiled;
}

/**
 * Leftmost, non-overlapping matches of a compiled rule.
 * The rule's own regex is never mutated, so one table can serve
 * concurrent callers. Empty matches are skipped.
 */
export function findMatches(rule: CompiledRule, text: string): RuleMatch[] {
  const matches: RuleMatch[] = [];

  for (const match of text.matchAll(rule.regex)) {
    if (match.index === undefined) continue;
    const literal = match[0];
    if (literal.length === 0) continue;
    matches.push({ start: match.index, end: match.index + literal.length, literal });
  }

  return matches;
}
