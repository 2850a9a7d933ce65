import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { createMaskingEngine } from './engine.js';
import { spansConflict } from './overlapResolver.js';
import { RULESET_VERSION } from './patternRegistry.js';
import {
  EngineNotReadyError,
  InvalidRulePatternError,
  RecognizerUnavailableError,
} from '../errors.js';
import type { NamedEntityRecognizer, RecognizedEntity } from '../recognizer/types.js';
import type { Entity, MaskingEngineConfig } from '../types/index.js';

const CONTACT = 'Contact Dr. Jane Smith at jane.smith@example.com or 555-123-4567.';

/** Recognizer that answers from a fixed table keyed by input text */
function tableRecognizer(table: Record<string, RecognizedEntity[]> = {}): NamedEntityRecognizer {
  return { id: 'table', recognize: (text) => table[text] ?? [] };
}

async function startedEngine(overrides: Partial<MaskingEngineConfig> = {}) {
  const engine = createMaskingEngine({ recognizer: tableRecognizer(), ...overrides });
  await engine.start();
  return engine;
}

function expectNoConflicts(entities: Entity[]): void {
  for (let i = 0; i < entities.length; i++) {
    for (let j = i + 1; j < entities.length; j++) {
      expect(spansConflict(entities[i]!, entities[j]!)).toBe(false);
    }
  }
}

/** Every character outside an entity must survive, in order, between the tags */
function expectGapsPreserved(text: string, maskedText: string, entities: Entity[]): void {
  let expected = '';
  let cursor = 0;
  for (const entity of entities) {
    expected += text.slice(cursor, entity.start) + `[${entity.classification}]`;
    cursor = entity.end;
  }
  expected += text.slice(cursor);
  expect(maskedText).toBe(expected);
}

describe('createMaskingEngine', () => {
  describe('lifecycle', () => {
    it('refuses to mask before start()', () => {
      const engine = createMaskingEngine({ recognizer: tableRecognizer() });

      expect(engine.isReady()).toBe(false);
      expect(() => engine.mask('hello')).toThrow(EngineNotReadyError);
    });

    it('refuses to mask after stop()', async () => {
      const engine = await startedEngine();
      engine.stop();

      expect(engine.isReady()).toBe(false);
      expect(() => engine.mask('hello')).toThrow('Masking engine is not started');
    });

    it('invokes a recognizer loader once, even when started twice', async () => {
      const loader = vi.fn(async () => tableRecognizer());
      const engine = createMaskingEngine({ recognizer: loader });

      await Promise.all([engine.start(), engine.start()]);
      await engine.start();

      expect(loader).toHaveBeenCalledOnce();
      expect(engine.isReady()).toBe(true);
    });

    it('fails start() with RecognizerUnavailableError when the loader throws', async () => {
      const engine = createMaskingEngine({
        recognizer: async () => {
          throw new Error('Cannot find module');
        },
      });

      await expect(engine.start()).rejects.toThrow(RecognizerUnavailableError);
      expect(engine.isReady()).toBe(false);
    });

    it('fails start() on a broken rule without loading the recognizer', async () => {
      const loader = vi.fn(async () => tableRecognizer());
      const engine = createMaskingEngine({
        recognizer: loader,
        rules: [
          { name: 'email', label: 'email', source: '\\S+@\\S+' },
          { name: 'broken', label: 'dob', source: '(\\d' },
        ],
      });

      await expect(engine.start()).rejects.toThrow(InvalidRulePatternError);
      expect(loader).not.toHaveBeenCalled();
      expect(engine.isReady()).toBe(false);
    });

    it('reports the default ruleset version', () => {
      expect(createMaskingEngine({ recognizer: tableRecognizer() }).ruleset).toBe(RULESET_VERSION);
    });

    it('reports a custom ruleset version for overridden rules', () => {
      const rules = [{ name: 'email', label: 'email' as const, source: '\\S+@\\S+' }];

      expect(createMaskingEngine({ recognizer: tableRecognizer(), rules }).ruleset).toBe('custom');
      expect(
        createMaskingEngine({ recognizer: tableRecognizer(), rules, rulesetVersion: 'emails-only-1' }).ruleset,
      ).toBe('emails-only-1');
    });
  });

  describe('mask()', () => {
    it('masks names, emails and phone numbers in a contact line', async () => {
      const engine = await startedEngine();
      const result = engine.mask(CONTACT);

      expect(result).toEqual({
        maskedText: 'Contact [full_name] at [email] or [phone_number].',
        entities: [
          { start: 8, end: 22, classification: 'full_name', literal: 'Dr. Jane Smith' },
          { start: 26, end: 48, classification: 'email', literal: 'jane.smith@example.com' },
          { start: 52, end: 64, classification: 'phone_number', literal: '555-123-4567' },
        ],
      });
    });

    it('lets a recognizer name shadow the overlapping honorific rule', async () => {
      const engine = await startedEngine({
        recognizer: tableRecognizer({ [CONTACT]: [{ start: 12, end: 22, label: 'PERSON' }] }),
      });
      const result = engine.mask(CONTACT);

      expect(result.maskedText).toBe('Contact Dr. [full_name] at [email] or [phone_number].');
      expect(result.entities[0]).toEqual({
        start: 12,
        end: 22,
        classification: 'full_name',
        literal: 'Jane Smith',
      });
      expect(result.entities).toHaveLength(3);
    });

    it('classifies a card number and an Aadhar number independently', async () => {
      const engine = await startedEngine();
      const result = engine.mask('Card 4111 1111 1111 1111 and Aadhar 1234 5678 9012.');

      expect(result.maskedText).toBe('Card [credit_debit_no] and Aadhar [aadhar_num].');
      expect(result.entities).toEqual([
        { start: 5, end: 24, classification: 'credit_debit_no', literal: '4111 1111 1111 1111' },
        { start: 36, end: 50, classification: 'aadhar_num', literal: '1234 5678 9012' },
      ]);
    });

    it('classifies an Exp-prefixed date as expiry_no', async () => {
      const engine = await startedEngine();

      expect(engine.mask('Exp: 09/27')).toEqual({
        maskedText: '[expiry_no]',
        entities: [{ start: 0, end: 10, classification: 'expiry_no', literal: 'Exp: 09/27' }],
      });
    });

    it('returns an empty result for empty input', async () => {
      const engine = await startedEngine();
      expect(engine.mask('')).toEqual({ maskedText: '', entities: [] });
    });

    it('leaves already-bracketed tags alone', async () => {
      const engine = await startedEngine();
      expect(engine.mask('[full_name] called')).toEqual({ maskedText: '[full_name] called', entities: [] });
    });

    it('is idempotent on its own output', async () => {
      const engine = await startedEngine();
      const first = engine.mask(CONTACT);
      const second = engine.mask(first.maskedText);

      expect(second).toEqual({ maskedText: first.maskedText, entities: [] });
    });

    it('does not expose detector sources on entities', async () => {
      const engine = await startedEngine();
      const [entity] = engine.mask('mail a@b.io').entities;

      expect(Object.keys(entity!).sort()).toEqual(['classification', 'end', 'literal', 'start']);
    });

    it.each([
      CONTACT,
      'Card 4111 1111 1111 1111 and Aadhar 1234 5678 9012.',
      'Mr. Rao, DOB 12/05/1990, CVV: 123, Exp 04/29, call +91 22 4567 8901 or (555) 987-6543.',
      'Ms. Lee wrote to ms.lee@mail.example.org about 11/2026 and 4321 CVV.',
    ])('keeps entities disjoint, verbatim and the rest of the text intact: %s', async (text) => {
      const engine = await startedEngine();
      const { maskedText, entities } = engine.mask(text);

      expectNoConflicts(entities);
      for (const entity of entities) {
        expect(entity.literal).toBe(text.slice(entity.start, entity.end));
      }
      expect(entities.map((e) => e.start)).toEqual([...entities.map((e) => e.start)].sort((a, b) => a - b));
      expectGapsPreserved(text, maskedText, entities);
    });
  });

  describe('recognizer failures', () => {
    const broken: NamedEntityRecognizer = {
      id: 'broken',
      recognize: () => {
        throw new Error('inference backend offline');
      },
    };

    it('fails the whole call by default', async () => {
      const engine = await startedEngine({ recognizer: broken });
      expect(() => engine.mask(CONTACT)).toThrow(RecognizerUnavailableError);
    });

    it('masks with pattern rules only when the fallback is configured, and warns', async () => {
      const lines: string[] = [];
      const logger = pino({ level: 'warn' }, { write: (line: string) => { lines.push(line); } });
      const engine = await startedEngine({ recognizer: broken, recognizerFallback: 'patterns-only', logger });

      const result = engine.mask(CONTACT);

      expect(result.maskedText).toBe('Contact [full_name] at [email] or [phone_number].');
      expect(lines).toHaveLength(1);
      const entry = JSON.parse(lines[0]!) as Record<string, unknown>;
      expect(entry['level']).toBe(40);
      expect(entry['component']).toBe('masking-engine');
      expect(entry['msg']).toBe('recognizer failed, masking with pattern rules only');
    });
  });
});
