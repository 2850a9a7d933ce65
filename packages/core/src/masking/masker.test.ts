import { describe, it, expect } from 'vitest';
import { applyMask, maskTag } from './masker.js';
import type { Classification } from '../types/index.js';

interface Placement {
  start: number;
  end: number;
  classification: Classification;
}

/** Left-to-right substitution with explicit offset tracking, used as a cross-check */
function maskLeftToRight(text: string, entities: Placement[]): string {
  const ascending = [...entities].sort((a, b) => a.start - b.start);
  let result = text;
  let shift = 0;
  for (const entity of ascending) {
    const tag = maskTag(entity.classification);
    const start = entity.start + shift;
    const end = entity.end + shift;
    result = result.slice(0, start) + tag + result.slice(end);
    shift += tag.length - (entity.end - entity.start);
  }
  return result;
}

describe('masker', () => {
  it('wraps the classification in brackets', () => {
    expect(maskTag('credit_debit_no')).toBe('[credit_debit_no]');
  });

  it('replaces a span and keeps the surrounding text', () => {
    const masked = applyMask('Call 555-123-4567 now', [
      { start: 5, end: 17, classification: 'phone_number' },
    ]);
    expect(masked).toBe('Call [phone_number] now');
  });

  it('returns the text unchanged when there is nothing to mask', () => {
    expect(applyMask('nothing here', [])).toBe('nothing here');
    expect(applyMask('', [])).toBe('');
  });

  it('uses the same tag regardless of literal length', () => {
    const masked = applyMask('a b', [
      { start: 0, end: 1, classification: 'cvv_no' },
      { start: 2, end: 3, classification: 'cvv_no' },
    ]);
    expect(masked).toBe('[cvv_no] [cvv_no]');
  });

  it('produces the same result whatever order the entities arrive in', () => {
    const text = 'Mail a@b.io, call 555-123-4567, card 4111 1111 1111 1111.';
    const entities: Placement[] = [
      { start: 5, end: 11, classification: 'email' },
      { start: 18, end: 30, classification: 'phone_number' },
      { start: 37, end: 56, classification: 'credit_debit_no' },
    ];

    const ascending = applyMask(text, entities);
    const descending = applyMask(text, [...entities].reverse());

    expect(ascending).toBe('Mail [email], call [phone_number], card [credit_debit_no].');
    expect(descending).toBe(ascending);
  });

  it('matches a left-to-right substitution with tracked offset shifts', () => {
    const text = 'Dr. Ann Lee, 12/05/1990, CVV 123 and Exp 04/29 end';
    const entities: Placement[] = [
      { start: 0, end: 11, classification: 'full_name' },
      { start: 13, end: 23, classification: 'dob' },
      { start: 25, end: 32, classification: 'cvv_no' },
      { start: 37, end: 46, classification: 'expiry_no' },
    ];

    expect(applyMask(text, entities)).toBe(maskLeftToRight(text, entities));
    expect(applyMask(text, entities)).toBe('[full_name], [dob], [cvv_no] and [expiry_no] end');
  });

  it('does not mutate the entity list it is given', () => {
    const entities: Placement[] = [
      { start: 0, end: 1, classification: 'email' },
      { start: 2, end: 3, classification: 'dob' },
    ];
    applyMask('a b', entities);
    expect(entities.map((e) => e.start)).toEqual([0, 2]);
  });
});
