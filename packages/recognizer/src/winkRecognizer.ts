import { RecognizerUnavailableError } from '@mailsift/core';
import type { NamedEntityRecognizer, RecognizedEntity } from '@mailsift/core';
import type winkNLP from 'wink-nlp';
import type { ItemEntity } from 'wink-nlp';

/** A wink-nlp instance, as returned by `winkNLP(model)` */
export type WinkNlp = ReturnType<typeof winkNLP>;

/** An entity expressed as an inclusive token range, the way wink reports spans */
export interface TokenEntity {
  type: string;
  firstToken: number;
  lastToken: number;
}

/** A token's text and its universal part-of-speech tag */
export interface TaggedToken {
  value: string;
  pos: string;
}

export const WINK_RECOGNIZER_ID = 'wink-eng-lite-web';

export const HONORIFICS = ['mr', 'mrs', 'ms', 'dr', 'prof'];

const TITLE_CASE = /^[A-Z][a-z]+$/;

function isHonorific(value: string): boolean {
  return HONORIFICS.includes(value.toLowerCase().replace(/\.$/, ''));
}

/** Whether the token at `index` belongs to a name; title-case words only extend a run */
function joinsName(tokens: readonly TaggedToken[], index: number, inRun: boolean): boolean {
  const token = tokens[index];
  if (!token) return false;
  if (token.pos === 'PROPN' || isHonorific(token.value)) return true;

  const previous = tokens[index - 1];
  if (token.value === '.') {
    return previous !== undefined && isHonorific(previous.value) && !previous.value.endsWith('.');
  }
  return inRun && TITLE_CASE.test(token.value);
}

/**
 * Person names as maximal runs of adjacent proper nouns.
 *
 * An honorific joins the run and starts the name, so words tagged as proper
 * nouns before it ("Contact Dr. Jane Smith") are left out. A run is a name
 * when it holds two proper nouns, or an honorific and one.
 */
export function findPersonRuns(tokens: readonly TaggedToken[]): TokenEntity[] {
  const runs: TokenEntity[] = [];
  let index = 0;

  while (index < tokens.length) {
    if (!joinsName(tokens, index, false)) {
      index++;
      continue;
    }

    let first = index;
    let last = index;
    while (joinsName(tokens, last + 1, true)) last++;
    index = last + 1;

    let honorific = false;
    for (let k = last; k >= first; k--) {
      if (isHonorific(tokens[k]?.value ?? '')) {
        first = k;
        honorific = true;
        break;
      }
    }

    const names = tokens
      .slice(first, last + 1)
      .filter((token) => token.value !== '.' && !isHonorific(token.value)).length;
    if (names >= (honorific ? 1 : 2)) {
      runs.push({ type: 'PERSON', firstToken: first, lastToken: last });
    }
  }

  return runs;
}

/**
 * Start offset of every token in the original text.
 * wink tokenizes losslessly, so each token value is found verbatim after the
 * previous one.
 */
export function tokenOffsets(text: string, tokens: readonly string[]): number[] {
  const offsets: number[] = [];
  let cursor = 0;

  for (const token of tokens) {
    const at = text.indexOf(token, cursor);
    if (at === -1) {
      throw new RecognizerUnavailableError(`Token "${token}" not found after offset ${cursor}`);
    }
    offsets.push(at);
    cursor = at + token.length;
  }

  return offsets;
}

/** Converts token-range entities into character-offset entities */
export function toRecognizedEntities(
  text: string,
  tokens: readonly string[],
  entities: readonly TokenEntity[],
): RecognizedEntity[] {
  const offsets = tokenOffsets(text, tokens);

  return entities.map((entity) => {
    const start = offsets[entity.firstToken];
    const lastStart = offsets[entity.lastToken];
    const lastToken = tokens[entity.lastToken];
    if (start === undefined || lastStart === undefined || lastToken === undefined) {
      throw new RecognizerUnavailableError(
        `Entity token range [${entity.firstToken}, ${entity.lastToken}] exceeds ${tokens.length} tokens`,
      );
    }
    return { start, end: lastStart + lastToken.length, label: entity.type };
  });
}

function readTokenEntity(type: unknown, span: unknown): TokenEntity | null {
  if (typeof type !== 'string' || !Array.isArray(span)) return null;
  const [first, last] = span;
  if (typeof first !== 'number' || typeof last !== 'number') return null;
  return { type, firstToken: first, lastToken: last };
}

/**
 * Builds a recognizer over an existing wink-nlp instance. Reports wink's
 * built-in entities with their wink type, and person names found by
 * findPersonRuns() as PERSON.
 */
export function createWinkRecognizer(nlp: WinkNlp): NamedEntityRecognizer {
  const its = nlp.its;

  return {
    id: WINK_RECOGNIZER_ID,

    recognize(text: string): RecognizedEntity[] {
      if (text.length === 0) return [];

      const doc = nlp.readDoc(text);
      const values: unknown = doc.tokens().out();
      const tags: unknown = doc.tokens().out(its.pos);
      if (!Array.isArray(values) || !Array.isArray(tags) || values.length !== tags.length) {
        throw new RecognizerUnavailableError('wink-nlp returned no tagged token list');
      }
      const tokens: TaggedToken[] = values.map((value, i) => ({ value: String(value), pos: String(tags[i]) }));

      const found: TokenEntity[] = [];
      doc.entities().each((entity: ItemEntity) => {
        const parsed = readTokenEntity(entity.out(its.type), entity.out(its.span));
        if (parsed) found.push(parsed);
      });
      found.push(...findPersonRuns(tokens));

      return toRecognizedEntities(
        text,
        tokens.map((token) => token.value),
        found,
      );
    },
  };
}

/**
 * Loads wink-nlp with the English lite model and returns a recognizer over it.
 * Suitable as the `recognizer` loader of createMaskingEngine().
 *
 * @throws RecognizerUnavailableError if either package cannot be loaded
 */
export async function loadWinkRecognizer(): Promise<NamedEntityRecognizer> {
  try {
    const [{ default: createNlp }, { default: model }] = await Promise.all([
      import('wink-nlp'),
      import('wink-eng-lite-web-model'),
    ]);
    return createWinkRecognizer(createNlp(model));
  } catch (err) {
    if (err instanceof RecognizerUnavailableError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new RecognizerUnavailableError(`Failed to load wink-nlp: ${message}`, { cause: err });
  }
}
