import type { ClassifierModel } from './model.js';

/** Words of two or more word characters */
const TOKEN_PATTERN = /\b\w\w+\b/g;

/**
 * Normalizes text the same way the training corpus was normalized:
 * lowercase, letters and whitespace only, single spaces.
 */
export function preprocessText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-zA-Z\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/** All n-grams of the preprocessed text for n in [minN, maxN], unigrams first */
export function extractTerms(text: string, [minN, maxN]: readonly [number, number]): string[] {
  const words = text.match(TOKEN_PATTERN) ?? [];
  const terms: string[] = [];

  for (let n = minN; n <= maxN; n++) {
    for (let i = 0; i + n <= words.length; i++) {
      terms.push(words.slice(i, i + n).join(' '));
    }
  }

  return terms;
}

/**
 * TF-IDF vector of the terms, L2-normalized, as a sparse map from feature
 * index to weight. Terms outside the vocabulary are ignored.
 */
export function vectorize(terms: readonly string[], model: ClassifierModel): Map<number, number> {
  const counts = new Map<number, number>();
  for (const term of terms) {
    if (!Object.hasOwn(model.vocabulary, term)) continue;
    const index = model.vocabulary[term];
    if (index === undefined) continue;
    counts.set(index, (counts.get(index) ?? 0) + 1);
  }

  const weights = new Map<number, number>();
  let sumOfSquares = 0;
  for (const [index, count] of counts) {
    const tf = model.sublinearTf ? 1 + Math.log(count) : count;
    const weight = tf * (model.idf[index] ?? 0);
    weights.set(index, weight);
    sumOfSquares += weight * weight;
  }

  if (sumOfSquares === 0) return weights;

  const norm = Math.sqrt(sumOfSquares);
  for (const [index, weight] of weights) {
    weights.set(index, weight / norm);
  }
  return weights;
}
