import { extractTerms, preprocessText, vectorize } from './features.js';
import { loadClassifierModel } from './model.js';
import type { ClassifierModel } from './model.js';

export interface EmailClassifier {
  /** Class labels in model order */
  readonly labels: readonly string[];
  /** Joint log-likelihood per label, in `labels` order */
  scores(text: string): number[];
  /** The most likely label; ties go to the label listed first */
  classify(text: string): string;
}

/**
 * Builds a classifier over a validated model. Text is preprocessed,
 * vectorized with TF-IDF and scored with multinomial naive Bayes.
 */
export function createClassifier(model: ClassifierModel): EmailClassifier {
  function scores(text: string): number[] {
    const features = vectorize(extractTerms(preprocessText(text), model.ngramRange), model);

    return model.labels.map((_, c) => {
      const logProb = model.featureLogProb[c] ?? [];
      let score = model.classLogPrior[c] ?? 0;
      for (const [index, weight] of features) {
        score += weight * (logProb[index] ?? 0);
      }
      return score;
    });
  }

  return {
    labels: model.labels,
    scores,

    classify(text: string): string {
      const all = scores(text);
      let best = 0;
      for (let c = 1; c < all.length; c++) {
        if ((all[c] ?? -Infinity) > (all[best] ?? -Infinity)) best = c;
      }
      return model.labels[best] ?? model.labels[0] ?? '';
    },
  };
}

/**
 * Reads a model artifact and returns a classifier over it.
 *
 * @throws InvalidModelError
 */
export async function loadClassifier(path: string): Promise<EmailClassifier> {
  return createClassifier(await loadClassifierModel(path));
}
