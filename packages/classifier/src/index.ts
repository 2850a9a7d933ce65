export { createClassifier, loadClassifier } from './classifier.js';
export type { EmailClassifier } from './classifier.js';
export { extractTerms, preprocessText, vectorize } from './features.js';
export {
  classifierModelSchema,
  InvalidModelError,
  loadClassifierModel,
  parseClassifierModel,
} from './model.js';
export type { ClassifierModel } from './model.js';
