import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { MailsiftError } from '@mailsift/core';

/** The model artifact is missing, unreadable or inconsistent */
export class InvalidModelError extends MailsiftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_MODEL', message, options);
  }
}

/**
 * Schema of an exported TF-IDF + multinomial naive Bayes model.
 * Arrays are indexed by feature (idf, rows of featureLogProb) or by class
 * (labels, classLogPrior, featureLogProb).
 */
export const classifierModelSchema = z.object({
  version: z.literal(1),
  labels: z.array(z.string().min(1)).min(1),
  vocabulary: z.record(z.string(), z.number().int().nonnegative()),
  idf: z.array(z.number().finite()),
  classLogPrior: z.array(z.number().finite()),
  featureLogProb: z.array(z.array(z.number().finite())),
  ngramRange: z.tuple([z.number().int().positive(), z.number().int().positive()]),
  sublinearTf: z.boolean().default(false),
});

export type ClassifierModel = z.infer<typeof classifierModelSchema>;

/**
 * Validates a decoded model artifact, including the dimension checks the
 * schema alone cannot express.
 *
 * @throws InvalidModelError
 */
export function parseClassifierModel(raw: unknown): ClassifierModel {
  const parsed = classifierModelSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new InvalidModelError(`Invalid classifier model: ${issues.join('; ')}`);
  }

  const model = parsed.data;
  const classes = model.labels.length;
  const features = model.idf.length;

  if (model.classLogPrior.length !== classes) {
    throw new InvalidModelError(`classLogPrior has ${model.classLogPrior.length} entries, expected ${classes}`);
  }
  if (model.featureLogProb.length !== classes) {
    throw new InvalidModelError(`featureLogProb has ${model.featureLogProb.length} rows, expected ${classes}`);
  }
  model.featureLogProb.forEach((row, c) => {
    if (row.length !== features) {
      throw new InvalidModelError(`featureLogProb row ${c} has ${row.length} columns, expected ${features}`);
    }
  });
  for (const [term, index] of Object.entries(model.vocabulary)) {
    if (index >= features) {
      throw new InvalidModelError(`Vocabulary term "${term}" maps to index ${index}, but only ${features} features exist`);
    }
  }
  const [minN, maxN] = model.ngramRange;
  if (minN > maxN) {
    throw new InvalidModelError(`ngramRange [${minN}, ${maxN}] is inverted`);
  }

  return model;
}

/**
 * Reads and validates a model artifact from disk.
 *
 * @throws InvalidModelError if the file cannot be read, is not JSON, or fails validation
 */
export async function loadClassifierModel(path: string): Promise<ClassifierModel> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidModelError(`Failed to read classifier model at ${path}: ${message}`, { cause: err });
  }
  return parseClassifierModel(raw);
}
