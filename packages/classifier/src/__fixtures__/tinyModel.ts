import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

export const TINY_MODEL_PATH = fileURLToPath(new URL('./tiny-model.json', import.meta.url));

/** Decoded contents of the tiny two-class model used across the classifier tests */
export function readTinyModel(): unknown {
  return JSON.parse(readFileSync(TINY_MODEL_PATH, 'utf-8'));
}
