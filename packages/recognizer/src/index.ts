export {
  createWinkRecognizer,
  loadWinkRecognizer,
  tokenOffsets,
  toRecognizedEntities,
  findPersonRuns,
  HONORIFICS,
  WINK_RECOGNIZER_ID,
} from './winkRecognizer.js';
export type { WinkNlp, TokenEntity, TaggedToken } from './winkRecognizer.js';
