import { pino } from 'pino';
import { EngineNotReadyError, RecognizerUnavailableError } from '../errors.js';
import type { NamedEntityRecognizer } from '../recognizer/types.js';
import type {
  CompiledRule,
  Entity,
  MaskingEngine,
  MaskingEngineConfig,
  MaskResult,
} from '../types/index.js';
import { applyMask } from './masker.js';
import { resolveOverlaps } from './overlapResolver.js';
import { compileRules, DEFAULT_RULES, RULESET_VERSION } from './patternRegistry.js';
import { collectSpans } from './spanCollector.js';
import type { CollectOptions } from './spanCollector.js';

interface EngineState {
  recognizer: NamedEntityRecognizer;
  rules: CompiledRule[];
}

function isRecognizer(value: MaskingEngineConfig['recognizer']): value is NamedEntityRecognizer {
  return typeof value === 'object' && value !== null && typeof value.recognize === 'function';
}

/**
 * Creates a masking engine from the given configuration.
 *
 * The engine holds the only process-wide state of the masking core: the
 * compiled rule table and the recognizer. Both are built by start() and are
 * read-only until stop(), so mask() may be called from any number of
 * concurrent requests.
 *
 * @example
 * ```typescript
 * const engine = createMaskingEngine({ recognizer: loadWinkRecognizer, logger });
 * await engine.start();
 * const { maskedText, entities } = engine.mask('Call Dr. Jane Smith on 555-123-4567');
 * ```
 */
export function createMaskingEngine(config: MaskingEngineConfig): MaskingEngine {
  const definitions = config.rules ?? DEFAULT_RULES;
  const ruleset = config.rules ? (config.rulesetVersion ?? 'custom') : RULESET_VERSION;
  const fallback = config.recognizerFallback ?? 'none';
  const log = (config.logger ?? pino({ level: 'silent' })).child({ component: 'masking-engine' });

  let state: EngineState | null = null;
  let starting: Promise<void> | null = null;

  const collectOptions: CollectOptions =
    fallback === 'patterns-only'
      ? {
          onRecognizerFailure: (err) => {
            log.warn({ err }, 'recognizer failed, masking with pattern rules only');
          },
        }
      : {};

  async function load(): Promise<void> {
    // Compile first: a broken rule table must stop startup before any model is loaded.
    const rules = compileRules(definitions);

    let recognizer: NamedEntityRecognizer;
    if (isRecognizer(config.recognizer)) {
      recognizer = config.recognizer;
    } else {
      try {
        recognizer = await config.recognizer();
      } catch (err) {
        if (err instanceof RecognizerUnavailableError) throw err;
        const message = err instanceof Error ? err.message : String(err);
        throw new RecognizerUnavailableError(`Failed to load recognizer: ${message}`, { cause: err });
      }
    }

    state = { recognizer, rules };
    log.info({ ruleset, rules: rules.length, recognizer: recognizer.id, fallback }, 'masking engine started');
  }

  async function start(): Promise<void> {
    if (state) return;
    if (!starting) {
      starting = load().finally(() => {
        starting = null;
      });
    }
    return starting;
  }

  function stop(): void {
    if (!state) return;
    state = null;
    log.info('masking engine stopped');
  }

  function mask(text: string): MaskResult {
    if (!state) throw new EngineNotReadyError();

    const candidates = collectSpans(text, state.recognizer, state.rules, collectOptions);
    const accepted = resolveOverlaps(candidates);
    const maskedText = applyMask(text, accepted);

    const entities: Entity[] = accepted.map((span) => ({
      start: span.start,
      end: span.end,
      classification: span.classification,
      literal: span.literal,
    }));

    log.debug(
      { candidates: candidates.length, accepted: entities.length, length: text.length },
      'masked text',
    );

    return { maskedText, entities };
  }

  return {
    start,
    stop,
    isReady: () => state !== null,
    mask,
    ruleset,
  };
}
