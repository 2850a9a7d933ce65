import type { Logger } from 'pino';
import type { Classification, Entity, MaskingEngine } from '@mailsift/core';
import type { EmailClassifier } from '@mailsift/classifier';

export const MISSING_EMAIL_BODY = 'Missing email_body in request';

export interface ClassifyControllerDeps {
  /** Started (or starting) masking engine */
  engine: MaskingEngine;
  /** Classifier applied to the masked text */
  classifier: EmailClassifier;
  logger: Logger;
}

/** An entity as it appears in the response body */
export interface MaskedEntityView {
  position: [number, number];
  classification: Classification;
  entity: string;
}

export interface ClassifyEmailResponse {
  input_email_body: string;
  list_of_masked_entities: MaskedEntityView[];
  masked_email: string;
  category_of_the_email: string;
}

export function toEntityView(entity: Entity): MaskedEntityView {
  return {
    position: [entity.start, entity.end],
    classification: entity.classification,
    entity: entity.literal,
  };
}

/** The parts of an Express request the handlers read */
export interface JsonRequest {
  body?: unknown;
}

/** The parts of an Express response the handlers write */
export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

function readEmailBody(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('email_body' in body)) return undefined;
  return typeof body.email_body === 'string' ? body.email_body : undefined;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  return typeof err.status === 'number' ? err.status : undefined;
}

/**
 * Create the classify endpoint handlers.
 * Only the masked text ever reaches the classifier or the logs.
 */
export function createClassifyController({ engine, classifier, logger }: ClassifyControllerDeps) {
  const log = logger.child({ component: 'classify-controller' });

  /**
   * Responds to failures raised before a handler runs, such as an
   * unparsable or oversized JSON body.
   */
  const handleError = (err: unknown, res: JsonResponse): void => {
    const status = statusOf(err);
    if (status === 400) {
      res.status(400).json({ error: MISSING_EMAIL_BODY });
      return;
    }
    if (status !== undefined && status > 400 && status < 500) {
      res.status(status).json({ error: err instanceof Error ? err.message : 'Bad request' });
      return;
    }
    log.error({ err }, 'unhandled request error');
    res.status(500).json({ error: err instanceof Error ? err.message : 'Internal server error' });
  };

  return {
    /**
     * POST /classify_email
     * Masks PII in `email_body` and classifies the masked text.
     */
    classifyEmail(req: JsonRequest, res: JsonResponse): void {
      const emailBody = readEmailBody(req.body);
      if (emailBody === undefined) {
        res.status(400).json({ error: MISSING_EMAIL_BODY });
        return;
      }

      try {
        const { maskedText, entities } = engine.mask(emailBody);
        const response: ClassifyEmailResponse = {
          input_email_body: emailBody,
          list_of_masked_entities: entities.map(toEntityView),
          masked_email: maskedText,
          category_of_the_email: classifier.classify(maskedText),
        };
        res.json(response);
      } catch (err) {
        log.error({ err }, 'email classification failed');
        const message = err instanceof Error ? err.message : 'Internal server error';
        res.status(500).json({ error: message });
      }
    },

    /**
     * GET /health
     * 200 once the engine is ready, 503 while it is starting.
     */
    health(_req: JsonRequest, res: JsonResponse): void {
      if (engine.isReady()) {
        res.json({ status: 'healthy', ruleset: engine.ruleset });
        return;
      }
      res.status(503).json({ status: 'starting' });
    },

    handleError,
  };
}

export type ClassifyController = ReturnType<typeof createClassifyController>;
