export { createApp, createClassifyRouter } from './router.js';
export type { ClassifyRouterConfig } from './router.js';
export { createClassifyController, toEntityView, MISSING_EMAIL_BODY } from './controller.js';
export type {
  ClassifyController,
  ClassifyControllerDeps,
  ClassifyEmailResponse,
  JsonRequest,
  JsonResponse,
  MaskedEntityView,
} from './controller.js';
export { getConfig, validateConfig, LOG_LEVELS, RECOGNIZER_FALLBACKS } from './config.js';
export type { ServiceConfig, ValidServiceConfig } from './config.js';
export { createLogger, responseLogLevel } from './logger.js';
export { startService } from './server.js';
export type { RunningService } from './server.js';
