/**
 * Service configuration, read from environment variables with defaults.
 */

import type { LevelWithSilent } from 'pino';
import type { RecognizerFallback } from '@mailsift/core';

export interface ServiceConfig {
  /** Port to listen on (default: 7860) */
  port: number;
  /** Interface to bind (default: '0.0.0.0') */
  host: string;
  /** pino log level (default: 'info') */
  logLevel: string;
  /** Path of the classifier model artifact (default: './models/email-classifier.json') */
  modelPath: string;
  /** 'none' (default) fails a request when the recognizer fails; 'patterns-only' masks with rules alone */
  recognizerFallback: string;
  /** Maximum JSON request body, in body-parser notation (default: '1mb') */
  jsonBodyLimit: string;
}

/** A configuration whose enumerated fields have been checked */
export interface ValidServiceConfig extends ServiceConfig {
  logLevel: LevelWithSilent;
  recognizerFallback: RecognizerFallback;
}

export const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];
export const RECOGNIZER_FALLBACKS: readonly RecognizerFallback[] = ['none', 'patterns-only'];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

function isRecognizerFallback(value: string): value is RecognizerFallback {
  return RECOGNIZER_FALLBACKS.some((mode) => mode === value);
}

/**
 * Read configuration from environment variables.
 * Values are not checked here; pass the result through validateConfig().
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  return {
    port: Number(env['PORT'] || '7860'),
    host: env['HOST'] || '0.0.0.0',
    logLevel: env['LOG_LEVEL'] || 'info',
    modelPath: env['MODEL_PATH'] || './models/email-classifier.json',
    recognizerFallback: env['RECOGNIZER_FALLBACK'] || 'none',
    jsonBodyLimit: env['JSON_BODY_LIMIT'] || '1mb',
  };
}

/**
 * Validate config at startup.
 *
 * @throws Error naming the offending variable
 */
export function validateConfig(config: ServiceConfig): ValidServiceConfig {
  const { port, logLevel, recognizerFallback } = config;

  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: '${port}'. Expected an integer between 0 and 65535.`);
  }
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: '${logLevel}'. Expected one of ${LOG_LEVELS.join(', ')}.`);
  }
  if (!isRecognizerFallback(recognizerFallback)) {
    throw new Error(
      `Invalid RECOGNIZER_FALLBACK: '${recognizerFallback}'. Expected one of ${RECOGNIZER_FALLBACKS.join(', ')}.`,
    );
  }
  if (config.modelPath.trim() === '') {
    throw new Error('MODEL_PATH must not be empty.');
  }

  return { ...config, logLevel, recognizerFallback };
}
