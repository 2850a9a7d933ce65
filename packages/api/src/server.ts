import type { Server } from 'node:http';
import { pathToFileURL } from 'node:url';
import type { Logger } from 'pino';
import { createMaskingEngine } from '@mailsift/core';
import type { MaskingEngine } from '@mailsift/core';
import { loadWinkRecognizer } from '@mailsift/recognizer';
import { loadClassifier } from '@mailsift/classifier';
import { getConfig, validateConfig } from './config.js';
import { createLogger } from './logger.js';
import { createApp } from './router.js';

export interface RunningService {
  server: Server;
  engine: MaskingEngine;
  logger: Logger;
  close(): Promise<void>;
}

/**
 * Start the HTTP service.
 *
 * The listener comes up first so /health can answer 503 while the
 * recognizer model loads. A failed engine start rejects the returned promise
 * after closing the listener.
 */
export async function startService(env: NodeJS.ProcessEnv = process.env): Promise<RunningService> {
  const config = validateConfig(getConfig(env));
  const logger = createLogger(config.logLevel);

  const classifier = await loadClassifier(config.modelPath);
  logger.info({ modelPath: config.modelPath, labels: classifier.labels }, 'classifier loaded');

  const engine = createMaskingEngine({
    recognizer: loadWinkRecognizer,
    recognizerFallback: config.recognizerFallback,
    logger,
  });

  const app = createApp({ engine, classifier, logger, jsonBodyLimit: config.jsonBodyLimit });
  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.port, config.host, () => resolve(listening));
    listening.once('error', reject);
  });
  logger.info({ host: config.host, port: config.port }, 'listening');

  const close = async (): Promise<void> => {
    engine.stop();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  };

  try {
    await engine.start();
  } catch (err) {
    await close();
    throw err;
  }

  return { server, engine, logger, close };
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  startService()
    .then((service) => {
      const shutdown = (signal: NodeJS.Signals): void => {
        service.logger.info({ signal }, 'shutting down');
        service.close().then(
          () => process.exit(0),
          (err: unknown) => {
            service.logger.error({ err }, 'shutdown failed');
            process.exit(1);
          },
        );
      };
      process.once('SIGTERM', shutdown);
      process.once('SIGINT', shutdown);
    })
    .catch((err: unknown) => {
      createLogger('info').fatal({ err }, 'service failed to start');
      process.exit(1);
    });
}
