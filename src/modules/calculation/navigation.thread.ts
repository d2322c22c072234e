/**
 * Navigation thread entry point. Loaded by ThreadedNavigationEngine from the
 * build output (dist/.../navigation.thread.js) with the engine options as
 * workerData.
 */

import { parentPort, workerData } from 'worker_threads';
import { errorMessage } from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import { answerEngineRequest } from './engine-thread.protocol';
import { GreatCircleEngine, greatCircleEngineOptionsSchema } from './great-circle.engine';

const port = parentPort;
if (!port) {
  throw new Error('Navigation thread started without parentPort');
}

const engine = new GreatCircleEngine(greatCircleEngineOptionsSchema.parse(workerData));

port.on('message', (message: unknown) => {
  answerEngineRequest(engine, message)
    .then(response => port.postMessage(response))
    .catch((error: unknown) => {
      logger.error(`[NavigationThread] Could not answer request: ${errorMessage(error)}`);
    });
});
