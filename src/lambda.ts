import type { FastifyInstance, InjectOptions } from 'fastify';

import {
  GatewayResult,
  consoleTestRequest,
  detectGatewayEvent,
  errorResult,
  fromV1Event,
  fromV2Event,
  isV1Event,
  isV2Event,
  toGatewayMethod,
  toGatewayResult,
} from './adapters/gateway-event.js';
import { buildApp } from './app.js';
import { createNoteRepository } from './repositories/index.js';
import { loadConfig } from './utils/config.js';
import logger from './utils/logger.js';

export type LambdaHandler = (event: unknown) => Promise<GatewayResult>;

function toInjectOptions(event: unknown): InjectOptions | GatewayResult {
  if (isV2Event(event)) {
    const method = toGatewayMethod(event.requestContext.http.method);
    return method ? fromV2Event(event, method) : errorResult(405, 'Method not allowed');
  }
  if (isV1Event(event)) {
    const method = toGatewayMethod(event.httpMethod);
    return method ? fromV1Event(event, method) : errorResult(405, 'Method not allowed');
  }
  return consoleTestRequest();
}

/**
 * Lambda entry point factory. The app is built on the first invocation and reused
 * for the lifetime of the container.
 */
export function createLambdaHandler(appFactory: () => Promise<FastifyInstance>): LambdaHandler {
  let app: Promise<FastifyInstance> | undefined;

  const getApp = (): Promise<FastifyInstance> => {
    if (!app) {
      app = appFactory().catch((error: unknown) => {
        app = undefined;
        throw error;
      });
    }
    return app;
  };

  return async (event: unknown) => {
    const kind = detectGatewayEvent(event);
    logger.debug({ kind }, 'Lambda invocation');

    if (kind === 'unsupported') {
      logger.error({ event }, 'Unsupported event format');
      return errorResult(
        400,
        'Unsupported event format. Expected an API Gateway REST (v1) or HTTP API (v2) event, or a console test event.'
      );
    }
    if (kind === 'test') {
      logger.info('Console test event received, serving GET /');
    }

    const request = toInjectOptions(event);
    if ('statusCode' in request) {
      return request;
    }

    const instance = await getApp();
    const response = await instance.inject(request);
    return toGatewayResult(response);
  };
}

export const handler = createLambdaHandler(async () => {
  const config = loadConfig();
  logger.level = config.logLevel;
  const repository = await createNoteRepository(config.storage);
  logger.info({ backend: repository.backend }, 'Lambda note app initialized');
  const app = await buildApp({ repository, config });
  await app.ready();
  return app;
});
