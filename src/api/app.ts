import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { StorageSession } from '../services/storage-session.js';
import { AppConfig, ErrorCode } from '../types/index.js';
import logger from '../utils/logger.js';
import { registerRoutes } from './routes.js';

/**
 * Build the Fastify app around an already constructed session.
 */
export async function buildApp(session: StorageSession, config: AppConfig): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // Using pino logger directly
  });

  // Body parse failures and anything a handler throws end up here
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const status = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    if (status >= 500) {
      logger.error({ error, method: request.method, url: request.url }, 'Request failed');
    } else {
      logger.debug({ error: error.message, method: request.method, url: request.url }, 'Request rejected');
    }
    const code = status >= 500 ? ErrorCode.ServerError : ErrorCode.InvalidInput;
    return reply.code(status).send({ success: false, error: code, message: error.message });
  });

  await app.register(cors, {
    origin: true,
  });

  await registerRoutes(app, session, config);

  return app;
}
