import Fastify from 'fastify';
import type { QueryRunner } from 'query-composite';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerUserRoutes } from '../features/users/routes.js';

export interface ServerOptions {
  logger?: boolean;
}

export function buildServer(runner: QueryRunner, options: ServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });

  registerErrorHandler(app);

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerUserRoutes(instance, runner);
  }, { prefix });

  return app;
}
