import type { FastifyInstance } from 'fastify';
import { CompositeError, QueryExecutionError, UnknownParameterError } from 'query-composite';

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, _request, reply) => {
    // Ensure we always deal with an Error object
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    // Filters the endpoint does not declare → 400
    if (error instanceof UnknownParameterError) {
      return reply.status(400).send({
        error: error.name,
        message: error.message,
        paths: error.paths.map((path) => path.map(String)),
      });
    }

    // Database errors → 500
    if (error instanceof QueryExecutionError) {
      app.log.error(error);
      return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
    }

    // Any other composite error is a bug in the route's filter definitions
    if (error instanceof CompositeError) {
      app.log.error(error);
      return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
    }

    // Fastify built-in errors have a numeric `statusCode` — pass it through
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
