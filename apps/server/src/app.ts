import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { closeDb, formatIssues } from '@todo-api/core';
import type { TodoDb, ServiceInfo } from '@todo-api/core';
import { HttpError } from './errors.js';
import { registerTaskRoutes } from './routes/tasks.js';
import { APP_NAME, APP_VERSION, type LogLevel } from './config.js';

export interface BuildAppOptions {
  db: TodoDb;
  /** Allowed origins; `'*'` reflects whatever origin the request carries */
  corsOrigins?: string[];
  /** Omit to disable request logging (tests) */
  logLevel?: LogLevel;
}

const CORS_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'];

const resolveCorsOrigin = (origins: string[]): boolean | string[] =>
  origins.includes('*') ? true : origins;

/**
 * Build the HTTP application. The database is closed when the app closes.
 */
export async function buildApp({ db, corsOrigins = ['*'], logLevel }: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: logLevel ? { level: logLevel } : false,
  });

  await app.register(cors, {
    origin: resolveCorsOrigin(corsOrigins),
    credentials: true,
    methods: CORS_METHODS,
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof HttpError) {
      return reply.code(error.statusCode).send({ detail: error.message });
    }
    if (error instanceof ZodError) {
      return reply.code(400).send({ detail: formatIssues(error) });
    }
    // Fastify's own client errors: bad JSON, unsupported media type, oversized body
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ detail: error.message });
    }

    request.log.error({ err: error }, 'unhandled error');
    return reply.code(500).send({ detail: 'Internal Server Error' });
  });

  app.setNotFoundHandler((_request, reply) => {
    return reply.code(404).send({ detail: 'Not Found' });
  });

  app.addHook('onClose', async () => {
    closeDb(db);
  });

  app.get('/', async (): Promise<ServiceInfo> => ({
    message: `${APP_NAME} - Ready`,
    version: APP_VERSION,
  }));

  registerTaskRoutes(app, db);

  return app;
}
