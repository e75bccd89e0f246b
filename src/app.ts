// Server factory
// Builds the Fastify instance with CORS, routes and the shared error handler

import Fastify, { type FastifyBaseLogger } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { env } from './env.js';
import { logger } from './logger.js';
import { queryRoutes } from './routes/query.js';
import { courseRoutes } from './routes/courses.js';
import type { RagService } from './services/rag.js';
import { AppError, ErrorCode, describeError, formatErrorResponse } from './utils/errors.js';

// Fastify attaches statusCode to its own errors (bad JSON, body too large)
function statusOf(error: unknown): number {
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return 500;
}

export interface ServerDeps {
  rag: RagService;
}

export async function buildServer(deps: ServerDeps) {
  // Typed as Fastify's base logger so route plugins take a plain FastifyInstance
  const loggerInstance: FastifyBaseLogger = logger;
  const server = Fastify({ loggerInstance });

  await server.register(cors, {
    origin: env.CORS_ORIGINS,
    credentials: true,
  });

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, 'Request failed');
      }
      return reply.code(error.statusCode).send(formatErrorResponse(error, env.NODE_ENV !== 'production'));
    }

    if (error instanceof ZodError) {
      const validation = AppError.validationError('Invalid request', error.flatten());
      return reply.code(validation.statusCode).send(formatErrorResponse(validation, true));
    }

    const statusCode = statusOf(error);
    if (statusCode < 500) {
      return reply.code(statusCode).send({
        error: ErrorCode.BAD_REQUEST,
        message: describeError(error),
        statusCode,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send(formatErrorResponse(AppError.internal()));
  });

  // Main health endpoint with /v1 prefix
  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
      courses: deps.rag.getCourseAnalytics().totalCourses,
    };
  });

  // Legacy redirect
  server.get('/health', async (request, reply) => {
    return reply.redirect('/v1/health', 301);
  });

  await server.register(queryRoutes, { prefix: '/v1', rag: deps.rag });
  await server.register(courseRoutes, { prefix: '/v1', rag: deps.rag });

  return server;
}
