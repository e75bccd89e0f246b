// Query routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RagService } from '../services/rag.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

const QueryRequestSchema = z.object({
  query: z.string().trim().min(1).max(10000),
  session_id: z.string().min(1).max(255).optional(),
});

export interface QueryRoutesOptions {
  rag: RagService;
}

export async function queryRoutes(server: FastifyInstance, opts: QueryRoutesOptions) {
  const { rag } = opts;

  // POST /v1/query - Answer a question about the course materials
  server.post('/query', async (request, reply) => {
    const parsed = QueryRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      const error = AppError.validationError('Invalid request body', parsed.error.flatten());
      return reply.code(error.statusCode).send(formatErrorResponse(error, true));
    }

    const { query, session_id: sessionId } = parsed.data;
    const result = await rag.query(query, sessionId);

    return {
      answer: result.answer,
      sources: result.sources,
      session_id: result.sessionId,
    };
  });

  // DELETE /v1/sessions/:sessionId - Forget a conversation
  server.delete<{ Params: { sessionId: string } }>('/sessions/:sessionId', async (request, reply) => {
    const { sessionId } = request.params;

    if (!rag.clearSession(sessionId)) {
      const error = AppError.notFound('Session not found');
      return reply.code(error.statusCode).send(formatErrorResponse(error));
    }

    return reply.code(204).send();
  });
}
