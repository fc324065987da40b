/**
 * Global Fastify error handler.
 * Maps AgentError subclasses, ZodError and Fastify's own errors to `{ error, message, path }`.
 * A ZodError is reported as a ValidationError.
 */
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AgentError, ValidationError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import type { ErrorResponse } from './types.js';

const logger = createLogger({ name: 'error-handler' });

export const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred';

// ─── Response Helpers ───────────────────────────────────────────

/** Send an error body with the request's path. */
export async function sendError(
  request: FastifyRequest,
  reply: FastifyReply,
  error: string,
  message: string,
  statusCode: number,
): Promise<void> {
  const body: ErrorResponse = { error, message, path: request.url };
  await reply.status(statusCode).send(body);
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function fastifyStatusCode(error: unknown): number | undefined {
  if (!(error instanceof Error) || !('statusCode' in error)) return undefined;
  const statusCode = error.statusCode;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 600 ? statusCode : undefined;
}

// ─── Global Error Handler ───────────────────────────────────────

/** Register the global Fastify error handler. */
export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler(async (error, request, reply) => {
    const failure =
      error instanceof ZodError
        ? new ValidationError(formatZodError(error), { issues: error.issues.length })
        : error;

    if (failure instanceof AgentError) {
      logger.warn('Request failed with AgentError', {
        component: 'error-handler',
        code: failure.code,
        statusCode: failure.statusCode,
        message: failure.message,
        path: request.url,
      });
      await sendError(request, reply, failure.name, failure.message, failure.statusCode);
      return;
    }

    // Fastify built-in errors (JSON parse failures, oversized bodies)
    const statusCode = fastifyStatusCode(failure);
    if (statusCode !== undefined && statusCode < 500 && failure instanceof Error) {
      await sendError(request, reply, statusCode === 404 ? 'NotFound' : 'BadRequest', failure.message, statusCode);
      return;
    }

    logger.error('Unhandled error in request', {
      component: 'error-handler',
      error: failure instanceof Error ? failure.message : String(failure),
      stack: failure instanceof Error ? failure.stack : undefined,
      path: request.url,
    });
    await sendError(request, reply, 'InternalServerError', INTERNAL_ERROR_MESSAGE, 500);
  });

  fastify.setNotFoundHandler(async (request, reply) => {
    await sendError(request, reply, 'NotFound', `Route ${request.method} ${request.url} not found`, 404);
  });
}
