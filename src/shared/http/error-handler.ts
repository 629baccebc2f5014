/**
 * src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces, driver messages) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response (+ redirect hint).
 * - RateLimitError → 429 response.
 * - StorageError → 503 with a generic retry message; full cause is logged.
 * - Zod validation errors → 400 (safety net if controller misses).
 * - Fastify client errors (bad JSON, body too large) → their 4xx with a generic message.
 * - Unexpected errors → 500 with generic message.
 * - Unknown routes → 404 pointing the client back home.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Always use withRequestContext(req) so requestId + identity land in every log line.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { StorageError } from '../db/storage-error';
import { withRequestContext } from '../logger/with-context';

export const HOME_PATH = '/';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
  redirectTo?: string;
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'sessionId',
  'password',
  'passwords',
  'passwordHash',
  'secret',
  'cookie',
]);

function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string, redirectTo?: string): ErrorResponseBody {
  const body: ErrorResponseBody = { error: { code, message } };
  if (redirectTo) body.redirectTo = redirectTo;
  return body;
}

function clientErrorStatus(err: Error): number | null {
  if (!('statusCode' in err) || typeof err.statusCode !== 'number') return null;
  return err.statusCode >= 400 && err.statusCode < 500 ? err.statusCode : null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message, err.redirectTo));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      return reply
        .status(429)
        .send(buildResponse('RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Storage failures: full detail in logs, generic message to the client
    if (err instanceof StorageError) {
      const cause = err.cause instanceof Error ? err.cause : null;
      log.error('storage_error', {
        flow: 'http.error',
        operation: err.operation,
        message: cause?.message ?? String(err.cause),
        stack: cause?.stack ?? err.stack,
      });

      return reply
        .status(503)
        .send(
          buildResponse('STORAGE_UNAVAILABLE', 'A storage problem occurred. Please try again.'),
        );
    }

    // 4) Zod safety net
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues });
      return reply.status(400).send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 5) Fastify client errors (malformed JSON, unsupported media type, ...)
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      log.warn('client_error', { flow: 'http.error', status: clientStatus, message: err.message });
      return reply.status(clientStatus).send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 6) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    withRequestContext(req).info('route_not_found', { flow: 'http.not_found' });

    return reply
      .status(404)
      .send(buildResponse('NOT_FOUND', 'Page not found.', HOME_PATH));
  });
}
