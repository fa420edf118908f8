import { type FastifyInstance, type FastifyError, type FastifyRequest, type FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { AppError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Error envelope: { error: { code, message, details? } }
// ---------------------------------------------------------------------------

export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
) {
  if (error instanceof AppError) {
    return reply.code(error.statusCode).send({
      error: { code: error.code, message: error.message, details: error.details },
    });
  }

  if (error.validation) {
    return reply.code(400).send({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: error.validation,
      },
    });
  }

  if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
    return reply.code(error.statusCode).send({
      error: { code: error.code ?? 'BAD_REQUEST', message: error.message },
    });
  }

  request.log.error({ err: error }, 'Unhandled error');
  return reply.code(500).send({
    error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
  });
}

async function errorHandlerPlugin(app: FastifyInstance) {
  app.setErrorHandler(errorHandler);
}

export const errorHandlerPluginFp = fp(errorHandlerPlugin, {
  name: 'error-handler-plugin',
});
