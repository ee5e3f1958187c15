import { FastifyRequest, FastifyReply, FastifyError } from 'fastify';
import { z } from 'zod';
import { logger } from '../../utils/logger';
import {
  AutomationAlreadyRunningError,
  DuplicateEntryError,
  ValidationError,
} from '../../utils/errors';

export async function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  if (error instanceof z.ZodError) {
    reply.code(400).send({ error: 'Invalid request body', statusCode: 400, details: error.errors });
    return;
  }
  if (error instanceof ValidationError) {
    reply.code(400).send({ error: error.message, statusCode: 400, details: error.details });
    return;
  }
  if (error instanceof DuplicateEntryError || error instanceof AutomationAlreadyRunningError) {
    reply.code(409).send({ error: error.message, statusCode: 409 });
    return;
  }

  logger.error('Request error:', {
    method: request.method,
    url: request.url,
    error: error.message,
    stack: error.stack,
  });

  const statusCode = error.statusCode || 500;
  const message = error.message || 'Internal server error';

  reply.code(statusCode).send({
    error: message,
    statusCode,
  });
}
