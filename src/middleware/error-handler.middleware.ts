import { FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import {
  DomainError,
  InvariantViolationError,
  PromoCodeRejectedError,
  TransientContentionError,
} from '../errors/domain-errors';
import { logger } from '../utils/logger';

export async function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
) {
  if (error instanceof DomainError) {
    const context = { code: error.code, url: request.url, method: request.method, requestId: request.id };

    if (error instanceof InvariantViolationError) {
      logger.error({ ...context, err: error, details: error.details }, 'Invariant violation');
    } else if (error instanceof TransientContentionError) {
      logger.warn({ ...context, attempts: error.attempts }, 'Request failed on contention');
      reply.header('Retry-After', '1');
    } else {
      logger.info(context, error.message);
    }

    return reply.status(error.statusCode).send({
      error: error.statusCode >= 500 && !(error instanceof TransientContentionError) ? 'Internal server error' : error.message,
      code: error.code,
      ...(error instanceof PromoCodeRejectedError ? { reason: error.reason } : {}),
      ...(error instanceof TransientContentionError ? { retryable: true } : {}),
      requestId: request.id,
    });
  }

  // Fastify validation errors
  if ('validation' in error && error.validation) {
    return reply.status(400).send({
      error: 'Validation failed',
      details: error.validation,
      requestId: request.id,
    });
  }

  const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;

  logger.error(
    { err: error, url: request.url, method: request.method, requestId: request.id },
    'Unhandled error'
  );

  return reply.status(statusCode).send({
    error: statusCode >= 500 ? 'Internal server error' : error.message,
    requestId: request.id,
  });
}
