import { FastifyRequest, FastifyReply } from 'fastify';
import Joi from 'joi';

/**
 * Validation Middleware Factory
 * Validates body, params and query against Joi schemas and replaces them with
 * the converted values (dates parsed, defaults applied)
 */
export interface ValidationOptions {
  body?: Joi.Schema;
  params?: Joi.Schema;
  query?: Joi.Schema;
  abortEarly?: boolean;
}

function formatDetails(error: Joi.ValidationError) {
  return error.details.map((detail) => ({
    field: detail.path.join('.'),
    message: detail.message,
    type: detail.type,
  }));
}

export function validate(options: ValidationOptions) {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const { body, params, query, abortEarly = false } = options;

    if (body) {
      const { error, value } = body.validate(request.body ?? {}, { abortEarly });
      if (error) {
        reply.status(400).send({
          error: 'Validation Error',
          message: 'Request body validation failed',
          details: formatDetails(error),
          requestId: request.id,
        });
        return;
      }
      request.body = value;
    }

    if (params) {
      const { error, value } = params.validate(request.params, { abortEarly });
      if (error) {
        reply.status(400).send({
          error: 'Validation Error',
          message: 'Path parameters validation failed',
          details: formatDetails(error),
          requestId: request.id,
        });
        return;
      }
      request.params = value;
    }

    if (query) {
      const { error, value } = query.validate(request.query, { abortEarly });
      if (error) {
        reply.status(400).send({
          error: 'Validation Error',
          message: 'Query parameters validation failed',
          details: formatDetails(error),
          requestId: request.id,
        });
        return;
      }
      request.query = value;
    }
  };
}
