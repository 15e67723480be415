import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodSchema } from 'zod';
import { validationError } from '../utils/errors.js';

type RequestPart = 'body' | 'query' | 'params';

function validatePart(part: RequestPart, schema: ZodSchema) {
  return async (request: FastifyRequest, _reply: FastifyReply): Promise<void> => {
    const result = schema.safeParse(request[part]);
    if (!result.success) {
      const firstIssue = result.error.issues[0];
      const field = firstIssue?.path.join('.') || undefined;
      const message = firstIssue?.message ?? 'Validation failed';
      throw validationError(message, field);
    }
    // Replace with the parsed/coerced Zod output so handlers get clean data
    request[part] = result.data;
  };
}

export function validate(schema: ZodSchema) {
  return validatePart('body', schema);
}

export function validateQuery(schema: ZodSchema) {
  return validatePart('query', schema);
}

export function validateParams(schema: ZodSchema) {
  return validatePart('params', schema);
}
