/**
 * Shared JSON schemas.
 */
import type { FastifySchema } from 'fastify';

export const errorResponseSchema = {
  type: 'object',
  properties: {
    statusCode: { type: 'number' },
    error: { type: 'string' },
    message: { type: 'string' },
    code: { type: 'string' },
    details: {}
  },
  required: ['statusCode', 'error', 'message']
} as const;

export function withErrorResponses(schema: FastifySchema): FastifySchema {
  const existingResponse = typeof schema.response === 'object' ? schema.response : {};
  return {
    ...schema,
    response: {
      ...existingResponse,
      400: errorResponseSchema,
      500: errorResponseSchema
    }
  };
}
