/**
 * JSON schemas for the policy validation endpoint.
 */
import { ISSUE_CODES } from '../../validation/constants.js';
import { withErrorResponses } from './common.js';

export const issueSchema = {
  type: 'object',
  properties: {
    code: { type: 'string', enum: [...ISSUE_CODES] },
    message: { type: 'string' },
    rule: { type: 'string' },
    field: { type: 'string' },
    path: { type: 'string' }
  },
  required: ['code', 'message']
} as const;

export const validateQuerySchema = {
  type: 'object',
  properties: {
    strictActions: { type: 'string', enum: ['true', 'false'] }
  },
  additionalProperties: false
} as const;

export const validateResponseSchema = {
  type: 'object',
  properties: {
    valid: { type: 'boolean' },
    policy: { type: ['string', 'null'] },
    errors: { type: 'array', items: issueSchema }
  },
  required: ['valid', 'policy', 'errors']
} as const;

export const policySchemas = {
  validate: withErrorResponses({
    querystring: validateQuerySchema,
    response: {
      200: validateResponseSchema
    }
  })
};
