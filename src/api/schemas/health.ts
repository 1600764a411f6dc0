/**
 * JSON schemas for the health endpoint.
 */

export const healthResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok'] },
    timestamp: { type: 'number' },
    uptime: { type: 'number' },
    version: { type: 'string' }
  },
  required: ['status', 'timestamp', 'uptime', 'version']
} as const;

export const healthSchemas = {
  health: {
    response: {
      200: healthResponseSchema
    }
  }
};
