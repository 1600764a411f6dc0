import type { FastifyInstance } from 'fastify';
import { version } from '../../version.js';
import { healthSchemas } from '../schemas/health.js';

export interface HealthResponse {
  status: 'ok';
  timestamp: number;
  uptime: number;
  version: string;
}

export async function registerHealthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    { schema: healthSchemas.health },
    async (): Promise<HealthResponse> => {
      return {
        status: 'ok',
        timestamp: Date.now(),
        uptime: process.uptime(),
        version
      };
    }
  );
}
