import type { FastifyInstance } from 'fastify';
import type { ValidatorOptions } from '../../validation/policy-validator.js';
import { registerHealthRoutes } from './health.js';
import { registerPoliciesRoutes } from './policies.js';

export interface RouteContext {
  validation: ValidatorOptions;
}

export async function registerRoutes(
  fastify: FastifyInstance,
  context: RouteContext
): Promise<void> {
  fastify.decorate('validatorOptions', context.validation);

  await registerHealthRoutes(fastify);
  await registerPoliciesRoutes(fastify);
}

declare module 'fastify' {
  interface FastifyInstance {
    validatorOptions: ValidatorOptions;
  }
}
