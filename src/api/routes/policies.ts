import type { FastifyInstance } from 'fastify';
import { decodePolicy } from '../../document/decoder.js';
import { toValueTree } from '../../types/value-tree.js';
import type { PolicyValidationIssue } from '../../validation/types.js';
import { PolicyValidator } from '../../validation/policy-validator.js';
import { policySchemas } from '../schemas/policy.js';

interface ValidateQuery {
  strictActions?: 'true' | 'false';
}

export interface ValidatePolicyResponse {
  valid: boolean;
  policy: string | null;
  errors: PolicyValidationIssue[];
}

export async function registerPoliciesRoutes(fastify: FastifyInstance): Promise<void> {
  const options = fastify.validatorOptions;
  const validator = new PolicyValidator(options);
  const strictValidator = new PolicyValidator({ ...options, validateActions: true });
  const treeOptions = options.maxDepth !== undefined ? { maxDepth: options.maxDepth } : {};

  // POST /policies/validate - validate one policy document
  fastify.post<{ Querystring: ValidateQuery; Body: unknown }>(
    '/policies/validate',
    { schema: policySchemas.validate },
    async (request): Promise<ValidatePolicyResponse> => {
      const tree = toValueTree(request.body, treeOptions);
      const policy = decodePolicy(tree);

      const strict = request.query.strictActions === 'true';
      const result = (strict ? strictValidator : validator).validate(policy);

      request.log.info({
        policy: policy.name ?? null,
        rules: policy.rules.length,
        issues: result.errors.length
      }, 'Policy validated');

      return {
        valid: result.valid,
        policy: policy.name ?? null,
        errors: result.errors
      };
    }
  );
}
