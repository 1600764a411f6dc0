import { describe, it, expect } from 'vitest';
import { validateRuleType } from '../../../../src/validation/validators/rule-type.js';
import {
  createRule,
  emptyGeneration,
  emptyMutation,
  emptyValidation
} from '../../../../src/types/policy.js';
import { scalarNode, toValueTree } from '../../../../src/types/value-tree.js';

const validation = { ...emptyValidation(), pattern: toValueTree({ metadata: { name: '?*' } }) };
const mutation = { ...emptyMutation(), overlay: toValueTree({ metadata: { labels: { team: 'core' } } }) };
const generation = { ...emptyGeneration(), kind: 'ConfigMap', data: scalarNode('x') };

describe('validateRuleType', () => {
  it('should report a rule without any action', () => {
    expect(validateRuleType(createRule('r1'))).toEqual({
      code: 'NoRuleTypeDefined',
      message: "no rule defined in 'r1'",
      rule: 'r1'
    });
  });

  it.each([
    ['mutate', { mutation }],
    ['validate', { validation }],
    ['generate', { generation }]
  ])('should pass a rule with only %s', (_label, overrides) => {
    expect(validateRuleType(createRule('r1', overrides))).toBeUndefined();
  });

  it('should report two actions', () => {
    expect(validateRuleType(createRule('r1', { mutation, validation }))).toEqual({
      code: 'MultipleRuleTypesDefined',
      message: "multiple types of rule defined in rule 'r1', only one type of rule is allowed per rule",
      rule: 'r1'
    });
  });

  it('should report all three actions', () => {
    const result = validateRuleType(createRule('r1', { mutation, validation, generation }));
    expect(result?.code).toBe('MultipleRuleTypesDefined');
  });

  it('should count a validate block with only a message as set', () => {
    const rule = createRule('r1', { validation: { ...emptyValidation(), message: 'labels required' } });
    expect(validateRuleType(rule)).toBeUndefined();
  });

  it('should count a mutate block with only patches as set', () => {
    const rule = createRule('r1', {
      mutation: { overlay: undefined, patches: [{ path: '/spec/replicas', operation: 'remove', value: undefined }] }
    });
    expect(validateRuleType(rule)).toBeUndefined();
  });
});
