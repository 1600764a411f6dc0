import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { loadPoliciesFromYAML, loadPoliciesFromFile } from '../../../src/document/loader.js';
import { PolicyDecodeError, PolicyDocumentError, PolicyLoadError } from '../../../src/document/errors.js';
import { PolicyValidator } from '../../../src/validation/policy-validator.js';

const fixturesDir = resolve(__dirname, '../../fixtures/policies');

describe('loadPoliciesFromYAML', () => {
  it('should load a single document', () => {
    const [policy, ...rest] = loadPoliciesFromYAML(`
metadata:
  name: require-labels
spec:
  rules:
    - name: check-labels
      match:
        resources:
          kinds: [Pod]
      validate:
        pattern:
          metadata:
            labels:
              app: "?*"
`);
    expect(rest).toHaveLength(0);
    expect(policy?.name).toBe('require-labels');
    expect(policy?.rules.map((r) => r.name)).toEqual(['check-labels']);
  });

  it('should load every document of a stream and skip empty ones', () => {
    const policies = loadPoliciesFromYAML(`
---
spec:
  rules:
    - name: first
---
---
metadata:
  name: second
spec:
  rules: []
`);
    expect(policies.map((p) => p.name)).toEqual([undefined, 'second']);
  });

  it('should ignore a trailing document separator', () => {
    const policies = loadPoliciesFromYAML('metadata:\n  name: only\nspec:\n  rules: []\n---\n');
    expect(policies.map((p) => p.name)).toEqual(['only']);
  });

  it('should keep a __proto__ label key for selector checks', () => {
    const [policy] = loadPoliciesFromYAML(`
spec:
  rules:
    - name: labels
      match:
        resources:
          kinds: [Pod]
          selector:
            matchLabels:
              __proto__: x
              app: web
      validate:
        pattern:
          metadata:
            name: "?*"
`);
    if (policy === undefined) throw new Error('expected a policy');

    expect(Object.keys(policy.rules[0]?.matchResources.selector?.matchLabels ?? {})).toEqual(['__proto__', 'app']);
    expect(new PolicyValidator().validate(policy).errors).toEqual([
      {
        code: 'InvalidSelector',
        message: `invalid label key "__proto__": name must be 1-63 alphanumeric characters, '-', '_' or '.'`,
        rule: 'labels',
        field: 'match.resources.selector'
      }
    ]);
  });

  it('should load JSON text', () => {
    const [policy] = loadPoliciesFromYAML('{"metadata": {"name": "json"}, "spec": {"rules": [{"name": "r"}]}}');
    expect(policy?.name).toBe('json');
  });

  it('should keep the written key order for the anchor walk', () => {
    const [policy] = loadPoliciesFromYAML(`
spec:
  rules:
    - name: ordered
      validate:
        pattern:
          2: []
          1: ^(x)
`);
    const result = policy && new PolicyValidator().validate(policy);
    expect(result?.errors).toEqual([
      {
        code: 'EmptyPatternArray',
        message: 'pattern array at /2/ is empty',
        path: '/2/',
        rule: 'ordered',
        field: 'validate.pattern'
      }
    ]);
  });

  it('should reject input without documents', () => {
    expect(() => loadPoliciesFromYAML('')).toThrow(new PolicyLoadError('no policy documents found'));
    expect(() => loadPoliciesFromYAML('# nothing here\n')).toThrow('no policy documents found');
  });

  it('should report YAML syntax errors with the document number', () => {
    expect(() => loadPoliciesFromYAML('spec:\n  rules: []\n---\nmetadata: [unclosed\n')).toThrow(
      /^YAML syntax error in document 2: /
    );
  });

  it('should report documents nested beyond maxDepth', () => {
    expect(() => loadPoliciesFromYAML('spec:\n  rules:\n    - name: r\n', { maxDepth: 3 })).toThrow(
      'document 1: pattern exceeds maximum depth of 3 at /spec/rules/0/name/'
    );
  });

  it('should let decode errors through', () => {
    expect(() => loadPoliciesFromYAML('metadata:\n  name: x\n')).toThrow(PolicyDecodeError);
  });
});

describe('loadPoliciesFromFile', () => {
  it('should load a multi-document YAML file', async () => {
    const policies = await loadPoliciesFromFile(resolve(fixturesDir, 'valid.yaml'));
    expect(policies.map((p) => p.name)).toEqual(['require-labels', 'disallow-latest']);
  });

  it('should load a JSON file', async () => {
    const [policy] = await loadPoliciesFromFile(resolve(fixturesDir, 'valid.json'));
    expect(policy?.rules[0]?.generation.kind).toBe('ConfigMap');
  });

  it('should prefix decode errors with the file path', async () => {
    const file = resolve(fixturesDir, 'missing-spec.yaml');
    await expect(loadPoliciesFromFile(file)).rejects.toThrow(
      new PolicyLoadError('(root): missing required field "spec"', file)
    );
  });

  it('should report syntax errors as load errors', async () => {
    const file = resolve(fixturesDir, 'syntax-error.yaml');
    await expect(loadPoliciesFromFile(file)).rejects.toBeInstanceOf(PolicyLoadError);
  });

  it('should report unreadable files', async () => {
    const file = resolve(fixturesDir, 'does-not-exist.yaml');
    const err: unknown = await loadPoliciesFromFile(file).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PolicyDocumentError);
    expect(err instanceof PolicyLoadError && err.filePath).toBe(file);
    expect(err instanceof Error && err.message.startsWith(`${file}: Failed to read file: `)).toBe(true);
  });
});
