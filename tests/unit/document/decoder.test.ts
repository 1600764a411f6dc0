import { describe, it, expect } from 'vitest';
import { decodePolicy } from '../../../src/document/decoder.js';
import { PolicyDecodeError } from '../../../src/document/errors.js';
import { toValueTree, fromValueTree } from '../../../src/types/value-tree.js';

function decode(doc: unknown) {
  return decodePolicy(toValueTree(doc));
}

describe('decodePolicy', () => {
  it('should decode every rule group', () => {
    const policy = decode({
      metadata: { name: 'full' },
      spec: {
        rules: [
          {
            name: 'all',
            match: {
              resources: {
                kinds: ['Pod', 'Deployment'],
                name: 'web-*',
                namespaces: ['default'],
                selector: {
                  matchLabels: { app: 'web' },
                  matchExpressions: [{ key: 'tier', operator: 'In', values: ['frontend'] }]
                }
              }
            },
            exclude: { resources: { kinds: ['Pod'], namespaces: ['kube-system'] } },
            mutate: {
              overlay: { metadata: { labels: { team: 'core' } } },
              patches: [{ path: '/spec/replicas', op: 'replace', value: 2 }]
            },
            validate: { message: 'labels', anyPattern: [{ a: 1 }, { b: 2 }] },
            generate: { kind: 'ConfigMap', name: 'defaults', clone: { namespace: 'default', name: 'tpl' } }
          }
        ]
      }
    });

    expect(policy.name).toBe('full');
    const [rule] = policy.rules;
    expect(rule?.name).toBe('all');
    expect(rule?.matchResources).toEqual({
      kinds: ['Pod', 'Deployment'],
      name: 'web-*',
      namespaces: ['default'],
      selector: {
        matchLabels: { app: 'web' },
        matchExpressions: [{ key: 'tier', operator: 'In', values: ['frontend'] }]
      }
    });
    expect(rule?.excludeResources).toEqual({
      kinds: ['Pod'],
      name: '',
      namespaces: ['kube-system'],
      selector: undefined
    });
    expect(rule?.mutation.patches).toEqual([
      { path: '/spec/replicas', operation: 'replace', value: { kind: 'scalar', value: 2 } }
    ]);
    expect(rule?.mutation.overlay && fromValueTree(rule.mutation.overlay)).toEqual({
      metadata: { labels: { team: 'core' } }
    });
    expect(rule?.validation.message).toBe('labels');
    expect(rule?.validation.pattern).toBeUndefined();
    expect(rule?.validation.anyPattern).toHaveLength(2);
    expect(rule?.generation).toEqual({
      kind: 'ConfigMap',
      name: 'defaults',
      data: undefined,
      clone: { namespace: 'default', name: 'tpl' }
    });
  });

  it('should decode absent groups as empty', () => {
    const [rule] = decode({ spec: { rules: [{ name: 'bare' }] } }).rules;
    expect(rule).toEqual({
      name: 'bare',
      matchResources: { kinds: [], name: '', namespaces: [], selector: undefined },
      excludeResources: { kinds: [], name: '', namespaces: [], selector: undefined },
      mutation: { overlay: undefined, patches: [] },
      validation: { message: '', pattern: undefined, anyPattern: [] },
      generation: { kind: '', name: '', data: undefined, clone: { namespace: '', name: '' } }
    });
  });

  it('should leave the name undefined without metadata', () => {
    expect(decode({ spec: { rules: [] } }).name).toBeUndefined();
  });

  it('should treat explicit nulls as absent', () => {
    const [rule] = decode({
      spec: { rules: [{ name: 'n', validate: null, mutate: { patches: [{ path: '/a', op: 'add', value: null }] } }] }
    }).rules;
    expect(rule?.validation.pattern).toBeUndefined();
    expect(rule?.mutation.patches[0]?.value).toBeUndefined();
  });

  it('should require spec', () => {
    expect(() => decode({ metadata: { name: 'x' } })).toThrow(
      new PolicyDecodeError('missing required field "spec"', '(root)')
    );
    expect(() => decode({ metadata: { name: 'x' } })).toThrow('(root): missing required field "spec"');
  });

  it('should require spec.rules', () => {
    expect(() => decode({ spec: {} })).toThrow('spec: missing required field "rules"');
  });

  it('should reject a document that is not a map', () => {
    expect(() => decode(['a'])).toThrow('(root): must be an object, got array');
  });

  it('should report wrong field types with dotted paths', () => {
    expect(() => decode({ spec: { rules: 'none' } })).toThrow('spec.rules: must be an array, got string');
    expect(() => decode({ spec: { rules: [{ name: 1 }] } })).toThrow(
      'spec.rules[0].name: must be a string, got number'
    );
    expect(() =>
      decode({ spec: { rules: [{ name: 'r', match: { resources: { kinds: ['Pod', 7] } } }] } })
    ).toThrow('spec.rules[0].match.resources.kinds[1]: must be a string, got number');
    expect(() =>
      decode({ spec: { rules: [{ name: 'r', mutate: { patches: [{ path: '/a', op: true }] } }] } })
    ).toThrow('spec.rules[0].mutate.patches[0].op: must be a string, got boolean');
    expect(() =>
      decode({
        spec: { rules: [{ name: 'r', match: { resources: { kinds: ['Pod'], selector: { matchLabels: { app: 1 } } } } }] }
      })
    ).toThrow('spec.rules[0].match.resources.selector.matchLabels.app: must be a string, got number');
  });

  it('should carry the path on the error', () => {
    try {
      decode({ spec: { rules: [{ name: 'r', validate: 'x' }] } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PolicyDecodeError);
      if (err instanceof PolicyDecodeError) {
        expect(err.path).toBe('spec.rules[0].validate');
      }
    }
  });
});
