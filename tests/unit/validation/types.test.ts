import { describe, it, expect } from 'vitest';
import { IssueCollector, issue } from '../../../src/validation/types.js';

describe('issue', () => {
  it('should leave out unknown context fields', () => {
    expect(issue('MissingPattern', 'm', { rule: 'r', field: undefined })).toEqual({
      code: 'MissingPattern',
      message: 'm',
      rule: 'r'
    });
    expect(Object.keys(issue('MissingPattern', 'm'))).toEqual(['code', 'message']);
  });
});

describe('IssueCollector', () => {
  it('should skip undefined results and keep insertion order', () => {
    const collector = new IssueCollector();
    collector.add(undefined);
    collector.add(issue('NoRuleTypeDefined', 'first'));
    collector.addAll([issue('MissingPattern', 'second'), issue('EmptyPatternArray', 'third')]);

    expect(collector.size).toBe(3);
    expect(collector.toResult().errors.map((e) => e.message)).toEqual(['first', 'second', 'third']);
    expect(collector.toResult().valid).toBe(false);
  });

  it('should report an empty run as valid', () => {
    expect(new IssueCollector().toResult()).toEqual({ valid: true, errors: [] });
  });
});
