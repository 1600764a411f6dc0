import { describe, it, expect } from 'vitest';
import { TableFormatter } from '../../../../src/cli/formatters/table-formatter.js';
import type { ValidationSummary } from '../../../../src/cli/types.js';

function summary(valid: boolean): ValidationSummary {
  return {
    valid,
    fileCount: 1,
    policyCount: 1,
    errorCount: valid ? 0 : 1,
    files: [
      {
        file: '/p/b.yaml',
        valid,
        policies: [
          {
            name: 'labels',
            ruleCount: 1,
            valid,
            errors: valid ? [] : [{ code: 'NoRuleTypeDefined', message: "no rule defined in 'r'", rule: 'r' }]
          }
        ]
      }
    ]
  };
}

describe('TableFormatter', () => {
  const formatter = new TableFormatter(false);

  it('should render a policies table', () => {
    expect(formatter.format({ type: 'validation', data: summary(true) })).toBe([
      'File                  Policy                Rules  Valid  Errors',
      '--------------------  --------------------  -----  -----  ------',
      '/p/b.yaml             labels                    1  yes         0'
    ].join('\n'));
  });

  it('should add an issues table for invalid policies', () => {
    expect(formatter.format({ type: 'validation', data: summary(false) })).toBe([
      'File                  Policy                Rules  Valid  Errors',
      '--------------------  --------------------  -----  -----  ------',
      '/p/b.yaml             labels                    1  no          1',
      '',
      'Policy  Code               Location  Message               ',
      '------  -----------------  --------  ----------------------',
      "labels  NoRuleTypeDefined  rule 'r'  no rule defined in 'r'"
    ].join('\n'));
  });

  it('should shorten long file paths from the left', () => {
    const data = summary(true);
    const [file] = data.files;
    if (file) {
      file.file = `/${'a'.repeat(50)}/policy.yaml`;
    }
    const row = formatter.format({ type: 'validation', data }).split('\n')[2];
    expect(row?.startsWith(`...${'a'.repeat(25)}/policy.yaml  `)).toBe(true);
  });

  it('should list files that failed to load', () => {
    const data: ValidationSummary = {
      valid: false,
      fileCount: 1,
      policyCount: 0,
      errorCount: 1,
      files: [{ file: '/p/c.yaml', valid: false, policies: [], loadError: 'boom' }]
    };

    expect(formatter.format({ type: 'validation', data })).toBe([
      'File                  Policy                Rules  Valid  Errors',
      '--------------------  --------------------  -----  -----  ------',
      '/p/c.yaml             -                         -  no          1',
      '',
      'Policy  Code       Location  Message',
      '------  ---------  --------  -------',
      '-       LoadError  -         boom'
    ].join('\n'));
  });

  it('should format messages and errors', () => {
    expect(formatter.format({ type: 'message', data: 'hello' })).toBe('hello');
    expect(formatter.format({ type: 'error', data: 'oops' })).toBe('Error: oops');
  });
});
