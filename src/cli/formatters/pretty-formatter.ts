/**
 * Pretty formatter for CLI output - human readable.
 */

import type { FileReport, FormattableData, ValidationSummary } from '../types.js';
import type { OutputFormatter } from './index.js';
import { formatIssueLocation } from '../utils/errors.js';

type ColorStyle = 'bold' | 'dim' | 'red' | 'green' | 'cyan';

export class PrettyFormatter implements OutputFormatter {
  constructor(private readonly useColors: boolean = true) {}

  format(data: FormattableData): string {
    switch (data.type) {
      case 'validation':
        return this.formatValidation(data.data);
      case 'error':
        return this.color('✗ ', 'red') + this.color(data.data, 'red');
      case 'message':
        return data.data;
    }
  }

  private formatValidation(summary: ValidationSummary): string {
    const lines: string[] = [];

    for (const file of summary.files) {
      lines.push(...this.formatFile(file), '');
    }

    if (summary.valid) {
      lines.push(this.color(`✓ All ${summary.policyCount} policy document(s) are valid`, 'green'));
    } else {
      const failed = summary.files.reduce(
        (count, file) => count + file.policies.filter((p) => !p.valid).length,
        0
      );
      const unloaded = summary.files.filter((f) => f.loadError !== undefined).length;

      if (unloaded > 0) {
        lines.push(this.color(`✗ ${unloaded} file(s) could not be loaded`, 'red'));
      }
      if (failed > 0) {
        lines.push(
          this.color(
            `✗ ${summary.errorCount - unloaded} error(s) in ${failed} of ${summary.policyCount} policy document(s)`,
            'red'
          )
        );
      }
    }

    return lines.join('\n');
  }

  private formatFile(file: FileReport): string[] {
    const lines = [this.color(`File: ${file.file}`, 'bold')];

    if (file.loadError !== undefined) {
      lines.push(`  ${this.color('✗', 'red')} ${this.color(file.loadError, 'red')}`);
    }

    for (const policy of file.policies) {
      const name = policy.name ?? this.color('(unnamed)', 'dim');
      const rules = this.color(`[${policy.ruleCount} rule(s)]`, 'dim');
      const status = policy.valid ? this.color('✓', 'green') : this.color('✗', 'red');
      lines.push(`  ${status} ${name} ${rules}`);

      for (const issue of policy.errors) {
        lines.push(`      ${this.color(formatIssueLocation(issue), 'cyan')}: ${issue.message}`);
      }
    }

    return lines;
  }

  private color(text: string, style: ColorStyle): string {
    if (!this.useColors) {
      return text;
    }
    const codes: Record<ColorStyle, string> = {
      bold: '\x1b[1m',
      dim: '\x1b[2m',
      red: '\x1b[31m',
      green: '\x1b[32m',
      cyan: '\x1b[36m'
    };
    return `${codes[style]}${text}\x1b[0m`;
  }
}
