/**
 * Table formatter for CLI output.
 */

import type { FormattableData, ValidationSummary } from '../types.js';
import type { OutputFormatter } from './index.js';
import { formatIssueLocation } from '../utils/errors.js';

/** Column configuration */
interface ColumnConfig {
  header: string;
  width?: number;
  align?: 'left' | 'right' | 'center';
}

export class TableFormatter implements OutputFormatter {
  constructor(private readonly useColors: boolean = true) {}

  format(data: FormattableData): string {
    switch (data.type) {
      case 'validation':
        return this.formatValidation(data.data);
      case 'error':
        return this.color(`Error: ${data.data}`, 'red');
      case 'message':
        return data.data;
    }
  }

  private formatValidation(summary: ValidationSummary): string {
    const policyColumns: ColumnConfig[] = [
      { header: 'File', width: 20 },
      { header: 'Policy', width: 20 },
      { header: 'Rules', width: 5, align: 'right' },
      { header: 'Valid', width: 5 },
      { header: 'Errors', width: 6, align: 'right' }
    ];

    const policyRows: string[][] = [];
    const issueRows: string[][] = [];

    for (const file of summary.files) {
      if (file.loadError !== undefined) {
        policyRows.push([this.truncate(file.file, 40), '-', '-', this.color('no', 'red'), '1']);
        issueRows.push(['-', 'LoadError', '-', file.loadError]);
      }

      for (const policy of file.policies) {
        const policyName = policy.name ?? '-';
        policyRows.push([
          this.truncate(file.file, 40),
          this.truncate(policyName, 30),
          String(policy.ruleCount),
          policy.valid ? this.color('yes', 'green') : this.color('no', 'red'),
          String(policy.errors.length)
        ]);

        for (const issue of policy.errors) {
          issueRows.push([policyName, issue.code, formatIssueLocation(issue), issue.message]);
        }
      }
    }

    const sections = [this.renderTable(policyColumns, policyRows)];

    if (issueRows.length > 0) {
      const issueColumns: ColumnConfig[] = [
        { header: 'Policy' },
        { header: 'Code' },
        { header: 'Location' },
        { header: 'Message' }
      ];
      sections.push(this.renderTable(issueColumns, issueRows));
    }

    return sections.join('\n\n');
  }

  private renderTable(columns: ColumnConfig[], rows: string[][]): string {
    const widths = columns.map((col, i) => {
      const dataWidth = Math.max(...rows.map((row) => this.stripAnsi(row[i] ?? '').length), 0);
      const colWidth = col.width ?? 0;
      return Math.max(colWidth, col.header.length, dataWidth);
    });

    const lines: string[] = [];

    const headerRow = columns.map((col, i) => this.pad(col.header, widths[i] ?? 0, col.align ?? 'left'));
    lines.push(this.color(headerRow.join('  '), 'cyan'));

    lines.push(widths.map((w) => '-'.repeat(w)).join('  '));

    for (const row of rows) {
      const formattedRow = row.map((cell, i) => {
        const width = widths[i] ?? 0;
        const align = columns[i]?.align ?? 'left';
        return this.pad(cell, width, align);
      });
      lines.push(formattedRow.join('  ').trimEnd());
    }

    return lines.join('\n');
  }

  private pad(text: string, width: number, align: 'left' | 'right' | 'center'): string {
    const stripped = this.stripAnsi(text);
    const padding = width - stripped.length;

    if (padding <= 0) {
      return text;
    }

    switch (align) {
      case 'right':
        return ' '.repeat(padding) + text;
      case 'center': {
        const left = Math.floor(padding / 2);
        const right = padding - left;
        return ' '.repeat(left) + text + ' '.repeat(right);
      }
      default:
        return text + ' '.repeat(padding);
    }
  }

  private truncate(text: string, maxLength: number): string {
    if (text.length <= maxLength) {
      return text;
    }
    return '...' + text.slice(text.length - maxLength + 3);
  }

  private stripAnsi(text: string): string {
    return text.replace(/\x1b\[[0-9;]*m/g, '');
  }

  private color(text: string, color: 'red' | 'green' | 'cyan'): string {
    if (!this.useColors) {
      return text;
    }
    const codes: Record<'red' | 'green' | 'cyan', string> = {
      red: '\x1b[31m',
      green: '\x1b[32m',
      cyan: '\x1b[36m'
    };
    return `${codes[color]}${text}\x1b[0m`;
  }
}
