/**
 * CLI types for policy-validator.
 */

import type { PolicyValidationIssue } from '../validation/types.js';

/** Supported output formats */
export type OutputFormat = 'json' | 'table' | 'pretty';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'pretty'];

/** CLI exit codes */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  InvalidArguments: 2,
  ValidationError: 3,
  FileNotFound: 4
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Global CLI options */
export interface GlobalOptions {
  format: OutputFormat;
  quiet: boolean;
  noColor: boolean;
  config: string | undefined;
}

/** CLI configuration (from the config file) */
export interface CliConfig {
  output: {
    format: OutputFormat;
    colors: boolean;
  };
  validation: {
    maxDepth: number;
    validateActions: boolean;
  };
}

/** Default CLI configuration */
export const DEFAULT_CLI_CONFIG: CliConfig = {
  output: {
    format: 'pretty',
    colors: true
  },
  validation: {
    maxDepth: 100,
    validateActions: false
  }
};

/** Validation outcome of one policy document */
export interface PolicyReport {
  name: string | null;
  ruleCount: number;
  valid: boolean;
  errors: PolicyValidationIssue[];
}

/** Validation outcome of one file */
export interface FileReport {
  file: string;
  valid: boolean;
  policies: PolicyReport[];
  /** Set when the file could not be read, parsed or decoded. */
  loadError?: string;
}

/** Validation outcome of a whole run */
export interface ValidationSummary {
  valid: boolean;
  fileCount: number;
  policyCount: number;
  /** Issues of every policy plus one per file that failed to load */
  errorCount: number;
  files: FileReport[];
}

/** Data that can be formatted for output */
export type FormattableData =
  | { type: 'validation'; data: ValidationSummary; meta?: Record<string, unknown> }
  | { type: 'message'; data: string; meta?: Record<string, unknown> }
  | { type: 'error'; data: string; meta?: Record<string, unknown> };
