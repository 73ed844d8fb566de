/**
 * Error types shared by every gcpkit command.
 *
 * Each error carries the process exit code the command should end with.
 */

import type { GcloudResult } from './gcp/gcloud';

export class CliError extends Error {
  readonly exitCode: number;
  readonly hint?: string;

  constructor(message: string, options: { exitCode?: number; hint?: string } = {}) {
    super(message);
    this.name = 'CliError';
    this.exitCode = options.exitCode ?? 1;
    this.hint = options.hint;
  }
}

/** Bad flag or argument value */
export class ValidationError extends CliError {
  constructor(message: string, hint?: string) {
    super(message, { hint });
    this.name = 'ValidationError';
  }
}

/** gcloud missing, not authenticated, input file missing, ... */
export class PrerequisiteError extends CliError {
  constructor(message: string, options: { exitCode?: number; hint?: string } = {}) {
    super(message, options);
    this.name = 'PrerequisiteError';
  }
}

export class GcloudError extends CliError {
  readonly args: string[];
  readonly result: GcloudResult;

  constructor(context: string, args: string[], result: GcloudResult, hint?: string) {
    const detail = firstMeaningfulLine(result.stderr);
    super(detail ? `${context}: ${detail}` : `${context} (gcloud exited with ${result.exitCode})`, {
      hint,
    });
    this.name = 'GcloudError';
    this.args = args;
    this.result = result;
  }
}

/** The user declined a confirmation prompt */
export class OperationCancelled extends CliError {
  constructor() {
    super('Operation cancelled', { exitCode: 0 });
    this.name = 'OperationCancelled';
  }
}

/**
 * First stderr line that says something, without gcloud's "ERROR: (gcloud.x)" prefix
 */
export function firstMeaningfulLine(output: string): string {
  const line = output
    .split('\n')
    .map((l) => l.trim())
    .find((l) => l.length > 0);

  return line ? line.replace(/^ERROR:\s*(\([^)]*\)\s*)?/, '') : '';
}
