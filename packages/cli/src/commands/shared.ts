/**
 * Plumbing shared by every gcpkit command: building the operation context,
 * resolving project and bucket, and turning thrown errors into exit codes.
 */

import chalk from 'chalk';
import ora from 'ora';
import { loadConfig, resolveProjectId, type GcpkitConfig } from '../config';
import { CliError, GcloudError, OperationCancelled, ValidationError } from '../errors';
import { createGcloudRunner, ensureGcloudReady, type GcloudRunner } from '../gcp';
import { getLogPath, logFullError, logInfo } from '../logger';
import { validateBucketName } from '../naming/bucket-names';
import { confirmWithPrompt } from '../prompts';
import { createConsoleReporter } from '../reporter';
import type { OperationContext } from '../services/context';

export interface CommonFlags {
  project?: string;
  bucket?: string;
  force?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

export interface CommandEnv {
  ctx: OperationContext;
  config: GcpkitConfig;
}

export function createContext(
  flags: CommonFlags & { quiet?: boolean },
  gcloud: GcloudRunner = createGcloudRunner()
): OperationContext {
  return {
    gcloud,
    reporter: createConsoleReporter({ verbose: flags.verbose, quiet: flags.quiet }),
    confirm: confirmWithPrompt,
    dryRun: flags.dryRun ?? false,
    force: flags.force ?? false,
  };
}

/**
 * Load config and build the context for a command
 */
export function prepare(flags: CommonFlags & { quiet?: boolean }): CommandEnv {
  return { ctx: createContext(flags), config: loadConfig() };
}

/**
 * Fail unless gcloud is installed and logged in; returns the account
 */
export async function ensureReady(ctx: OperationContext, exitCode = 1): Promise<string> {
  const spinner = ora('Checking gcloud...').start();
  try {
    const account = await ensureGcloudReady(ctx.gcloud, { exitCode });
    spinner.succeed(`gcloud authenticated as ${account}`);
    return account;
  } catch (error) {
    spinner.fail('gcloud is not ready');
    throw error;
  }
}

export function requireProject(flags: CommonFlags, config: GcpkitConfig): string {
  const projectId = resolveProjectId(flags.project, config);
  if (!projectId) {
    throw new ValidationError(
      'Project ID is required. Use -p or --project option.',
      'Or set GCPKIT_PROJECT, or "project" in gcpkit.config.json.'
    );
  }
  return projectId;
}

export function requireBucket(flags: CommonFlags): string {
  if (!flags.bucket) {
    throw new ValidationError('Bucket name is required. Use -b or --bucket option.');
  }

  const { valid, errors } = validateBucketName(flags.bucket);
  if (!valid) {
    throw new ValidationError(`Invalid bucket name "${flags.bucket}": ${errors.join('; ')}`);
  }
  return flags.bucket;
}

/**
 * Print an error thrown by a command and return the exit code it carries
 */
export function reportError(name: string, error: unknown): number {
  if (error instanceof OperationCancelled) {
    console.log(chalk.gray(error.message));
    return error.exitCode;
  }

  logFullError(
    name,
    error,
    error instanceof GcloudError ? { args: error.args, stderr: error.result.stderr } : undefined
  );

  const message = error instanceof Error ? error.message : String(error);
  createConsoleReporter().error(message);

  if (error instanceof CliError) {
    if (error.hint) {
      console.error(chalk.gray(`  ${error.hint}`));
    }
    return error.exitCode;
  }

  console.error(chalk.gray(`  Details in ${getLogPath()}`));
  return 1;
}

/**
 * Wrap a command handler: a returned number becomes the exit code, a thrown
 * error is reported and its exit code used
 */
export function runAction<A extends unknown[]>(
  name: string,
  handler: (...args: A) => Promise<number | void>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    logInfo(`Running ${name}`);
    try {
      const code = await handler(...args);
      process.exitCode = code ?? 0;
    } catch (error) {
      process.exitCode = reportError(name, error);
    }
  };
}
