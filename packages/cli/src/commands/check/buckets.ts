/**
 * gcpkit check buckets
 *
 * Validate bucket names against the Cloud Storage naming rules and check
 * whether each valid name is still free.
 */

import { Command } from 'commander';
import { CliError } from '../../errors';
import { bucketCheckExitCode, checkBucketNames } from '../../services/bucket-check.service';
import type { OperationContext } from '../../services/context';
import { readNameList } from '../../services/wordlist';
import { createContext, ensureReady, runAction } from '../shared';

/** Exit code for missing gcloud, credentials or input */
export const PREREQUISITE_EXIT_CODE = 2;

export interface CheckBucketsFlags {
  file?: string;
  project?: string;
  quiet?: boolean;
  verbose?: boolean;
}

/**
 * Run the check for names from arguments and/or a file; resolves to the exit code
 */
export async function runBucketCheck(
  ctx: OperationContext,
  args: string[],
  flags: CheckBucketsFlags
): Promise<number> {
  const names = [...args];

  if (flags.file) {
    ctx.reporter.info(`Reading bucket names from ${flags.file}...`);
    names.push(...(await readNameList(flags.file, PREREQUISITE_EXIT_CODE)));
  }
  if (names.length === 0) {
    throw new CliError('No bucket names provided', {
      exitCode: PREREQUISITE_EXIT_CODE,
      hint: 'Pass names as arguments or use -f <file>.',
    });
  }

  await ensureReady(ctx, PREREQUISITE_EXIT_CODE);
  if (flags.project) {
    ctx.reporter.info(`Project ID: ${flags.project}`);
  }

  const summary = await checkBucketNames(ctx, names, { quiet: flags.quiet });
  return bucketCheckExitCode(summary);
}

export const bucketsCommand = new Command('buckets')
  .description('Check bucket names for validity and availability')
  .argument('[names...]', 'Bucket names to check')
  .option('-f, --file <file>', 'Read bucket names from a file (one per line)')
  .option('-p, --project <id>', 'GCP project ID (informational)')
  .option('-q, --quiet', 'Only show problems and the summary')
  .option('-v, --verbose', 'Show every failed rule and probe result')
  .action(
    runAction('check buckets', (args: string[], flags: CheckBucketsFlags) =>
      runBucketCheck(createContext(flags), args, flags)
    )
  );
