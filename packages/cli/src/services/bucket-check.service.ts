/**
 * Bucket name validity and availability checks
 *
 * Names are validated locally; valid names are then probed with an
 * unscoped `gcloud storage buckets describe`. Anything other than a clear
 * "not found" counts as taken.
 */

import { storage, type GcloudResult, type GcloudRunner } from '../gcp';
import { validateBucketName } from '../naming/bucket-names';
import type { Reporter } from '../reporter';

export type Availability = 'available' | 'taken';

export interface BucketNameCheck {
  name: string;
  valid: boolean;
  errors: string[];
  availability?: Availability;
}

export interface BucketCheckSummary {
  results: BucketNameCheck[];
  valid: number;
  invalid: number;
  available: number;
  taken: number;
}

export interface BucketCheckOptions {
  /** Hide the per-name VALID lines */
  quiet?: boolean;
}

const RULE = '='.repeat(60);

const PERMISSION_DENIED = /does not have permission|Permission.*denied|\b403\b/;
const NOT_FOUND = /NOT_FOUND|does not exist|\b404\b/;

/**
 * Interpret the outcome of describing a bucket we may not own
 */
export function classifyProbe(result: GcloudResult): { availability: Availability; reason: string } {
  if (result.exitCode === 0) {
    return { availability: 'taken', reason: 'Bucket exists and is accessible' };
  }
  if (PERMISSION_DENIED.test(result.stderr)) {
    return { availability: 'taken', reason: 'Bucket exists (permission denied)' };
  }
  if (NOT_FOUND.test(result.stderr)) {
    return { availability: 'available', reason: 'Bucket not found' };
  }
  return {
    availability: 'taken',
    reason: `Unknown error, assuming taken: ${result.stderr.trim()}`,
  };
}

export async function checkBucketNames(
  ctx: { gcloud: GcloudRunner; reporter: Reporter },
  names: string[],
  options: BucketCheckOptions = {}
): Promise<BucketCheckSummary> {
  const { reporter, gcloud } = ctx;
  const summary: BucketCheckSummary = { results: [], valid: 0, invalid: 0, available: 0, taken: 0 };

  reporter.line();
  reporter.line(RULE);
  reporter.line(`VALIDATING ${names.length} BUCKET NAME(S)`);
  reporter.line(RULE);
  reporter.line();

  for (const name of names) {
    const validation = validateBucketName(name);
    const check: BucketNameCheck = { name, valid: validation.valid, errors: validation.errors };
    summary.results.push(check);

    if (!validation.valid) {
      for (const error of validation.errors) {
        reporter.verbose(`  - ${error}`);
      }
      reporter.mark('fail', 'INVALID', `${name} - ${validation.errors[0]}`);
      summary.invalid++;
      continue;
    }

    if (!options.quiet) {
      reporter.mark('ok', 'VALID', `${name} (meets GCS naming requirements)`);
    }
    summary.valid++;

    const probe = classifyProbe(await storage.probeBucket(gcloud, name));
    reporter.verbose(`  ${probe.reason}`);
    check.availability = probe.availability;

    if (probe.availability === 'available') {
      reporter.mark('ok', 'AVAILABLE', name);
      summary.available++;
    } else {
      reporter.mark('warn', 'TAKEN', name);
      summary.taken++;
    }
  }

  printSummary(reporter, summary);
  return summary;
}

function printSummary(reporter: Reporter, summary: BucketCheckSummary): void {
  reporter.line();
  reporter.line(RULE);
  reporter.line(`SUMMARY: ${summary.valid} valid, ${summary.invalid} invalid`);
  reporter.line(`AVAILABILITY: ${summary.available} available, ${summary.taken} taken`);

  if (summary.invalid === 0) {
    reporter.line(
      summary.taken === 0
        ? 'All bucket names are valid and available! Ready to use in GCS.'
        : 'Some bucket names are already taken. Choose different names.'
    );
  } else {
    reporter.line('Some bucket names need correction. See details above.');
  }
  reporter.line(RULE);
}

/**
 * 0 when every name is valid and available, otherwise 1
 */
export function bucketCheckExitCode(summary: BucketCheckSummary): number {
  return summary.invalid > 0 || summary.taken > 0 ? 1 : 0;
}
