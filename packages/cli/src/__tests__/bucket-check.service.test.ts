import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { PrerequisiteError } from '../errors';
import { bucketCheckExitCode, checkBucketNames, classifyProbe } from '../services/bucket-check.service';
import { parseNameList, readNameList } from '../services/wordlist';
import { FakeGcloud, cleanupTempDir, createTempDir, testContext } from './helpers';

function probes(): FakeGcloud {
  return new FakeGcloud()
    .fail(
      'storage buckets describe gs://my-free-site',
      'ERROR: (gcloud.storage.buckets.describe) NotFoundError: 404 gs://my-free-site not found'
    )
    .fail(
      'storage buckets describe gs://locked-site',
      'ERROR: (gcloud.storage.buckets.describe) HTTPError 403: dev@example.com does not have storage.buckets.get access'
    );
}

describe('classifyProbe', () => {
  it('treats anything but a clear not-found as taken', () => {
    expect(classifyProbe({ exitCode: 0, stdout: '', stderr: '' }).availability).toBe('taken');
    expect(classifyProbe({ exitCode: 1, stdout: '', stderr: 'bucket does not exist' }).availability).toBe(
      'available'
    );
    expect(classifyProbe({ exitCode: 1, stdout: '', stderr: 'network unreachable\n' })).toEqual({
      availability: 'taken',
      reason: 'Unknown error, assuming taken: network unreachable',
    });
  });
});

describe('checkBucketNames', () => {
  it('validates, probes valid names and summarizes', async () => {
    const ctx = testContext(probes());

    const summary = await checkBucketNames(ctx, ['ab', 'my-free-site', 'taken-site', 'locked-site']);

    expect(ctx.reporter.texts('mark')).toEqual([
      '✗ INVALID ab - Length must be 3-63 characters (got 2)',
      '✓ VALID my-free-site (meets GCS naming requirements)',
      '✓ AVAILABLE my-free-site',
      '✓ VALID taken-site (meets GCS naming requirements)',
      '⚠ TAKEN taken-site',
      '✓ VALID locked-site (meets GCS naming requirements)',
      '⚠ TAKEN locked-site',
    ]);
    expect(ctx.gcloud.commands()).toEqual([
      'storage buckets describe gs://my-free-site',
      'storage buckets describe gs://taken-site',
      'storage buckets describe gs://locked-site',
    ]);

    const lines = ctx.reporter.texts('line');
    expect(lines).toContain('VALIDATING 4 BUCKET NAME(S)');
    expect(lines).toContain('SUMMARY: 3 valid, 1 invalid');
    expect(lines).toContain('AVAILABILITY: 1 available, 2 taken');
    expect(lines).toContain('Some bucket names need correction. See details above.');
    expect(bucketCheckExitCode(summary)).toBe(1);
  });

  it('exits 0 when every name is valid and free', async () => {
    const ctx = testContext(probes());

    const summary = await checkBucketNames(ctx, ['my-free-site'], { quiet: true });

    expect(ctx.reporter.texts('mark')).toEqual(['✓ AVAILABLE my-free-site']);
    expect(ctx.reporter.texts('line')).toContain('All bucket names are valid and available! Ready to use in GCS.');
    expect(bucketCheckExitCode(summary)).toBe(0);
  });

  it('exits 1 for a single name that is too short', async () => {
    const ctx = testContext(probes());

    const summary = await checkBucketNames(ctx, ['ab']);

    expect(summary.invalid).toBe(1);
    expect(ctx.gcloud.calls).toEqual([]);
    expect(bucketCheckExitCode(summary)).toBe(1);
  });
});

describe('name lists', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('skips blank lines and comments', () => {
    expect(parseNameList('# candidates\nalpha-site\n\n  beta-site  \r\n   # later\n')).toEqual([
      'alpha-site',
      'beta-site',
    ]);
  });

  it('reads a file', async () => {
    const file = path.join(tempDir, 'names.txt');
    await fs.writeFile(file, 'alpha-site\nbeta-site\n');
    expect(await readNameList(file, 2)).toEqual(['alpha-site', 'beta-site']);
  });

  it('fails with the given exit code for a missing file', async () => {
    const file = path.join(tempDir, 'missing.txt');
    const error = await readNameList(file, 2).then(
      () => null,
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(PrerequisiteError);
    expect(error).toMatchObject({ message: `File not found: ${file}`, exitCode: 2 });
  });
});
