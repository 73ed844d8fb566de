import { describe, it, expect } from 'vitest';
import { CliError, GcloudError, OperationCancelled, firstMeaningfulLine } from '../errors';
import { MISSING_BINARY_EXIT_CODE, createGcloudRunner, outputLines, runOrThrow } from '../gcp';
import { FakeGcloud } from './helpers';

describe('firstMeaningfulLine', () => {
  it('strips the gcloud error prefix', () => {
    expect(
      firstMeaningfulLine('\nERROR: (gcloud.storage.buckets.create) HTTPError 409: bucket taken\nmore\n')
    ).toBe('HTTPError 409: bucket taken');
  });

  it('returns an empty string for empty output', () => {
    expect(firstMeaningfulLine('  \n')).toBe('');
  });
});

describe('GcloudError', () => {
  it('uses the first stderr line as detail', () => {
    const error = new GcloudError('Failed to create bucket gs://b', ['storage'], {
      exitCode: 1,
      stdout: '',
      stderr: 'ERROR: (gcloud.storage) quota exceeded\n',
    });

    expect(error.message).toBe('Failed to create bucket gs://b: quota exceeded');
    expect(error.exitCode).toBe(1);
    expect(error).toBeInstanceOf(CliError);
  });

  it('falls back to the exit code when stderr is empty', () => {
    const error = new GcloudError('Failed', [], { exitCode: 2, stdout: '', stderr: '' });
    expect(error.message).toBe('Failed (gcloud exited with 2)');
  });
});

describe('OperationCancelled', () => {
  it('exits cleanly', () => {
    const error = new OperationCancelled();
    expect(error.message).toBe('Operation cancelled');
    expect(error.exitCode).toBe(0);
  });
});

describe('gcloud runner', () => {
  it('reports a missing binary as exit code 127', async () => {
    const runner = createGcloudRunner('gcpkit-test-no-such-binary');
    const result = await runner.run(['--version']);
    expect(result.exitCode).toBe(MISSING_BINARY_EXIT_CODE);
  });

  it('runOrThrow returns stdout on success and throws GcloudError otherwise', async () => {
    const gcloud = new FakeGcloud()
      .on('config get-value', { stdout: 'my-project\n' })
      .fail('projects list', 'ERROR: (gcloud.projects.list) denied');

    await expect(runOrThrow(gcloud, ['config', 'get-value', 'project'], 'read')).resolves.toBe('my-project\n');
    await expect(runOrThrow(gcloud, ['projects', 'list'], 'List projects')).rejects.toThrow(
      'List projects: denied'
    );
  });

  it('splits output into trimmed non-empty lines', () => {
    expect(outputLines('  a \n\n b\n')).toEqual(['a', 'b']);
  });
});
