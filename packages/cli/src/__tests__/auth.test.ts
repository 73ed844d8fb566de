import { describe, it, expect } from 'vitest';
import { PrerequisiteError } from '../errors';
import { ensureGcloudReady, getConfiguredAccount } from '../gcp/auth';
import { FakeGcloud, readyGcloud } from './helpers';

describe('ensureGcloudReady', () => {
  it('returns the active account', async () => {
    expect(await ensureGcloudReady(readyGcloud('ops@example.com'))).toBe('ops@example.com');
  });

  it('fails with the requested exit code when gcloud is missing', async () => {
    const gcloud = new FakeGcloud().on('--version', { exitCode: 127 });

    const check = ensureGcloudReady(gcloud, { exitCode: 2 });

    await expect(check).rejects.toBeInstanceOf(PrerequisiteError);
    await expect(check).rejects.toMatchObject({
      message: 'gcloud CLI is not installed. Please install it first.',
      exitCode: 2,
    });
    expect(gcloud.commands()).toEqual(['--version']);
  });

  it('fails when nobody is logged in', async () => {
    const gcloud = readyGcloud().on('auth list', { stdout: '' });

    await expect(ensureGcloudReady(gcloud, { exitCode: 2 })).rejects.toMatchObject({
      message: 'Not authenticated with gcloud.',
      exitCode: 2,
    });
  });

  it('defaults to exit code 1', async () => {
    await expect(ensureGcloudReady(new FakeGcloud().fail('--version'))).rejects.toMatchObject({ exitCode: 1 });
  });
});

describe('getConfiguredAccount', () => {
  it('treats "(unset)" as no account', async () => {
    const gcloud = new FakeGcloud().on('config get-value account', { stdout: '(unset)\n' });

    expect(await getConfiguredAccount(gcloud)).toBeNull();
  });
});
