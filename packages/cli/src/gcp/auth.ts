/**
 * gcloud installation and authentication checks
 */

import { PrerequisiteError } from '../errors';
import { outputLines, succeeds, type GcloudRunner } from './gcloud';

const INSTALL_URL = 'https://cloud.google.com/sdk/docs/install';

/**
 * Check if gcloud CLI is installed
 */
export async function isGcloudInstalled(gcloud: GcloudRunner): Promise<boolean> {
  return succeeds(gcloud, ['--version']);
}

/**
 * Account of the active gcloud credential, or null when nobody is logged in
 */
export async function getActiveAccount(gcloud: GcloudRunner): Promise<string | null> {
  const result = await gcloud.run([
    'auth',
    'list',
    '--filter=status:ACTIVE',
    '--format=value(account)',
  ]);
  if (result.exitCode !== 0) return null;

  return outputLines(result.stdout)[0] ?? null;
}

/**
 * Account set in the gcloud configuration (`core/account`)
 */
export async function getConfiguredAccount(gcloud: GcloudRunner): Promise<string | null> {
  const result = await gcloud.run(['config', 'get-value', 'account']);
  const account = result.stdout.trim();

  if (result.exitCode !== 0 || !account || account === '(unset)') {
    return null;
  }
  return account;
}

/**
 * Fail unless gcloud is installed and has an active account.
 * Returns the active account.
 */
export async function ensureGcloudReady(
  gcloud: GcloudRunner,
  options: { exitCode?: number } = {}
): Promise<string> {
  const exitCode = options.exitCode ?? 1;

  if (!(await isGcloudInstalled(gcloud))) {
    throw new PrerequisiteError('gcloud CLI is not installed. Please install it first.', {
      exitCode,
      hint: `Visit: ${INSTALL_URL}`,
    });
  }

  const account = await getActiveAccount(gcloud);
  if (!account) {
    throw new PrerequisiteError('Not authenticated with gcloud.', {
      exitCode,
      hint: "Run 'gcloud auth login' first.",
    });
  }

  return account;
}
