/**
 * GCP project management utilities
 */

import { CliError } from '../errors';
import { outputLines, runOrThrow, succeeds, type GcloudRunner } from './gcloud';

export interface CreateProjectOptions {
  projectId: string;
  displayName: string;
  labels?: Record<string, string>;
}

export type ProjectLookup =
  | { status: 'taken' }
  | { status: 'available' }
  | { status: 'error'; detail: string };

/**
 * Whether the active account can see at least one organization
 */
export async function hasOrganizationAccess(gcloud: GcloudRunner): Promise<boolean> {
  const result = await gcloud.run(['organizations', 'list', '--format=value(name)']);
  return result.exitCode === 0;
}

/**
 * First open billing account, as the bare ID (XXXXXX-XXXXXX-XXXXXX)
 */
export async function findOpenBillingAccount(gcloud: GcloudRunner): Promise<string | null> {
  const result = await gcloud.run([
    'beta',
    'billing',
    'accounts',
    'list',
    '--filter=open=true',
    '--format=value(name)',
    '--limit=1',
  ]);
  if (result.exitCode !== 0) return null;

  const first = outputLines(result.stdout)[0];
  return first ? first.replace('billingAccounts/', '') : null;
}

/**
 * Turn `gcloud projects create` output into a readable error message
 */
export function parseCreateProjectError(output: string): string {
  if (output.includes('already exists') || output.includes('ALREADY_EXISTS')) {
    return 'Project ID already exists. Choose a different ID.';
  }
  if (output.includes('PERMISSION_DENIED')) {
    return 'Permission denied. You may need to be in an organization with project creation rights.';
  }
  if (output.includes('Request contains an invalid argument')) {
    const match = output.match(/details:\s*"([^"]+)"/);
    if (match) {
      return match[1];
    }
    return 'Invalid project configuration. Check the project ID format.';
  }
  if (output.includes('invalid') || output.includes('INVALID')) {
    return 'Invalid project ID. Must be 6-30 lowercase letters, digits, or hyphens.';
  }

  const cleanError = output
    .replace(/ERROR:.*?\n/g, '')
    .trim()
    .split('\n')[0];

  return cleanError || 'Failed to create project. Check gcloud configuration.';
}

/**
 * Create a new GCP project
 */
export async function createProject(gcloud: GcloudRunner, options: CreateProjectOptions): Promise<void> {
  const labels = Object.entries(options.labels ?? {})
    .map(([key, value]) => `${key}=${value}`)
    .join(',');

  const result = await gcloud.run([
    'projects',
    'create',
    options.projectId,
    `--name=${options.displayName}`,
    ...(labels ? [`--labels=${labels}`] : []),
    '--quiet',
  ]);

  if (result.exitCode !== 0) {
    throw new CliError(parseCreateProjectError(`${result.stderr}\n${result.stdout}`));
  }
}

/**
 * Link a project to a billing account
 */
export async function linkBillingAccount(
  gcloud: GcloudRunner,
  projectId: string,
  billingAccountId: string
): Promise<void> {
  await runOrThrow(
    gcloud,
    ['beta', 'billing', 'projects', 'link', projectId, `--billing-account=${billingAccountId}`, '--quiet'],
    `Failed to link billing account ${billingAccountId}`
  );
}

/**
 * Grant a role on a project to a member such as `user:alice@example.com`
 */
export async function grantProjectRole(
  gcloud: GcloudRunner,
  projectId: string,
  member: string,
  role: string
): Promise<void> {
  await runOrThrow(
    gcloud,
    ['projects', 'add-iam-policy-binding', projectId, `--member=${member}`, `--role=${role}`, '--quiet'],
    `Failed to grant ${role} to ${member}`
  );
}

/**
 * Set the active GCP project
 */
export async function setActiveProject(gcloud: GcloudRunner, projectId: string): Promise<boolean> {
  return succeeds(gcloud, ['config', 'set', 'project', projectId, '--quiet']);
}

/**
 * Point Application Default Credentials' quota project at the project
 */
export async function setQuotaProject(gcloud: GcloudRunner, projectId: string): Promise<boolean> {
  return succeeds(gcloud, ['auth', 'application-default', 'set-quota-project', projectId, '--quiet']);
}

/**
 * Whether a project ID is in use.
 *
 * gcloud answers 403 for IDs that do not exist as well as for projects the
 * caller cannot see; both 403 and 404 are reported as available.
 */
export async function lookupProject(gcloud: GcloudRunner, projectId: string): Promise<ProjectLookup> {
  const result = await gcloud.run(['projects', 'describe', projectId, '--format=value(projectId)']);

  if (result.exitCode === 0) {
    return { status: 'taken' };
  }

  const output = result.stderr;
  if (/NOT_FOUND|\b404\b|PERMISSION_DENIED|\b403\b|does not have permission/.test(output)) {
    return { status: 'available' };
  }

  return { status: 'error', detail: output.trim().split('\n')[0] || `gcloud exited with ${result.exitCode}` };
}
