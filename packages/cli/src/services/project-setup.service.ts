/**
 * Project bootstrap: create one or more projects, link billing, make the
 * caller owner, enable the core APIs and hand over two helper scripts.
 */

import * as path from 'path';
import { BILLING_ACCOUNT_PATTERN } from '../config';
import { CliError, PrerequisiteError, ValidationError } from '../errors';
import {
  PROJECT_BOOTSTRAP_APIS,
  applyRelaxedOrgPolicies,
  createProject,
  enableApis,
  findOpenBillingAccount,
  getActiveAccount,
  getApiDisplayName,
  getConfiguredAccount,
  grantProjectRole,
  hasOrganizationAccess,
  linkBillingAccount,
  setActiveProject,
  setQuotaProject,
  type RelaxResult,
} from '../gcp';
import { normalizeProjectId, projectIdProblem, withTimestampSuffix } from '../naming/project-ids';
import {
  OWNER_SETUP_SCRIPT,
  SET_PROJECT_SCRIPT,
  consoleUrl,
  writeHelperScripts,
} from '../templates';
import type { OperationContext } from './context';

export const OWNER_ROLE = 'roles/owner';
export const SERVICE_USAGE_CONSUMER_ROLE = 'roles/serviceusage.serviceUsageConsumer';

export interface ProjectSetupOptions {
  projectIds: string[];
  /** Display name for every project; defaults to the project ID */
  displayName?: string;
  billingAccount?: string;
  /** Relax organization policies for a sandbox project */
  free: boolean;
  /** Append the current epoch seconds to every ID */
  timestamp: boolean;
  /** Switch gcloud and the ADC quota project to the last project created */
  activate: boolean;
  labels: Record<string, string>;
  /** Helper scripts go here, or into `<outputDir>/<project-id>/` for several projects */
  outputDir: string;
  /** Epoch seconds; injectable for tests */
  now?: () => number;
}

export interface ProjectSetupResult {
  projectId: string;
  displayName: string;
  billingAccount: string;
  owner: string;
  roles: string[];
  apis: { enabled: string[]; failed: string[] };
  policies: RelaxResult | null;
  scripts: string[];
}

const LABEL_PART = /^[a-z][a-z0-9_-]{0,62}$/;
const LABEL_VALUE = /^[a-z0-9_-]{0,63}$/;

/**
 * Parse repeated `--label key=value` flags
 */
export function parseLabels(values: string[]): Record<string, string> {
  const labels: Record<string, string> = {};

  for (const value of values) {
    const separator = value.indexOf('=');
    const key = separator === -1 ? value : value.slice(0, separator);
    const labelValue = separator === -1 ? '' : value.slice(separator + 1);

    if (!LABEL_PART.test(key) || !LABEL_VALUE.test(labelValue)) {
      throw new ValidationError(
        `Invalid label: ${value}`,
        'Labels are key=value with lowercase letters, digits, "_" and "-"; keys start with a letter.'
      );
    }
    labels[key] = labelValue;
  }
  return labels;
}

/**
 * IAM member for an account: service accounts keep their own prefix
 */
export function ownerMember(account: string): string {
  return account.endsWith('.gserviceaccount.com') ? `serviceAccount:${account}` : `user:${account}`;
}

/**
 * Final project IDs after normalising and the optional timestamp suffix.
 * All IDs of one run share the same timestamp.
 */
export function resolveProjectIds(
  options: Pick<ProjectSetupOptions, 'projectIds' | 'timestamp' | 'now'>
): string[] {
  const ids = options.projectIds.map(normalizeProjectId);
  if (!options.timestamp) return ids;

  const now = options.now ?? (() => Math.floor(Date.now() / 1000));
  const epochSeconds = now();
  return ids.map((id) => withTimestampSuffix(id, epochSeconds));
}

async function resolveBillingAccount(ctx: OperationContext, given: string | undefined): Promise<string> {
  if (given) {
    if (!BILLING_ACCOUNT_PATTERN.test(given)) {
      throw new ValidationError(
        `Invalid billing account ID: ${given}`,
        'Billing account IDs look like XXXXXX-XXXXXX-XXXXXX'
      );
    }
    ctx.reporter.info(`Using provided billing account: ${given}`);
    return given;
  }

  const found = await findOpenBillingAccount(ctx.gcloud);
  if (!found) {
    throw new PrerequisiteError('No open billing accounts found.', {
      hint: 'Pass --billing-account or ask a billing admin for roles/billing.user.',
    });
  }
  ctx.reporter.info(`Auto-selected billing account: ${found}`);
  return found;
}

/**
 * Create and bootstrap each project in turn. Returns null on a dry run.
 * The first failing step aborts the run.
 */
export async function setupProjects(
  ctx: OperationContext,
  options: ProjectSetupOptions
): Promise<ProjectSetupResult[] | null> {
  const { reporter, gcloud } = ctx;

  if (options.projectIds.length === 0) {
    throw new ValidationError('At least one project ID is required.');
  }

  reporter.info('Checking organization access...');
  if (!(await hasOrganizationAccess(gcloud))) {
    throw new PrerequisiteError('You do not have access to any GCP organization.', {
      hint: 'Required role: roles/resourcemanager.projectCreator at organization level. Ask an organization admin, or log in with an account that has it.',
    });
  }

  const projectIds = resolveProjectIds(options);
  for (const projectId of projectIds) {
    const problem = projectIdProblem(projectId);
    if (problem) {
      throw new ValidationError(`Invalid project ID "${projectId}": ${problem}`);
    }
  }
  if (options.timestamp) {
    reporter.info(`Timestamp suffix applied: ${projectIds.join(', ')}`);
  }

  const billingAccount = await resolveBillingAccount(ctx, options.billingAccount);

  const account = (await getConfiguredAccount(gcloud)) ?? (await getActiveAccount(gcloud));
  if (!account) {
    throw new PrerequisiteError('No gcloud account is configured.', {
      hint: "Run 'gcloud auth login' first.",
    });
  }
  const owner = ownerMember(account);
  const roles = options.free ? [OWNER_ROLE, SERVICE_USAGE_CONSUMER_ROLE] : [OWNER_ROLE];

  if (ctx.dryRun) {
    for (const projectId of projectIds) {
      const displayName = options.displayName ?? projectId;
      reporter.info(`[DRY RUN] Would create project ${projectId} ("${displayName}")`);
    }
    reporter.info(`[DRY RUN] Would link billing account ${billingAccount}`);
    reporter.info(`[DRY RUN] Would grant ${roles.join(', ')} to ${owner}`);
    reporter.info(`[DRY RUN] Would enable: ${PROJECT_BOOTSTRAP_APIS.join(', ')}`);
    if (options.free) {
      reporter.info('[DRY RUN] Would relax organization policies for a sandbox project');
    }
    return null;
  }

  const results: ProjectSetupResult[] = [];
  for (const projectId of projectIds) {
    const outputDir = projectIds.length > 1 ? path.join(options.outputDir, projectId) : options.outputDir;
    const displayName = options.displayName ?? projectId;

    results.push(
      await bootstrapProject(ctx, options, { projectId, displayName, billingAccount, owner, roles, outputDir })
    );
  }

  if (results.length > 1) {
    reporter.line();
    reporter.success(`All ${results.length} projects created: ${projectIds.join(', ')}`);
  }
  return results;
}

interface ProjectPlan {
  projectId: string;
  displayName: string;
  billingAccount: string;
  owner: string;
  roles: string[];
  outputDir: string;
}

async function bootstrapProject(
  ctx: OperationContext,
  options: ProjectSetupOptions,
  plan: ProjectPlan
): Promise<ProjectSetupResult> {
  const { reporter, gcloud } = ctx;
  const { projectId, displayName, billingAccount, owner, roles } = plan;

  reporter.info(`Creating project: ${projectId}`);
  await createProject(gcloud, { projectId, displayName, labels: options.labels });

  reporter.info('Linking billing account...');
  await linkBillingAccount(gcloud, projectId, billingAccount);

  for (const role of roles) {
    reporter.info(`Granting ${role} to ${owner}...`);
    await grantProjectRole(gcloud, projectId, owner, role);
  }

  reporter.info('Enabling essential APIs...');
  const apis = await enableApis(gcloud, projectId, PROJECT_BOOTSTRAP_APIS, (api, success) => {
    if (success) {
      reporter.verbose(`Enabled ${getApiDisplayName(api)}`);
    } else {
      reporter.warn(`Could not enable ${getApiDisplayName(api)}`);
    }
  });
  if (apis.failed.length > 0) {
    throw new CliError(
      `Could not enable ${apis.failed.map(getApiDisplayName).join(', ')} on ${projectId}.`,
      {
        hint: `The project exists with billing linked. Retry with: gcloud services enable ${apis.failed.join(' ')} --project=${projectId}`,
      }
    );
  }

  let policies: RelaxResult | null = null;
  if (options.free) {
    reporter.info('Applying relaxed organization policies...');
    policies = await applyRelaxedOrgPolicies(gcloud, projectId, (message) => reporter.verbose(message));
    for (const constraint of policies.notDisabled) {
      reporter.warn(`Could not disable ${constraint} (may not be enforced)`);
    }
  }

  if (options.activate) {
    if (!(await setActiveProject(gcloud, projectId))) {
      reporter.warn(`Could not set ${projectId} as the active gcloud project`);
    }
    if (!(await setQuotaProject(gcloud, projectId))) {
      reporter.warn('Could not set the ADC quota project; run owner-setup.sh later');
    }
  }

  const scripts = await writeHelperScripts(plan.outputDir, { projectId, displayName });

  printNextSteps(ctx, projectId, displayName, options.free);

  return { projectId, displayName, billingAccount, owner, roles, apis, policies, scripts };
}

function printNextSteps(ctx: OperationContext, projectId: string, displayName: string, free: boolean): void {
  const { reporter } = ctx;
  const rule = '='.repeat(50);

  reporter.line();
  reporter.line(rule);
  reporter.line('   PROJECT CREATED SUCCESSFULLY!');
  reporter.line(rule);
  reporter.line(`   Project ID      : ${projectId}`);
  reporter.line(`   Display Name    : ${displayName}`);
  reporter.line(`   Console URL     : ${consoleUrl(projectId)}`);
  if (free) {
    reporter.line('   Org policies    : relaxed (--free)');
  }
  reporter.line();
  reporter.line(rule);
  reporter.line('   NEXT STEPS FOR THE NEW OWNER');
  reporter.line(rule);
  reporter.line(`   1. Send them ${SET_PROJECT_SCRIPT} and ${OWNER_SETUP_SCRIPT}`);
  reporter.line(`   2. They run once: ./${OWNER_SETUP_SCRIPT}`);
  reporter.line(`   3. Then, to work on the project: source ${SET_PROJECT_SCRIPT}`);
  reporter.line();
  reporter.line(`   Run ${OWNER_SETUP_SCRIPT} on the owner's workstation, not as the`);
  reporter.line('   organization administrator.');
  reporter.line(rule);
}
