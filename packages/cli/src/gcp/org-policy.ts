/**
 * GCP Organization Policy utilities
 *
 * Project-level overrides that relax organization constraints for sandbox
 * projects, and detection of the iam.allowedPolicyMemberDomains restriction
 * that blocks granting anything to allUsers.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { runOrThrow, succeeds, type GcloudRunner } from './gcloud';

export const MEMBER_DOMAIN_CONSTRAINT = 'iam.allowedPolicyMemberDomains';

/**
 * List constraints set to `allValues: ALLOW` on sandbox projects
 */
export const RELAXED_LIST_CONSTRAINTS = [
  'compute.trustedImageProjects',
  'compute.vmExternalIpAccess',
  'compute.restrictSharedVpcSubnetworks',
  'compute.restrictSharedVpcHostProjects',
  'compute.restrictVpcPeering',
  'compute.vmCanIpForward',
  MEMBER_DOMAIN_CONSTRAINT,
];

/**
 * Boolean constraints whose enforcement is switched off on sandbox projects
 */
export const RELAXED_BOOLEAN_CONSTRAINTS = [
  'compute.requireShieldedVm',
  'compute.requireOsLogin',
  'iam.disableServiceAccountKeyCreation',
  'iam.disableServiceAccountCreation',
];

export interface RelaxResult {
  listPolicies: string[];
  disabled: string[];
  notDisabled: string[];
}

export function allowAllPolicyYaml(constraint: string): string {
  return `constraint: constraints/${constraint}\nlistPolicy:\n  allValues: ALLOW\n`;
}

/**
 * Whether gcloud output shows a failure caused by the member-domain restriction
 */
export function isMemberDomainRestriction(output: string): boolean {
  return output.includes(MEMBER_DOMAIN_CONSTRAINT) || output.includes('one or more users named in the policy do not belong to a permitted customer');
}

/**
 * Apply the relaxed list and boolean policies to a project.
 *
 * A list policy that cannot be set aborts; a boolean constraint that cannot
 * be disabled is reported in `notDisabled`.
 */
export async function applyRelaxedOrgPolicies(
  gcloud: GcloudRunner,
  projectId: string,
  onLog?: (message: string) => void
): Promise<RelaxResult> {
  const result: RelaxResult = { listPolicies: [], disabled: [], notDisabled: [] };
  const workDir = await fs.mkdtemp(path.join(tmpdir(), 'gcpkit-policy-'));

  try {
    for (const constraint of RELAXED_LIST_CONSTRAINTS) {
      const policyFile = path.join(workDir, `${constraint}.yaml`);
      await fs.writeFile(policyFile, allowAllPolicyYaml(constraint));

      onLog?.(`Allowing all values for ${constraint}`);
      await runOrThrow(
        gcloud,
        ['resource-manager', 'org-policies', 'set-policy', policyFile, `--project=${projectId}`, '--quiet'],
        `Failed to set org policy ${constraint}`
      );
      result.listPolicies.push(constraint);
    }
  } finally {
    await fs.rm(workDir, { recursive: true, force: true });
  }

  for (const constraint of RELAXED_BOOLEAN_CONSTRAINTS) {
    onLog?.(`Disabling enforcement of ${constraint}`);
    const ok = await succeeds(gcloud, [
      'resource-manager',
      'org-policies',
      'disable-enforce',
      constraint,
      `--project=${projectId}`,
      '--quiet',
    ]);
    (ok ? result.disabled : result.notDisabled).push(constraint);
  }

  return result;
}
