/**
 * GCP utilities for the gcpkit CLI
 */

export {
  createGcloudRunner,
  runOrThrow,
  succeeds,
  outputLines,
  MISSING_BINARY_EXIT_CODE,
  type GcloudRunner,
  type GcloudResult,
} from './gcloud';

export { isGcloudInstalled, getActiveAccount, getConfiguredAccount, ensureGcloudReady } from './auth';

export * as storage from './storage';
export * as compute from './compute';

export {
  hasOrganizationAccess,
  findOpenBillingAccount,
  createProject,
  parseCreateProjectError,
  linkBillingAccount,
  grantProjectRole,
  setActiveProject,
  setQuotaProject,
  lookupProject,
  type CreateProjectOptions,
  type ProjectLookup,
} from './projects';

export { PROJECT_BOOTSTRAP_APIS, enableApi, enableApis, getApiDisplayName } from './apis';

export {
  applyRelaxedOrgPolicies,
  isMemberDomainRestriction,
  allowAllPolicyYaml,
  MEMBER_DOMAIN_CONSTRAINT,
  type RelaxResult,
} from './org-policy';
