import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import {
  RELAXED_BOOLEAN_CONSTRAINTS,
  RELAXED_LIST_CONSTRAINTS,
  allowAllPolicyYaml,
  applyRelaxedOrgPolicies,
  isMemberDomainRestriction,
} from '../gcp/org-policy';
import { FakeGcloud } from './helpers';

describe('org policies', () => {
  it('renders an allow-all list policy', () => {
    expect(allowAllPolicyYaml('compute.vmExternalIpAccess')).toBe(
      'constraint: constraints/compute.vmExternalIpAccess\nlistPolicy:\n  allValues: ALLOW\n'
    );
  });

  it('detects the member-domain restriction', () => {
    expect(isMemberDomainRestriction('violates constraints/iam.allowedPolicyMemberDomains')).toBe(true);
    expect(isMemberDomainRestriction('quota exceeded')).toBe(false);
  });

  it('writes one temporary policy file per list constraint and removes them', async () => {
    const files: string[] = [];
    const contents: string[] = [];
    const gcloud = new FakeGcloud().on('resource-manager org-policies set-policy', (args) => {
      files.push(args[3]);
      contents.push(fs.readFileSync(args[3], 'utf-8'));
      return {};
    });

    const result = await applyRelaxedOrgPolicies(gcloud, 'sandbox-project');

    expect(result.listPolicies).toEqual(RELAXED_LIST_CONSTRAINTS);
    expect(result.disabled).toEqual(RELAXED_BOOLEAN_CONSTRAINTS);
    expect(contents[0]).toBe(allowAllPolicyYaml('compute.trustedImageProjects'));
    expect(files.filter((file) => fs.existsSync(file))).toEqual([]);
    expect(gcloud.commandsMatching('resource-manager org-policies disable-enforce')[0]).toBe(
      'resource-manager org-policies disable-enforce compute.requireShieldedVm --project=sandbox-project --quiet'
    );
  });

  it('stops at the first list policy that cannot be set and still cleans up', async () => {
    const files: string[] = [];
    const gcloud = new FakeGcloud().on('resource-manager org-policies set-policy', (args) => {
      files.push(args[3]);
      return files.length === 2 ? { exitCode: 1, stderr: 'ERROR: (gcloud.resource-manager) denied' } : {};
    });

    await expect(applyRelaxedOrgPolicies(gcloud, 'sandbox-project')).rejects.toThrow(
      'Failed to set org policy compute.vmExternalIpAccess: denied'
    );
    expect(files).toHaveLength(2);
    expect(files.filter((file) => fs.existsSync(file))).toEqual([]);
    expect(gcloud.commandsMatching('resource-manager org-policies disable-enforce')).toEqual([]);
  });
});
