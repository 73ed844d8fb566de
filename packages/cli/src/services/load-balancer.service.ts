/**
 * HTTPS load balancer with a Google-managed certificate in front of a bucket
 *
 * Setup walks the six resources in dependency order and skips any that
 * already exist, so re-running it after a partial failure picks up where
 * the last run stopped. Nothing is rolled back.
 */

import { CliError, ValidationError } from '../errors';
import { compute, storage } from '../gcp';
import { confirmDestructive, type OperationContext } from './context';

export interface LoadBalancerNames {
  lbName: string;
  certName: string;
  ipName: string;
  backendBucket: string;
  targetProxy: string;
  forwardingRule: string;
}

export interface LoadBalancerTarget {
  projectId: string;
  bucket: string;
  indexPage: string;
}

export interface DnsRecord {
  type: 'A';
  name: 'www' | '@';
  value: string;
}

export interface LoadBalancerSetupResult {
  staticIp: string;
  created: compute.LbResourceKind[];
  skipped: compute.LbResourceKind[];
  dnsRecords: DnsRecord[];
}

export interface LoadBalancerStatus {
  found: Partial<Record<compute.LbResourceKind, boolean>>;
  certificateStatus: string | null;
}

/** Managed certificates accept at most this many domains */
export const MAX_CERT_DOMAINS = 100;

const DOMAIN_PATTERN = /^(?=.{1,253}$)([a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/i;

const SETUP_STEP_TITLES: Record<compute.LbResourceKind, string> = {
  address: 'Reserving static IP address...',
  'ssl-certificate': 'Creating SSL certificate...',
  'backend-bucket': 'Creating backend bucket...',
  'url-map': 'Creating URL map...',
  'target-https-proxy': 'Creating target HTTPS proxy...',
  'forwarding-rule': 'Creating forwarding rule...',
};

const CLEAN_STEP_TITLES: Record<compute.LbResourceKind, string> = {
  'forwarding-rule': 'Deleting forwarding rule...',
  'target-https-proxy': 'Deleting target HTTPS proxy...',
  'url-map': 'Deleting URL map...',
  'backend-bucket': 'Deleting backend bucket...',
  'ssl-certificate': 'Deleting SSL certificate...',
  address: 'Releasing static IP...',
};

const STATUS_TITLES: Record<compute.LbResourceKind, string> = {
  address: '=== Static IP Address ===',
  'ssl-certificate': '=== SSL Certificate Status ===',
  'backend-bucket': '=== Backend Bucket ===',
  'url-map': '=== Load Balancer ===',
  'target-https-proxy': '=== Target HTTPS Proxy ===',
  'forwarding-rule': '=== Forwarding Rules ===',
};

/**
 * Resource names, defaulting to ones derived from the bucket name
 */
export function deriveLoadBalancerNames(
  bucket: string,
  overrides: { lbName?: string; certName?: string; ipName?: string } = {}
): LoadBalancerNames {
  const lbName = overrides.lbName || `${bucket}-lb`;
  return {
    lbName,
    certName: overrides.certName || `${bucket}-cert`,
    ipName: overrides.ipName || `${bucket}-ip`,
    backendBucket: `${bucket}-backend`,
    targetProxy: `${lbName}-proxy`,
    forwardingRule: `${lbName}-https-rule`,
  };
}

/**
 * Split a comma-separated domain list, rejecting anything that is not a hostname
 */
export function parseDomains(value: string | undefined): string[] {
  const domains = (value ?? '')
    .split(',')
    .map((d) => d.trim().toLowerCase())
    .filter(Boolean);

  if (domains.length === 0) {
    throw new ValidationError(
      'Domain is required for load balancer setup. Use --domain option.',
      'Example: --domain www.example.com,example.com'
    );
  }
  if (domains.length > MAX_CERT_DOMAINS) {
    throw new ValidationError(`A managed certificate covers at most ${MAX_CERT_DOMAINS} domains`);
  }

  const invalid = domains.filter((d) => !DOMAIN_PATTERN.test(d));
  if (invalid.length > 0) {
    throw new ValidationError(`Invalid domain: ${invalid.join(', ')}`);
  }
  return domains;
}

/**
 * A records to point each domain at the load balancer
 */
export function dnsRecordsFor(domains: string[], staticIp: string): DnsRecord[] {
  return domains.map((domain) => ({
    type: 'A',
    name: domain.startsWith('www.') ? 'www' : '@',
    value: staticIp,
  }));
}

/**
 * The resources setup creates, in creation order
 */
export function planLoadBalancer(
  bucket: string,
  names: LoadBalancerNames,
  domains: string[]
): compute.LbResource[] {
  return [
    { kind: 'address', name: names.ipName, createFlags: ['--ip-version=IPV4'] },
    { kind: 'ssl-certificate', name: names.certName, createFlags: [`--domains=${domains.join(',')}`] },
    {
      kind: 'backend-bucket',
      name: names.backendBucket,
      createFlags: [`--gcs-bucket-name=${bucket}`, '--enable-cdn'],
    },
    {
      kind: 'url-map',
      name: names.lbName,
      createFlags: [`--default-backend-bucket=${names.backendBucket}`],
    },
    {
      kind: 'target-https-proxy',
      name: names.targetProxy,
      createFlags: [`--ssl-certificates=${names.certName}`, `--url-map=${names.lbName}`],
    },
    {
      kind: 'forwarding-rule',
      name: names.forwardingRule,
      createFlags: [`--address=${names.ipName}`, `--target-https-proxy=${names.targetProxy}`, '--ports=443'],
    },
  ];
}

/**
 * Kind and name of each resource, in the order they must be deleted
 */
export function teardownOrder(names: LoadBalancerNames): Array<{ kind: compute.LbResourceKind; name: string }> {
  return [
    { kind: 'forwarding-rule', name: names.forwardingRule },
    { kind: 'target-https-proxy', name: names.targetProxy },
    { kind: 'url-map', name: names.lbName },
    { kind: 'backend-bucket', name: names.backendBucket },
    { kind: 'ssl-certificate', name: names.certName },
    { kind: 'address', name: names.ipName },
  ];
}

function createdMessage(kind: compute.LbResourceKind, staticIp: string | null): string {
  switch (kind) {
    case 'address':
      return `Static IP reserved: ${staticIp ?? ''}`;
    case 'ssl-certificate':
      return 'SSL certificate created (provisioning may take 15-60 minutes)';
    default:
      return `${compute.RESOURCE_KINDS[kind].label} created`;
  }
}

/**
 * Attach the resources this run already created to a failure
 */
function withCreatedResources(error: unknown, created: compute.LbResourceKind[]): unknown {
  if (!(error instanceof CliError) || created.length === 0) return error;

  return new CliError(error.message, {
    hint:
      `Created before the failure: ${created.map((k) => compute.RESOURCE_KINDS[k].label).join(', ')}. ` +
      "Re-run 'gcpkit lb setup' to continue or 'gcpkit lb clean' to remove them.",
  });
}

export async function setupLoadBalancer(
  ctx: OperationContext,
  target: LoadBalancerTarget,
  names: LoadBalancerNames,
  domains: string[]
): Promise<LoadBalancerSetupResult | null> {
  const { reporter, gcloud } = ctx;

  reporter.info('Setting up HTTPS load balancer for custom domain(s)...');
  reporter.info(`  Domain(s): ${domains.join(',')}`);
  reporter.info(`  Load Balancer: ${names.lbName}`);
  reporter.info(`  SSL Certificate: ${names.certName}`);
  reporter.info(`  Static IP: ${names.ipName}`);

  if (ctx.dryRun) {
    reporter.info('[DRY RUN] Would create load balancer infrastructure');
    return null;
  }

  if (!(await storage.bucketExists(gcloud, target))) {
    throw new CliError(`Bucket ${storage.bucketUrl(target.bucket)} does not exist. Create it first.`);
  }

  const plan = planLoadBalancer(target.bucket, names, domains);
  const created: compute.LbResourceKind[] = [];
  const skipped: compute.LbResourceKind[] = [];
  let staticIp: string | null = null;

  for (const [index, resource] of plan.entries()) {
    const label = compute.RESOURCE_KINDS[resource.kind].label;
    reporter.line();
    reporter.info(`Step ${index + 1}/${plan.length}: ${SETUP_STEP_TITLES[resource.kind]}`);

    try {
      if (await compute.resourceExists(gcloud, target.projectId, resource.kind, resource.name)) {
        reporter.warn(`${label} ${resource.name} already exists`);
        skipped.push(resource.kind);
      } else {
        await compute.createResource(gcloud, target.projectId, resource);
        created.push(resource.kind);
      }

      if (resource.kind === 'address') {
        staticIp = await compute.getStaticAddress(gcloud, target.projectId, names.ipName);
      }
    } catch (error) {
      throw withCreatedResources(error, created);
    }
    if (created.includes(resource.kind)) {
      reporter.success(createdMessage(resource.kind, staticIp));
    }
  }

  const address = staticIp ?? '';
  const dnsRecords = dnsRecordsFor(domains, address);

  reporter.line();
  reporter.success('Load balancer setup complete!');
  reporter.line();
  reporter.warn('IMPORTANT: DNS Configuration Required');
  reporter.line('----------------------------------------');
  reporter.line('Add the following DNS record(s) to your domain:');
  reporter.line();
  for (const record of dnsRecords) {
    reporter.line(`  Type: ${record.type}`);
    reporter.line(`  Name: ${record.name}`);
    reporter.line(`  Value: ${record.value}`);
    reporter.line();
  }
  reporter.line('----------------------------------------');
  reporter.line();
  reporter.warn('SSL Certificate Provisioning');
  reporter.line('The SSL certificate will take 15-60 minutes to provision.');
  reporter.line("Use 'gcpkit lb status' to check the certificate status.");
  reporter.line();
  reporter.info('Once DNS is configured and certificate is active, your site will be at:');
  reporter.line(`  https://${domains[0]}/${target.indexPage}`);

  return { staticIp: address, created, skipped, dnsRecords };
}

export async function showLoadBalancerStatus(
  ctx: OperationContext,
  target: LoadBalancerTarget,
  names: LoadBalancerNames
): Promise<LoadBalancerStatus> {
  const { reporter, gcloud } = ctx;
  const status: LoadBalancerStatus = { found: {}, certificateStatus: null };

  reporter.info('Fetching load balancer information...');

  const resources = [...teardownOrder(names)].reverse();
  for (const { kind, name } of resources) {
    reporter.line();
    reporter.line(STATUS_TITLES[kind]);

    const description = await compute.describeResource(gcloud, target.projectId, kind, name);
    status.found[kind] = description !== null;

    if (description === null) {
      reporter.line(`${compute.RESOURCE_KINDS[kind].label} not found: ${name}`);
      continue;
    }
    reporter.line(description);

    if (kind === 'ssl-certificate') {
      const certStatus = await compute.getCertificateStatus(gcloud, target.projectId, name);
      status.certificateStatus = certStatus;

      reporter.line();
      if (certStatus === 'ACTIVE') {
        reporter.success('SSL certificate is ACTIVE and ready to use');
      } else {
        reporter.warn(`SSL certificate status: ${certStatus}`);
        reporter.info('Provisioning typically takes 15-60 minutes after DNS configuration');
      }
    }
  }

  return status;
}

/**
 * Delete every load-balancer resource, dependents first. Missing ones are skipped.
 */
export async function cleanLoadBalancer(
  ctx: OperationContext,
  target: LoadBalancerTarget,
  names: LoadBalancerNames
): Promise<compute.LbResourceKind[]> {
  const { reporter, gcloud } = ctx;
  const order = teardownOrder(names);

  await confirmDestructive(ctx, 'This will delete the load balancer, SSL certificate, and static IP.', [
    'The following resources will be deleted:',
    ...order.map(({ kind, name }) => `  - ${compute.RESOURCE_KINDS[kind].label}: ${name}`),
  ]);

  reporter.info('Deleting load balancer infrastructure...');

  if (ctx.dryRun) {
    reporter.info('[DRY RUN] Would delete load balancer components');
    return [];
  }

  const deleted: compute.LbResourceKind[] = [];
  for (const [index, { kind, name }] of order.entries()) {
    const label = compute.RESOURCE_KINDS[kind].label;
    reporter.line();
    reporter.info(`Step ${index + 1}/${order.length}: ${CLEAN_STEP_TITLES[kind]}`);

    if (!(await compute.resourceExists(gcloud, target.projectId, kind, name))) {
      reporter.warn(`${label} not found: ${name}`);
      continue;
    }

    await compute.deleteResource(gcloud, target.projectId, kind, name);
    deleted.push(kind);
    reporter.success(kind === 'address' ? 'Static IP released' : `${label} deleted`);
  }

  reporter.line();
  reporter.success('Load balancer infrastructure deleted successfully');
  return deleted;
}
