/**
 * Compute Engine load-balancer resources (gcloud compute ...)
 *
 * The six resource kinds an external HTTPS load balancer in front of a
 * bucket needs, described as data so create/describe/delete share one path.
 */

import { runOrThrow, succeeds, type GcloudRunner } from './gcloud';

export type LbResourceKind =
  | 'address'
  | 'ssl-certificate'
  | 'backend-bucket'
  | 'url-map'
  | 'target-https-proxy'
  | 'forwarding-rule';

interface ResourceKindInfo {
  group: string;
  global: boolean;
  label: string;
  statusFormat: string;
}

export const RESOURCE_KINDS: Record<LbResourceKind, ResourceKindInfo> = {
  address: {
    group: 'addresses',
    global: true,
    label: 'Static IP',
    statusFormat: 'yaml(name,address,status)',
  },
  'ssl-certificate': {
    group: 'ssl-certificates',
    global: true,
    label: 'SSL certificate',
    statusFormat: 'yaml(name,managed.status,managed.domainStatus)',
  },
  'backend-bucket': {
    group: 'backend-buckets',
    global: false,
    label: 'Backend bucket',
    statusFormat: 'yaml(name,bucketName,enableCdn)',
  },
  'url-map': {
    group: 'url-maps',
    global: true,
    label: 'URL map',
    statusFormat: 'yaml(name,defaultBackendBucket)',
  },
  'target-https-proxy': {
    group: 'target-https-proxies',
    global: true,
    label: 'Target HTTPS proxy',
    statusFormat: 'yaml(name,urlMap,sslCertificates)',
  },
  'forwarding-rule': {
    group: 'forwarding-rules',
    global: true,
    label: 'Forwarding rule',
    statusFormat: 'yaml(name,IPAddress,target,portRange)',
  },
};

export interface LbResource {
  kind: LbResourceKind;
  name: string;
  /** Flags passed to `create` in addition to name, scope and project */
  createFlags: string[];
}

function resourceArgs(kind: LbResourceKind, verb: string, name: string, projectId: string): string[] {
  const info = RESOURCE_KINDS[kind];
  return [
    'compute',
    info.group,
    verb,
    name,
    ...(info.global ? ['--global'] : []),
    `--project=${projectId}`,
  ];
}

export async function resourceExists(
  gcloud: GcloudRunner,
  projectId: string,
  kind: LbResourceKind,
  name: string
): Promise<boolean> {
  return succeeds(gcloud, resourceArgs(kind, 'describe', name, projectId));
}

export async function createResource(
  gcloud: GcloudRunner,
  projectId: string,
  resource: LbResource
): Promise<void> {
  await runOrThrow(
    gcloud,
    [...resourceArgs(resource.kind, 'create', resource.name, projectId), ...resource.createFlags],
    `Failed to create ${RESOURCE_KINDS[resource.kind].label} ${resource.name}`
  );
}

export async function deleteResource(
  gcloud: GcloudRunner,
  projectId: string,
  kind: LbResourceKind,
  name: string
): Promise<void> {
  await runOrThrow(
    gcloud,
    [...resourceArgs(kind, 'delete', name, projectId), '--quiet'],
    `Failed to delete ${RESOURCE_KINDS[kind].label} ${name}`
  );
}

/**
 * YAML summary of a resource, or null if it does not exist
 */
export async function describeResource(
  gcloud: GcloudRunner,
  projectId: string,
  kind: LbResourceKind,
  name: string
): Promise<string | null> {
  const result = await gcloud.run([
    ...resourceArgs(kind, 'describe', name, projectId),
    `--format=${RESOURCE_KINDS[kind].statusFormat}`,
  ]);
  return result.exitCode === 0 ? result.stdout.trimEnd() : null;
}

export async function getStaticAddress(
  gcloud: GcloudRunner,
  projectId: string,
  ipName: string
): Promise<string> {
  const stdout = await runOrThrow(
    gcloud,
    [...resourceArgs('address', 'describe', ipName, projectId), '--format=get(address)'],
    `Failed to read static IP ${ipName}`
  );
  return stdout.trim();
}

/**
 * Managed certificate status such as PROVISIONING or ACTIVE
 */
export async function getCertificateStatus(
  gcloud: GcloudRunner,
  projectId: string,
  certName: string
): Promise<string> {
  const stdout = await runOrThrow(
    gcloud,
    [...resourceArgs('ssl-certificate', 'describe', certName, projectId), '--format=get(managed.status)'],
    `Failed to read SSL certificate ${certName}`
  );
  return stdout.trim();
}
