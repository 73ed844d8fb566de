/**
 * Cloud Storage operations (gcloud storage ...)
 */

import { outputLines, runOrThrow, succeeds, type GcloudResult, type GcloudRunner } from './gcloud';

export const STORAGE_CLASSES = ['standard', 'nearline', 'coldline', 'archive'] as const;
export type StorageClass = (typeof STORAGE_CLASSES)[number];

export const PUBLIC_MEMBER = 'allUsers';
export const PUBLIC_READ_ROLE = 'roles/storage.objectViewer';

export interface BucketRef {
  projectId: string;
  bucket: string;
}

export interface CreateBucketOptions extends BucketRef {
  location: string;
  storageClass: StorageClass;
}

export function bucketUrl(bucket: string): string {
  return `gs://${bucket}`;
}

export function publicObjectUrl(bucket: string, objectPath: string): string {
  return `https://storage.googleapis.com/${bucket}/${objectPath}`;
}

function projectFlag(projectId: string): string {
  return `--project=${projectId}`;
}

export async function bucketExists(gcloud: GcloudRunner, ref: BucketRef): Promise<boolean> {
  return succeeds(gcloud, [
    'storage',
    'buckets',
    'describe',
    bucketUrl(ref.bucket),
    projectFlag(ref.projectId),
  ]);
}

/**
 * Describe a bucket without naming a project; used to probe global availability
 */
export async function probeBucket(gcloud: GcloudRunner, bucket: string): Promise<GcloudResult> {
  return gcloud.run(['storage', 'buckets', 'describe', bucketUrl(bucket)]);
}

export async function createBucket(gcloud: GcloudRunner, options: CreateBucketOptions): Promise<void> {
  await runOrThrow(
    gcloud,
    [
      'storage',
      'buckets',
      'create',
      bucketUrl(options.bucket),
      projectFlag(options.projectId),
      `--location=${options.location}`,
      `--default-storage-class=${options.storageClass}`,
      '--public-access-prevention',
      '--uniform-bucket-level-access',
    ],
    `Failed to create bucket ${bucketUrl(options.bucket)}`
  );
}

/**
 * Copy local files or directories into the bucket root, recursively
 */
export async function uploadEntries(
  gcloud: GcloudRunner,
  ref: BucketRef,
  localPaths: string[]
): Promise<void> {
  await runOrThrow(
    gcloud,
    ['storage', 'cp', '-r', ...localPaths, `${bucketUrl(ref.bucket)}/`, projectFlag(ref.projectId)],
    `Failed to upload files to ${bucketUrl(ref.bucket)}`
  );
}

export async function updateWebsite(
  gcloud: GcloudRunner,
  ref: BucketRef,
  pages: { indexPage: string; errorPage: string }
): Promise<void> {
  await runOrThrow(
    gcloud,
    [
      'storage',
      'buckets',
      'update',
      bucketUrl(ref.bucket),
      `--web-main-page-suffix=${pages.indexPage}`,
      `--web-error-page=${pages.errorPage}`,
      projectFlag(ref.projectId),
    ],
    'Failed to update website configuration'
  );
}

export async function removePublicAccessPrevention(gcloud: GcloudRunner, ref: BucketRef): Promise<void> {
  await runOrThrow(
    gcloud,
    [
      'storage',
      'buckets',
      'update',
      bucketUrl(ref.bucket),
      '--no-public-access-prevention',
      projectFlag(ref.projectId),
    ],
    'Failed to remove public access prevention'
  );
}

export async function grantPublicRead(gcloud: GcloudRunner, ref: BucketRef): Promise<void> {
  await runOrThrow(
    gcloud,
    [
      'storage',
      'buckets',
      'add-iam-policy-binding',
      bucketUrl(ref.bucket),
      `--member=${PUBLIC_MEMBER}`,
      `--role=${PUBLIC_READ_ROLE}`,
      projectFlag(ref.projectId),
    ],
    'Failed to grant public read access'
  );
}

export async function describeBucket(gcloud: GcloudRunner, ref: BucketRef): Promise<string> {
  return runOrThrow(
    gcloud,
    [
      'storage',
      'buckets',
      'describe',
      bucketUrl(ref.bucket),
      projectFlag(ref.projectId),
      '--format=yaml(name,location,storageClass,timeCreated,updated,website)',
    ],
    `Failed to describe ${bucketUrl(ref.bucket)}`
  );
}

/**
 * Roles granted to allUsers on the bucket. Null when the policy cannot be read.
 */
export async function publicRoles(gcloud: GcloudRunner, ref: BucketRef): Promise<string[] | null> {
  const result = await gcloud.run([
    'storage',
    'buckets',
    'get-iam-policy',
    bucketUrl(ref.bucket),
    projectFlag(ref.projectId),
    '--flatten=bindings[].members',
    `--filter=bindings.members:${PUBLIC_MEMBER}`,
    '--format=value(bindings.role)',
  ]);
  if (result.exitCode !== 0) return null;
  return outputLines(result.stdout);
}

/**
 * List objects. Recursive listings use the `/**` wildcard and omit the
 * "prefix:" header lines gcloud prints for each folder.
 */
export async function listObjects(
  gcloud: GcloudRunner,
  ref: BucketRef,
  options: { recursive: boolean }
): Promise<string[]> {
  const args = options.recursive
    ? ['storage', 'ls', '-r', `${bucketUrl(ref.bucket)}/**`, projectFlag(ref.projectId)]
    : ['storage', 'ls', bucketUrl(ref.bucket), projectFlag(ref.projectId)];

  const result = await gcloud.run(args);
  if (result.exitCode !== 0) return [];

  const lines = outputLines(result.stdout);
  return options.recursive ? lines.filter((line) => !line.endsWith(':')) : lines;
}

export async function pathExists(gcloud: GcloudRunner, ref: BucketRef, objectPath: string): Promise<boolean> {
  return succeeds(gcloud, ['storage', 'ls', `${bucketUrl(ref.bucket)}/${objectPath}`, projectFlag(ref.projectId)]);
}

/**
 * Remove one object, or everything under a folder path ending in "/"
 */
export async function removePath(gcloud: GcloudRunner, ref: BucketRef, objectPath: string): Promise<void> {
  const target = `${bucketUrl(ref.bucket)}/${objectPath}`;
  const args = objectPath.endsWith('/')
    ? ['storage', 'rm', '-r', `${target}**`, projectFlag(ref.projectId)]
    : ['storage', 'rm', target, projectFlag(ref.projectId)];

  await runOrThrow(gcloud, args, `Failed to remove ${target}`);
}

export async function deleteBucket(gcloud: GcloudRunner, ref: BucketRef): Promise<void> {
  await runOrThrow(
    gcloud,
    ['storage', 'rm', '-r', bucketUrl(ref.bucket), projectFlag(ref.projectId)],
    `Failed to delete ${bucketUrl(ref.bucket)}`
  );
}
