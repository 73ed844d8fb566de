/**
 * Static website hosting in a Cloud Storage bucket
 *
 * Each operation mirrors one `gcpkit site` subcommand. Dry-run stops before
 * the first call that would change anything.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { CliError, GcloudError, ValidationError } from '../errors';
import { storage, isMemberDomainRestriction, MEMBER_DOMAIN_CONSTRAINT } from '../gcp';
import type { SiteSettings } from '../config';
import { confirmDestructive, type OperationContext } from './context';

export interface WebsiteTarget extends storage.BucketRef, SiteSettings {}

const DRY_RUN_FILE_PREVIEW = 10;
const STATUS_SAMPLE_SIZE = 10;

async function requireBucket(ctx: OperationContext, target: WebsiteTarget): Promise<void> {
  if (!(await storage.bucketExists(ctx.gcloud, target))) {
    throw new CliError(`Bucket ${storage.bucketUrl(target.bucket)} does not exist`);
  }
}

/**
 * Every regular file under a directory, sorted by name at each level
 */
export async function walkFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walkFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Create the bucket (skipped with a warning if it already exists)
 */
export async function createWebsiteBucket(ctx: OperationContext, target: WebsiteTarget): Promise<void> {
  const { reporter } = ctx;
  reporter.info(`Creating bucket: ${storage.bucketUrl(target.bucket)}`);

  if (ctx.dryRun) {
    reporter.info('[DRY RUN] Would create bucket with:');
    reporter.info(`  Location: ${target.location}`);
    reporter.info(`  Storage class: ${target.storageClass}`);
    return;
  }

  if (await storage.bucketExists(ctx.gcloud, target)) {
    reporter.warn(`Bucket ${storage.bucketUrl(target.bucket)} already exists`);
    return;
  }

  await storage.createBucket(ctx.gcloud, target);
  reporter.success('Bucket created successfully');
}

/**
 * Upload every file under sourceDir, keeping the directory structure
 */
export async function uploadWebsite(
  ctx: OperationContext,
  target: WebsiteTarget,
  sourceDir: string | undefined
): Promise<void> {
  const { reporter } = ctx;

  if (!sourceDir) {
    throw new ValidationError('Source directory is required for upload. Use -s or --source option.');
  }
  if (!(await isDirectory(sourceDir))) {
    throw new ValidationError(`Source directory does not exist: ${sourceDir}`);
  }

  reporter.info(`Uploading files from ${sourceDir} to ${storage.bucketUrl(target.bucket)}`);

  if (ctx.dryRun) {
    const files = await walkFiles(sourceDir);
    reporter.info(`[DRY RUN] Would upload files from: ${sourceDir}`);
    reporter.info('[DRY RUN] Files to upload:');
    for (const file of files.slice(0, DRY_RUN_FILE_PREVIEW)) {
      reporter.line(file);
    }
    if (files.length > DRY_RUN_FILE_PREVIEW) {
      reporter.info(`[DRY RUN] ... and ${files.length - DRY_RUN_FILE_PREVIEW} more files`);
    }
    return;
  }

  await requireBucket(ctx, target);

  const entries = (await fs.readdir(sourceDir)).sort().map((name) => path.join(sourceDir, name));
  if (entries.length === 0) {
    throw new ValidationError(`Source directory is empty: ${sourceDir}`);
  }

  await storage.uploadEntries(ctx.gcloud, target, entries);
  reporter.success('Files uploaded successfully');
}

/**
 * Set the index and error pages
 */
export async function configureWebsite(ctx: OperationContext, target: WebsiteTarget): Promise<void> {
  const { reporter } = ctx;
  reporter.info('Configuring website settings...');
  reporter.info(`  Index page: ${target.indexPage}`);
  reporter.info(`  Error page: ${target.errorPage}`);

  if (ctx.dryRun) {
    reporter.info(
      `[DRY RUN] Would configure website with index: ${target.indexPage}, error: ${target.errorPage}`
    );
    return;
  }

  await requireBucket(ctx, target);
  await storage.updateWebsite(ctx.gcloud, target, target);
  reporter.success('Website configuration updated');
}

/**
 * Lift public access prevention and grant allUsers read access
 */
export async function makeWebsitePublic(ctx: OperationContext, target: WebsiteTarget): Promise<void> {
  const { reporter } = ctx;
  reporter.info('Making bucket publicly accessible...');

  if (ctx.dryRun) {
    reporter.info('[DRY RUN] Would grant allUsers the Storage Object Viewer role');
    return;
  }

  await requireBucket(ctx, target);

  reporter.verbose('Removing public access prevention...');
  await storage.removePublicAccessPrevention(ctx.gcloud, target);

  reporter.verbose('Granting public access...');
  try {
    await storage.grantPublicRead(ctx.gcloud, target);
  } catch (error) {
    if (error instanceof GcloudError && isMemberDomainRestriction(error.result.stderr)) {
      throw new CliError(error.message, {
        hint: `The organization policy ${MEMBER_DOMAIN_CONSTRAINT} does not allow allUsers. Ask an organization admin to override it for project ${target.projectId}.`,
      });
    }
    throw error;
  }

  reporter.success('Bucket is now publicly accessible');
  reporter.warn('All objects in this bucket are now publicly readable');
}

export interface SetupOptions {
  sourceDir?: string;
  skipPublic: boolean;
}

/**
 * create → upload → configure → make-public
 */
export async function setupWebsite(
  ctx: OperationContext,
  target: WebsiteTarget,
  options: SetupOptions
): Promise<void> {
  const { reporter } = ctx;
  reporter.info('Starting complete website setup...');

  await createWebsiteBucket(ctx, target);

  if (options.sourceDir) {
    await uploadWebsite(ctx, target, options.sourceDir);
  } else {
    reporter.warn('No source directory specified, skipping file upload');
  }

  await configureWebsite(ctx, target);

  if (!options.skipPublic) {
    await makeWebsitePublic(ctx, target);
  } else {
    reporter.info('Skipping public access configuration (--skip-public flag)');
  }

  reporter.success('Website setup complete!');
  reporter.line();
  reporter.info('Your website should be accessible at:');
  reporter.info(storage.publicObjectUrl(target.bucket, target.indexPage));
  reporter.line();
  reporter.warn("Note: For HTTPS with a custom domain, you'll need to set up a load balancer.");
  reporter.info('Run: gcpkit lb setup --domain <domain> -p <project> -b <bucket>');
}

/**
 * Print bucket details, public roles, object count and the website URL
 */
export async function showWebsiteStatus(ctx: OperationContext, target: WebsiteTarget): Promise<void> {
  const { reporter, gcloud } = ctx;
  reporter.info(`Fetching bucket information for ${storage.bucketUrl(target.bucket)}`);

  await requireBucket(ctx, target);

  reporter.line();
  reporter.line('=== Bucket Details ===');
  reporter.line((await storage.describeBucket(gcloud, target)).trimEnd());

  reporter.line();
  reporter.line('=== IAM Policy (Public Access) ===');
  const roles = await storage.publicRoles(gcloud, target);
  if (!roles || roles.length === 0) {
    reporter.line('No public access configured');
  } else {
    for (const role of roles) {
      reporter.line(role);
    }
  }

  reporter.line();
  reporter.line('=== Object Count ===');
  const topLevel = await storage.listObjects(gcloud, target, { recursive: false });
  reporter.line(`Total objects: ${topLevel.length}`);

  if (topLevel.length > 0) {
    reporter.line();
    reporter.line(`=== Sample Objects (first ${STATUS_SAMPLE_SIZE}) ===`);
    const sample = await storage.listObjects(gcloud, target, { recursive: true });
    for (const object of sample.slice(0, STATUS_SAMPLE_SIZE)) {
      reporter.line(object);
    }
  }

  reporter.line();
  reporter.line('=== Website URL ===');
  reporter.line(storage.publicObjectUrl(target.bucket, target.indexPage));
}

/**
 * List top-level entries (or every object) and return the total object count
 */
export async function listWebsiteFiles(
  ctx: OperationContext,
  target: WebsiteTarget,
  options: { recursive: boolean }
): Promise<number> {
  const { reporter, gcloud } = ctx;
  reporter.info(`Listing files in ${storage.bucketUrl(target.bucket)}`);

  await requireBucket(ctx, target);
  reporter.line();

  reporter.info(
    options.recursive ? 'Listing all files recursively...' : 'Listing top-level files and folders...'
  );
  const entries = await storage.listObjects(gcloud, target, options);
  for (const entry of entries) {
    reporter.line(entry);
  }

  reporter.line();
  const total = options.recursive
    ? entries.length
    : (await storage.listObjects(gcloud, target, { recursive: true })).length;
  reporter.info(`Total objects: ${total}`);
  return total;
}

/**
 * Remove a file, or a folder when the path ends with "/"
 */
export async function removeWebsitePath(
  ctx: OperationContext,
  target: WebsiteTarget,
  objectPath: string | undefined
): Promise<void> {
  const { reporter } = ctx;

  if (!objectPath) {
    throw new ValidationError('Path is required for remove action. Use --path option.');
  }

  const fullPath = `${storage.bucketUrl(target.bucket)}/${objectPath}`;
  await requireBucket(ctx, target);

  const isFolder = objectPath.endsWith('/');
  reporter.info(`${isFolder ? 'Removing folder' : 'Removing file'}: ${fullPath}`);

  await confirmDestructive(ctx, 'This will permanently delete the specified content.');

  if (ctx.dryRun) {
    reporter.info(`[DRY RUN] Would remove: ${fullPath}`);
    return;
  }

  if (!(await storage.pathExists(ctx.gcloud, target, objectPath))) {
    throw new CliError(`Path does not exist: ${fullPath}`);
  }

  await storage.removePath(ctx.gcloud, target, objectPath);
  reporter.success(isFolder ? 'Folder removed successfully' : 'File removed successfully');
}

/**
 * Delete the bucket and everything in it
 */
export async function deleteWebsiteBucket(ctx: OperationContext, target: WebsiteTarget): Promise<void> {
  const { reporter } = ctx;
  const url = storage.bucketUrl(target.bucket);

  await confirmDestructive(ctx, `This will delete the bucket ${url} and all its contents.`);

  reporter.info(`Deleting bucket ${url}`);

  if (ctx.dryRun) {
    reporter.info('[DRY RUN] Would delete bucket and all contents');
    return;
  }

  if (!(await storage.bucketExists(ctx.gcloud, target))) {
    reporter.warn(`Bucket ${url} does not exist`);
    return;
  }

  await storage.deleteBucket(ctx.gcloud, target);
  reporter.success('Bucket deleted successfully');
}
