/**
 * Flags shared by the `gcpkit site` subcommands
 */

import { Command } from 'commander';
import { resolveSiteSettings, type GcpkitConfig } from '../../config';
import type { WebsiteTarget } from '../../services/website.service';
import { requireBucket, requireProject, type CommonFlags } from '../shared';

export interface SiteFlags extends CommonFlags {
  source?: string;
  index?: string;
  error?: string;
  location?: string;
  class?: string;
  recursive?: boolean;
  path?: string;
  skipPublic?: boolean;
}

export function siteSubcommand(name: string, description: string): Command {
  return new Command(name)
    .description(description)
    .option('-p, --project <id>', 'GCP project ID')
    .option('-b, --bucket <name>', 'Bucket name')
    .option('-s, --source <dir>', 'Local directory to upload')
    .option('-i, --index <page>', 'Index page (default: index.html)')
    .option('-e, --error <page>', 'Error page (default: 404.html)')
    .option('-l, --location <location>', 'Bucket location (default: us)')
    .option('-c, --class <class>', 'Storage class: standard, nearline, coldline, archive')
    .option('-f, --force', 'Skip confirmation prompts')
    .option('-d, --dry-run', 'Show what would be done without doing it')
    .option('-v, --verbose', 'Show each step in detail');
}

export function websiteTarget(flags: SiteFlags, config: GcpkitConfig): WebsiteTarget {
  const projectId = requireProject(flags, config);
  const bucket = requireBucket(flags);
  const settings = resolveSiteSettings(
    { location: flags.location, storageClass: flags.class, index: flags.index, error: flags.error },
    config
  );
  return { projectId, bucket, ...settings };
}
