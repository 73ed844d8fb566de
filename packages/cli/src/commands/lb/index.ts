/**
 * gcpkit lb
 *
 * HTTPS load balancer with a managed SSL certificate in front of a website bucket.
 */

import { Command } from 'commander';
import { resolveSiteSettings } from '../../config';
import {
  cleanLoadBalancer,
  deriveLoadBalancerNames,
  parseDomains,
  setupLoadBalancer,
  showLoadBalancerStatus,
  type LoadBalancerNames,
  type LoadBalancerTarget,
} from '../../services/load-balancer.service';
import {
  ensureReady,
  prepare,
  requireBucket,
  requireProject,
  runAction,
  type CommandEnv,
  type CommonFlags,
} from '../shared';

interface LbFlags extends CommonFlags {
  domain?: string;
  lbName?: string;
  certName?: string;
  ipName?: string;
  index?: string;
}

function lbSubcommand(name: string, description: string): Command {
  return new Command(name)
    .description(description)
    .option('-p, --project <id>', 'GCP project ID')
    .option('-b, --bucket <name>', 'Website bucket name')
    .option('--lb-name <name>', 'Load balancer (URL map) name (default: <bucket>-lb)')
    .option('--cert-name <name>', 'SSL certificate name (default: <bucket>-cert)')
    .option('--ip-name <name>', 'Static IP name (default: <bucket>-ip)')
    .option('-f, --force', 'Skip confirmation prompts')
    .option('-d, --dry-run', 'Show what would be done without doing it')
    .option('-v, --verbose', 'Show each step in detail');
}

async function withLoadBalancer(
  flags: LbFlags,
  operation: (env: CommandEnv, target: LoadBalancerTarget, names: LoadBalancerNames) => Promise<void>
): Promise<void> {
  const env = prepare(flags);
  const projectId = requireProject(flags, env.config);
  const bucket = requireBucket(flags);
  const { indexPage } = resolveSiteSettings({ index: flags.index }, env.config);
  const names = deriveLoadBalancerNames(bucket, flags);

  await ensureReady(env.ctx);
  await operation(env, { projectId, bucket, indexPage }, names);
}

const setupCommand = lbSubcommand('setup', 'Create the load balancer, certificate and static IP')
  .option('--domain <domains>', 'Comma-separated domain(s) for the certificate')
  .option('-i, --index <page>', 'Index page for the site URL (default: index.html)')
  .action(
    runAction('lb setup', async (flags: LbFlags) => {
      const domains = parseDomains(flags.domain);
      await withLoadBalancer(flags, async ({ ctx }, target, names) => {
        await setupLoadBalancer(ctx, target, names, domains);
      });
    })
  );

const statusCommand = lbSubcommand('status', 'Show load balancer and certificate status').action(
  runAction('lb status', (flags: LbFlags) =>
    withLoadBalancer(flags, async ({ ctx }, target, names) => {
      await showLoadBalancerStatus(ctx, target, names);
    })
  )
);

const cleanCommand = lbSubcommand('clean', 'Delete the load balancer, certificate and static IP').action(
  runAction('lb clean', (flags: LbFlags) =>
    withLoadBalancer(flags, async ({ ctx }, target, names) => {
      await cleanLoadBalancer(ctx, target, names);
    })
  )
);

export const lbCommand = new Command('lb')
  .description('HTTPS load balancer for a website bucket on a custom domain')
  .addCommand(setupCommand)
  .addCommand(statusCommand)
  .addCommand(cleanCommand);
