/**
 * gcpkit CLI Commands
 *
 * Commands are organized into groups:
 * - site/     - Static website hosting in a bucket
 * - lb/       - HTTPS load balancer in front of a website bucket
 * - check/    - Bucket name and project ID availability
 * - project/  - Project creation and bootstrap
 */

export { siteCommand } from './site';
export { lbCommand } from './lb';
export { checkCommand } from './check';
export { projectCommand } from './project';
export { logsCommand } from './logs';
