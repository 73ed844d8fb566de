/**
 * GCP API enablement utilities
 */

import { succeeds, type GcloudRunner } from './gcloud';

/**
 * APIs every newly created project gets
 */
export const PROJECT_BOOTSTRAP_APIS = [
  'cloudresourcemanager.googleapis.com',
  'iam.googleapis.com',
  'serviceusage.googleapis.com',
  'cloudbilling.googleapis.com',
];

/**
 * Get human-readable name for an API
 */
export function getApiDisplayName(api: string): string {
  const names: Record<string, string> = {
    'cloudresourcemanager.googleapis.com': 'Cloud Resource Manager API',
    'iam.googleapis.com': 'Identity and Access Management API',
    'serviceusage.googleapis.com': 'Service Usage API',
    'cloudbilling.googleapis.com': 'Cloud Billing API',
    'compute.googleapis.com': 'Compute Engine API',
    'storage.googleapis.com': 'Cloud Storage API',
  };
  return names[api] || api.replace('.googleapis.com', '');
}

/**
 * Enable a single API
 */
export async function enableApi(gcloud: GcloudRunner, projectId: string, api: string): Promise<boolean> {
  return succeeds(gcloud, ['services', 'enable', api, `--project=${projectId}`, '--quiet']);
}

/**
 * Enable multiple APIs, one call each
 */
export async function enableApis(
  gcloud: GcloudRunner,
  projectId: string,
  apis: string[],
  onProgress?: (api: string, success: boolean) => void
): Promise<{ enabled: string[]; failed: string[] }> {
  const enabled: string[] = [];
  const failed: string[] = [];

  for (const api of apis) {
    const success = await enableApi(gcloud, projectId, api);
    if (success) {
      enabled.push(api);
    } else {
      failed.push(api);
    }
    onProgress?.(api, success);
  }

  return { enabled, failed };
}
