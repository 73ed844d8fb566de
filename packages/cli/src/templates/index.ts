/**
 * Helper scripts written next to a newly created project
 */

import * as fs from 'fs/promises';
import * as path from 'path';

export const SET_PROJECT_SCRIPT = 'setproj.sh';
export const OWNER_SETUP_SCRIPT = 'owner-setup.sh';

const SCRIPT_MODE = 0o755;

export interface HelperScriptOptions {
  projectId: string;
  displayName: string;
}

/**
 * Quote a value for a POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function consoleUrl(projectId: string): string {
  return `https://console.cloud.google.com/?project=${projectId}`;
}

/**
 * setproj.sh: source it to point the shell and gcloud at the project
 */
export function renderSetProjectScript({ projectId, displayName }: HelperScriptOptions): string {
  return `#!/bin/bash
# Switch the shell and gcloud to project ${projectId}
# Usage: source ${SET_PROJECT_SCRIPT}
export PROJECT_ID=${shellQuote(projectId)}
export GOOGLE_CLOUD_PROJECT="$PROJECT_ID"
export CLOUDSDK_CORE_PROJECT="$PROJECT_ID"
export GCLOUD_PROJECT="$PROJECT_ID"

gcloud config set project "$PROJECT_ID" >/dev/null 2>&1 || true
echo "Switched to project: $PROJECT_ID"
echo ${shellQuote(`   ${displayName}`)}
echo "   ${consoleUrl('$PROJECT_ID')}"
`;
}

/**
 * owner-setup.sh: run once by the project owner to fix the ADC quota project
 */
export function renderOwnerSetupScript({ projectId }: HelperScriptOptions): string {
  return `#!/bin/bash
# Run once as the owner of ${projectId}.
# Points Application Default Credentials at this project for quota and
# billing, so client libraries and Terraform stop failing with 403s.
set -euo pipefail

echo "Setting ADC quota project to: ${projectId}"
gcloud auth application-default set-quota-project ${shellQuote(projectId)} >/dev/null

echo
echo "Done. Application Default Credentials now bill to ${projectId}."
echo "Tip: run 'source ${SET_PROJECT_SCRIPT}' to switch to the project."
`;
}

/**
 * Write both scripts (mode 0755) and return their paths
 */
export async function writeHelperScripts(outputDir: string, options: HelperScriptOptions): Promise<string[]> {
  await fs.mkdir(outputDir, { recursive: true });

  const scripts: Array<[string, string]> = [
    [SET_PROJECT_SCRIPT, renderSetProjectScript(options)],
    [OWNER_SETUP_SCRIPT, renderOwnerSetupScript(options)],
  ];

  const written: string[] = [];
  for (const [filename, content] of scripts) {
    const scriptPath = path.join(outputDir, filename);
    await fs.writeFile(scriptPath, content, { mode: SCRIPT_MODE });
    // writeFile keeps the mode of an existing file
    await fs.chmod(scriptPath, SCRIPT_MODE);
    written.push(scriptPath);
  }
  return written;
}
