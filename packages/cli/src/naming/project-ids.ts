/**
 * GCP project ID rules
 */

export function normalizeProjectId(id: string): string {
  return id.trim().toLowerCase();
}

/**
 * Reason an ID is rejected, or null when it is acceptable.
 * IDs are 6-30 lowercase letters, digits and hyphens, start with a letter
 * and do not end with a hyphen.
 */
export function projectIdProblem(id: string): string | null {
  if (id.length < 6 || id.length > 30) {
    return `must be 6-30 characters (got ${id.length})`;
  }
  if (!/^[a-z]/.test(id)) {
    return 'must start with a lowercase letter';
  }
  if (!/^[-a-z0-9]+$/.test(id)) {
    return 'may only contain lowercase letters, digits and hyphens';
  }
  if (id.endsWith('-')) {
    return 'must end with a letter or digit';
  }
  return null;
}

export function withTimestampSuffix(id: string, epochSeconds: number): string {
  return `${id}-${epochSeconds}`;
}

export function isValidProjectId(id: string): boolean {
  return projectIdProblem(id) === null;
}
