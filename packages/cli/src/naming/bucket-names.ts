/**
 * Cloud Storage bucket naming rules
 *
 * Checked locally, before any availability probe.
 */

const NAME_PATTERN = /^[a-z0-9][a-z0-9._-]*[a-z0-9]$/;
const IPV4_PATTERN = /^[0-9]+\.[0-9]+\.[0-9]+\.[0-9]+$/;

export const MIN_BUCKET_NAME_LENGTH = 3;
export const MAX_BUCKET_NAME_LENGTH = 63;

export interface BucketNameValidation {
  valid: boolean;
  /** Every rule the name breaks, in rule order */
  errors: string[];
}

export function validateBucketName(name: string): BucketNameValidation {
  const errors: string[] = [];

  if (name.length < MIN_BUCKET_NAME_LENGTH || name.length > MAX_BUCKET_NAME_LENGTH) {
    errors.push(`Length must be 3-63 characters (got ${name.length})`);
  }

  if (!NAME_PATTERN.test(name)) {
    errors.push('Must contain only lowercase letters, numbers, hyphens, underscores, and dots');
  }

  if (!/^[a-z0-9]/.test(name)) {
    errors.push('Must start with a letter or number');
  }

  if (!/[a-z0-9]$/.test(name)) {
    errors.push('Must end with a letter or number');
  }

  if (name.startsWith('goog')) {
    errors.push("Cannot start with 'goog'");
  }

  if (name.includes('google')) {
    errors.push("Cannot contain 'google'");
  }

  if (IPV4_PATTERN.test(name)) {
    errors.push('Cannot be formatted as IP address');
  }

  if (name.includes('..') || name.includes('--')) {
    errors.push('Cannot contain consecutive dots or hyphens');
  }

  return { valid: errors.length === 0, errors };
}
