import { describe, it, expect } from 'vitest';
import { validateBucketName } from '../naming/bucket-names';

describe('validateBucketName', () => {
  it('accepts a plain name', () => {
    expect(validateBucketName('my-site-123')).toEqual({ valid: true, errors: [] });
  });

  it('accepts dots and underscores inside the name', () => {
    expect(validateBucketName('www.example_site.com').valid).toBe(true);
  });

  it('rejects names that are too short or too long', () => {
    expect(validateBucketName('ab').errors).toEqual(['Length must be 3-63 characters (got 2)']);
    expect(validateBucketName('a'.repeat(64)).errors).toEqual([
      'Length must be 3-63 characters (got 64)',
    ]);
  });

  it('rejects uppercase letters', () => {
    expect(validateBucketName('My-Bucket').errors).toEqual([
      'Must contain only lowercase letters, numbers, hyphens, underscores, and dots',
      'Must start with a letter or number',
    ]);
  });

  it('rejects a trailing hyphen', () => {
    expect(validateBucketName('bucket-').errors).toEqual([
      'Must contain only lowercase letters, numbers, hyphens, underscores, and dots',
      'Must end with a letter or number',
    ]);
  });

  it('rejects reserved google prefixes', () => {
    expect(validateBucketName('google-site').errors).toEqual([
      "Cannot start with 'goog'",
      "Cannot contain 'google'",
    ]);
    expect(validateBucketName('my-google-site').errors).toEqual(["Cannot contain 'google'"]);
  });

  it('rejects IPv4-looking names', () => {
    expect(validateBucketName('192.168.1.1').errors).toEqual(['Cannot be formatted as IP address']);
  });

  it('rejects consecutive dots or hyphens', () => {
    expect(validateBucketName('my..bucket').errors).toEqual(['Cannot contain consecutive dots or hyphens']);
    expect(validateBucketName('my--bucket').errors).toEqual(['Cannot contain consecutive dots or hyphens']);
  });
});
