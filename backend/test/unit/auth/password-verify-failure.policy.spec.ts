import { describe, it, expect } from 'vitest';
import { classifyPasswordVerifyFailure } from '../../../src/modules/auth/policies/password-verify-failure.policy';
import { MalformedPasswordHashError } from '../../../src/shared/security/password-hasher';

describe('classifyPasswordVerifyFailure', () => {
  it('treats a malformed stored hash as a denial reason', () => {
    expect(classifyPasswordVerifyFailure(new MalformedPasswordHashError())).toBe(
      'malformed_password_hash',
    );
  });

  it('treats anything else as a hashing failure', () => {
    expect(classifyPasswordVerifyFailure(new Error('native binding crashed'))).toBe('hash_failed');
    expect(classifyPasswordVerifyFailure('boom')).toBe('hash_failed');
  });
});
