import { describe, it, expect } from 'vitest';
import { redactMeta } from '../../../../src/shared/http/error-handler';

describe('redactMeta', () => {
  it('redacts credential-bearing keys and keeps the rest', () => {
    expect(
      redactMeta({
        password: 'correcthorse',
        passwordHash: '$2b$10$abc',
        token: 'eyJhbGciOi',
        reason: 'password_mismatch',
      }),
    ).toEqual({
      password: '[REDACTED]',
      passwordHash: '[REDACTED]',
      token: '[REDACTED]',
      reason: 'password_mismatch',
    });
  });

  it('passes through non-objects untouched', () => {
    expect(redactMeta(undefined)).toBeUndefined();
    expect(redactMeta('plain')).toBe('plain');
  });
});
