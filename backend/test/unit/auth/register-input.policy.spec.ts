import { describe, it, expect } from 'vitest';
import { getRegisterInputFailure } from '../../../src/modules/auth/policies/register-input.policy';

describe('getRegisterInputFailure', () => {
  it('fails on an empty username', () => {
    const res = getRegisterInputFailure({ username: '', password: 'correcthorse' });
    expect(res?.reason).toBe('empty_username');
    expect(res?.error.code).toBe('VALIDATION_ERROR');
  });

  it('fails on an empty password', () => {
    const res = getRegisterInputFailure({ username: 'alice', password: '' });
    expect(res?.reason).toBe('empty_password');
    expect(res?.error.status).toBe(400);
  });

  it('does not trim: whitespace-only values are kept as given', () => {
    expect(getRegisterInputFailure({ username: ' ', password: ' ' })).toBeNull();
  });

  it('passes when both are present', () => {
    expect(getRegisterInputFailure({ username: 'alice', password: 'correcthorse' })).toBeNull();
  });

  it('fails on a password over 72 UTF-8 bytes', () => {
    const res = getRegisterInputFailure({ username: 'alice', password: 'a'.repeat(73) });
    expect(res?.reason).toBe('password_too_long');
    expect(res?.error.status).toBe(400);
  });

  it('counts bytes, not characters', () => {
    // 36 two-byte characters = 72 bytes; one more pushes it over
    expect(getRegisterInputFailure({ username: 'alice', password: 'é'.repeat(36) })).toBeNull();
    expect(getRegisterInputFailure({ username: 'alice', password: 'é'.repeat(37) })?.reason).toBe(
      'password_too_long',
    );
  });
});
