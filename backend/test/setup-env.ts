/**
 * Test env defaults. Runs before any test file imports app code, so the
 * logger and buildConfig() see these values.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL ??= 'error';
process.env.SERVICE_NAME ??= 'user-auth-backend';
process.env.CREDENTIAL_STORE ??= 'memory';
process.env.JWT_SECRET ??= 'test-secret-signing-key';
process.env.BCRYPT_COST ??= '10';
