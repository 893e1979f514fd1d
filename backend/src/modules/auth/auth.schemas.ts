/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents malformed payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Shape only (strings, sane upper bounds). Empty values and the bcrypt byte
 *   limit are enforced by the flows so every entry point gets the same rule.
 * - No trimming or case folding: usernames are exact strings.
 */

import { z } from 'zod';

export const credentialsSchema = z.object({
  username: z.string().max(200, 'Username is too long'),
  password: z.string().max(1024, 'Password is too long'),
});

export const registerSchema = credentialsSchema;
export const loginSchema = credentialsSchema;
