/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Keeps logging consistent across app/modules.
 * - Adds stable metadata (service, env) so logs can be filtered per deployment.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs.
 * - Prefer using `withRequestContext(req)` when logging inside request handlers.
 * - Log caught errors as `{ err: serializeError(err) }` (./serialize-error) so
 *   message, stack and cause survive the JSON format.
 * - Never log passwords, password hashes, or issued tokens.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'user-auth-backend';
const level = process.env.LOG_LEVEL ?? 'info';

export const logFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }), // top-level Error only
  winston.format.json(),
);

export const logger = winston.createLogger({
  level,
  format: logFormat,
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});

export type Logger = winston.Logger;
