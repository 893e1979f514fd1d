/**
 * backend/src/shared/logger/serialize-error.ts
 *
 * WHY:
 * - winston's errors() format only unwraps a top-level Error, and json() drops
 *   non-enumerable fields. An Error nested in meta (`{ err }`) would be logged
 *   as `{ "name": ... }` with no message, stack, or cause.
 *
 * HOW TO USE:
 * - logger.error('auth.login.system_error', { ...base, err: serializeError(err) })
 *
 * RULES:
 * - Follows `cause` up to MAX_CAUSE_DEPTH links (cycles end there too).
 */

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
  code?: string;
  cause?: SerializedError;
};

const MAX_CAUSE_DEPTH = 5;

export function serializeError(err: unknown, depth = 0): SerializedError {
  if (!(err instanceof Error)) {
    return { name: 'NonError', message: typeof err === 'string' ? err : safeStringify(err) };
  }

  const out: SerializedError = { name: err.name, message: err.message, stack: err.stack };

  // pg and node errors carry a string code (23505, ECONNREFUSED)
  if ('code' in err && typeof err.code === 'string') {
    out.code = err.code;
  }

  if (err.cause !== undefined && depth < MAX_CAUSE_DEPTH) {
    out.cause = serializeError(err.cause, depth + 1);
  }

  return out;
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
