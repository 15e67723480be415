// SQLSTATE codes raised by PostgreSQL constraint checks.
export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';

export interface PgErrorInfo {
  code: string;
  constraint: string | null;
  message: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Extract the SQLSTATE details from a driver error.
 *
 * node-postgres and PGlite both expose `code` and `constraint` on the error
 * itself; newer Drizzle releases wrap it, so the `cause` chain is walked too.
 */
export function getPgError(err: unknown): PgErrorInfo | null {
  let current: unknown = err;

  for (let depth = 0; depth < 5 && isRecord(current); depth++) {
    const code = current.code;
    if (typeof code === 'string' && /^[0-9A-Z]{5}$/.test(code)) {
      const constraint = current.constraint;
      const message = current.message;
      return {
        code,
        constraint: typeof constraint === 'string' ? constraint : null,
        message: typeof message === 'string' ? message : '',
      };
    }
    current = current.cause;
  }

  return null;
}

function matchesConstraint(info: PgErrorInfo, constraint: string | undefined): boolean {
  if (constraint === undefined) return true;
  // PGlite may leave the constraint field empty; the name is always in the message.
  return info.constraint === constraint || info.message.includes(constraint);
}

export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  const info = getPgError(err);
  return info !== null && info.code === PG_UNIQUE_VIOLATION && matchesConstraint(info, constraint);
}

export function isForeignKeyViolation(err: unknown, constraint?: string): boolean {
  const info = getPgError(err);
  return (
    info !== null && info.code === PG_FOREIGN_KEY_VIOLATION && matchesConstraint(info, constraint)
  );
}
