export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(401, 'UNAUTHORIZED', message);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, 'NOT_FOUND', `${resource} not found`);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code = 'CONFLICT') {
    super(409, code, message);
  }
}

// --- Access-control taxonomy ---
// Deny messages are deliberately generic: they never say whether the target
// user or record exists.

export class NotAuthorizedError extends AppError {
  constructor(message = 'Not authorized to access this resource') {
    super(403, 'NOT_AUTHORIZED', message);
  }
}

export class NotLinkedError extends AppError {
  constructor(message = 'Not authorized to access this resource') {
    super(403, 'NOT_LINKED', message);
  }
}

export class InvalidCodeError extends AppError {
  constructor(message = 'Invalid or expired code') {
    super(404, 'INVALID_CODE', message);
  }
}

export class AlreadyLinkedError extends ConflictError {
  constructor(message = 'Doctor and patient are already linked') {
    super(message, 'ALREADY_LINKED');
  }
}

export class DuplicateIdentityError extends ConflictError {
  constructor(message = 'Email already registered') {
    super(message, 'DUPLICATE_IDENTITY');
  }
}

export class AlreadyMigratedError extends ConflictError {
  constructor(message = 'Records for this code have already been migrated') {
    super(message, 'ALREADY_MIGRATED');
  }
}

// --- Store errors ---

const PG_UNIQUE_VIOLATION = '23505';

function pgErrorOf(err: unknown): { code: unknown; constraint?: unknown } | null {
  if (typeof err !== 'object' || err === null) return null;
  if ('code' in err && err.code === PG_UNIQUE_VIOLATION) {
    return 'constraint' in err
      ? { code: err.code, constraint: err.constraint }
      : { code: err.code };
  }
  // Newer drizzle releases wrap driver errors.
  if ('cause' in err) return pgErrorOf(err.cause);
  return null;
}

/**
 * True when `err` is a Postgres unique violation, optionally on the named
 * index/constraint.
 */
export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  const pgError = pgErrorOf(err);
  if (!pgError) return false;
  if (!constraint) return true;
  return pgError.constraint === constraint;
}
