/**
 * Errors carrying an HTTP status; the express error handler turns them into
 * `{ error: { message, status } }` responses.
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends HttpError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(400, message);
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = 'Authentication required') {
    super(401, message);
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = 'You do not have permission to perform this action') {
    super(403, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not found') {
    super(404, message);
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
  }
}

const PG_UNIQUE_VIOLATION = '23505';
const PG_FOREIGN_KEY_VIOLATION = '23503';

function pgErrorCode(error: unknown): string | undefined {
  // drizzle wraps driver errors; the postgres code sits on the cause
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return pgErrorCode(error) === PG_UNIQUE_VIOLATION;
}

/**
 * Maps postgres constraint violations to HTTP errors and rethrows anything else.
 */
export function translateDbError(error: unknown, messages: { unique?: string; foreignKey?: string } = {}): never {
  const code = pgErrorCode(error);
  if (code === PG_UNIQUE_VIOLATION) {
    throw new ConflictError(messages.unique ?? 'A record with these values already exists');
  }
  if (code === PG_FOREIGN_KEY_VIOLATION) {
    throw new ValidationError(messages.foreignKey ?? 'A referenced record does not exist');
  }
  throw error;
}
