import express from 'express';
import { fromNodeHeaders } from 'better-auth/node';
import type { Auth } from '../auth';
import type { UserService } from '../services/userService';
import type { User } from '../types/blog';
import { ForbiddenError, HttpError, UnauthorizedError, ValidationError } from '../lib/errors';

export interface AuthenticatedRequest extends express.Request {
  user?: User;
}

type AsyncRequestHandler<Req extends express.Request = express.Request> = (
  req: Req,
  res: express.Response,
  next: express.NextFunction,
) => Promise<unknown>;

/**
 * Lets an async handler throw; the rejection goes to the error handler.
 */
export function asyncHandler<Req extends express.Request = express.Request>(
  handler: AsyncRequestHandler<Req>,
): (req: Req, res: express.Response, next: express.NextFunction) => void {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * Resolves the Better Auth session into `req.user`, answering 401 without one.
 */
export function requireAuth(auth: Auth, userService: UserService) {
  return asyncHandler<AuthenticatedRequest>(async (req, res, next) => {
    const session = await auth.api.getSession({
      headers: fromNodeHeaders(req.headers),
    });

    if (!session || !session.user) {
      throw new UnauthorizedError();
    }

    const user = await userService.getUserById(session.user.id);
    if (!user) {
      throw new UnauthorizedError();
    }

    req.user = user;
    next();
  });
}

/**
 * Middleware to require a staff account; must run after requireAuth
 */
export function requireStaff(
  req: AuthenticatedRequest,
  res: express.Response,
  next: express.NextFunction
): void {
  if (!req.user) {
    next(new UnauthorizedError());
    return;
  }
  if (!req.user.isStaff) {
    next(new ForbiddenError('Staff access required'));
    return;
  }
  next();
}

/**
 * The signed-in user set by requireAuth
 */
export function currentUser(req: AuthenticatedRequest): User {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}

// HttpError status, or the 4xx status body-parser puts on malformed bodies
function errorStatus(err: unknown): number {
  if (err instanceof HttpError) {
    return err.status;
  }
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return 500;
}

/**
 * Error handling middleware
 */
export function errorHandler(
  err: unknown,
  req: express.Request,
  res: express.Response,
  next: express.NextFunction
): void {
  const status = errorStatus(err);
  const message = err instanceof HttpError || (status < 500 && err instanceof Error)
    ? err.message
    : 'Internal Server Error';

  if (status >= 500) {
    console.error('Error:', err);
  }

  if (res.headersSent) {
    next(err);
    return;
  }

  res.status(status).json({
    error: {
      message,
      status,
      ...(err instanceof ValidationError && err.field ? { field: err.field } : {}),
      ...(process.env.NODE_ENV === 'development' && err instanceof Error && {
        stack: err.stack,
      }),
    },
  });
}

/**
 * 404 handler middleware
 */
export function notFoundHandler(
  req: express.Request,
  res: express.Response
): void {
  res.status(404).json({
    error: {
      message: 'Route not found',
      status: 404,
      path: req.path,
      method: req.method
    }
  });
}

/**
 * Request logging middleware
 */
export function requestLogger(
  req: express.Request,
  res: express.Response,
  next: express.NextFunction
): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const { method, originalUrl, ip } = req;
    const { statusCode } = res;

    console.log(`${method} ${originalUrl} ${statusCode} ${duration}ms - ${ip}`);
  });

  next();
}
