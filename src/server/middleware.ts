/**
 * Express helpers shared by the API routers
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { UnauthorizedError, ValidationError } from '../types';

/**
 * Async handler wrapper to catch errors.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Validate a request part against a zod schema; failures become a 400 with the issue list.
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string = 'body'): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message
    }));
    throw new ValidationError(`Invalid request ${what}`, { issues });
  }
  return result.data;
}

/**
 * Guard admin routes with a shared key. With no key configured the routes stay open.
 */
export function requireApiKey(headerName: string, expectedKey: string | undefined): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!expectedKey) {
      next();
      return;
    }

    if (req.header(headerName) !== expectedKey) {
      next(new UnauthorizedError());
      return;
    }
    next();
  };
}
