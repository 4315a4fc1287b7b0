import type { NextFunction, Request, RequestHandler, Response } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { forbidden, unauthorized } from '../errors.js';

const tokenSchema = z.object({
  sub: z.string().min(1),
  permissions: z.array(z.string()).default([]),
});

export type AuthenticatedCaller = {
  id: string;
  permissions: string[];
};

declare global {
  namespace Express {
    interface Request {
      caller?: AuthenticatedCaller;
    }
  }
}

export function requireAuth(secret: string | null): RequestHandler {
  return (req, _res, next) => {
    const authHeader = req.headers.authorization ?? '';
    const token = authHeader.startsWith('Bearer ') ? authHeader.slice(7) : null;
    if (!token) {
      return next(unauthorized());
    }
    if (!secret) {
      return next(unauthorized('server misconfiguration'));
    }

    let payload: unknown;
    try {
      payload = jwt.verify(token, secret);
    } catch {
      return next(unauthorized('invalid token'));
    }

    const parsed = tokenSchema.safeParse(payload);
    if (!parsed.success) {
      return next(unauthorized('invalid token'));
    }

    req.caller = { id: parsed.data.sub, permissions: parsed.data.permissions };
    return next();
  };
}

export function requirePermission(...required: string[]): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.caller) {
      return next(unauthorized());
    }

    const callerPermissions = req.caller.permissions;
    if (callerPermissions.includes('*')) {
      return next();
    }

    const hasPermission = required.some((permission) => callerPermissions.includes(permission));
    if (!hasPermission) {
      return next(forbidden());
    }

    return next();
  };
}
