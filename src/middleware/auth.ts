import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ForbiddenError, UnauthorizedError } from '../errors';
import { logger } from '../utils/logger';
import type { AuthUser, TokenVerifier } from '../utils/jwt';
import type { Actor, UserRole } from '../types';

const log = logger.child({ module: 'auth' });

export interface AuthedRequest extends Request {
  auth?: AuthUser;
}

export type AuthOptions = {
  required: boolean;
  verifyToken: TokenVerifier;
  deviceApiKey: string;
};

// Used when AUTH_REQUIRED=false so local runs still have an actor.
const ANONYMOUS_ADMIN: AuthUser = { userId: 'anonymous', role: 'admin' };

export function extractToken(req: Request): string {
  // Accept either Authorization: Bearer <token> or x-core-token: <token>
  const authz = req.header('authorization');
  if (authz && authz.toLowerCase().startsWith('bearer ')) {
    return authz.slice(7).trim();
  }
  return (req.header('x-core-token') ?? '').trim();
}

/**
 * Resolves the caller to a user with a role. Verification failures become
 * 401s through the global error trap.
 */
export function createRequireAuth(opts: AuthOptions): RequestHandler {
  return (req: AuthedRequest, _res: Response, next: NextFunction) => {
    if (!opts.required) {
      req.auth = ANONYMOUS_ADMIN;
      return next();
    }

    const token = extractToken(req);
    if (!token) {
      log.warn({ path: req.path }, 'Missing bearer token');
      return next(new UnauthorizedError('Unauthorized: missing token'));
    }

    opts
      .verifyToken(token)
      .then((user) => {
        req.auth = user;
        next();
      })
      .catch((err: unknown) => {
        log.warn({ path: req.path, err: err instanceof Error ? err.message : err }, 'Token verify failed');
        next(new UnauthorizedError('Unauthorized: invalid token'));
      });
  };
}

/** Rejects callers whose role is not in the list (viewers on control routes). */
export function requireRole(...roles: UserRole[]): RequestHandler {
  return (req: AuthedRequest, _res: Response, next: NextFunction) => {
    const role = req.auth?.role;
    if (!role) return next(new UnauthorizedError());
    if (!roles.includes(role)) {
      log.warn({ path: req.path, role }, 'Role not permitted');
      return next(new ForbiddenError(`Role ${role} may not perform this action`));
    }
    next();
  };
}

/** Shared-secret check for ESP32 devices (X-API-Key header). */
export function createRequireDevice(opts: AuthOptions): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!opts.required) return next();

    const apiKey = req.header('x-api-key');
    if (!opts.deviceApiKey) {
      log.error('DEVICE_API_KEY not configured');
      return next(new UnauthorizedError('Device authentication unavailable'));
    }
    if (!apiKey || apiKey !== opts.deviceApiKey) {
      log.warn({ path: req.path, ip: req.ip }, 'Invalid device API key');
      return next(new UnauthorizedError('Invalid API key'));
    }
    next();
  };
}

export function actorFrom(req: AuthedRequest): Actor {
  const user = req.auth;
  if (!user) throw new UnauthorizedError();
  return { kind: 'user', userId: user.userId, role: user.role };
}
