import { importSPKI, jwtVerify } from 'jose';
import type { JWTPayload, KeyLike } from 'jose';
import { UnauthorizedError } from '../errors';
import { USER_ROLES } from '../types';
import type { UserRole } from '../types';

type Alg = 'HS256' | 'RS256';

export type TokenOptions = {
  alg: Alg;
  secret: string;
  publicKey: string;
  issuer: string;
  audience: string;
};

export type AuthUser = {
  userId: string;
  role: UserRole;
};

export type TokenVerifier = (token: string) => Promise<AuthUser>;

function isUserRole(value: unknown): value is UserRole {
  return typeof value === 'string' && USER_ROLES.some((r) => r === value);
}

export function userFromPayload(payload: JWTPayload): AuthUser {
  const role = payload.role;
  if (!payload.sub) throw new UnauthorizedError('Token has no subject');
  if (!isUserRole(role)) throw new UnauthorizedError('Token has no valid role');
  return { userId: payload.sub, role };
}

/**
 * Builds a verifier for user tokens. HS256 uses the shared secret, RS256 the
 * PEM public key; either is resolved on first use.
 */
export function createTokenVerifier(opts: TokenOptions): TokenVerifier {
  let key: Promise<KeyLike | Uint8Array> | null = null;

  const loadKey = async (): Promise<KeyLike | Uint8Array> => {
    if (opts.alg === 'HS256') {
      if (!opts.secret) throw new Error('CORE_JWT_SECRET not set');
      return new TextEncoder().encode(opts.secret);
    }
    if (!opts.publicKey) throw new Error('CORE_JWT_PUBLIC_KEY not set');
    return importSPKI(opts.publicKey, 'RS256');
  };

  return async (token: string) => {
    if (!key) key = loadKey();
    const { payload } = await jwtVerify(token, await key, {
      issuer: opts.issuer,
      audience: opts.audience,
      algorithms: [opts.alg],
    });
    return userFromPayload(payload);
  };
}
