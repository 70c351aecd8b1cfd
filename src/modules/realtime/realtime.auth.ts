/**
 * =============================================================================
 * REALTIME MODULE - TOKEN VERIFICATION
 * =============================================================================
 *
 * Shared by the HTTP auth middleware (Bearer header) and the WebSocket
 * upgrade (`?token=` query). Payload: { userId, role }.
 * =============================================================================
 */

import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../../config/environment';
import { ErrorCode, USER_ROLES, UserRole } from '../../core/constants';
import { UnauthorizedError } from '../../core/errors/AppError';
import { UserIdentity } from './realtime.types';

const tokenPayloadSchema = z.object({
  userId: z.coerce.number().int().positive(),
  role: z.nativeEnum(UserRole)
});

/**
 * Verify a signed access token and extract the caller's identity.
 * Throws UnauthorizedError for expired, forged or malformed tokens.
 */
export function verifyAccessToken(token: string, secret: string = config.jwt.secret): UserIdentity {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret);
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw new UnauthorizedError('Token has expired', ErrorCode.AUTH_TOKEN_EXPIRED);
    }
    throw new UnauthorizedError('Invalid token', ErrorCode.AUTH_TOKEN_INVALID);
  }

  const payload = tokenPayloadSchema.safeParse(decoded);
  if (!payload.success) {
    throw new UnauthorizedError('Invalid token payload', ErrorCode.AUTH_TOKEN_INVALID);
  }

  return { userId: payload.data.userId, role: payload.data.role };
}

/**
 * Issue an access token. Used by tests and local tooling; token issuance
 * proper lives outside this service.
 */
export function signAccessToken(
  identity: UserIdentity,
  secret: string = config.jwt.secret,
  expiresIn: number = config.jwt.expiresInSeconds
): string {
  return jwt.sign({ userId: identity.userId, role: identity.role }, secret, { expiresIn });
}

/**
 * Default capability check: any known role may hold a realtime session
 */
export function defaultIsAuthorized(identity: UserIdentity): boolean {
  return USER_ROLES.includes(identity.role);
}
