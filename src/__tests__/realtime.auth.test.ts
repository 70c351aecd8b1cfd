import jwt from 'jsonwebtoken';
import { ErrorCode, UserRole } from '../core/constants';
import { UnauthorizedError } from '../core/errors/AppError';
import { defaultIsAuthorized, signAccessToken, verifyAccessToken } from '../modules/realtime/realtime.auth';

const SECRET = 'test-secret';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error');
}

describe('verifyAccessToken', () => {
  it('returns the identity carried by a valid token', () => {
    const token = signAccessToken({ userId: 7, role: UserRole.COURIER }, SECRET);

    expect(verifyAccessToken(token, SECRET)).toEqual({ userId: 7, role: UserRole.COURIER });
  });

  it('accepts a numeric string user id', () => {
    const token = jwt.sign({ userId: '12', role: 'recipient' }, SECRET);

    expect(verifyAccessToken(token, SECRET)).toEqual({ userId: 12, role: UserRole.RECIPIENT });
  });

  it('reports an expired token', () => {
    const token = signAccessToken({ userId: 7, role: UserRole.COURIER }, SECRET, -10);

    const error = captureError(() => verifyAccessToken(token, SECRET));

    expect(error).toBeInstanceOf(UnauthorizedError);
    expect(error).toMatchObject({ code: ErrorCode.AUTH_TOKEN_EXPIRED, statusCode: 401 });
  });

  it('rejects a token signed with another secret', () => {
    const token = signAccessToken({ userId: 7, role: UserRole.COURIER }, 'another-secret');

    const error = captureError(() => verifyAccessToken(token, SECRET));

    expect(error).toMatchObject({ code: ErrorCode.AUTH_TOKEN_INVALID, message: 'Invalid token' });
  });

  it('rejects a token with an unknown role', () => {
    const token = jwt.sign({ userId: 7, role: 'pilot' }, SECRET);

    const error = captureError(() => verifyAccessToken(token, SECRET));

    expect(error).toMatchObject({ code: ErrorCode.AUTH_TOKEN_INVALID, message: 'Invalid token payload' });
  });

  it('rejects garbage', () => {
    expect(() => verifyAccessToken('not-a-token', SECRET)).toThrow(UnauthorizedError);
  });
});

describe('defaultIsAuthorized', () => {
  it('allows every known role', () => {
    for (const role of Object.values(UserRole)) {
      expect(defaultIsAuthorized({ userId: 1, role })).toBe(true);
    }
  });
});
