import jwt, { SignOptions } from 'jsonwebtoken';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';

import { JWTPayload, Principal, PrincipalKind } from './auth.types';

const isPrincipalKind = (value: unknown): value is PrincipalKind =>
  value === 'user' || value === 'service';

export class AuthService {
  private cachedServiceToken: { token: string; expiresAt: number } | null = null;

  constructor(
    private readonly secret: string = config.jwt.secret,
    private readonly serviceName: string = config.jwt.serviceName
  ) {}

  issueToken(subject: string, kind: PrincipalKind = 'user', expiresIn?: SignOptions['expiresIn']): string {
    const options: SignOptions = {
      subject,
      expiresIn:
        expiresIn ??
        ((kind === 'service'
          ? config.jwt.serviceTokenExpiresIn
          : config.jwt.accessTokenExpiresIn) as SignOptions['expiresIn']),
    };
    return jwt.sign({ kind }, this.secret, options);
  }

  /**
   * Token this service presents to the Account Service. Reused until it is
   * within a minute of expiring.
   */
  getServiceToken(): string {
    const now = Date.now();
    if (this.cachedServiceToken && this.cachedServiceToken.expiresAt - 60_000 > now) {
      return this.cachedServiceToken.token;
    }

    const token = this.issueToken(this.serviceName, 'service');
    const decoded = jwt.decode(token);
    const exp = decoded && typeof decoded !== 'string' ? decoded.exp : undefined;
    this.cachedServiceToken = { token, expiresAt: exp ? exp * 1000 : now };
    return token;
  }

  verifyToken(token: string): JWTPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw ApiError.invalidToken();
      }
      throw ApiError.invalidToken('Token verification failed');
    }

    if (typeof decoded === 'string' || !decoded.sub || !isPrincipalKind(decoded.kind)) {
      throw ApiError.invalidToken('Token is missing subject or kind');
    }

    return { sub: decoded.sub, kind: decoded.kind, iat: decoded.iat, exp: decoded.exp };
  }

  toPrincipal(payload: JWTPayload): Principal {
    return { userId: payload.sub, kind: payload.kind };
  }
}

export const authService = new AuthService();
