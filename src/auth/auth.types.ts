import { Request } from 'express';

/**
 * user: an end user behind the gateway
 * service: another service of the platform calling this one
 */
export type PrincipalKind = 'user' | 'service';

export interface JWTPayload {
  sub: string;
  kind: PrincipalKind;
  iat?: number;
  exp?: number;
}

/**
 * Authenticated caller, attached to the request by authMiddleware
 */
export interface Principal {
  userId: string;
  kind: PrincipalKind;
}

export interface AuthRequest extends Request {
  user?: Principal;
}
