import { Response, NextFunction } from 'express';
import { authService } from './auth.service';
import { AuthRequest } from './auth.types';
import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability';

/**
 * Requires a valid bearer token and attaches the caller to req.user
 */
export const authMiddleware = (
  req: AuthRequest,
  _res: Response,
  next: NextFunction
): void => {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      throw ApiError.unauthorized('No authorization header provided');
    }

    if (!authHeader.startsWith('Bearer ')) {
      throw ApiError.unauthorized('Invalid authorization format. Use: Bearer <token>');
    }

    const token = authHeader.substring(7);

    if (!token) {
      throw ApiError.unauthorized('No token provided');
    }

    req.user = authService.toPrincipal(authService.verifyToken(token));
    addLogContext({ userId: req.user.userId });
    next();
  } catch (error) {
    next(error);
  }
};
