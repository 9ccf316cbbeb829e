/**
 * Middleware Exports
 */

// Error handling
export { errorHandler, notFoundHandler, ApiError } from './errorHandler';
export type { AppError } from './errorHandler';

// Request validation
export { validateRequest } from './validateRequest';

// Rate limiting
export { globalLimiter, transactionLimiter } from './rateLimiter';

// Idempotency
export { idempotencyMiddleware, validateIdempotencyKey } from './idempotency';
