import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth/auth.middleware';
import { validateRequest } from '../../middlewares/validateRequest';
import { AccountController } from './account.controller';
import {
  accountIdValidation,
  createAccountValidation,
  movementValidation,
  operationsQueryValidation,
} from './account.validation';

export const createAccountRouter = (accountController: AccountController): Router => {
  const router = Router();

  // GET /accounts/health - Liveness text
  router.get('/health', (_req: Request, res: Response) => {
    res.type('text/plain').send('Account Service is running');
  });

  // Callers are end users or the transaction service with its service token
  router.use(authMiddleware);

  // POST /accounts - Open an account
  router.post('/', createAccountValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => accountController.createAccount(req, res, next));

  // GET /accounts/:id - Account details
  router.get('/:id', accountIdValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => accountController.getAccount(req, res, next));

  // GET /accounts/:id/balance - Balance and available funds
  router.get('/:id/balance', accountIdValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => accountController.getBalance(req, res, next));

  // GET /accounts/:id/operations - Operation history, newest first
  router.get('/:id/operations', operationsQueryValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => accountController.getOperations(req, res, next));

  // POST /accounts/:id/debit - Idempotent on operationId
  router.post('/:id/debit', movementValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => accountController.debit(req, res, next));

  // POST /accounts/:id/credit - Idempotent on operationId
  router.post('/:id/credit', movementValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => accountController.credit(req, res, next));

  // POST /accounts/:id/close
  router.post('/:id/close', accountIdValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => accountController.closeAccount(req, res, next));

  return router;
};
