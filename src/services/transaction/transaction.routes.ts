import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth/auth.middleware';
import { idempotencyMiddleware, validateIdempotencyKey } from '../../middlewares/idempotency';
import { transactionLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';

import { TransactionController } from './transaction.controller';
import {
  accountDateRangeValidation,
  accountIdValidation,
  accountPagedValidation,
  bulkTransactionValidation,
  createTransactionValidation,
  dateRangeValidation,
  listTransactionsValidation,
  referenceValidation,
  reverseTransactionValidation,
  statusPathValidation,
  transactionIdValidation,
  typePathValidation,
  updateTransactionValidation,
} from './transaction.validation';

export const createTransactionRouter = (transactionController: TransactionController): Router => {
  const router = Router();

  // GET /transactions/health - Liveness text, no authentication
  router.get('/health', (_req: Request, res: Response) => {
    res.type('text/plain').send('Transaction Service is running');
  });

  // Everything else requires authentication
  router.use(authMiddleware);

  // POST /transactions - Create and process a transaction
  router.post(
    '/',
    transactionLimiter,
    validateIdempotencyKey,
    idempotencyMiddleware,
    createTransactionValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.create(req, res, next)
  );

  // POST /transactions/bulk - Create several transactions one by one
  router.post(
    '/bulk',
    transactionLimiter,
    validateIdempotencyKey,
    idempotencyMiddleware,
    bulkTransactionValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.createBulk(req, res, next)
  );

  // POST /transactions/validate - Run the creation checks without persisting
  router.post(
    '/validate',
    createTransactionValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.validate(req, res, next)
  );

  // GET /transactions - All transactions, paged, optionally filtered
  router.get(
    '/',
    listTransactionsValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.list(req, res, next)
  );

  // GET /transactions/statistics
  router.get('/statistics', (req: Request, res: Response, next: NextFunction) => transactionController.statistics(req, res, next));

  // GET /transactions/date-range
  router.get(
    '/date-range',
    dateRangeValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.listByDateRange(req, res, next)
  );

  // GET /transactions/reference/:reference
  router.get(
    '/reference/:reference',
    referenceValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.getByReference(req, res, next)
  );

  // GET /transactions/status/:status
  router.get(
    '/status/:status',
    statusPathValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.listByStatus(req, res, next)
  );

  // GET /transactions/type/:type
  router.get(
    '/type/:type',
    typePathValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.listByType(req, res, next)
  );

  // GET /transactions/account/:accountId - Summaries from the account's side
  router.get(
    '/account/:accountId',
    accountIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.listByAccount(req, res, next)
  );

  router.get(
    '/account/:accountId/paged',
    accountPagedValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.listByAccountPaged(req, res, next)
  );

  router.get(
    '/account/:accountId/date-range',
    accountDateRangeValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.listByAccountAndDateRange(req, res, next)
  );

  router.get(
    '/account/:accountId/statistics',
    accountIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.accountStatistics(req, res, next)
  );

  // POST /transactions/admin/* - Run the maintenance jobs now
  router.post('/admin/process-pending', (req: Request, res: Response, next: NextFunction) => transactionController.processPending(req, res, next));
  router.post('/admin/cleanup-old-pending', (req: Request, res: Response, next: NextFunction) => transactionController.cleanupOldPending(req, res, next));

  // GET /transactions/:id
  router.get(
    '/:id',
    transactionIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.getById(req, res, next)
  );

  // PATCH /transactions/:id - Description or fee
  router.patch(
    '/:id',
    updateTransactionValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.update(req, res, next)
  );

  router.post(
    '/:id/cancel',
    transactionIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.cancel(req, res, next)
  );

  router.post(
    '/:id/retry',
    transactionIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.retry(req, res, next)
  );

  router.post(
    '/:id/reverse',
    reverseTransactionValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => transactionController.reverse(req, res, next)
  );

  return router;
};
