import { Response, NextFunction } from 'express';

import { AuthRequest } from '../../auth/auth.types';
import { config } from '../../config';
import {
  PageRequest,
  SortDirection,
  TransactionSortField,
  TRANSACTION_SORT_FIELDS,
  parseTransactionStatus,
  parseTransactionType,
} from '../../types/transaction';
import { TransactionService } from './transaction.service';
import { CreateTransactionRequest, UpdateTransactionRequest } from './transaction.types';

const queryString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;

const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

const optionalNumber = (value: unknown): number | undefined =>
  typeof value === 'number' ? value : undefined;

const isSortField = (value: string): value is TransactionSortField =>
  TRANSACTION_SORT_FIELDS.some((field) => field === value);

/**
 * Page parameters with their defaults: page 0, size 20 (capped at 100),
 * newest first
 */
export const toPageRequest = (query: AuthRequest['query']): PageRequest => {
  const page = parseInt(queryString(query.page) ?? '0', 10);
  const size = parseInt(queryString(query.size) ?? String(config.transaction.defaultPageSize), 10);
  const sortBy = queryString(query.sortBy) ?? 'createdAt';
  const sortDir: SortDirection = queryString(query.sortDir)?.toUpperCase() === 'ASC' ? 'ASC' : 'DESC';

  return {
    page: Number.isNaN(page) || page < 0 ? 0 : page,
    size: Number.isNaN(size) || size < 1
      ? config.transaction.defaultPageSize
      : Math.min(size, config.transaction.maxPageSize),
    sortBy: isSortField(sortBy) ? sortBy : 'createdAt',
    sortDir,
  };
};

const toCreateRequest = (raw: unknown): CreateTransactionRequest => {
  const source: Record<string, unknown> = typeof raw === 'object' && raw !== null ? { ...raw } : {};
  return {
    transactionType: String(source.transactionType ?? ''),
    amount: Number(source.amount),
    fee: optionalNumber(source.fee),
    fromAccountId: optionalString(source.fromAccountId),
    toAccountId: optionalString(source.toAccountId),
    currency: optionalString(source.currency),
    description: optionalString(source.description),
    externalReference: optionalString(source.externalReference),
  };
};

// Both dates were checked as ISO-8601 by the route validation
const dateRange = (req: AuthRequest): { startDate: Date; endDate: Date } => ({
  startDate: new Date(String(req.query.startDate)),
  endDate: new Date(String(req.query.endDate)),
});

export class TransactionController {
  constructor(private readonly transactions: TransactionService) {}

  /**
   * Create a transaction and process it
   * POST /transactions
   */
  async create(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const transaction = await this.transactions.createTransaction(
        toCreateRequest(req.body),
        req.user?.userId
      );

      res.status(201).json({
        success: true,
        data: { transaction },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /transactions/bulk
   */
  async createBulk(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const items: unknown[] = Array.isArray(req.body.transactions) ? req.body.transactions : [];
      const result = await this.transactions.createBulkTransactions(
        items.map(toCreateRequest),
        req.user?.userId
      );

      res.status(201).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Dry run of the creation checks
   * POST /transactions/validate
   */
  async validate(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.transactions.validateTransaction(toCreateRequest(req.body));

      res.status(200).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /transactions?status=&type=&page=&size=&sortBy=&sortDir=
   */
  async list(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const status = queryString(req.query.status);
      const type = queryString(req.query.type);

      const page = await this.transactions.listTransactions(
        {
          status: status ? parseTransactionStatus(status) : undefined,
          transactionType: type ? parseTransactionType(type) : undefined,
        },
        toPageRequest(req.query)
      );

      res.status(200).json({
        success: true,
        data: page,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /transactions/status/:status
   */
  async listByStatus(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const page = await this.transactions.listTransactions(
        { status: parseTransactionStatus(req.params.status) },
        toPageRequest(req.query)
      );

      res.status(200).json({
        success: true,
        data: page,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /transactions/type/:type
   */
  async listByType(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const page = await this.transactions.listTransactions(
        { transactionType: parseTransactionType(req.params.type) },
        toPageRequest(req.query)
      );

      res.status(200).json({
        success: true,
        data: page,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /transactions/date-range?startDate=&endDate=
   */
  async listByDateRange(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const { startDate, endDate } = dateRange(req);
      const transactions = await this.transactions.getTransactionsByDateRange(startDate, endDate);

      res.status(200).json({
        success: true,
        data: { transactions },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /transactions/statistics
   */
  async statistics(_req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const statistics = await this.transactions.getTransactionStatistics();

      res.status(200).json({
        success: true,
        data: { statistics },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /transactions/:id
   */
  async getById(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const transaction = await this.transactions.getTransactionById(req.params.id);

      res.status(200).json({
        success: true,
        data: { transaction },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /transactions/reference/:reference
   */
  async getByReference(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const transaction = await this.transactions.getTransactionByReference(req.params.reference);

      res.status(200).json({
        success: true,
        data: { transaction },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /transactions/account/:accountId
   */
  async listByAccount(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const transactions = await this.transactions.getTransactionsByAccount(req.params.accountId);

      res.status(200).json({
        success: true,
        data: { transactions },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /transactions/account/:accountId/paged
   */
  async listByAccountPaged(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const page = await this.transactions.getTransactionsByAccountPaged(
        req.params.accountId,
        toPageRequest(req.query)
      );

      res.status(200).json({
        success: true,
        data: page,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /transactions/account/:accountId/date-range?startDate=&endDate=
   */
  async listByAccountAndDateRange(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const { startDate, endDate } = dateRange(req);
      const transactions = await this.transactions.getAccountTransactionsByDateRange(
        req.params.accountId,
        startDate,
        endDate
      );

      res.status(200).json({
        success: true,
        data: { transactions },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /transactions/account/:accountId/statistics
   */
  async accountStatistics(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const statistics = await this.transactions.getAccountTransactionStatistics(req.params.accountId);

      res.status(200).json({
        success: true,
        data: { statistics },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PATCH /transactions/:id
   */
  async update(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const request: UpdateTransactionRequest = {
        description: optionalString(req.body.description),
        fee: optionalNumber(req.body.fee),
      };
      const transaction = await this.transactions.updateTransaction(
        req.params.id,
        request,
        req.user?.userId
      );

      res.status(200).json({
        success: true,
        data: { transaction },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /transactions/:id/cancel
   */
  async cancel(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const transaction = await this.transactions.cancelTransaction(req.params.id, req.user?.userId);

      res.status(200).json({
        success: true,
        data: { transaction },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /transactions/:id/retry
   */
  async retry(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const transaction = await this.transactions.retryTransaction(req.params.id, req.user?.userId);

      res.status(200).json({
        success: true,
        data: { transaction },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /transactions/:id/reverse
   */
  async reverse(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const transaction = await this.transactions.reverseTransaction(
        req.params.id,
        optionalString(req.body?.reason),
        req.user?.userId
      );

      res.status(200).json({
        success: true,
        data: { transaction },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /transactions/admin/process-pending
   */
  async processPending(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.transactions.processPendingTransactions(req.user?.userId);

      res.status(200).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /transactions/admin/cleanup-old-pending
   */
  async cleanupOldPending(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.transactions.cleanupOldPendingTransactions(req.user?.userId);

      res.status(200).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }
}
