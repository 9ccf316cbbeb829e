import { Request, Response, NextFunction } from 'express';

import { AccountOperationRecord, AccountRecord, AccountType } from '../../types/account';
import { AccountService, OperationResult } from './account.service';

const toAccountResponse = (account: AccountRecord) => ({
  accountId: account.accountId,
  userId: account.userId,
  accountNumber: account.accountNumber,
  accountType: account.accountType,
  balance: account.balance,
  status: account.status,
  currency: account.currency,
  overdraftLimit: account.overdraftLimit,
  openedAt: account.openedAt,
  closedAt: account.closedAt,
  createdAt: account.createdAt,
  updatedAt: account.updatedAt,
});

const toOperationResponse = (operation: AccountOperationRecord) => ({
  operationId: operation.operationId,
  type: operation.type,
  amount: operation.amount,
  resultBalance: operation.resultBalance,
  description: operation.description,
  createdAt: operation.createdAt,
});

const isAccountType = (value: unknown): value is AccountType =>
  typeof value === 'string' && Object.values<string>(AccountType).includes(value);

const optionalNumber = (value: unknown): number | undefined =>
  typeof value === 'number' ? value : undefined;

const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

export class AccountController {
  constructor(private readonly accounts: AccountService) {}

  /**
   * Open an account
   * POST /accounts
   */
  async createAccount(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { userId, accountType, currency, overdraftLimit, initialDeposit } = req.body;

      const account = await this.accounts.createAccount({
        userId: String(userId),
        accountType: isAccountType(accountType) ? accountType : undefined,
        currency: optionalString(currency),
        overdraftLimit: optionalNumber(overdraftLimit),
        initialDeposit: optionalNumber(initialDeposit),
      });

      res.status(201).json({
        success: true,
        data: { account: toAccountResponse(account) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts/:id
   */
  async getAccount(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.accounts.getAccount(req.params.id);

      res.status(200).json({
        success: true,
        data: { account: toAccountResponse(account) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts/:id/balance
   */
  async getBalance(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const balance = await this.accounts.getBalance(req.params.id);

      res.status(200).json({
        success: true,
        data: balance,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts/:id/operations
   */
  async getOperations(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      // the route validation has already turned limit into an integer in 1..100
      const limit = Number(req.query.limit ?? 20);
      const operations = await this.accounts.getOperations(
        req.params.id,
        Number.isInteger(limit) && limit > 0 ? Math.min(limit, 100) : 20
      );

      res.status(200).json({
        success: true,
        data: { operations: operations.map(toOperationResponse) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /accounts/:id/debit
   */
  async debit(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.accounts.debit(req.params.id, this.movementFrom(req));
      this.sendOperation(res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /accounts/:id/credit
   */
  async credit(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.accounts.credit(req.params.id, this.movementFrom(req));
      this.sendOperation(res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /accounts/:id/close
   */
  async closeAccount(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.accounts.closeAccount(req.params.id);

      res.status(200).json({
        success: true,
        data: { account: toAccountResponse(account) },
      });
    } catch (error) {
      next(error);
    }
  }

  private movementFrom(req: Request) {
    return {
      amount: Number(req.body.amount),
      description: optionalString(req.body.description),
      operationId: optionalString(req.body.operationId),
    };
  }

  // Replays answer 200, fresh operations 201
  private sendOperation(res: Response, result: OperationResult): void {
    res.status(result.replayed ? 200 : 201).json({
      success: true,
      data: { operation: result },
    });
  }
}
