import crypto from 'crypto';

import { ApiError } from '../../middlewares/errorHandler';
import { accountOperationsTotal, createServiceLogger } from '../../observability';
import { IAccountRepository } from '../../repositories/interfaces/IAccountRepository';
import {
  AccountOperationRecord,
  AccountOperationType,
  AccountRecord,
  AccountStatus,
  AccountType,
} from '../../types/account';
import { ErrorCode } from '../../types/errors';
import { hasAtMostTwoDecimals, roundMoney } from '../../utils/money';

const log = createServiceLogger('account-service');

const ACCOUNT_NUMBER_ATTEMPTS = 5;

export interface CreateAccountRequest {
  userId: string;
  accountType?: AccountType;
  currency?: string;
  overdraftLimit?: number;
  initialDeposit?: number;
}

export interface MovementCommand {
  amount: number;
  description?: string;
  operationId?: string;
}

export interface OperationResult {
  operationId: string;
  accountId: string;
  type: AccountOperationType;
  amount: number;
  resultBalance: number;
  /** true when the operation id had already been applied */
  replayed: boolean;
}

export interface AccountBalance {
  accountId: string;
  balance: number;
  availableBalance: number;
  currency: string;
}

const pad = (value: number, length: number): string => value.toString().padStart(length, '0');

const operationInProgress = (operationId: string): ApiError =>
  new ApiError(ErrorCode.CONCURRENT_MODIFICATION, `Operation ${operationId} is already in progress`);

/**
 * ACC-YYYYMMDD-NNNNNN
 */
export const generateAccountNumber = (now: Date = new Date()): string => {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1, 2)}${pad(now.getUTCDate(), 2)}`;
  return `ACC-${date}-${pad(crypto.randomInt(0, 1_000_000), 6)}`;
};

const toResult = (operation: AccountOperationRecord, replayed: boolean): OperationResult => ({
  operationId: operation.operationId,
  accountId: operation.accountId,
  type: operation.type,
  amount: operation.amount,
  resultBalance: roundMoney(operation.resultBalance),
  replayed,
});

/**
 * Minimal account ledger backing the debit/credit contract the transaction
 * processor calls
 */
export class AccountService {
  constructor(
    private readonly repository: IAccountRepository,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async createAccount(request: CreateAccountRequest): Promise<AccountRecord> {
    const overdraftLimit = roundMoney(request.overdraftLimit ?? 0);
    if (overdraftLimit < 0) {
      throw ApiError.validationError('Overdraft limit cannot be negative');
    }

    const now = this.clock();
    const account = await this.repository.create({
      accountId: `acc_${crypto.randomUUID().replace(/-/g, '').substring(0, 24)}`,
      userId: request.userId,
      accountNumber: await this.uniqueAccountNumber(now),
      accountType: request.accountType ?? AccountType.SAVINGS,
      balance: 0,
      status: AccountStatus.ACTIVE,
      currency: (request.currency ?? 'USD').toUpperCase(),
      overdraftLimit,
      openedAt: now,
    });

    log.info({ accountId: account.accountId, userId: account.userId }, 'Account opened');

    if (request.initialDeposit && request.initialDeposit > 0) {
      await this.credit(account.accountId, {
        amount: request.initialDeposit,
        description: 'Initial deposit',
        operationId: `${account.accountId}:OPENING`,
      });
      return this.getAccount(account.accountId);
    }

    return account;
  }

  async getAccount(accountId: string): Promise<AccountRecord> {
    const account = await this.repository.findById(accountId);
    if (!account) {
      throw ApiError.accountNotFound(accountId);
    }
    return { ...account, balance: roundMoney(account.balance) };
  }

  async getBalance(accountId: string): Promise<AccountBalance> {
    const account = await this.getAccount(accountId);
    return {
      accountId,
      balance: account.balance,
      availableBalance: roundMoney(account.balance + account.overdraftLimit),
      currency: account.currency,
    };
  }

  /**
   * Subtracts the amount when the account is ACTIVE and balance plus
   * overdraft covers it
   */
  async debit(accountId: string, command: MovementCommand): Promise<OperationResult> {
    return this.applyMovement(accountId, 'DEBIT', command);
  }

  async credit(accountId: string, command: MovementCommand): Promise<OperationResult> {
    return this.applyMovement(accountId, 'CREDIT', command);
  }

  async closeAccount(accountId: string): Promise<AccountRecord> {
    const account = await this.getAccount(accountId);
    if (account.status === AccountStatus.CLOSED) {
      throw ApiError.invalidOperation(`Account ${accountId} is already closed`);
    }

    const closed = await this.repository.close(accountId, this.clock());
    if (!closed) {
      throw ApiError.invalidOperation(`Account ${accountId} is already closed`);
    }

    log.info({ accountId }, 'Account closed');
    return closed;
  }

  async getOperations(accountId: string, limit = 20): Promise<AccountOperationRecord[]> {
    await this.getAccount(accountId);
    return this.repository.listOperations(accountId, limit);
  }

  /**
   * The operation id is claimed before the balance moves. A caller that loses
   * the claim replays the recorded result, or gets 409 while the winner is
   * still applying it.
   */
  private async applyMovement(
    accountId: string,
    type: AccountOperationType,
    command: MovementCommand
  ): Promise<OperationResult> {
    const operationId = command.operationId ?? `op_${crypto.randomUUID().replace(/-/g, '')}`;

    const existing = await this.repository.findOperation(operationId);
    if (existing) {
      return this.replay(existing, accountId, type);
    }

    if (!Number.isFinite(command.amount) || command.amount <= 0 || !hasAtMostTwoDecimals(command.amount)) {
      throw new ApiError(ErrorCode.INVALID_AMOUNT, 'Amount must be positive with at most 2 decimal places');
    }
    const amount = roundMoney(command.amount);

    const claimed = await this.repository.claimOperation({
      operationId,
      accountId,
      type,
      amount,
      description: command.description,
    });
    if (!claimed) {
      const holder = await this.repository.findOperation(operationId);
      if (!holder) {
        throw operationInProgress(operationId);
      }
      return this.replay(holder, accountId, type);
    }

    const updated =
      type === 'DEBIT'
        ? await this.repository.applyDebit(accountId, amount)
        : await this.repository.applyCredit(accountId, amount);

    if (!updated) {
      await this.repository.releaseOperation(operationId);
      throw await this.explainRejection(accountId, type, amount);
    }

    const operation = await this.repository.completeOperation(operationId, roundMoney(updated.balance));
    if (!operation) {
      throw ApiError.internal(`Operation ${operationId} was applied but its record is gone`);
    }

    accountOperationsTotal.inc({ operation: type.toLowerCase(), result: 'applied' });
    log.info(
      { accountId, operationId, type, amount, balance: operation.resultBalance },
      'Account operation applied'
    );
    return toResult(operation, false);
  }

  private replay(
    existing: AccountOperationRecord,
    accountId: string,
    type: AccountOperationType
  ): OperationResult {
    const { operationId } = existing;
    if (existing.accountId !== accountId || existing.type !== type) {
      throw new ApiError(
        ErrorCode.DUPLICATE_TRANSACTION,
        `Operation ${operationId} was already used for a ${existing.type} on account ${existing.accountId}`
      );
    }
    if (existing.status === 'PENDING') {
      throw operationInProgress(operationId);
    }
    accountOperationsTotal.inc({ operation: type.toLowerCase(), result: 'replayed' });
    log.debug({ accountId, operationId }, 'Replaying recorded account operation');
    return toResult(existing, true);
  }

  /**
   * The guarded update matched nothing: work out which guard failed
   */
  private async explainRejection(
    accountId: string,
    type: AccountOperationType,
    amount: number
  ): Promise<ApiError> {
    const account = await this.repository.findById(accountId);
    if (!account) {
      return ApiError.accountNotFound(accountId);
    }
    if (account.status !== AccountStatus.ACTIVE) {
      return ApiError.accountInactive(accountId, account.status);
    }
    log.warn({ accountId, type, amount, balance: account.balance }, 'Insufficient funds');
    return ApiError.insufficientBalance(
      `Insufficient funds in account ${accountId}: available ${roundMoney(
        account.balance + account.overdraftLimit
      )}, requested ${amount}`
    );
  }

  private async uniqueAccountNumber(now: Date): Promise<string> {
    for (let attempt = 0; attempt < ACCOUNT_NUMBER_ATTEMPTS; attempt += 1) {
      const candidate = generateAccountNumber(now);
      if (!(await this.repository.existsByAccountNumber(candidate))) {
        return candidate;
      }
    }
    throw ApiError.internal('Could not allocate a unique account number');
  }
}
