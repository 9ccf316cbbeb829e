import crypto from 'crypto';

import { config } from '../../config';
import { IAccountServiceClient, MovementRequest } from '../../clients/accountService.types';
import { ApiError } from '../../middlewares/errorHandler';
import {
  addLogContext,
  createServiceLogger,
  traceTransaction,
  transactionAmount,
  transactionProcessingDuration,
  transactionsTotal,
} from '../../observability';
import { ITransactionRepository } from '../../repositories/interfaces/ITransactionRepository';
import { ErrorCode } from '../../types/errors';
import {
  PageRequest,
  TransactionChanges,
  TransactionFilter,
  TransactionRecord,
  TransactionStatus,
  TransactionType,
  parseTransactionType,
} from '../../types/transaction';
import { hasAtMostTwoDecimals, roundMoney } from '../../utils/money';
import {
  PagedResponse,
  TransactionResponse,
  TransactionSummary,
  generateReference,
  toPagedResponse,
  toTransactionResponse,
  toTransactionSummary,
} from './transaction.mapper';
import { totalAmount, validateTransactionShape } from './transaction.rules';
import {
  canCancel,
  canRetry,
  canReverse,
  isTerminalState,
  validateTransition,
} from './transaction.state';
import {
  AccountTransactionStatistics,
  BulkTransactionResponse,
  CleanupResult,
  CreateTransactionRequest,
  ProcessPendingResult,
  TransactionQuery,
  TransactionStatistics,
  TransactionValidationResponse,
  UpdateTransactionRequest,
} from './transaction.types';

const log = createServiceLogger('transaction-service');

const ERROR_MESSAGE_MAX = 1000;

export interface TransactionServiceOptions {
  /** process right after creation instead of leaving it to the scheduler */
  processImmediately: boolean;
  pendingTimeoutHours: number;
  defaultCurrency: string;
  bulkMaxSize: number;
  clock: () => Date;
}

/**
 * Validated, normalized creation input
 */
interface PreparedTransaction {
  transactionType: TransactionType;
  fromAccountId?: string;
  toAccountId?: string;
  amount: number;
  fee: number;
  currency: string;
  reference: string;
  description?: string;
}

const blankToUndefined = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const truncate = (message: string): string =>
  message.length > ERROR_MESSAGE_MAX ? `${message.substring(0, ERROR_MESSAGE_MAX - 3)}...` : message;

const withDescription = (prefix: string, description?: string): string =>
  description ? `${prefix} - ${description}` : prefix;

const requireAccount = (accountId: string | undefined, side: 'source' | 'destination', transactionId: string): string => {
  if (!accountId) {
    throw ApiError.invalidOperation(`Transaction ${transactionId} has no ${side} account`);
  }
  return accountId;
};

export class TransactionService {
  private readonly options: TransactionServiceOptions;

  constructor(
    private readonly repository: ITransactionRepository,
    private readonly accounts: IAccountServiceClient,
    options: Partial<TransactionServiceOptions> = {}
  ) {
    this.options = {
      processImmediately: config.transaction.processImmediately,
      pendingTimeoutHours: config.transaction.pendingTimeoutHours,
      defaultCurrency: config.transaction.defaultCurrency,
      bulkMaxSize: config.transaction.bulkMaxSize,
      clock: () => new Date(),
      ...options,
    };
  }

  // ===========================================================================
  // Creation
  // ===========================================================================

  /**
   * Validate, persist as PENDING and (by default) process right away.
   * A movement failure does not throw: the transaction comes back FAILED.
   */
  async createTransaction(
    request: CreateTransactionRequest,
    actor?: string
  ): Promise<TransactionResponse> {
    log.info(
      {
        transactionType: request.transactionType,
        fromAccountId: request.fromAccountId,
        toAccountId: request.toAccountId,
        amount: request.amount,
      },
      'Creating transaction'
    );

    const prepared = await this.prepare(request);

    const created = await this.repository.create({
      transactionId: `txn_${crypto.randomUUID().replace(/-/g, '')}`,
      reference: prepared.reference,
      fromAccountId: prepared.fromAccountId,
      toAccountId: prepared.toAccountId,
      amount: prepared.amount,
      fee: prepared.fee,
      currency: prepared.currency,
      transactionType: prepared.transactionType,
      status: TransactionStatus.PENDING,
      description: prepared.description,
      attempts: 0,
      createdBy: actor,
      updatedBy: actor,
    });

    addLogContext({ transactionId: created.transactionId });
    transactionsTotal.inc({ status: TransactionStatus.PENDING });
    transactionAmount.observe({ type: created.transactionType }, created.amount);
    log.info(
      { transactionId: created.transactionId, reference: created.reference },
      'Transaction created'
    );

    if (!this.options.processImmediately) {
      return toTransactionResponse(created);
    }

    return toTransactionResponse(await this.runProcessing(created, actor));
  }

  /**
   * Runs the creation checks without persisting anything
   */
  async validateTransaction(
    request: CreateTransactionRequest
  ): Promise<TransactionValidationResponse> {
    try {
      await this.prepare(request);
      return { valid: true, message: 'Transaction is valid' };
    } catch (error) {
      if (error instanceof ApiError) {
        return { valid: false, message: error.message, errorCode: ErrorCode[error.errorCode] };
      }
      throw error;
    }
  }

  /**
   * Creates each request in order. Rejected requests are reported, not thrown.
   */
  async createBulkTransactions(
    requests: CreateTransactionRequest[],
    actor?: string
  ): Promise<BulkTransactionResponse> {
    if (requests.length > this.options.bulkMaxSize) {
      throw ApiError.validationError(
        `A bulk request may contain at most ${this.options.bulkMaxSize} transactions`
      );
    }

    const response: BulkTransactionResponse = {
      successfulTransactions: [],
      failedTransactions: [],
      totalProcessed: requests.length,
      successCount: 0,
      failureCount: 0,
    };

    for (const [index, request] of requests.entries()) {
      try {
        response.successfulTransactions.push(await this.createTransaction(request, actor));
      } catch (error) {
        if (!(error instanceof ApiError)) {
          log.error({ err: error, index }, 'Unexpected error in bulk transaction');
        }
        response.failedTransactions.push({
          index,
          request,
          errorMessage: messageOf(error),
          errorCode: ErrorCode[error instanceof ApiError ? error.errorCode : ErrorCode.INTERNAL_ERROR],
        });
      }
    }

    response.successCount = response.successfulTransactions.length;
    response.failureCount = response.failedTransactions.length;
    log.info(
      { total: response.totalProcessed, succeeded: response.successCount, failed: response.failureCount },
      'Bulk transactions processed'
    );
    return response;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  async getTransactionById(transactionId: string): Promise<TransactionResponse> {
    return toTransactionResponse(await this.getRecord(transactionId));
  }

  async getTransactionByReference(reference: string): Promise<TransactionResponse> {
    const record = await this.repository.findByReference(reference);
    if (!record) {
      throw ApiError.transactionNotFound(`Transaction not found with reference: ${reference}`);
    }
    return toTransactionResponse(record);
  }

  async listTransactions(
    query: TransactionQuery,
    pageRequest: PageRequest
  ): Promise<PagedResponse<TransactionResponse>> {
    const filter: TransactionFilter = {
      status: query.status,
      transactionType: query.transactionType,
    };
    const page = await this.repository.findPage(filter, pageRequest);
    return toPagedResponse(page, pageRequest, toTransactionResponse);
  }

  async getTransactionsByDateRange(startDate: Date, endDate: Date): Promise<TransactionResponse[]> {
    this.assertRange(startDate, endDate);
    const records = await this.repository.findAll({ createdFrom: startDate, createdTo: endDate });
    return records.map(toTransactionResponse);
  }

  async getTransactionsByAccount(accountId: string): Promise<TransactionSummary[]> {
    await this.ensureAccountExists(accountId);
    const records = await this.repository.findAll({ accountId });
    return records.map((record) => toTransactionSummary(record, accountId));
  }

  async getTransactionsByAccountPaged(
    accountId: string,
    pageRequest: PageRequest
  ): Promise<PagedResponse<TransactionSummary>> {
    await this.ensureAccountExists(accountId);
    const page = await this.repository.findPage({ accountId }, pageRequest);
    return toPagedResponse(page, pageRequest, (record) => toTransactionSummary(record, accountId));
  }

  async getAccountTransactionsByDateRange(
    accountId: string,
    startDate: Date,
    endDate: Date
  ): Promise<TransactionSummary[]> {
    this.assertRange(startDate, endDate);
    await this.ensureAccountExists(accountId);
    const records = await this.repository.findAll({
      accountId,
      createdFrom: startDate,
      createdTo: endDate,
    });
    return records.map((record) => toTransactionSummary(record, accountId));
  }

  async getTransactionStatistics(): Promise<TransactionStatistics> {
    const counts = await this.repository.countByStatus();
    const total = Object.values(counts).reduce((sum, count) => sum + count, 0);
    const completed = counts[TransactionStatus.COMPLETED];

    return {
      totalTransactions: total,
      completedTransactions: completed,
      pendingTransactions: counts[TransactionStatus.PENDING],
      processingTransactions: counts[TransactionStatus.PROCESSING],
      failedTransactions: counts[TransactionStatus.FAILED],
      cancelledTransactions: counts[TransactionStatus.CANCELLED],
      reversedTransactions: counts[TransactionStatus.REVERSED],
      successRate: total === 0 ? 0 : roundMoney((completed / total) * 100),
    };
  }

  /**
   * Net amount covers COMPLETED transactions created in the current UTC month
   */
  async getAccountTransactionStatistics(accountId: string): Promise<AccountTransactionStatistics> {
    await this.ensureAccountExists(accountId);

    const now = this.options.clock();
    const monthStart = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
    const nextMonthStart = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() + 1, 1));

    const [totalTransactions, netAmountThisMonth, largestTransaction] = await Promise.all([
      this.repository.count({ accountId }),
      this.repository.sumNetAmountForAccount(accountId, monthStart, nextMonthStart),
      this.repository.findLargestCompletedAmount(accountId),
    ]);

    return { accountId, totalTransactions, netAmountThisMonth, largestTransaction };
  }

  // ===========================================================================
  // Manual operations
  // ===========================================================================

  async updateTransaction(
    transactionId: string,
    request: UpdateTransactionRequest,
    actor?: string
  ): Promise<TransactionResponse> {
    const record = await this.getRecord(transactionId);

    if (isTerminalState(record.status)) {
      throw ApiError.invalidOperation(`Cannot update transaction in ${record.status} state`);
    }

    const changes: TransactionChanges = { updatedBy: actor };

    if (request.description !== undefined) {
      changes.description = request.description.trim() || null;
    }

    if (request.fee !== undefined) {
      if (record.status !== TransactionStatus.PENDING) {
        throw ApiError.invalidOperation('Fee can only be changed while the transaction is pending');
      }
      const fee = this.checkMoney(request.fee, 'Fee', 0);
      if (
        record.fromAccountId &&
        !(await this.accounts.canDebit(record.fromAccountId, totalAmount({ amount: record.amount, fee })))
      ) {
        throw ApiError.invalidOperation('Source account cannot be debited');
      }
      changes.fee = fee;
    }

    const updated = await this.repository.updateIfStatus(transactionId, record.status, changes);
    if (!updated) {
      throw ApiError.concurrentModification(transactionId);
    }

    log.info({ transactionId, fields: Object.keys(request) }, 'Transaction updated');
    return toTransactionResponse(updated);
  }

  async cancelTransaction(transactionId: string, actor?: string): Promise<TransactionResponse> {
    const record = await this.getRecord(transactionId);

    if (!canCancel(record.status)) {
      throw ApiError.invalidOperation(`Cannot cancel transaction in ${record.status} state`);
    }

    const cancelled = await this.transition(record, TransactionStatus.CANCELLED, {
      processedAt: this.options.clock(),
      updatedBy: actor,
    });
    log.info({ transactionId }, 'Transaction cancelled');
    return toTransactionResponse(cancelled);
  }

  /**
   * FAILED → PENDING, then processed again as a new attempt
   */
  async retryTransaction(transactionId: string, actor?: string): Promise<TransactionResponse> {
    const record = await this.getRecord(transactionId);

    if (!canRetry(record.status)) {
      throw ApiError.invalidOperation(
        `Can only retry failed transactions. Current status: ${record.status}`
      );
    }

    const pending = await this.transition(record, TransactionStatus.PENDING, {
      errorMessage: null,
      processedAt: null,
      updatedBy: actor,
    });
    log.info({ transactionId, attempt: pending.attempts + 1 }, 'Retrying transaction');

    return toTransactionResponse(await this.runProcessing(pending, actor));
  }

  /**
   * Applies the opposite movement of a COMPLETED transaction. Reversal calls
   * use fixed operation ids, so a reverse that failed half-way can be repeated
   * without moving money twice. On failure the transaction stays COMPLETED.
   */
  async reverseTransaction(
    transactionId: string,
    reason?: string,
    actor?: string
  ): Promise<TransactionResponse> {
    const record = await this.getRecord(transactionId);

    if (!canReverse(record.status)) {
      throw ApiError.invalidOperation(
        `Can only reverse completed transactions. Current status: ${record.status}`
      );
    }

    try {
      await traceTransaction(transactionId, 'reverse', () => this.undoMovement(record));
    } catch (error) {
      log.error(
        { transactionId, err: error },
        'Reversal failed; transaction left COMPLETED, repeat the reverse to finish it'
      );
      throw error;
    }

    const reversed = await this.transition(record, TransactionStatus.REVERSED, {
      reversedAt: this.options.clock(),
      reversalReason: blankToUndefined(reason),
      updatedBy: actor,
    });
    log.info({ transactionId }, 'Transaction reversed');
    return toTransactionResponse(reversed);
  }

  // ===========================================================================
  // Maintenance
  // ===========================================================================

  /**
   * Processes every PENDING transaction, newest first. One failure does not
   * stop the batch.
   */
  async processPendingTransactions(actor?: string): Promise<ProcessPendingResult> {
    const pending = await this.repository.findAll({ status: TransactionStatus.PENDING });
    const result: ProcessPendingResult = { examined: pending.length, completed: 0, failed: 0, skipped: 0 };

    for (const record of pending) {
      try {
        const processed = await this.runProcessing(record, actor);
        if (processed.status === TransactionStatus.COMPLETED) {
          result.completed += 1;
        } else {
          result.failed += 1;
        }
      } catch (error) {
        result.skipped += 1;
        log.error(
          { transactionId: record.transactionId, err: error },
          'Failed to process pending transaction'
        );
      }
    }

    log.info(result, 'Processed pending transactions');
    return result;
  }

  /**
   * Fails PENDING transactions created before the pending timeout, and
   * PROCESSING ones whose processing started that long ago and never finished
   */
  async cleanupOldPendingTransactions(actor?: string): Promise<CleanupResult> {
    const now = this.options.clock();
    const hours = this.options.pendingTimeoutHours;
    const cutoff = new Date(now.getTime() - hours * 60 * 60 * 1000);

    const [stalePending, stuckProcessing] = await Promise.all([
      this.repository.findAll({ status: TransactionStatus.PENDING, createdBefore: cutoff }),
      this.repository.findAll({ status: TransactionStatus.PROCESSING, updatedBefore: cutoff }),
    ]);
    const stale = [...stalePending, ...stuckProcessing];
    const result: CleanupResult = { examined: stale.length, timedOut: 0, skipped: 0 };

    for (const record of stale) {
      // a stuck PROCESSING record may have moved money before it stopped
      const errorMessage =
        record.status === TransactionStatus.PROCESSING
          ? `Transaction timeout - processing for more than ${hours} hours; check account operations before retrying`
          : `Transaction timeout - pending for more than ${hours} hours`;
      try {
        await this.transition(record, TransactionStatus.FAILED, {
          errorMessage,
          processedAt: now,
          updatedBy: actor,
        });
        result.timedOut += 1;
        log.warn(
          { transactionId: record.transactionId, status: record.status },
          'Marked stale transaction as failed'
        );
      } catch (error) {
        result.skipped += 1;
        log.error(
          { transactionId: record.transactionId, err: error },
          'Failed to time out pending transaction'
        );
      }
    }

    log.info({ ...result, cutoff }, 'Cleaned up stale pending transactions');
    return result;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async prepare(request: CreateTransactionRequest): Promise<PreparedTransaction> {
    const transactionType = parseTransactionType(request.transactionType);
    if (!transactionType) {
      throw ApiError.invalidOperation(`Unsupported transaction type: ${request.transactionType}`);
    }

    const fromAccountId = blankToUndefined(request.fromAccountId);
    const toAccountId = blankToUndefined(request.toAccountId);
    validateTransactionShape({ transactionType, fromAccountId, toAccountId });

    const amount = this.checkMoney(request.amount, 'Amount', 0.01);
    const fee = this.checkMoney(request.fee ?? 0, 'Fee', 0);
    const currency = (blankToUndefined(request.currency) ?? this.options.defaultCurrency).toUpperCase();

    const reference = generateReference(request.externalReference, this.options.clock().getTime());
    if (await this.repository.existsByReference(reference)) {
      throw ApiError.duplicateTransaction(`Transaction with reference ${reference} already exists`);
    }

    await this.validateTransactionAccounts(fromAccountId, toAccountId, totalAmount({ amount, fee }));

    return {
      transactionType,
      fromAccountId,
      toAccountId,
      amount,
      fee,
      currency,
      reference,
      description: blankToUndefined(request.description),
    };
  }

  private async validateTransactionAccounts(
    fromAccountId: string | undefined,
    toAccountId: string | undefined,
    total: number
  ): Promise<void> {
    if (fromAccountId && !(await this.accounts.canDebit(fromAccountId, total))) {
      throw ApiError.invalidOperation('Source account cannot be debited');
    }
    if (toAccountId && !(await this.accounts.canCredit(toAccountId))) {
      throw ApiError.invalidOperation('Destination account cannot be credited');
    }
  }

  private checkMoney(value: number, field: string, minimum: number): number {
    if (!Number.isFinite(value) || value < minimum) {
      throw new ApiError(ErrorCode.INVALID_AMOUNT, `${field} must be at least ${minimum}`);
    }
    if (!hasAtMostTwoDecimals(value)) {
      throw new ApiError(ErrorCode.INVALID_AMOUNT, `${field} must have at most 2 decimal places`);
    }
    return roundMoney(value);
  }

  /**
   * PENDING → PROCESSING → COMPLETED | FAILED. Movement errors end in FAILED;
   * only persistence and transition errors are thrown.
   */
  private async runProcessing(record: TransactionRecord, actor?: string): Promise<TransactionRecord> {
    const processing = await this.transition(record, TransactionStatus.PROCESSING, {
      attempts: record.attempts + 1,
      updatedBy: actor,
    });
    const started = process.hrtime.bigint();
    const elapsed = () => Number(process.hrtime.bigint() - started) / 1e9;

    try {
      await traceTransaction(processing.transactionId, 'process', () => this.moveMoney(processing));
    } catch (error) {
      transactionProcessingDuration.observe({ outcome: 'failed' }, elapsed());
      log.warn(
        { transactionId: processing.transactionId, attempt: processing.attempts, error: messageOf(error) },
        'Transaction processing failed'
      );
      return this.transition(processing, TransactionStatus.FAILED, {
        errorMessage: truncate(messageOf(error)),
        processedAt: this.options.clock(),
        updatedBy: actor,
      });
    }

    transactionProcessingDuration.observe({ outcome: 'completed' }, elapsed());
    log.info(
      { transactionId: processing.transactionId, attempt: processing.attempts },
      'Transaction completed'
    );
    return this.transition(processing, TransactionStatus.COMPLETED, {
      errorMessage: null,
      processedAt: this.options.clock(),
      updatedBy: actor,
    });
  }

  private async moveMoney(record: TransactionRecord): Promise<void> {
    const { transactionId, amount, description } = record;
    const total = totalAmount(record);
    const step = (name: string): string => `${record.reference}:${record.attempts}:${name}`;

    switch (record.transactionType) {
      case TransactionType.DEPOSIT: {
        const to = requireAccount(record.toAccountId, 'destination', transactionId);
        await this.accounts.creditAccount(to, {
          amount,
          description: withDescription('Deposit', description),
          operationId: step('CREDIT'),
        });
        return;
      }

      case TransactionType.WITHDRAWAL: {
        const from = requireAccount(record.fromAccountId, 'source', transactionId);
        await this.accounts.debitAccount(from, {
          amount: total,
          description: withDescription('Withdrawal', description),
          operationId: step('DEBIT'),
        });
        return;
      }

      case TransactionType.TRANSFER: {
        const from = requireAccount(record.fromAccountId, 'source', transactionId);
        const to = requireAccount(record.toAccountId, 'destination', transactionId);
        await this.accounts.debitAccount(from, {
          amount: total,
          description: withDescription(`Transfer to account ${to}`, description),
          operationId: step('DEBIT'),
        });
        try {
          await this.accounts.creditAccount(to, {
            amount,
            description: withDescription(`Transfer from account ${from}`, description),
            operationId: step('CREDIT'),
          });
        } catch (creditError) {
          throw await this.compensateTransfer(record, from, total, creditError, {
            amount: total,
            description: `Refund of failed transfer ${record.reference}`,
            operationId: step('COMPENSATE'),
          });
        }
        return;
      }

      case TransactionType.PAYMENT: {
        const from = requireAccount(record.fromAccountId, 'source', transactionId);
        await this.accounts.debitAccount(from, {
          amount: total,
          description: withDescription('Payment', description),
          operationId: step('DEBIT'),
        });
        return;
      }

      case TransactionType.REFUND: {
        const to = requireAccount(record.toAccountId, 'destination', transactionId);
        await this.accounts.creditAccount(to, {
          amount,
          description: withDescription('Refund', description),
          operationId: step('CREDIT'),
        });
        return;
      }

      default: {
        const unknownType: never = record.transactionType;
        throw ApiError.invalidOperation(`Unsupported transaction type: ${String(unknownType)}`);
      }
    }
  }

  /**
   * The debit of a transfer went through but the credit did not: give the
   * money back to the source. Returns the error the attempt fails with.
   */
  private async compensateTransfer(
    record: TransactionRecord,
    from: string,
    total: number,
    creditError: unknown,
    refund: MovementRequest
  ): Promise<Error> {
    const reason = messageOf(creditError);

    try {
      await this.accounts.creditAccount(from, refund);
      log.warn(
        { transactionId: record.transactionId, from, amount: total },
        'Transfer credit failed; source account refunded'
      );
      return new Error(`${reason} (source account ${from} refunded)`);
    } catch (refundError) {
      log.error(
        {
          transactionId: record.transactionId,
          from,
          amount: total,
          operationId: refund.operationId,
          err: refundError,
        },
        'Transfer credit failed and the refund to the source failed; manual intervention required'
      );
      return new Error(
        `${reason} (refund to source account ${from} failed: ${messageOf(refundError)}; manual intervention required)`
      );
    }
  }

  private async undoMovement(record: TransactionRecord): Promise<void> {
    const { transactionId, amount, reference } = record;
    const total = totalAmount(record);
    const description = `Reversal of ${reference}`;

    const debitDestination = async (): Promise<void> => {
      const to = requireAccount(record.toAccountId, 'destination', transactionId);
      await this.accounts.debitAccount(to, {
        amount,
        description,
        operationId: `${reference}:REVERSAL:DEBIT`,
      });
    };

    const creditSource = async (): Promise<void> => {
      const from = requireAccount(record.fromAccountId, 'source', transactionId);
      await this.accounts.creditAccount(from, {
        amount: total,
        description,
        operationId: `${reference}:REVERSAL:CREDIT`,
      });
    };

    switch (record.transactionType) {
      case TransactionType.DEPOSIT:
      case TransactionType.REFUND:
        await debitDestination();
        return;
      case TransactionType.WITHDRAWAL:
      case TransactionType.PAYMENT:
        await creditSource();
        return;
      case TransactionType.TRANSFER:
        await debitDestination();
        await creditSource();
        return;
      default: {
        const unknownType: never = record.transactionType;
        throw ApiError.invalidOperation(`Unsupported transaction type: ${String(unknownType)}`);
      }
    }
  }

  /**
   * Checked compare-and-set status change
   */
  private async transition(
    record: TransactionRecord,
    next: TransactionStatus,
    changes: TransactionChanges
  ): Promise<TransactionRecord> {
    validateTransition(record.status, next, record.transactionId);

    const updated = await this.repository.updateIfStatus(record.transactionId, record.status, {
      ...changes,
      status: next,
    });
    if (!updated) {
      throw ApiError.concurrentModification(record.transactionId);
    }

    transactionsTotal.inc({ status: next });
    log.debug(
      { transactionId: record.transactionId, from: record.status, to: next },
      'Transaction status changed'
    );
    return updated;
  }

  private async getRecord(transactionId: string): Promise<TransactionRecord> {
    const record = await this.repository.findById(transactionId);
    if (!record) {
      throw ApiError.transactionNotFound(`Transaction not found with id: ${transactionId}`);
    }
    addLogContext({ transactionId });
    return record;
  }

  private async ensureAccountExists(accountId: string): Promise<void> {
    await this.accounts.getAccount(accountId);
  }

  private assertRange(startDate: Date, endDate: Date): void {
    if (startDate.getTime() > endDate.getTime()) {
      throw ApiError.validationError('Start date must not be after end date');
    }
  }
}
