/**
 * Transaction Service Unit Tests
 *
 * Repository and account client are mocked; these cover the orchestration
 * the in-memory integration suite cannot force, such as lost
 * compare-and-set races.
 */

import { TransactionService } from '../../../src/services/transaction/transaction.service';
import { ApiError } from '../../../src/middlewares/errorHandler';
import { ErrorCode } from '../../../src/types/errors';
import {
  TransactionChanges,
  TransactionRecord,
  TransactionStatus,
  TransactionType,
} from '../../../src/types/transaction';
import { createMockAccountClient, createMockTransactionRepository } from '../../helpers';

const NOW = new Date('2024-06-15T12:00:00.000Z');

const buildRecord = (overrides: Partial<TransactionRecord> = {}): TransactionRecord => ({
  transactionId: 'txn_1',
  reference: 'TXN-REF-1',
  fromAccountId: 'acc_from',
  amount: 25,
  fee: 0,
  currency: 'USD',
  transactionType: TransactionType.PAYMENT,
  status: TransactionStatus.PENDING,
  attempts: 0,
  createdAt: NOW,
  updatedAt: NOW,
  ...overrides,
});

const applied = (record: TransactionRecord, changes: TransactionChanges): TransactionRecord => ({
  ...record,
  status: changes.status ?? record.status,
  attempts: changes.attempts ?? record.attempts,
  errorMessage: changes.errorMessage ?? undefined,
});

describe('TransactionService', () => {
  let repository: ReturnType<typeof createMockTransactionRepository>;
  let accounts: ReturnType<typeof createMockAccountClient>;
  let service: TransactionService;

  beforeEach(() => {
    repository = createMockTransactionRepository();
    accounts = createMockAccountClient();
    service = new TransactionService(repository, accounts, {
      processImmediately: true,
      pendingTimeoutHours: 24,
      defaultCurrency: 'USD',
      bulkMaxSize: 50,
      clock: () => NOW,
    });
  });

  describe('createTransaction', () => {
    it('should persist PENDING and move through PROCESSING to COMPLETED', async () => {
      const record = buildRecord();
      accounts.canDebit.mockResolvedValue(true);
      repository.existsByReference.mockResolvedValue(false);
      repository.create.mockResolvedValue(record);
      repository.updateIfStatus.mockImplementation(async (_id, _expected, changes) =>
        applied(record, changes)
      );
      accounts.debitAccount.mockResolvedValue({
        operationId: 'TXN-REF-1:1:DEBIT',
        accountId: 'acc_from',
        type: 'DEBIT',
        amount: 25,
        resultBalance: 75,
        replayed: false,
      });

      const result = await service.createTransaction({
        transactionType: 'payment',
        fromAccountId: ' acc_from ',
        amount: 25,
        externalReference: 'REF-1',
      });

      expect(result.status).toBe(TransactionStatus.COMPLETED);
      expect(accounts.canDebit).toHaveBeenCalledWith('acc_from', 25);
      expect(repository.create).toHaveBeenCalledWith(
        expect.objectContaining({
          reference: 'TXN-REF-1',
          fromAccountId: 'acc_from',
          toAccountId: undefined,
          status: TransactionStatus.PENDING,
          attempts: 0,
        })
      );
      expect(repository.updateIfStatus.mock.calls.map(([, expected, changes]) => [expected, changes.status])).toEqual([
        [TransactionStatus.PENDING, TransactionStatus.PROCESSING],
        [TransactionStatus.PROCESSING, TransactionStatus.COMPLETED],
      ]);
      expect(repository.updateIfStatus.mock.calls[0][2].attempts).toBe(1);
    });

    it('should not touch the repository when validation fails', async () => {
      accounts.canDebit.mockResolvedValue(false);
      repository.existsByReference.mockResolvedValue(false);

      await expect(
        service.createTransaction({ transactionType: 'PAYMENT', fromAccountId: 'acc_from', amount: 25 })
      ).rejects.toMatchObject({ message: 'Source account cannot be debited' });
      expect(repository.create).not.toHaveBeenCalled();
    });

    it('should propagate a lost race on the processing transition', async () => {
      const record = buildRecord();
      accounts.canDebit.mockResolvedValue(true);
      repository.existsByReference.mockResolvedValue(false);
      repository.create.mockResolvedValue(record);
      repository.updateIfStatus.mockResolvedValue(null);

      await expect(
        service.createTransaction({ transactionType: 'PAYMENT', fromAccountId: 'acc_from', amount: 25 })
      ).rejects.toMatchObject({
        errorCode: ErrorCode.CONCURRENT_MODIFICATION,
        message: 'Transaction txn_1 was modified concurrently, reload and try again',
      });
      expect(accounts.debitAccount).not.toHaveBeenCalled();
    });
  });

  describe('cancelTransaction', () => {
    it('should fail with CONCURRENT_MODIFICATION when the status moved on', async () => {
      repository.findById.mockResolvedValue(buildRecord());
      repository.updateIfStatus.mockResolvedValue(null);

      const error = await service.cancelTransaction('txn_1').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ errorCode: ErrorCode.CONCURRENT_MODIFICATION, statusCode: 409 });
      expect(repository.updateIfStatus).toHaveBeenCalledWith('txn_1', TransactionStatus.PENDING, {
        processedAt: NOW,
        updatedBy: undefined,
        status: TransactionStatus.CANCELLED,
      });
    });
  });

  describe('createBulkTransactions', () => {
    it('should report unexpected errors as INTERNAL_ERROR and continue', async () => {
      repository.existsByReference.mockRejectedValueOnce(new Error('connection reset'));
      repository.existsByReference.mockResolvedValue(true);

      const result = await service.createBulkTransactions([
        { transactionType: 'DEPOSIT', toAccountId: 'acc_to', amount: 1 },
        { transactionType: 'DEPOSIT', toAccountId: 'acc_to', amount: 2, externalReference: 'X' },
      ]);

      expect(result.failedTransactions.map(({ index, errorCode, errorMessage }) => ({ index, errorCode, errorMessage }))).toEqual([
        { index: 0, errorCode: 'INTERNAL_ERROR', errorMessage: 'connection reset' },
        { index: 1, errorCode: 'DUPLICATE_TRANSACTION', errorMessage: 'Transaction with reference TXN-X already exists' },
      ]);
      expect(result.successCount).toBe(0);
    });
  });

  describe('processPendingTransactions', () => {
    it('should skip transactions another worker claimed first', async () => {
      repository.findAll.mockResolvedValue([
        buildRecord({ transactionId: 'txn_claimed' }),
        buildRecord({ transactionId: 'txn_free', reference: 'TXN-REF-2' }),
      ]);
      repository.updateIfStatus.mockImplementation(async (id, _expected, changes) =>
        id === 'txn_claimed' ? null : applied(buildRecord({ transactionId: id }), changes)
      );
      accounts.debitAccount.mockRejectedValue(ApiError.externalService('Account Service unavailable'));

      const result = await service.processPendingTransactions('system-scheduler');

      expect(result).toEqual({ examined: 2, completed: 0, failed: 1, skipped: 1 });
      expect(repository.findAll).toHaveBeenCalledWith({ status: TransactionStatus.PENDING });
    });
  });

  describe('cleanupOldPendingTransactions', () => {
    it('should look for PENDING and stuck PROCESSING transactions before the cutoff', async () => {
      repository.findAll.mockResolvedValue([]);

      const result = await service.cleanupOldPendingTransactions();

      expect(result).toEqual({ examined: 0, timedOut: 0, skipped: 0 });
      expect(repository.findAll).toHaveBeenCalledWith({
        status: TransactionStatus.PENDING,
        createdBefore: new Date('2024-06-14T12:00:00.000Z'),
      });
      expect(repository.findAll).toHaveBeenCalledWith({
        status: TransactionStatus.PROCESSING,
        updatedBefore: new Date('2024-06-14T12:00:00.000Z'),
      });
    });
  });

  describe('getTransactionStatistics', () => {
    it('should derive totals and the success rate from status counts', async () => {
      repository.countByStatus.mockResolvedValue({
        [TransactionStatus.PENDING]: 1,
        [TransactionStatus.PROCESSING]: 0,
        [TransactionStatus.COMPLETED]: 5,
        [TransactionStatus.FAILED]: 1,
        [TransactionStatus.CANCELLED]: 0,
        [TransactionStatus.REVERSED]: 1,
      });

      const statistics = await service.getTransactionStatistics();

      expect(statistics.totalTransactions).toBe(8);
      expect(statistics.successRate).toBe(62.5);
    });
  });
});
