/**
 * Account Service Unit Tests
 */

import { AccountService, generateAccountNumber } from '../../../src/services/account/account.service';
import { AccountOperationRecord, AccountRecord, AccountStatus, AccountType } from '../../../src/types/account';
import { ErrorCode } from '../../../src/types/errors';
import { InMemoryAccountRepository, ManualClock, createMockAccountRepository } from '../../helpers';

describe('AccountService', () => {
  let clock: ManualClock;
  let repository: InMemoryAccountRepository;
  let service: AccountService;

  beforeEach(() => {
    clock = new ManualClock('2024-06-15T12:00:00.000Z');
    repository = new InMemoryAccountRepository(clock.now);
    service = new AccountService(repository, clock.now);
  });

  describe('generateAccountNumber', () => {
    it('should embed the UTC date and six digits', () => {
      expect(generateAccountNumber(new Date('2024-01-05T23:30:00.000Z'))).toMatch(/^ACC-20240105-\d{6}$/);
    });
  });

  describe('createAccount', () => {
    it('should open an active savings account in USD by default', async () => {
      const account = await service.createAccount({ userId: 'user_1' });

      expect(account.accountId).toMatch(/^acc_[0-9a-f]{24}$/);
      expect(account.accountNumber).toMatch(/^ACC-20240615-\d{6}$/);
      expect(account.accountType).toBe(AccountType.SAVINGS);
      expect(account.status).toBe(AccountStatus.ACTIVE);
      expect(account.currency).toBe('USD');
      expect(account.balance).toBe(0);
      expect(account.overdraftLimit).toBe(0);
      expect(account.openedAt).toEqual(clock.now());
    });

    it('should credit the initial deposit as an opening operation', async () => {
      const account = await service.createAccount({
        userId: 'user_1',
        accountType: AccountType.CHECKING,
        currency: 'eur',
        initialDeposit: 150.25,
      });

      expect(account.balance).toBe(150.25);
      expect(account.currency).toBe('EUR');
      const operations = await service.getOperations(account.accountId);
      expect(operations).toHaveLength(1);
      expect(operations[0]).toMatchObject({
        operationId: `${account.accountId}:OPENING`,
        type: 'CREDIT',
        amount: 150.25,
        resultBalance: 150.25,
        description: 'Initial deposit',
      });
    });

    it('should reject a negative overdraft limit', async () => {
      await expect(service.createAccount({ userId: 'user_1', overdraftLimit: -5 })).rejects.toMatchObject({
        errorCode: ErrorCode.VALIDATION_ERROR,
        message: 'Overdraft limit cannot be negative',
      });
    });
  });

  describe('getAccount / getBalance', () => {
    it('should report a missing account', async () => {
      await expect(service.getAccount('acc_missing')).rejects.toMatchObject({
        errorCode: ErrorCode.ACCOUNT_NOT_FOUND,
        message: 'Account not found with id: acc_missing',
      });
    });

    it('should include the overdraft in the available balance', async () => {
      const account = await service.createAccount({ userId: 'user_1', overdraftLimit: 50, initialDeposit: 20 });

      expect(await service.getBalance(account.accountId)).toEqual({
        accountId: account.accountId,
        balance: 20,
        availableBalance: 70,
        currency: 'USD',
      });
    });
  });

  describe('debit / credit', () => {
    it('should apply a debit and return the resulting balance', async () => {
      const account = await service.createAccount({ userId: 'user_1', initialDeposit: 100 });

      const result = await service.debit(account.accountId, { amount: 30.1, operationId: 'op-1' });

      expect(result).toEqual({
        operationId: 'op-1',
        accountId: account.accountId,
        type: 'DEBIT',
        amount: 30.1,
        resultBalance: 69.9,
        replayed: false,
      });
      expect((await service.getAccount(account.accountId)).balance).toBe(69.9);
    });

    it('should allow a debit into the overdraft', async () => {
      const account = await service.createAccount({ userId: 'user_1', overdraftLimit: 25, initialDeposit: 10 });

      const result = await service.debit(account.accountId, { amount: 35 });

      expect(result.resultBalance).toBe(-25);
      expect(result.operationId).toMatch(/^op_[0-9a-f]{32}$/);
    });

    it('should refuse a debit beyond balance plus overdraft', async () => {
      const account = await service.createAccount({ userId: 'user_1', overdraftLimit: 5, initialDeposit: 10 });

      await expect(service.debit(account.accountId, { amount: 15.01 })).rejects.toMatchObject({
        errorCode: ErrorCode.INSUFFICIENT_BALANCE,
        message: `Insufficient funds in account ${account.accountId}: available 15, requested 15.01`,
      });
      expect((await service.getAccount(account.accountId)).balance).toBe(10);
    });

    it('should replay an operation id instead of applying it twice', async () => {
      const account = await service.createAccount({ userId: 'user_1', initialDeposit: 100 });

      await service.debit(account.accountId, { amount: 40, operationId: 'op-1' });
      const replay = await service.debit(account.accountId, { amount: 40, operationId: 'op-1' });

      expect(replay.replayed).toBe(true);
      expect(replay.resultBalance).toBe(60);
      expect((await service.getAccount(account.accountId)).balance).toBe(60);
    });

    it('should apply an operation id once when two calls race', async () => {
      const account = await service.createAccount({ userId: 'user_1', initialDeposit: 500 });

      const results = await Promise.allSettled([
        service.debit(account.accountId, { amount: 100, operationId: 'op-1' }),
        service.debit(account.accountId, { amount: 100, operationId: 'op-1' }),
      ]);

      const applied = results.filter((result) => result.status === 'fulfilled' && !result.value.replayed);
      expect(applied).toHaveLength(1);
      for (const result of results) {
        if (result.status === 'rejected') {
          expect(result.reason).toMatchObject({
            errorCode: ErrorCode.CONCURRENT_MODIFICATION,
            message: 'Operation op-1 is already in progress',
          });
        }
      }
      expect((await service.getAccount(account.accountId)).balance).toBe(400);
      const operations = await service.getOperations(account.accountId);
      expect(operations.filter((operation) => operation.operationId === 'op-1')).toHaveLength(1);
    });

    it('should free the operation id of a refused movement', async () => {
      const account = await service.createAccount({ userId: 'user_1', initialDeposit: 10 });

      await expect(service.debit(account.accountId, { amount: 50, operationId: 'op-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.INSUFFICIENT_BALANCE,
      });
      await service.credit(account.accountId, { amount: 40, operationId: 'op-2' });
      const result = await service.debit(account.accountId, { amount: 50, operationId: 'op-1' });

      expect(result).toMatchObject({ replayed: false, resultBalance: 0 });
    });

    it('should refuse an operation id used for a different movement', async () => {
      const account = await service.createAccount({ userId: 'user_1', initialDeposit: 100 });
      await service.debit(account.accountId, { amount: 40, operationId: 'op-1' });

      await expect(service.credit(account.accountId, { amount: 40, operationId: 'op-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.DUPLICATE_TRANSACTION,
        message: `Operation op-1 was already used for a DEBIT on account ${account.accountId}`,
      });
    });

    it.each([0, -1, 1.005, Number.NaN])('should reject amount %p', async (amount) => {
      const account = await service.createAccount({ userId: 'user_1' });

      await expect(service.credit(account.accountId, { amount })).rejects.toMatchObject({
        errorCode: ErrorCode.INVALID_AMOUNT,
        message: 'Amount must be positive with at most 2 decimal places',
      });
    });

    it('should refuse movements on an account that is not active', async () => {
      const account = await service.createAccount({ userId: 'user_1', initialDeposit: 100 });
      repository.patch(account.accountId, { status: AccountStatus.FROZEN });

      await expect(service.credit(account.accountId, { amount: 1 })).rejects.toMatchObject({
        errorCode: ErrorCode.ACCOUNT_INACTIVE,
        message: `Account ${account.accountId} is FROZEN`,
      });
    });

    it('should report a missing account', async () => {
      await expect(service.debit('acc_missing', { amount: 1 })).rejects.toMatchObject({
        errorCode: ErrorCode.ACCOUNT_NOT_FOUND,
      });
    });
  });

  describe('closeAccount', () => {
    it('should close an account once', async () => {
      const account = await service.createAccount({ userId: 'user_1' });
      clock.advance(60_000);

      const closed = await service.closeAccount(account.accountId);

      expect(closed.status).toBe(AccountStatus.CLOSED);
      expect(closed.closedAt).toEqual(clock.now());
      await expect(service.closeAccount(account.accountId)).rejects.toMatchObject({
        errorCode: ErrorCode.INVALID_TRANSACTION_OPERATION,
        message: `Account ${account.accountId} is already closed`,
      });
    });
  });

  describe('getOperations', () => {
    it('should list newest first up to the limit', async () => {
      const account = await service.createAccount({ userId: 'user_1' });
      await service.credit(account.accountId, { amount: 1, operationId: 'a' });
      await service.credit(account.accountId, { amount: 2, operationId: 'b' });
      await service.credit(account.accountId, { amount: 3, operationId: 'c' });

      const operations = await service.getOperations(account.accountId, 2);

      expect(operations.map((operation) => operation.operationId)).toEqual(['c', 'b']);
    });
  });

  describe('operation id claims', () => {
    const NOW = new Date('2024-06-15T12:00:00.000Z');
    let mockRepository: ReturnType<typeof createMockAccountRepository>;

    const operation = (fields: Partial<AccountOperationRecord> = {}): AccountOperationRecord => ({
      operationId: 'op-1',
      accountId: 'acc_1',
      type: 'DEBIT',
      amount: 25,
      resultBalance: 75,
      status: 'APPLIED',
      createdAt: NOW,
      ...fields,
    });

    const account: AccountRecord = {
      accountId: 'acc_1',
      userId: 'user_1',
      accountNumber: 'ACC-20240615-000001',
      accountType: AccountType.SAVINGS,
      balance: 75,
      status: AccountStatus.ACTIVE,
      currency: 'USD',
      overdraftLimit: 0,
      openedAt: NOW,
      createdAt: NOW,
      updatedAt: NOW,
    };

    beforeEach(() => {
      mockRepository = createMockAccountRepository();
      service = new AccountService(mockRepository, () => NOW);
    });

    it('should claim the id before moving the balance', async () => {
      mockRepository.findOperation.mockResolvedValue(null);
      mockRepository.claimOperation.mockResolvedValue(true);
      mockRepository.applyDebit.mockResolvedValue(account);
      mockRepository.completeOperation.mockResolvedValue(operation());

      const result = await service.debit('acc_1', { amount: 25, operationId: 'op-1', description: 'Rent' });

      expect(result).toEqual({
        operationId: 'op-1',
        accountId: 'acc_1',
        type: 'DEBIT',
        amount: 25,
        resultBalance: 75,
        replayed: false,
      });
      expect(mockRepository.claimOperation).toHaveBeenCalledWith({
        operationId: 'op-1',
        accountId: 'acc_1',
        type: 'DEBIT',
        amount: 25,
        description: 'Rent',
      });
      expect(mockRepository.claimOperation.mock.invocationCallOrder[0]).toBeLessThan(
        mockRepository.applyDebit.mock.invocationCallOrder[0]
      );
      expect(mockRepository.completeOperation).toHaveBeenCalledWith('op-1', 75);
    });

    it('should replay without moving money when the claim was lost to a finished call', async () => {
      mockRepository.findOperation.mockResolvedValueOnce(null).mockResolvedValueOnce(operation());
      mockRepository.claimOperation.mockResolvedValue(false);

      const result = await service.debit('acc_1', { amount: 25, operationId: 'op-1' });

      expect(result.replayed).toBe(true);
      expect(mockRepository.applyDebit).not.toHaveBeenCalled();
    });

    it('should answer 409 when the claim is held by a call still in flight', async () => {
      mockRepository.findOperation.mockResolvedValueOnce(null).mockResolvedValueOnce(operation({ status: 'PENDING' }));
      mockRepository.claimOperation.mockResolvedValue(false);

      await expect(service.debit('acc_1', { amount: 25, operationId: 'op-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.CONCURRENT_MODIFICATION,
        statusCode: 409,
        message: 'Operation op-1 is already in progress',
      });
      expect(mockRepository.applyDebit).not.toHaveBeenCalled();
    });

    it('should release the claim when the debit is refused', async () => {
      mockRepository.findOperation.mockResolvedValue(null);
      mockRepository.claimOperation.mockResolvedValue(true);
      mockRepository.applyDebit.mockResolvedValue(null);
      mockRepository.findById.mockResolvedValue({ ...account, balance: 10 });

      await expect(service.debit('acc_1', { amount: 25, operationId: 'op-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.INSUFFICIENT_BALANCE,
      });
      expect(mockRepository.releaseOperation).toHaveBeenCalledWith('op-1');
      expect(mockRepository.completeOperation).not.toHaveBeenCalled();
    });
  });
});
