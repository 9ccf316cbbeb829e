/**
 * In-memory stand-ins for the mongoose repositories. Same contracts,
 * including the compare-and-set and guarded balance updates.
 */

import { IAccountRepository, ITransactionRepository } from '../../src/repositories/interfaces';
import { ApiError } from '../../src/middlewares/errorHandler';
import {
  AccountOperationRecord,
  AccountRecord,
  AccountStatus,
  NewAccount,
  OperationClaim,
} from '../../src/types/account';
import {
  NewTransaction,
  Page,
  PageRequest,
  TransactionChanges,
  TransactionFilter,
  TransactionRecord,
  TransactionStatus,
} from '../../src/types/transaction';
import { roundMoney } from '../../src/utils/money';

export type Clock = () => Date;

/**
 * A clock tests can move forward by hand
 */
export class ManualClock {
  private current: number;

  constructor(start: Date | string = '2024-06-15T12:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }

  set(value: Date | string): void {
    this.current = new Date(value).getTime();
  }
}

const optional = <T>(change: T | null | undefined, current: T | undefined): T | undefined => {
  if (change === null) return undefined;
  return change === undefined ? current : change;
};

const applyChanges = (record: TransactionRecord, changes: TransactionChanges, now: Date): TransactionRecord => ({
  ...record,
  status: changes.status ?? record.status,
  fee: changes.fee ?? record.fee,
  attempts: changes.attempts ?? record.attempts,
  description: optional(changes.description, record.description),
  errorMessage: optional(changes.errorMessage, record.errorMessage),
  processedAt: optional(changes.processedAt, record.processedAt),
  reversedAt: optional(changes.reversedAt, record.reversedAt),
  reversalReason: optional(changes.reversalReason, record.reversalReason),
  updatedBy: optional(changes.updatedBy, record.updatedBy),
  updatedAt: now,
});

const matches = (record: TransactionRecord, filter: TransactionFilter): boolean => {
  const created = record.createdAt.getTime();
  return (
    (!filter.status || record.status === filter.status) &&
    (!filter.transactionType || record.transactionType === filter.transactionType) &&
    (!filter.accountId ||
      record.fromAccountId === filter.accountId ||
      record.toAccountId === filter.accountId) &&
    (!filter.createdFrom || created >= filter.createdFrom.getTime()) &&
    (!filter.createdTo || created <= filter.createdTo.getTime()) &&
    (!filter.createdBefore || created < filter.createdBefore.getTime()) &&
    (!filter.updatedBefore || record.updatedAt.getTime() < filter.updatedBefore.getTime())
  );
};

const sortValue = (value: unknown): number | string => {
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'number' || typeof value === 'string') return value;
  return -Infinity;
};

const compare = (a: number | string, b: number | string): number => {
  if (a === b) return 0;
  return a < b ? -1 : 1;
};

const newestFirst = (a: TransactionRecord, b: TransactionRecord): number =>
  b.createdAt.getTime() - a.createdAt.getTime() || compare(a.transactionId, b.transactionId);

export class InMemoryTransactionRepository implements ITransactionRepository {
  private readonly records = new Map<string, TransactionRecord>();

  constructor(private readonly clock: Clock = () => new Date()) {}

  /** Inserts a record as-is, for arranging state the service cannot reach directly */
  seed(record: TransactionRecord): TransactionRecord {
    this.records.set(record.transactionId, { ...record });
    return { ...record };
  }

  all(): TransactionRecord[] {
    return [...this.records.values()].map((record) => ({ ...record }));
  }

  async create(data: NewTransaction): Promise<TransactionRecord> {
    if ([...this.records.values()].some((record) => record.reference === data.reference)) {
      throw ApiError.duplicateTransaction(`Transaction with reference ${data.reference} already exists`);
    }
    const now = this.clock();
    const record: TransactionRecord = { ...data, createdAt: now, updatedAt: now };
    this.records.set(record.transactionId, record);
    return { ...record };
  }

  async findById(transactionId: string): Promise<TransactionRecord | null> {
    const record = this.records.get(transactionId);
    return record ? { ...record } : null;
  }

  async findByReference(reference: string): Promise<TransactionRecord | null> {
    const record = [...this.records.values()].find((candidate) => candidate.reference === reference);
    return record ? { ...record } : null;
  }

  async existsByReference(reference: string): Promise<boolean> {
    return (await this.findByReference(reference)) !== null;
  }

  async findAll(filter: TransactionFilter): Promise<TransactionRecord[]> {
    return this.all()
      .filter((record) => matches(record, filter))
      .sort(newestFirst);
  }

  async findPage(filter: TransactionFilter, pageRequest: PageRequest): Promise<Page<TransactionRecord>> {
    const direction = pageRequest.sortDir === 'ASC' ? 1 : -1;
    const sorted = this.all()
      .filter((record) => matches(record, filter))
      .sort(
        (a, b) =>
          direction * compare(sortValue(a[pageRequest.sortBy]), sortValue(b[pageRequest.sortBy])) ||
          compare(a.transactionId, b.transactionId)
      );
    const start = pageRequest.page * pageRequest.size;
    return { content: sorted.slice(start, start + pageRequest.size), totalElements: sorted.length };
  }

  async count(filter: TransactionFilter): Promise<number> {
    return this.all().filter((record) => matches(record, filter)).length;
  }

  async countByStatus(): Promise<Record<TransactionStatus, number>> {
    const counts: Record<TransactionStatus, number> = {
      [TransactionStatus.PENDING]: 0,
      [TransactionStatus.PROCESSING]: 0,
      [TransactionStatus.COMPLETED]: 0,
      [TransactionStatus.FAILED]: 0,
      [TransactionStatus.CANCELLED]: 0,
      [TransactionStatus.REVERSED]: 0,
    };
    for (const record of this.records.values()) {
      counts[record.status] += 1;
    }
    return counts;
  }

  async updateIfStatus(
    transactionId: string,
    expectedStatus: TransactionStatus,
    changes: TransactionChanges
  ): Promise<TransactionRecord | null> {
    const record = this.records.get(transactionId);
    if (!record || record.status !== expectedStatus) {
      return null;
    }
    const updated = applyChanges(record, changes, this.clock());
    this.records.set(transactionId, updated);
    return { ...updated };
  }

  async sumNetAmountForAccount(accountId: string, from: Date, until: Date): Promise<number> {
    const net = this.all()
      .filter((record) =>
        matches(record, { status: TransactionStatus.COMPLETED, accountId, createdFrom: from, createdBefore: until })
      )
      .reduce((sum, record) => sum + (record.toAccountId === accountId ? record.amount : -record.amount), 0);
    return roundMoney(net);
  }

  async findLargestCompletedAmount(accountId: string): Promise<number> {
    return this.all()
      .filter((record) => matches(record, { status: TransactionStatus.COMPLETED, accountId }))
      .reduce((largest, record) => Math.max(largest, record.amount), 0);
  }
}

export class InMemoryAccountRepository implements IAccountRepository {
  private readonly accounts = new Map<string, AccountRecord>();
  private readonly operations: AccountOperationRecord[] = [];

  constructor(private readonly clock: Clock = () => new Date()) {}

  /** Overwrites fields of a stored account, e.g. to freeze it mid-test */
  patch(accountId: string, fields: Partial<AccountRecord>): void {
    const account = this.accounts.get(accountId);
    if (!account) {
      throw new Error(`No account ${accountId} to patch`);
    }
    this.accounts.set(accountId, { ...account, ...fields });
  }

  async create(data: NewAccount): Promise<AccountRecord> {
    const now = this.clock();
    const account: AccountRecord = { ...data, createdAt: now, updatedAt: now };
    this.accounts.set(account.accountId, account);
    return { ...account };
  }

  async findById(accountId: string): Promise<AccountRecord | null> {
    const account = this.accounts.get(accountId);
    return account ? { ...account } : null;
  }

  async existsByAccountNumber(accountNumber: string): Promise<boolean> {
    return [...this.accounts.values()].some((account) => account.accountNumber === accountNumber);
  }

  async applyDebit(accountId: string, amount: number): Promise<AccountRecord | null> {
    const account = this.accounts.get(accountId);
    if (!account || account.status !== AccountStatus.ACTIVE || account.balance + account.overdraftLimit < amount) {
      return null;
    }
    return this.setBalance(account, roundMoney(account.balance - amount));
  }

  async applyCredit(accountId: string, amount: number): Promise<AccountRecord | null> {
    const account = this.accounts.get(accountId);
    if (!account || account.status !== AccountStatus.ACTIVE) {
      return null;
    }
    return this.setBalance(account, roundMoney(account.balance + amount));
  }

  async close(accountId: string, closedAt: Date): Promise<AccountRecord | null> {
    const account = this.accounts.get(accountId);
    if (!account || account.status === AccountStatus.CLOSED) {
      return null;
    }
    const closed: AccountRecord = { ...account, status: AccountStatus.CLOSED, closedAt, updatedAt: this.clock() };
    this.accounts.set(accountId, closed);
    return { ...closed };
  }

  async findOperation(operationId: string): Promise<AccountOperationRecord | null> {
    const operation = this.operations.find((candidate) => candidate.operationId === operationId);
    return operation ? { ...operation } : null;
  }

  async claimOperation(claim: OperationClaim): Promise<boolean> {
    if (this.operations.some((operation) => operation.operationId === claim.operationId)) {
      return false;
    }
    this.operations.push({ ...claim, resultBalance: 0, status: 'PENDING', createdAt: this.clock() });
    return true;
  }

  async completeOperation(operationId: string, resultBalance: number): Promise<AccountOperationRecord | null> {
    const index = this.operations.findIndex(
      (operation) => operation.operationId === operationId && operation.status === 'PENDING'
    );
    if (index < 0) {
      return null;
    }
    const applied: AccountOperationRecord = { ...this.operations[index], resultBalance, status: 'APPLIED' };
    this.operations[index] = applied;
    return { ...applied };
  }

  async releaseOperation(operationId: string): Promise<void> {
    const index = this.operations.findIndex(
      (operation) => operation.operationId === operationId && operation.status === 'PENDING'
    );
    if (index >= 0) {
      this.operations.splice(index, 1);
    }
  }

  async listOperations(accountId: string, limit: number): Promise<AccountOperationRecord[]> {
    return this.operations
      .filter((operation) => operation.accountId === accountId && operation.status === 'APPLIED')
      .reverse()
      .slice(0, limit)
      .map((operation) => ({ ...operation }));
  }

  private setBalance(account: AccountRecord, balance: number): AccountRecord {
    const updated: AccountRecord = { ...account, balance, updatedAt: this.clock() };
    this.accounts.set(account.accountId, updated);
    return { ...updated };
  }
}
