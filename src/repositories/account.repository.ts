import { mongo } from 'mongoose';

import { Account, AccountOperation } from '../models';
import {
  AccountOperationRecord,
  AccountRecord,
  AccountStatus,
  NewAccount,
  OperationClaim,
} from '../types/account';
import { IAccountRepository } from './interfaces/IAccountRepository';

const toAccount = (source: AccountRecord): AccountRecord => ({
  accountId: source.accountId,
  userId: source.userId,
  accountNumber: source.accountNumber,
  accountType: source.accountType,
  balance: source.balance,
  status: source.status,
  currency: source.currency,
  overdraftLimit: source.overdraftLimit,
  openedAt: source.openedAt,
  closedAt: source.closedAt ?? undefined,
  createdAt: source.createdAt,
  updatedAt: source.updatedAt,
});

const toOperation = (source: AccountOperationRecord): AccountOperationRecord => ({
  operationId: source.operationId,
  accountId: source.accountId,
  type: source.type,
  amount: source.amount,
  resultBalance: source.resultBalance,
  status: source.status,
  description: source.description ?? undefined,
  createdAt: source.createdAt,
});

/**
 * Account Repository
 * MongoDB-backed accounts with atomic, guarded balance updates
 */
export class AccountRepository implements IAccountRepository {
  async create(data: NewAccount): Promise<AccountRecord> {
    const doc = await Account.create(data);
    return toAccount(doc);
  }

  async findById(accountId: string): Promise<AccountRecord | null> {
    const doc = await Account.findOne({ accountId }).lean<AccountRecord>().exec();
    return doc ? toAccount(doc) : null;
  }

  async existsByAccountNumber(accountNumber: string): Promise<boolean> {
    const found = await Account.exists({ accountNumber }).exec();
    return found !== null;
  }

  async applyDebit(accountId: string, amount: number): Promise<AccountRecord | null> {
    const doc = await Account.findOneAndUpdate(
      {
        accountId,
        status: AccountStatus.ACTIVE,
        $expr: { $gte: [{ $add: ['$balance', '$overdraftLimit'] }, amount] },
      },
      { $inc: { balance: -amount } },
      { new: true }
    )
      .lean<AccountRecord>()
      .exec();
    return doc ? toAccount(doc) : null;
  }

  async applyCredit(accountId: string, amount: number): Promise<AccountRecord | null> {
    const doc = await Account.findOneAndUpdate(
      { accountId, status: AccountStatus.ACTIVE },
      { $inc: { balance: amount } },
      { new: true }
    )
      .lean<AccountRecord>()
      .exec();
    return doc ? toAccount(doc) : null;
  }

  async close(accountId: string, closedAt: Date): Promise<AccountRecord | null> {
    const doc = await Account.findOneAndUpdate(
      { accountId, status: { $ne: AccountStatus.CLOSED } },
      { $set: { status: AccountStatus.CLOSED, closedAt } },
      { new: true }
    )
      .lean<AccountRecord>()
      .exec();
    return doc ? toAccount(doc) : null;
  }

  async findOperation(operationId: string): Promise<AccountOperationRecord | null> {
    const doc = await AccountOperation.findOne({ operationId })
      .lean<AccountOperationRecord>()
      .exec();
    return doc ? toOperation(doc) : null;
  }

  async claimOperation(claim: OperationClaim): Promise<boolean> {
    try {
      await AccountOperation.create({ ...claim, resultBalance: 0, status: 'PENDING' });
      return true;
    } catch (error) {
      if (error instanceof mongo.MongoServerError && error.code === 11000) {
        return false;
      }
      throw error;
    }
  }

  async completeOperation(
    operationId: string,
    resultBalance: number
  ): Promise<AccountOperationRecord | null> {
    const doc = await AccountOperation.findOneAndUpdate(
      { operationId, status: 'PENDING' },
      { $set: { status: 'APPLIED', resultBalance } },
      { new: true }
    )
      .lean<AccountOperationRecord>()
      .exec();
    return doc ? toOperation(doc) : null;
  }

  async releaseOperation(operationId: string): Promise<void> {
    await AccountOperation.deleteOne({ operationId, status: 'PENDING' }).exec();
  }

  async listOperations(accountId: string, limit: number): Promise<AccountOperationRecord[]> {
    const docs = await AccountOperation.find({ accountId, status: 'APPLIED' })
      .sort({ createdAt: -1 })
      .limit(limit)
      .lean<AccountOperationRecord[]>()
      .exec();
    return docs.map(toOperation);
  }
}
