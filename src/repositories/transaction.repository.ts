import { FilterQuery, SortOrder, UpdateQuery, mongo } from 'mongoose';

import { ApiError } from '../middlewares/errorHandler';

import { ITransaction, Transaction } from '../models';
import {
  NewTransaction,
  Page,
  PageRequest,
  TransactionChanges,
  TransactionFilter,
  TransactionRecord,
  TransactionStatus,
} from '../types/transaction';
import { roundMoney } from '../utils/money';
import { ITransactionRepository } from './interfaces/ITransactionRepository';

/**
 * Copies the persisted fields, leaving mongoose internals (_id, __v) behind
 */
const toRecord = (source: TransactionRecord): TransactionRecord => ({
  transactionId: source.transactionId,
  reference: source.reference,
  fromAccountId: source.fromAccountId ?? undefined,
  toAccountId: source.toAccountId ?? undefined,
  amount: source.amount,
  fee: source.fee,
  currency: source.currency,
  transactionType: source.transactionType,
  status: source.status,
  description: source.description ?? undefined,
  errorMessage: source.errorMessage ?? undefined,
  attempts: source.attempts,
  processedAt: source.processedAt ?? undefined,
  reversedAt: source.reversedAt ?? undefined,
  reversalReason: source.reversalReason ?? undefined,
  createdBy: source.createdBy ?? undefined,
  updatedBy: source.updatedBy ?? undefined,
  createdAt: source.createdAt,
  updatedAt: source.updatedAt,
});

const accountClause = (accountId: string): FilterQuery<ITransaction>[] => [
  { fromAccountId: accountId },
  { toAccountId: accountId },
];

const toQuery = (filter: TransactionFilter): FilterQuery<ITransaction> => {
  const query: FilterQuery<ITransaction> = {};

  if (filter.status) query.status = filter.status;
  if (filter.transactionType) query.transactionType = filter.transactionType;
  if (filter.accountId) query.$or = accountClause(filter.accountId);

  const createdAt: { $gte?: Date; $lte?: Date; $lt?: Date } = {};
  if (filter.createdFrom) createdAt.$gte = filter.createdFrom;
  if (filter.createdTo) createdAt.$lte = filter.createdTo;
  if (filter.createdBefore) createdAt.$lt = filter.createdBefore;
  if (Object.keys(createdAt).length > 0) query.createdAt = createdAt;
  if (filter.updatedBefore) query.updatedAt = { $lt: filter.updatedBefore };

  return query;
};

/**
 * Splits a change set into $set and $unset (null removes a field)
 */
const toUpdate = (changes: TransactionChanges): UpdateQuery<ITransaction> => {
  const set: Record<string, unknown> = {};
  const unset: Record<string, 1> = {};

  for (const [field, value] of Object.entries(changes)) {
    if (value === undefined) continue;
    if (value === null) {
      unset[field] = 1;
    } else {
      set[field] = value;
    }
  }

  const update: UpdateQuery<ITransaction> = {};
  if (Object.keys(set).length > 0) update.$set = set;
  if (Object.keys(unset).length > 0) update.$unset = unset;
  return update;
};

/**
 * Transaction Repository
 * MongoDB-backed data access for transactions
 */
export class TransactionRepository implements ITransactionRepository {
  async create(data: NewTransaction): Promise<TransactionRecord> {
    try {
      const doc = await Transaction.create(data);
      return toRecord(doc);
    } catch (error) {
      // Lost the race on the unique reference index
      if (error instanceof mongo.MongoServerError && error.code === 11000) {
        throw ApiError.duplicateTransaction(
          `Transaction with reference ${data.reference} already exists`
        );
      }
      throw error;
    }
  }

  async findById(transactionId: string): Promise<TransactionRecord | null> {
    const doc = await Transaction.findOne({ transactionId }).lean<TransactionRecord>().exec();
    return doc ? toRecord(doc) : null;
  }

  async findByReference(reference: string): Promise<TransactionRecord | null> {
    const doc = await Transaction.findOne({ reference }).lean<TransactionRecord>().exec();
    return doc ? toRecord(doc) : null;
  }

  async existsByReference(reference: string): Promise<boolean> {
    const found = await Transaction.exists({ reference }).exec();
    return found !== null;
  }

  async findAll(filter: TransactionFilter): Promise<TransactionRecord[]> {
    const docs = await Transaction.find(toQuery(filter))
      .sort({ createdAt: -1, transactionId: 1 })
      .lean<TransactionRecord[]>()
      .exec();
    return docs.map(toRecord);
  }

  async findPage(
    filter: TransactionFilter,
    pageRequest: PageRequest
  ): Promise<Page<TransactionRecord>> {
    const query = toQuery(filter);
    const sort: Record<string, SortOrder> = {
      [pageRequest.sortBy]: pageRequest.sortDir === 'ASC' ? 1 : -1,
      transactionId: 1,
    };

    const [docs, totalElements] = await Promise.all([
      Transaction.find(query)
        .sort(sort)
        .skip(pageRequest.page * pageRequest.size)
        .limit(pageRequest.size)
        .lean<TransactionRecord[]>()
        .exec(),
      Transaction.countDocuments(query).exec(),
    ]);

    return { content: docs.map(toRecord), totalElements };
  }

  async count(filter: TransactionFilter): Promise<number> {
    return Transaction.countDocuments(toQuery(filter)).exec();
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

    const rows = await Transaction.aggregate<{ _id: TransactionStatus; count: number }>([
      { $group: { _id: '$status', count: { $sum: 1 } } },
    ]).exec();

    for (const row of rows) {
      counts[row._id] = row.count;
    }
    return counts;
  }

  async updateIfStatus(
    transactionId: string,
    expectedStatus: TransactionStatus,
    changes: TransactionChanges
  ): Promise<TransactionRecord | null> {
    const doc = await Transaction.findOneAndUpdate(
      { transactionId, status: expectedStatus },
      toUpdate(changes),
      { new: true, runValidators: true }
    )
      .lean<TransactionRecord>()
      .exec();
    return doc ? toRecord(doc) : null;
  }

  async sumNetAmountForAccount(accountId: string, from: Date, until: Date): Promise<number> {
    const rows = await Transaction.aggregate<{ net: number }>([
      {
        $match: {
          status: TransactionStatus.COMPLETED,
          createdAt: { $gte: from, $lt: until },
          $or: accountClause(accountId),
        },
      },
      {
        $group: {
          _id: null,
          net: {
            $sum: {
              $cond: [
                { $eq: ['$toAccountId', accountId] },
                '$amount',
                { $multiply: ['$amount', -1] },
              ],
            },
          },
        },
      },
    ]).exec();

    return roundMoney(rows[0]?.net ?? 0);
  }

  async findLargestCompletedAmount(accountId: string): Promise<number> {
    const doc = await Transaction.findOne({
      status: TransactionStatus.COMPLETED,
      $or: accountClause(accountId),
    })
      .sort({ amount: -1 })
      .select({ amount: 1 })
      .lean<{ amount: number }>()
      .exec();
    return doc?.amount ?? 0;
  }
}
