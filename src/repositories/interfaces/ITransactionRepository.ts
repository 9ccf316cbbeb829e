import {
  NewTransaction,
  Page,
  PageRequest,
  TransactionChanges,
  TransactionFilter,
  TransactionRecord,
  TransactionStatus,
} from '../../types/transaction';

/**
 * Transaction Repository Interface
 * Data access contract for transactions
 */
export interface ITransactionRepository {
  create(data: NewTransaction): Promise<TransactionRecord>;

  findById(transactionId: string): Promise<TransactionRecord | null>;

  findByReference(reference: string): Promise<TransactionRecord | null>;

  existsByReference(reference: string): Promise<boolean>;

  /**
   * Every matching transaction, newest first
   */
  findAll(filter: TransactionFilter): Promise<TransactionRecord[]>;

  findPage(filter: TransactionFilter, pageRequest: PageRequest): Promise<Page<TransactionRecord>>;

  count(filter: TransactionFilter): Promise<number>;

  countByStatus(): Promise<Record<TransactionStatus, number>>;

  /**
   * Compare-and-set: applies the changes only while the stored status still
   * equals `expectedStatus`. Returns the updated record, or null when the
   * transaction is missing or its status moved on.
   */
  updateIfStatus(
    transactionId: string,
    expectedStatus: TransactionStatus,
    changes: TransactionChanges
  ): Promise<TransactionRecord | null>;

  /**
   * Sum over COMPLETED transactions created in [from, until) touching the
   * account: +amount when it is the destination, -amount otherwise
   */
  sumNetAmountForAccount(accountId: string, from: Date, until: Date): Promise<number>;

  /**
   * Largest amount among COMPLETED transactions touching the account, 0 if none
   */
  findLargestCompletedAmount(accountId: string): Promise<number>;
}
