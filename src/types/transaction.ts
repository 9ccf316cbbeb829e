/**
 * Transaction domain types shared by the model, repository, service and API.
 */

export enum TransactionStatus {
  PENDING = 'PENDING',
  PROCESSING = 'PROCESSING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  CANCELLED = 'CANCELLED',
  REVERSED = 'REVERSED',
}

export enum TransactionType {
  DEPOSIT = 'DEPOSIT',
  WITHDRAWAL = 'WITHDRAWAL',
  TRANSFER = 'TRANSFER',
  PAYMENT = 'PAYMENT',
  REFUND = 'REFUND',
}

/**
 * Direction of a transaction as seen from one account
 */
export type TransactionDirection = 'INCOMING' | 'OUTGOING' | 'UNKNOWN';

export interface TransactionRecord {
  transactionId: string;
  reference: string;
  fromAccountId?: string;
  toAccountId?: string;
  amount: number;
  fee: number;
  currency: string;
  transactionType: TransactionType;
  status: TransactionStatus;
  description?: string;
  errorMessage?: string;
  attempts: number;
  processedAt?: Date;
  reversedAt?: Date;
  reversalReason?: string;
  createdBy?: string;
  updatedBy?: string;
  createdAt: Date;
  updatedAt: Date;
}

export type NewTransaction = Omit<TransactionRecord, 'createdAt' | 'updatedAt'>;

type MutableField =
  | 'status'
  | 'description'
  | 'fee'
  | 'errorMessage'
  | 'attempts'
  | 'processedAt'
  | 'reversedAt'
  | 'reversalReason'
  | 'updatedBy';

/**
 * Partial update. A null value removes the field.
 */
export type TransactionChanges = {
  [K in MutableField]?: TransactionRecord[K] | null;
};

export const TRANSACTION_SORT_FIELDS = [
  'createdAt',
  'updatedAt',
  'processedAt',
  'amount',
  'status',
  'transactionType',
  'reference',
] as const;

export type TransactionSortField = (typeof TRANSACTION_SORT_FIELDS)[number];

export type SortDirection = 'ASC' | 'DESC';

export interface TransactionFilter {
  status?: TransactionStatus;
  transactionType?: TransactionType;
  /** matches either side of the transaction */
  accountId?: string;
  /** inclusive */
  createdFrom?: Date;
  /** inclusive */
  createdTo?: Date;
  /** exclusive */
  createdBefore?: Date;
  /** exclusive; last status change or edit before this instant */
  updatedBefore?: Date;
}

export interface PageRequest {
  page: number;
  size: number;
  sortBy: TransactionSortField;
  sortDir: SortDirection;
}

export interface Page<T> {
  content: T[];
  totalElements: number;
}

const statusValues: readonly string[] = Object.values(TransactionStatus);
const typeValues: readonly string[] = Object.values(TransactionType);

export const isTransactionStatus = (value: string): value is TransactionStatus =>
  statusValues.includes(value);

export const isTransactionType = (value: string): value is TransactionType =>
  typeValues.includes(value);

/**
 * Case-insensitive parse, undefined when the value names no status
 */
export const parseTransactionStatus = (value: string): TransactionStatus | undefined => {
  const upper = value.trim().toUpperCase();
  return isTransactionStatus(upper) ? upper : undefined;
};

export const parseTransactionType = (value: string): TransactionType | undefined => {
  const upper = value.trim().toUpperCase();
  return isTransactionType(upper) ? upper : undefined;
};
