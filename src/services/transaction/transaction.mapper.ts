import crypto from 'crypto';

import {
  Page,
  PageRequest,
  TransactionDirection,
  TransactionRecord,
  TransactionStatus,
  TransactionType,
} from '../../types/transaction';
import { totalAmount } from './transaction.rules';

export const REFERENCE_PREFIX = 'TXN-';

export interface TransactionResponse {
  transactionId: string;
  reference: string;
  fromAccountId?: string;
  toAccountId?: string;
  amount: number;
  fee: number;
  totalAmount: number;
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

/**
 * A transaction from the point of view of one account
 */
export interface TransactionSummary {
  transactionId: string;
  reference: string;
  amount: number;
  currency: string;
  transactionType: TransactionType;
  status: TransactionStatus;
  description?: string;
  direction: TransactionDirection;
  otherAccountId?: string;
  createdAt: Date;
}

export interface PagedResponse<T> {
  content: T[];
  page: number;
  size: number;
  totalElements: number;
  totalPages: number;
  first: boolean;
  last: boolean;
  hasNext: boolean;
  hasPrevious: boolean;
}

/**
 * `TXN-<external>` when the caller supplies a reference, otherwise
 * `TXN-<epoch millis>-<8 uppercase hex>`
 */
export const generateReference = (externalReference?: string, now: number = Date.now()): string => {
  const external = externalReference?.trim();
  if (external) {
    return `${REFERENCE_PREFIX}${external}`;
  }
  const suffix = crypto.randomUUID().replace(/-/g, '').substring(0, 8).toUpperCase();
  return `${REFERENCE_PREFIX}${now}-${suffix}`;
};

export const toTransactionResponse = (record: TransactionRecord): TransactionResponse => ({
  transactionId: record.transactionId,
  reference: record.reference,
  fromAccountId: record.fromAccountId,
  toAccountId: record.toAccountId,
  amount: record.amount,
  fee: record.fee,
  totalAmount: totalAmount(record),
  currency: record.currency,
  transactionType: record.transactionType,
  status: record.status,
  description: record.description,
  errorMessage: record.errorMessage,
  attempts: record.attempts,
  processedAt: record.processedAt,
  reversedAt: record.reversedAt,
  reversalReason: record.reversalReason,
  createdBy: record.createdBy,
  updatedBy: record.updatedBy,
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

export const directionFor = (record: TransactionRecord, accountId: string): TransactionDirection => {
  if (record.fromAccountId === accountId) return 'OUTGOING';
  if (record.toAccountId === accountId) return 'INCOMING';
  return 'UNKNOWN';
};

export const toTransactionSummary = (
  record: TransactionRecord,
  accountId: string
): TransactionSummary => {
  const direction = directionFor(record, accountId);
  const otherAccountId =
    direction === 'OUTGOING'
      ? record.toAccountId
      : direction === 'INCOMING'
      ? record.fromAccountId
      : undefined;

  return {
    transactionId: record.transactionId,
    reference: record.reference,
    amount: record.amount,
    currency: record.currency,
    transactionType: record.transactionType,
    status: record.status,
    description: record.description,
    direction,
    otherAccountId,
    createdAt: record.createdAt,
  };
};

export const toPagedResponse = <T, R>(
  page: Page<T>,
  pageRequest: PageRequest,
  map: (item: T) => R
): PagedResponse<R> => {
  const totalPages = pageRequest.size > 0 ? Math.ceil(page.totalElements / pageRequest.size) : 0;

  return {
    content: page.content.map(map),
    page: pageRequest.page,
    size: pageRequest.size,
    totalElements: page.totalElements,
    totalPages,
    first: pageRequest.page === 0,
    last: pageRequest.page >= totalPages - 1,
    hasNext: pageRequest.page + 1 < totalPages,
    hasPrevious: pageRequest.page > 0,
  };
};
