import { TransactionStatus, TransactionType } from '../../types/transaction';
import { TransactionResponse } from './transaction.mapper';

export interface CreateTransactionRequest {
  fromAccountId?: string;
  toAccountId?: string;
  amount: number;
  fee?: number;
  currency?: string;
  /** case-insensitive TransactionType name */
  transactionType: string;
  description?: string;
  externalReference?: string;
}

export interface UpdateTransactionRequest {
  description?: string;
  fee?: number;
}

export interface TransactionQuery {
  status?: TransactionStatus;
  transactionType?: TransactionType;
}

export interface TransactionStatistics {
  totalTransactions: number;
  completedTransactions: number;
  pendingTransactions: number;
  processingTransactions: number;
  failedTransactions: number;
  cancelledTransactions: number;
  reversedTransactions: number;
  /** completed / total as a percentage, 0 when there are none */
  successRate: number;
}

export interface AccountTransactionStatistics {
  accountId: string;
  totalTransactions: number;
  netAmountThisMonth: number;
  largestTransaction: number;
}

export interface TransactionValidationResponse {
  valid: boolean;
  message: string;
  errorCode?: string;
}

export interface BulkFailure {
  index: number;
  request: CreateTransactionRequest;
  errorMessage: string;
  errorCode: string;
}

export interface BulkTransactionResponse {
  successfulTransactions: TransactionResponse[];
  failedTransactions: BulkFailure[];
  totalProcessed: number;
  successCount: number;
  failureCount: number;
}

export interface ProcessPendingResult {
  examined: number;
  completed: number;
  failed: number;
  skipped: number;
}

export interface CleanupResult {
  examined: number;
  timedOut: number;
  skipped: number;
}
