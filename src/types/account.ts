/**
 * Account types shared by the companion account service and the client
 * that calls it.
 */

export enum AccountStatus {
  ACTIVE = 'ACTIVE',
  INACTIVE = 'INACTIVE',
  CLOSED = 'CLOSED',
  FROZEN = 'FROZEN',
}

export enum AccountType {
  CHECKING = 'CHECKING',
  SAVINGS = 'SAVINGS',
  BUSINESS = 'BUSINESS',
  INVESTMENT = 'INVESTMENT',
}

export type AccountOperationType = 'DEBIT' | 'CREDIT';

/**
 * PENDING: the operation id is claimed and the balance change is under way.
 * APPLIED: the balance changed and resultBalance holds the outcome.
 */
export type AccountOperationStatus = 'PENDING' | 'APPLIED';

export interface AccountRecord {
  accountId: string;
  userId: string;
  accountNumber: string;
  accountType: AccountType;
  balance: number;
  status: AccountStatus;
  currency: string;
  overdraftLimit: number;
  openedAt: Date;
  closedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export type NewAccount = Omit<AccountRecord, 'createdAt' | 'updatedAt'>;

export interface AccountOperationRecord {
  operationId: string;
  accountId: string;
  type: AccountOperationType;
  amount: number;
  resultBalance: number;
  status: AccountOperationStatus;
  description?: string;
  createdAt: Date;
}

export type OperationClaim = Omit<AccountOperationRecord, 'createdAt' | 'resultBalance' | 'status'>;
