import { AccountOperationType, AccountStatus } from '../types/account';

/**
 * Account as returned by the Account Service
 */
export interface RemoteAccount {
  accountId: string;
  userId: string;
  accountNumber: string;
  accountType: string;
  balance: number;
  status: string;
  currency: string;
  overdraftLimit: number;
}

export interface MovementRequest {
  amount: number;
  description: string;
  /** repeated calls with the same id are applied once */
  operationId: string;
}

export interface MovementResult {
  operationId: string;
  accountId: string;
  type: AccountOperationType;
  amount: number;
  resultBalance: number;
  replayed: boolean;
}

/**
 * Synchronous Account Service contract used by transaction processing
 */
export interface IAccountServiceClient {
  /**
   * Throws ACCOUNT_NOT_FOUND for an unknown id, EXTERNAL_SERVICE_ERROR when
   * the service cannot be reached
   */
  getAccount(accountId: string): Promise<RemoteAccount>;

  /**
   * ACTIVE and balance + overdraftLimit covers the amount. False for an
   * unknown account.
   */
  canDebit(accountId: string, amount: number): Promise<boolean>;

  /**
   * ACTIVE. False for an unknown account.
   */
  canCredit(accountId: string): Promise<boolean>;

  debitAccount(accountId: string, request: MovementRequest): Promise<MovementResult>;

  creditAccount(accountId: string, request: MovementRequest): Promise<MovementResult>;
}

export const isDebitAllowed = (account: RemoteAccount, amount: number): boolean =>
  account.status === AccountStatus.ACTIVE && account.balance + account.overdraftLimit >= amount;

export const isCreditAllowed = (account: RemoteAccount): boolean =>
  account.status === AccountStatus.ACTIVE;
