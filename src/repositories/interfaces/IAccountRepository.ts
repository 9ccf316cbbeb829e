import {
  AccountOperationRecord,
  AccountRecord,
  NewAccount,
  OperationClaim,
} from '../../types/account';

/**
 * Account Repository Interface
 * Data access contract for accounts and their operation log
 */
export interface IAccountRepository {
  create(data: NewAccount): Promise<AccountRecord>;

  findById(accountId: string): Promise<AccountRecord | null>;

  existsByAccountNumber(accountNumber: string): Promise<boolean>;

  /**
   * Atomically subtracts amount when the account is ACTIVE and
   * balance + overdraftLimit covers it. Null when the guard fails.
   */
  applyDebit(accountId: string, amount: number): Promise<AccountRecord | null>;

  /**
   * Atomically adds amount when the account is ACTIVE. Null otherwise.
   */
  applyCredit(accountId: string, amount: number): Promise<AccountRecord | null>;

  /**
   * Marks the account CLOSED unless it already is. Null when nothing changed.
   */
  close(accountId: string, closedAt: Date): Promise<AccountRecord | null>;

  findOperation(operationId: string): Promise<AccountOperationRecord | null>;

  /**
   * Inserts the operation as PENDING. False when the operation id is already
   * taken; the unique id is what keeps two callers from moving money twice.
   */
  claimOperation(claim: OperationClaim): Promise<boolean>;

  /**
   * PENDING → APPLIED with the balance the movement produced. Null when
   * there is no pending claim for the id.
   */
  completeOperation(operationId: string, resultBalance: number): Promise<AccountOperationRecord | null>;

  /**
   * Drops a PENDING claim whose movement was refused, so the id can be used
   * again
   */
  releaseOperation(operationId: string): Promise<void>;

  /**
   * APPLIED operations, most recent first
   */
  listOperations(accountId: string, limit: number): Promise<AccountOperationRecord[]>;
}
