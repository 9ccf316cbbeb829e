/**
 * Account Service HTTP client
 *
 * Blocking calls to the Account Service for lookups, debits and credits.
 * No retries: a failed call fails the processing attempt and the transaction
 * can be retried as a whole.
 */

import axios, { AxiosInstance } from 'axios';

import { config } from '../config';
import { authService } from '../auth/auth.service';
import { ApiError } from '../middlewares/errorHandler';
import { accountServiceCallsTotal, createServiceLogger, getCorrelationId } from '../observability';
import { ErrorCode } from '../types/errors';
import {
  IAccountServiceClient,
  MovementRequest,
  MovementResult,
  RemoteAccount,
  isCreditAllowed,
  isDebitAllowed,
} from './accountService.types';

const log = createServiceLogger('account-client');

export type AccountHttp = Pick<AxiosInstance, 'get' | 'post'>;

type Operation = 'fetch' | 'debit' | 'credit';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Unwraps `{ success, data: { [key]: ... } }`
 */
const unwrap = (body: unknown, key: string): Record<string, unknown> => {
  const value = isRecord(body) && isRecord(body.data) ? body.data[key] : undefined;
  if (isRecord(value)) {
    return value;
  }
  throw ApiError.externalService(`Account Service returned an unexpected ${key} payload`);
};

const str = (value: unknown): string => (typeof value === 'string' ? value : String(value ?? ''));

const num = (value: unknown, field: string): number => {
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(parsed)) {
    throw ApiError.externalService(`Account Service returned a non-numeric ${field}`);
  }
  return parsed;
};

export const parseRemoteAccount = (body: unknown): RemoteAccount => {
  const account = unwrap(body, 'account');
  return {
    accountId: str(account.accountId),
    userId: str(account.userId),
    accountNumber: str(account.accountNumber),
    accountType: str(account.accountType),
    balance: num(account.balance, 'balance'),
    status: str(account.status),
    currency: str(account.currency),
    overdraftLimit: num(account.overdraftLimit ?? 0, 'overdraftLimit'),
  };
};

export const parseMovement = (body: unknown): MovementResult => {
  const operation = unwrap(body, 'operation');
  return {
    operationId: str(operation.operationId),
    accountId: str(operation.accountId),
    type: operation.type === 'CREDIT' ? 'CREDIT' : 'DEBIT',
    amount: num(operation.amount, 'amount'),
    resultBalance: num(operation.resultBalance, 'resultBalance'),
    replayed: operation.replayed === true,
  };
};

const remoteMessage = (body: unknown): string | undefined => {
  if (isRecord(body) && isRecord(body.error) && typeof body.error.message === 'string') {
    return body.error.message;
  }
  return undefined;
};

export class AccountServiceClient implements IAccountServiceClient {
  constructor(
    private readonly http: AccountHttp,
    private readonly tokenProvider: () => string = () => authService.getServiceToken()
  ) {}

  async getAccount(accountId: string): Promise<RemoteAccount> {
    return this.call('fetch', accountId, async () => {
      const response = await this.http.get(this.accountPath(accountId), {
        headers: this.headers(),
      });
      return parseRemoteAccount(response.data);
    });
  }

  async canDebit(accountId: string, amount: number): Promise<boolean> {
    const account = await this.findAccount(accountId);
    return account !== null && isDebitAllowed(account, amount);
  }

  async canCredit(accountId: string): Promise<boolean> {
    const account = await this.findAccount(accountId);
    return account !== null && isCreditAllowed(account);
  }

  async debitAccount(accountId: string, request: MovementRequest): Promise<MovementResult> {
    return this.move('debit', accountId, request);
  }

  async creditAccount(accountId: string, request: MovementRequest): Promise<MovementResult> {
    return this.move('credit', accountId, request);
  }

  private async findAccount(accountId: string): Promise<RemoteAccount | null> {
    try {
      return await this.getAccount(accountId);
    } catch (error) {
      if (error instanceof ApiError && error.errorCode === ErrorCode.ACCOUNT_NOT_FOUND) {
        return null;
      }
      throw error;
    }
  }

  private async move(
    operation: 'debit' | 'credit',
    accountId: string,
    request: MovementRequest
  ): Promise<MovementResult> {
    return this.call(operation, accountId, async () => {
      const response = await this.http.post(
        `${this.accountPath(accountId)}/${operation}`,
        {
          amount: request.amount,
          description: request.description,
          operationId: request.operationId,
        },
        { headers: this.headers() }
      );
      const result = parseMovement(response.data);
      log.info(
        { accountId, operation, amount: request.amount, operationId: request.operationId, replayed: result.replayed },
        `Account ${operation} applied`
      );
      return result;
    });
  }

  private async call<T>(operation: Operation, accountId: string, fn: () => Promise<T>): Promise<T> {
    try {
      const result = await fn();
      accountServiceCallsTotal.inc({ operation, outcome: 'success' });
      return result;
    } catch (error) {
      const translated = this.translate(error, operation, accountId);
      accountServiceCallsTotal.inc({ operation, outcome: this.outcomeOf(translated) });
      log.warn(
        { accountId, operation, errorCode: translated.errorCode, error: translated.message },
        'Account Service call failed'
      );
      throw translated;
    }
  }

  private translate(error: unknown, operation: Operation, accountId: string): ApiError {
    if (error instanceof ApiError) {
      return error;
    }

    const verb = operation === 'fetch' ? 'fetch account information for' : `${operation} account`;

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      const detail = remoteMessage(error.response?.data) ?? error.message;

      if (status === 404) {
        return ApiError.accountNotFound(accountId);
      }
      if (status !== undefined && status >= 400 && status < 500 && operation !== 'fetch') {
        return ApiError.operationRejected(`Failed to ${verb} ${accountId}: ${detail}`);
      }
      return ApiError.externalService(`Failed to ${verb} ${accountId}: ${detail}`);
    }

    const detail = error instanceof Error ? error.message : String(error);
    return ApiError.externalService(`Failed to ${verb} ${accountId}: ${detail}`);
  }

  private outcomeOf(error: ApiError): string {
    switch (error.errorCode) {
      case ErrorCode.ACCOUNT_NOT_FOUND:
        return 'not_found';
      case ErrorCode.ACCOUNT_OPERATION_REJECTED:
        return 'rejected';
      default:
        return 'error';
    }
  }

  private accountPath(accountId: string): string {
    return `/api/accounts/${encodeURIComponent(accountId)}`;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.tokenProvider()}`,
    };
    const correlationId = getCorrelationId();
    if (correlationId) {
      headers['x-correlation-id'] = correlationId;
    }
    return headers;
  }
}

export const createAccountServiceClient = (): AccountServiceClient =>
  new AccountServiceClient(
    axios.create({
      baseURL: config.accountService.url,
      timeout: config.accountService.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    })
  );
