/**
 * Composition root
 *
 * Builds the repositories, clients, services and controllers once and hands
 * them to the app and the worker. Tests pass in-memory repositories and an
 * in-process account client through the overrides.
 */

import { IAccountServiceClient } from '../clients/accountService.types';
import { createAccountServiceClient } from '../clients/accountService.client';
import { AccountRepository } from '../repositories/account.repository';
import { TransactionRepository } from '../repositories/transaction.repository';
import { IAccountRepository, ITransactionRepository } from '../repositories/interfaces';
import { AccountController, AccountService } from '../services/account';
import {
  TransactionController,
  TransactionService,
  TransactionServiceOptions,
} from '../services/transaction';

export interface Dependencies {
  transactionRepository: ITransactionRepository;
  accountRepository: IAccountRepository;
  accountService: AccountService;
  accountClient: IAccountServiceClient;
  transactionService: TransactionService;
  accountController: AccountController;
  transactionController: TransactionController;
}

export interface DependencyOverrides {
  transactionRepository?: ITransactionRepository;
  accountRepository?: IAccountRepository;
  /** receives the companion account service so an in-process client can wrap it */
  accountClient?: (accounts: AccountService) => IAccountServiceClient;
  transactionOptions?: Partial<TransactionServiceOptions>;
  clock?: () => Date;
}

export const createDependencies = (overrides: DependencyOverrides = {}): Dependencies => {
  const transactionRepository = overrides.transactionRepository ?? new TransactionRepository();
  const accountRepository = overrides.accountRepository ?? new AccountRepository();

  const accountService = new AccountService(accountRepository, overrides.clock);
  const accountClient = overrides.accountClient
    ? overrides.accountClient(accountService)
    : createAccountServiceClient();

  const transactionService = new TransactionService(transactionRepository, accountClient, {
    ...(overrides.clock ? { clock: overrides.clock } : {}),
    ...overrides.transactionOptions,
  });

  return {
    transactionRepository,
    accountRepository,
    accountService,
    accountClient,
    transactionService,
    accountController: new AccountController(accountService),
    transactionController: new TransactionController(transactionService),
  };
};
