import { IAccountServiceClient } from '../../src/clients/accountService.types';
import { IAccountRepository, ITransactionRepository } from '../../src/repositories/interfaces';

export const createMockTransactionRepository = (): jest.Mocked<ITransactionRepository> => ({
  create: jest.fn(),
  findById: jest.fn(),
  findByReference: jest.fn(),
  existsByReference: jest.fn(),
  findAll: jest.fn(),
  findPage: jest.fn(),
  count: jest.fn(),
  countByStatus: jest.fn(),
  updateIfStatus: jest.fn(),
  sumNetAmountForAccount: jest.fn(),
  findLargestCompletedAmount: jest.fn(),
});

export const createMockAccountRepository = (): jest.Mocked<IAccountRepository> => ({
  create: jest.fn(),
  findById: jest.fn(),
  existsByAccountNumber: jest.fn(),
  applyDebit: jest.fn(),
  applyCredit: jest.fn(),
  close: jest.fn(),
  findOperation: jest.fn(),
  claimOperation: jest.fn(),
  completeOperation: jest.fn(),
  releaseOperation: jest.fn(),
  listOperations: jest.fn(),
});

export const createMockAccountClient = (): jest.Mocked<IAccountServiceClient> => ({
  getAccount: jest.fn(),
  canDebit: jest.fn(),
  canCredit: jest.fn(),
  debitAccount: jest.fn(),
  creditAccount: jest.fn(),
});
