export type { ITransactionRepository } from './ITransactionRepository';
export type { IAccountRepository } from './IAccountRepository';
