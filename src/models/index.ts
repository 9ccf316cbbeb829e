export { Transaction } from './Transaction';
export type { ITransaction } from './Transaction';
export { Account } from './Account';
export type { IAccount } from './Account';
export { AccountOperation } from './AccountOperation';
export type { IAccountOperation } from './AccountOperation';
