export { TransactionService } from './transaction.service';
export type { TransactionServiceOptions } from './transaction.service';
export { TransactionController } from './transaction.controller';
export { createTransactionRouter } from './transaction.routes';
export {
  isValidTransition,
  validateTransition,
  isFinalState,
  isTerminalState,
} from './transaction.state';
