export { AccountService, generateAccountNumber } from './account.service';
export type {
  AccountBalance,
  CreateAccountRequest,
  MovementCommand,
  OperationResult,
} from './account.service';
export { AccountController } from './account.controller';
export { createAccountRouter } from './account.routes';
