import { ApiError } from '../../middlewares/errorHandler';
import { TransactionType } from '../../types/transaction';
import { addMoney } from '../../utils/money';

export interface TransactionShape {
  transactionType: TransactionType;
  fromAccountId?: string;
  toAccountId?: string;
}

/**
 * Returns the rule a type/account combination breaks, or null when valid
 */
export function findShapeViolation(shape: TransactionShape): string | null {
  const { transactionType, fromAccountId, toAccountId } = shape;

  switch (transactionType) {
    case TransactionType.DEPOSIT:
      if (!toAccountId) return 'Deposit requires destination account';
      if (fromAccountId) return 'Deposit cannot have source account';
      return null;

    case TransactionType.WITHDRAWAL:
      if (!fromAccountId) return 'Withdrawal requires source account';
      if (toAccountId) return 'Withdrawal cannot have destination account';
      return null;

    case TransactionType.TRANSFER:
      if (!fromAccountId || !toAccountId) {
        return 'Transfer requires both source and destination accounts';
      }
      if (fromAccountId === toAccountId) {
        return 'Source and destination accounts cannot be the same';
      }
      return null;

    case TransactionType.PAYMENT:
      return fromAccountId ? null : 'Payment requires source account';

    case TransactionType.REFUND:
      return toAccountId ? null : 'Refund requires destination account';

    default: {
      const unknownType: never = transactionType;
      return `Unsupported transaction type: ${String(unknownType)}`;
    }
  }
}

export function validateTransactionShape(shape: TransactionShape): void {
  const violation = findShapeViolation(shape);
  if (violation) {
    throw ApiError.invalidOperation(violation);
  }
}

/**
 * What the source account is charged: amount plus fee
 */
export const totalAmount = (transaction: { amount: number; fee: number }): number =>
  addMoney(transaction.amount, transaction.fee);
