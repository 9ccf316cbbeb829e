import { TransactionStatus } from '../../types/transaction';
import { ApiError } from '../../middlewares/errorHandler';

/**
 * Valid state transitions for a transaction
 *
 * State Machine:
 *            ┌──────────► CANCELLED
 *            │ (cancel)
 * PENDING ───┼──────────► PROCESSING ────► COMPLETED ────► REVERSED
 *   ▲        │ (timeout)       │ (call fails)   (reverse)
 *   │        ▼                 ▼
 *   └────── FAILED ◄───────────┘
 *   (retry)
 */
const validTransitions: Record<TransactionStatus, TransactionStatus[]> = {
  [TransactionStatus.PENDING]: [
    TransactionStatus.PROCESSING,
    TransactionStatus.CANCELLED,
    TransactionStatus.FAILED,
  ],
  [TransactionStatus.PROCESSING]: [TransactionStatus.COMPLETED, TransactionStatus.FAILED],
  [TransactionStatus.FAILED]: [TransactionStatus.PENDING],
  [TransactionStatus.COMPLETED]: [TransactionStatus.REVERSED],
  [TransactionStatus.CANCELLED]: [],
  [TransactionStatus.REVERSED]: [],
};

const finalStates: ReadonlySet<TransactionStatus> = new Set([
  TransactionStatus.COMPLETED,
  TransactionStatus.FAILED,
  TransactionStatus.CANCELLED,
  TransactionStatus.REVERSED,
]);

export function isValidTransition(
  currentStatus: TransactionStatus,
  newStatus: TransactionStatus
): boolean {
  return validTransitions[currentStatus].includes(newStatus);
}

/**
 * Throws INVALID_STATE_TRANSITION when the move is not in the table
 */
export function validateTransition(
  currentStatus: TransactionStatus,
  newStatus: TransactionStatus,
  transactionId: string
): void {
  if (!isValidTransition(currentStatus, newStatus)) {
    throw ApiError.invalidTransition(
      `Invalid state transition from ${currentStatus} to ${newStatus} for transaction ${transactionId}`
    );
  }
}

/**
 * Final: processing has concluded one way or another. FAILED and COMPLETED
 * are final yet still allow retry and reverse respectively.
 */
export function isFinalState(status: TransactionStatus): boolean {
  return finalStates.has(status);
}

/**
 * Terminal: no transition leaves this state
 */
export function isTerminalState(status: TransactionStatus): boolean {
  return validTransitions[status].length === 0;
}

export const canCancel = (status: TransactionStatus): boolean =>
  isValidTransition(status, TransactionStatus.CANCELLED);

export const canRetry = (status: TransactionStatus): boolean => status === TransactionStatus.FAILED;

export const canReverse = (status: TransactionStatus): boolean =>
  isValidTransition(status, TransactionStatus.REVERSED);
