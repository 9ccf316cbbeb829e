import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped context shared by logs, metrics and outbound calls
 */
export interface LogContext {
  correlationId: string;
  userId?: string;
  transactionId?: string;
  [key: string]: unknown;
}

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined => {
  return asyncLocalStorage.getStore()?.correlationId;
};

export const getLogContext = (): LogContext | undefined => {
  return asyncLocalStorage.getStore();
};

/**
 * Merge fields into the current context, if there is one
 */
export const addLogContext = (context: Partial<LogContext>): void => {
  const store = asyncLocalStorage.getStore();
  if (store) {
    Object.assign(store, context);
  }
};

/**
 * Run a function within a specific log context. Background jobs use this to
 * get a correlation id of their own.
 */
export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run(context, fn);
};
