/**
 * Unit tests for Transaction Validation
 *
 * Tests the express-validator chains for transaction endpoints and the
 * page parameter defaults.
 */

import { ValidationChain, validationResult } from 'express-validator';

import { toPageRequest } from '../../../src/services/transaction/transaction.controller';
import {
  bulkTransactionValidation,
  createTransactionValidation,
  listTransactionsValidation,
  updateTransactionValidation,
} from '../../../src/services/transaction/transaction.validation';

type FakeRequest = {
  body: Record<string, unknown>;
  params: Record<string, string>;
  query: Record<string, string>;
};

// Runs the chains and returns { field: messages[] }
const runValidation = async (validations: ValidationChain[], req: Partial<FakeRequest>) => {
  const request: FakeRequest = { body: {}, params: {}, query: {}, ...req };
  for (const validation of validations) {
    await validation.run(request);
  }
  return {
    request,
    errors: validationResult(request)
      .array()
      .reduce<Record<string, string[]>>((acc, err) => {
        const field = err.type === 'field' ? err.path : err.type;
        acc[field] = [...(acc[field] ?? []), String(err.msg)];
        return acc;
      }, {}),
  };
};

describe('Transaction Validation', () => {
  describe('createTransactionValidation', () => {
    it('should pass a complete transfer and convert numbers', async () => {
      const { errors, request } = await runValidation(createTransactionValidation, {
        body: {
          transactionType: 'TRANSFER',
          fromAccountId: 'acc_1',
          toAccountId: 'acc_2',
          amount: '99.99',
          fee: '0.5',
          currency: 'eur',
          description: 'Rent',
          externalReference: 'INV-2024-06',
        },
      });

      expect(errors).toEqual({});
      expect(request.body.amount).toBe(99.99);
      expect(request.body.fee).toBe(0.5);
    });

    it('should accept null account ids', async () => {
      const { errors } = await runValidation(createTransactionValidation, {
        body: { transactionType: 'DEPOSIT', fromAccountId: null, toAccountId: 'acc_2', amount: 1 },
      });

      expect(errors).toEqual({});
    });

    it('should require a type and an amount', async () => {
      const { errors } = await runValidation(createTransactionValidation, { body: {} });

      expect(errors.transactionType).toContain('Transaction type is required');
      expect(errors.amount).toContain('Amount is required');
    });

    it('should reject a negative fee and a bad currency code', async () => {
      const { errors } = await runValidation(createTransactionValidation, {
        body: { transactionType: 'PAYMENT', fromAccountId: 'acc_1', amount: 5, fee: -1, currency: 'EURO' },
      });

      expect(errors.fee).toEqual(['Fee cannot be negative']);
      expect(errors.currency).toEqual(['Currency must be a 3-letter code']);
    });

    it('should cap the external reference at 46 characters', async () => {
      const { errors } = await runValidation(createTransactionValidation, {
        body: { transactionType: 'DEPOSIT', toAccountId: 'acc_1', amount: 5, externalReference: 'R'.repeat(47) },
      });

      expect(errors.externalReference).toEqual(['External reference cannot exceed 46 characters']);
    });
  });

  describe('bulkTransactionValidation', () => {
    it('should refuse a body without a list', async () => {
      const { errors } = await runValidation(bulkTransactionValidation, { body: { transactionType: 'DEPOSIT' } });

      expect(errors.transactions).toEqual(['Transactions must be a list of 1 to 50 requests']);
    });
  });

  describe('listTransactionsValidation', () => {
    it('should accept case-insensitive filters', async () => {
      const { errors } = await runValidation(listTransactionsValidation, {
        query: { status: 'completed', type: 'Transfer', sortDir: 'asc' },
      });

      expect(errors).toEqual({});
    });

    it('should reject unknown sort fields and negative pages', async () => {
      const { errors } = await runValidation(listTransactionsValidation, {
        query: { sortBy: 'password', page: '-1' },
      });

      expect(errors.sortBy).toEqual([
        'Sort field must be one of: createdAt, updatedAt, processedAt, amount, status, transactionType, reference',
      ]);
      expect(errors.page).toEqual(['Page must be a non-negative integer']);
    });
  });

  describe('updateTransactionValidation', () => {
    it('should require description or fee', async () => {
      const { errors } = await runValidation(updateTransactionValidation, {
        params: { id: 'txn_1' },
        body: {},
      });

      expect(Object.values(errors)).toEqual([['Nothing to update: provide description or fee']]);
    });
  });
});

describe('toPageRequest', () => {
  it('should default to the first page of 20, newest first', () => {
    expect(toPageRequest({})).toEqual({ page: 0, size: 20, sortBy: 'createdAt', sortDir: 'DESC' });
  });

  it('should cap the page size at 100', () => {
    expect(toPageRequest({ page: '3', size: '500', sortBy: 'amount', sortDir: 'asc' })).toEqual({
      page: 3,
      size: 100,
      sortBy: 'amount',
      sortDir: 'ASC',
    });
  });

  it('should fall back on unusable values', () => {
    expect(toPageRequest({ page: 'x', size: '0', sortBy: 'secret' })).toEqual({
      page: 0,
      size: 20,
      sortBy: 'createdAt',
      sortDir: 'DESC',
    });
  });
});
