import { body, param, query, ValidationChain } from 'express-validator';

import { config } from '../../config';
import {
  TRANSACTION_SORT_FIELDS,
  TransactionStatus,
  TransactionType,
  parseTransactionStatus,
  parseTransactionType,
} from '../../types/transaction';

// The generated reference is `TXN-` + the external reference and must fit in 50 characters
const MAX_EXTERNAL_REFERENCE_LENGTH = 46;

const twoDecimals = (value: unknown): boolean => {
  const decimalPlaces = (String(value).split('.')[1] || '').length;
  if (decimalPlaces > 2) {
    throw new Error('Amount can have at most 2 decimal places');
  }
  return true;
};

const statusList = Object.values(TransactionStatus).join(', ');
const typeList = Object.values(TransactionType).join(', ');

/**
 * Field rules for one create request. `prefix` lets the bulk route reuse them
 * for every array element.
 */
const transactionBodyRules = (prefix = ''): ValidationChain[] => [
  body(`${prefix}transactionType`)
    .isString()
    .withMessage('Transaction type is required')
    .trim()
    .notEmpty()
    .withMessage('Transaction type is required'),
  body(`${prefix}amount`)
    .notEmpty()
    .withMessage('Amount is required')
    .isFloat({ min: 0.01 })
    .withMessage('Amount must be at least 0.01')
    .custom(twoDecimals)
    .toFloat(),
  body(`${prefix}fee`)
    .optional()
    .isFloat({ min: 0 })
    .withMessage('Fee cannot be negative')
    .custom(twoDecimals)
    .toFloat(),
  body(`${prefix}fromAccountId`)
    .optional({ values: 'null' })
    .isString()
    .withMessage('Source account ID must be a string'),
  body(`${prefix}toAccountId`)
    .optional({ values: 'null' })
    .isString()
    .withMessage('Destination account ID must be a string'),
  body(`${prefix}currency`)
    .optional()
    .isString()
    .withMessage('Currency must be a string')
    .matches(/^[A-Za-z]{3}$/)
    .withMessage('Currency must be a 3-letter code'),
  body(`${prefix}description`)
    .optional({ values: 'null' })
    .isString()
    .withMessage('Description must be a string')
    .isLength({ max: 500 })
    .withMessage('Description cannot exceed 500 characters'),
  body(`${prefix}externalReference`)
    .optional({ values: 'null' })
    .isString()
    .withMessage('External reference must be a string')
    .isLength({ max: MAX_EXTERNAL_REFERENCE_LENGTH })
    .withMessage(`External reference cannot exceed ${MAX_EXTERNAL_REFERENCE_LENGTH} characters`),
];

export const createTransactionValidation = transactionBodyRules();

export const bulkTransactionValidation = [
  body('transactions')
    .isArray({ min: 1, max: config.transaction.bulkMaxSize })
    .withMessage(
      `Transactions must be a list of 1 to ${config.transaction.bulkMaxSize} requests`
    ),
  ...transactionBodyRules('transactions.*.'),
];

export const transactionIdValidation = [
  param('id')
    .isString()
    .trim()
    .notEmpty()
    .withMessage('Transaction ID is required'),
];

export const referenceValidation = [
  param('reference')
    .isString()
    .trim()
    .notEmpty()
    .withMessage('Reference is required'),
];

export const accountIdValidation = [
  param('accountId')
    .isString()
    .trim()
    .notEmpty()
    .withMessage('Account ID is required'),
];

export const pageValidation = [
  query('page')
    .optional()
    .isInt({ min: 0 })
    .withMessage('Page must be a non-negative integer'),
  query('size')
    .optional()
    .isInt({ min: 1 })
    .withMessage('Size must be a positive integer'),
  query('sortBy')
    .optional()
    .isIn([...TRANSACTION_SORT_FIELDS])
    .withMessage(`Sort field must be one of: ${TRANSACTION_SORT_FIELDS.join(', ')}`),
  query('sortDir')
    .optional()
    .custom((value) => ['ASC', 'DESC'].includes(String(value).toUpperCase()))
    .withMessage('Sort direction must be ASC or DESC'),
];

export const listTransactionsValidation = [
  ...pageValidation,
  query('status')
    .optional()
    .custom((value) => parseTransactionStatus(String(value)) !== undefined)
    .withMessage(`Status must be one of: ${statusList}`),
  query('type')
    .optional()
    .custom((value) => parseTransactionType(String(value)) !== undefined)
    .withMessage(`Type must be one of: ${typeList}`),
];

export const statusPathValidation = [
  ...pageValidation,
  param('status')
    .custom((value) => parseTransactionStatus(String(value)) !== undefined)
    .withMessage(`Status must be one of: ${statusList}`),
];

export const typePathValidation = [
  ...pageValidation,
  param('type')
    .custom((value) => parseTransactionType(String(value)) !== undefined)
    .withMessage(`Type must be one of: ${typeList}`),
];

export const dateRangeValidation = [
  query('startDate')
    .notEmpty()
    .withMessage('Start date is required')
    .isISO8601()
    .withMessage('Start date must be an ISO-8601 date-time'),
  query('endDate')
    .notEmpty()
    .withMessage('End date is required')
    .isISO8601()
    .withMessage('End date must be an ISO-8601 date-time'),
];

export const accountDateRangeValidation = [...accountIdValidation, ...dateRangeValidation];

export const accountPagedValidation = [...accountIdValidation, ...pageValidation];

export const updateTransactionValidation = [
  ...transactionIdValidation,
  body('description')
    .optional()
    .isString()
    .withMessage('Description must be a string')
    .isLength({ max: 500 })
    .withMessage('Description cannot exceed 500 characters'),
  body('fee')
    .optional()
    .isFloat({ min: 0 })
    .withMessage('Fee cannot be negative')
    .custom(twoDecimals)
    .toFloat(),
  body()
    .custom((value) => typeof value === 'object' && value !== null && ('description' in value || 'fee' in value))
    .withMessage('Nothing to update: provide description or fee'),
];

export const reverseTransactionValidation = [
  ...transactionIdValidation,
  body('reason')
    .optional()
    .isString()
    .withMessage('Reason must be a string')
    .isLength({ max: 500 })
    .withMessage('Reason cannot exceed 500 characters'),
];
