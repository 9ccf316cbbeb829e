import { body, param, query } from 'express-validator';

import { AccountType } from '../../types/account';

const twoDecimals = (value: unknown): boolean => {
  const decimalPlaces = (String(value).split('.')[1] || '').length;
  if (decimalPlaces > 2) {
    throw new Error('Amount can have at most 2 decimal places');
  }
  return true;
};

const accountIdParam = param('id')
  .isString()
  .trim()
  .notEmpty()
  .withMessage('Account ID is required');

export const createAccountValidation = [
  body('userId')
    .isString()
    .withMessage('User ID must be a string')
    .trim()
    .notEmpty()
    .withMessage('User ID is required'),
  body('accountType')
    .optional()
    .isIn(Object.values(AccountType))
    .withMessage(`Account type must be one of: ${Object.values(AccountType).join(', ')}`),
  body('currency')
    .optional()
    .isString()
    .isLength({ min: 3, max: 3 })
    .withMessage('Currency must be a 3-letter code'),
  body('overdraftLimit')
    .optional()
    .isFloat({ min: 0 })
    .withMessage('Overdraft limit cannot be negative')
    .toFloat(),
  body('initialDeposit')
    .optional()
    .isFloat({ min: 0 })
    .withMessage('Initial deposit cannot be negative')
    .custom(twoDecimals)
    .toFloat(),
];

export const accountIdValidation = [accountIdParam];

export const movementValidation = [
  accountIdParam,
  body('amount')
    .notEmpty()
    .withMessage('Amount is required')
    .isFloat({ min: 0.01 })
    .withMessage('Amount must be a positive number greater than 0')
    .custom(twoDecimals)
    .toFloat(),
  body('description')
    .optional()
    .isString()
    .isLength({ max: 500 })
    .withMessage('Description must be at most 500 characters'),
  body('operationId')
    .optional()
    .isString()
    .withMessage('Operation ID must be a string')
    .isLength({ min: 1, max: 128 })
    .withMessage('Operation ID must be between 1 and 128 characters'),
];

export const operationsQueryValidation = [
  accountIdParam,
  query('limit')
    .optional()
    .isInt({ min: 1, max: 100 })
    .withMessage('Limit must be between 1 and 100')
    .toInt(),
];
