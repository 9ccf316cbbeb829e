import mongoose, { Document, Schema } from 'mongoose';

import { AccountOperationStatus, AccountOperationType } from '../types/account';

/**
 * One debit or credit. The row is inserted before the balance moves, so the
 * unique operationId lets only one caller apply a given operation.
 */
export interface IAccountOperation extends Document {
  operationId: string;
  accountId: string;
  type: AccountOperationType;
  amount: number;
  resultBalance: number;
  status: AccountOperationStatus;
  description?: string;
  createdAt: Date;
  updatedAt: Date;
}

const accountOperationSchema = new Schema<IAccountOperation>(
  {
    operationId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    accountId: {
      type: String,
      required: true,
      index: true,
    },
    type: {
      type: String,
      required: true,
      enum: ['DEBIT', 'CREDIT'],
    },
    amount: {
      type: Number,
      required: true,
      min: 0,
    },
    resultBalance: {
      type: Number,
      required: true,
    },
    status: {
      type: String,
      required: true,
      enum: ['PENDING', 'APPLIED'],
      default: 'PENDING',
    },
    description: {
      type: String,
      maxlength: 500,
    },
  },
  {
    timestamps: true,
  }
);

accountOperationSchema.index({ accountId: 1, status: 1, createdAt: -1 });

export const AccountOperation = mongoose.model<IAccountOperation>(
  'AccountOperation',
  accountOperationSchema
);
