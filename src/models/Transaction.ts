import mongoose, { Document, Schema } from 'mongoose';

import { TransactionStatus, TransactionType } from '../types/transaction';

export interface ITransaction extends Document {
  transactionId: string;
  reference: string;
  fromAccountId?: string;
  toAccountId?: string;
  amount: number;
  fee: number;
  currency: string;
  transactionType: TransactionType;
  status: TransactionStatus;
  description?: string;
  errorMessage?: string;
  attempts: number;
  processedAt?: Date;
  reversedAt?: Date;
  reversalReason?: string;
  createdBy?: string;
  updatedBy?: string;
  createdAt: Date;
  updatedAt: Date;
}

const transactionSchema = new Schema<ITransaction>(
  {
    transactionId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    reference: {
      type: String,
      required: true,
      unique: true,
      maxlength: 50,
    },
    fromAccountId: {
      type: String,
      index: true,
    },
    toAccountId: {
      type: String,
      index: true,
    },
    amount: {
      type: Number,
      required: true,
      min: 0.01,
    },
    fee: {
      type: Number,
      required: true,
      default: 0,
      min: 0,
    },
    currency: {
      type: String,
      required: true,
      default: 'USD',
      uppercase: true,
      match: /^[A-Z]{3}$/,
    },
    transactionType: {
      type: String,
      required: true,
      enum: Object.values(TransactionType),
      index: true,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(TransactionStatus),
      default: TransactionStatus.PENDING,
      index: true,
    },
    description: {
      type: String,
      trim: true,
      maxlength: 500,
    },
    errorMessage: {
      type: String,
      maxlength: 1000,
    },
    attempts: {
      type: Number,
      required: true,
      default: 0,
      min: 0,
    },
    processedAt: Date,
    reversedAt: Date,
    reversalReason: {
      type: String,
      maxlength: 500,
    },
    createdBy: String,
    updatedBy: String,
  },
  {
    timestamps: true,
  }
);

transactionSchema.index({ status: 1, createdAt: -1 });
transactionSchema.index({ fromAccountId: 1, createdAt: -1 });
transactionSchema.index({ toAccountId: 1, createdAt: -1 });
transactionSchema.index({ createdAt: -1 });

export const Transaction = mongoose.model<ITransaction>('Transaction', transactionSchema);
