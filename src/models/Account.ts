import mongoose, { Document, Schema } from 'mongoose';

import { AccountStatus, AccountType } from '../types/account';

export interface IAccount extends Document {
  accountId: string;
  userId: string;
  accountNumber: string;
  accountType: AccountType;
  balance: number;
  status: AccountStatus;
  currency: string;
  overdraftLimit: number;
  openedAt: Date;
  closedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

const accountSchema = new Schema<IAccount>(
  {
    accountId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    userId: {
      type: String,
      required: true,
      index: true,
    },
    accountNumber: {
      type: String,
      required: true,
      unique: true,
    },
    accountType: {
      type: String,
      required: true,
      enum: Object.values(AccountType),
      default: AccountType.SAVINGS,
    },
    // May go negative down to -overdraftLimit
    balance: {
      type: Number,
      required: true,
      default: 0,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(AccountStatus),
      default: AccountStatus.ACTIVE,
    },
    currency: {
      type: String,
      required: true,
      default: 'USD',
      uppercase: true,
    },
    overdraftLimit: {
      type: Number,
      required: true,
      default: 0,
      min: 0,
    },
    openedAt: {
      type: Date,
      required: true,
      default: Date.now,
    },
    closedAt: Date,
  },
  {
    timestamps: true,
  }
);

export const Account = mongoose.model<IAccount>('Account', accountSchema);
