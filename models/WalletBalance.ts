import mongoose, { Schema, Document, Types } from 'mongoose';

export interface IWalletBalance extends Document {
  _id: Types.ObjectId;
  account: string;
  asset: string;
  amount: string;
  createdAt: Date;
  updatedAt: Date;
}

const walletBalanceSchema = new Schema<IWalletBalance>(
  {
    account: { type: String, required: true, index: true },
    asset: { type: String, required: true },
    amount: { type: String, default: '0' },
  },
  { timestamps: true }
);

walletBalanceSchema.index({ account: 1, asset: 1 }, { unique: true });

export const WalletBalance = mongoose.model<IWalletBalance>('WalletBalance', walletBalanceSchema);
