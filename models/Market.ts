import mongoose, { Schema, Document, Types } from 'mongoose';

/** Fixed-point fields are base-10 integer strings scaled by 1e18. */
export interface IMarket extends Document {
  _id: Types.ObjectId;
  asset: string;
  active: boolean;
  totalSupplied: string;
  totalBorrowed: string;
  supplyRatePerSecond: string;
  borrowRatePerSecond: string;
  reserveFactor: string;
  collateralFactor: string;
  liquidationThreshold: string;
  lastUpdateTime: number;
  supplyIndex: string;
  borrowIndex: string;
  createdAt: Date;
  updatedAt: Date;
}

const marketSchema = new Schema<IMarket>(
  {
    asset: { type: String, required: true, unique: true },
    active: { type: Boolean, default: true, index: true },
    totalSupplied: { type: String, default: '0' },
    totalBorrowed: { type: String, default: '0' },
    supplyRatePerSecond: { type: String, required: true },
    borrowRatePerSecond: { type: String, required: true },
    reserveFactor: { type: String, required: true },
    collateralFactor: { type: String, required: true },
    liquidationThreshold: { type: String, required: true },
    lastUpdateTime: { type: Number, required: true },
    supplyIndex: { type: String, required: true },
    borrowIndex: { type: String, required: true },
  },
  { timestamps: true }
);

export const Market = mongoose.model<IMarket>('Market', marketSchema);
