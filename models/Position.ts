import mongoose, { Schema, Document, Types } from 'mongoose';

export interface IPosition extends Document {
  _id: Types.ObjectId;
  user: string;
  asset: string;
  suppliedAmount: string;
  borrowedAmount: string;
  supplyIndexSnapshot: string;
  borrowIndexSnapshot: string;
  isCollateral: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const positionSchema = new Schema<IPosition>(
  {
    user: { type: String, required: true, index: true },
    asset: { type: String, required: true, index: true },
    suppliedAmount: { type: String, default: '0' },
    borrowedAmount: { type: String, default: '0' },
    supplyIndexSnapshot: { type: String, default: '0' },
    borrowIndexSnapshot: { type: String, default: '0' },
    isCollateral: { type: Boolean, default: false },
  },
  { timestamps: true }
);

positionSchema.index({ user: 1, asset: 1 }, { unique: true });

export const Position = mongoose.model<IPosition>('Position', positionSchema);
