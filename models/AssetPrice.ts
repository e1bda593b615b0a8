import mongoose, { Schema, Document, Types } from 'mongoose';

export interface IAssetPrice extends Document {
  _id: Types.ObjectId;
  asset: string;
  price: string;
  updatedAt: Date;
}

const assetPriceSchema = new Schema<IAssetPrice>(
  {
    asset: { type: String, required: true, unique: true },
    price: { type: String, required: true },
  },
  { timestamps: { createdAt: false, updatedAt: true } }
);

export const AssetPrice = mongoose.model<IAssetPrice>('AssetPrice', assetPriceSchema);
