import mongoose, { Schema, Document, Types } from 'mongoose';

/** One row per asset a user ever supplied or borrowed. */
export interface IAccountAsset extends Document {
  _id: Types.ObjectId;
  user: string;
  asset: string;
  createdAt: Date;
}

const accountAssetSchema = new Schema<IAccountAsset>(
  {
    user: { type: String, required: true, index: true },
    asset: { type: String, required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

accountAssetSchema.index({ user: 1, asset: 1 }, { unique: true });

export const AccountAsset = mongoose.model<IAccountAsset>('AccountAsset', accountAssetSchema);
