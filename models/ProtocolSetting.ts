import mongoose, { Schema, Document, Types } from 'mongoose';

export const PROTOCOL_SETTINGS_KEY = 'protocol';

export interface IProtocolSetting extends Document {
  _id: Types.ObjectId;
  key: string;
  paused: boolean;
  updatedAt: Date;
}

const protocolSettingSchema = new Schema<IProtocolSetting>(
  {
    key: { type: String, required: true, unique: true },
    paused: { type: Boolean, default: false },
  },
  { timestamps: { createdAt: false, updatedAt: true } }
);

export const ProtocolSetting = mongoose.model<IProtocolSetting>('ProtocolSetting', protocolSettingSchema);
