import mongoose, { Document, Schema } from 'mongoose';

import { EventType } from '../types/events';

export interface ILedgerNotification extends Document {
  sequence: number;
  logIndex: number;
  contract: string;
  eventType: EventType;
  payload: Record<string, string>;
  timestamp: Date;
}

const ledgerNotificationSchema = new Schema<ILedgerNotification>({
  sequence: {
    type: Number,
    required: true,
  },
  logIndex: {
    type: Number,
    required: true,
    min: 0,
  },
  contract: {
    type: String,
    required: true,
    lowercase: true,
    index: true,
  },
  eventType: {
    type: String,
    required: true,
    enum: Object.values(EventType),
    index: true,
  },
  payload: {
    type: Schema.Types.Mixed,
    required: true,
  },
  timestamp: {
    type: Date,
    required: true,
  },
});

// Append-only log position
ledgerNotificationSchema.index({ sequence: 1, logIndex: 1 }, { unique: true });

// Correlating escrow activity by user/job id
ledgerNotificationSchema.index({ 'payload.userId': 1 }, { sparse: true });

export const LedgerNotificationRecord = mongoose.model<ILedgerNotification>(
  'LedgerNotification',
  ledgerNotificationSchema
);
