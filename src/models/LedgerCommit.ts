import mongoose, { Document, Schema } from 'mongoose';

export interface ILedgerCommit extends Document {
  sequence: number;
  sender: string;
  label: string;
  writeCount: number;
  notificationCount: number;
  committedAt: Date;
}

const ledgerCommitSchema = new Schema<ILedgerCommit>({
  sequence: {
    type: Number,
    required: true,
    unique: true,
    index: true,
  },
  sender: {
    type: String,
    required: true,
    lowercase: true,
    index: true,
  },
  label: {
    type: String,
    required: true,
  },
  writeCount: {
    type: Number,
    required: true,
    min: 0,
  },
  notificationCount: {
    type: Number,
    required: true,
    min: 0,
  },
  committedAt: {
    type: Date,
    required: true,
  },
});

export const LedgerCommit = mongoose.model<ILedgerCommit>('LedgerCommit', ledgerCommitSchema);
