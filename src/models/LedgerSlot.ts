import mongoose, { Document, Schema } from 'mongoose';

/**
 * Latest committed value of one storage slot of one ledger.
 */
export interface ILedgerSlot extends Document {
  contract: string;
  table: string;
  key: string;
  value: string;
  sequence: number;
  updatedAt: Date;
}

const ledgerSlotSchema = new Schema<ILedgerSlot>(
  {
    contract: {
      type: String,
      required: true,
      lowercase: true,
    },
    table: {
      type: String,
      required: true,
    },
    key: {
      type: String,
      required: true,
    },
    value: {
      type: String,
      required: true,
    },
    sequence: {
      type: Number,
      required: true,
      min: 1,
    },
  },
  {
    timestamps: { createdAt: false, updatedAt: true },
  }
);

ledgerSlotSchema.index({ contract: 1, table: 1, key: 1 }, { unique: true });

export const LedgerSlot = mongoose.model<ILedgerSlot>('LedgerSlot', ledgerSlotSchema);
