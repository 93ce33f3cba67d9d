export { LedgerSlot, ILedgerSlot } from './LedgerSlot';
export { LedgerNotificationRecord, ILedgerNotification } from './LedgerNotification';
export { LedgerCommit, ILedgerCommit } from './LedgerCommit';
