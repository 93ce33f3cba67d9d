export { Address, ZERO_ADDRESS, isAddress, toAddress, isZeroAddress, deriveContractAddress } from './address';
export {
  MAX_UINT256,
  isUint256String,
  parseUint256,
  checkedAdd,
  checkedSub,
  saturatingSub,
  decodeUint256Word,
} from './uint256';
export {
  Codec,
  uint256Codec,
  addressCodec,
  StorageMap,
  StorageValue,
  StorageTable,
  StorageJournal,
  JournalEntry,
  compositeKey,
} from './storage';
export {
  LedgerRuntime,
  CallContext,
  DeployedContract,
  SlotWrite,
  CommitRecord,
  CommitListener,
  RuntimeOptions,
  DEFAULT_NOTIFICATION_RETENTION,
} from './runtime';
export { NotificationFilter, NotificationLog, matchesFilter } from './notifications';
export { Contract, OwnedContract } from './contract';
