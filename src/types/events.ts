export enum EventType {
  // Token ledger
  TRANSFER = 'Transfer',
  APPROVAL = 'Approval',
  TOKENS_ESCROWED = 'TokensEscrowed',
  TOKENS_MIGRATED = 'TokensMigrated',
  ESCROW_CONTRACT_ADDRESS_UPDATED = 'EscrowContractAddressUpdated',
  BRIDGE_MANAGER_UPDATED = 'BridgeManagerUpdated',

  // Escrow ledger
  USER_BALANCE_UPDATE = 'UserBalanceUpdate',
  DISBURSAL_ADDRESS_UPDATED = 'DisbursalAddressUpdated',
  RENDER_TOKEN_ADDRESS_UPDATED = 'RenderTokenAddressUpdated',

  // Any owned ledger
  OWNERSHIP_TRANSFERRED = 'OwnershipTransferred',
}

/**
 * Amounts are carried as decimal strings so notifications survive JSON.
 */
export interface EventPayloads {
  [EventType.TRANSFER]: { from: string; to: string; value: string };
  [EventType.APPROVAL]: { owner: string; spender: string; value: string };
  [EventType.TOKENS_ESCROWED]: { sender: string; userId: string; amount: string };
  [EventType.TOKENS_MIGRATED]: { account: string; amount: string };
  [EventType.ESCROW_CONTRACT_ADDRESS_UPDATED]: { escrowAddress: string };
  [EventType.BRIDGE_MANAGER_UPDATED]: { bridgeManager: string };
  [EventType.USER_BALANCE_UPDATE]: { userId: string; balance: string };
  [EventType.DISBURSAL_ADDRESS_UPDATED]: { disbursalAddress: string };
  [EventType.RENDER_TOKEN_ADDRESS_UPDATED]: { renderTokenAddress: string };
  [EventType.OWNERSHIP_TRANSFERRED]: { previousOwner: string; newOwner: string };
}

export interface BaseEvent<T extends EventType = EventType> {
  eventType: T;
  /** Address of the ledger that emitted the notification */
  contract: string;
  payload: EventPayloads[T];
}

/**
 * Any event, discriminated on `eventType` so the payload narrows with it.
 */
export type LedgerEvent = { [K in EventType]: BaseEvent<K> }[EventType];

/**
 * An event as a ledger raises it; the runtime fills in the emitting contract.
 */
export type EventInput = { [K in EventType]: Omit<BaseEvent<K>, 'contract'> }[EventType];

/**
 * Position of a committed notification in the append-only log.
 */
export interface NotificationPosition {
  sequence: number;
  logIndex: number;
  timestamp: Date;
}

export type LedgerNotification = LedgerEvent & NotificationPosition;

export type EventHandler = (event: LedgerNotification) => Promise<void>;

const eventTypes = new Set<string>(Object.values(EventType));

export const isEventType = (value: unknown): value is EventType =>
  typeof value === 'string' && eventTypes.has(value);

const isStringRecord = (value: unknown): value is Record<string, string> =>
  typeof value === 'object' &&
  value !== null &&
  Object.values(value).every((entry) => typeof entry === 'string');

/**
 * Shape check for notifications read back from the store. Payload fields are
 * not checked against the event type.
 */
export const isLedgerNotification = (value: unknown): value is LedgerNotification =>
  typeof value === 'object' &&
  value !== null &&
  'eventType' in value &&
  isEventType(value.eventType) &&
  'contract' in value &&
  typeof value.contract === 'string' &&
  'payload' in value &&
  isStringRecord(value.payload) &&
  'sequence' in value &&
  typeof value.sequence === 'number' &&
  'logIndex' in value &&
  typeof value.logIndex === 'number' &&
  'timestamp' in value &&
  value.timestamp instanceof Date;
