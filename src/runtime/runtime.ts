/**
 * Ledger Runtime
 *
 * Executes ledger entry points one at a time with all-or-nothing semantics.
 * Every storage write made during a call is journaled; if the call throws, the
 * journal is unwound in reverse and the call's notifications are dropped.
 * A call that returns is committed: its writes and notifications become one
 * CommitRecord, appended to the notification log and handed to listeners
 * (persistence, pub/sub relay).
 *
 * While staging, every commit also keeps its journal so it can be withdrawn
 * if it turns out it could not be persisted. Staged notifications are not
 * visible to queries until confirmed.
 *
 * Calls are synchronous, so there is no suspension point inside a call and
 * two calls can never interleave.
 */

import { ApiError } from '../middlewares/errorHandler';
import { LedgerEvent, LedgerNotification } from '../types/events';
import { Address, deriveContractAddress } from './address';
import { NotificationFilter, NotificationLog } from './notifications';
import { Codec, JournalEntry, StorageJournal, StorageMap, StorageTable } from './storage';

export interface CallContext {
  readonly sender: Address;
}

export interface DeployedContract {
  readonly address: Address;
}

export interface SlotWrite {
  contract: Address;
  table: string;
  key: string;
  value: string;
}

export interface CommitRecord {
  sequence: number;
  sender: Address;
  label: string;
  writes: SlotWrite[];
  notifications: LedgerNotification[];
  committedAt: Date;
}

export type CommitListener = (commit: CommitRecord) => void;

export interface RuntimeOptions {
  /** Notifications kept in memory; older ones are served from the store */
  notificationRetention?: number;
}

export const DEFAULT_NOTIFICATION_RETENTION = 10_000;

interface ActiveCall {
  sender: Address;
  label: string;
  journal: JournalEntry[];
  pending: LedgerEvent[];
}

interface StagedCommit {
  sequence: number;
  journal: JournalEntry[];
  notificationCount: number;
}

const tableId = (contract: Address, name: string): string => `${contract}/${name}`;

export class LedgerRuntime implements StorageJournal {
  private readonly contracts = new Map<Address, DeployedContract>();
  private readonly tables = new Map<string, StorageTable>();
  private readonly nonces = new Map<Address, number>();
  private readonly log: NotificationLog;
  private readonly listeners: CommitListener[] = [];
  private active: ActiveCall | null = null;
  private sequence = 0;
  private staged: StagedCommit[] | null = null;

  constructor(options: RuntimeOptions = {}) {
    this.log = new NotificationLog(options.notificationRetention ?? DEFAULT_NOTIFICATION_RETENTION);
  }

  /**
   * Run one top-level entry point as `sender`.
   */
  execute<T>(sender: Address, label: string, fn: (ctx: CallContext) => T): T {
    if (this.active) {
      throw ApiError.internal(
        `Cannot start ${label} inside ${this.active.label}; call the ledger method directly`
      );
    }

    const call: ActiveCall = { sender, label, journal: [], pending: [] };
    this.active = call;

    let result: T;
    try {
      result = fn({ sender });
    } catch (error) {
      this.revertTo(call, 0, 0);
      this.active = null;
      throw error;
    }

    this.active = null;
    this.commit(call);
    return result;
  }

  /**
   * Nested rollback boundary: a throw inside `fn` undoes only what `fn` did.
   */
  savepoint<T>(fn: () => T): T {
    const call = this.requireActive('savepoint');
    const journalMark = call.journal.length;
    const eventMark = call.pending.length;

    try {
      return fn();
    } catch (error) {
      this.revertTo(call, journalMark, eventMark);
      throw error;
    }
  }

  /**
   * Commit everything the current call has done so far. A later failure in
   * the same call only unwinds what happens after this point.
   */
  settle(): void {
    const call = this.requireActive('settle');
    this.commit(call);
    call.journal = [];
    call.pending = [];
  }

  emit(event: LedgerEvent): void {
    this.requireActive(event.eventType).pending.push(event);
  }

  recordWrite(entry: JournalEntry): void {
    this.requireActive(`write to ${entry.table.name}`).journal.push(entry);
  }

  /**
   * Keep every commit from now on withdrawable until confirmStaged() or
   * withdrawStaged().
   */
  beginStaging(): void {
    if (this.staged) {
      throw ApiError.internal('Commits are already being staged');
    }
    this.staged = [];
  }

  confirmStaged(): void {
    this.staged = null;
  }

  /**
   * Undo every staged commit from `fromSequence` on, newest first, and drop
   * its notifications. Earlier staged commits are confirmed. Returns the
   * number of commits withdrawn.
   */
  withdrawStaged(fromSequence: number): number {
    const staged = this.staged ?? [];
    this.staged = null;

    const withdrawn = staged.filter((commit) => commit.sequence >= fromSequence).reverse();
    for (const commit of withdrawn) {
      for (let i = commit.journal.length - 1; i >= 0; i--) {
        commit.journal[i].undo();
      }
      this.log.removeLast(commit.notificationCount);
    }

    if (withdrawn.length > 0) {
      this.sequence = fromSequence - 1;
    }
    return withdrawn.length;
  }

  deploy<C extends DeployedContract>(deployer: Address, factory: (address: Address) => C): C {
    const nonce = this.nonces.get(deployer) ?? 0;
    this.nonces.set(deployer, nonce + 1);

    const contract = factory(deriveContractAddress(deployer, nonce));
    this.contracts.set(contract.address, contract);
    return contract;
  }

  /**
   * Address the deployer's next deployment (plus `offset`) will receive.
   * Lets mutually referencing ledgers be wired at genesis.
   */
  predictAddress(deployer: Address, offset = 0): Address {
    return deriveContractAddress(deployer, (this.nonces.get(deployer) ?? 0) + offset);
  }

  resolve(address: Address): DeployedContract | undefined {
    return this.contracts.get(address);
  }

  createTable<V>(contract: Address, name: string, codec: Codec<V>): StorageMap<V> {
    const id = tableId(contract, name);
    if (this.tables.has(id)) {
      throw new Error(`Storage table ${id} already exists`);
    }
    const table = new StorageMap<V>(this, contract, name, codec);
    this.tables.set(id, table);
    return table;
  }

  /**
   * Load persisted slot values over genesis state. Must run before any call.
   */
  hydrate(slots: SlotWrite[], lastSequence: number): void {
    if (this.active || this.sequence > 0) {
      throw new Error('Runtime can only be hydrated before the first call');
    }

    for (const slot of slots) {
      const table = this.tables.get(tableId(slot.contract, slot.table));
      if (!table) {
        throw new Error(`Persisted slot belongs to unknown table ${tableId(slot.contract, slot.table)}`);
      }
      table.hydrate(slot.key, slot.value);
    }

    this.sequence = lastSequence;
    this.log.startAfter(lastSequence);
  }

  onCommit(listener: CommitListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  /**
   * Confirmed notifications still held in memory, oldest first.
   */
  notifications(filter: NotificationFilter = {}): LedgerNotification[] {
    return this.log.query(filter, this.confirmedSequence());
  }

  /**
   * Lowest sequence whose notifications notifications() still returns in full.
   */
  notificationsCoverFrom(): number {
    return this.log.coversFrom();
  }

  currentSequence(): number {
    return this.sequence;
  }

  confirmedSequence(): number {
    const [firstStaged] = this.staged ?? [];
    return firstStaged ? firstStaged.sequence - 1 : this.sequence;
  }

  private requireActive(operation: string): ActiveCall {
    if (!this.active) {
      throw ApiError.internal(`${operation} attempted outside a ledger call`);
    }
    return this.active;
  }

  private revertTo(call: ActiveCall, journalMark: number, eventMark: number): void {
    for (let i = call.journal.length - 1; i >= journalMark; i--) {
      call.journal[i].undo();
    }
    call.journal.length = journalMark;
    call.pending.length = eventMark;
  }

  private commit(call: ActiveCall): void {
    if (call.journal.length === 0 && call.pending.length === 0) {
      return;
    }

    const sequence = ++this.sequence;
    const committedAt = new Date();

    // Last write wins: persist each touched slot once, with its final value
    const writes = new Map<string, SlotWrite>();
    for (const { table, key } of call.journal) {
      writes.set(`${tableId(table.contract, table.name)}/${key}`, {
        contract: table.contract,
        table: table.name,
        key,
        value: table.encodedValue(key),
      });
    }

    const notifications: LedgerNotification[] = call.pending.map((event, logIndex) => ({
      ...event,
      sequence,
      logIndex,
      timestamp: committedAt,
    }));
    for (const notification of notifications) {
      this.log.append(notification);
    }
    this.staged?.push({ sequence, journal: call.journal, notificationCount: notifications.length });

    const record: CommitRecord = {
      sequence,
      sender: call.sender,
      label: call.label,
      writes: [...writes.values()],
      notifications,
      committedAt,
    };

    for (const listener of this.listeners) {
      listener(record);
    }
  }
}
