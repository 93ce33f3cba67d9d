import { EventType, LedgerNotification } from '../types/events';
import { Address } from './address';

export interface NotificationFilter {
  eventType?: EventType;
  contract?: Address;
  fromSequence?: number;
  limit?: number;
}

export const matchesFilter = (notification: LedgerNotification, filter: NotificationFilter): boolean =>
  (filter.eventType === undefined || notification.eventType === filter.eventType) &&
  (filter.contract === undefined || notification.contract === filter.contract) &&
  (filter.fromSequence === undefined || notification.sequence >= filter.fromSequence);

/**
 * The most recent committed notifications, in log order. Once `capacity` is
 * reached each append evicts the oldest entry; the durable history lives in
 * the ledger store.
 */
export class NotificationLog {
  private readonly slots: Array<LedgerNotification | undefined>;
  private head = 0;
  private size = 0;
  private firstCovered = 1;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Notification log capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<LedgerNotification | undefined>(capacity).fill(undefined);
  }

  get length(): number {
    return this.size;
  }

  /**
   * Lowest sequence whose notifications are all still held.
   */
  coversFrom(): number {
    return this.firstCovered;
  }

  /**
   * Nothing at or below `sequence` is held (e.g. after loading persisted state).
   */
  startAfter(sequence: number): void {
    this.clear();
    this.firstCovered = sequence + 1;
  }

  append(notification: LedgerNotification): void {
    if (this.size === this.capacity) {
      const evicted = this.slots[this.head];
      if (evicted) {
        this.firstCovered = Math.max(this.firstCovered, evicted.sequence + 1);
      }
      this.slots[this.head] = notification;
      this.head = (this.head + 1) % this.capacity;
      return;
    }
    this.slots[(this.head + this.size) % this.capacity] = notification;
    this.size++;
  }

  /**
   * Drop the newest `count` entries (a withdrawn commit). Entries already
   * evicted are not brought back.
   */
  removeLast(count: number): void {
    for (let i = 0; i < count && this.size > 0; i++) {
      this.size--;
      this.slots[(this.head + this.size) % this.capacity] = undefined;
    }
  }

  /**
   * Matching entries oldest first, stopping at `filter.limit` and at any
   * sequence above `throughSequence`.
   */
  query(filter: NotificationFilter, throughSequence = Number.POSITIVE_INFINITY): LedgerNotification[] {
    const matches: LedgerNotification[] = [];
    for (let i = 0; i < this.size; i++) {
      if (filter.limit !== undefined && matches.length >= filter.limit) break;
      const notification = this.slots[(this.head + i) % this.capacity];
      if (!notification || notification.sequence > throughSequence) break;
      if (matchesFilter(notification, filter)) {
        matches.push(notification);
      }
    }
    return matches;
  }

  private clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.size = 0;
  }
}
