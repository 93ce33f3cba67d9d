/**
 * Ledger Store
 *
 * Durable copy of committed ledger state. The runtime keeps the working state
 * in memory; every commit is written here and the latest slot values are
 * loaded back into a fresh runtime on start-up.
 */

import { FilterQuery } from 'mongoose';

import { ILedgerNotification, LedgerCommit, LedgerNotificationRecord, LedgerSlot } from '../../models';
import { CommitRecord, NotificationFilter, SlotWrite } from '../../runtime';
import { LedgerNotification, isLedgerNotification } from '../../types/events';

export interface LedgerSnapshot {
  slots: SlotWrite[];
  lastSequence: number;
}

export interface HistoryFilter extends NotificationFilter {
  /** Newest sequence to include */
  throughSequence: number;
}

/**
 * Every persisted notification, for ranges the runtime no longer holds.
 */
export interface NotificationHistory {
  notifications(filter: HistoryFilter): Promise<LedgerNotification[]>;
}

export interface LedgerStore extends NotificationHistory {
  load(): Promise<LedgerSnapshot>;
  persist(commit: CommitRecord): Promise<void>;
}

export class MongoLedgerStore implements LedgerStore {
  async load(): Promise<LedgerSnapshot> {
    const [slots, latest] = await Promise.all([
      LedgerSlot.find().sort({ sequence: 1 }),
      LedgerCommit.findOne().sort({ sequence: -1 }),
    ]);

    return {
      slots: slots.map((slot) => ({
        contract: slot.contract,
        table: slot.table,
        key: slot.key,
        value: slot.value,
      })),
      lastSequence: latest?.sequence ?? 0,
    };
  }

  async notifications(filter: HistoryFilter): Promise<LedgerNotification[]> {
    const query: FilterQuery<ILedgerNotification> = {
      sequence: { $gte: filter.fromSequence ?? 0, $lte: filter.throughSequence },
    };
    if (filter.eventType !== undefined) query.eventType = filter.eventType;
    if (filter.contract !== undefined) query.contract = filter.contract;

    let cursor = LedgerNotificationRecord.find(query).sort({ sequence: 1, logIndex: 1 });
    if (filter.limit !== undefined) cursor = cursor.limit(filter.limit);
    const records = await cursor;

    return records.map((record) => {
      const notification: unknown = {
        sequence: record.sequence,
        logIndex: record.logIndex,
        contract: record.contract,
        eventType: record.eventType,
        payload: record.payload,
        timestamp: record.timestamp,
      };
      if (!isLedgerNotification(notification)) {
        throw new Error(`Malformed notification ${record.sequence}/${record.logIndex} in the store`);
      }
      return notification;
    });
  }

  async persist(commit: CommitRecord): Promise<void> {
    if (commit.writes.length > 0) {
      await LedgerSlot.bulkWrite(
        commit.writes.map((write) => ({
          updateOne: {
            filter: { contract: write.contract, table: write.table, key: write.key },
            update: { $set: { value: write.value, sequence: commit.sequence } },
            upsert: true,
          },
        })),
        { ordered: true }
      );
    }

    if (commit.notifications.length > 0) {
      await LedgerNotificationRecord.insertMany(
        commit.notifications.map((notification) => ({
          sequence: notification.sequence,
          logIndex: notification.logIndex,
          contract: notification.contract,
          eventType: notification.eventType,
          payload: notification.payload,
          timestamp: notification.timestamp,
        }))
      );
    }

    // Written last: the commit row marks the sequence as fully persisted
    await LedgerCommit.create({
      sequence: commit.sequence,
      sender: commit.sender,
      label: commit.label,
      writeCount: commit.writes.length,
      notificationCount: commit.notifications.length,
      committedAt: commit.committedAt,
    });
  }
}
