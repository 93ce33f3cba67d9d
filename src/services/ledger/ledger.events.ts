/**
 * Commit sinks
 *
 * The store sink persists each commit; the relay sink republishes its
 * notifications on the event bus for off-process consumers.
 */

import { EventBus } from '../../events/eventBus';
import { CommitSink } from './commit.pipeline';
import { LedgerStore } from './ledger.store';

export const createStoreSink = (store: LedgerStore): CommitSink => ({
  name: 'store',
  required: true,
  deliver: (commit) => store.persist(commit),
});

export const createRelaySink = (bus: EventBus): CommitSink => ({
  name: 'relay',
  required: false,
  deliver: async (commit) => {
    if (!bus.getStatus().connected) {
      return;
    }
    for (const notification of commit.notifications) {
      await bus.publish(notification);
    }
  },
});
