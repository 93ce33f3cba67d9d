/**
 * LedgerRuntime Unit Tests
 *
 * Commit, rollback, savepoints and hydration on a bare storage table.
 */

import { ApiError } from '../../../src/middlewares/errorHandler';
import {
  CommitRecord,
  LedgerRuntime,
  StorageMap,
  uint256Codec,
} from '../../../src/runtime';
import { EventType, LedgerEvent } from '../../../src/types/events';
import { ErrorCode } from '../../../src/types/errors';
import { ALICE, BOB, OWNER, errorCodeOf } from '../../helpers';

const CONTRACT = '0x9999999999999999999999999999999999999999';

const transferEvent = (value: string): LedgerEvent => ({
  eventType: EventType.TRANSFER,
  contract: CONTRACT,
  payload: { from: ALICE, to: BOB, value },
});

describe('LedgerRuntime', () => {
  let runtime: LedgerRuntime;
  let table: StorageMap<bigint>;
  let commits: CommitRecord[];

  beforeEach(() => {
    runtime = new LedgerRuntime();
    table = runtime.createTable(CONTRACT, 'balances', uint256Codec);
    commits = [];
    runtime.onCommit((commit) => commits.push(commit));
  });

  describe('execute', () => {
    it('should commit writes and notifications of a successful call', () => {
      const result = runtime.execute(ALICE, 'transfer', () => {
        table.set('a', 5n);
        runtime.emit(transferEvent('5'));
        return 'ok';
      });

      expect(result).toBe('ok');
      expect(table.get('a')).toBe(5n);
      expect(runtime.currentSequence()).toBe(1);
      expect(commits).toHaveLength(1);
      expect(commits[0].sender).toBe(ALICE);
      expect(commits[0].label).toBe('transfer');
      expect(commits[0].writes).toEqual([{ contract: CONTRACT, table: 'balances', key: 'a', value: '5' }]);

      const [notification] = runtime.notifications();
      expect(notification.sequence).toBe(1);
      expect(notification.logIndex).toBe(0);
      expect(notification.eventType).toBe(EventType.TRANSFER);
    });

    it('should revert every write and drop notifications when the call throws', () => {
      table.initialize('a', 1n);

      expect(() =>
        runtime.execute(ALICE, 'failing', () => {
          table.set('a', 2n);
          table.set('b', 3n);
          runtime.emit(transferEvent('2'));
          throw new Error('boom');
        })
      ).toThrow('boom');

      expect(table.get('a')).toBe(1n);
      expect(table.get('b')).toBe(0n);
      expect([...table.entries()]).toEqual([['a', 1n]]);
      expect(runtime.currentSequence()).toBe(0);
      expect(runtime.notifications()).toEqual([]);
      expect(commits).toHaveLength(0);
    });

    it('should persist each touched slot once with its final value', () => {
      runtime.execute(ALICE, 'writes', () => {
        table.set('a', 1n);
        table.set('b', 3n);
        table.set('a', 2n);
      });

      expect(commits[0].writes).toEqual([
        { contract: CONTRACT, table: 'balances', key: 'a', value: '2' },
        { contract: CONTRACT, table: 'balances', key: 'b', value: '3' },
      ]);
    });

    it('should not record a commit for a call that changed nothing', () => {
      expect(runtime.execute(ALICE, 'read', () => 42)).toBe(42);
      expect(runtime.currentSequence()).toBe(0);
      expect(commits).toHaveLength(0);
    });

    it('should reject a nested top-level call and revert the outer one', () => {
      const code = errorCodeOf(() =>
        runtime.execute(ALICE, 'outer', () => {
          table.set('a', 1n);
          runtime.execute(ALICE, 'inner', () => undefined);
        })
      );

      expect(code).toBe(ErrorCode.INTERNAL_ERROR);
      expect(table.get('a')).toBe(0n);
      expect(runtime.execute(ALICE, 'after', () => 1)).toBe(1);
    });

    it('should refuse writes and notifications outside a call', () => {
      expect(errorCodeOf(() => table.set('a', 1n))).toBe(ErrorCode.INTERNAL_ERROR);
      expect(errorCodeOf(() => runtime.emit(transferEvent('1')))).toBe(ErrorCode.INTERNAL_ERROR);
    });
  });

  describe('savepoint', () => {
    it('should undo only what happened inside it', () => {
      runtime.execute(ALICE, 'partial', () => {
        table.set('a', 1n);
        runtime.emit(transferEvent('1'));
        expect(() =>
          runtime.savepoint(() => {
            table.set('a', 2n);
            runtime.emit(transferEvent('2'));
            throw ApiError.insufficientBalance();
          })
        ).toThrow(ApiError);
      });

      expect(table.get('a')).toBe(1n);
      expect(runtime.notifications().map((n) => n.payload)).toEqual([{ from: ALICE, to: BOB, value: '1' }]);
    });
  });

  describe('settle', () => {
    it('should keep settled effects when the call later fails', () => {
      expect(() =>
        runtime.execute(ALICE, 'settling', () => {
          table.set('a', 1n);
          runtime.settle();
          table.set('a', 2n);
          throw new Error('late failure');
        })
      ).toThrow('late failure');

      expect(table.get('a')).toBe(1n);
      expect(runtime.currentSequence()).toBe(1);
      expect(commits).toHaveLength(1);
      expect(commits[0].writes[0].value).toBe('1');
    });
  });

  describe('staging', () => {
    it('should withdraw staged commits from the failed sequence on', () => {
      runtime.execute(ALICE, 'confirmed', () => table.set('a', 1n));

      runtime.beginStaging();
      runtime.execute(ALICE, 'kept', () => {
        table.set('a', 2n);
        runtime.emit(transferEvent('2'));
      });
      runtime.execute(ALICE, 'dropped', () => {
        table.set('a', 3n);
        table.set('b', 4n);
        runtime.emit(transferEvent('3'));
      });

      expect(runtime.withdrawStaged(3)).toBe(1);

      expect(table.get('a')).toBe(2n);
      expect([...table.entries()]).toEqual([['a', 2n]]);
      expect(runtime.currentSequence()).toBe(2);
      expect(runtime.notifications().map((n) => n.sequence)).toEqual([2]);

      runtime.execute(ALICE, 'next', () => table.set('a', 5n));
      expect(commits.map((c) => c.sequence)).toEqual([1, 2, 3, 3]);
    });

    it('should undo a settled commit and the rest of its call', () => {
      runtime.beginStaging();
      expect(() =>
        runtime.execute(ALICE, 'settling', () => {
          table.set('a', 1n);
          runtime.settle();
          table.set('a', 2n);
          throw new Error('late failure');
        })
      ).toThrow('late failure');

      expect(runtime.withdrawStaged(1)).toBe(1);
      expect(table.get('a')).toBe(0n);
      expect(runtime.currentSequence()).toBe(0);
    });

    it('should hide staged notifications until confirmed', () => {
      runtime.beginStaging();
      runtime.execute(ALICE, 'staged', () => runtime.emit(transferEvent('1')));

      expect(runtime.notifications()).toEqual([]);
      expect(runtime.confirmedSequence()).toBe(0);

      runtime.confirmStaged();
      expect(runtime.notifications()).toHaveLength(1);
      expect(runtime.confirmedSequence()).toBe(1);
    });

    it('should refuse to stage twice', () => {
      runtime.beginStaging();
      expect(errorCodeOf(() => runtime.beginStaging())).toBe(ErrorCode.INTERNAL_ERROR);
    });
  });

  describe('notification retention', () => {
    it('should keep only the newest notifications', () => {
      const bounded = new LedgerRuntime({ notificationRetention: 2 });
      for (const value of ['1', '2', '3']) {
        bounded.execute(ALICE, 'emit', () => bounded.emit(transferEvent(value)));
      }

      expect(bounded.notifications().map((n) => n.sequence)).toEqual([2, 3]);
      expect(bounded.notificationsCoverFrom()).toBe(2);
    });

    it('should not hold notifications from before a hydrated sequence', () => {
      runtime.hydrate([], 4);
      expect(runtime.notificationsCoverFrom()).toBe(5);
    });
  });

  describe('hydrate', () => {
    it('should load persisted slots and continue the sequence', () => {
      runtime.hydrate([{ contract: CONTRACT, table: 'balances', key: 'a', value: '7' }], 4);

      expect(table.get('a')).toBe(7n);
      expect(runtime.currentSequence()).toBe(4);

      runtime.execute(ALICE, 'next', () => table.set('a', 8n));
      expect(commits[0].sequence).toBe(5);
    });

    it('should reject slots of unknown tables', () => {
      expect(() =>
        runtime.hydrate([{ contract: CONTRACT, table: 'missing', key: 'a', value: '1' }], 1)
      ).toThrow(/unknown table/);
    });

    it('should refuse to hydrate after the first commit', () => {
      runtime.execute(ALICE, 'first', () => table.set('a', 1n));

      expect(() => runtime.hydrate([], 0)).toThrow('Runtime can only be hydrated before the first call');
    });
  });

  describe('notifications', () => {
    beforeEach(() => {
      runtime.execute(ALICE, 'one', () => {
        runtime.emit(transferEvent('1'));
        runtime.emit({
          eventType: EventType.APPROVAL,
          contract: CONTRACT,
          payload: { owner: ALICE, spender: BOB, value: '9' },
        });
      });
      runtime.execute(ALICE, 'two', () => runtime.emit(transferEvent('2')));
    });

    it('should filter by event type', () => {
      expect(runtime.notifications({ eventType: EventType.TRANSFER }).map((n) => n.sequence)).toEqual([1, 2]);
    });

    it('should filter by starting sequence and limit', () => {
      expect(runtime.notifications({ fromSequence: 2 })).toHaveLength(1);
      expect(runtime.notifications({ limit: 2 }).map((n) => n.logIndex)).toEqual([0, 1]);
    });

    it('should filter by contract', () => {
      expect(runtime.notifications({ contract: OWNER })).toEqual([]);
    });
  });

  describe('deploy', () => {
    it('should place contracts at predicted addresses', () => {
      const predicted = runtime.predictAddress(OWNER);
      const contract = runtime.deploy(OWNER, (address) => ({ address }));

      expect(contract.address).toBe(predicted);
      expect(runtime.resolve(predicted)).toBe(contract);
      expect(runtime.deploy(OWNER, (address) => ({ address })).address).not.toBe(predicted);
    });

    it('should refuse a second table with the same name', () => {
      expect(() => runtime.createTable(CONTRACT, 'balances', uint256Codec)).toThrow(/already exists/);
    });
  });
});
