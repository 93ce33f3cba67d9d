/**
 * Ledger Service
 *
 * The one way into the ledgers from outside: every entry point runs as a
 * single runtime call on behalf of an authenticated caller, then waits for
 * the commit pipeline so a persistence failure reaches the caller.
 *
 * Submissions are taken one at a time. A call's commits are staged in the
 * runtime and only confirmed once the store has them; a commit the store
 * rejected is withdrawn, so the caller's LEDGER_STORE_ERROR means the call
 * had no effect and may be retried.
 */

import { createServiceLogger, ledgerCallsTotal, withSpan } from '../../observability';
import { Address, CallContext, NotificationFilter } from '../../runtime';
import { LedgerNotification } from '../../types/events';
import { CommitDeliveryError, CommitPipeline } from './commit.pipeline';
import { ConservationReport, checkConservation } from './ledger.conservation';
import { NotificationHistory } from './ledger.store';
import { LedgerSystem } from './ledger.system';

const log = createServiceLogger('ledger-service');

export class LedgerService {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly system: LedgerSystem,
    private readonly pipeline: CommitPipeline,
    private readonly history: NotificationHistory | null = null
  ) {
    pipeline.attach(system.runtime);
  }

  get token() {
    return this.system.token;
  }

  get escrow() {
    return this.system.escrow;
  }

  get legacy() {
    return this.system.legacy;
  }

  /**
   * Execute `fn` as `caller`. `label` names the entry point in logs and metrics
   * (e.g. token.transfer).
   */
  submit<T>(caller: Address, label: string, fn: (ctx: CallContext) => T): Promise<T> {
    const run = this.queue.then(() => this.run(caller, label, fn));
    // The next submission waits for this one whatever its outcome
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Confirmed notifications, oldest first. Served from memory while it still
   * holds the requested range, otherwise from the store's history.
   */
  async notifications(filter: NotificationFilter = {}): Promise<LedgerNotification[]> {
    const { runtime } = this.system;
    if (this.history && (filter.fromSequence ?? 1) < runtime.notificationsCoverFrom()) {
      return this.history.notifications({ ...filter, throughSequence: runtime.confirmedSequence() });
    }
    return runtime.notifications(filter);
  }

  conservation(): ConservationReport {
    return checkConservation(this.system);
  }

  /**
   * Wait until every accepted submission has been persisted or withdrawn.
   */
  async flush(): Promise<void> {
    await this.queue;
  }

  close(): void {
    this.pipeline.close();
  }

  private async run<T>(caller: Address, label: string, fn: (ctx: CallContext) => T): Promise<T> {
    return withSpan(`ledger.${label}`, { 'ledger.caller': caller, 'ledger.label': label }, async (span) => {
      const { runtime } = this.system;
      runtime.beginStaging();

      let result: T;
      try {
        result = runtime.execute(caller, label, fn);
      } catch (error) {
        ledgerCallsTotal.inc({ label, outcome: 'reverted' });
        log.warn(
          { caller, label, error: error instanceof Error ? error.message : String(error) },
          'Ledger call reverted'
        );
        // A disbursal can settle some payouts before failing
        await this.persistStaged(label).catch((persistError: unknown) => {
          log.error(
            { caller, label, error: persistError instanceof Error ? persistError.message : String(persistError) },
            'Settled part of a reverted call was not persisted'
          );
        });
        throw error;
      }

      const sequence = runtime.currentSequence();
      span.setAttribute('ledger.sequence', sequence);

      try {
        await this.persistStaged(label);
      } catch (error) {
        ledgerCallsTotal.inc({ label, outcome: 'withdrawn' });
        throw error;
      }

      ledgerCallsTotal.inc({ label, outcome: 'committed' });
      log.debug({ caller, label, sequence }, 'Ledger call committed');
      return result;
    });
  }

  /**
   * Drain the pipeline, then confirm the staged commits or withdraw the ones
   * the store did not take.
   */
  private async persistStaged(label: string): Promise<void> {
    const { runtime } = this.system;
    try {
      await this.pipeline.drain();
    } catch (error) {
      if (error instanceof CommitDeliveryError) {
        const withdrawn = runtime.withdrawStaged(error.sequence);
        log.error(
          { label, sequence: error.sequence, sink: error.sink, withdrawn, error: error.message },
          'Ledger commit withdrawn'
        );
      } else {
        runtime.confirmStaged();
      }
      throw error;
    }
    runtime.confirmStaged();
  }
}
