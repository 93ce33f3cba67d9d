/**
 * Commit Pipeline
 *
 * Delivers commit records from the runtime to asynchronous sinks (the ledger
 * store, the pub/sub relay) strictly in commit order. The runtime commits
 * synchronously; callers await drain() to learn whether delivery succeeded.
 *
 * Once a required sink fails, nothing more is delivered (not that commit to
 * later sinks, nor any commit queued behind it) until drain() has reported
 * the failure. The caller withdraws those commits from the runtime.
 */

import { ApiError } from '../../middlewares/errorHandler';
import {
  commitPipelineFailuresTotal,
  createServiceLogger,
  ledgerNotificationsTotal,
} from '../../observability';
import { CommitRecord, LedgerRuntime } from '../../runtime';
import { ErrorCode } from '../../types/errors';

const log = createServiceLogger('commit-pipeline');

export interface CommitSink {
  name: string;
  /** A failing required sink makes drain() reject */
  required: boolean;
  deliver(commit: CommitRecord): Promise<void>;
}

/**
 * A required sink rejected the commit at `sequence`.
 */
export class CommitDeliveryError extends ApiError {
  constructor(
    readonly sequence: number,
    readonly sink: string,
    cause: Error
  ) {
    super(ErrorCode.LEDGER_STORE_ERROR, `Commit could not be persisted: ${cause.message}`);
    this.name = 'CommitDeliveryError';
  }
}

export class CommitPipeline {
  private tail: Promise<void> = Promise.resolve();
  private failure: CommitDeliveryError | null = null;
  private detach: (() => void) | null = null;

  constructor(private readonly sinks: CommitSink[]) {}

  attach(runtime: LedgerRuntime): void {
    this.detach?.();
    this.detach = runtime.onCommit((commit) => this.enqueue(commit));
  }

  enqueue(commit: CommitRecord): void {
    for (const notification of commit.notifications) {
      ledgerNotificationsTotal.inc({ event_type: notification.eventType });
    }
    this.tail = this.tail.then(() => this.deliver(commit));
  }

  /**
   * Wait for every queued commit. Rejects with the first failure of a
   * required sink, then resumes delivery.
   */
  async drain(): Promise<void> {
    await this.tail;
    const failure = this.failure;
    if (failure) {
      this.failure = null;
      throw failure;
    }
  }

  close(): void {
    this.detach?.();
    this.detach = null;
  }

  private async deliver(commit: CommitRecord): Promise<void> {
    if (this.failure) {
      log.warn(
        { sequence: commit.sequence, failedSequence: this.failure.sequence },
        'Commit skipped behind an undelivered commit'
      );
      return;
    }

    for (const sink of this.sinks) {
      try {
        await sink.deliver(commit);
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        commitPipelineFailuresTotal.inc({ sink: sink.name });
        log.error(
          { sink: sink.name, sequence: commit.sequence, label: commit.label, error: err.message },
          'Commit delivery failed'
        );
        if (sink.required) {
          this.failure = new CommitDeliveryError(commit.sequence, sink.name, err);
          return;
        }
      }
    }
  }
}
