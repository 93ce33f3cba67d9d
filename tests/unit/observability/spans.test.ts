/**
 * Span helper tests, recorded through an in-memory exporter
 */

import { SpanStatusCode } from '@opentelemetry/api';
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';

import { withSpan } from '../../../src/observability/spans';
import { CommitPipeline } from '../../../src/services/ledger/commit.pipeline';
import { LedgerService } from '../../../src/services/ledger/ledger.service';
import { ErrorCode } from '../../../src/types/errors';
import { ALICE, BOB, BRIDGE, createTestSystem, depositWord } from '../../helpers';

const exporter = new InMemorySpanExporter();
const provider = new BasicTracerProvider();
provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
provider.register();

describe('withSpan', () => {
  afterEach(() => {
    exporter.reset();
  });

  it('should record a successful span with its attributes', async () => {
    const result = await withSpan('unit.work', { 'job.id': 'job-1' }, async () => 42);

    expect(result).toBe(42);
    const [span] = exporter.getFinishedSpans();
    expect(span.name).toBe('unit.work');
    expect(span.attributes['job.id']).toBe('job-1');
    expect(span.status.code).toBe(SpanStatusCode.OK);
  });

  it('should mark the span as failed and rethrow', async () => {
    await expect(
      withSpan('unit.work', {}, async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    const [span] = exporter.getFinishedSpans();
    expect(span.status.code).toBe(SpanStatusCode.ERROR);
    expect(span.status.message).toBe('boom');
  });

  describe('ledger calls', () => {
    let service: LedgerService;

    beforeEach(() => {
      service = new LedgerService(createTestSystem(), new CommitPipeline([]));
    });

    afterEach(() => {
      service.close();
    });

    it('should trace a committed call with its caller and sequence', async () => {
      await service.submit(BRIDGE, 'token.deposit', (ctx) =>
        service.token.deposit(ctx, ALICE, depositWord(100n))
      );

      const [span] = exporter.getFinishedSpans();
      expect(span.name).toBe('ledger.token.deposit');
      expect(span.attributes['ledger.caller']).toBe(BRIDGE);
      expect(span.attributes['ledger.label']).toBe('token.deposit');
      expect(span.attributes['ledger.sequence']).toBe(1);
      expect(span.status.code).toBe(SpanStatusCode.OK);
    });

    it('should trace a reverted call as an error', async () => {
      await expect(
        service.submit(ALICE, 'token.transfer', (ctx) => service.token.transfer(ctx, BOB, 1n))
      ).rejects.toMatchObject({ errorCode: ErrorCode.INSUFFICIENT_BALANCE });

      const [span] = exporter.getFinishedSpans();
      expect(span.name).toBe('ledger.token.transfer');
      expect(span.status.code).toBe(SpanStatusCode.ERROR);
      expect(span.status.message).toBe('Insufficient balance');
    });
  });
});
