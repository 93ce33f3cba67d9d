import { Attributes, Span, SpanStatusCode, Tracer, trace } from '@opentelemetry/api';

export const getTracer = (name = 'token-escrow-ledger'): Tracer => trace.getTracer(name);

/**
 * Run `fn` inside an active span that ends with OK, or ERROR and the
 * error's message if `fn` rejects.
 */
export const withSpan = async <T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> => {
  return getTracer().startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
};
