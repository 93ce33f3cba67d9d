/**
 * Tracing Module Unit Tests
 *
 * SDK start-up and shutdown, with the OpenTelemetry SDK mocked.
 */

const mockSDKInstance = {
  start: jest.fn(),
  shutdown: jest.fn().mockResolvedValue(undefined),
};

const mockNodeSDK = jest.fn(() => mockSDKInstance);
const mockExporter = jest.fn();

jest.mock('@opentelemetry/sdk-node', () => ({
  NodeSDK: mockNodeSDK,
}));

jest.mock('@opentelemetry/exporter-trace-otlp-http', () => ({
  OTLPTraceExporter: mockExporter,
}));

jest.mock('@opentelemetry/auto-instrumentations-node', () => ({
  getNodeAutoInstrumentations: jest.fn().mockReturnValue([]),
}));

const mockLogger = {
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};

jest.mock('../../../src/observability/logger', () => ({
  logger: mockLogger,
}));

let mockTracingEnabled = false;

jest.mock('../../../src/config', () => ({
  config: {
    tracing: {
      get enabled() {
        return mockTracingEnabled;
      },
      serviceName: 'test-ledger',
      otlpEndpoint: 'http://collector:4318/v1/traces',
    },
  },
}));

type TracingModule = typeof import('../../../src/observability/tracing');

describe('Tracing Module', () => {
  let tracing: TracingModule;

  beforeEach(async () => {
    mockTracingEnabled = false;
    jest.resetModules();
    tracing = await import('../../../src/observability/tracing');
  });

  describe('initTracing', () => {
    it('should not start the SDK when tracing is disabled', () => {
      tracing.initTracing();

      expect(mockLogger.debug).toHaveBeenCalledWith('Tracing disabled');
      expect(mockNodeSDK).not.toHaveBeenCalled();
    });

    it('should start the SDK with the configured service name and endpoint', () => {
      mockTracingEnabled = true;

      tracing.initTracing();

      expect(mockExporter).toHaveBeenCalledWith({ url: 'http://collector:4318/v1/traces' });
      expect(mockNodeSDK).toHaveBeenCalledWith(
        expect.objectContaining({ serviceName: 'test-ledger' })
      );
      expect(mockSDKInstance.start).toHaveBeenCalledTimes(1);
      expect(mockLogger.info).toHaveBeenCalledWith(
        { endpoint: 'http://collector:4318/v1/traces' },
        'OpenTelemetry tracing initialized'
      );
    });

    it('should log and carry on when the SDK fails to start', async () => {
      mockTracingEnabled = true;
      mockSDKInstance.start.mockImplementationOnce(() => {
        throw new Error('Failed to initialize');
      });

      tracing.initTracing();
      await tracing.shutdownTracing();

      expect(mockLogger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ err: expect.any(Error) }),
        'Failed to initialize OpenTelemetry tracing'
      );
      expect(mockSDKInstance.shutdown).not.toHaveBeenCalled();
    });
  });

  describe('shutdownTracing', () => {
    it('should do nothing when the SDK was never started', async () => {
      tracing.initTracing();

      await tracing.shutdownTracing();

      expect(mockSDKInstance.shutdown).not.toHaveBeenCalled();
    });

    it('should shut down a started SDK once', async () => {
      mockTracingEnabled = true;
      tracing.initTracing();

      await tracing.shutdownTracing();
      await tracing.shutdownTracing();

      expect(mockSDKInstance.shutdown).toHaveBeenCalledTimes(1);
      expect(mockLogger.info).toHaveBeenCalledWith('OpenTelemetry tracing shut down');
    });

    it('should propagate shutdown errors', async () => {
      mockTracingEnabled = true;
      tracing.initTracing();
      mockSDKInstance.shutdown.mockRejectedValueOnce(new Error('Shutdown failed'));

      await expect(tracing.shutdownTracing()).rejects.toThrow('Shutdown failed');
    });
  });
});
