import { initTracing, shutdownTracing } from './observability/tracing';

// Instrumentation patches modules as they load, so start it first
initTracing();

import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { disconnectRedis } from './config/redis';
import { eventBus } from './events/eventBus';
import { logger } from './observability';
import {
  CommitPipeline,
  CommitSink,
  LedgerService,
  MongoLedgerStore,
  createLedgerSystem,
  createRelaySink,
  createStoreSink,
  ledgerSystemOptionsFromConfig,
} from './services/ledger';

const startServer = async (): Promise<void> => {
  logger.info(getEnvironmentInfo(), 'Starting ledger service');

  const system = createLedgerSystem(ledgerSystemOptionsFromConfig(config.ledger));
  const sinks: CommitSink[] = [];
  let store: MongoLedgerStore | null = null;

  if (config.ledger.persistenceEnabled) {
    await connectDatabase();

    // Replay persisted state over genesis before any call is accepted
    store = new MongoLedgerStore();
    const snapshot = await store.load();
    system.runtime.hydrate(snapshot.slots, snapshot.lastSequence);
    logger.info(
      { slots: snapshot.slots.length, sequence: snapshot.lastSequence },
      'Ledger state hydrated'
    );

    await eventBus.connect();

    sinks.push(createStoreSink(store), createRelaySink(eventBus));
  }

  // Older notification pages come from the store once memory no longer holds them
  const service = new LedgerService(system, new CommitPipeline(sinks), store);
  const app = createApp(service);

  const server = app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        env: config.nodeEnv,
        token: system.token.address,
        escrow: system.escrow.address,
        legacy: system.legacy?.address ?? null,
      },
      'Server running'
    );
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Starting graceful shutdown');

    server.close(() => {
      logger.info('HTTP server closed');

      const finish = async (): Promise<void> => {
        await service.flush();
        service.close();
        await eventBus.disconnect();
        await disconnectRedis();
        await disconnectDatabase();
        await shutdownTracing();
      };

      finish()
        .then(() => {
          logger.info('Graceful shutdown completed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        });
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

startServer().catch((error: unknown) => {
  logger.error({ err: error }, 'Failed to start server');
  process.exit(1);
});
