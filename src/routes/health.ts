import { Router, Request, Response } from 'express';

import { config } from '../config';
import { getDatabaseStatus } from '../config/database';
import { eventBus } from '../events/eventBus';
import { LedgerService } from '../services/ledger/ledger.service';

/**
 * MongoDB and Redis only count towards readiness when persistence is on;
 * without it the ledgers run purely in memory.
 */
export const createHealthRoutes = (service: LedgerService): Router => {
  const router = Router();

  const dependenciesUp = (): boolean =>
    !config.ledger.persistenceEnabled ||
    (getDatabaseStatus().connected && eventBus.getStatus().connected);

  router.get('/', (_req: Request, res: Response) => {
    const dbStatus = getDatabaseStatus();
    const eventBusStatus = eventBus.getStatus();
    const isHealthy = dependenciesUp();

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services: {
        database: {
          connected: dbStatus.connected,
          readyState: dbStatus.readyState,
        },
        eventBus: {
          connected: eventBusStatus.connected,
        },
        ledger: {
          persistenceEnabled: config.ledger.persistenceEnabled,
          sequence: service.system.runtime.currentSequence(),
        },
      },
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const isReady = dependenciesUp();

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
