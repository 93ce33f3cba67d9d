import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { errorHandler, globalLimiter, notFoundHandler } from './middlewares';
import { createHealthRoutes } from './routes/health';
import { authRoutes } from './auth';
import { createTokenRoutes } from './services/token';
import { createEscrowRoutes } from './services/escrow';
import { createLegacyRoutes } from './services/legacy';
import { createLedgerRoutes, LedgerService } from './services/ledger';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
} from './observability';

export const createApp = (service: LedgerService): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({ origin: config.api.corsOrigins }));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  app.use(globalLimiter);

  // Routes
  app.use('/health', createHealthRoutes(service));
  app.use('/auth', authRoutes);
  app.use('/token', createTokenRoutes(service));
  app.use('/escrow', createEscrowRoutes(service));
  app.use('/legacy', createLegacyRoutes(service));
  app.use('/ledger', createLedgerRoutes(service));

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'Token Escrow Ledger API',
      version: '1.0.0',
      description: 'Token ledger with user/job escrow and disbursal',
      token: service.token.address,
      escrow: service.escrow.address,
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
