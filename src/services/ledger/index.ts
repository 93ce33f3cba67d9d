/**
 * Ledger Service Module
 *
 * Runtime wiring, persistence and the system-wide HTTP views.
 */

// Service
export { LedgerService } from './ledger.service';
export {
  createLedgerSystem,
  ledgerSystemOptionsFromConfig,
  LedgerSystem,
  LedgerSystemOptions,
} from './ledger.system';

// Capability ports
export * from './ledger.ports';

// Persistence & relay
export { CommitPipeline, CommitSink } from './commit.pipeline';
export { LedgerStore, LedgerSnapshot, MongoLedgerStore } from './ledger.store';
export { createStoreSink, createRelaySink } from './ledger.events';

// Audit
export { checkConservation, ConservationReport } from './ledger.conservation';

// Controller
export { LedgerController, serializeNotification } from './ledger.controller';

// Routes
export { createLedgerRoutes } from './ledger.routes';
