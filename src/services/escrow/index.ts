export { EscrowLedger } from './escrow.service';
export { EscrowController } from './escrow.controller';
export { createEscrowRoutes } from './escrow.routes';
