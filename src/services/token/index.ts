export { TokenLedger, TokenLedgerOptions } from './token.service';
export { Erc20Ledger, TokenMetadata } from './erc20.ledger';
export { TokenController } from './token.controller';
export { createTokenRoutes } from './token.routes';
