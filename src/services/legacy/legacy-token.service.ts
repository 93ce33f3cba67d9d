import { Address, CallContext, LedgerRuntime } from '../../runtime';
import { Erc20Ledger, TokenMetadata } from '../token/erc20.ledger';

/**
 * The superseded token. Balances exist only through owner mints and are
 * retired by migrating them into the token ledger.
 */
export class LegacyToken extends Erc20Ledger {
  constructor(runtime: LedgerRuntime, address: Address, owner: Address, metadata: TokenMetadata) {
    super(runtime, address, owner, metadata);
  }

  mint(ctx: CallContext, to: Address, amount: bigint): void {
    this.requireOwner(ctx);
    this.mintTo(to, amount);
  }
}
