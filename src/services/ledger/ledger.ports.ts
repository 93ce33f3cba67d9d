/**
 * Capability seams between ledgers.
 *
 * A ledger never holds a concrete reference to another ledger. It keeps the
 * other's address in its own storage, resolves it through the runtime when a
 * call is made, and checks that the target offers the capability it needs.
 */

import { Address, CallContext } from '../../runtime';

/** Credit side of escrow: called by the token ledger from holdInEscrow. */
export interface EscrowFundingPort {
  fundUser(ctx: CallContext, userId: string, amount: bigint): void;
}

/** Payout side of the token ledger: called by the escrow ledger on disbursal. */
export interface TokenTransferPort {
  transfer(ctx: CallContext, to: Address, amount: bigint): boolean;
}

/** The superseded token that balances are migrated from. */
export interface LegacyBalanceSource {
  balanceOf(account: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
  transferFrom(ctx: CallContext, from: Address, to: Address, amount: bigint): boolean;
}

export const isEscrowFundingPort = (candidate: unknown): candidate is EscrowFundingPort =>
  typeof candidate === 'object' &&
  candidate !== null &&
  'fundUser' in candidate &&
  typeof candidate.fundUser === 'function';

export const isTokenTransferPort = (candidate: unknown): candidate is TokenTransferPort =>
  typeof candidate === 'object' &&
  candidate !== null &&
  'transfer' in candidate &&
  typeof candidate.transfer === 'function';

export const isLegacyBalanceSource = (candidate: unknown): candidate is LegacyBalanceSource =>
  typeof candidate === 'object' &&
  candidate !== null &&
  'balanceOf' in candidate &&
  typeof candidate.balanceOf === 'function' &&
  'allowance' in candidate &&
  typeof candidate.allowance === 'function' &&
  'transferFrom' in candidate &&
  typeof candidate.transferFrom === 'function';
