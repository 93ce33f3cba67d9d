/**
 * Genesis: deploy the ledgers into a fresh runtime and wire them together.
 *
 * Deployment order is fixed (token, escrow, legacy token), so addresses are
 * the same every time the same owner boots the system. That is what lets a
 * restarted process hydrate persisted slots onto the right ledgers. The legacy
 * token is deployed whether or not migration is enabled, so the flag can
 * change between boots.
 */

import { Address, LedgerRuntime, toAddress } from '../../runtime';
import { EscrowLedger } from '../escrow/escrow.service';
import { LegacyToken } from '../legacy/legacy-token.service';
import { TokenLedger } from '../token/token.service';

export interface LedgerSystemOptions {
  owner: Address;
  bridgeManager: Address;
  tokenName: string;
  tokenSymbol: string;
  tokenDecimals: number;
  /** Point migrate() at the legacy token and expose it */
  legacyMigration?: boolean;
  /** Point the token ledger at the escrow ledger at genesis (default true) */
  configureEscrow?: boolean;
  notificationRetention?: number;
}

export interface LedgerSystem {
  runtime: LedgerRuntime;
  token: TokenLedger;
  escrow: EscrowLedger;
  legacy: LegacyToken | null;
}

export const createLedgerSystem = (options: LedgerSystemOptions): LedgerSystem => {
  const runtime = new LedgerRuntime({ notificationRetention: options.notificationRetention });
  const { owner } = options;

  // Deployed right after the token ledger, in this order
  const escrowAddress = runtime.predictAddress(owner, 1);
  const legacyAddress = runtime.predictAddress(owner, 2);

  const token = runtime.deploy(
    owner,
    (address) =>
      new TokenLedger(runtime, address, {
        owner,
        bridgeManager: options.bridgeManager,
        name: options.tokenName,
        symbol: options.tokenSymbol,
        decimals: options.tokenDecimals,
        escrowContractAddress: options.configureEscrow === false ? undefined : escrowAddress,
        legacyTokenAddress: options.legacyMigration ? legacyAddress : undefined,
      })
  );

  const escrow = runtime.deploy(
    owner,
    (address) => new EscrowLedger(runtime, address, owner, token.address)
  );

  const legacy = runtime.deploy(
    owner,
    (address) =>
      new LegacyToken(runtime, address, owner, {
        name: `${options.tokenName} (legacy)`,
        symbol: options.tokenSymbol,
        decimals: options.tokenDecimals,
      })
  );

  return { runtime, token, escrow, legacy: options.legacyMigration ? legacy : null };
};

/**
 * Genesis options from LEDGER_CONFIG-shaped settings.
 */
export const ledgerSystemOptionsFromConfig = (settings: {
  ownerAddress: string;
  bridgeManagerAddress: string;
  tokenName: string;
  tokenSymbol: string;
  tokenDecimals: number;
  legacyMigrationEnabled: boolean;
  notificationRetention: number;
}): LedgerSystemOptions => ({
  owner: toAddress(settings.ownerAddress),
  bridgeManager: toAddress(settings.bridgeManagerAddress),
  tokenName: settings.tokenName,
  tokenSymbol: settings.tokenSymbol,
  tokenDecimals: settings.tokenDecimals,
  legacyMigration: settings.legacyMigrationEnabled,
  notificationRetention: settings.notificationRetention,
});
