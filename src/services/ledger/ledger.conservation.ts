import { LedgerSystem } from './ledger.system';

export interface ConservationReport {
  totalSupply: bigint;
  sumOfBalances: bigint;
  /** Token balance of the escrow ledger's own account */
  escrowAccountBalance: bigint;
  totalEscrowed: bigint;
  /** Balances of every account except the escrow ledger */
  circulating: bigint;
  holds: boolean;
}

/**
 * Audit the supply against balances and escrow.
 *
 * Escrowed user balances are backed by the escrow ledger's token account, so
 * `circulating + totalEscrowed == totalSupply` whenever nobody has sent tokens
 * to the escrow address directly.
 */
export const checkConservation = ({ token, escrow }: LedgerSystem): ConservationReport => {
  let sumOfBalances = 0n;
  for (const [, balance] of token.accounts()) {
    sumOfBalances += balance;
  }

  const totalSupply = token.totalSupply();
  const escrowAccountBalance = token.balanceOf(escrow.address);
  const totalEscrowed = escrow.totalEscrowed();

  return {
    totalSupply,
    sumOfBalances,
    escrowAccountBalance,
    totalEscrowed,
    circulating: sumOfBalances - escrowAccountBalance,
    holds: sumOfBalances === totalSupply && escrowAccountBalance >= totalEscrowed,
  };
};
