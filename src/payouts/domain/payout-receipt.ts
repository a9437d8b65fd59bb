export interface PayoutReceipt {
  owner: string;
  winner: string;
  /** Vault balance before the owner fee was taken */
  totalBalance: bigint;
  ownerFee: bigint;
  /** Vault balance left after the owner fee, all of it sent to the winner */
  winnerPayout: bigint;
}

/** Fixed owner cut of the pooled balance, in percent */
export const OWNER_FEE_PERCENT = 10n;

export function computeOwnerFee(totalBalance: bigint): bigint {
  return (totalBalance * OWNER_FEE_PERCENT) / 100n;
}
