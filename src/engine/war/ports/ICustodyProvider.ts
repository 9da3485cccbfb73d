// ─────────────────────────────────────────────
//  ICustodyProvider Interface
//  NFT custody / staking lives outside the war layer.
// ─────────────────────────────────────────────

export interface ICustodyProvider {
  /** Wallet that currently controls the colony, or null if unknown. */
  ownerOfColony(colonyId: string): string | null;

  /** True when the token is currently staked to the colony. */
  isStaked(colonyId: string, tokenId: string): boolean;
}
