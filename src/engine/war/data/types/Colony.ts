// ─────────────────────────────────────────────
//  Colony Types: war profile + wallet index
//  Colonies and wallets are foreign keys into the custody layer.
// ─────────────────────────────────────────────

export type ReputationCategory = 'honorable' | 'neutral' | 'notorious' | 'traitor';

export interface ColonyWarProfile {
  colonyId: string;
  owner: string;                  // Controlling wallet at last registration
  stake: number;                  // Defensive stake held by the war treasury
  reputation: ReputationCategory;
  stress: number;                 // 0-10
  stressUpdatedAt: number;
  registered: boolean;
  seasonId: number;               // Season of the last registration
  winStreak: number;
  wins: number;
  losses: number;
  totalForfeited: number;
}

export interface WalletProfile {
  address: string;
  colonies: string[];
  primaryColony: string | null;   // Used for alliance protection
}

export const MAX_STRESS = 10;

export function createColonyProfile(colonyId: string, owner: string, now: number): ColonyWarProfile {
  return {
    colonyId,
    owner,
    stake: 0,
    reputation: 'neutral',
    stress: 0,
    stressUpdatedAt: now,
    registered: false,
    seasonId: 0,
    winStreak: 0,
    wins: 0,
    losses: 0,
    totalForfeited: 0,
  };
}
