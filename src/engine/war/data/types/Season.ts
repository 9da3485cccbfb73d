// ─────────────────────────────────────────────
//  Season Types
//  Windows are contiguous: start → registrationEnd → warfareEnd → resolutionEnd
// ─────────────────────────────────────────────

export type SeasonPhase = 'pending' | 'registration' | 'warfare' | 'resolution' | 'ended';

export interface SeasonState {
  id: number;
  startTime: number;
  registrationEnd: number;
  warfareEnd: number;
  resolutionEnd: number;
  active: boolean;
  registeredColonies: string[];
  prizePool: number;
  finalized: boolean;
  rewards: Record<string, number>;          // colonyId → amount
  rewardClaimed: Record<string, boolean>;   // colonyId → claimed
}

export interface PreRegistration {
  seasonId: number;
  colonyId: string;
  owner: string;
  stake: number;
  createdAt: number;
  activated: boolean;
  cancelled: boolean;
}

export function preRegistrationKey(seasonId: number, colonyId: string): string {
  return `${seasonId}:${colonyId}`;
}

export function seasonWalletKey(seasonId: number, wallet: string): string {
  return `${seasonId}:${wallet}`;
}
