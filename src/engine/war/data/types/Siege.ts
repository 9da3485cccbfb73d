// ─────────────────────────────────────────────
//  Siege Types
//  preparation → active → completed | cancelled
// ─────────────────────────────────────────────

export type SiegeStatus = 'preparation' | 'active' | 'completed' | 'cancelled';

export type SiegeOutcome =
  | 'crushing_victory'
  | 'decisive_victory'
  | 'narrow_victory'
  | 'undefended'
  | 'narrow_defeat'
  | 'repelled'
  | 'cancelled';

/** Per-token power as reported by the combat-power provider. */
export interface PowerVector {
  perToken: Record<string, number>;
  total: number;
}

export interface StakeContribution {
  colonyId: string;
  wallet: string;
  amount: number;
}

/** Tokens one colony committed to the attacking side. */
export interface AttackForce {
  colonyId: string;
  tokenIds: string[];
}

export interface SiegeState {
  id: number;
  seasonId: number;
  territoryId: number;
  attackerColony: string;
  defenderColony: string;
  stake: number;
  contributions: StakeContribution[];
  attackerForces: AttackForce[];
  attackerTokens: string[];       // Flattened attackerForces token ids
  defenderTokens: string[];
  defenderWasRegistered: boolean; // Defender registration at declaration
  declaredAt: number;
  preparationEndsAt: number;
  endsAt: number;
  state: SiegeStatus;
  winner: string | null;
  outcome: SiegeOutcome | null;
  prizePool: number;
  isBetrayalAttack: boolean;
  coordinatedAttackId: string | null;
  overridden: boolean;
}

/** Write-once capture of combat power taken at defend(). */
export interface SiegeSnapshot {
  siegeId: number;
  attacker: PowerVector;
  defender: PowerVector;
  attackerPower: number;
  defenderPower: number;          // After damage / fortification scaling
  takenAt: number;
}

export function isTerminal(siege: SiegeState): boolean {
  return siege.state === 'completed' || siege.state === 'cancelled';
}
