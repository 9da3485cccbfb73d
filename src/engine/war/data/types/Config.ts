// ─────────────────────────────────────────────
//  War Config: every tunable of the war layer.
//  Defaults live in assets/data/war-config.json.
// ─────────────────────────────────────────────

import type { TerritoryType } from './Territory';
import type { OperationFee, OperationName } from './Fee';
import type { SiegeOutcome } from './Siege';

// --- Feature pause flags ---

export type WarFeature =
  | 'seasons'
  | 'pre_registration'
  | 'territories'
  | 'raids'
  | 'sieges'
  | 'alliances'
  | 'treaties'
  | 'coordinated_attacks';

export const WAR_FEATURES: readonly WarFeature[] = [
  'seasons',
  'pre_registration',
  'territories',
  'raids',
  'sieges',
  'alliances',
  'treaties',
  'coordinated_attacks',
];

export const OPERATION_NAMES: readonly OperationName[] = [
  'siege',
  'raid',
  'maintenance',
  'repair',
  'fortify',
  'alliance',
  'coordinated_attack',
];

// --- Outcome bands ---

/** Bands are matched top-down on floor(attacker * 10000 / defender). */
export interface OutcomeBand {
  outcome: Exclude<SiegeOutcome, 'undefended' | 'cancelled'>;
  minRatioBps: number;
  attackerWins: boolean;
  damage: number;                 // Damage points dealt on attacker win
}

export interface SeasonConfig {
  registrationDuration: number;
  warfareDuration: number;
  resolutionDuration: number;
  preRegistrationWindow: number;  // 0 = unlimited
  preRegistrationBatchSize: number;
}

export interface ColonyConfig {
  minColonyStake: number;
  primaryColonyCooldown: number;
  stressDecayInterval: number;
  stressMaintenancePercent: number;
}

export interface TerritoryConfig {
  maxTerritories: number;
  maxTerritoriesPerColony: number;
  bonusBps: Record<TerritoryType, number>;
  maintenanceInterval: number;
  raidCooldown: number;
  raidDamage: number;
  raidFortificationReduction: number;
  capturePriorityDuration: number;
}

export interface SiegeConfig {
  minSiegeStake: number;
  preparationDuration: number;
  battleDuration: number;
  siegeCooldown: number;
  defenderShareBps: number;
  burnShareBps: number;
  undefendedDamage: number;
  outcomeBands: OutcomeBand[];
}

export interface AllianceConfig {
  maxMembers: number;
  betrayalStabilityPenalty: number;
  forgivenessStabilityRecovery: number;
  betrayalCooldown: number;
  forgivenessVotingPeriod: number;
  treatyProposalTtl: number;
  treatyBreachStabilityPenalty: number;
}

export interface CoordinatedAttackConfig {
  maxPerDay: number;
  minParticipants: number;
  maxParticipants: number;
  minParticipantStake: number;
  bonusDamagePercent: number;
}

export interface WarConfig {
  currency: string;
  treasuryAccount: string;
  season: SeasonConfig;
  colony: ColonyConfig;
  territory: TerritoryConfig;
  siege: SiegeConfig;
  alliance: AllianceConfig;
  coordinatedAttack: CoordinatedAttackConfig;
  fees: Record<OperationName, OperationFee>;
}

export type WarConfigOverrides = {
  [K in keyof WarConfig]?: WarConfig[K] extends object
    ? Partial<WarConfig[K]>
    : WarConfig[K];
};
