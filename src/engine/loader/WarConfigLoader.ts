// ─────────────────────────────────────────────
//  WarConfigLoader
//  Parses assets/data/war-config.json (or any raw source),
//  merges overrides per section and validates the result.
//  Invalid values throw ConfigurationError.
// ─────────────────────────────────────────────

import type {
  AllianceConfig, ColonyConfig, CoordinatedAttackConfig, OutcomeBand, SeasonConfig,
  SiegeConfig, TerritoryConfig, WarConfig, WarConfigOverrides,
} from '@/engine/war/data/types/Config';
import type { OperationFee, OperationName } from '@/engine/war/data/types/Fee';
import type { TerritoryType } from '@/engine/war/data/types/Territory';
import { OPERATION_NAMES } from '@/engine/war/data/types/Config';
import { ConfigurationError } from '@/engine/war/WarErrors';
import { BPS_DENOMINATOR } from '@/engine/utils/MathUtils';
import defaultConfigJson from '@/assets/data/war-config.json';

type RawObject = Record<string, unknown>;

const BAND_OUTCOMES: readonly OutcomeBand['outcome'][] = [
  'crushing_victory', 'decisive_victory', 'narrow_victory', 'narrow_defeat', 'repelled',
];

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawObject, key: string, path: string): RawObject {
  const value = raw[key];
  if (!isObject(value)) throw new ConfigurationError(`${path}.${key} must be an object`);
  return value;
}

function num(raw: RawObject, key: string, path: string): number {
  const value = raw[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError(`${path}.${key} must be a number`, { value });
  }
  return value;
}

function str(raw: RawObject, key: string, path: string): string {
  const value = raw[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigurationError(`${path}.${key} must be a non-empty string`, { value });
  }
  return value;
}

function bool(raw: RawObject, key: string, path: string): boolean {
  const value = raw[key];
  if (typeof value !== 'boolean') throw new ConfigurationError(`${path}.${key} must be a boolean`, { value });
  return value;
}

function parseBandOutcome(value: unknown, path: string): OutcomeBand['outcome'] {
  const match = BAND_OUTCOMES.find(o => o === value);
  if (match === undefined) throw new ConfigurationError(`${path}.outcome is not a band outcome`, { value });
  return match;
}

function parseBands(raw: RawObject): OutcomeBand[] {
  const value = raw.outcomeBands;
  if (!Array.isArray(value)) throw new ConfigurationError('siege.outcomeBands must be an array');
  return value.map((entry: unknown, i) => {
    const path = `siege.outcomeBands[${i}]`;
    if (!isObject(entry)) throw new ConfigurationError(`${path} must be an object`);
    return {
      outcome: parseBandOutcome(entry.outcome, path),
      minRatioBps: num(entry, 'minRatioBps', path),
      attackerWins: bool(entry, 'attackerWins', path),
      damage: num(entry, 'damage', path),
    };
  });
}

function parseFee(raw: RawObject, name: OperationName): OperationFee {
  const path = `fees.${name}`;
  const fee = section(raw, name, 'fees');
  return {
    currency: str(fee, 'currency', path),
    beneficiary: str(fee, 'beneficiary', path),
    baseAmount: num(fee, 'baseAmount', path),
    multiplierBps: num(fee, 'multiplierBps', path),
    burn: bool(fee, 'burn', path),
    enabled: bool(fee, 'enabled', path),
  };
}

/** Parse an untyped source into a WarConfig. Structure only; see validateWarConfig. */
export function parseWarConfig(source: unknown): WarConfig {
  if (!isObject(source)) throw new ConfigurationError('war config must be an object');

  const season = section(source, 'season', 'config');
  const colony = section(source, 'colony', 'config');
  const territory = section(source, 'territory', 'config');
  const bonus = section(territory, 'bonusBps', 'territory');
  const siege = section(source, 'siege', 'config');
  const alliance = section(source, 'alliance', 'config');
  const coordinated = section(source, 'coordinatedAttack', 'config');
  const fees = section(source, 'fees', 'config');

  const bonusBps: Record<TerritoryType, number> = {
    production: num(bonus, 'production', 'territory.bonusBps'),
    defense: num(bonus, 'defense', 'territory.bonusBps'),
    trade: num(bonus, 'trade', 'territory.bonusBps'),
    research: num(bonus, 'research', 'territory.bonusBps'),
    recruitment: num(bonus, 'recruitment', 'territory.bonusBps'),
  };

  return {
    currency: str(source, 'currency', 'config'),
    treasuryAccount: str(source, 'treasuryAccount', 'config'),
    season: {
      registrationDuration: num(season, 'registrationDuration', 'season'),
      warfareDuration: num(season, 'warfareDuration', 'season'),
      resolutionDuration: num(season, 'resolutionDuration', 'season'),
      preRegistrationWindow: num(season, 'preRegistrationWindow', 'season'),
      preRegistrationBatchSize: num(season, 'preRegistrationBatchSize', 'season'),
    },
    colony: {
      minColonyStake: num(colony, 'minColonyStake', 'colony'),
      primaryColonyCooldown: num(colony, 'primaryColonyCooldown', 'colony'),
      stressDecayInterval: num(colony, 'stressDecayInterval', 'colony'),
      stressMaintenancePercent: num(colony, 'stressMaintenancePercent', 'colony'),
    },
    territory: {
      maxTerritories: num(territory, 'maxTerritories', 'territory'),
      maxTerritoriesPerColony: num(territory, 'maxTerritoriesPerColony', 'territory'),
      bonusBps,
      maintenanceInterval: num(territory, 'maintenanceInterval', 'territory'),
      raidCooldown: num(territory, 'raidCooldown', 'territory'),
      raidDamage: num(territory, 'raidDamage', 'territory'),
      raidFortificationReduction: num(territory, 'raidFortificationReduction', 'territory'),
      capturePriorityDuration: num(territory, 'capturePriorityDuration', 'territory'),
    },
    siege: {
      minSiegeStake: num(siege, 'minSiegeStake', 'siege'),
      preparationDuration: num(siege, 'preparationDuration', 'siege'),
      battleDuration: num(siege, 'battleDuration', 'siege'),
      siegeCooldown: num(siege, 'siegeCooldown', 'siege'),
      defenderShareBps: num(siege, 'defenderShareBps', 'siege'),
      burnShareBps: num(siege, 'burnShareBps', 'siege'),
      undefendedDamage: num(siege, 'undefendedDamage', 'siege'),
      outcomeBands: parseBands(siege),
    },
    alliance: {
      maxMembers: num(alliance, 'maxMembers', 'alliance'),
      betrayalStabilityPenalty: num(alliance, 'betrayalStabilityPenalty', 'alliance'),
      forgivenessStabilityRecovery: num(alliance, 'forgivenessStabilityRecovery', 'alliance'),
      betrayalCooldown: num(alliance, 'betrayalCooldown', 'alliance'),
      forgivenessVotingPeriod: num(alliance, 'forgivenessVotingPeriod', 'alliance'),
      treatyProposalTtl: num(alliance, 'treatyProposalTtl', 'alliance'),
      treatyBreachStabilityPenalty: num(alliance, 'treatyBreachStabilityPenalty', 'alliance'),
    },
    coordinatedAttack: {
      maxPerDay: num(coordinated, 'maxPerDay', 'coordinatedAttack'),
      minParticipants: num(coordinated, 'minParticipants', 'coordinatedAttack'),
      maxParticipants: num(coordinated, 'maxParticipants', 'coordinatedAttack'),
      minParticipantStake: num(coordinated, 'minParticipantStake', 'coordinatedAttack'),
      bonusDamagePercent: num(coordinated, 'bonusDamagePercent', 'coordinatedAttack'),
    },
    fees: {
      siege: parseFee(fees, 'siege'),
      raid: parseFee(fees, 'raid'),
      maintenance: parseFee(fees, 'maintenance'),
      repair: parseFee(fees, 'repair'),
      fortify: parseFee(fees, 'fortify'),
      alliance: parseFee(fees, 'alliance'),
      coordinated_attack: parseFee(fees, 'coordinated_attack'),
    },
  };
}

function positiveInts<T extends object>(group: T, path: string, keys: readonly (keyof T & string)[]): void {
  for (const key of keys) {
    const value = group[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      throw new ConfigurationError(`${path}.${key} must be a positive integer`, { value });
    }
  }
}

function nonNegativeInts<T extends object>(group: T, path: string, keys: readonly (keyof T & string)[]): void {
  for (const key of keys) {
    const value = group[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw new ConfigurationError(`${path}.${key} must be a non-negative integer`, { value });
    }
  }
}

function assertBps(value: number, path: string): void {
  if (!Number.isInteger(value) || value < 0 || value > BPS_DENOMINATOR) {
    throw new ConfigurationError(`${path} must be within 0..${BPS_DENOMINATOR} bps`, { value });
  }
}

export function validateWarConfig(config: WarConfig): void {
  const season: SeasonConfig = config.season;
  positiveInts(season, 'season', ['registrationDuration', 'warfareDuration', 'resolutionDuration', 'preRegistrationBatchSize']);
  nonNegativeInts(season, 'season', ['preRegistrationWindow']);

  const colony: ColonyConfig = config.colony;
  positiveInts(colony, 'colony', ['minColonyStake', 'stressDecayInterval']);
  nonNegativeInts(colony, 'colony', ['primaryColonyCooldown', 'stressMaintenancePercent']);

  const territory: TerritoryConfig = config.territory;
  positiveInts(territory, 'territory', ['maxTerritories', 'maxTerritoriesPerColony', 'maintenanceInterval', 'capturePriorityDuration']);
  nonNegativeInts(territory, 'territory', ['raidCooldown', 'raidDamage', 'raidFortificationReduction']);
  if (territory.maxTerritoriesPerColony > territory.maxTerritories) {
    throw new ConfigurationError('territory.maxTerritoriesPerColony exceeds territory.maxTerritories');
  }
  for (const [type, bps] of Object.entries(territory.bonusBps)) assertBps(bps, `territory.bonusBps.${type}`);

  const siege: SiegeConfig = config.siege;
  positiveInts(siege, 'siege', ['minSiegeStake', 'preparationDuration', 'battleDuration']);
  nonNegativeInts(siege, 'siege', ['siegeCooldown', 'undefendedDamage']);
  assertBps(siege.defenderShareBps, 'siege.defenderShareBps');
  assertBps(siege.burnShareBps, 'siege.burnShareBps');
  if (siege.defenderShareBps + siege.burnShareBps > BPS_DENOMINATOR) {
    throw new ConfigurationError('siege.defenderShareBps + siege.burnShareBps exceed 10000');
  }
  validateBands(siege.outcomeBands);

  const alliance: AllianceConfig = config.alliance;
  positiveInts(alliance, 'alliance', ['maxMembers', 'forgivenessVotingPeriod', 'treatyProposalTtl']);
  nonNegativeInts(alliance, 'alliance', [
    'betrayalStabilityPenalty', 'forgivenessStabilityRecovery', 'betrayalCooldown', 'treatyBreachStabilityPenalty',
  ]);
  if (alliance.maxMembers < 2) throw new ConfigurationError('alliance.maxMembers must be at least 2');

  const coordinated: CoordinatedAttackConfig = config.coordinatedAttack;
  positiveInts(coordinated, 'coordinatedAttack', ['maxPerDay', 'minParticipants', 'maxParticipants']);
  nonNegativeInts(coordinated, 'coordinatedAttack', ['minParticipantStake', 'bonusDamagePercent']);
  if (coordinated.minParticipants > coordinated.maxParticipants) {
    throw new ConfigurationError('coordinatedAttack.minParticipants exceeds maxParticipants');
  }

  for (const name of OPERATION_NAMES) {
    const fee = config.fees[name];
    nonNegativeInts(fee, `fees.${name}`, ['baseAmount']);
    positiveInts(fee, `fees.${name}`, ['multiplierBps']);
  }
}

/** Bands must be strictly descending and end with a band that catches ratio 0. */
function validateBands(bands: readonly OutcomeBand[]): void {
  if (bands.length === 0) throw new ConfigurationError('siege.outcomeBands is empty');
  let previous = Number.POSITIVE_INFINITY;
  let seenDefeat = false;
  for (const band of bands) {
    if (!Number.isInteger(band.minRatioBps) || band.minRatioBps < 0 || band.minRatioBps >= previous) {
      throw new ConfigurationError('siege.outcomeBands must have strictly descending minRatioBps', { band });
    }
    if (band.attackerWins && seenDefeat) {
      throw new ConfigurationError('siege.outcomeBands must not grant a win below a defeat', { band });
    }
    if (!band.attackerWins) seenDefeat = true;
    previous = band.minRatioBps;
  }
  if (previous !== 0) throw new ConfigurationError('the last siege outcome band must start at 0');
}

/** Defaults from war-config.json, section-merged with overrides, validated. */
export function loadWarConfig(overrides: WarConfigOverrides = {}, source: unknown = defaultConfigJson): WarConfig {
  const base = parseWarConfig(source);
  const merged: WarConfig = {
    currency: overrides.currency ?? base.currency,
    treasuryAccount: overrides.treasuryAccount ?? base.treasuryAccount,
    season: { ...base.season, ...overrides.season },
    colony: { ...base.colony, ...overrides.colony },
    territory: { ...base.territory, ...overrides.territory },
    siege: { ...base.siege, ...overrides.siege },
    alliance: { ...base.alliance, ...overrides.alliance },
    coordinatedAttack: { ...base.coordinatedAttack, ...overrides.coordinatedAttack },
    fees: { ...base.fees, ...overrides.fees },
  };
  validateWarConfig(merged);
  return merged;
}
