// ─────────────────────────────────────────────
//  War State: immutable aggregate root of the war layer
//  Cross-entity links are ids resolved through WarStateQuery,
//  never embedded objects.
// ─────────────────────────────────────────────

import type { ColonyWarProfile, WalletProfile } from '../data/types/Colony';
import type { PreRegistration, SeasonState } from '../data/types/Season';
import type { TerritoryState } from '../data/types/Territory';
import type { SiegeSnapshot, SiegeState } from '../data/types/Siege';
import type { AllianceState, DiplomaticTreaty, ForgivenessProposal } from '../data/types/Alliance';
import type { TaskForce } from '../data/types/TaskForce';
import type { OperationFee, OperationName } from '../data/types/Fee';
import type { WarConfig, WarFeature } from '../data/types/Config';
import { seasonWalletKey } from '../data/types/Season';
import { loadWarConfig } from '@/engine/loader/WarConfigLoader';

/** Bumped whenever a migration is added to WarSaveManager. */
export const CURRENT_STORAGE_VERSION = 3;

export interface WarState {
  readonly storageVersion: number;          // 0 = setup has not run
  readonly admin: string;
  readonly config: WarConfig;
  readonly paused: Record<WarFeature, boolean>;

  readonly currentSeasonId: number;         // 0 = no season started yet
  readonly seasons: Record<number, SeasonState>;
  readonly preRegistrations: Record<string, PreRegistration>;
  readonly preRegistrationQueue: Record<number, string[]>;
  readonly preRegistrationCursor: Record<number, number>;

  readonly colonies: Record<string, ColonyWarProfile>;
  readonly wallets: Record<string, WalletProfile>;
  readonly userSeasonColonies: Record<string, string[]>;

  readonly territories: Record<number, TerritoryState>;

  readonly nextSiegeId: number;
  readonly sieges: Record<number, SiegeState>;
  readonly activeSiegeByTerritory: Record<number, number>;
  readonly snapshots: Record<number, SiegeSnapshot>;

  readonly nextAllianceId: number;
  readonly alliances: Record<string, AllianceState>;
  readonly allianceOfColony: Record<string, string>;
  readonly nextProposalId: number;
  readonly forgivenessProposals: Record<number, ForgivenessProposal>;
  readonly nextTreatyId: number;
  readonly treaties: Record<number, DiplomaticTreaty>;

  readonly nextTaskForceId: number;
  readonly taskForces: Record<string, TaskForce>;
  readonly tokenAssignments: Record<string, string>;
  readonly allianceDailyAttacks: Record<string, number>;

  readonly cooldowns: Record<string, number>;
  readonly fees: Record<OperationName, OperationFee>;
  readonly feeReceipts: Record<string, number>;

  readonly stateHistory: WarState[];
}

export function createPausedFlags(): Record<WarFeature, boolean> {
  return {
    seasons: false,
    pre_registration: false,
    territories: false,
    raids: false,
    sieges: false,
    alliances: false,
    treaties: false,
    coordinated_attacks: false,
  };
}

/** Empty, not-yet-initialized state. Run InitializeWarAction before anything else. */
export function createEmptyWarState(config: WarConfig = loadWarConfig()): WarState {
  return {
    storageVersion: 0,
    admin: '',
    config,
    paused: createPausedFlags(),
    currentSeasonId: 0,
    seasons: {},
    preRegistrations: {},
    preRegistrationQueue: {},
    preRegistrationCursor: {},
    colonies: {},
    wallets: {},
    userSeasonColonies: {},
    territories: {},
    nextSiegeId: 1,
    sieges: {},
    activeSiegeByTerritory: {},
    snapshots: {},
    nextAllianceId: 1,
    alliances: {},
    allianceOfColony: {},
    nextProposalId: 1,
    forgivenessProposals: {},
    nextTreatyId: 1,
    treaties: {},
    nextTaskForceId: 1,
    taskForces: {},
    tokenAssignments: {},
    allianceDailyAttacks: {},
    cooldowns: {},
    fees: { ...config.fees },
    feeReceipts: {},
    stateHistory: [],
  };
}

// --- Query Utilities ---

export const WarStateQuery = {
  currentSeason(state: WarState): SeasonState | undefined {
    return state.seasons[state.currentSeasonId];
  },

  colony(state: WarState, colonyId: string): ColonyWarProfile | undefined {
    return state.colonies[colonyId];
  },

  territory(state: WarState, territoryId: number): TerritoryState | undefined {
    return state.territories[territoryId];
  },

  siege(state: WarState, siegeId: number): SiegeState | undefined {
    return state.sieges[siegeId];
  },

  snapshot(state: WarState, siegeId: number): SiegeSnapshot | undefined {
    return state.snapshots[siegeId];
  },

  alliance(state: WarState, allianceId: string): AllianceState | undefined {
    return state.alliances[allianceId];
  },

  allianceOf(state: WarState, colonyId: string): AllianceState | undefined {
    const allianceId = state.allianceOfColony[colonyId];
    return allianceId === undefined ? undefined : state.alliances[allianceId];
  },

  territoriesOf(state: WarState, colonyId: string): TerritoryState[] {
    return Object.values(state.territories).filter(t => t.controller === colonyId);
  },

  seasonColoniesOf(state: WarState, seasonId: number, wallet: string): string[] {
    return state.userSeasonColonies[seasonWalletKey(seasonId, wallet)] ?? [];
  },

  isBetrayer(state: WarState, allianceId: string, colonyId: string): boolean {
    return state.alliances[allianceId]?.betrayers[colonyId] !== undefined;
  },
};
