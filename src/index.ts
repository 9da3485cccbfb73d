// ─────────────────────────────────────────────
//  Colony Wars: public entry point
// ─────────────────────────────────────────────

export { WarStore, systemClock } from '@/engine/war/state/WarStore';
export type { Clock } from '@/engine/war/state/WarStore';
export { createEmptyWarState, WarStateQuery, CURRENT_STORAGE_VERSION } from '@/engine/war/state/WarState';
export type { WarState } from '@/engine/war/state/WarState';
export type { WarAction, ActionContext } from '@/engine/war/state/WarAction';
export { WarCoordinator } from '@/engine/coordinator/WarCoordinator';
export { WarEventBus } from '@/engine/war/WarEventBus';
export type { WarEventMap, WarEventName, ScoutReport } from '@/engine/war/WarEventBus';
export * from '@/engine/war/WarErrors';
export { loadWarConfig, parseWarConfig, validateWarConfig } from '@/engine/loader/WarConfigLoader';
export { WarSaveManager } from '@/engine/war/persistence/WarSaveManager';
export { Logger } from '@/engine/utils/Logger';
export { createInMemoryPorts } from '@/engine/war/ports/InMemoryPorts';
export type { WarPorts } from '@/engine/war/ports/WarPorts';
export type { ICombatPowerProvider } from '@/engine/war/ports/ICombatPowerProvider';
export type { ICustodyProvider } from '@/engine/war/ports/ICustodyProvider';
export type { IValueTransfer } from '@/engine/war/ports/IValueTransfer';
export type { ColonyWarProfile, WalletProfile, ReputationCategory } from '@/engine/war/data/types/Colony';
export type { SeasonState, SeasonPhase, PreRegistration } from '@/engine/war/data/types/Season';
export type { TerritoryState, TerritoryType } from '@/engine/war/data/types/Territory';
export type { SiegeState, SiegeSnapshot, SiegeOutcome, SiegeStatus } from '@/engine/war/data/types/Siege';
export type { AllianceState, DiplomaticTreaty, ForgivenessProposal, TreatyKind } from '@/engine/war/data/types/Alliance';
export type { TaskForce } from '@/engine/war/data/types/TaskForce';
export type { OperationFee, OperationName } from '@/engine/war/data/types/Fee';
export type { WarConfig, WarConfigOverrides, WarFeature } from '@/engine/war/data/types/Config';
