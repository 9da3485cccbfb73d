// ─────────────────────────────────────────────
//  WarCoordinator: host-facing facade over WarStore
//  Every method is one dispatch, attributed to `caller`.
//  Ids for new records are read before dispatch; a
//  dispatch is synchronous, so they cannot race.
// ─────────────────────────────────────────────

import type { WarState } from '@/engine/war/state/WarState';
import type { WarStore } from '@/engine/war/state/WarStore';
import type { WarConfig, WarFeature } from '@/engine/war/data/types/Config';
import type { OperationFee, OperationName } from '@/engine/war/data/types/Fee';
import type { SeasonPhase, SeasonState } from '@/engine/war/data/types/Season';
import type { TerritoryState } from '@/engine/war/data/types/Territory';
import type { SiegeState, SiegeStatus } from '@/engine/war/data/types/Siege';
import type { AllianceState, TreatyKind, TreatyStatus } from '@/engine/war/data/types/Alliance';
import type { ParticipantCommitment } from '@/engine/war/systems/CoordinatedAttackCoordinator';
import { WarStateQuery } from '@/engine/war/state/WarState';
import { seasonPhase } from '@/engine/war/systems/SeasonManager';
import { effectiveBonus, effectiveDefense } from '@/engine/war/systems/TerritoryLedger';
import { siegeStatusAt } from '@/engine/war/systems/SiegeEngine';
import { treatyStatus } from '@/engine/war/systems/AllianceRegistry';
import { CoordinatedAttackCoordinator } from '@/engine/war/systems/CoordinatedAttackCoordinator';
import { FeeLedger } from '@/engine/war/systems/FeeLedger';
import { RateLimiter } from '@/engine/war/systems/RateLimiter';
import {
  ConfigureOperationFeeAction, InitializeWarAction, OverrideSiegeAction,
  SetFeaturePausedAction, TransferAdminAction,
} from '@/engine/war/state/actions/AdminActions';
import {
  ActivatePreRegistrationsAction, CancelPreRegistrationAction, ClaimSeasonRewardAction,
  FinalizeSeasonAction, PreRegisterAction, RegisterColonyAction, StartSeasonAction,
} from '@/engine/war/state/actions/SeasonActions';
import { DeregisterColonyAction, SetPrimaryColonyAction } from '@/engine/war/state/actions/ColonyActions';
import {
  AbandonTerritoryAction, CaptureTerritoryAction, FortifyTerritoryAction,
  PayMaintenanceAction, RaidScoutAction, RepairDamageAction,
} from '@/engine/war/state/actions/TerritoryActions';
import { DeclareSiegeAction, DefendSiegeAction, ResolveSiegeAction } from '@/engine/war/state/actions/SiegeActions';
import {
  AcceptAllianceInvitationAction, AcceptTreatyAction, ContributeToTreasuryAction, DeclineAllianceInvitationAction,
  ExecuteForgivenessAction, FormAllianceAction, InviteAllianceMemberAction, ProposeForgivenessAction,
  ProposeTreatyAction, RemoveAllianceMemberAction, VoteForgivenessAction,
} from '@/engine/war/state/actions/AllianceActions';
import {
  DisbandTaskForceAction, FormAllianceTaskForceAction, FormTaskForceAction, LaunchCoordinatedAttackAction,
} from '@/engine/war/state/actions/TaskForceActions';
import { loadWarConfig } from '@/engine/loader/WarConfigLoader';

export class WarCoordinator {
  constructor(private readonly store: WarStore) {}

  get state(): WarState {
    return this.store.getState();
  }

  // --- Admin ---

  initialize(admin: string, config: WarConfig = loadWarConfig()): void {
    this.store.dispatch(new InitializeWarAction(config), admin);
  }

  setFeaturePaused(caller: string, feature: WarFeature, paused: boolean): void {
    this.store.dispatch(new SetFeaturePausedAction(feature, paused), caller);
  }

  configureOperationFee(caller: string, name: OperationName, fee: OperationFee): void {
    this.store.dispatch(new ConfigureOperationFeeAction(name, fee), caller);
  }

  overrideSiege(caller: string, siegeId: number): void {
    this.store.dispatch(new OverrideSiegeAction(siegeId), caller);
  }

  transferAdmin(caller: string, newAdmin: string): void {
    this.store.dispatch(new TransferAdminAction(newAdmin), caller);
  }

  // --- Seasons ---

  startSeason(caller: string): number {
    const seasonId = this.state.currentSeasonId + 1;
    this.store.dispatch(new StartSeasonAction(), caller);
    return seasonId;
  }

  registerColony(caller: string, colonyId: string, seasonId: number, stake: number): void {
    this.store.dispatch(new RegisterColonyAction(colonyId, seasonId, stake), caller);
  }

  preRegister(caller: string, colonyId: string, seasonId: number, stake: number): void {
    this.store.dispatch(new PreRegisterAction(colonyId, seasonId, stake), caller);
  }

  cancelPreRegistration(caller: string, seasonId: number, colonyId: string): void {
    this.store.dispatch(new CancelPreRegistrationAction(seasonId, colonyId), caller);
  }

  activatePreRegistrations(caller: string, seasonId: number, batchSize: number): void {
    this.store.dispatch(new ActivatePreRegistrationsAction(seasonId, batchSize), caller);
  }

  finalizeSeason(caller: string, seasonId: number): void {
    this.store.dispatch(new FinalizeSeasonAction(seasonId), caller);
  }

  claimSeasonReward(caller: string, seasonId: number, colonyId: string): void {
    this.store.dispatch(new ClaimSeasonRewardAction(seasonId, colonyId), caller);
  }

  // --- Colonies ---

  setPrimaryColony(caller: string, colonyId: string): void {
    this.store.dispatch(new SetPrimaryColonyAction(colonyId), caller);
  }

  deregisterColony(caller: string, colonyId: string): void {
    this.store.dispatch(new DeregisterColonyAction(colonyId), caller);
  }

  // --- Territories ---

  captureTerritory(caller: string, territoryId: number, colonyId: string): void {
    this.store.dispatch(new CaptureTerritoryAction(territoryId, colonyId), caller);
  }

  payMaintenance(caller: string, territoryId: number): void {
    this.store.dispatch(new PayMaintenanceAction(territoryId), caller);
  }

  repairDamage(caller: string, territoryId: number): void {
    this.store.dispatch(new RepairDamageAction(territoryId), caller);
  }

  fortifyTerritory(caller: string, territoryId: number, amount: number): void {
    this.store.dispatch(new FortifyTerritoryAction(territoryId, amount), caller);
  }

  abandonTerritory(caller: string, territoryId: number): void {
    this.store.dispatch(new AbandonTerritoryAction(territoryId), caller);
  }

  raidScout(caller: string, territoryId: number, raiderColony: string): void {
    this.store.dispatch(new RaidScoutAction(territoryId, raiderColony), caller);
  }

  // --- Sieges ---

  declareSiege(caller: string, territoryId: number, attackerColony: string, attackerTokens: string[], stake: number): number {
    const siegeId = this.state.nextSiegeId;
    this.store.dispatch(new DeclareSiegeAction(territoryId, attackerColony, attackerTokens, stake), caller);
    return siegeId;
  }

  defend(caller: string, siegeId: number, defenderTokens: string[]): void {
    this.store.dispatch(new DefendSiegeAction(siegeId, defenderTokens), caller);
  }

  resolveSiege(caller: string, siegeId: number): void {
    this.store.dispatch(new ResolveSiegeAction(siegeId), caller);
  }

  // --- Alliances ---

  /** Forms the alliance around its leader; `initialMembers` are invited, not enrolled. */
  formAlliance(caller: string, name: string, leaderColony: string, initialMembers: string[]): string {
    const allianceId = `alliance-${this.state.nextAllianceId}`;
    this.store.dispatch(new FormAllianceAction(allianceId, name, leaderColony, initialMembers), caller);
    return allianceId;
  }

  addMember(caller: string, allianceId: string, colonyId: string): void {
    this.store.dispatch(new InviteAllianceMemberAction(allianceId, colonyId), caller);
  }

  acceptInvitation(caller: string, allianceId: string, colonyId: string): void {
    this.store.dispatch(new AcceptAllianceInvitationAction(allianceId, colonyId), caller);
  }

  declineInvitation(caller: string, allianceId: string, colonyId: string): void {
    this.store.dispatch(new DeclineAllianceInvitationAction(allianceId, colonyId), caller);
  }

  removeMember(caller: string, allianceId: string, colonyId: string): void {
    this.store.dispatch(new RemoveAllianceMemberAction(allianceId, colonyId), caller);
  }

  proposeForgiveness(caller: string, allianceId: string, betrayerColony: string, proposerColony: string): number {
    const proposalId = this.state.nextProposalId;
    this.store.dispatch(new ProposeForgivenessAction(allianceId, betrayerColony, proposerColony), caller);
    return proposalId;
  }

  voteForgiveness(caller: string, proposalId: number, voterColony: string, support: boolean): void {
    this.store.dispatch(new VoteForgivenessAction(proposalId, voterColony, support), caller);
  }

  executeForgiveness(caller: string, proposalId: number): void {
    this.store.dispatch(new ExecuteForgivenessAction(proposalId), caller);
  }

  proposeTreaty(caller: string, fromAlliance: string, toAlliance: string, kind: TreatyKind, duration: number): number {
    const treatyId = this.state.nextTreatyId;
    this.store.dispatch(new ProposeTreatyAction(fromAlliance, toAlliance, kind, duration), caller);
    return treatyId;
  }

  acceptTreaty(caller: string, treatyId: number): void {
    this.store.dispatch(new AcceptTreatyAction(treatyId), caller);
  }

  contributeToTreasury(caller: string, allianceId: string, colonyId: string, amount: number): void {
    this.store.dispatch(new ContributeToTreasuryAction(allianceId, colonyId, amount), caller);
  }

  // --- Task forces ---

  formTaskForce(caller: string, colonyId: string, name: string, tokenIds: string[]): string {
    const taskForceId = `tf-${this.state.nextTaskForceId}`;
    this.store.dispatch(new FormTaskForceAction(taskForceId, colonyId, name, tokenIds), caller);
    return taskForceId;
  }

  disbandTaskForce(caller: string, taskForceId: string): void {
    this.store.dispatch(new DisbandTaskForceAction(taskForceId), caller);
  }

  formAllianceTaskForce(caller: string, allianceId: string, name: string, commitments: ParticipantCommitment[]): string {
    const taskForceId = `tf-${this.state.nextTaskForceId}`;
    this.store.dispatch(new FormAllianceTaskForceAction(taskForceId, allianceId, name, commitments), caller);
    return taskForceId;
  }

  launchCoordinatedAttack(caller: string, taskForceId: string, territoryId: number): number {
    const siegeId = this.state.nextSiegeId;
    this.store.dispatch(new LaunchCoordinatedAttackAction(taskForceId, territoryId), caller);
    return siegeId;
  }

  // --- Queries ---

  currentSeason(): SeasonState | undefined {
    return WarStateQuery.currentSeason(this.state);
  }

  seasonPhase(seasonId: number = this.state.currentSeasonId): SeasonPhase | undefined {
    const season = this.state.seasons[seasonId];
    return season ? seasonPhase(season, this.store.now()) : undefined;
  }

  territory(territoryId: number): TerritoryState | undefined {
    return WarStateQuery.territory(this.state, territoryId);
  }

  territoryBonus(territoryId: number): number {
    const territory = this.territory(territoryId);
    return territory ? effectiveBonus(this.state, territory, this.store.now()) : 0;
  }

  territoryDefense(territoryId: number, basePower: number): number {
    const territory = this.territory(territoryId);
    return territory ? effectiveDefense(basePower, territory) : basePower;
  }

  siege(siegeId: number): SiegeState | undefined {
    return WarStateQuery.siege(this.state, siegeId);
  }

  siegeStatus(siegeId: number): SiegeStatus | undefined {
    const siege = this.siege(siegeId);
    return siege ? siegeStatusAt(siege, this.store.now()) : undefined;
  }

  allianceOf(colonyId: string): AllianceState | undefined {
    return WarStateQuery.allianceOf(this.state, colonyId);
  }

  isBetrayer(allianceId: string, colonyId: string): boolean {
    return WarStateQuery.isBetrayer(this.state, allianceId, colonyId);
  }

  treatyStatus(treatyId: number): TreatyStatus | undefined {
    const treaty = this.state.treaties[treatyId];
    return treaty ? treatyStatus(treaty, this.store.now()) : undefined;
  }

  canAllianceInitiateCoordinatedAttack(allianceId: string): boolean {
    return CoordinatedAttackCoordinator.canAllianceInitiateCoordinatedAttack(this.state, allianceId, this.store.now());
  }

  quoteOperationFee(name: OperationName, quantity = 1): number {
    return FeeLedger.quoteOperationFee(this.state, name, quantity);
  }

  cooldownRemaining(actorKey: string, actionId: string, cooldownSeconds: number): number {
    return RateLimiter.cooldownRemaining(this.state, actorKey, actionId, cooldownSeconds, this.store.now());
  }
}
