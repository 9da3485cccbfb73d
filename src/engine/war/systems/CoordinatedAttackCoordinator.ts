// ─────────────────────────────────────────────
//  Coordinated Attack Coordinator: alliance task forces
//  and the per-alliance daily attack quota.
//  The counter only moves inside a launch that commits.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { WarState } from '../state/WarState';
import type { ActionContext } from '../state/WarAction';
import type { TaskForceParticipant } from '../data/types/TaskForce';
import { isRegisteredFor, ownerOf } from './ColonyRegistry';
import { requireAlliance } from './AllianceRegistry';
import { assertTokensStaked, createTaskForce, requireTaskForce } from './TaskForceSystem';
import { SiegeEngine } from './SiegeEngine';
import { FeeLedger } from './FeeLedger';
import {
  CapacityExceededError, ConfigurationError, InsufficientStakeError,
  InvalidStateTransitionError, OwnershipConflictError, UnauthorizedError,
} from '../WarErrors';

export const SECONDS_PER_DAY = 86_400;

export interface ParticipantCommitment {
  colonyId: string;
  tokenIds: string[];
  stake: number;
}

export interface LaunchResult {
  state: WarState;
  siegeId: number;
}

export function attackDay(now: number): number {
  return Math.floor(now / SECONDS_PER_DAY);
}

function quotaKey(allianceId: string, now: number): string {
  return `${allianceId}:${attackDay(now)}`;
}

function requireLeaderCaller(state: WarState, ctx: ActionContext, allianceId: string): void {
  const alliance = requireAlliance(state, allianceId);
  if (!alliance.active) throw new InvalidStateTransitionError(`alliance ${allianceId} is inactive`);
  if (ctx.ports.custody.ownerOfColony(alliance.leaderColony) !== ctx.caller) {
    throw new UnauthorizedError(`${ctx.caller} does not lead alliance ${allianceId}`);
  }
}

export const CoordinatedAttackCoordinator = {
  attacksToday(state: WarState, allianceId: string, now: number): number {
    return state.allianceDailyAttacks[quotaKey(allianceId, now)] ?? 0;
  },

  canAllianceInitiateCoordinatedAttack(state: WarState, allianceId: string, now: number): boolean {
    const alliance = state.alliances[allianceId];
    if (!alliance || !alliance.active) return false;
    return CoordinatedAttackCoordinator.attacksToday(state, allianceId, now) < state.config.coordinatedAttack.maxPerDay;
  },

  /** Only called once the attack itself has been committed. */
  incrementAllianceCoordinatedAttackCount(state: WarState, allianceId: string, now: number): WarState {
    const used = CoordinatedAttackCoordinator.attacksToday(state, allianceId, now);
    const max = state.config.coordinatedAttack.maxPerDay;
    if (used >= max) {
      throw new CapacityExceededError(`alliance ${allianceId} used all ${max} coordinated attacks today`);
    }
    return produce(state, draft => {
      draft.allianceDailyAttacks[quotaKey(allianceId, now)] = used + 1;
    });
  },

  /** The leader's wallet funds every participant stake when the attack launches. */
  formAllianceTaskForce(
    state: WarState,
    ctx: ActionContext,
    taskForceId: string,
    allianceId: string,
    name: string,
    commitments: ParticipantCommitment[],
  ): WarState {
    if (state.taskForces[taskForceId]) throw new OwnershipConflictError(`task force ${taskForceId} already exists`);
    requireLeaderCaller(state, ctx, allianceId);
    const alliance = requireAlliance(state, allianceId);

    const cfg = state.config.coordinatedAttack;
    if (commitments.length < cfg.minParticipants) {
      throw new ConfigurationError(`a coordinated attack needs at least ${cfg.minParticipants} colonies`);
    }
    if (commitments.length > cfg.maxParticipants) {
      throw new CapacityExceededError(`a coordinated attack takes at most ${cfg.maxParticipants} colonies`);
    }
    const colonies = commitments.map(c => c.colonyId);
    if (new Set(colonies).size !== colonies.length) {
      throw new OwnershipConflictError('a colony is listed twice', { colonies });
    }

    const seasonId = state.currentSeasonId;
    if (!state.seasons[seasonId]?.active) throw new InvalidStateTransitionError('no active season');

    const participants: TaskForceParticipant[] = commitments.map(c => {
      if (!alliance.members.includes(c.colonyId)) {
        throw new InvalidStateTransitionError(`colony ${c.colonyId} is not a member of ${allianceId}`);
      }
      if (!isRegisteredFor(state, c.colonyId, seasonId)) {
        throw new InvalidStateTransitionError(`colony ${c.colonyId} is not registered for season ${seasonId}`);
      }
      if (!Number.isInteger(c.stake) || c.stake < cfg.minParticipantStake) {
        throw new InsufficientStakeError(
          `participant ${c.colonyId} stakes ${c.stake}, below ${cfg.minParticipantStake}`,
          { stake: c.stake, min: cfg.minParticipantStake },
        );
      }
      assertTokensStaked(ctx, c.colonyId, c.tokenIds);
      return { colonyId: c.colonyId, owner: ownerOf(ctx, c.colonyId), tokenIds: [...c.tokenIds], stake: c.stake };
    });

    return createTaskForce(state, ctx, {
      id: taskForceId,
      seasonId,
      name,
      kind: 'alliance',
      allianceId,
      participants,
      createdAt: ctx.now,
      disbanded: false,
      committedSiegeId: null,
    });
  },

  launchCoordinatedAttack(state: WarState, ctx: ActionContext, taskForceId: string, territoryId: number): LaunchResult {
    const taskForce = requireTaskForce(state, taskForceId);
    if (taskForce.kind !== 'alliance' || taskForce.allianceId === null) {
      throw new InvalidStateTransitionError(`task force ${taskForceId} is not an alliance task force`);
    }
    if (taskForce.disbanded) throw new InvalidStateTransitionError(`task force ${taskForceId} is disbanded`);
    if (taskForce.committedSiegeId !== null) {
      throw new InvalidStateTransitionError(`task force ${taskForceId} already launched siege ${taskForce.committedSiegeId}`);
    }
    const allianceId = taskForce.allianceId;
    requireLeaderCaller(state, ctx, allianceId);
    if (!CoordinatedAttackCoordinator.canAllianceInitiateCoordinatedAttack(state, allianceId, ctx.now)) {
      throw new CapacityExceededError(
        `alliance ${allianceId} used all ${state.config.coordinatedAttack.maxPerDay} coordinated attacks today`,
      );
    }
    const [lead] = taskForce.participants;
    if (!lead) throw new InvalidStateTransitionError(`task force ${taskForceId} has no participants`);

    let next = FeeLedger.applyOperationFee(
      state, 'coordinated_attack', taskForce.participants.length, ctx.caller, ctx.effects,
      { receiptKey: `coordinated:${taskForceId}` },
    ).state;

    const declared = SiegeEngine.declareSiege(next, ctx, {
      territoryId,
      attackerColony: lead.colonyId,
      forces: taskForce.participants.map(p => ({
        colonyId: p.colonyId,
        tokenIds: p.tokenIds,
        wallet: ctx.caller,
        stake: p.stake,
      })),
      coordinatedAttackId: taskForceId,
    });
    next = produce(declared.state, draft => {
      const tf = draft.taskForces[taskForceId];
      if (tf) tf.committedSiegeId = declared.siegeId;
    });
    next = CoordinatedAttackCoordinator.incrementAllianceCoordinatedAttackCount(next, allianceId, ctx.now);

    ctx.effects.emit('coordinatedAttackLaunched', { taskForceId, allianceId, siegeId: declared.siegeId });
    return { state: next, siegeId: declared.siegeId };
  },
};
