// ─────────────────────────────────────────────
//  Task Force System: season-scoped token groupings
//  A token sits in at most one live task force per season.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { WarState } from '../state/WarState';
import type { ActionContext } from '../state/WarAction';
import type { TaskForce, TaskForceParticipant } from '../data/types/TaskForce';
import { tokenAssignmentKey } from '../data/types/TaskForce';
import { isTerminal } from '../data/types/Siege';
import { isRegisteredFor, requireColonyOwner } from './ColonyRegistry';
import {
  ConfigurationError, InvalidStateTransitionError, NotFoundError,
  OwnershipConflictError, UnauthorizedError,
} from '../WarErrors';

/** Non-empty, no duplicates, every token staked to the colony. */
export function assertTokensStaked(ctx: ActionContext, colonyId: string, tokenIds: readonly string[]): void {
  if (tokenIds.length === 0) {
    throw new ConfigurationError(`colony ${colonyId} committed no tokens`);
  }
  if (new Set(tokenIds).size !== tokenIds.length) {
    throw new OwnershipConflictError(`colony ${colonyId} listed a token twice`, { tokenIds });
  }
  for (const tokenId of tokenIds) {
    if (!ctx.ports.custody.isStaked(colonyId, tokenId)) {
      throw new OwnershipConflictError(`token ${tokenId} is not staked to colony ${colonyId}`);
    }
  }
}

export function requireTaskForce(state: WarState, taskForceId: string): TaskForce {
  const taskForce = state.taskForces[taskForceId];
  if (!taskForce) throw new NotFoundError(`unknown task force ${taskForceId}`);
  return taskForce;
}

/**
 * Commit tokens to a holder (a task force, or a siege declared outside one).
 * A token held by any other live holder conflicts.
 */
export function reserveTokens(state: WarState, seasonId: number, holderId: string, tokenIds: readonly string[]): WarState {
  for (const tokenId of tokenIds) {
    const holder = state.tokenAssignments[tokenAssignmentKey(seasonId, tokenId)];
    if (holder !== undefined && holder !== holderId && !state.taskForces[holder]?.disbanded) {
      throw new OwnershipConflictError(
        `token ${tokenId} is already committed to ${holder} this season`,
        { tokenId, holder },
      );
    }
  }
  return produce(state, draft => {
    for (const tokenId of tokenIds) {
      draft.tokenAssignments[tokenAssignmentKey(seasonId, tokenId)] = holderId;
    }
  });
}

export function createTaskForce(state: WarState, ctx: ActionContext, taskForce: TaskForce): WarState {
  const tokens = taskForce.participants.flatMap(p => p.tokenIds);
  if (new Set(tokens).size !== tokens.length) {
    throw new OwnershipConflictError('a token is listed by two participants', { tokens });
  }
  const reserved = reserveTokens(state, taskForce.seasonId, taskForce.id, tokens);
  ctx.effects.emit('taskForceFormed', { taskForceId: taskForce.id, seasonId: taskForce.seasonId, tokenCount: tokens.length });
  return produce(reserved, draft => {
    draft.taskForces[taskForce.id] = taskForce;
    draft.nextTaskForceId += 1;
  });
}

export const TaskForceSystem = {
  formTaskForce(
    state: WarState,
    ctx: ActionContext,
    taskForceId: string,
    colonyId: string,
    name: string,
    tokenIds: string[],
  ): WarState {
    if (state.taskForces[taskForceId]) throw new OwnershipConflictError(`task force ${taskForceId} already exists`);
    const owner = requireColonyOwner(ctx, colonyId);
    const seasonId = state.currentSeasonId;
    if (!state.seasons[seasonId]?.active) throw new InvalidStateTransitionError('no active season');
    if (!isRegisteredFor(state, colonyId, seasonId)) {
      throw new InvalidStateTransitionError(`colony ${colonyId} is not registered for season ${seasonId}`);
    }
    assertTokensStaked(ctx, colonyId, tokenIds);

    const participant: TaskForceParticipant = { colonyId, owner, tokenIds: [...tokenIds], stake: 0 };
    return createTaskForce(state, ctx, {
      id: taskForceId,
      seasonId,
      name,
      kind: 'colony',
      allianceId: null,
      participants: [participant],
      createdAt: ctx.now,
      disbanded: false,
      committedSiegeId: null,
    });
  },

  /** The creator disbands; tokens are released unless the committed siege is still running. */
  disbandTaskForce(state: WarState, ctx: ActionContext, taskForceId: string): WarState {
    const taskForce = requireTaskForce(state, taskForceId);
    if (taskForce.disbanded) throw new InvalidStateTransitionError(`task force ${taskForceId} is already disbanded`);
    const [creator] = taskForce.participants;
    if (!creator || creator.owner !== ctx.caller) {
      throw new UnauthorizedError(`${ctx.caller} did not form task force ${taskForceId}`);
    }
    if (taskForce.committedSiegeId !== null) {
      const siege = state.sieges[taskForce.committedSiegeId];
      if (siege && !isTerminal(siege)) {
        throw new InvalidStateTransitionError(`task force ${taskForceId} is committed to siege ${siege.id}`);
      }
    }

    ctx.effects.emit('taskForceDisbanded', { taskForceId });
    return produce(state, draft => {
      const tf = draft.taskForces[taskForceId];
      if (!tf) return;
      tf.disbanded = true;
      for (const p of tf.participants) {
        for (const tokenId of p.tokenIds) {
          const key = tokenAssignmentKey(tf.seasonId, tokenId);
          if (draft.tokenAssignments[key] === taskForceId) delete draft.tokenAssignments[key];
        }
      }
    });
  },
};
