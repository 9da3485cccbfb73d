// ─────────────────────────────────────────────
//  Season Manager: lifecycle + pre-registration queue
//  registration → warfare → resolution, contiguous windows.
//  Pre-registrations activate in bounded batches from a cursor,
//  so starting a season costs at most one batch.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { WarState } from '../state/WarState';
import type { ActionContext } from '../state/WarAction';
import type { SeasonPhase, SeasonState } from '../data/types/Season';
import { preRegistrationKey } from '../data/types/Season';
import { ColonyRegistry, isRegisteredFor, requireColonyOwner } from './ColonyRegistry';
import { MathUtils } from '@/engine/utils/MathUtils';
import {
  ConfigurationError, InsufficientStakeError, InvalidStateTransitionError,
  NotFoundError, OwnershipConflictError, UnauthorizedError,
} from '../WarErrors';

export function seasonPhase(season: SeasonState, now: number): SeasonPhase {
  if (now < season.startTime) return 'pending';
  if (now < season.registrationEnd) return 'registration';
  if (now < season.warfareEnd) return 'warfare';
  if (now < season.resolutionEnd) return 'resolution';
  return 'ended';
}

export function requireSeason(state: WarState, seasonId: number): SeasonState {
  const season = state.seasons[seasonId];
  if (!season) throw new NotFoundError(`season ${seasonId} does not exist`);
  return season;
}

/** The active season, asserting it is in one of the given phases. */
export function requireCurrentPhase(state: WarState, now: number, ...phases: SeasonPhase[]): SeasonState {
  const season = state.seasons[state.currentSeasonId];
  if (!season || !season.active) {
    throw new InvalidStateTransitionError('no active season');
  }
  const phase = seasonPhase(season, now);
  if (!phases.includes(phase)) {
    throw new InvalidStateTransitionError(
      `season ${season.id} is in ${phase}, expected ${phases.join(' or ')}`,
      { seasonId: season.id, phase },
    );
  }
  return season;
}

export interface ActivationResult {
  state: WarState;
  processed: number;
  remaining: number;
}

export const SeasonManager = {
  startSeason(state: WarState, ctx: ActionContext): WarState {
    const previous = state.seasons[state.currentSeasonId];
    if (previous && ctx.now < previous.resolutionEnd) {
      throw new InvalidStateTransitionError(
        `season ${previous.id} resolves at ${previous.resolutionEnd}`,
        { seasonId: previous.id, resolutionEnd: previous.resolutionEnd },
      );
    }

    const cfg = state.config.season;
    const id = state.currentSeasonId + 1;
    const registrationEnd = ctx.now + cfg.registrationDuration;
    const warfareEnd = registrationEnd + cfg.warfareDuration;
    const season: SeasonState = {
      id,
      startTime: ctx.now,
      registrationEnd,
      warfareEnd,
      resolutionEnd: warfareEnd + cfg.resolutionDuration,
      active: true,
      registeredColonies: [],
      prizePool: 0,
      finalized: false,
      rewards: {},
      rewardClaimed: {},
    };

    const started = produce(state, draft => {
      const prev = draft.seasons[draft.currentSeasonId];
      if (prev) prev.active = false;
      draft.seasons[id] = season;
      draft.currentSeasonId = id;
    });

    ctx.effects.emit('seasonStarted', { seasonId: id, startTime: ctx.now, resolutionEnd: season.resolutionEnd });
    ctx.effects.log(`Season ${id} started`, 'system');

    return SeasonManager.activatePreRegistrations(started, ctx, id, cfg.preRegistrationBatchSize).state;
  },

  registerColony(state: WarState, ctx: ActionContext, colonyId: string, seasonId: number, stake: number): WarState {
    if (seasonId !== state.currentSeasonId) {
      throw new InvalidStateTransitionError(
        `season ${seasonId} is not open for registration; use pre-registration for upcoming seasons`,
      );
    }
    requireCurrentPhase(state, ctx.now, 'registration');
    const owner = requireColonyOwner(ctx, colonyId);
    assertStake(state, stake);
    if (isRegisteredFor(state, colonyId, seasonId)) {
      throw new InvalidStateTransitionError(`colony ${colonyId} is already registered for season ${seasonId}`);
    }

    ctx.effects.transfer(state.config.currency, owner, state.config.treasuryAccount, stake);
    return enroll(state, ctx, colonyId, owner, seasonId, stake);
  },

  preRegister(state: WarState, ctx: ActionContext, colonyId: string, seasonId: number, stake: number): WarState {
    if (seasonId !== state.currentSeasonId + 1 || state.seasons[seasonId]) {
      throw new InvalidStateTransitionError(`pre-registration is only open for season ${state.currentSeasonId + 1}`);
    }
    const window = state.config.season.preRegistrationWindow;
    const current = state.seasons[state.currentSeasonId];
    if (window > 0 && current && ctx.now < current.resolutionEnd - window) {
      throw new InvalidStateTransitionError(
        `pre-registration for season ${seasonId} opens at ${current.resolutionEnd - window}`,
      );
    }
    const owner = requireColonyOwner(ctx, colonyId);
    assertStake(state, stake);

    const key = preRegistrationKey(seasonId, colonyId);
    const existing = state.preRegistrations[key];
    if (existing && !existing.cancelled) {
      throw new OwnershipConflictError(`colony ${colonyId} is already pre-registered for season ${seasonId}`);
    }

    ctx.effects.transfer(state.config.currency, owner, state.config.treasuryAccount, stake);
    ctx.effects.emit('preRegistered', { colonyId, seasonId, stake });

    return produce(state, draft => {
      draft.preRegistrations[key] = {
        seasonId, colonyId, owner, stake,
        createdAt: ctx.now,
        activated: false,
        cancelled: false,
      };
      const queue = draft.preRegistrationQueue[seasonId] ?? [];
      if (!queue.includes(key)) queue.push(key);
      draft.preRegistrationQueue[seasonId] = queue;
    });
  },

  cancelPreRegistration(state: WarState, ctx: ActionContext, seasonId: number, colonyId: string): WarState {
    const key = preRegistrationKey(seasonId, colonyId);
    const record = state.preRegistrations[key];
    if (!record) throw new NotFoundError(`no pre-registration for colony ${colonyId} in season ${seasonId}`);
    if (record.owner !== ctx.caller) {
      throw new UnauthorizedError(`${ctx.caller} did not pre-register colony ${colonyId}`);
    }
    if (record.activated) throw new InvalidStateTransitionError('pre-registration already activated');
    if (record.cancelled) throw new InvalidStateTransitionError('pre-registration already cancelled');

    ctx.effects.transfer(state.config.currency, state.config.treasuryAccount, record.owner, record.stake);
    ctx.effects.emit('preRegistrationCancelled', { colonyId, seasonId });

    return produce(state, draft => {
      const r = draft.preRegistrations[key];
      if (r) r.cancelled = true;
    });
  },

  /** Activate up to `batchSize` queued entries, resuming from the season's cursor. */
  activatePreRegistrations(state: WarState, ctx: ActionContext, seasonId: number, batchSize: number): ActivationResult {
    if (!MathUtils.isPositiveInt(batchSize)) {
      throw new ConfigurationError('batch size must be a positive integer', { batchSize });
    }
    requireSeason(state, seasonId);

    const queue = state.preRegistrationQueue[seasonId] ?? [];
    const start = state.preRegistrationCursor[seasonId] ?? 0;
    const end = Math.min(queue.length, start + batchSize);
    let next = state;

    for (const key of queue.slice(start, end)) {
      const record = next.preRegistrations[key];
      if (!record || record.cancelled || record.activated) continue;

      if (isRegisteredFor(next, record.colonyId, seasonId)) {
        // Registered by hand in the meantime: the pre-registered stake goes back.
        ctx.effects.transfer(next.config.currency, next.config.treasuryAccount, record.owner, record.stake);
        next = produce(next, draft => {
          const r = draft.preRegistrations[key];
          if (r) r.cancelled = true;
        });
        continue;
      }

      next = enroll(next, ctx, record.colonyId, record.owner, seasonId, record.stake);
      next = produce(next, draft => {
        const r = draft.preRegistrations[key];
        if (r) r.activated = true;
      });
      ctx.effects.emit('preRegistrationActivated', { colonyId: record.colonyId, seasonId });
    }

    next = produce(next, draft => {
      draft.preRegistrationCursor[seasonId] = end;
    });
    return { state: next, processed: end - start, remaining: queue.length - end };
  },

  /** Split the prize pool across territory holders, pro rata by territory count. */
  finalizeSeason(state: WarState, ctx: ActionContext, seasonId: number): WarState {
    const season = requireSeason(state, seasonId);
    if (season.finalized) throw new InvalidStateTransitionError(`season ${seasonId} is already finalized`);
    if (ctx.now < season.resolutionEnd) {
      throw new InvalidStateTransitionError(`season ${seasonId} resolves at ${season.resolutionEnd}`);
    }

    const counts: Record<string, number> = {};
    let total = 0;
    for (const territory of Object.values(state.territories)) {
      if (territory.controller === null) continue;
      counts[territory.controller] = (counts[territory.controller] ?? 0) + 1;
      total += 1;
    }

    const rewards: Record<string, number> = {};
    if (total > 0) {
      for (const [colonyId, count] of Object.entries(counts)) {
        const amount = Math.floor((season.prizePool * count) / total);
        if (amount > 0) rewards[colonyId] = amount;
      }
    }

    ctx.effects.emit('seasonFinalized', { seasonId, prizePool: season.prizePool });
    return produce(state, draft => {
      const s = draft.seasons[seasonId];
      if (!s) return;
      s.rewards = rewards;
      s.finalized = true;
    });
  },

  claimSeasonReward(state: WarState, ctx: ActionContext, seasonId: number, colonyId: string): WarState {
    const season = requireSeason(state, seasonId);
    if (!season.finalized) throw new InvalidStateTransitionError(`season ${seasonId} is not finalized`);
    const owner = requireColonyOwner(ctx, colonyId);
    const amount = season.rewards[colonyId];
    if (amount === undefined) throw new NotFoundError(`colony ${colonyId} has no reward in season ${seasonId}`);
    if (season.rewardClaimed[colonyId]) {
      throw new InvalidStateTransitionError(`reward for colony ${colonyId} already claimed`);
    }

    ctx.effects.transfer(state.config.currency, state.config.treasuryAccount, owner, amount);
    ctx.effects.emit('seasonRewardClaimed', { seasonId, colonyId, amount });
    return produce(state, draft => {
      const s = draft.seasons[seasonId];
      if (s) s.rewardClaimed[colonyId] = true;
    });
  },
};

function assertStake(state: WarState, stake: number): void {
  const min = state.config.colony.minColonyStake;
  if (!Number.isInteger(stake) || stake < min) {
    throw new InsufficientStakeError(`colony stake must be at least ${min}`, { stake, min });
  }
}

function enroll(
  state: WarState,
  ctx: ActionContext,
  colonyId: string,
  owner: string,
  seasonId: number,
  stake: number,
): WarState {
  const registered = ColonyRegistry.registerProfile(state, colonyId, owner, seasonId, stake, ctx.now);
  ctx.effects.emit('colonyRegistered', { colonyId, seasonId, owner, stake });
  return produce(registered, draft => {
    const season = draft.seasons[seasonId];
    if (season && !season.registeredColonies.includes(colonyId)) {
      season.registeredColonies.push(colonyId);
    }
  });
}
