// ─────────────────────────────────────────────
//  Colony Registry: war profiles, wallet index, stress
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { WarState } from '../state/WarState';
import type { ActionContext } from '../state/WarAction';
import type { ColonyWarProfile } from '../data/types/Colony';
import { createColonyProfile, MAX_STRESS } from '../data/types/Colony';
import { seasonWalletKey } from '../data/types/Season';
import { isTerminal } from '../data/types/Siege';
import { RateLimiter } from './RateLimiter';
import { MathUtils } from '@/engine/utils/MathUtils';
import {
  InvalidStateTransitionError, NotFoundError, UnauthorizedError,
} from '../WarErrors';

const PRIMARY_COLONY_ACTION = 'primary_colony';
const HONORABLE_STREAK = 3;

/** Wallet that controls the colony according to custody. */
export function ownerOf(ctx: ActionContext, colonyId: string): string {
  const owner = ctx.ports.custody.ownerOfColony(colonyId);
  if (owner === null) throw new NotFoundError(`unknown colony ${colonyId}`);
  return owner;
}

/** Throws unless the caller controls the colony. */
export function requireColonyOwner(ctx: ActionContext, colonyId: string): string {
  const owner = ownerOf(ctx, colonyId);
  if (owner !== ctx.caller) {
    throw new UnauthorizedError(`${ctx.caller} does not control colony ${colonyId}`);
  }
  return owner;
}

export function requireProfile(state: WarState, colonyId: string): ColonyWarProfile {
  const profile = state.colonies[colonyId];
  if (!profile) throw new NotFoundError(`colony ${colonyId} has no war profile`);
  return profile;
}

export function isRegisteredFor(state: WarState, colonyId: string, seasonId: number): boolean {
  const profile = state.colonies[colonyId];
  return profile !== undefined && profile.registered && profile.seasonId === seasonId;
}

/** Stress after the decay owed since the last update. */
export function currentStress(profile: ColonyWarProfile, decayInterval: number, now: number): number {
  if (decayInterval <= 0) return profile.stress;
  const points = Math.floor(Math.max(0, now - profile.stressUpdatedAt) / decayInterval);
  return Math.max(0, profile.stress - points);
}

/** Maintenance scaling as a percent: 100 + stress * stressMaintenancePercent. */
export function maintenanceScalePercent(state: WarState, colonyId: string, now: number): number {
  const profile = state.colonies[colonyId];
  if (!profile) return 100;
  const { stressDecayInterval, stressMaintenancePercent } = state.config.colony;
  return 100 + currentStress(profile, stressDecayInterval, now) * stressMaintenancePercent;
}

export const ColonyRegistry = {
  /**
   * Create or refresh the war profile for a season. Stake accumulates,
   * since the treasury still holds any earlier stake.
   */
  registerProfile(
    state: WarState,
    colonyId: string,
    owner: string,
    seasonId: number,
    stake: number,
    now: number,
  ): WarState {
    return produce(state, draft => {
      const profile = draft.colonies[colonyId] ?? createColonyProfile(colonyId, owner, now);
      profile.owner = owner;
      profile.stake += stake;
      profile.registered = true;
      profile.seasonId = seasonId;
      draft.colonies[colonyId] = profile;

      const wallet = draft.wallets[owner] ?? { address: owner, colonies: [], primaryColony: null };
      if (!wallet.colonies.includes(colonyId)) wallet.colonies.push(colonyId);
      if (wallet.primaryColony === null) wallet.primaryColony = colonyId;
      draft.wallets[owner] = wallet;

      const key = seasonWalletKey(seasonId, owner);
      const seasonColonies = draft.userSeasonColonies[key] ?? [];
      if (!seasonColonies.includes(colonyId)) seasonColonies.push(colonyId);
      draft.userSeasonColonies[key] = seasonColonies;
    });
  },

  setPrimaryColony(state: WarState, ctx: ActionContext, colonyId: string): WarState {
    const owner = requireColonyOwner(ctx, colonyId);
    const wallet = state.wallets[owner];
    if (!wallet || !wallet.colonies.includes(colonyId)) {
      throw new InvalidStateTransitionError(`colony ${colonyId} was never registered by ${owner}`);
    }
    if (wallet.primaryColony === colonyId) return state;

    const next = RateLimiter.checkAndConsumeCooldown(
      state, owner, PRIMARY_COLONY_ACTION, state.config.colony.primaryColonyCooldown, ctx.now,
    );
    ctx.effects.emit('primaryColonyChanged', { wallet: owner, colonyId });
    return produce(next, draft => {
      const w = draft.wallets[owner];
      if (w) w.primaryColony = colonyId;
    });
  },

  /** Leaves userSeasonColonies untouched; alliance protection still reads it. */
  deregisterColony(state: WarState, ctx: ActionContext, colonyId: string): WarState {
    const owner = requireColonyOwner(ctx, colonyId);
    const profile = requireProfile(state, colonyId);
    if (!profile.registered) {
      throw new InvalidStateTransitionError(`colony ${colonyId} is not registered`);
    }
    const attacking = Object.values(state.sieges).some(
      s => s.attackerColony === colonyId && !isTerminal(s),
    );
    if (attacking) {
      throw new InvalidStateTransitionError(`colony ${colonyId} is attacking in an unresolved siege`);
    }

    const { currency, treasuryAccount } = state.config;
    ctx.effects.transfer(currency, treasuryAccount, owner, profile.stake);
    ctx.effects.emit('colonyDeregistered', { colonyId, seasonId: profile.seasonId });
    ctx.effects.log(`Colony ${colonyId} left season ${profile.seasonId}, refunded ${profile.stake}`, 'system');

    return produce(state, draft => {
      const p = draft.colonies[colonyId];
      if (p) {
        p.registered = false;
        p.stake = 0;
      }
      const season = draft.seasons[profile.seasonId];
      if (season) {
        season.registeredColonies = season.registeredColonies.filter(c => c !== colonyId);
      }
    });
  },

  addStress(state: WarState, colonyId: string, amount: number, now: number): WarState {
    const profile = state.colonies[colonyId];
    if (!profile) return state;
    const base = currentStress(profile, state.config.colony.stressDecayInterval, now);
    return produce(state, draft => {
      const p = draft.colonies[colonyId];
      if (!p) return;
      p.stress = MathUtils.clamp(base + amount, 0, MAX_STRESS);
      p.stressUpdatedAt = now;
    });
  },

  decayStress(state: WarState, colonyId: string, now: number): WarState {
    const profile = state.colonies[colonyId];
    if (!profile) return state;
    const interval = state.config.colony.stressDecayInterval;
    const stress = currentStress(profile, interval, now);
    if (stress === profile.stress) return state;
    const decayed = profile.stress - stress;
    return produce(state, draft => {
      const p = draft.colonies[colonyId];
      if (!p) return;
      p.stress = stress;
      p.stressUpdatedAt = stress === 0 ? now : p.stressUpdatedAt + decayed * interval;
    });
  },

  recordSiegeResult(state: WarState, colonyId: string, won: boolean, forfeited: number): WarState {
    if (!state.colonies[colonyId]) return state;
    return produce(state, draft => {
      const p = draft.colonies[colonyId];
      if (!p) return;
      if (won) {
        p.wins += 1;
        p.winStreak += 1;
        if (p.reputation === 'neutral' && p.winStreak >= HONORABLE_STREAK) p.reputation = 'honorable';
      } else {
        p.losses += 1;
        p.winStreak = 0;
      }
      p.totalForfeited += forfeited;
    });
  },
};
