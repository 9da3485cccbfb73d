// ─────────────────────────────────────────────
//  Rate Limiter: per-actor / per-action cooldowns
//  The check and the timestamp write happen in one produce().
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { WarState } from '../state/WarState';
import { CooldownActiveError } from '../WarErrors';

export function cooldownKey(actorKey: string, actionId: string): string {
  return `${actorKey}|${actionId}`;
}

export const RateLimiter = {
  /** Seconds left before the actor may repeat the action; 0 when free. */
  cooldownRemaining(
    state: WarState,
    actorKey: string,
    actionId: string,
    cooldownSeconds: number,
    now: number,
  ): number {
    const lastUsed = state.cooldowns[cooldownKey(actorKey, actionId)];
    if (lastUsed === undefined) return 0;
    return Math.max(0, lastUsed + cooldownSeconds - now);
  },

  lastUsed(state: WarState, actorKey: string, actionId: string): number | undefined {
    return state.cooldowns[cooldownKey(actorKey, actionId)];
  },

  /** Throws CooldownActiveError, or records `now` as the last use. */
  checkAndConsumeCooldown(
    state: WarState,
    actorKey: string,
    actionId: string,
    cooldownSeconds: number,
    now: number,
  ): WarState {
    const remaining = RateLimiter.cooldownRemaining(state, actorKey, actionId, cooldownSeconds, now);
    if (remaining > 0) {
      throw new CooldownActiveError(`${actionId} on cooldown for ${actorKey}`, remaining);
    }
    return produce(state, draft => {
      draft.cooldowns[cooldownKey(actorKey, actionId)] = now;
    });
  },

  /** Start a cooldown without checking, e.g. a penalty imposed on another actor. */
  startCooldown(state: WarState, actorKey: string, actionId: string, now: number): WarState {
    return produce(state, draft => {
      draft.cooldowns[cooldownKey(actorKey, actionId)] = now;
    });
  },
};
