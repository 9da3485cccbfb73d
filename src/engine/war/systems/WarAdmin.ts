// ─────────────────────────────────────────────
//  War Admin: one-time setup, pause flags, administrator checks
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { WarState } from '../state/WarState';
import type { WarConfig, WarFeature } from '../data/types/Config';
import { CURRENT_STORAGE_VERSION } from '../state/WarState';
import { UnauthorizedError } from '../WarErrors';

export function requireAdmin(state: WarState, caller: string): void {
  if (state.admin === '' || state.admin !== caller) {
    throw new UnauthorizedError(`${caller} is not the war administrator`);
  }
}

export const WarAdmin = {
  /** Gated by storageVersion: running setup twice changes nothing. */
  initializeWar(state: WarState, admin: string, config: WarConfig): WarState {
    if (state.storageVersion > 0) return state;
    return produce(state, draft => {
      draft.storageVersion = CURRENT_STORAGE_VERSION;
      draft.admin = admin;
      draft.config = config;
      draft.fees = { ...config.fees };
    });
  },

  setFeaturePaused(state: WarState, feature: WarFeature, paused: boolean): WarState {
    if (state.paused[feature] === paused) return state;
    return produce(state, draft => {
      draft.paused[feature] = paused;
    });
  },

  transferAdmin(state: WarState, newAdmin: string): WarState {
    return produce(state, draft => {
      draft.admin = newAdmin;
    });
  },
};
