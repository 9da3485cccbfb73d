// ─────────────────────────────────────────────
//  War Action: Command pattern for the war layer
//  Failures throw a WarError; execute() never returns
//  a partially applied state.
// ─────────────────────────────────────────────

import type { WarState } from './WarState';
import type { EffectQueue } from './EffectQueue';
import type { WarPorts } from '../ports/WarPorts';
import type { WarFeature } from '../data/types/Config';

export interface ActionContext {
  readonly now: number;
  readonly caller: string;
  readonly ports: WarPorts;
  readonly effects: EffectQueue;
}

export interface WarAction {
  readonly type: string;
  /** Feature whose pause flag gates this action. */
  readonly feature?: WarFeature;
  /** Setup actions run before storageVersion is set. */
  readonly allowUninitialized?: boolean;
  execute(state: WarState, ctx: ActionContext): WarState;
}
