// ─────────────────────────────────────────────
//  War Store: war layer state management
//  immer produce + dispatch + bounded history.
//  One dispatch is one atomic unit of work: a throwing action
//  leaves the committed state and the bank untouched.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import { produce } from 'immer';
import type { WarState } from './WarState';
import type { WarAction, ActionContext } from './WarAction';
import type { WarPorts } from '../ports/WarPorts';
import { createEmptyWarState } from './WarState';
import { EffectQueue } from './EffectQueue';
import { ConfigurationError, NotInitializedError, WarError } from '../WarErrors';

type StoreListener = (state: WarState) => void;

/** Unix seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

const MAX_HISTORY = 100;

export class WarStore {
  private state: WarState;
  private listeners: StoreListener[] = [];

  constructor(
    private readonly ports: WarPorts,
    private readonly clock: Clock = systemClock,
    initial: WarState = createEmptyWarState(),
  ) {
    this.state = initial;
  }

  getState(): WarState {
    return this.state;
  }

  now(): number {
    return this.clock();
  }

  dispatch(action: WarAction, caller: string): WarState {
    if (this.state.storageVersion === 0 && !action.allowUninitialized) {
      throw new NotInitializedError(`${action.type} rejected: war state has not been initialized`);
    }
    if (action.feature && this.state.paused[action.feature]) {
      throw new ConfigurationError(`feature '${action.feature}' is paused`, { action: action.type });
    }

    const effects = new EffectQueue(this.ports.bank);
    const ctx: ActionContext = { now: this.clock(), caller, ports: this.ports, effects };

    let nextState: WarState;
    try {
      nextState = action.execute(this.state, ctx);
    } catch (err) {
      if (err instanceof WarError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new WarError('EXECUTION_ERROR', `${action.type} failed: ${message}`, { cause: err });
    }

    if (nextState !== this.state) {
      const previous = this.state;
      this.state = produce(nextState, (draft: Draft<WarState>) => {
        draft.stateHistory.push(stripHistory(previous));
        if (draft.stateHistory.length > MAX_HISTORY) {
          draft.stateHistory.shift();
        }
      });
    }

    effects.flush();
    this.notify();
    return this.state;
  }

  /** Direct state mutation for administrative tooling and tests. */
  apply(recipe: (draft: Draft<WarState>) => void): void {
    this.state = produce(this.state, recipe);
    this.notify();
  }

  /** Replace the whole state, e.g. after loading a save slot. History is dropped. */
  load(state: WarState): void {
    this.state = produce(state, draft => {
      draft.stateHistory = [];
    });
    this.notify();
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private notify(): void {
    for (const listener of this.listeners) listener(this.state);
  }
}

function stripHistory(state: WarState): WarState {
  if (state.stateHistory.length === 0) return state;
  return { ...state, stateHistory: [] };
}
