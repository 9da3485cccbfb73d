// ─────────────────────────────────────────────
//  Colony Actions
// ─────────────────────────────────────────────

import type { WarAction, ActionContext } from '../WarAction';
import type { WarState } from '../WarState';
import { ColonyRegistry } from '../../systems/ColonyRegistry';

export class SetPrimaryColonyAction implements WarAction {
  readonly type = 'SET_PRIMARY_COLONY';

  constructor(private readonly colonyId: string) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return ColonyRegistry.setPrimaryColony(state, ctx, this.colonyId);
  }
}

export class DeregisterColonyAction implements WarAction {
  readonly type = 'DEREGISTER_COLONY';
  readonly feature = 'seasons';

  constructor(private readonly colonyId: string) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return ColonyRegistry.deregisterColony(state, ctx, this.colonyId);
  }
}
