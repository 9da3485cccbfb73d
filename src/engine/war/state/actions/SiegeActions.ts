// ─────────────────────────────────────────────
//  Siege Actions
// ─────────────────────────────────────────────

import type { WarAction, ActionContext } from '../WarAction';
import type { WarState } from '../WarState';
import { SiegeEngine } from '../../systems/SiegeEngine';
import { requireColonyOwner } from '../../systems/ColonyRegistry';

export class DeclareSiegeAction implements WarAction {
  readonly type = 'DECLARE_SIEGE';
  readonly feature = 'sieges';

  constructor(
    private readonly territoryId: number,
    private readonly attackerColony: string,
    private readonly attackerTokens: string[],
    private readonly stake: number,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    const wallet = requireColonyOwner(ctx, this.attackerColony);
    return SiegeEngine.declareSiege(state, ctx, {
      territoryId: this.territoryId,
      attackerColony: this.attackerColony,
      forces: [{ colonyId: this.attackerColony, tokenIds: this.attackerTokens, wallet, stake: this.stake }],
    }).state;
  }
}

export class DefendSiegeAction implements WarAction {
  readonly type = 'DEFEND_SIEGE';
  readonly feature = 'sieges';

  constructor(
    private readonly siegeId: number,
    private readonly defenderTokens: string[],
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return SiegeEngine.defend(state, ctx, this.siegeId, this.defenderTokens);
  }
}

/** Permissionless, so an abandoned siege still converges. */
export class ResolveSiegeAction implements WarAction {
  readonly type = 'RESOLVE_SIEGE';

  constructor(private readonly siegeId: number) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return SiegeEngine.resolveSiege(state, ctx, this.siegeId);
  }
}
