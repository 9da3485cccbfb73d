// ─────────────────────────────────────────────
//  Territory Actions
// ─────────────────────────────────────────────

import type { WarAction, ActionContext } from '../WarAction';
import type { WarState } from '../WarState';
import { TerritoryLedger } from '../../systems/TerritoryLedger';

export class CaptureTerritoryAction implements WarAction {
  readonly type = 'CAPTURE_TERRITORY';
  readonly feature = 'territories';

  constructor(
    private readonly territoryId: number,
    private readonly colonyId: string,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return TerritoryLedger.captureTerritory(state, ctx, this.territoryId, this.colonyId);
  }
}

export class PayMaintenanceAction implements WarAction {
  readonly type = 'PAY_MAINTENANCE';
  readonly feature = 'territories';

  constructor(private readonly territoryId: number) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return TerritoryLedger.payMaintenance(state, ctx, this.territoryId);
  }
}

export class RepairDamageAction implements WarAction {
  readonly type = 'REPAIR_DAMAGE';
  readonly feature = 'territories';

  constructor(private readonly territoryId: number) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return TerritoryLedger.repairDamage(state, ctx, this.territoryId);
  }
}

export class FortifyTerritoryAction implements WarAction {
  readonly type = 'FORTIFY_TERRITORY';
  readonly feature = 'territories';

  constructor(
    private readonly territoryId: number,
    private readonly amount: number,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return TerritoryLedger.fortifyTerritory(state, ctx, this.territoryId, this.amount);
  }
}

export class AbandonTerritoryAction implements WarAction {
  readonly type = 'ABANDON_TERRITORY';
  readonly feature = 'territories';

  constructor(private readonly territoryId: number) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return TerritoryLedger.abandonTerritory(state, ctx, this.territoryId);
  }
}

export class RaidScoutAction implements WarAction {
  readonly type = 'RAID_SCOUT';
  readonly feature = 'raids';

  constructor(
    private readonly territoryId: number,
    private readonly raiderColony: string,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return TerritoryLedger.raidScout(state, ctx, this.territoryId, this.raiderColony);
  }
}
