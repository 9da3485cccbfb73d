// ─────────────────────────────────────────────
//  Admin Actions: setup, pause flags, fee table, overrides
// ─────────────────────────────────────────────

import type { WarAction, ActionContext } from '../WarAction';
import type { WarState } from '../WarState';
import type { WarConfig, WarFeature } from '../../data/types/Config';
import type { OperationFee, OperationName } from '../../data/types/Fee';
import { WarAdmin, requireAdmin } from '../../systems/WarAdmin';
import { FeeLedger } from '../../systems/FeeLedger';
import { SiegeEngine } from '../../systems/SiegeEngine';
import { validateWarConfig } from '@/engine/loader/WarConfigLoader';

export class InitializeWarAction implements WarAction {
  readonly type = 'INITIALIZE_WAR';
  readonly allowUninitialized = true;

  constructor(private readonly config: WarConfig) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    if (state.storageVersion > 0) return state;
    validateWarConfig(this.config);
    ctx.effects.log(`War layer initialized by ${ctx.caller}`, 'system');
    return WarAdmin.initializeWar(state, ctx.caller, this.config);
  }
}

export class SetFeaturePausedAction implements WarAction {
  readonly type = 'SET_FEATURE_PAUSED';

  constructor(
    readonly feature: WarFeature,
    private readonly paused: boolean,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    requireAdmin(state, ctx.caller);
    ctx.effects.log(`${this.feature} ${this.paused ? 'paused' : 'resumed'}`, 'warning');
    return WarAdmin.setFeaturePaused(state, this.feature, this.paused);
  }
}

export class ConfigureOperationFeeAction implements WarAction {
  readonly type = 'CONFIGURE_OPERATION_FEE';

  constructor(
    private readonly name: OperationName,
    private readonly fee: OperationFee,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    requireAdmin(state, ctx.caller);
    return FeeLedger.configureOperationFee(state, this.name, this.fee);
  }
}

export class OverrideSiegeAction implements WarAction {
  readonly type = 'OVERRIDE_SIEGE';

  constructor(private readonly siegeId: number) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    requireAdmin(state, ctx.caller);
    ctx.effects.log(`Siege ${this.siegeId} overridden by ${ctx.caller}`, 'warning');
    return SiegeEngine.overrideSiege(state, this.siegeId);
  }
}

export class TransferAdminAction implements WarAction {
  readonly type = 'TRANSFER_ADMIN';

  constructor(private readonly newAdmin: string) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    requireAdmin(state, ctx.caller);
    return WarAdmin.transferAdmin(state, this.newAdmin);
  }
}
