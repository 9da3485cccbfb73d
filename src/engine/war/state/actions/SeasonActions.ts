// ─────────────────────────────────────────────
//  Season Actions
// ─────────────────────────────────────────────

import type { WarAction, ActionContext } from '../WarAction';
import type { WarState } from '../WarState';
import { SeasonManager } from '../../systems/SeasonManager';
import { requireAdmin } from '../../systems/WarAdmin';

export class StartSeasonAction implements WarAction {
  readonly type = 'START_SEASON';
  readonly feature = 'seasons';

  execute(state: WarState, ctx: ActionContext): WarState {
    requireAdmin(state, ctx.caller);
    return SeasonManager.startSeason(state, ctx);
  }
}

export class RegisterColonyAction implements WarAction {
  readonly type = 'REGISTER_COLONY';
  readonly feature = 'seasons';

  constructor(
    private readonly colonyId: string,
    private readonly seasonId: number,
    private readonly stake: number,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return SeasonManager.registerColony(state, ctx, this.colonyId, this.seasonId, this.stake);
  }
}

export class PreRegisterAction implements WarAction {
  readonly type = 'PRE_REGISTER';
  readonly feature = 'pre_registration';

  constructor(
    private readonly colonyId: string,
    private readonly seasonId: number,
    private readonly stake: number,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return SeasonManager.preRegister(state, ctx, this.colonyId, this.seasonId, this.stake);
  }
}

export class CancelPreRegistrationAction implements WarAction {
  readonly type = 'CANCEL_PRE_REGISTRATION';
  readonly feature = 'pre_registration';

  constructor(
    private readonly seasonId: number,
    private readonly colonyId: string,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return SeasonManager.cancelPreRegistration(state, ctx, this.seasonId, this.colonyId);
  }
}

/** Anyone may push the backlog forward. */
export class ActivatePreRegistrationsAction implements WarAction {
  readonly type = 'ACTIVATE_PRE_REGISTRATIONS';
  readonly feature = 'pre_registration';

  constructor(
    private readonly seasonId: number,
    private readonly batchSize: number,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return SeasonManager.activatePreRegistrations(state, ctx, this.seasonId, this.batchSize).state;
  }
}

export class FinalizeSeasonAction implements WarAction {
  readonly type = 'FINALIZE_SEASON';
  readonly feature = 'seasons';

  constructor(private readonly seasonId: number) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return SeasonManager.finalizeSeason(state, ctx, this.seasonId);
  }
}

export class ClaimSeasonRewardAction implements WarAction {
  readonly type = 'CLAIM_SEASON_REWARD';
  readonly feature = 'seasons';

  constructor(
    private readonly seasonId: number,
    private readonly colonyId: string,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return SeasonManager.claimSeasonReward(state, ctx, this.seasonId, this.colonyId);
  }
}
