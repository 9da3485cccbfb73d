// ─────────────────────────────────────────────
//  Task Force Actions: colony task forces and coordinated attacks
// ─────────────────────────────────────────────

import type { WarAction, ActionContext } from '../WarAction';
import type { WarState } from '../WarState';
import type { ParticipantCommitment } from '../../systems/CoordinatedAttackCoordinator';
import { TaskForceSystem } from '../../systems/TaskForceSystem';
import { CoordinatedAttackCoordinator } from '../../systems/CoordinatedAttackCoordinator';
import { ConfigurationError } from '../../WarErrors';

export class FormTaskForceAction implements WarAction {
  readonly type = 'FORM_TASK_FORCE';
  readonly feature = 'sieges';

  constructor(
    private readonly taskForceId: string,
    private readonly colonyId: string,
    private readonly name: string,
    private readonly tokenIds: string[],
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return TaskForceSystem.formTaskForce(state, ctx, this.taskForceId, this.colonyId, this.name, this.tokenIds);
  }
}

export class DisbandTaskForceAction implements WarAction {
  readonly type = 'DISBAND_TASK_FORCE';

  constructor(private readonly taskForceId: string) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return TaskForceSystem.disbandTaskForce(state, ctx, this.taskForceId);
  }
}

export class FormAllianceTaskForceAction implements WarAction {
  readonly type = 'FORM_ALLIANCE_TASK_FORCE';
  readonly feature = 'coordinated_attacks';

  constructor(
    private readonly taskForceId: string,
    private readonly allianceId: string,
    private readonly name: string,
    private readonly commitments: ParticipantCommitment[],
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return CoordinatedAttackCoordinator.formAllianceTaskForce(
      state, ctx, this.taskForceId, this.allianceId, this.name, this.commitments,
    );
  }
}

export class LaunchCoordinatedAttackAction implements WarAction {
  readonly type = 'LAUNCH_COORDINATED_ATTACK';
  readonly feature = 'coordinated_attacks';

  constructor(
    private readonly taskForceId: string,
    private readonly territoryId: number,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    if (state.paused.sieges) {
      throw new ConfigurationError("feature 'sieges' is paused", { action: this.type });
    }
    return CoordinatedAttackCoordinator.launchCoordinatedAttack(state, ctx, this.taskForceId, this.territoryId).state;
  }
}
