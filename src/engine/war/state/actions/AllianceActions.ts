// ─────────────────────────────────────────────
//  Alliance Actions: membership and invitations,
//  forgiveness, treaties
// ─────────────────────────────────────────────

import type { WarAction, ActionContext } from '../WarAction';
import type { WarState } from '../WarState';
import type { TreatyKind } from '../../data/types/Alliance';
import { AllianceRegistry } from '../../systems/AllianceRegistry';

export class FormAllianceAction implements WarAction {
  readonly type = 'FORM_ALLIANCE';
  readonly feature = 'alliances';

  constructor(
    private readonly allianceId: string,
    private readonly name: string,
    private readonly leaderColony: string,
    private readonly initialMembers: string[],
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return AllianceRegistry.formAlliance(state, ctx, this.allianceId, this.name, this.leaderColony, this.initialMembers);
  }
}

export class InviteAllianceMemberAction implements WarAction {
  readonly type = 'INVITE_ALLIANCE_MEMBER';
  readonly feature = 'alliances';

  constructor(
    private readonly allianceId: string,
    private readonly colonyId: string,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return AllianceRegistry.addMember(state, ctx, this.allianceId, this.colonyId);
  }
}

export class AcceptAllianceInvitationAction implements WarAction {
  readonly type = 'ACCEPT_ALLIANCE_INVITATION';
  readonly feature = 'alliances';

  constructor(
    private readonly allianceId: string,
    private readonly colonyId: string,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return AllianceRegistry.acceptInvitation(state, ctx, this.allianceId, this.colonyId);
  }
}

export class DeclineAllianceInvitationAction implements WarAction {
  readonly type = 'DECLINE_ALLIANCE_INVITATION';
  readonly feature = 'alliances';

  constructor(
    private readonly allianceId: string,
    private readonly colonyId: string,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return AllianceRegistry.declineInvitation(state, ctx, this.allianceId, this.colonyId);
  }
}

export class RemoveAllianceMemberAction implements WarAction {
  readonly type = 'REMOVE_ALLIANCE_MEMBER';
  readonly feature = 'alliances';

  constructor(
    private readonly allianceId: string,
    private readonly colonyId: string,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return AllianceRegistry.removeMember(state, ctx, this.allianceId, this.colonyId);
  }
}

export class ProposeForgivenessAction implements WarAction {
  readonly type = 'PROPOSE_FORGIVENESS';
  readonly feature = 'alliances';

  constructor(
    private readonly allianceId: string,
    private readonly betrayerColony: string,
    private readonly proposerColony: string,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return AllianceRegistry.proposeForgiveness(state, ctx, this.allianceId, this.betrayerColony, this.proposerColony);
  }
}

export class VoteForgivenessAction implements WarAction {
  readonly type = 'VOTE_FORGIVENESS';
  readonly feature = 'alliances';

  constructor(
    private readonly proposalId: number,
    private readonly voterColony: string,
    private readonly support: boolean,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return AllianceRegistry.voteForgiveness(state, ctx, this.proposalId, this.voterColony, this.support);
  }
}

export class ExecuteForgivenessAction implements WarAction {
  readonly type = 'EXECUTE_FORGIVENESS';
  readonly feature = 'alliances';

  constructor(private readonly proposalId: number) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return AllianceRegistry.executeForgiveness(state, ctx, this.proposalId);
  }
}

export class ProposeTreatyAction implements WarAction {
  readonly type = 'PROPOSE_TREATY';
  readonly feature = 'treaties';

  constructor(
    private readonly fromAlliance: string,
    private readonly toAlliance: string,
    private readonly kind: TreatyKind,
    private readonly duration: number,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return AllianceRegistry.proposeTreaty(state, ctx, this.fromAlliance, this.toAlliance, this.kind, this.duration);
  }
}

export class AcceptTreatyAction implements WarAction {
  readonly type = 'ACCEPT_TREATY';
  readonly feature = 'treaties';

  constructor(private readonly treatyId: number) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return AllianceRegistry.acceptTreaty(state, ctx, this.treatyId);
  }
}

export class ContributeToTreasuryAction implements WarAction {
  readonly type = 'CONTRIBUTE_TO_TREASURY';
  readonly feature = 'alliances';

  constructor(
    private readonly allianceId: string,
    private readonly colonyId: string,
    private readonly amount: number,
  ) {}

  execute(state: WarState, ctx: ActionContext): WarState {
    return AllianceRegistry.contributeToTreasury(state, ctx, this.allianceId, this.colonyId, this.amount);
  }
}
