// ─────────────────────────────────────────────
//  Alliance Registry: membership, betrayal,
//  forgiveness voting and treaties.
//  Invariant: ownerIndex never maps two members to one wallet,
//  and an alliance with fewer than two members is inactive.
//  A colony only becomes a member when its owner accepts an
//  invitation; until then the alliance neither protects nor
//  binds it.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { WarState } from '../state/WarState';
import type { ActionContext } from '../state/WarAction';
import type { AllianceState, DiplomaticTreaty, TreatyKind, TreatyStatus } from '../data/types/Alliance';
import { MAX_STABILITY } from '../data/types/Alliance';
import { WarStateQuery } from '../state/WarState';
import { ownerOf, requireColonyOwner } from './ColonyRegistry';
import { RateLimiter } from './RateLimiter';
import { FeeLedger } from './FeeLedger';
import { MathUtils } from '@/engine/utils/MathUtils';
import {
  CapacityExceededError, ConfigurationError, CooldownActiveError, InvalidStateTransitionError,
  NotFoundError, OwnershipConflictError, UnauthorizedError,
} from '../WarErrors';

export const MIN_ALLIANCE_MEMBERS = 2;
const BETRAYAL_ACTION = 'betrayal';

export interface BetrayalCheck {
  state: WarState;
  betrayal: boolean;
  allianceId: string | null;
}

export function requireAlliance(state: WarState, allianceId: string): AllianceState {
  const alliance = state.alliances[allianceId];
  if (!alliance) throw new NotFoundError(`unknown alliance ${allianceId}`);
  return alliance;
}

function requireActiveAlliance(state: WarState, allianceId: string): AllianceState {
  const alliance = requireAlliance(state, allianceId);
  if (!alliance.active) throw new InvalidStateTransitionError(`alliance ${allianceId} is inactive`);
  return alliance;
}

/** Active, or still forming around its leader. Dissolved alliances keep no colony mappings. */
function requireOpenAlliance(state: WarState, allianceId: string): AllianceState {
  const alliance = requireAlliance(state, allianceId);
  if (state.allianceOfColony[alliance.leaderColony] !== allianceId) {
    throw new InvalidStateTransitionError(`alliance ${allianceId} is dissolved`);
  }
  return alliance;
}

/** Caller must control the alliance's leader colony. */
function requireLeader(ctx: ActionContext, alliance: AllianceState): void {
  if (ctx.ports.custody.ownerOfColony(alliance.leaderColony) !== ctx.caller) {
    throw new UnauthorizedError(`${ctx.caller} does not lead alliance ${alliance.id}`);
  }
}

/** Caller must control `colonyId` and it must be a current member. */
function requireMember(ctx: ActionContext, alliance: AllianceState, colonyId: string): void {
  requireColonyOwner(ctx, colonyId);
  if (!alliance.members.includes(colonyId)) {
    throw new InvalidStateTransitionError(`colony ${colonyId} is not a member of ${alliance.id}`);
  }
}

export function betrayalCooldownRemaining(state: WarState, colonyId: string, now: number): number {
  return RateLimiter.cooldownRemaining(state, colonyId, BETRAYAL_ACTION, state.config.alliance.betrayalCooldown, now);
}

function assertBetrayalCooldown(state: WarState, colonyId: string, now: number): void {
  const remaining = betrayalCooldownRemaining(state, colonyId, now);
  if (remaining > 0) {
    throw new CooldownActiveError(`colony ${colonyId} is serving a betrayal cooldown`, remaining);
  }
}

/** Eligibility of a colony that is about to join an alliance whose members' owners are `takenOwners`. */
function assertCanJoin(state: WarState, ctx: ActionContext, colonyId: string, takenOwners: Record<string, string>): string {
  const owner = ownerOf(ctx, colonyId);
  const current = WarStateQuery.allianceOf(state, colonyId);
  if (current) {
    throw new OwnershipConflictError(`colony ${colonyId} already belongs to ${current.id}`);
  }
  const sibling = takenOwners[owner];
  if (sibling !== undefined) {
    throw new OwnershipConflictError(
      `owner ${owner} is already represented by colony ${sibling}`,
      { owner, colonyId, sibling },
    );
  }
  assertBetrayalCooldown(state, colonyId, ctx.now);
  return owner;
}

function removeMemberInternal(state: WarState, ctx: ActionContext, allianceId: string, colonyId: string): WarState {
  return produce(state, draft => {
    const alliance = draft.alliances[allianceId];
    if (!alliance) return;
    const idx = alliance.members.indexOf(colonyId);
    if (idx === -1) return;
    const wallet = alliance.memberWallets[idx];
    alliance.members.splice(idx, 1);
    alliance.memberWallets.splice(idx, 1);
    if (wallet !== undefined) delete alliance.ownerIndex[wallet];
    delete draft.allianceOfColony[colonyId];

    const [nextLeader] = alliance.members;
    if (alliance.leaderColony === colonyId && nextLeader !== undefined) {
      alliance.leaderColony = nextLeader;
    }
    ctx.effects.emit('allianceMemberRemoved', { allianceId, colonyId });

    if (alliance.members.length < MIN_ALLIANCE_MEMBERS) {
      const wasActive = alliance.active;
      alliance.active = false;
      alliance.invitations = {};
      for (const member of alliance.members) delete draft.allianceOfColony[member];
      if (wasActive) ctx.effects.emit('allianceDeactivated', { allianceId });
      ctx.effects.log(`Alliance ${alliance.name} dissolved`, 'alliance');
    }
  });
}

export function treatyStatus(treaty: DiplomaticTreaty, now: number): TreatyStatus {
  if (treaty.broken) return 'broken';
  if (treaty.acceptedAt === null) return now < treaty.proposalExpiresAt ? 'proposed' : 'expired';
  return treaty.expiresAt !== null && now < treaty.expiresAt ? 'active' : 'expired';
}

function betweenPair(treaty: DiplomaticTreaty, a: string, b: string): boolean {
  return (treaty.fromAlliance === a && treaty.toAlliance === b)
    || (treaty.fromAlliance === b && treaty.toAlliance === a);
}

export const AllianceRegistry = {
  formAlliance(
    state: WarState,
    ctx: ActionContext,
    allianceId: string,
    name: string,
    leaderColony: string,
    initialMembers: string[],
  ): WarState {
    if (state.alliances[allianceId]) {
      throw new OwnershipConflictError(`alliance ${allianceId} already exists`);
    }
    const leaderOwner = requireColonyOwner(ctx, leaderColony);
    const members = [leaderColony, ...initialMembers];
    if (new Set(members).size !== members.length) {
      throw new OwnershipConflictError('a colony is listed twice', { members });
    }
    if (members.length < MIN_ALLIANCE_MEMBERS) {
      throw new ConfigurationError(`an alliance needs at least ${MIN_ALLIANCE_MEMBERS} members`);
    }
    const max = state.config.alliance.maxMembers;
    if (members.length > max) {
      throw new CapacityExceededError(`an alliance holds at most ${max} members`, { size: members.length });
    }

    const roster: Record<string, string> = {};
    for (const colonyId of members) {
      const owner = assertCanJoin(state, ctx, colonyId, roster);
      roster[owner] = colonyId;
    }

    const { state: charged } = FeeLedger.applyOperationFee(state, 'alliance', 1, ctx.caller, ctx.effects);
    ctx.effects.emit('allianceFormed', { allianceId, leader: leaderColony, invited: [...initialMembers] });
    for (const colonyId of initialMembers) ctx.effects.emit('allianceInvited', { allianceId, colonyId });
    ctx.effects.log(`Alliance ${name} formed by ${leaderColony}, ${initialMembers.length} invited`, 'alliance');

    return produce(charged, draft => {
      draft.alliances[allianceId] = {
        id: allianceId,
        name,
        leaderColony,
        members: [leaderColony],
        memberWallets: [leaderOwner],
        ownerIndex: { [leaderOwner]: leaderColony },
        invitations: Object.fromEntries(initialMembers.map(colonyId => [colonyId, ctx.now])),
        treasury: 0,
        stability: MAX_STABILITY,
        active: false,
        betrayalCount: 0,
        lastBetrayalAt: 0,
        betrayers: {},
        createdAt: ctx.now,
      };
      draft.allianceOfColony[leaderColony] = allianceId;
      draft.nextAllianceId += 1;
    });
  },

  /** Leader invites a colony; it joins only when its owner accepts. */
  addMember(state: WarState, ctx: ActionContext, allianceId: string, colonyId: string): WarState {
    const alliance = requireOpenAlliance(state, allianceId);
    requireLeader(ctx, alliance);
    if (alliance.members.includes(colonyId)) {
      throw new OwnershipConflictError(`colony ${colonyId} is already a member`);
    }
    if (alliance.invitations[colonyId] !== undefined) {
      throw new InvalidStateTransitionError(`colony ${colonyId} is already invited to ${allianceId}`);
    }
    const seats = alliance.members.length + Object.keys(alliance.invitations).length;
    if (seats >= state.config.alliance.maxMembers) {
      throw new CapacityExceededError(`alliance ${allianceId} is full`, { seats });
    }
    assertCanJoin(state, ctx, colonyId, alliance.ownerIndex);

    ctx.effects.emit('allianceInvited', { allianceId, colonyId });
    return produce(state, draft => {
      const a = draft.alliances[allianceId];
      if (a) a.invitations[colonyId] = ctx.now;
    });
  },

  /** The invited colony's owner joins; the second member activates a forming alliance. */
  acceptInvitation(state: WarState, ctx: ActionContext, allianceId: string, colonyId: string): WarState {
    const alliance = requireOpenAlliance(state, allianceId);
    requireColonyOwner(ctx, colonyId);
    if (alliance.invitations[colonyId] === undefined) {
      throw new NotFoundError(`colony ${colonyId} has no invitation to ${allianceId}`);
    }
    if (alliance.members.length >= state.config.alliance.maxMembers) {
      throw new CapacityExceededError(`alliance ${allianceId} is full`);
    }
    const owner = assertCanJoin(state, ctx, colonyId, alliance.ownerIndex);
    const activates = !alliance.active && alliance.members.length + 1 >= MIN_ALLIANCE_MEMBERS;

    ctx.effects.emit('allianceMemberAdded', { allianceId, colonyId });
    if (activates) {
      ctx.effects.emit('allianceActivated', { allianceId, members: [...alliance.members, colonyId] });
      ctx.effects.log(`Alliance ${alliance.name} is active`, 'alliance');
    }
    return produce(state, draft => {
      const a = draft.alliances[allianceId];
      if (!a) return;
      a.members.push(colonyId);
      a.memberWallets.push(owner);
      a.ownerIndex[owner] = colonyId;
      delete a.invitations[colonyId];
      if (activates) a.active = true;
      draft.allianceOfColony[colonyId] = allianceId;
    });
  },

  /** The invitee turns an invitation down, or the leader withdraws it. */
  declineInvitation(state: WarState, ctx: ActionContext, allianceId: string, colonyId: string): WarState {
    const alliance = requireOpenAlliance(state, allianceId);
    if (alliance.invitations[colonyId] === undefined) {
      throw new NotFoundError(`colony ${colonyId} has no invitation to ${allianceId}`);
    }
    const isLeader = ctx.ports.custody.ownerOfColony(alliance.leaderColony) === ctx.caller;
    const isInvitee = ctx.ports.custody.ownerOfColony(colonyId) === ctx.caller;
    if (!isLeader && !isInvitee) {
      throw new UnauthorizedError(`${ctx.caller} cannot decline the invitation of ${colonyId}`);
    }

    ctx.effects.emit('allianceInvitationDeclined', { allianceId, colonyId });
    return produce(state, draft => {
      const a = draft.alliances[allianceId];
      if (a) delete a.invitations[colonyId];
    });
  },

  /** Leader removes a member, or a member leaves. */
  removeMember(state: WarState, ctx: ActionContext, allianceId: string, colonyId: string): WarState {
    const alliance = requireOpenAlliance(state, allianceId);
    if (!alliance.members.includes(colonyId)) {
      throw new NotFoundError(`colony ${colonyId} is not a member of ${allianceId}`);
    }
    const isLeader = ctx.ports.custody.ownerOfColony(alliance.leaderColony) === ctx.caller;
    const isSelf = ctx.ports.custody.ownerOfColony(colonyId) === ctx.caller;
    if (!isLeader && !isSelf) {
      throw new UnauthorizedError(`${ctx.caller} cannot remove ${colonyId} from ${allianceId}`);
    }
    return removeMemberInternal(state, ctx, allianceId, colonyId);
  },

  /**
   * Betrayal needs all of: attacker in an alliance, target's owner in that
   * alliance, distinct colonies, and a protected target (owner's primary
   * colony, or registered by its owner in the current season).
   */
  validateAndProcessBetrayal(state: WarState, ctx: ActionContext, attackerColony: string, targetColony: string): BetrayalCheck {
    const alliance = WarStateQuery.allianceOf(state, attackerColony);
    if (!alliance || !alliance.active) return { state, betrayal: false, allianceId: null };
    if (attackerColony === targetColony) return { state, betrayal: false, allianceId: alliance.id };

    const targetOwner = ctx.ports.custody.ownerOfColony(targetColony);
    if (targetOwner === null || alliance.ownerIndex[targetOwner] === undefined) {
      return { state, betrayal: false, allianceId: alliance.id };
    }

    const isPrimary = state.wallets[targetOwner]?.primaryColony === targetColony;
    const seasonColonies = WarStateQuery.seasonColoniesOf(state, state.currentSeasonId, targetOwner);
    if (!isPrimary && !seasonColonies.includes(targetColony)) {
      return { state, betrayal: false, allianceId: alliance.id };
    }

    const stability = Math.max(0, alliance.stability - state.config.alliance.betrayalStabilityPenalty);
    let next = produce(state, draft => {
      const a = draft.alliances[alliance.id];
      if (a) {
        a.betrayers[attackerColony] = ctx.now;
        a.betrayalCount += 1;
        a.lastBetrayalAt = ctx.now;
        a.stability = stability;
      }
      const profile = draft.colonies[attackerColony];
      if (profile) profile.reputation = 'traitor';
    });
    next = removeMemberInternal(next, ctx, alliance.id, attackerColony);
    next = RateLimiter.startCooldown(next, attackerColony, BETRAYAL_ACTION, ctx.now);

    ctx.effects.emit('betrayalRecorded', { allianceId: alliance.id, betrayer: attackerColony, target: targetColony, stability });
    ctx.effects.log(`${attackerColony} betrayed ${targetColony} in ${alliance.name}`, 'alliance');
    return { state: next, betrayal: true, allianceId: alliance.id };
  },

  proposeForgiveness(
    state: WarState,
    ctx: ActionContext,
    allianceId: string,
    betrayerColony: string,
    proposerColony: string,
  ): WarState {
    const alliance = requireActiveAlliance(state, allianceId);
    requireMember(ctx, alliance, proposerColony);
    if (alliance.betrayers[betrayerColony] === undefined) {
      throw new InvalidStateTransitionError(`colony ${betrayerColony} carries no betrayal mark in ${allianceId}`);
    }
    const open = Object.values(state.forgivenessProposals).some(p =>
      p.allianceId === allianceId && p.betrayerColony === betrayerColony && !p.executed && ctx.now < p.expiresAt,
    );
    if (open) {
      throw new InvalidStateTransitionError(`a forgiveness vote for ${betrayerColony} is already open`);
    }

    const proposalId = state.nextProposalId;
    ctx.effects.emit('forgivenessProposed', { proposalId, allianceId, betrayer: betrayerColony });
    return produce(state, draft => {
      draft.forgivenessProposals[proposalId] = {
        id: proposalId,
        allianceId,
        betrayerColony,
        proposer: proposerColony,
        createdAt: ctx.now,
        expiresAt: ctx.now + state.config.alliance.forgivenessVotingPeriod,
        votesFor: 1,
        votesAgainst: 0,
        voters: { [proposerColony]: true },
        executed: false,
      };
      draft.nextProposalId += 1;
    });
  },

  voteForgiveness(state: WarState, ctx: ActionContext, proposalId: number, voterColony: string, support: boolean): WarState {
    const proposal = state.forgivenessProposals[proposalId];
    if (!proposal) throw new NotFoundError(`unknown forgiveness proposal ${proposalId}`);
    if (proposal.executed) throw new InvalidStateTransitionError(`proposal ${proposalId} already executed`);
    if (ctx.now >= proposal.expiresAt) throw new InvalidStateTransitionError(`proposal ${proposalId} has expired`);
    const alliance = requireActiveAlliance(state, proposal.allianceId);
    requireMember(ctx, alliance, voterColony);
    if (proposal.voters[voterColony] !== undefined) {
      throw new InvalidStateTransitionError(`colony ${voterColony} already voted on ${proposalId}`);
    }

    return produce(state, draft => {
      const p = draft.forgivenessProposals[proposalId];
      if (!p) return;
      p.voters[voterColony] = support;
      if (support) p.votesFor += 1;
      else p.votesAgainst += 1;
    });
  },

  /** Passes on a strict majority of current members' supporting votes. */
  executeForgiveness(state: WarState, ctx: ActionContext, proposalId: number): WarState {
    const proposal = state.forgivenessProposals[proposalId];
    if (!proposal) throw new NotFoundError(`unknown forgiveness proposal ${proposalId}`);
    if (proposal.executed) throw new InvalidStateTransitionError(`proposal ${proposalId} already executed`);
    if (ctx.now >= proposal.expiresAt) throw new InvalidStateTransitionError(`proposal ${proposalId} has expired`);
    const alliance = requireAlliance(state, proposal.allianceId);

    const support = Object.entries(proposal.voters)
      .filter(([colonyId, inFavor]) => inFavor && alliance.members.includes(colonyId))
      .length;
    if (support * 2 <= alliance.members.length) {
      throw new InvalidStateTransitionError(
        `proposal ${proposalId} has ${support} of ${alliance.members.length} votes`,
        { support, members: alliance.members.length },
      );
    }

    const stability = Math.min(MAX_STABILITY, alliance.stability + state.config.alliance.forgivenessStabilityRecovery);
    ctx.effects.emit('forgivenessExecuted', { proposalId, allianceId: alliance.id, betrayer: proposal.betrayerColony, stability });
    return produce(state, draft => {
      const p = draft.forgivenessProposals[proposalId];
      if (p) p.executed = true;
      const a = draft.alliances[alliance.id];
      if (a) {
        delete a.betrayers[proposal.betrayerColony];
        a.stability = stability;
      }
      const profile = draft.colonies[proposal.betrayerColony];
      if (profile && profile.reputation === 'traitor') profile.reputation = 'notorious';
    });
  },

  proposeTreaty(
    state: WarState,
    ctx: ActionContext,
    fromAlliance: string,
    toAlliance: string,
    kind: TreatyKind,
    duration: number,
  ): WarState {
    if (fromAlliance === toAlliance) {
      throw new ConfigurationError('an alliance cannot sign a treaty with itself');
    }
    if (!MathUtils.isPositiveInt(duration)) {
      throw new ConfigurationError('treaty duration must be a positive integer', { duration });
    }
    const from = requireActiveAlliance(state, fromAlliance);
    requireActiveAlliance(state, toAlliance);
    requireLeader(ctx, from);
    const pending = Object.values(state.treaties).some(t =>
      t.kind === kind && betweenPair(t, fromAlliance, toAlliance)
      && ['proposed', 'active'].includes(treatyStatus(t, ctx.now)),
    );
    if (pending) {
      throw new InvalidStateTransitionError(`a ${kind} treaty between ${fromAlliance} and ${toAlliance} is already open`);
    }

    const treatyId = state.nextTreatyId;
    ctx.effects.emit('treatyProposed', { treatyId, fromAlliance, toAlliance, kind });
    return produce(state, draft => {
      draft.treaties[treatyId] = {
        id: treatyId,
        fromAlliance,
        toAlliance,
        kind,
        proposedAt: ctx.now,
        proposalExpiresAt: ctx.now + state.config.alliance.treatyProposalTtl,
        duration,
        acceptedAt: null,
        expiresAt: null,
        broken: false,
        brokenAt: null,
        brokenBy: null,
      };
      draft.nextTreatyId += 1;
    });
  },

  acceptTreaty(state: WarState, ctx: ActionContext, treatyId: number): WarState {
    const treaty = state.treaties[treatyId];
    if (!treaty) throw new NotFoundError(`unknown treaty ${treatyId}`);
    const status = treatyStatus(treaty, ctx.now);
    if (status !== 'proposed') {
      throw new InvalidStateTransitionError(`treaty ${treatyId} is ${status}`);
    }
    requireLeader(ctx, requireActiveAlliance(state, treaty.toAlliance));

    ctx.effects.emit('treatyAccepted', { treatyId });
    return produce(state, draft => {
      const t = draft.treaties[treatyId];
      if (!t) return;
      t.acceptedAt = ctx.now;
      t.expiresAt = ctx.now + t.duration;
    });
  },

  /** Breaks every active treaty between the two alliances; the aggressor loses stability. */
  recordHostileAct(state: WarState, ctx: ActionContext, aggressorAlliance: string, victimAlliance: string): WarState {
    const broken = Object.values(state.treaties)
      .filter(t => betweenPair(t, aggressorAlliance, victimAlliance) && treatyStatus(t, ctx.now) === 'active')
      .map(t => t.id);
    if (broken.length === 0) return state;

    for (const treatyId of broken) {
      ctx.effects.emit('treatyBroken', { treatyId, brokenBy: aggressorAlliance });
    }
    const penalty = state.config.alliance.treatyBreachStabilityPenalty;
    return produce(state, draft => {
      for (const treatyId of broken) {
        const t = draft.treaties[treatyId];
        if (!t) continue;
        t.broken = true;
        t.brokenAt = ctx.now;
        t.brokenBy = aggressorAlliance;
      }
      const aggressor = draft.alliances[aggressorAlliance];
      if (aggressor) aggressor.stability = Math.max(0, aggressor.stability - penalty);
    });
  },

  contributeToTreasury(state: WarState, ctx: ActionContext, allianceId: string, colonyId: string, amount: number): WarState {
    if (!MathUtils.isPositiveInt(amount)) {
      throw new ConfigurationError('contribution must be a positive integer', { amount });
    }
    const alliance = requireActiveAlliance(state, allianceId);
    requireMember(ctx, alliance, colonyId);

    ctx.effects.transfer(state.config.currency, ctx.caller, state.config.treasuryAccount, amount);
    ctx.effects.log(`${colonyId} contributed ${amount} to ${alliance.name}`, 'economy');
    return produce(state, draft => {
      const a = draft.alliances[allianceId];
      if (a) a.treasury += amount;
    });
  },
};
