import { describe, it, expect, beforeEach } from 'vitest';
import type { Harness } from './helpers';
import type { WarState } from '@/engine/war/state/WarState';
import type { WarEventMap } from '@/engine/war/WarEventBus';
import { WarEventBus } from '@/engine/war/WarEventBus';
import {
  CapacityExceededError, ConfigurationError, CooldownActiveError, InvalidStateTransitionError,
  NotFoundError, OwnershipConflictError, UnauthorizedError,
} from '@/engine/war/WarErrors';
import {
  ADMIN, DAY, TREASURY, addColony, balance, createHarness, joinAlliance, openSeason, toWarfare,
} from './helpers';

const PACT = 'alliance-1';

/** No wallet may be represented twice inside one alliance. */
function assertUniqueOwners(state: WarState): void {
  for (const alliance of Object.values(state.alliances)) {
    expect(new Set(alliance.memberWallets).size).toBe(alliance.members.length);
    expect(Object.keys(alliance.ownerIndex)).toHaveLength(alliance.members.length);
    if (alliance.active) expect(alliance.members.length).toBeGreaterThanOrEqual(2);
  }
}

describe('AllianceRegistry', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
    addColony(h, 'c-a', 'wallet-a', { a1: 1000 });
    addColony(h, 'c-b', 'wallet-b', { b1: 800 });
    addColony(h, 'c-c', 'wallet-c', { c1: 500 });
    addColony(h, 'c-e', 'wallet-e', { e1: 300 });
    addColony(h, 'c-f', 'wallet-f', { f1: 300 });
    openSeason(h);
    for (const id of ['a', 'b', 'c', 'e', 'f']) {
      h.war.registerColony(`wallet-${id}`, `c-${id}`, 1, 100);
    }
    h.war.captureTerritory('wallet-b', 1, 'c-b');
    h.war.captureTerritory('wallet-e', 2, 'c-e');
    h.war.formAlliance('wallet-a', 'Northern Pact', 'c-a', ['c-b', 'c-c']);
    joinAlliance(h, PACT, ['c-b', 'c-c']);
  });

  describe('formAlliance', () => {
    it('records members, their wallets and the fee', () => {
      const alliance = h.store.getState().alliances[PACT];
      expect(alliance).toMatchObject({
        leaderColony: 'c-a',
        members: ['c-a', 'c-b', 'c-c'],
        memberWallets: ['wallet-a', 'wallet-b', 'wallet-c'],
        ownerIndex: { 'wallet-a': 'c-a', 'wallet-b': 'c-b', 'wallet-c': 'c-c' },
        invitations: {},
        stability: 100,
        active: true,
      });
      expect(h.war.allianceOf('c-b')?.id).toBe(PACT);
      expect(balance(h, 'wallet-a')).toBe(99_700);
      expect(h.store.getState().nextAllianceId).toBe(2);
    });

    it('needs at least two members', () => {
      expect(() => h.war.formAlliance('wallet-e', 'Alone', 'c-e', [])).toThrow(ConfigurationError);
    });

    it('rejects two colonies of the same wallet', () => {
      addColony(h, 'c-e2', 'wallet-e');
      expect(() => h.war.formAlliance('wallet-e', 'Twins', 'c-e', ['c-e2'])).toThrow(OwnershipConflictError);
      expect(() => h.war.formAlliance('wallet-e', 'Echo', 'c-e', ['c-e'])).toThrow(OwnershipConflictError);
    });

    it('rejects a colony that already belongs to an alliance', () => {
      expect(() => h.war.formAlliance('wallet-e', 'Raiders', 'c-e', ['c-b'])).toThrow(OwnershipConflictError);
    });

    it('requires the caller to own the leader', () => {
      expect(() => h.war.formAlliance('wallet-f', 'Raiders', 'c-e', ['c-f'])).toThrow(UnauthorizedError);
    });

    it('caps the member count', () => {
      h = createHarness({ alliance: { maxMembers: 2 } });
      for (const id of ['x', 'y', 'z']) addColony(h, `c-${id}`, `wallet-${id}`);
      expect(() => h.war.formAlliance('wallet-x', 'Crowd', 'c-x', ['c-y', 'c-z'])).toThrow(CapacityExceededError);
    });
  });

  describe('membership', () => {
    it('lets the leader invite members, one per wallet', () => {
      expect(() => h.war.addMember('wallet-b', PACT, 'c-e')).toThrow(UnauthorizedError);
      h.war.addMember('wallet-a', PACT, 'c-e');
      expect(h.war.allianceOf('c-e')).toBeUndefined();
      expect(() => h.war.addMember('wallet-a', PACT, 'c-e')).toThrow(InvalidStateTransitionError);

      h.war.acceptInvitation('wallet-e', PACT, 'c-e');
      expect(h.war.allianceOf('c-e')?.id).toBe(PACT);

      addColony(h, 'c-a2', 'wallet-a', {}, 0);
      expect(() => h.war.addMember('wallet-a', PACT, 'c-a2')).toThrow(OwnershipConflictError);
      expect(() => h.war.addMember('wallet-a', PACT, 'c-e')).toThrow(OwnershipConflictError);
      assertUniqueOwners(h.store.getState());
    });

    it('rejects a member past the cap', () => {
      h = createHarness({ alliance: { maxMembers: 2 } });
      for (const id of ['x', 'y', 'z']) addColony(h, `c-${id}`, `wallet-${id}`);
      h.war.formAlliance('wallet-x', 'Pair', 'c-x', ['c-y']);
      expect(() => h.war.addMember('wallet-x', 'alliance-1', 'c-z')).toThrow(CapacityExceededError);
    });

    it('lets a member leave and moves leadership on', () => {
      expect(() => h.war.removeMember('wallet-e', PACT, 'c-b')).toThrow(UnauthorizedError);
      expect(() => h.war.removeMember('wallet-a', PACT, 'c-e')).toThrow(NotFoundError);

      h.war.removeMember('wallet-a', PACT, 'c-a');
      const alliance = h.store.getState().alliances[PACT];
      expect(alliance?.leaderColony).toBe('c-b');
      expect(alliance?.ownerIndex).toEqual({ 'wallet-b': 'c-b', 'wallet-c': 'c-c' });
      expect(h.war.allianceOf('c-a')).toBeUndefined();
      assertUniqueOwners(h.store.getState());
    });

    it('deactivates an alliance that drops below two members', () => {
      const deactivated: string[] = [];
      WarEventBus.on('allianceDeactivated', e => deactivated.push(e.allianceId));

      h.war.removeMember('wallet-c', PACT, 'c-c');
      h.war.removeMember('wallet-a', PACT, 'c-b');

      const state = h.store.getState();
      expect(state.alliances[PACT]).toMatchObject({ active: false, members: ['c-a'] });
      expect(state.allianceOfColony['c-a']).toBeUndefined();
      expect(deactivated).toEqual([PACT]);
      assertUniqueOwners(state);

      h.war.formAlliance('wallet-a', 'Second Pact', 'c-a', ['c-e']);
      expect(h.war.allianceOf('c-a')?.id).toBe('alliance-2');
    });

    it('collects treasury contributions from members', () => {
      const before = balance(h, TREASURY);
      h.war.contributeToTreasury('wallet-b', PACT, 'c-b', 300);
      expect(h.store.getState().alliances[PACT]?.treasury).toBe(300);
      expect(balance(h, 'wallet-b')).toBe(99_600);
      expect(balance(h, TREASURY)).toBe(before + 300);

      expect(() => h.war.contributeToTreasury('wallet-b', PACT, 'c-b', 0)).toThrow(ConfigurationError);
      expect(() => h.war.contributeToTreasury('wallet-e', PACT, 'c-e', 10)).toThrow(InvalidStateTransitionError);
    });
  });

  describe('invitations', () => {
    const RAIDERS = 'alliance-2';

    it('keeps an invited colony outside the alliance until its owner accepts', () => {
      const activated: WarEventMap['allianceActivated'][] = [];
      WarEventBus.on('allianceActivated', e => activated.push(e));

      expect(h.war.formAlliance('wallet-e', 'Raiders', 'c-e', ['c-f'])).toBe(RAIDERS);
      expect(h.store.getState().alliances[RAIDERS]).toMatchObject({
        members: ['c-e'],
        memberWallets: ['wallet-e'],
        invitations: { 'c-f': h.clock.now },
        active: false,
      });
      expect(h.war.allianceOf('c-e')?.id).toBe(RAIDERS);
      expect(h.war.allianceOf('c-f')).toBeUndefined();
      expect(() => h.war.acceptInvitation('wallet-e', RAIDERS, 'c-f')).toThrow(UnauthorizedError);

      h.war.acceptInvitation('wallet-f', RAIDERS, 'c-f');
      expect(h.store.getState().alliances[RAIDERS]).toMatchObject({
        members: ['c-e', 'c-f'],
        memberWallets: ['wallet-e', 'wallet-f'],
        invitations: {},
        active: true,
      });
      expect(activated).toEqual([{ allianceId: RAIDERS, members: ['c-e', 'c-f'] }]);
      expect(() => h.war.acceptInvitation('wallet-f', RAIDERS, 'c-f')).toThrow(NotFoundError);
      assertUniqueOwners(h.store.getState());
    });

    it('does not count an attack by an unaccepted invitee as betrayal', () => {
      h.war.addMember('wallet-a', PACT, 'c-e');
      const invitedAt = h.clock.now;
      toWarfare(h);

      const siegeId = h.war.declareSiege('wallet-e', 1, 'c-e', ['e1'], 500);

      const state = h.store.getState();
      expect(state.sieges[siegeId]?.isBetrayalAttack).toBe(false);
      expect(state.alliances[PACT]).toMatchObject({ stability: 100, betrayalCount: 0, invitations: { 'c-e': invitedAt } });
      expect(state.colonies['c-e']?.reputation).toBe('neutral');
      expect(h.war.cooldownRemaining('c-e', 'betrayal', 259_200)).toBe(0);
    });

    it('does not bind an invitee to the alliance that invited it', () => {
      h.war.formAlliance('wallet-e', 'Raiders', 'c-e', ['c-f']);
      toWarfare(h);

      const siegeId = h.war.declareSiege('wallet-f', 2, 'c-f', ['f1'], 500);

      const state = h.store.getState();
      expect(state.sieges[siegeId]?.isBetrayalAttack).toBe(false);
      expect(state.alliances[RAIDERS]).toMatchObject({ betrayalCount: 0, betrayers: {} });
      expect(state.colonies['c-f']?.reputation).toBe('neutral');
    });

    it('lets the invitee decline and the leader withdraw', () => {
      h.war.addMember('wallet-a', PACT, 'c-e');
      h.war.addMember('wallet-a', PACT, 'c-f');
      expect(() => h.war.declineInvitation('wallet-b', PACT, 'c-e')).toThrow(UnauthorizedError);

      h.war.declineInvitation('wallet-e', PACT, 'c-e');
      h.war.declineInvitation('wallet-a', PACT, 'c-f');
      expect(h.store.getState().alliances[PACT]?.invitations).toEqual({});
      expect(() => h.war.acceptInvitation('wallet-e', PACT, 'c-e')).toThrow(NotFoundError);
    });

    it('turns away an invitee that joined another alliance first', () => {
      h.war.formAlliance('wallet-e', 'Raiders', 'c-e', ['c-f']);
      h.war.addMember('wallet-a', PACT, 'c-f');
      h.war.acceptInvitation('wallet-f', RAIDERS, 'c-f');

      expect(() => h.war.acceptInvitation('wallet-f', PACT, 'c-f')).toThrow(OwnershipConflictError);
      expect(h.war.allianceOf('c-f')?.id).toBe(RAIDERS);
    });

    it('dissolves a forming alliance when its leader leaves', () => {
      const deactivated: string[] = [];
      WarEventBus.on('allianceDeactivated', e => deactivated.push(e.allianceId));
      h.war.formAlliance('wallet-e', 'Raiders', 'c-e', ['c-f']);

      h.war.removeMember('wallet-e', RAIDERS, 'c-e');

      expect(h.store.getState().alliances[RAIDERS]).toMatchObject({ members: [], invitations: {}, active: false });
      expect(h.war.allianceOf('c-e')).toBeUndefined();
      expect(deactivated).toEqual([]);
      expect(() => h.war.acceptInvitation('wallet-f', RAIDERS, 'c-f')).toThrow(InvalidStateTransitionError);
    });
  });

  describe('betrayal', () => {
    beforeEach(() => {
      toWarfare(h);
    });

    it('marks an ally who besieges a protected colony of a fellow member', () => {
      const betrayals: WarEventMap['betrayalRecorded'][] = [];
      WarEventBus.on('betrayalRecorded', e => betrayals.push(e));
      const warfareStart = h.clock.now;

      const siegeId = h.war.declareSiege('wallet-a', 1, 'c-a', ['a1'], 500);

      const state = h.store.getState();
      expect(state.sieges[siegeId]?.isBetrayalAttack).toBe(true);
      expect(state.alliances[PACT]).toMatchObject({
        members: ['c-b', 'c-c'],
        leaderColony: 'c-b',
        stability: 50,
        betrayalCount: 1,
        betrayers: { 'c-a': warfareStart },
      });
      expect(h.war.isBetrayer(PACT, 'c-a')).toBe(true);
      expect(h.war.allianceOf('c-a')).toBeUndefined();
      expect(state.colonies['c-a']?.reputation).toBe('traitor');
      expect(betrayals).toEqual([{ allianceId: PACT, betrayer: 'c-a', target: 'c-b', stability: 50 }]);
      assertUniqueOwners(state);
    });

    it('holds the betrayer out of alliances and sieges for the cooldown', () => {
      h.war.declareSiege('wallet-a', 1, 'c-a', ['a1'], 500);
      expect(() => h.war.addMember('wallet-b', PACT, 'c-a')).toThrow(CooldownActiveError);
      expect(() => h.war.declareSiege('wallet-a', 2, 'c-a', ['a1'], 500)).toThrow(CooldownActiveError);
      expect(h.war.cooldownRemaining('c-a', 'betrayal', 259_200)).toBe(259_200);

      h.clock.advance(259_200);
      h.war.addMember('wallet-b', PACT, 'c-a');
      h.war.acceptInvitation('wallet-a', PACT, 'c-a');
      expect(h.war.allianceOf('c-a')?.id).toBe(PACT);
    });

    it('does not mark an attack on an unprotected colony of a fellow owner', () => {
      addColony(h, 'c-x', 'wallet-b', {}, 0);
      h.store.apply(draft => {
        draft.territories[5] = {
          id: 5, controller: 'c-x', type: 'production', bonusValue: 1500, damage: 0, fortification: 0,
          lastMaintenance: 0, lastRaid: 0, capturedAt: 0, capturePriority: null,
        };
      });

      const siegeId = h.war.declareSiege('wallet-a', 5, 'c-a', ['a1'], 500);

      const state = h.store.getState();
      expect(state.sieges[siegeId]?.isBetrayalAttack).toBe(false);
      expect(state.alliances[PACT]).toMatchObject({ stability: 100, betrayalCount: 0 });
      expect(h.war.allianceOf('c-a')?.id).toBe(PACT);
    });

    it('still protects a colony deregistered earlier in the season', () => {
      h = createHarness();
      addColony(h, 'c-a', 'wallet-a', { a1: 1000 });
      addColony(h, 'c-b', 'wallet-b');
      addColony(h, 'c-y', 'wallet-b');
      openSeason(h);
      h.war.registerColony('wallet-a', 'c-a', 1, 100);
      h.war.registerColony('wallet-b', 'c-b', 1, 100);
      h.war.registerColony('wallet-b', 'c-y', 1, 100);
      h.war.captureTerritory('wallet-b', 6, 'c-y');
      h.war.formAlliance('wallet-a', 'Pact', 'c-a', ['c-b']);
      joinAlliance(h, 'alliance-1', ['c-b']);
      h.war.deregisterColony('wallet-b', 'c-y');
      expect(h.store.getState().wallets['wallet-b']?.primaryColony).toBe('c-b');
      toWarfare(h);

      const siegeId = h.war.declareSiege('wallet-a', 6, 'c-a', ['a1'], 500);

      const state = h.store.getState();
      expect(state.colonies['c-y']?.registered).toBe(false);
      expect(state.sieges[siegeId]?.isBetrayalAttack).toBe(true);
      expect(state.alliances['alliance-1']).toMatchObject({ active: false, stability: 50 });
    });
  });

  describe('forgiveness', () => {
    beforeEach(() => {
      toWarfare(h);
      h.war.declareSiege('wallet-a', 1, 'c-a', ['a1'], 500);
    });

    it('clears the mark on a strict majority and restores stability', () => {
      const proposalId = h.war.proposeForgiveness('wallet-b', PACT, 'c-a', 'c-b');
      expect(h.store.getState().forgivenessProposals[proposalId]).toMatchObject({ votesFor: 1, voters: { 'c-b': true } });
      expect(() => h.war.executeForgiveness('wallet-anyone', proposalId)).toThrow(InvalidStateTransitionError);
      expect(() => h.war.voteForgiveness('wallet-b', proposalId, 'c-b', true)).toThrow(InvalidStateTransitionError);

      h.war.voteForgiveness('wallet-c', proposalId, 'c-c', true);
      h.war.executeForgiveness('wallet-anyone', proposalId);

      const state = h.store.getState();
      expect(state.alliances[PACT]?.stability).toBe(65);
      expect(h.war.isBetrayer(PACT, 'c-a')).toBe(false);
      expect(state.colonies['c-a']?.reputation).toBe('notorious');
      expect(() => h.war.executeForgiveness('wallet-anyone', proposalId)).toThrow(InvalidStateTransitionError);
    });

    it('fails when the majority votes against', () => {
      const proposalId = h.war.proposeForgiveness('wallet-b', PACT, 'c-a', 'c-b');
      h.war.voteForgiveness('wallet-c', proposalId, 'c-c', false);
      expect(h.store.getState().forgivenessProposals[proposalId]?.votesAgainst).toBe(1);
      expect(() => h.war.executeForgiveness('wallet-anyone', proposalId)).toThrow(InvalidStateTransitionError);
    });

    it('allows one open proposal per betrayer, from members only', () => {
      expect(() => h.war.proposeForgiveness('wallet-e', PACT, 'c-a', 'c-e')).toThrow(InvalidStateTransitionError);
      expect(() => h.war.proposeForgiveness('wallet-b', PACT, 'c-c', 'c-b')).toThrow(InvalidStateTransitionError);

      h.war.proposeForgiveness('wallet-b', PACT, 'c-a', 'c-b');
      expect(() => h.war.proposeForgiveness('wallet-c', PACT, 'c-a', 'c-c')).toThrow(InvalidStateTransitionError);
    });

    it('closes voting when the period runs out', () => {
      const proposalId = h.war.proposeForgiveness('wallet-b', PACT, 'c-a', 'c-b');
      h.clock.advance(172_800);
      expect(() => h.war.voteForgiveness('wallet-c', proposalId, 'c-c', true)).toThrow(InvalidStateTransitionError);

      const next = h.war.proposeForgiveness('wallet-b', PACT, 'c-a', 'c-b');
      expect(next).toBe(proposalId + 1);
    });
  });

  describe('treaties', () => {
    const RIVALS = 'alliance-2';

    beforeEach(() => {
      h.war.formAlliance('wallet-e', 'Raiders', 'c-e', ['c-f']);
      joinAlliance(h, RIVALS, ['c-f']);
    });

    it('activates on acceptance by the other leader', () => {
      const treatyId = h.war.proposeTreaty('wallet-a', PACT, RIVALS, 'non_aggression', 7 * DAY);
      expect(h.war.treatyStatus(treatyId)).toBe('proposed');
      expect(() => h.war.acceptTreaty('wallet-a', treatyId)).toThrow(UnauthorizedError);

      h.war.acceptTreaty('wallet-e', treatyId);
      expect(h.war.treatyStatus(treatyId)).toBe('active');
      expect(h.store.getState().treaties[treatyId]?.expiresAt).toBe(h.clock.now + 7 * DAY);

      h.clock.advance(7 * DAY);
      expect(h.war.treatyStatus(treatyId)).toBe('expired');
    });

    it('rejects a second open treaty of the same kind', () => {
      h.war.proposeTreaty('wallet-a', PACT, RIVALS, 'trade', DAY);
      expect(() => h.war.proposeTreaty('wallet-e', RIVALS, PACT, 'trade', DAY)).toThrow(InvalidStateTransitionError);
      expect(() => h.war.proposeTreaty('wallet-a', PACT, RIVALS, 'military', DAY)).not.toThrow();
    });

    it('lets an unanswered proposal lapse', () => {
      const treatyId = h.war.proposeTreaty('wallet-a', PACT, RIVALS, 'trade', DAY);
      h.clock.advance(DAY);
      expect(h.war.treatyStatus(treatyId)).toBe('expired');
      expect(() => h.war.acceptTreaty('wallet-e', treatyId)).toThrow(InvalidStateTransitionError);
      expect(h.war.proposeTreaty('wallet-a', PACT, RIVALS, 'trade', DAY)).toBe(treatyId + 1);
    });

    it('breaks on a raid between the two alliances and costs the aggressor stability', () => {
      const broken: WarEventMap['treatyBroken'][] = [];
      WarEventBus.on('treatyBroken', e => broken.push(e));
      const treatyId = h.war.proposeTreaty('wallet-a', PACT, RIVALS, 'non_aggression', 7 * DAY);
      h.war.acceptTreaty('wallet-e', treatyId);

      toWarfare(h);
      h.war.raidScout('wallet-a', 2, 'c-a');

      expect(h.war.treatyStatus(treatyId)).toBe('broken');
      expect(h.store.getState().treaties[treatyId]?.brokenBy).toBe(PACT);
      expect(h.store.getState().alliances[PACT]?.stability).toBe(80);
      expect(h.store.getState().alliances[RIVALS]?.stability).toBe(100);
      expect(broken).toEqual([{ treatyId, brokenBy: PACT }]);
    });

    it('rejects treaties with itself and honours the pause flag', () => {
      expect(() => h.war.proposeTreaty('wallet-a', PACT, PACT, 'trade', DAY)).toThrow(ConfigurationError);
      h.war.setFeaturePaused(ADMIN, 'treaties', true);
      expect(() => h.war.proposeTreaty('wallet-a', PACT, RIVALS, 'trade', DAY)).toThrow(ConfigurationError);
    });
  });
});
