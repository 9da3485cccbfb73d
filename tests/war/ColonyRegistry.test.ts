import { describe, it, expect, beforeEach } from 'vitest';
import type { Harness } from './helpers';
import { ColonyRegistry, currentStress, maintenanceScalePercent } from '@/engine/war/systems/ColonyRegistry';
import { seasonWalletKey } from '@/engine/war/data/types/Season';
import { WarEventBus } from '@/engine/war/WarEventBus';
import {
  CooldownActiveError, InvalidStateTransitionError, UnauthorizedError,
} from '@/engine/war/WarErrors';
import { DAY, T0, TREASURY, addColony, balance, createHarness, openSeason, season } from './helpers';

const DECAY = 21_600;

describe('ColonyRegistry', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
    addColony(h, 'c-a', 'wallet-a');
    addColony(h, 'c-a2', 'wallet-a', {}, 0);
    addColony(h, 'c-spare', 'wallet-a', {}, 0);
    addColony(h, 'c-b', 'wallet-b');
    openSeason(h);
    h.war.registerColony('wallet-a', 'c-a', 1, 100);
    h.war.registerColony('wallet-a', 'c-a2', 1, 100);
  });

  describe('wallet index', () => {
    it('makes the first registered colony primary', () => {
      expect(h.store.getState().wallets['wallet-a']).toEqual({
        address: 'wallet-a',
        colonies: ['c-a', 'c-a2'],
        primaryColony: 'c-a',
      });
      expect(h.store.getState().userSeasonColonies[seasonWalletKey(1, 'wallet-a')]).toEqual(['c-a', 'c-a2']);
    });
  });

  describe('setPrimaryColony', () => {
    it('rate-limits changes per wallet', () => {
      const changes: string[] = [];
      WarEventBus.on('primaryColonyChanged', e => changes.push(e.colonyId));

      h.war.setPrimaryColony('wallet-a', 'c-a2');
      expect(h.store.getState().wallets['wallet-a']?.primaryColony).toBe('c-a2');

      h.clock.advance(600);
      try {
        h.war.setPrimaryColony('wallet-a', 'c-a');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(CooldownActiveError);
        if (err instanceof CooldownActiveError) expect(err.remainingSeconds).toBe(DAY - 600);
      }

      h.clock.advance(DAY - 600);
      h.war.setPrimaryColony('wallet-a', 'c-a');
      expect(changes).toEqual(['c-a2', 'c-a']);
    });

    it('treats re-selecting the current primary as a no-op', () => {
      const before = h.store.getState();
      h.war.setPrimaryColony('wallet-a', 'c-a');
      expect(h.store.getState()).toBe(before);
      expect(h.war.cooldownRemaining('wallet-a', 'primary_colony', DAY)).toBe(0);
    });

    it('accepts only colonies the wallet registered', () => {
      expect(() => h.war.setPrimaryColony('wallet-a', 'c-spare')).toThrow(InvalidStateTransitionError);
      expect(() => h.war.setPrimaryColony('wallet-b', 'c-a2')).toThrow(UnauthorizedError);
    });
  });

  describe('deregisterColony', () => {
    it('refunds the stake and keeps the season index', () => {
      const left: string[] = [];
      WarEventBus.on('colonyDeregistered', e => left.push(e.colonyId));
      expect(balance(h, 'wallet-a')).toBe(99_800);

      h.war.deregisterColony('wallet-a', 'c-a');

      const state = h.store.getState();
      expect(balance(h, 'wallet-a')).toBe(99_900);
      expect(balance(h, TREASURY)).toBe(100);
      expect(state.colonies['c-a']).toMatchObject({ registered: false, stake: 0 });
      expect(season(h).registeredColonies).toEqual(['c-a2']);
      expect(state.userSeasonColonies[seasonWalletKey(1, 'wallet-a')]).toEqual(['c-a', 'c-a2']);
      expect(left).toEqual(['c-a']);
    });

    it('rejects strangers and colonies already out', () => {
      expect(() => h.war.deregisterColony('wallet-b', 'c-a')).toThrow(UnauthorizedError);
      h.war.deregisterColony('wallet-a', 'c-a');
      expect(() => h.war.deregisterColony('wallet-a', 'c-a')).toThrow(InvalidStateTransitionError);
    });
  });

  describe('stress', () => {
    it('clamps accumulated stress to ten', () => {
      const next = ColonyRegistry.addStress(h.store.getState(), 'c-a', 15, T0);
      expect(next.colonies['c-a']?.stress).toBe(10);
      expect(maintenanceScalePercent(next, 'c-a', T0)).toBe(200);
      expect(maintenanceScalePercent(next, 'c-unknown', T0)).toBe(100);
    });

    it('decays one point per interval and keeps the partial interval', () => {
      const stressed = ColonyRegistry.addStress(h.store.getState(), 'c-a', 4, T0);
      const profile = stressed.colonies['c-a'];
      if (!profile) throw new Error('profile missing');
      expect(currentStress(profile, DECAY, T0 + 3 * DECAY + 100)).toBe(1);

      const decayed = ColonyRegistry.decayStress(stressed, 'c-a', T0 + 3 * DECAY + 100);
      expect(decayed.colonies['c-a']).toMatchObject({ stress: 1, stressUpdatedAt: T0 + 3 * DECAY });
      expect(ColonyRegistry.decayStress(decayed, 'c-a', T0 + 3 * DECAY + 100)).toBe(decayed);

      const cleared = ColonyRegistry.decayStress(decayed, 'c-a', T0 + 10 * DECAY);
      expect(cleared.colonies['c-a']).toMatchObject({ stress: 0, stressUpdatedAt: T0 + 10 * DECAY });
    });

    it('stacks new stress on the decayed value', () => {
      const stressed = ColonyRegistry.addStress(h.store.getState(), 'c-a', 5, T0);
      const again = ColonyRegistry.addStress(stressed, 'c-a', 1, T0 + 2 * DECAY);
      expect(again.colonies['c-a']).toMatchObject({ stress: 4, stressUpdatedAt: T0 + 2 * DECAY });
    });
  });

  describe('recordSiegeResult', () => {
    it('marks a colony honorable after three straight wins', () => {
      let state = h.store.getState();
      state = ColonyRegistry.recordSiegeResult(state, 'c-a', true, 0);
      state = ColonyRegistry.recordSiegeResult(state, 'c-a', true, 0);
      expect(state.colonies['c-a']?.reputation).toBe('neutral');
      state = ColonyRegistry.recordSiegeResult(state, 'c-a', true, 0);
      expect(state.colonies['c-a']).toMatchObject({ reputation: 'honorable', winStreak: 3, wins: 3 });

      state = ColonyRegistry.recordSiegeResult(state, 'c-a', false, 250);
      expect(state.colonies['c-a']).toMatchObject({
        reputation: 'honorable', winStreak: 0, wins: 3, losses: 1, totalForfeited: 250,
      });
    });

    it('ignores colonies without a profile', () => {
      const state = h.store.getState();
      expect(ColonyRegistry.recordSiegeResult(state, 'c-b', true, 0)).toBe(state);
    });
  });
});
