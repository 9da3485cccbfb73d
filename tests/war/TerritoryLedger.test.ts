import { describe, it, expect, beforeEach } from 'vitest';
import type { Harness } from './helpers';
import type { ScoutReport } from '@/engine/war/WarEventBus';
import { WarEventBus } from '@/engine/war/WarEventBus';
import {
  CapacityExceededError, ConfigurationError, CooldownActiveError, InvalidStateTransitionError,
  NotFoundError, UnauthorizedError,
} from '@/engine/war/WarErrors';
import { CURRENCY, DAY, T0, TREASURY, addColony, balance, createHarness, openSeason, season, toWarfare } from './helpers';

const RAID_COOLDOWN = 14_400;
const STRESS_DECAY = 21_600;

describe('TerritoryLedger', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
    addColony(h, 'c-a', 'wallet-a');
    addColony(h, 'c-b', 'wallet-b');
    addColony(h, 'c-idle', 'wallet-idle');
    openSeason(h);
    h.war.registerColony('wallet-a', 'c-a', 1, 100);
    h.war.registerColony('wallet-b', 'c-b', 1, 100);
  });

  describe('captureTerritory', () => {
    it('creates the territory with the bonus of its type', () => {
      h.war.captureTerritory('wallet-a', 1, 'c-a');
      h.war.captureTerritory('wallet-a', 7, 'c-a');

      expect(h.war.territory(1)).toMatchObject({
        controller: 'c-a', type: 'production', bonusValue: 1500, damage: 0, fortification: 0,
        lastMaintenance: T0, capturedAt: T0,
      });
      expect(h.war.territory(7)).toMatchObject({ type: 'defense', bonusValue: 1000 });
    });

    it('caps the territories one colony may hold', () => {
      for (let id = 1; id <= 6; id++) h.war.captureTerritory('wallet-a', id, 'c-a');
      expect(() => h.war.captureTerritory('wallet-a', 7, 'c-a')).toThrow(CapacityExceededError);
    });

    it('rejects ids outside the map', () => {
      expect(() => h.war.captureTerritory('wallet-a', 51, 'c-a')).toThrow(CapacityExceededError);
      expect(() => h.war.captureTerritory('wallet-a', 0, 'c-a')).toThrow(ConfigurationError);
    });

    it('rejects a territory someone already controls', () => {
      h.war.captureTerritory('wallet-a', 1, 'c-a');
      expect(() => h.war.captureTerritory('wallet-b', 1, 'c-b')).toThrow(InvalidStateTransitionError);
    });

    it('requires a registered colony and its owner', () => {
      expect(() => h.war.captureTerritory('wallet-idle', 1, 'c-idle')).toThrow(InvalidStateTransitionError);
      expect(() => h.war.captureTerritory('wallet-b', 1, 'c-a')).toThrow(UnauthorizedError);
    });

    it('closes once warfare ends', () => {
      toWarfare(h);
      h.war.captureTerritory('wallet-a', 1, 'c-a');
      h.clock.set(season(h).warfareEnd);
      expect(() => h.war.captureTerritory('wallet-a', 2, 'c-a')).toThrow(InvalidStateTransitionError);
    });
  });

  describe('raidScout', () => {
    beforeEach(() => {
      h.war.captureTerritory('wallet-a', 1, 'c-a');
      toWarfare(h);
    });

    it('damages the territory, burns the fee and reports the gauges', () => {
      const reports: ScoutReport[] = [];
      WarEventBus.on('territoryScouted', e => reports.push(e.report));

      h.war.raidScout('wallet-b', 1, 'c-b');

      expect(h.war.territory(1)).toMatchObject({ damage: 15, fortification: 0, lastRaid: season(h).registrationEnd });
      expect(reports).toEqual([{ territoryId: 1, controller: 'c-a', damage: 15, fortification: 0 }]);
      expect(balance(h, 'wallet-b')).toBe(99_880);
      expect(h.ports.bank.totalBurned(CURRENCY)).toBe(20);
      expect(h.store.getState().colonies['c-b']?.stress).toBe(1);
    });

    it('rate-limits raids per territory', () => {
      h.war.raidScout('wallet-b', 1, 'c-b');
      h.clock.advance(100);
      try {
        h.war.raidScout('wallet-b', 1, 'c-b');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(CooldownActiveError);
        if (err instanceof CooldownActiveError) expect(err.remainingSeconds).toBe(RAID_COOLDOWN - 100);
      }

      h.clock.advance(RAID_COOLDOWN - 100);
      h.war.raidScout('wallet-b', 1, 'c-b');
      expect(h.war.territory(1)?.damage).toBe(30);
    });

    it('rejects raiding your own territory', () => {
      expect(() => h.war.raidScout('wallet-a', 1, 'c-a')).toThrow(InvalidStateTransitionError);
    });

    it('only runs during warfare', () => {
      h.clock.set(season(h).warfareEnd);
      expect(() => h.war.raidScout('wallet-b', 1, 'c-b')).toThrow(InvalidStateTransitionError);
    });

    it('keeps both gauges inside 0..100 under repeated raids', () => {
      h.war.fortifyTerritory('wallet-a', 1, 150);
      expect(h.war.territory(1)?.fortification).toBe(100);
      expect(() => h.war.fortifyTerritory('wallet-a', 1, 1)).toThrow(CapacityExceededError);

      for (let i = 0; i < 11; i++) {
        h.war.raidScout('wallet-b', 1, 'c-b');
        const t = h.war.territory(1);
        expect(t?.damage).toBeGreaterThanOrEqual(0);
        expect(t?.damage).toBeLessThanOrEqual(100);
        expect(t?.fortification).toBeGreaterThanOrEqual(0);
        expect(t?.fortification).toBeLessThanOrEqual(100);
        h.clock.advance(RAID_COOLDOWN);
      }
      expect(h.war.territory(1)).toMatchObject({ damage: 100, fortification: 0 });
      expect(h.store.getState().colonies['c-b']?.stress).toBe(10);
    });
  });

  describe('upkeep', () => {
    beforeEach(() => {
      h.war.captureTerritory('wallet-a', 1, 'c-a');
    });

    it('charges fortification per point actually added', () => {
      h.war.fortifyTerritory('wallet-a', 1, 40);
      expect(h.ports.bank.totalBurned(CURRENCY)).toBe(400);
      h.war.fortifyTerritory('wallet-a', 1, 80);
      expect(h.war.territory(1)?.fortification).toBe(100);
      expect(h.ports.bank.totalBurned(CURRENCY)).toBe(1000);
      expect(() => h.war.fortifyTerritory('wallet-a', 1, 0)).toThrow(ConfigurationError);
    });

    it('repairs all damage for a fee per point', () => {
      toWarfare(h);
      h.war.raidScout('wallet-b', 1, 'c-b');
      h.clock.advance(RAID_COOLDOWN);
      h.war.raidScout('wallet-b', 1, 'c-b');
      expect(() => h.war.repairDamage('wallet-b', 1)).toThrow(UnauthorizedError);

      h.war.repairDamage('wallet-a', 1);
      expect(h.war.territory(1)?.damage).toBe(0);
      expect(balance(h, 'wallet-a')).toBe(99_900 - 150);

      const before = h.store.getState();
      h.war.repairDamage('wallet-a', 1);
      expect(h.store.getState()).toBe(before);
    });

    it('scales defense and bonus by the gauges and overdue upkeep', () => {
      h.store.apply(draft => {
        const t = draft.territories[1];
        if (t) {
          t.damage = 20;
          t.fortification = 50;
        }
      });
      expect(h.war.territoryDefense(1, 1000)).toBe(1200);
      expect(h.war.territoryBonus(1)).toBe(1200);

      h.clock.set(T0 + DAY + 1);
      expect(h.war.territoryBonus(1)).toBe(600);

      h.war.payMaintenance('wallet-a', 1);
      expect(h.war.territoryBonus(1)).toBe(1200);
      expect(h.war.territory(1)?.lastMaintenance).toBe(T0 + DAY + 1);
    });

    it('scales maintenance with stress, which decays over time', () => {
      h.war.captureTerritory('wallet-b', 2, 'c-b');
      h.war.captureTerritory('wallet-b', 3, 'c-b');
      toWarfare(h);
      h.war.raidScout('wallet-a', 2, 'c-a');
      h.war.raidScout('wallet-a', 3, 'c-a');
      expect(h.store.getState().colonies['c-a']?.stress).toBe(2);

      const paid: number[] = [];
      WarEventBus.on('maintenancePaid', e => paid.push(e.amount));
      h.war.payMaintenance('wallet-a', 1);
      expect(balance(h, 'wallet-a')).toBe(99_900 - 40 - 60);
      expect(balance(h, TREASURY)).toBe(200 + 60);

      h.clock.advance(STRESS_DECAY * 2);
      h.war.payMaintenance('wallet-a', 1);
      expect(paid).toEqual([60, 50]);
      expect(h.store.getState().colonies['c-a']?.stress).toBe(0);
    });

    it('rejects upkeep on territory that is unknown or uncontrolled', () => {
      expect(() => h.war.payMaintenance('wallet-a', 9)).toThrow(NotFoundError);
      h.war.abandonTerritory('wallet-a', 1);
      expect(() => h.war.payMaintenance('wallet-a', 1)).toThrow(InvalidStateTransitionError);
    });
  });

  describe('abandonTerritory', () => {
    it('releases control so another colony can claim it', () => {
      h.war.captureTerritory('wallet-a', 1, 'c-a');
      expect(() => h.war.abandonTerritory('wallet-b', 1)).toThrow(UnauthorizedError);

      h.war.abandonTerritory('wallet-a', 1);
      expect(h.war.territory(1)?.controller).toBeNull();
      expect(h.war.territoryBonus(1)).toBe(0);

      h.war.captureTerritory('wallet-b', 1, 'c-b');
      expect(h.war.territory(1)?.controller).toBe('c-b');
    });
  });
});
