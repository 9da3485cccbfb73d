// ─────────────────────────────────────────────
//  Territory Ledger: capture, upkeep, gauges
//  damage and fortification are independent 0-100 gauges;
//  every write goes through clampGauge.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { WarState } from '../state/WarState';
import type { ActionContext } from '../state/WarAction';
import type { TerritoryState } from '../data/types/Territory';
import type { ScoutReport } from '../WarEventBus';
import { territoryTypeFor } from '../data/types/Territory';
import { WarStateQuery } from '../state/WarState';
import { ColonyRegistry, isRegisteredFor, maintenanceScalePercent, requireColonyOwner } from './ColonyRegistry';
import { requireCurrentPhase } from './SeasonManager';
import { RateLimiter } from './RateLimiter';
import { FeeLedger } from './FeeLedger';
import { AllianceRegistry } from './AllianceRegistry';
import { MathUtils } from '@/engine/utils/MathUtils';
import {
  CapacityExceededError, ConfigurationError, CooldownActiveError,
  InvalidStateTransitionError, NotFoundError,
} from '../WarErrors';

export const GAUGE_MAX = 100;

export function clampGauge(value: number): number {
  return MathUtils.clamp(value, 0, GAUGE_MAX);
}

export function territoryActorKey(territoryId: number): string {
  return `territory:${territoryId}`;
}

/** base * (100 - damage)/100 * (100 + fortification)/100, floored once. */
export function effectiveDefense(basePower: number, territory: TerritoryState): number {
  return Math.floor((basePower * (GAUGE_MAX - territory.damage) * (GAUGE_MAX + territory.fortification)) / 10_000);
}

/** Bonus in bps after damage; halved while maintenance is overdue. */
export function effectiveBonus(state: WarState, territory: TerritoryState, now: number): number {
  if (territory.controller === null) return 0;
  const scaled = Math.floor((territory.bonusValue * (GAUGE_MAX - territory.damage)) / GAUGE_MAX);
  const overdue = now - territory.lastMaintenance > state.config.territory.maintenanceInterval;
  return overdue ? Math.floor(scaled / 2) : scaled;
}

export function requireTerritory(state: WarState, territoryId: number): TerritoryState {
  const territory = state.territories[territoryId];
  if (!territory) throw new NotFoundError(`territory ${territoryId} has never been captured`);
  return territory;
}

/** Territory plus the controller's wallet, asserting the caller is that wallet. */
function requireController(state: WarState, ctx: ActionContext, territoryId: number): { territory: TerritoryState; controller: string; owner: string } {
  const territory = requireTerritory(state, territoryId);
  if (territory.controller === null) {
    throw new InvalidStateTransitionError(`territory ${territoryId} is uncontrolled`);
  }
  const owner = requireColonyOwner(ctx, territory.controller);
  return { territory, controller: territory.controller, owner };
}

export function activeCapturePriority(territory: TerritoryState | undefined, now: number): TerritoryState['capturePriority'] {
  const priority = territory?.capturePriority ?? null;
  return priority !== null && priority.expiresAt > now ? priority : null;
}

export const TerritoryLedger = {
  captureTerritory(state: WarState, ctx: ActionContext, territoryId: number, colonyId: string): WarState {
    const cfg = state.config.territory;
    if (!MathUtils.isPositiveInt(territoryId)) {
      throw new ConfigurationError(`invalid territory id ${territoryId}`);
    }
    if (territoryId > cfg.maxTerritories) {
      throw new CapacityExceededError(`only ${cfg.maxTerritories} territories exist`, { territoryId });
    }
    requireColonyOwner(ctx, colonyId);
    const season = requireCurrentPhase(state, ctx.now, 'registration', 'warfare');
    if (!isRegisteredFor(state, colonyId, season.id)) {
      throw new InvalidStateTransitionError(`colony ${colonyId} is not registered for season ${season.id}`);
    }

    const existing = state.territories[territoryId];
    if (existing && existing.controller !== null) {
      throw new InvalidStateTransitionError(`territory ${territoryId} is controlled by ${existing.controller}`);
    }
    const priority = activeCapturePriority(existing, ctx.now);
    if (priority && priority.colonyId !== colonyId) {
      throw new CooldownActiveError(
        `territory ${territoryId} is reserved for ${priority.colonyId}`,
        priority.expiresAt - ctx.now,
      );
    }
    const held = WarStateQuery.territoriesOf(state, colonyId).length;
    if (held >= cfg.maxTerritoriesPerColony) {
      throw new CapacityExceededError(`colony ${colonyId} already holds ${held} territories`);
    }
    if (!existing && Object.keys(state.territories).length >= cfg.maxTerritories) {
      throw new CapacityExceededError(`global territory cap of ${cfg.maxTerritories} reached`);
    }

    ctx.effects.emit('territoryCaptured', { territoryId, oldController: null, newController: colonyId });
    ctx.effects.log(`Colony ${colonyId} claimed territory ${territoryId}`, 'combat');

    return produce(state, draft => {
      const type = territoryTypeFor(territoryId);
      const territory = draft.territories[territoryId] ?? {
        id: territoryId,
        controller: null,
        type,
        bonusValue: cfg.bonusBps[type],
        damage: 0,
        fortification: 0,
        lastMaintenance: ctx.now,
        lastRaid: 0,
        capturedAt: ctx.now,
        capturePriority: null,
      };
      territory.controller = colonyId;
      territory.capturedAt = ctx.now;
      territory.lastMaintenance = ctx.now;
      territory.capturePriority = null;
      draft.territories[territoryId] = territory;
    });
  },

  /** Siege path: control moves, fortification resets. */
  transferControl(state: WarState, territoryId: number, newController: string, now: number): WarState {
    return produce(state, draft => {
      const territory = draft.territories[territoryId];
      if (!territory) return;
      territory.controller = newController;
      territory.capturedAt = now;
      territory.lastMaintenance = now;
      territory.fortification = 0;
    });
  },

  payMaintenance(state: WarState, ctx: ActionContext, territoryId: number): WarState {
    const { controller, owner } = requireController(state, ctx, territoryId);
    const scalePercent = maintenanceScalePercent(state, controller, ctx.now);
    const decayed = ColonyRegistry.decayStress(state, controller, ctx.now);
    const { state: charged, amount } = FeeLedger.applyOperationFee(
      decayed, 'maintenance', 1, owner, ctx.effects, { scalePercent },
    );
    ctx.effects.emit('maintenancePaid', { territoryId, colonyId: controller, amount });
    return produce(charged, draft => {
      const t = draft.territories[territoryId];
      if (t) t.lastMaintenance = ctx.now;
    });
  },

  /** Fee scales with the damage repaired. Undamaged territory is a no-op. */
  repairDamage(state: WarState, ctx: ActionContext, territoryId: number): WarState {
    const { territory, controller, owner } = requireController(state, ctx, territoryId);
    if (territory.damage === 0) return state;

    const { state: charged } = FeeLedger.applyOperationFee(state, 'repair', territory.damage, owner, ctx.effects);
    ctx.effects.emit('territoryRepaired', { territoryId, colonyId: controller });
    return produce(charged, draft => {
      const t = draft.territories[territoryId];
      if (t) t.damage = 0;
    });
  },

  fortifyTerritory(state: WarState, ctx: ActionContext, territoryId: number, amount: number): WarState {
    if (!MathUtils.isPositiveInt(amount)) {
      throw new ConfigurationError('fortification amount must be a positive integer', { amount });
    }
    const { territory, owner } = requireController(state, ctx, territoryId);
    if (territory.fortification >= GAUGE_MAX) {
      throw new CapacityExceededError(`territory ${territoryId} is fully fortified`);
    }
    const fortification = clampGauge(territory.fortification + amount);

    const { state: charged } = FeeLedger.applyOperationFee(
      state, 'fortify', fortification - territory.fortification, owner, ctx.effects,
    );
    ctx.effects.emit('territoryFortified', { territoryId, fortification });
    return produce(charged, draft => {
      const t = draft.territories[territoryId];
      if (t) t.fortification = fortification;
    });
  },

  abandonTerritory(state: WarState, ctx: ActionContext, territoryId: number): WarState {
    const { controller } = requireController(state, ctx, territoryId);
    if (state.activeSiegeByTerritory[territoryId] !== undefined) {
      throw new InvalidStateTransitionError(`territory ${territoryId} is under siege`);
    }
    ctx.effects.emit('territoryAbandoned', { territoryId, colonyId: controller });
    return produce(state, draft => {
      const t = draft.territories[territoryId];
      if (t) t.controller = null;
    });
  },

  /** Damage and weaken a rival territory, reporting its gauges to the raider. */
  raidScout(state: WarState, ctx: ActionContext, territoryId: number, raiderColony: string): WarState {
    const owner = requireColonyOwner(ctx, raiderColony);
    const season = requireCurrentPhase(state, ctx.now, 'warfare');
    if (!isRegisteredFor(state, raiderColony, season.id)) {
      throw new InvalidStateTransitionError(`colony ${raiderColony} is not registered for season ${season.id}`);
    }
    const territory = requireTerritory(state, territoryId);
    if (territory.controller === null) {
      throw new InvalidStateTransitionError(`territory ${territoryId} is uncontrolled`);
    }
    if (territory.controller === raiderColony) {
      throw new InvalidStateTransitionError('cannot raid your own territory');
    }
    const victim = territory.controller;

    const cfg = state.config.territory;
    let next = RateLimiter.checkAndConsumeCooldown(
      state, territoryActorKey(territoryId), 'raid', cfg.raidCooldown, ctx.now,
    );
    next = FeeLedger.applyOperationFee(next, 'raid', 1, owner, ctx.effects).state;

    const raiderAlliance = next.allianceOfColony[raiderColony];
    const victimAlliance = next.allianceOfColony[victim];
    if (raiderAlliance !== undefined && victimAlliance !== undefined && raiderAlliance !== victimAlliance) {
      next = AllianceRegistry.recordHostileAct(next, ctx, raiderAlliance, victimAlliance);
    }

    const report: ScoutReport = {
      territoryId,
      controller: victim,
      damage: clampGauge(territory.damage + cfg.raidDamage),
      fortification: clampGauge(territory.fortification - cfg.raidFortificationReduction),
    };
    next = produce(next, draft => {
      const t = draft.territories[territoryId];
      if (!t) return;
      t.damage = report.damage;
      t.fortification = report.fortification;
      t.lastRaid = ctx.now;
    });
    next = ColonyRegistry.addStress(next, raiderColony, 1, ctx.now);

    ctx.effects.emit('territoryScouted', { raider: raiderColony, report });
    return next;
  },
};
