// ─────────────────────────────────────────────
//  Siege Engine: declare → defend (snapshot) → resolve
//  preparation → active → completed | cancelled
//  Combat power is read exactly once, in defend(); resolveSiege
//  only ever reads the stored snapshot.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { Draft } from 'immer';
import type { WarState } from '../state/WarState';
import type { ActionContext } from '../state/WarAction';
import type { OutcomeBand } from '../data/types/Config';
import type {
  AttackForce, PowerVector, SiegeOutcome, SiegeSnapshot, SiegeState, SiegeStatus, StakeContribution,
} from '../data/types/Siege';
import { isTerminal } from '../data/types/Siege';
import { tokenAssignmentKey } from '../data/types/TaskForce';
import { WarStateQuery } from '../state/WarState';
import { ColonyRegistry, isRegisteredFor, requireColonyOwner } from './ColonyRegistry';
import { requireCurrentPhase } from './SeasonManager';
import {
  activeCapturePriority, clampGauge, effectiveDefense, GAUGE_MAX, requireTerritory,
  territoryActorKey, TerritoryLedger,
} from './TerritoryLedger';
import { AllianceRegistry, betrayalCooldownRemaining } from './AllianceRegistry';
import { RateLimiter } from './RateLimiter';
import { FeeLedger } from './FeeLedger';
import { assertTokensStaked, reserveTokens } from './TaskForceSystem';
import { MathUtils } from '@/engine/utils/MathUtils';
import {
  ConfigurationError, CooldownActiveError, InsufficientStakeError, InvalidStateTransitionError,
  NotFoundError, OwnershipConflictError,
} from '../WarErrors';

/** One colony's share of an attack: its tokens, and the stake its wallet puts up. */
export interface SiegeForce {
  colonyId: string;
  tokenIds: string[];
  wallet: string;
  stake: number;
}

export interface SiegeDeclaration {
  territoryId: number;
  attackerColony: string;
  forces: SiegeForce[];
  coordinatedAttackId?: string;
}

export interface DeclareResult {
  state: WarState;
  siegeId: number;
}

export interface OutcomeVerdict {
  outcome: SiegeOutcome;
  attackerWins: boolean;
  damage: number;
  ratioBps: number;
}

/** Bands are matched top-down; the ratio is floor(attacker * 10000 / defender). */
export function outcomeFor(bands: readonly OutcomeBand[], attackerPower: number, defenderPower: number): OutcomeVerdict {
  const ratioBps = defenderPower <= 0
    ? Number.POSITIVE_INFINITY
    : Math.floor((attackerPower * 10_000) / defenderPower);
  for (const band of bands) {
    if (ratioBps >= band.minRatioBps) {
      return { outcome: band.outcome, attackerWins: band.attackerWins, damage: band.damage, ratioBps };
    }
  }
  return { outcome: 'repelled', attackerWins: false, damage: 0, ratioBps };
}

/** Stored status, with preparation reported as active once its timer has run out. */
export function siegeStatusAt(siege: SiegeState, now: number): SiegeStatus {
  if (siege.state === 'preparation' && now >= siege.preparationEndsAt) return 'active';
  return siege.state;
}

export function requireSiege(state: WarState, siegeId: number): SiegeState {
  const siege = state.sieges[siegeId];
  if (!siege) throw new NotFoundError(`unknown siege ${siegeId}`);
  return siege;
}

function mergePower(vectors: PowerVector[]): PowerVector {
  const perToken: Record<string, number> = {};
  let total = 0;
  for (const vector of vectors) {
    Object.assign(perToken, vector.perToken);
    total += vector.total;
  }
  return { perToken, total };
}

function refundContributions(ctx: ActionContext, state: WarState, contributions: readonly StakeContribution[]): void {
  const { currency, treasuryAccount } = state.config;
  for (const c of contributions) ctx.effects.transfer(currency, treasuryAccount, c.wallet, c.amount);
}

/** Holder recorded against the tokens of a siege declared outside any task force. */
export function siegeTokenHolder(siegeId: number): string {
  return `siege-${siegeId}`;
}

/** Task force sieges leave their tokens with the task force until it disbands. */
function releaseSiegeTokens(draft: Draft<WarState>, siege: SiegeState): void {
  const holder = siegeTokenHolder(siege.id);
  for (const tokenId of siege.attackerTokens) {
    const key = tokenAssignmentKey(siege.seasonId, tokenId);
    if (draft.tokenAssignments[key] === holder) delete draft.tokenAssignments[key];
  }
}

function cancelSiege(state: WarState, ctx: ActionContext, siege: SiegeState, reason: string): WarState {
  refundContributions(ctx, state, siege.contributions);
  ctx.effects.emit('siegeCancelled', { siegeId: siege.id });
  ctx.effects.log(`Siege ${siege.id} cancelled: ${reason}`, 'warning');
  return produce(state, draft => {
    const s = draft.sieges[siege.id];
    if (s) {
      s.state = 'cancelled';
      s.outcome = 'cancelled';
      s.winner = null;
    }
    delete draft.activeSiegeByTerritory[siege.territoryId];
    releaseSiegeTokens(draft, siege);
  });
}

/** Why resolution must cancel instead of settling, or null. */
function cancellationReason(state: WarState, siege: SiegeState): string | null {
  if (siege.overridden) return 'administrative override';
  if (!isRegisteredFor(state, siege.attackerColony, siege.seasonId)) return 'attacker registration lapsed';
  if (siege.defenderWasRegistered && !isRegisteredFor(state, siege.defenderColony, siege.seasonId)) {
    return 'defender registration lapsed';
  }
  const territory = state.territories[siege.territoryId];
  if (!territory || territory.controller !== siege.defenderColony) return 'territory changed hands';
  return null;
}

/** True when the attacker has no room for the territory it would win. */
function atTerritoryCap(state: WarState, colonyId: string): boolean {
  const held = WarStateQuery.territoriesOf(state, colonyId).length;
  return held >= state.config.territory.maxTerritoriesPerColony;
}

export const SiegeEngine = {
  declareSiege(state: WarState, ctx: ActionContext, declaration: SiegeDeclaration): DeclareResult {
    const { territoryId, attackerColony, forces } = declaration;
    const season = requireCurrentPhase(state, ctx.now, 'warfare');

    if (forces.length === 0 || forces[0]?.colonyId !== attackerColony) {
      throw new ConfigurationError('the attacking colony must lead the first force');
    }
    for (const force of forces) {
      if (ctx.ports.custody.ownerOfColony(force.colonyId) === null) {
        throw new NotFoundError(`unknown colony ${force.colonyId}`);
      }
      if (!isRegisteredFor(state, force.colonyId, season.id)) {
        throw new InvalidStateTransitionError(`colony ${force.colonyId} is not registered for season ${season.id}`);
      }
    }

    const territory = requireTerritory(state, territoryId);
    const defenderColony = territory.controller;
    if (defenderColony === null) {
      throw new InvalidStateTransitionError(`territory ${territoryId} is uncontrolled; capture it instead`);
    }
    if (forces.some(f => f.colonyId === defenderColony)) {
      throw new InvalidStateTransitionError('a colony cannot besiege its own territory');
    }
    const running = state.activeSiegeByTerritory[territoryId];
    if (running !== undefined) {
      throw new InvalidStateTransitionError(`territory ${territoryId} is already contested by siege ${running}`);
    }
    const priority = activeCapturePriority(territory, ctx.now);
    if (priority && priority.colonyId !== attackerColony) {
      throw new CooldownActiveError(`territory ${territoryId} is reserved for ${priority.colonyId}`, priority.expiresAt - ctx.now);
    }
    for (const force of forces) {
      const remaining = betrayalCooldownRemaining(state, force.colonyId, ctx.now);
      if (remaining > 0) {
        throw new CooldownActiveError(`colony ${force.colonyId} is serving a betrayal cooldown`, remaining);
      }
    }

    const seen = new Set<string>();
    for (const force of forces) {
      assertTokensStaked(ctx, force.colonyId, force.tokenIds);
      for (const tokenId of force.tokenIds) {
        if (seen.has(tokenId)) throw new OwnershipConflictError(`token ${tokenId} is committed twice`);
        seen.add(tokenId);
      }
      if (!Number.isInteger(force.stake) || force.stake < 0) {
        throw new ConfigurationError('stake must be a non-negative integer', { stake: force.stake });
      }
    }
    const stake = forces.reduce((sum, f) => sum + f.stake, 0);
    const minStake = state.config.siege.minSiegeStake;
    if (stake < minStake) {
      throw new InsufficientStakeError(`siege stake ${stake} is below ${minStake}`, { stake, min: minStake });
    }

    const siegeId = state.nextSiegeId;
    let next = reserveTokens(
      state, season.id, declaration.coordinatedAttackId ?? siegeTokenHolder(siegeId), [...seen],
    );
    next = RateLimiter.checkAndConsumeCooldown(
      next, territoryActorKey(territoryId), 'siege', state.config.siege.siegeCooldown, ctx.now,
    );

    const attackerAlliance = next.allianceOfColony[attackerColony];
    const defenderAlliance = next.allianceOfColony[defenderColony];
    const betrayal = AllianceRegistry.validateAndProcessBetrayal(next, ctx, attackerColony, defenderColony);
    next = betrayal.state;
    if (!betrayal.betrayal && attackerAlliance !== undefined && defenderAlliance !== undefined
      && attackerAlliance !== defenderAlliance) {
      next = AllianceRegistry.recordHostileAct(next, ctx, attackerAlliance, defenderAlliance);
    }

    const [lead] = forces;
    const payer = lead?.wallet ?? ctx.caller;
    next = FeeLedger.applyOperationFee(next, 'siege', 1, payer, ctx.effects, { receiptKey: `siege:${siegeId}` }).state;

    const { currency, treasuryAccount } = state.config;
    const contributions: StakeContribution[] = forces
      .filter(f => f.stake > 0)
      .map(f => ({ colonyId: f.colonyId, wallet: f.wallet, amount: f.stake }));
    for (const c of contributions) ctx.effects.transfer(currency, c.wallet, treasuryAccount, c.amount);

    const attackerForces: AttackForce[] = forces.map(f => ({ colonyId: f.colonyId, tokenIds: [...f.tokenIds] }));
    const preparationEndsAt = ctx.now + state.config.siege.preparationDuration;
    const siege: SiegeState = {
      id: siegeId,
      seasonId: season.id,
      territoryId,
      attackerColony,
      defenderColony,
      stake,
      contributions,
      attackerForces,
      attackerTokens: attackerForces.flatMap(f => f.tokenIds),
      defenderTokens: [],
      defenderWasRegistered: isRegisteredFor(state, defenderColony, season.id),
      declaredAt: ctx.now,
      preparationEndsAt,
      endsAt: preparationEndsAt + state.config.siege.battleDuration,
      state: 'preparation',
      winner: null,
      outcome: null,
      prizePool: 0,
      isBetrayalAttack: betrayal.betrayal,
      coordinatedAttackId: declaration.coordinatedAttackId ?? null,
      overridden: false,
    };

    next = produce(next, draft => {
      draft.sieges[siegeId] = siege;
      draft.activeSiegeByTerritory[territoryId] = siegeId;
      draft.nextSiegeId = siegeId + 1;
    });
    next = ColonyRegistry.addStress(next, attackerColony, 1, ctx.now);

    ctx.effects.emit('siegeDeclared', { siegeId, territoryId, attacker: attackerColony, defender: defenderColony });
    ctx.effects.log(
      `Siege ${siegeId}: ${attackerColony} → territory ${territoryId}${betrayal.betrayal ? ' (betrayal)' : ''}`,
      'combat',
    );
    return { state: next, siegeId };
  },

  /** Reads combat power once and writes the snapshot. */
  defend(state: WarState, ctx: ActionContext, siegeId: number, defenderTokens: string[]): WarState {
    const siege = requireSiege(state, siegeId);
    if (isTerminal(siege)) throw new InvalidStateTransitionError(`siege ${siegeId} is ${siege.state}`);
    if (state.snapshots[siegeId]) throw new InvalidStateTransitionError(`siege ${siegeId} is already snapshotted`);
    if (ctx.now < siege.preparationEndsAt) {
      throw new InvalidStateTransitionError(`siege ${siegeId} is preparing until ${siege.preparationEndsAt}`);
    }
    if (ctx.now >= siege.endsAt) throw new InvalidStateTransitionError(`siege ${siegeId} battle window has closed`);
    requireColonyOwner(ctx, siege.defenderColony);
    assertTokensStaked(ctx, siege.defenderColony, defenderTokens);

    const territory = requireTerritory(state, siege.territoryId);
    const attacker = mergePower(
      siege.attackerForces.map(f => ctx.ports.combatPower.powerOf(f.colonyId, f.tokenIds)),
    );
    const defender = ctx.ports.combatPower.powerOf(siege.defenderColony, defenderTokens);
    const snapshot: SiegeSnapshot = {
      siegeId,
      attacker,
      defender,
      attackerPower: attacker.total,
      defenderPower: effectiveDefense(defender.total, territory),
      takenAt: ctx.now,
    };

    ctx.effects.emit('siegeDefended', { siegeId, attackerPower: snapshot.attackerPower, defenderPower: snapshot.defenderPower });
    return produce(state, draft => {
      draft.snapshots[siegeId] = snapshot;
      const s = draft.sieges[siegeId];
      if (!s) return;
      s.defenderTokens = [...defenderTokens];
      s.state = 'active';
    });
  },

  /**
   * Settle a siege after its battle window. Undefended sieges fall to the
   * attacker. Terminal sieges reject every further transition.
   */
  resolveSiege(state: WarState, ctx: ActionContext, siegeId: number): WarState {
    const siege = requireSiege(state, siegeId);
    if (isTerminal(siege)) throw new InvalidStateTransitionError(`siege ${siegeId} is already ${siege.state}`);
    if (!siege.overridden && ctx.now < siege.endsAt) {
      throw new InvalidStateTransitionError(`siege ${siegeId} ends at ${siege.endsAt}`);
    }

    const reason = cancellationReason(state, siege);
    if (reason !== null) return cancelSiege(state, ctx, siege, reason);

    const cfg = state.config.siege;
    const snapshot = state.snapshots[siegeId];
    const verdict: OutcomeVerdict = snapshot
      ? outcomeFor(cfg.outcomeBands, snapshot.attackerPower, snapshot.defenderPower)
      : { outcome: 'undefended', attackerWins: true, damage: cfg.undefendedDamage, ratioBps: Number.POSITIVE_INFINITY };
    if (verdict.attackerWins && atTerritoryCap(state, siege.attackerColony)) {
      return cancelSiege(state, ctx, siege, 'attacker is at its territory cap');
    }

    const next = verdict.attackerWins
      ? settleAttackerWin(state, ctx, siege, verdict)
      : settleDefenderWin(state, ctx, siege, verdict);

    ctx.effects.emit('siegeResolved', {
      siegeId,
      winner: verdict.attackerWins ? siege.attackerColony : siege.defenderColony,
      outcome: verdict.outcome,
    });
    return next;
  },

  overrideSiege(state: WarState, siegeId: number): WarState {
    const siege = requireSiege(state, siegeId);
    if (isTerminal(siege)) throw new InvalidStateTransitionError(`siege ${siegeId} is already ${siege.state}`);
    return produce(state, draft => {
      const s = draft.sieges[siegeId];
      if (s) s.overridden = true;
    });
  },
};

function settleAttackerWin(state: WarState, ctx: ActionContext, siege: SiegeState, verdict: OutcomeVerdict): WarState {
  const territory = requireTerritory(state, siege.territoryId);
  const bonus = siege.coordinatedAttackId !== null ? state.config.coordinatedAttack.bonusDamagePercent : 0;
  const damage = clampGauge(territory.damage + MathUtils.applyPercent(verdict.damage, 100 + bonus));
  const priorityEnds = ctx.now + state.config.territory.capturePriorityDuration;

  refundContributions(ctx, state, siege.contributions);

  let next = TerritoryLedger.transferControl(state, siege.territoryId, siege.attackerColony, ctx.now);
  next = produce(next, draft => {
    const t = draft.territories[siege.territoryId];
    if (t) {
      t.damage = damage;
      t.capturePriority = damage >= GAUGE_MAX
        ? { colonyId: siege.attackerColony, siegeId: siege.id, expiresAt: priorityEnds }
        : null;
    }
    const s = draft.sieges[siege.id];
    if (s) {
      s.state = 'completed';
      s.winner = siege.attackerColony;
      s.outcome = verdict.outcome;
    }
    delete draft.activeSiegeByTerritory[siege.territoryId];
    releaseSiegeTokens(draft, siege);
  });
  next = ColonyRegistry.recordSiegeResult(next, siege.attackerColony, true, 0);
  next = ColonyRegistry.recordSiegeResult(next, siege.defenderColony, false, 0);

  ctx.effects.emit('territoryCaptured', {
    territoryId: siege.territoryId,
    oldController: siege.defenderColony,
    newController: siege.attackerColony,
  });
  ctx.effects.log(`Siege ${siege.id}: ${siege.attackerColony} takes territory ${siege.territoryId} (${verdict.outcome})`, 'combat');
  return next;
}

/** Stake split: defender share, burn share, remainder to the season prize pool. */
function settleDefenderWin(state: WarState, ctx: ActionContext, siege: SiegeState, verdict: OutcomeVerdict): WarState {
  const cfg = state.config.siege;
  const { currency, treasuryAccount } = state.config;
  const defenderOwner = ctx.ports.custody.ownerOfColony(siege.defenderColony);

  const defenderShare = defenderOwner === null ? 0 : MathUtils.applyBps(siege.stake, cfg.defenderShareBps);
  const burnShare = MathUtils.applyBps(siege.stake, cfg.burnShareBps);
  const prize = siege.stake - defenderShare - burnShare;

  if (defenderOwner !== null) ctx.effects.transfer(currency, treasuryAccount, defenderOwner, defenderShare);
  ctx.effects.burn(currency, treasuryAccount, burnShare);

  let next = produce(state, draft => {
    const s = draft.sieges[siege.id];
    if (s) {
      s.state = 'completed';
      s.winner = siege.defenderColony;
      s.outcome = verdict.outcome;
      s.prizePool = prize;
    }
    const season = draft.seasons[siege.seasonId];
    if (season) season.prizePool += prize;
    delete draft.activeSiegeByTerritory[siege.territoryId];
    releaseSiegeTokens(draft, siege);
  });
  for (const c of siege.contributions) {
    next = ColonyRegistry.recordSiegeResult(next, c.colonyId, false, c.amount);
  }
  if (!siege.contributions.some(c => c.colonyId === siege.attackerColony)) {
    next = ColonyRegistry.recordSiegeResult(next, siege.attackerColony, false, 0);
  }
  next = ColonyRegistry.recordSiegeResult(next, siege.defenderColony, true, 0);

  ctx.effects.log(`Siege ${siege.id}: ${siege.defenderColony} holds territory ${siege.territoryId} (${verdict.outcome})`, 'combat');
  return next;
}
