// ─────────────────────────────────────────────
//  War Event Bus: war layer events
//  Payloads are emitted only after the action that
//  produced them has been committed by WarStore.
// ─────────────────────────────────────────────

import type { SiegeOutcome } from './data/types/Siege';
import type { TreatyKind } from './data/types/Alliance';
import type { OperationName } from './data/types/Fee';

export interface ScoutReport {
  territoryId: number;
  controller: string | null;
  damage: number;
  fortification: number;
}

export interface WarEventMap {
  seasonStarted:           { seasonId: number; startTime: number; resolutionEnd: number };
  seasonFinalized:         { seasonId: number; prizePool: number };
  seasonRewardClaimed:     { seasonId: number; colonyId: string; amount: number };
  colonyRegistered:        { colonyId: string; seasonId: number; owner: string; stake: number };
  colonyDeregistered:      { colonyId: string; seasonId: number };
  primaryColonyChanged:    { wallet: string; colonyId: string };
  preRegistered:           { colonyId: string; seasonId: number; stake: number };
  preRegistrationCancelled:{ colonyId: string; seasonId: number };
  preRegistrationActivated:{ colonyId: string; seasonId: number };
  territoryCaptured:       { territoryId: number; oldController: string | null; newController: string };
  territoryAbandoned:      { territoryId: number; colonyId: string };
  territoryRepaired:       { territoryId: number; colonyId: string };
  territoryFortified:      { territoryId: number; fortification: number };
  territoryScouted:        { raider: string; report: ScoutReport };
  maintenancePaid:         { territoryId: number; colonyId: string; amount: number };
  siegeDeclared:           { siegeId: number; territoryId: number; attacker: string; defender: string };
  siegeDefended:           { siegeId: number; attackerPower: number; defenderPower: number };
  siegeResolved:           { siegeId: number; winner: string; outcome: SiegeOutcome };
  siegeCancelled:          { siegeId: number };
  allianceFormed:          { allianceId: string; leader: string; invited: string[] };
  allianceInvited:         { allianceId: string; colonyId: string };
  allianceInvitationDeclined: { allianceId: string; colonyId: string };
  allianceMemberAdded:     { allianceId: string; colonyId: string };
  allianceActivated:       { allianceId: string; members: string[] };
  allianceMemberRemoved:   { allianceId: string; colonyId: string };
  allianceDeactivated:     { allianceId: string };
  betrayalRecorded:        { allianceId: string; betrayer: string; target: string; stability: number };
  forgivenessProposed:     { proposalId: number; allianceId: string; betrayer: string };
  forgivenessExecuted:     { proposalId: number; allianceId: string; betrayer: string; stability: number };
  treatyProposed:          { treatyId: number; fromAlliance: string; toAlliance: string; kind: TreatyKind };
  treatyAccepted:          { treatyId: number };
  treatyBroken:            { treatyId: number; brokenBy: string };
  taskForceFormed:         { taskForceId: string; seasonId: number; tokenCount: number };
  taskForceDisbanded:      { taskForceId: string };
  coordinatedAttackLaunched: { taskForceId: string; allianceId: string; siegeId: number };
  feeCollected:            { operation: OperationName; payer: string; amount: number; burned: boolean };
  logMessage:              { text: string; cls: string };
}

export type WarEventName = keyof WarEventMap;

type Listener<T> = (payload: T) => void;

class TypedWarEventBus {
  private listeners: { [K in WarEventName]?: Listener<WarEventMap[K]>[] } = {};

  on<K extends WarEventName>(event: K, listener: Listener<WarEventMap[K]>): void {
    const listeners: { [P in K]?: Listener<WarEventMap[P]>[] } = this.listeners;
    const arr: Listener<WarEventMap[K]>[] = listeners[event] ?? [];
    arr.push(listener);
    listeners[event] = arr;
  }

  off<K extends WarEventName>(event: K, listener: Listener<WarEventMap[K]>): void {
    const arr: Listener<WarEventMap[K]>[] | undefined = this.listeners[event];
    if (!arr) return;
    const idx = arr.indexOf(listener);
    if (idx !== -1) arr.splice(idx, 1);
  }

  emit<K extends WarEventName>(event: K, payload: WarEventMap[K]): void {
    const arr: Listener<WarEventMap[K]>[] | undefined = this.listeners[event];
    if (!arr) return;
    [...arr].forEach(fn => fn(payload));
  }

  clear(): void {
    this.listeners = {};
  }
}

export const WarEventBus = new TypedWarEventBus();
