import type { WarConfigOverrides } from '@/engine/war/data/types/Config';
import type { InMemoryWarPorts } from '@/engine/war/ports/InMemoryPorts';
import type { SeasonState } from '@/engine/war/data/types/Season';
import { createInMemoryPorts } from '@/engine/war/ports/InMemoryPorts';
import { WarStore } from '@/engine/war/state/WarStore';
import { WarCoordinator } from '@/engine/coordinator/WarCoordinator';
import { WarEventBus } from '@/engine/war/WarEventBus';
import { loadWarConfig } from '@/engine/loader/WarConfigLoader';
import { Logger } from '@/engine/utils/Logger';

export const ADMIN = 'wallet-admin';
export const CURRENCY = 'CREDITS';
export const TREASURY = 'war:treasury';

/** Day-aligned start time: 19676 * 86400. */
export const T0 = 1_700_006_400;
export const DAY = 86_400;

export class TestClock {
  now = T0;

  set(time: number): void {
    this.now = time;
  }

  advance(seconds: number): void {
    this.now += seconds;
  }
}

export interface Harness {
  clock: TestClock;
  ports: InMemoryWarPorts;
  store: WarStore;
  war: WarCoordinator;
}

export function createHarness(overrides: WarConfigOverrides = {}): Harness {
  Logger.setEnabled(false);
  WarEventBus.clear();
  const clock = new TestClock();
  const ports = createInMemoryPorts();
  const store = new WarStore(ports, () => clock.now);
  const war = new WarCoordinator(store);
  war.initialize(ADMIN, loadWarConfig(overrides));
  return { clock, ports, store, war };
}

/** Colony owned by `wallet`, its tokens staked with the given power, wallet funded. */
export function addColony(
  h: Harness,
  colonyId: string,
  wallet: string,
  tokens: Record<string, number> = {},
  funds = 100_000,
): void {
  h.ports.custody.setColonyOwner(colonyId, wallet);
  h.ports.custody.stakeTokens(colonyId, Object.keys(tokens));
  for (const [tokenId, power] of Object.entries(tokens)) h.ports.combatPower.setTokenPower(tokenId, power);
  if (funds > 0) h.ports.bank.mint(wallet, CURRENCY, funds);
}

export function season(h: Harness, seasonId = h.store.getState().currentSeasonId): SeasonState {
  const s = h.store.getState().seasons[seasonId];
  if (!s) throw new Error(`season ${seasonId} missing`);
  return s;
}

/** Start a season and return its id. The clock stays in the registration window. */
export function openSeason(h: Harness): number {
  return h.war.startSeason(ADMIN);
}

export function toWarfare(h: Harness): void {
  h.clock.set(season(h).registrationEnd);
}

export function balance(h: Harness, account: string): number {
  return h.ports.bank.balanceOf(account, CURRENCY);
}

/** Each invited colony's owner accepts its invitation. */
export function joinAlliance(h: Harness, allianceId: string, colonies: string[]): void {
  for (const colonyId of colonies) {
    const owner = h.ports.custody.ownerOfColony(colonyId);
    if (owner === null) throw new Error(`colony ${colonyId} has no owner`);
    h.war.acceptInvitation(owner, allianceId, colonyId);
  }
}
