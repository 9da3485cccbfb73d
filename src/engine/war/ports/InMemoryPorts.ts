// ─────────────────────────────────────────────
//  In-memory collaborators: headless implementations of
//  the custody, combat-power and value-transfer ports, backed
//  by plain maps. Tests and local hosts run the engine on them.
// ─────────────────────────────────────────────

import type { PowerVector } from '../data/types/Siege';
import type { ICombatPowerProvider } from './ICombatPowerProvider';
import type { ICustodyProvider } from './ICustodyProvider';
import type { IValueTransfer } from './IValueTransfer';
import type { WarPorts } from './WarPorts';
import { InsufficientStakeError } from '../WarErrors';

export class InMemoryCombatPowerProvider implements ICombatPowerProvider {
  private powers = new Map<string, number>();
  private reads = 0;

  setTokenPower(tokenId: string, power: number): void {
    this.powers.set(tokenId, power);
  }

  /** Number of powerOf() calls served. */
  get readCount(): number {
    return this.reads;
  }

  powerOf(_colonyId: string, tokenIds: readonly string[]): PowerVector {
    this.reads += 1;
    const perToken: Record<string, number> = {};
    let total = 0;
    for (const tokenId of tokenIds) {
      const power = this.powers.get(tokenId) ?? 0;
      perToken[tokenId] = power;
      total += power;
    }
    return { perToken, total };
  }
}

export class InMemoryCustodyProvider implements ICustodyProvider {
  private owners = new Map<string, string>();
  private staked = new Map<string, Set<string>>();

  setColonyOwner(colonyId: string, wallet: string): void {
    this.owners.set(colonyId, wallet);
  }

  stakeTokens(colonyId: string, tokenIds: string[]): void {
    const set = this.staked.get(colonyId) ?? new Set<string>();
    for (const tokenId of tokenIds) set.add(tokenId);
    this.staked.set(colonyId, set);
  }

  unstakeToken(colonyId: string, tokenId: string): void {
    this.staked.get(colonyId)?.delete(tokenId);
  }

  ownerOfColony(colonyId: string): string | null {
    return this.owners.get(colonyId) ?? null;
  }

  isStaked(colonyId: string, tokenId: string): boolean {
    return this.staked.get(colonyId)?.has(tokenId) ?? false;
  }
}

export class InMemoryBank implements IValueTransfer {
  private balances = new Map<string, number>();
  private burned = new Map<string, number>();

  mint(account: string, currency: string, amount: number): void {
    const key = this.key(account, currency);
    this.balances.set(key, (this.balances.get(key) ?? 0) + amount);
  }

  totalBurned(currency: string): number {
    return this.burned.get(currency) ?? 0;
  }

  balanceOf(account: string, currency: string): number {
    return this.balances.get(this.key(account, currency)) ?? 0;
  }

  transfer(currency: string, from: string, to: string, amount: number): void {
    this.debit(from, currency, amount);
    this.mint(to, currency, amount);
  }

  burn(currency: string, from: string, amount: number): void {
    this.debit(from, currency, amount);
    this.burned.set(currency, this.totalBurned(currency) + amount);
  }

  private debit(account: string, currency: string, amount: number): void {
    const balance = this.balanceOf(account, currency);
    if (balance < amount) {
      throw new InsufficientStakeError(`insufficient ${currency} balance for ${account}`, { balance, amount });
    }
    this.balances.set(this.key(account, currency), balance - amount);
  }

  private key(account: string, currency: string): string {
    return `${currency}:${account}`;
  }
}

export interface InMemoryWarPorts extends WarPorts {
  combatPower: InMemoryCombatPowerProvider;
  custody: InMemoryCustodyProvider;
  bank: InMemoryBank;
}

export function createInMemoryPorts(): InMemoryWarPorts {
  return {
    combatPower: new InMemoryCombatPowerProvider(),
    custody: new InMemoryCustodyProvider(),
    bank: new InMemoryBank(),
  };
}
