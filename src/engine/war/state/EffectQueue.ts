// ─────────────────────────────────────────────
//  Effect Queue: side effects requested while an action executes.
//  Transfers, events and log lines are held here and only
//  flushed by WarStore after the new state has been committed.
// ─────────────────────────────────────────────

import type { IValueTransfer } from '../ports/IValueTransfer';
import type { WarEventMap, WarEventName } from '../WarEventBus';
import type { LogClass } from '@/engine/utils/Logger';
import { WarEventBus } from '../WarEventBus';
import { Logger } from '@/engine/utils/Logger';
import { InsufficientStakeError } from '../WarErrors';

export type TransferIntent =
  | { kind: 'transfer'; currency: string; from: string; to: string; amount: number }
  | { kind: 'burn'; currency: string; from: string; amount: number };

export class EffectQueue {
  private transfers: TransferIntent[] = [];
  private notifications: Array<() => void> = [];
  private pending = new Map<string, number>();    // currency:account → net delta

  constructor(private readonly bank: IValueTransfer) {}

  /** Balance the account will hold once every queued transfer has run. */
  available(account: string, currency: string): number {
    return this.bank.balanceOf(account, currency) + (this.pending.get(this.key(account, currency)) ?? 0);
  }

  transfer(currency: string, from: string, to: string, amount: number): void {
    if (amount <= 0 || from === to) return;
    this.reserve(from, currency, amount);
    this.adjust(to, currency, amount);
    this.transfers.push({ kind: 'transfer', currency, from, to, amount });
  }

  burn(currency: string, from: string, amount: number): void {
    if (amount <= 0) return;
    this.reserve(from, currency, amount);
    this.transfers.push({ kind: 'burn', currency, from, amount });
  }

  emit<K extends WarEventName>(event: K, payload: WarEventMap[K]): void {
    this.notifications.push(() => WarEventBus.emit(event, payload));
  }

  log(text: string, cls: LogClass = 'normal'): void {
    this.notifications.push(() => Logger.log(text, cls));
  }

  get queuedTransfers(): readonly TransferIntent[] {
    return this.transfers;
  }

  /** Run transfers, then notifications. Called once, after commit. */
  flush(): void {
    for (const intent of this.transfers) {
      if (intent.kind === 'transfer') {
        this.bank.transfer(intent.currency, intent.from, intent.to, intent.amount);
      } else {
        this.bank.burn(intent.currency, intent.from, intent.amount);
      }
    }
    for (const notify of this.notifications) notify();
    this.transfers = [];
    this.notifications = [];
    this.pending.clear();
  }

  private reserve(account: string, currency: string, amount: number): void {
    const balance = this.available(account, currency);
    if (balance < amount) {
      throw new InsufficientStakeError(`${account} cannot cover ${amount} ${currency}`, { balance, amount });
    }
    this.adjust(account, currency, -amount);
  }

  private adjust(account: string, currency: string, delta: number): void {
    const key = this.key(account, currency);
    this.pending.set(key, (this.pending.get(key) ?? 0) + delta);
  }

  private key(account: string, currency: string): string {
    return `${currency}:${account}`;
  }
}
