// ─────────────────────────────────────────────
//  IValueTransfer Interface
//  Currency movements requested by FeeLedger and stake handling.
//  Only called after the requesting action has been committed.
// ─────────────────────────────────────────────

export interface IValueTransfer {
  balanceOf(account: string, currency: string): number;
  transfer(currency: string, from: string, to: string, amount: number): void;
  burn(currency: string, from: string, amount: number): void;
}
