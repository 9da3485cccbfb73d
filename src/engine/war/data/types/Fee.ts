// ─────────────────────────────────────────────
//  Operation Fee Types
// ─────────────────────────────────────────────

export type OperationName =
  | 'siege'
  | 'raid'
  | 'maintenance'
  | 'repair'
  | 'fortify'
  | 'alliance'
  | 'coordinated_attack';

export interface OperationFee {
  currency: string;
  beneficiary: string;
  baseAmount: number;
  multiplierBps: number;          // 10000 = 1x
  burn: boolean;
  enabled: boolean;
}
