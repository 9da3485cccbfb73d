// ─────────────────────────────────────────────
//  Territory Types
//  damage / fortification are independent 0-100 gauges.
// ─────────────────────────────────────────────

export type TerritoryType = 'production' | 'defense' | 'trade' | 'research' | 'recruitment';

export const TERRITORY_TYPES: readonly TerritoryType[] = [
  'production',
  'defense',
  'trade',
  'research',
  'recruitment',
];

export interface CapturePriority {
  colonyId: string;
  siegeId: number;
  expiresAt: number;
}

export interface TerritoryState {
  id: number;
  controller: string | null;      // Colony id, null once abandoned
  type: TerritoryType;
  bonusValue: number;             // bps
  damage: number;                 // 0-100
  fortification: number;          // 0-100
  lastMaintenance: number;
  lastRaid: number;
  capturedAt: number;
  capturePriority: CapturePriority | null;
}

export function territoryTypeFor(territoryId: number): TerritoryType {
  return TERRITORY_TYPES[(territoryId - 1) % TERRITORY_TYPES.length] ?? 'production';
}
