// ─────────────────────────────────────────────
//  ICombatPowerProvider Interface
//  Building / card / evolution bonuses are computed elsewhere;
//  the war layer only reads the resulting power, and only at defend().
//  Implementations: InMemoryCombatPowerProvider (headless / tests)
// ─────────────────────────────────────────────

import type { PowerVector } from '../data/types/Siege';

export interface ICombatPowerProvider {
  /** Current power of the given staked tokens of a colony. */
  powerOf(colonyId: string, tokenIds: readonly string[]): PowerVector;
}
