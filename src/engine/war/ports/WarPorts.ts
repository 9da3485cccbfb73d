import type { ICombatPowerProvider } from './ICombatPowerProvider';
import type { ICustodyProvider } from './ICustodyProvider';
import type { IValueTransfer } from './IValueTransfer';

export interface WarPorts {
  combatPower: ICombatPowerProvider;
  custody: ICustodyProvider;
  bank: IValueTransfer;
}
