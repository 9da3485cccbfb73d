import { WarEventBus } from '@/engine/war/WarEventBus';

export type LogClass = 'normal' | 'system' | 'economy' | 'combat' | 'alliance' | 'warning';

const CLASS_MAP: Record<LogClass, string> = {
  normal:   'le',
  system:   'ls',
  economy:  'lec',
  combat:   'lc',
  alliance: 'lal',
  warning:  'lw',
};

let consoleEnabled = true;

export const Logger = {
  log(text: string, type: LogClass = 'normal'): void {
    if (consoleEnabled) {
      console.log(`[${type.toUpperCase()}] ${text}`);
    }
    WarEventBus.emit('logMessage', { text, cls: CLASS_MAP[type] });
  },

  /** Console output only; logMessage events are always emitted. */
  setEnabled(enabled: boolean): void {
    consoleEnabled = enabled;
  },
};
