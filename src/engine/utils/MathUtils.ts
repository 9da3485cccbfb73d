export const BPS_DENOMINATOR = 10_000;

export const MathUtils = {
  /** Clamp a value between min and max */
  clamp(v: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, v));
  },

  /** floor(amount * bps / 10000) */
  applyBps(amount: number, bps: number): number {
    return Math.floor((amount * bps) / BPS_DENOMINATOR);
  },

  /** floor(amount * percent / 100) */
  applyPercent(amount: number, percent: number): number {
    return Math.floor((amount * percent) / 100);
  },

  isPositiveInt(v: number): boolean {
    return Number.isInteger(v) && v > 0;
  },
};
