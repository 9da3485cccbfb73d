// ─────────────────────────────────────────────
//  Fee Ledger: currency-agnostic operation fees
//  amount = floor(base * multiplierBps / 10000 * quantity)
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { WarState } from '../state/WarState';
import type { EffectQueue } from '../state/EffectQueue';
import type { OperationFee, OperationName } from '../data/types/Fee';
import { BPS_DENOMINATOR, MathUtils } from '@/engine/utils/MathUtils';
import { ConfigurationError } from '../WarErrors';

export interface FeeOptions {
  /** Skip the charge when this key has already been collected. */
  receiptKey?: string;
  /** Extra percent scaling on top of the fee's own multiplier (100 = unchanged). */
  scalePercent?: number;
}

export interface FeeCharge {
  state: WarState;
  amount: number;
}

export const FeeLedger = {
  quoteOperationFee(state: WarState, name: OperationName, quantity = 1): number {
    const fee = state.fees[name];
    if (!fee.enabled) return 0;
    return Math.floor((fee.baseAmount * fee.multiplierBps * quantity) / BPS_DENOMINATOR);
  },

  configureOperationFee(state: WarState, name: OperationName, fee: OperationFee): WarState {
    validateFee(name, fee);
    return produce(state, draft => {
      draft.fees[name] = { ...fee };
    });
  },

  /**
   * Collect the fee from `payer`. A disabled fee, a zero amount or an
   * already-seen receipt key leaves state and bank untouched.
   */
  applyOperationFee(
    state: WarState,
    name: OperationName,
    quantity: number,
    payer: string,
    effects: EffectQueue,
    options: FeeOptions = {},
  ): FeeCharge {
    const { receiptKey, scalePercent = 100 } = options;
    if (receiptKey !== undefined && state.feeReceipts[receiptKey] !== undefined) {
      return { state, amount: 0 };
    }

    const fee = state.fees[name];
    const amount = MathUtils.applyPercent(FeeLedger.quoteOperationFee(state, name, quantity), scalePercent);
    if (amount <= 0) return { state, amount: 0 };

    if (fee.burn) {
      effects.burn(fee.currency, payer, amount);
    } else {
      effects.transfer(fee.currency, payer, fee.beneficiary, amount);
    }
    effects.emit('feeCollected', { operation: name, payer, amount, burned: fee.burn });

    const next = receiptKey === undefined
      ? state
      : produce(state, draft => {
        draft.feeReceipts[receiptKey] = amount;
      });
    return { state: next, amount };
  },
};

function validateFee(name: OperationName, fee: OperationFee): void {
  if (fee.currency.length === 0) {
    throw new ConfigurationError(`fee '${name}' has no currency`);
  }
  if (!fee.burn && fee.beneficiary.length === 0) {
    throw new ConfigurationError(`fee '${name}' transfers but has no beneficiary`);
  }
  if (!Number.isInteger(fee.baseAmount) || fee.baseAmount < 0) {
    throw new ConfigurationError(`fee '${name}' base amount must be a non-negative integer`, { baseAmount: fee.baseAmount });
  }
  if (!MathUtils.isPositiveInt(fee.multiplierBps)) {
    throw new ConfigurationError(`fee '${name}' multiplier must be a positive integer (bps)`, { multiplierBps: fee.multiplierBps });
  }
}
