import type { DamageInfo } from '../types/registry';

/** Negative and NaN amounts become 0. */
export const sanitizeDamageAmount = (amount: number): number =>
    Number.isNaN(amount) ? 0 : Math.max(0, amount);

export const damageInfo = (amount: number, capped: boolean = false): DamageInfo =>
    Object.freeze({ amount: sanitizeDamageAmount(amount), capped });

export const DEFAULT_DAMAGE_INFO: DamageInfo = damageInfo(0, false);
