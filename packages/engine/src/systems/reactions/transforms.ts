import { damageInfo } from '../damage-info';
import type {
    DamageClassification,
    HealthClassification,
    ReactionRule,
    ReactionTransform
} from '../../types/registry';
import type { ReactionEffect } from '../../data/contracts';

interface CapOption {
    capped?: boolean;
}

export const passThrough: ReactionTransform = amount => damageInfo(amount, false);

/** Absorbs the hit entirely and stops it at this segment. */
export const absorbAll: ReactionTransform = () => damageInfo(0, true);

export const scaled = (multiplier: number, opts: CapOption = {}): ReactionTransform =>
    amount => damageInfo(amount * multiplier, opts.capped ?? false);

export const flatReduction = (reduction: number, opts: CapOption = {}): ReactionTransform =>
    amount => damageInfo(amount - reduction, opts.capped ?? false);

/** At most `limit` lands on the segment; anything above is discarded. */
export const cappedAt = (limit: number): ReactionTransform =>
    amount => damageInfo(Math.min(amount, limit), true);

/**
 * Chains transforms left to right. The result is capped if any stage capped.
 */
export const compose = (...transforms: ReactionTransform[]): ReactionTransform =>
    amount => {
        let current = damageInfo(amount, false);
        for (const transform of transforms) {
            const next = transform(current.amount);
            current = damageInfo(next.amount, current.capped || next.capped);
        }
        return current;
    };

export const compileReactionEffect = (effect: ReactionEffect): ReactionTransform => {
    const multiplier = effect.multiplier ?? 1;
    const flat = effect.flat ?? 0;
    const capped = effect.capped ?? false;
    const max = effect.max;
    return amount => {
        const reduced = amount * multiplier - flat;
        return damageInfo(max === undefined ? reduced : Math.min(reduced, max), capped);
    };
};

/**
 * Declares a rule for one health classification against one or more damage
 * classifications.
 */
export const reaction = (
    health: HealthClassification,
    damage: DamageClassification | readonly DamageClassification[],
    transform: ReactionTransform,
    label?: string
): ReactionRule => ({
    healthClassifications: [health],
    damageClassifications: 'kind' in damage ? [damage] : [...damage],
    transform,
    label
});
