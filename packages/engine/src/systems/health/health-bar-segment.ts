import type { HealthClassification } from '../../types/registry';

const nonNegative = (value: number): number => (Number.isNaN(value) ? 0 : Math.max(0, value));

/**
 * One layer of a damageable's hitpoint pool.
 *
 * Scaling is raw arithmetic: `scaleMax` may leave current above maximum and
 * negative multipliers are passed through. Damage and heal on the owning
 * `Damageable` are what keep `0 <= current <= maximum`.
 */
export class HealthBarSegment {
    currentHitpoints: number;
    maximumHitpoints: number;
    healthClassification: HealthClassification;

    constructor(healthClassification: HealthClassification, hitpoints: number, maximumHitpoints: number = hitpoints) {
        this.healthClassification = healthClassification;
        this.maximumHitpoints = nonNegative(maximumHitpoints);
        this.currentHitpoints = Math.min(nonNegative(hitpoints), this.maximumHitpoints);
    }

    get isDepleted(): boolean {
        return this.currentHitpoints <= 0;
    }

    /** current / maximum, 0 when the segment has no capacity. */
    get fraction(): number {
        return this.maximumHitpoints > 0 ? this.currentHitpoints / this.maximumHitpoints : 0;
    }

    scale(multiplier: number): this {
        this.currentHitpoints *= multiplier;
        this.maximumHitpoints *= multiplier;
        return this;
    }

    scaleMax(multiplier: number): this {
        this.maximumHitpoints *= multiplier;
        return this;
    }

    scaleCurrent(multiplier: number): this {
        this.currentHitpoints *= multiplier;
        return this;
    }

    set(other: HealthBarSegment): this {
        this.currentHitpoints = other.currentHitpoints;
        this.maximumHitpoints = other.maximumHitpoints;
        this.healthClassification = other.healthClassification;
        return this;
    }

    clone(): HealthBarSegment {
        return new HealthBarSegment(this.healthClassification, 0, 0).set(this);
    }

    /** Multiplication form of `scale`: a scaled copy, the receiver is untouched. */
    times(multiplier: number): HealthBarSegment {
        return this.clone().scale(multiplier);
    }
}
