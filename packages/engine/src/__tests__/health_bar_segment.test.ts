import { describe, expect, it } from 'vitest';
import { HEALTH } from '../systems/classifications';
import { HealthBarSegment } from '../systems/health/health-bar-segment';

const snapshot = (s: HealthBarSegment) => ({
    current: s.currentHitpoints,
    max: s.maximumHitpoints,
    health: s.healthClassification.id
});

describe('health bar segment', () => {
    it('defaults maximum to the starting hitpoints', () => {
        expect(snapshot(new HealthBarSegment(HEALTH.Flesh, 100))).toEqual({ current: 100, max: 100, health: 'Flesh' });
        expect(snapshot(new HealthBarSegment(HEALTH.Armour, 30, 80))).toEqual({ current: 30, max: 80, health: 'Armour' });
    });

    it('clamps construction values into range', () => {
        expect(snapshot(new HealthBarSegment(HEALTH.Flesh, 120, 100))).toEqual({ current: 100, max: 100, health: 'Flesh' });
        expect(snapshot(new HealthBarSegment(HEALTH.Flesh, -5, -1))).toEqual({ current: 0, max: 0, health: 'Flesh' });
    });

    it('scales current and maximum together', () => {
        const segment = new HealthBarSegment(HEALTH.Shield, 20, 40).scale(1.5);
        expect(snapshot(segment)).toEqual({ current: 30, max: 60, health: 'Shield' });
    });

    it('scales only the maximum without re-clamping current', () => {
        const segment = new HealthBarSegment(HEALTH.Shield, 40, 40).scaleMax(0.5);
        expect(snapshot(segment)).toEqual({ current: 40, max: 20, health: 'Shield' });
    });

    it('scales only current hitpoints', () => {
        const segment = new HealthBarSegment(HEALTH.Shield, 40, 50).scaleCurrent(0.25);
        expect(snapshot(segment)).toEqual({ current: 10, max: 50, health: 'Shield' });
    });

    it('scale equals scaleMax followed by scaleCurrent', () => {
        for (const m of [0, 0.3, 1, 2.5, -1]) {
            const a = new HealthBarSegment(HEALTH.Flesh, 35, 70).scale(m);
            const b = new HealthBarSegment(HEALTH.Flesh, 35, 70).scaleMax(m).scaleCurrent(m);
            expect(snapshot(a)).toEqual(snapshot(b));
        }
    });

    it('passes negative multipliers through unvalidated', () => {
        expect(snapshot(new HealthBarSegment(HEALTH.Flesh, 10, 20).scale(-1))).toEqual({ current: -10, max: -20, health: 'Flesh' });
    });

    it('set copies every field without aliasing', () => {
        const source = new HealthBarSegment(HEALTH.Armour, 15, 25);
        const target = new HealthBarSegment(HEALTH.Flesh, 100).set(source);

        expect(snapshot(target)).toEqual({ current: 15, max: 25, health: 'Armour' });
        source.scale(2);
        expect(snapshot(target)).toEqual({ current: 15, max: 25, health: 'Armour' });
    });

    it('times returns a scaled copy and leaves the receiver alone', () => {
        const base = new HealthBarSegment(HEALTH.Structure, 50, 200);
        const doubled = base.times(2);

        expect(doubled).not.toBe(base);
        expect(snapshot(doubled)).toEqual({ current: 100, max: 400, health: 'Structure' });
        expect(snapshot(base)).toEqual({ current: 50, max: 200, health: 'Structure' });
    });

    it('reports depletion and fill fraction', () => {
        expect(new HealthBarSegment(HEALTH.Flesh, 0, 10).isDepleted).toBe(true);
        expect(new HealthBarSegment(HEALTH.Flesh, 5, 20).fraction).toBe(0.25);
        expect(new HealthBarSegment(HEALTH.Flesh, 0, 0).fraction).toBe(0);
    });
});
