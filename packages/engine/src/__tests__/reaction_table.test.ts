import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors';
import { DAMAGE, HEALTH } from '../systems/classifications';
import { damageInfo } from '../systems/damage-info';
import { ReactionTable, createReactionTable, identityTransform } from '../systems/reactions/reaction-table';
import { absorbAll, passThrough, reaction, scaled } from '../systems/reactions/transforms';

describe('reaction table', () => {
    it('looks up the transform registered for an exact pair', () => {
        const halve = scaled(0.5);
        const table = createReactionTable([reaction(HEALTH.Armour, [DAMAGE.Slash, DAMAGE.Pierce], halve)]);

        expect(table.lookup(HEALTH.Armour, DAMAGE.Slash)).toBe(halve);
        expect(table.lookup(HEALTH.Armour, DAMAGE.Pierce)).toBe(halve);
        expect(table.lookup(HEALTH.Armour, DAMAGE.Fire)).toBeUndefined();
        expect(table.lookup(HEALTH.Flesh, DAMAGE.Slash)).toBeUndefined();
        expect(table.size).toBe(2);
    });

    it('falls back to full, uncapped damage when no rule matches', () => {
        const table = new ReactionTable();

        expect(table.resolve(HEALTH.Flesh, DAMAGE.Fire, 42)).toEqual({ amount: 42, capped: false });
        expect(identityTransform(7)).toEqual({ amount: 7, capped: false });
    });

    it('clamps negative transform output to zero', () => {
        const table = createReactionTable([
            reaction(HEALTH.Shield, DAMAGE.Frost, () => damageInfo(-5, true)),
            reaction(HEALTH.Shield, DAMAGE.Fire, () => ({ amount: -3, capped: false }))
        ]);

        expect(table.resolve(HEALTH.Shield, DAMAGE.Frost, 10)).toEqual({ amount: 0, capped: true });
        expect(table.resolve(HEALTH.Shield, DAMAGE.Fire, 10)).toEqual({ amount: 0, capped: false });
    });

    it('rejects a duplicate (health, damage) pair across rules', () => {
        const table = createReactionTable([reaction(HEALTH.Armour, [DAMAGE.Slash, DAMAGE.Impact], passThrough)]);

        expect(() => table.register(reaction(HEALTH.Armour, [DAMAGE.Fire, DAMAGE.Impact], absorbAll)))
            .toThrowError(ConfigurationError);
        // All-or-nothing: Fire from the rejected rule is not registered either.
        expect(table.lookup(HEALTH.Armour, DAMAGE.Fire)).toBeUndefined();
        expect(table.lookup(HEALTH.Armour, DAMAGE.Impact)).toBe(passThrough);
        expect(table.rules()).toHaveLength(1);
    });

    it('rejects rules with zero damage classifications', () => {
        const table = new ReactionTable();
        try {
            table.register({ healthClassifications: [HEALTH.Flesh], damageClassifications: [], transform: passThrough });
            expect.unreachable('register should throw');
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigurationError);
            expect(err instanceof ConfigurationError && err.issues.map(i => i.path)).toEqual(['damageClassifications']);
        }
    });

    it('rejects zero or several health classifications', () => {
        const table = new ReactionTable();

        expect(() => table.register({
            healthClassifications: [],
            damageClassifications: [DAMAGE.Slash],
            transform: passThrough
        })).toThrowError(/got none/);
        expect(() => table.register({
            healthClassifications: [HEALTH.Flesh, HEALTH.Armour],
            damageClassifications: [DAMAGE.Slash],
            transform: passThrough
        })).toThrowError(/got Flesh, Armour/);
        expect(table.size).toBe(0);
    });

    it('rejects a damage classification repeated inside one rule', () => {
        const issues = new ReactionTable().validate(reaction(HEALTH.Flesh, [DAMAGE.Slash, DAMAGE.Slash], passThrough));

        expect(issues).toEqual([{ path: 'damageClassifications[1]', message: 'Duplicate "Slash"' }]);
    });

    it('refuses registration once sealed but keeps resolving', () => {
        const table = createReactionTable([reaction(HEALTH.Armour, DAMAGE.Impact, absorbAll)]).seal();

        expect(table.isSealed).toBe(true);
        expect(() => table.register(reaction(HEALTH.Flesh, DAMAGE.Impact, passThrough))).toThrowError(/sealed/);
        expect(table.resolve(HEALTH.Armour, DAMAGE.Impact, 99)).toEqual({ amount: 0, capped: true });
    });

    it('names the rule label in error messages', () => {
        const table = createReactionTable([reaction(HEALTH.Flesh, DAMAGE.Poison, passThrough, 'FIRST')]);

        expect(() => table.register(reaction(HEALTH.Flesh, DAMAGE.Poison, passThrough, 'SECOND')))
            .toThrowError('Invalid SECOND: damageClassifications[0]: (Flesh, Poison) already has a registered reaction');
    });
});
