import { readFileSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import {
    compileReactionPack,
    CORE_REACTION_PACK,
    parseReactionPack,
    validateReactionPack
} from '../data';
import { ConfigurationError, ContractValidationError } from '../errors';
import { damageClass, healthClass, isHealthClassRegistered } from '../systems/classifications';
import { createReactionTable } from '../systems/reactions/reaction-table';

const loadJson = (relativeName: string): unknown => {
    const url = new URL(`../data/examples/${relativeName}`, import.meta.url);
    return JSON.parse(readFileSync(url, 'utf8'));
};

const loadText = (relativeName: string): string =>
    readFileSync(new URL(`../data/examples/${relativeName}`, import.meta.url), 'utf8');

describe('reaction pack contract parser', () => {
    it('parses and compiles the siege example', () => {
        const pack = parseReactionPack(loadJson('reaction-pack.siege.v1.json'));
        const rules = compileReactionPack(pack);
        const table = createReactionTable(rules);

        expect(pack.reactions.map(r => r.id)).toEqual(['STONE_RESISTS_SIEGE', 'TIMBER_SPLINTERS']);
        expect(isHealthClassRegistered('Stone')).toBe(true);
        expect(rules.map(r => r.label)).toEqual(['STONE_RESISTS_SIEGE', 'TIMBER_SPLINTERS']);
        expect(table.size).toBe(3);
        expect(table.resolve(healthClass('Stone'), damageClass('Siege'), 50)).toEqual({ amount: 40, capped: false });
        expect(table.resolve(healthClass('Stone'), damageClass('Siege'), 500)).toEqual({ amount: 100, capped: false });
        expect(table.resolve(healthClass('Timber'), damageClass('Impact'), 5)).toEqual({ amount: 15, capped: true });
    });

    it('accepts JSON text as well as objects', () => {
        const pack = parseReactionPack(loadText('reaction-pack.siege.v1.json'));
        expect(pack.version).toBe('1.0.0');
        expect(pack.reactions[1].description).toBe('Timber takes triple damage but the impact stops in the wall.');
    });

    it('reports every issue with its path', () => {
        const issues = validateReactionPack(loadJson('reaction-pack.invalid.json'));

        expect(issues.map(i => i.path)).toEqual([
            '$.version',
            '$.reactions[0].health',
            '$.reactions[1].health',
            '$.reactions[2].damage',
            '$.reactions[2].effect.multiplier'
        ]);
        expect(issues[1].message).toBe('Expected exactly one health classification (got 0)');
        expect(issues[2].message).toBe('Expected exactly one health classification (got 2)');
        expect(issues[3].message).toBe('Must not be empty');
    });

    it('throws structured validation errors that are configuration errors', () => {
        try {
            parseReactionPack(loadJson('reaction-pack.invalid.json'));
            expect.unreachable('parse should throw');
        } catch (err) {
            expect(err).toBeInstanceOf(ContractValidationError);
            expect(err).toBeInstanceOf(ConfigurationError);
            expect(err instanceof ContractValidationError && err.issues).toHaveLength(5);
        }
    });

    it('rejects duplicate pairs across reactions', () => {
        const issues = validateReactionPack({
            version: '1.0.0',
            reactions: [
                { id: 'A', health: ['Armour'], damage: ['Slash', 'Fire'], effect: {} },
                { id: 'B', health: ['Armour'], damage: ['Fire'], effect: { capped: true } }
            ]
        });

        expect(issues).toEqual([
            { path: '$.reactions[1].damage[0]', message: '(Armour, Fire) already claimed by "A"' }
        ]);
    });

    it('rejects malformed JSON text', () => {
        expect(() => parseReactionPack('{ not json')).toThrowError(/Invalid JSON/);
    });

    it('rejects a non-object root', () => {
        expect(validateReactionPack([])).toEqual([{ path: '$', message: 'Expected object' }]);
    });

    it('accepts the core pack', () => {
        expect(validateReactionPack(CORE_REACTION_PACK)).toEqual([]);
    });
});
