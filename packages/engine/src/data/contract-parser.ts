import { ContractValidationError, type ValidationIssue } from '../errors';
import { damageClass, healthClass } from '../systems/classifications';
import { compileReactionEffect } from '../systems/reactions/transforms';
import type { ReactionRule } from '../types/registry';
import type { ReactionDefinition, ReactionEffect, ReactionPack } from './contracts';

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === 'object' && v !== null && !Array.isArray(v);
const isNum = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);
const isStr = (v: unknown): v is string => typeof v === 'string';
const push = (issues: ValidationIssue[], path: string, message: string) => {
    issues.push({ path, message });
};

const parseJsonLike = (input: unknown): unknown => {
    if (!isStr(input)) return input;
    try {
        return JSON.parse(input);
    } catch (err) {
        throw new ContractValidationError('ReactionPack', [
            { path: '$', message: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` }
        ]);
    }
};

const checkStringArray = (
    value: unknown,
    issues: ValidationIssue[],
    path: string,
    opts: { nonEmpty?: boolean; unique?: boolean } = {}
): value is string[] => {
    if (!Array.isArray(value)) {
        push(issues, path, 'Expected array');
        return false;
    }
    const seen = new Set<string>();
    if (opts.nonEmpty && value.length === 0) push(issues, path, 'Must not be empty');
    let ok = true;
    value.forEach((x, i) => {
        if (!isStr(x) || x.length === 0 || x.trim() !== x) {
            push(issues, `${path}[${i}]`, 'Expected non-empty string without surrounding whitespace');
            ok = false;
            return;
        }
        if (opts.unique) {
            if (seen.has(x)) push(issues, `${path}[${i}]`, `Duplicate "${x}"`);
            seen.add(x);
        }
    });
    return ok;
};

const checkEffect = (value: unknown, issues: ValidationIssue[], path: string) => {
    if (!isRecord(value)) return push(issues, path, 'Expected object');
    if (value.multiplier !== undefined && (!isNum(value.multiplier) || value.multiplier < 0)) {
        push(issues, `${path}.multiplier`, 'Expected number >= 0');
    }
    if (value.flat !== undefined && !isNum(value.flat)) push(issues, `${path}.flat`, 'Expected number');
    if (value.max !== undefined && (!isNum(value.max) || value.max < 0)) push(issues, `${path}.max`, 'Expected number >= 0');
    if (value.capped !== undefined && typeof value.capped !== 'boolean') push(issues, `${path}.capped`, 'Expected boolean');
};

const checkReaction = (
    value: unknown,
    issues: ValidationIssue[],
    path: string,
    claimed: Map<string, string>
) => {
    if (!isRecord(value)) return push(issues, path, 'Expected object');
    if (!isStr(value.id) || value.id.length === 0) push(issues, `${path}.id`, 'Expected non-empty string');

    if (value.description !== undefined && !isStr(value.description)) push(issues, `${path}.description`, 'Expected string');

    const health = value.health;
    const damage = value.damage;
    const healthOk = checkStringArray(health, issues, `${path}.health`);
    if (healthOk && health.length !== 1) {
        push(issues, `${path}.health`, `Expected exactly one health classification (got ${health.length})`);
    }
    const damageOk = checkStringArray(damage, issues, `${path}.damage`, { nonEmpty: true, unique: true });
    checkEffect(value.effect, issues, `${path}.effect`);

    if (healthOk && damageOk && health.length === 1) {
        const owner = isStr(value.id) ? value.id : path;
        const healthId = health[0];
        damage.forEach((d, i) => {
            const key = `${healthId}|${d}`;
            const previous = claimed.get(key);
            if (previous !== undefined) {
                push(issues, `${path}.damage[${i}]`, `(${healthId}, ${d}) already claimed by "${previous}"`);
            } else {
                claimed.set(key, owner);
            }
        });
    }
};

export const validateReactionPack = (input: unknown): ValidationIssue[] => {
    const issues: ValidationIssue[] = [];
    if (!isRecord(input)) {
        push(issues, '$', 'Expected object');
        return issues;
    }
    if (!isStr(input.version) || !/^1\./.test(input.version)) push(issues, '$.version', 'Expected v1.x');
    if (input.healthClasses !== undefined) checkStringArray(input.healthClasses, issues, '$.healthClasses', { unique: true });
    if (input.damageClasses !== undefined) checkStringArray(input.damageClasses, issues, '$.damageClasses', { unique: true });

    if (!Array.isArray(input.reactions)) {
        push(issues, '$.reactions', 'Expected array');
        return issues;
    }
    const claimed = new Map<string, string>();
    const ids = new Set<string>();
    input.reactions.forEach((reactionValue, i) => {
        const path = `$.reactions[${i}]`;
        checkReaction(reactionValue, issues, path, claimed);
        if (isRecord(reactionValue) && isStr(reactionValue.id)) {
            if (ids.has(reactionValue.id)) push(issues, `${path}.id`, `Duplicate "${reactionValue.id}"`);
            ids.add(reactionValue.id);
        }
    });
    return issues;
};

const copyEffect = (effect: ReactionEffect): ReactionEffect => ({
    ...(effect.multiplier !== undefined ? { multiplier: effect.multiplier } : {}),
    ...(effect.flat !== undefined ? { flat: effect.flat } : {}),
    ...(effect.max !== undefined ? { max: effect.max } : {}),
    ...(effect.capped !== undefined ? { capped: effect.capped } : {})
});

const isReactionPack = (input: unknown, issues: ValidationIssue[]): input is ReactionPack => issues.length === 0 && isRecord(input);

/**
 * Accepts an object or JSON text. Throws ContractValidationError listing every issue.
 */
export const parseReactionPack = (input: unknown): ReactionPack => {
    const parsed = parseJsonLike(input);
    const issues = validateReactionPack(parsed);
    if (!isReactionPack(parsed, issues)) throw new ContractValidationError('ReactionPack', issues);
    return {
        version: parsed.version,
        healthClasses: parsed.healthClasses ? [...parsed.healthClasses] : undefined,
        damageClasses: parsed.damageClasses ? [...parsed.damageClasses] : undefined,
        reactions: parsed.reactions.map((r): ReactionDefinition => ({
            id: r.id,
            health: [...r.health],
            damage: [...r.damage],
            effect: copyEffect(r.effect),
            ...(r.description !== undefined ? { description: r.description } : {})
        }))
    };
};

/**
 * Interns every classification the pack names and turns each reaction into a rule.
 */
export const compileReactionPack = (pack: ReactionPack): ReactionRule[] => {
    (pack.healthClasses ?? []).forEach(healthClass);
    (pack.damageClasses ?? []).forEach(damageClass);
    return pack.reactions.map(def => ({
        healthClassifications: def.health.map(healthClass),
        damageClassifications: def.damage.map(damageClass),
        transform: compileReactionEffect(def.effect),
        label: def.id
    }));
};
