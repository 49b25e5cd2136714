import { InvalidArgumentError } from '../errors';
import type {
    BuiltinDamageClassId,
    BuiltinHealthClassId,
    ClassificationKind,
    DamageClassification,
    HealthClassification
} from '../types/registry';

const healthClasses = new Map<string, HealthClassification>();
const damageClasses = new Map<string, DamageClassification>();

const assertValidId = (kind: ClassificationKind, id: string): void => {
    if (typeof id !== 'string' || id.length === 0 || id.trim() !== id) {
        throw new InvalidArgumentError(`Invalid ${kind} classification id "${String(id)}"`);
    }
};

/**
 * Interns a health classification. The same id always yields the same object.
 */
export const healthClass = (id: string): HealthClassification => {
    const existing = healthClasses.get(id);
    if (existing) return existing;
    assertValidId('health', id);
    const created: HealthClassification = Object.freeze({ kind: 'health', id });
    healthClasses.set(id, created);
    return created;
};

/**
 * Interns a damage classification. The same id always yields the same object.
 */
export const damageClass = (id: string): DamageClassification => {
    const existing = damageClasses.get(id);
    if (existing) return existing;
    assertValidId('damage', id);
    const created: DamageClassification = Object.freeze({ kind: 'damage', id });
    damageClasses.set(id, created);
    return created;
};

export const isHealthClassRegistered = (id: string): boolean => healthClasses.has(id);

export const isDamageClassRegistered = (id: string): boolean => damageClasses.has(id);

export const listHealthClasses = (): HealthClassification[] => [...healthClasses.values()];

export const listDamageClasses = (): DamageClassification[] => [...damageClasses.values()];

export const HEALTH: Readonly<Record<BuiltinHealthClassId, HealthClassification>> = {
    Flesh: healthClass('Flesh'),
    Armour: healthClass('Armour'),
    Shield: healthClass('Shield'),
    Structure: healthClass('Structure')
};

export const DAMAGE: Readonly<Record<BuiltinDamageClassId, DamageClassification>> = {
    Slash: damageClass('Slash'),
    Pierce: damageClass('Pierce'),
    Impact: damageClass('Impact'),
    Fire: damageClass('Fire'),
    Frost: damageClass('Frost'),
    Poison: damageClass('Poison')
};
