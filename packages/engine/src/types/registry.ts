/**
 * TYPE-SAFE REGISTRY
 *
 * Classification identifiers are interned objects handed out by
 * `systems/classifications`. Compare them by identity, never by `id`.
 */

export type ClassificationKind = 'health' | 'damage';

export interface Classification<K extends ClassificationKind = ClassificationKind> {
    readonly kind: K;
    readonly id: string;
}

/** What a segment is made of (Flesh, Armour, ...). */
export type HealthClassification = Classification<'health'>;

/** The kind of incoming damage (Slash, Fire, ...). */
export type DamageClassification = Classification<'damage'>;

/** Ids shipped with the engine. Packs may intern more at runtime. */
export type BuiltinHealthClassId = 'Flesh' | 'Armour' | 'Shield' | 'Structure';
export type BuiltinDamageClassId = 'Slash' | 'Pierce' | 'Impact' | 'Fire' | 'Frost' | 'Poison';

export interface DamageInfo {
    readonly amount: number;
    readonly capped: boolean;
}

export type ReactionTransform = (amount: number) => DamageInfo;

export interface ReactionRule {
    /** Exactly one entry. Kept as a list so malformed declarations can be rejected. */
    readonly healthClassifications: readonly HealthClassification[];
    readonly damageClassifications: readonly DamageClassification[];
    readonly transform: ReactionTransform;
    readonly label?: string;
}
