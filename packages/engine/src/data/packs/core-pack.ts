import type { ReactionPack } from '../contracts';

/**
 * Reactions every game starts from. Anything not listed takes full damage
 * and bleeds through.
 */
export const CORE_REACTION_PACK: ReactionPack = {
    version: '1.0.0',
    healthClasses: ['Flesh', 'Armour', 'Shield', 'Structure'],
    damageClasses: ['Slash', 'Pierce', 'Impact', 'Fire', 'Frost', 'Poison'],
    reactions: [
        {
            id: 'ARMOUR_DEFLECTS_BLADES',
            health: ['Armour'],
            damage: ['Slash', 'Pierce'],
            effect: { multiplier: 0.5 },
            description: 'Blades lose half their bite against plate; the rest carries on.'
        },
        {
            id: 'ARMOUR_ABSORBS_IMPACT',
            health: ['Armour'],
            damage: ['Impact'],
            effect: { capped: true },
            description: 'Blunt force dents the armour but never reaches what is underneath.'
        },
        {
            id: 'SHIELD_SOAKS_ELEMENTS',
            health: ['Shield'],
            damage: ['Fire', 'Frost'],
            effect: { multiplier: 2, capped: true }
        },
        {
            id: 'STRUCTURE_IGNORES_POISON',
            health: ['Structure'],
            damage: ['Poison'],
            effect: { multiplier: 0, capped: true }
        },
        {
            id: 'FLESH_BURNS',
            health: ['Flesh'],
            damage: ['Fire'],
            effect: { multiplier: 1.25 }
        }
    ]
};
