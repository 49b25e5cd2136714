/**
 * Declarative reaction pack. Packs are plain JSON-compatible data so they can
 * ship as files next to game content and be validated before registration.
 */

export interface ReactionEffect {
    /** Applied first. Defaults to 1. */
    multiplier?: number;
    /** Subtracted after the multiplier. Defaults to 0. */
    flat?: number;
    /** Upper bound on the transformed amount. */
    max?: number;
    /** Discard leftover damage instead of bleeding into the next segment. */
    capped?: boolean;
}

export interface ReactionDefinition {
    id: string;
    health: string[];
    damage: string[];
    effect: ReactionEffect;
    description?: string;
}

export interface ReactionPack {
    version: string;
    healthClasses?: string[];
    damageClasses?: string[];
    reactions: ReactionDefinition[];
}
