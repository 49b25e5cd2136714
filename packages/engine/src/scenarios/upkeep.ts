import { DAMAGE, HEALTH } from '../systems/classifications';
import { Damageable } from '../systems/health/damageable';
import { HealthBarSegment } from '../systems/health/health-bar-segment';
import { createReactionTable } from '../systems/reactions/reaction-table';
import type { ScenarioCollection } from './types';

/**
 * Upkeep Scenarios
 * Tests: healing order, scaling and structural changes between fights.
 */
export const upkeepScenarios: ScenarioCollection = {
    id: 'upkeep',
    name: 'Upkeep',
    description: 'Healing, scaling and layer management',

    scenarios: [
        {
            id: 'heal_fills_front_to_back',
            title: 'Healing: Front Layers Fill First',
            description: 'Healing tops up the first layer before the next and never overfills.',
            tags: ['heal'],

            setup: () => new Damageable(
                [new HealthBarSegment(HEALTH.Shield, 10, 40), new HealthBarSegment(HEALTH.Flesh, 50, 100)],
                { reactions: createReactionTable() }
            ),
            run: ({ damageable }) => {
                damageable.heal(45);
                damageable.heal(1000);
            },
            verify: ({ damageable }) => ({
                shieldFull: damageable.at(0)?.currentHitpoints === 40,
                fleshFull: damageable.at(1)?.currentHitpoints === 100,
                capped: damageable.currentHealth === damageable.maximumHealth
            })
        },
        {
            id: 'revive_rearms_death',
            title: 'Revive: Death Fires Again After Healing',
            description: 'Healing a destroyed entity re-arms the death signal.',
            tags: ['heal', 'death'],

            setup: () => new Damageable([new HealthBarSegment(HEALTH.Flesh, 10)], { reactions: createReactionTable() }),
            run: ({ damageable }) => {
                damageable.damage(10, DAMAGE.Poison);
                damageable.heal(5);
                damageable.damage(10, DAMAGE.Poison);
            },
            verify: ({ damageable, deaths }) => ({
                depleted: damageable.isDead,
                notifiedTwice: deaths.length === 2
            })
        },
        {
            id: 'scale_then_reinforce',
            title: 'Reinforcement: Scale And Add A Layer',
            description: 'Doubling a pool and bolting on armour keeps the aggregate in sync.',
            tags: ['scale', 'structure'],

            setup: () => new Damageable([new HealthBarSegment(HEALTH.Flesh, 30, 60)], { reactions: createReactionTable() }),
            run: ({ damageable }) => {
                damageable.scale(2);
                damageable.append(new HealthBarSegment(HEALTH.Armour, 25));
            },
            verify: ({ damageable }) => ({
                current: damageable.currentHealth === 85,
                maximum: damageable.maximumHealth === 145,
                layers: damageable.length === 2
            })
        }
    ]
};
