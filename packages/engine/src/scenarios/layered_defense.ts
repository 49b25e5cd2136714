import { DAMAGE, HEALTH } from '../systems/classifications';
import { Damageable } from '../systems/health/damageable';
import { HealthBarSegment } from '../systems/health/health-bar-segment';
import { createReactionTable } from '../systems/reactions/reaction-table';
import { passThrough, reaction } from '../systems/reactions/transforms';
import { damageInfo } from '../systems/damage-info';
import type { ScenarioCollection } from './types';

const armourTable = () => createReactionTable([
    reaction(HEALTH.Armour, DAMAGE.Impact, amount => damageInfo(amount, true), 'ARMOUR_STOPS_IMPACT'),
    reaction(HEALTH.Armour, DAMAGE.Slash, passThrough, 'ARMOUR_PASSES_SLASH')
]);

/**
 * Layered Defense Scenarios
 * Tests: capped reactions, bleed-through, identity fallback and the death signal.
 */
export const layeredDefenseScenarios: ScenarioCollection = {
    id: 'layered_defense',
    name: 'Layered Defense',
    description: 'Damage flowing through armour and flesh layers',

    scenarios: [
        {
            id: 'capped_impact_stops_at_armour',
            title: 'Capped Impact: Armour Absorbs The Blow',
            description: 'A capped reaction never reaches the flesh behind the armour.',
            tags: ['capped', 'armour'],

            setup: () => new Damageable(
                [new HealthBarSegment(HEALTH.Armour, 400), new HealthBarSegment(HEALTH.Flesh, 100)],
                { reactions: armourTable(), label: 'Knight' }
            ),
            run: ({ damageable }) => {
                damageable.damage(600, DAMAGE.Impact);
            },
            verify: ({ damageable, deaths }) => ({
                armourBroken: damageable.at(0)?.currentHitpoints === 0,
                fleshUntouched: damageable.at(1)?.currentHitpoints === 100,
                stillAlive: deaths.length === 0
            })
        },
        {
            id: 'slash_bleeds_into_flesh',
            title: 'Bleed-Through: Slash Carries Past Armour',
            description: 'An uncapped reaction carries the leftover into the next layer.',
            tags: ['bleed-through', 'armour'],

            setup: () => new Damageable(
                [new HealthBarSegment(HEALTH.Armour, 50), new HealthBarSegment(HEALTH.Flesh, 100)],
                { reactions: armourTable(), label: 'Knight' }
            ),
            run: ({ damageable }) => {
                damageable.damage(80, DAMAGE.Slash);
            },
            verify: ({ damageable }) => ({
                armourBroken: damageable.at(0)?.currentHitpoints === 0,
                fleshWounded: damageable.at(1)?.currentHitpoints === 70,
                totalsMatch: damageable.currentHealth === 70
            })
        },
        {
            id: 'unlisted_damage_uses_identity',
            title: 'Fallback: No Rule Means Full Damage',
            description: 'Fire has no armour rule in this table, so it lands in full and bleeds through.',
            tags: ['fallback'],

            setup: () => new Damageable(
                [new HealthBarSegment(HEALTH.Armour, 30), new HealthBarSegment(HEALTH.Flesh, 30)],
                { reactions: armourTable() }
            ),
            run: ({ damageable }) => {
                damageable.damage(45, DAMAGE.Fire);
            },
            verify: ({ damageable }) => ({
                armourBroken: damageable.at(0)?.currentHitpoints === 0,
                fleshWounded: damageable.at(1)?.currentHitpoints === 15
            })
        },
        {
            id: 'death_fires_once',
            title: 'Death Signal: Fires Once Per Depletion',
            description: 'Overkill and repeated hits on a corpse notify observers a single time.',
            tags: ['death'],

            setup: () => new Damageable([new HealthBarSegment(HEALTH.Flesh, 20)], { reactions: armourTable() }),
            run: ({ damageable }) => {
                damageable.damage(15, DAMAGE.Slash);
                damageable.damage(50, DAMAGE.Slash);
                damageable.damage(50, DAMAGE.Slash);
            },
            verify: ({ damageable, deaths }) => ({
                depleted: damageable.currentHealth === 0,
                notifiedOnce: deaths.length === 1,
                causeRecorded: deaths[0]?.damageClassification === DAMAGE.Slash
            })
        }
    ]
};
