import type { HealthScenario, ScenarioCollection, ScenarioHarness, ScenarioOutcome } from './types';
import { layeredDefenseScenarios } from './layered_defense';
import { upkeepScenarios } from './upkeep';

export type { HealthScenario, ScenarioCollection, ScenarioHarness, ScenarioOutcome } from './types';

export const SCENARIO_COLLECTIONS: ScenarioCollection[] = [
    layeredDefenseScenarios,
    upkeepScenarios
];

// Flat list of all scenarios for easy iteration
export const ALL_SCENARIOS: HealthScenario[] = SCENARIO_COLLECTIONS.flatMap(
    collection => collection.scenarios
);

export const getScenariosByTag = (tag: string): HealthScenario[] =>
    ALL_SCENARIOS.filter(scenario => scenario.tags?.includes(tag));

export const runScenario = (scenario: HealthScenario): ScenarioOutcome => {
    const damageable = scenario.setup();
    const harness: ScenarioHarness = { damageable, deaths: [] };
    const unsubscribe = damageable.onDeath(event => {
        harness.deaths.push(event);
    });
    scenario.run(harness);
    unsubscribe();

    const checks = scenario.verify(harness);
    return {
        id: scenario.id,
        passed: Object.values(checks).every(v => v === true),
        checks,
        messages: damageable.messages
    };
};
