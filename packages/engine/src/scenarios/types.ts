import type { Damageable, DeathEvent } from '../systems/health/damageable';

export interface ScenarioHarness {
    damageable: Damageable;
    deaths: DeathEvent[];
}

/**
 * A self-checking walkthrough: build a damageable, drive it, inspect the result.
 */
export interface HealthScenario {
    id: string;
    title: string;
    description: string;
    /** Tags for filtering and searching */
    tags?: string[];
    setup: () => Damageable;
    run: (harness: ScenarioHarness) => void;
    verify: (harness: ScenarioHarness) => Record<string, boolean>;
}

/**
 * Scenario collection organized by mechanic
 */
export interface ScenarioCollection {
    id: string;
    name: string;
    description: string;
    scenarios: HealthScenario[];
}

export interface ScenarioOutcome {
    id: string;
    passed: boolean;
    checks: Record<string, boolean>;
    messages: readonly string[];
}
