import { ConfigurationError, type ValidationIssue } from '../../errors';
import { damageInfo } from '../damage-info';
import type {
    DamageClassification,
    DamageInfo,
    HealthClassification,
    ReactionRule,
    ReactionTransform
} from '../../types/registry';

/** Applied when no rule matches: full damage, bleeds through. */
export const identityTransform: ReactionTransform = amount => damageInfo(amount, false);

const describeRule = (rule: ReactionRule, index?: number): string =>
    rule.label ?? (index === undefined ? 'reaction rule' : `reaction rule #${index}`);

/**
 * Maps (health, damage) classification pairs to damage transforms.
 * Built once at startup, then sealed and shared read-only between damageables.
 */
export class ReactionTable {
    private readonly byHealth = new Map<HealthClassification, Map<DamageClassification, ReactionTransform>>();
    private readonly registered: ReactionRule[] = [];
    private sealed = false;
    private pairCount = 0;

    get isSealed(): boolean {
        return this.sealed;
    }

    /** Number of registered (health, damage) pairs. */
    get size(): number {
        return this.pairCount;
    }

    rules(): readonly ReactionRule[] {
        return [...this.registered];
    }

    validate(rule: ReactionRule): ValidationIssue[] {
        const issues: ValidationIssue[] = [];
        const health = rule.healthClassifications;
        const damage = rule.damageClassifications;

        if (health.length === 0) {
            issues.push({ path: 'healthClassifications', message: 'Must name exactly one health classification (got none)' });
        } else if (health.length > 1) {
            issues.push({
                path: 'healthClassifications',
                message: `Must name exactly one health classification (got ${health.map(h => h.id).join(', ')})`
            });
        }
        if (damage.length === 0) {
            issues.push({ path: 'damageClassifications', message: 'Must name at least one damage classification' });
        }
        if (typeof rule.transform !== 'function') {
            issues.push({ path: 'transform', message: 'Expected a transform function' });
        }

        const seen = new Set<DamageClassification>();
        damage.forEach((d, i) => {
            if (seen.has(d)) {
                issues.push({ path: `damageClassifications[${i}]`, message: `Duplicate "${d.id}"` });
            }
            seen.add(d);
        });

        if (health.length === 1) {
            const existing = this.byHealth.get(health[0]);
            damage.forEach((d, i) => {
                if (existing?.has(d)) {
                    issues.push({
                        path: `damageClassifications[${i}]`,
                        message: `(${health[0].id}, ${d.id}) already has a registered reaction`
                    });
                }
            });
        }
        return issues;
    }

    /**
     * Adds a rule. Rejects the whole rule (no pair registered) on any issue.
     */
    register(rule: ReactionRule): this {
        const name = describeRule(rule, this.registered.length);
        if (this.sealed) {
            throw new ConfigurationError(`Cannot register ${name}: reaction table is sealed`);
        }
        const issues = this.validate(rule);
        if (issues.length > 0) {
            throw new ConfigurationError(
                `Invalid ${name}: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`,
                issues
            );
        }

        const health = rule.healthClassifications[0];
        let row = this.byHealth.get(health);
        if (!row) {
            row = new Map();
            this.byHealth.set(health, row);
        }
        for (const damage of rule.damageClassifications) {
            row.set(damage, rule.transform);
            this.pairCount++;
        }
        this.registered.push(rule);
        return this;
    }

    registerAll(rules: readonly ReactionRule[]): this {
        rules.forEach(rule => this.register(rule));
        return this;
    }

    lookup(health: HealthClassification, damage: DamageClassification): ReactionTransform | undefined {
        return this.byHealth.get(health)?.get(damage);
    }

    has(health: HealthClassification, damage: DamageClassification): boolean {
        return this.lookup(health, damage) !== undefined;
    }

    /**
     * Transforms an incoming amount. A missing rule is not an error here:
     * the identity transform applies.
     */
    resolve(health: HealthClassification, damage: DamageClassification, amount: number): DamageInfo {
        const transform = this.lookup(health, damage) ?? identityTransform;
        const info = transform(amount);
        return damageInfo(info.amount, info.capped);
    }

    seal(): this {
        this.sealed = true;
        return this;
    }
}

export const createReactionTable = (rules: readonly ReactionRule[] = []): ReactionTable =>
    new ReactionTable().registerAll(rules);
