import { InvalidArgumentError, OutOfRangeError } from '../../errors';
import type { DamageClassification, HealthClassification } from '../../types/registry';
import { sanitizeDamageAmount } from '../damage-info';
import { readEngineConfig, type EngineConfig } from '../engine-config';
import {
    appendTaggedMessage,
    shouldRecord,
    type EngineLogChannel,
    type EngineLogLevel
} from '../engine-messages';
import { getReactionTable } from '../reactions/reaction-bootstrap';
import type { ReactionTable } from '../reactions/reaction-table';
import { HealthBarSegment } from './health-bar-segment';

export type HealthMutation = 'damage' | 'heal' | 'scale' | 'append' | 'removeLast';

export interface DeathEvent {
    target: Damageable;
    cause: HealthMutation;
    damageClassification?: DamageClassification;
}

export type DeathListener = (event: DeathEvent) => void;

export interface SegmentDamageStep {
    index: number;
    healthClassification: HealthClassification;
    incoming: number;
    transformed: number;
    applied: number;
    capped: boolean;
    remainingHitpoints: number;
}

export interface DamageResolution {
    damageClassification: DamageClassification;
    requested: number;
    applied: number;
    /** Damage that reached no segment: stopped by a capped reaction or past the last layer. */
    discarded: number;
    steps: SegmentDamageStep[];
    died: boolean;
}

export interface DamageableOptions {
    /** Defaults to the shared table, resolved on every hit. */
    reactions?: ReactionTable;
    label?: string;
    logLevel?: EngineLogLevel;
    messageLimit?: number;
}

// A segment belongs to at most one damageable at a time.
const segmentOwners = new WeakMap<HealthBarSegment, Damageable>();

const isPositiveInteger = (value: number | undefined): value is number =>
    value !== undefined && Number.isInteger(value) && value > 0;

const formatAmount = (value: number): string => `${Math.round(value * 100) / 100}`;

/**
 * Ordered stack of health segments. Damage walks the stack front to back,
 * transformed per segment by the reaction table; healing fills it in the same order.
 */
export class Damageable implements Iterable<HealthBarSegment> {
    readonly label: string;
    private readonly segmentList: HealthBarSegment[];
    private readonly deathListeners = new Set<DeathListener>();
    private readonly reactionOverride?: ReactionTable;
    private readonly config: EngineConfig;
    private log: string[] = [];
    private alive: boolean;

    constructor(segments: readonly (HealthBarSegment | null | undefined)[], options: DamageableOptions = {}) {
        if (segments.length === 0) {
            throw new InvalidArgumentError('A damageable needs at least one segment');
        }
        const owned: HealthBarSegment[] = [];
        segments.forEach((segment, i) => {
            if (segment == null) throw new InvalidArgumentError(`Segment ${i} is absent`);
            if (owned.includes(segment)) throw new InvalidArgumentError(`Segment ${i} is listed twice`);
            if (segmentOwners.has(segment)) throw new InvalidArgumentError(`Segment ${i} already belongs to another damageable`);
            owned.push(segment);
        });
        owned.forEach(segment => segmentOwners.set(segment, this));

        const env = readEngineConfig();
        this.segmentList = owned;
        this.label = options.label ?? 'Damageable';
        this.reactionOverride = options.reactions;
        this.config = {
            logLevel: options.logLevel ?? env.logLevel,
            messageLimit: isPositiveInteger(options.messageLimit) ? options.messageLimit : env.messageLimit
        };
        this.alive = this.currentHealth > 0;
    }

    get currentHealth(): number {
        return this.segmentList.reduce((sum, s) => sum + s.currentHitpoints, 0);
    }

    get maximumHealth(): number {
        return this.segmentList.reduce((sum, s) => sum + s.maximumHitpoints, 0);
    }

    get isDead(): boolean {
        return !this.alive;
    }

    get length(): number {
        return this.segmentList.length;
    }

    /** Snapshot; reordering it does not affect this damageable. */
    get segments(): readonly HealthBarSegment[] {
        return [...this.segmentList];
    }

    get messages(): readonly string[] {
        return [...this.log];
    }

    at(index: number): HealthBarSegment | undefined {
        return this.segmentList.at(index);
    }

    [Symbol.iterator](): Iterator<HealthBarSegment> {
        return [...this.segmentList][Symbol.iterator]();
    }

    onDeath(listener: DeathListener): () => void {
        this.deathListeners.add(listener);
        return () => this.offDeath(listener);
    }

    offDeath(listener: DeathListener): void {
        this.deathListeners.delete(listener);
    }

    damage(amount: number, damageClassification: DamageClassification): DamageResolution {
        const table = this.reactionOverride ?? getReactionTable();
        const requested = sanitizeDamageAmount(amount);
        const steps: SegmentDamageStep[] = [];
        let remaining = requested;
        let discarded = 0;

        for (let i = 0; i < this.segmentList.length && remaining > 0; i++) {
            const segment = this.segmentList[i];
            if (segment.currentHitpoints <= 0) continue;

            const info = table.resolve(segment.healthClassification, damageClassification, remaining);
            const applied = Math.min(info.amount, segment.currentHitpoints);
            segment.currentHitpoints -= applied;
            const leftover = info.amount - applied;

            steps.push({
                index: i,
                healthClassification: segment.healthClassification,
                incoming: remaining,
                transformed: info.amount,
                applied,
                capped: info.capped,
                remainingHitpoints: segment.currentHitpoints
            });
            if (segment.currentHitpoints <= 0) {
                this.record('VERBOSE', 'COMBAT', `${this.label}: ${segment.healthClassification.id} layer broken by ${damageClassification.id}`);
            }

            if (info.capped) {
                if (leftover > 0) {
                    discarded += leftover;
                    this.record('VERBOSE', 'COMBAT', `${this.label}: ${segment.healthClassification.id} stopped ${formatAmount(leftover)} ${damageClassification.id}`);
                }
                remaining = 0;
                break;
            }
            remaining = leftover;
        }
        discarded += Math.max(0, remaining);

        const applied = steps.reduce((sum, step) => sum + step.applied, 0);
        this.record('DEBUG', 'COMBAT', `${this.label}: ${formatAmount(requested)} ${damageClassification.id} -> ${formatAmount(applied)} applied`);
        const died = this.settle('damage', damageClassification);
        return {
            damageClassification,
            requested,
            applied,
            discarded,
            steps,
            died
        };
    }

    /**
     * Fills segments front to back, each up to its own maximum.
     * Returns the amount actually restored.
     */
    heal(amount: number): number {
        let remaining = sanitizeDamageAmount(amount);
        let healed = 0;
        for (const segment of this.segmentList) {
            if (remaining <= 0) break;
            const room = Math.max(0, segment.maximumHitpoints - segment.currentHitpoints);
            const given = Math.min(room, remaining);
            segment.currentHitpoints += given;
            remaining -= given;
            healed += given;
        }
        if (healed > 0) this.record('INFO', 'HEALING', `${this.label} healed ${formatAmount(healed)}`);
        this.settle('heal');
        return healed;
    }

    scale(multiplier: number): void {
        this.segmentList.forEach(s => s.scale(multiplier));
        this.settle('scale');
    }

    scaleMaxHitpoints(multiplier: number): void {
        this.segmentList.forEach(s => s.scaleMax(multiplier));
        this.settle('scale');
    }

    scaleCurrentHitpoints(multiplier: number): void {
        this.segmentList.forEach(s => s.scaleCurrent(multiplier));
        this.settle('scale');
    }

    append(segment: HealthBarSegment | null | undefined): void {
        if (segment == null) {
            throw new InvalidArgumentError('Cannot append an absent segment');
        }
        const owner = segmentOwners.get(segment);
        if (owner === this) {
            throw new InvalidArgumentError('Segment already belongs to this damageable');
        }
        if (owner) {
            throw new InvalidArgumentError('Segment already belongs to another damageable');
        }
        this.segmentList.push(segment);
        segmentOwners.set(segment, this);
        this.settle('append');
    }

    removeLast(): HealthBarSegment {
        const last = this.segmentList[this.segmentList.length - 1];
        if (this.segmentList.length <= 1 || !last) {
            throw new OutOfRangeError('Cannot remove the only remaining segment');
        }
        this.segmentList.pop();
        segmentOwners.delete(last);
        this.settle('removeLast');
        return last;
    }

    private record(level: EngineLogLevel, channel: EngineLogChannel, text: string): void {
        if (!shouldRecord(level, this.config.logLevel)) return;
        this.log = appendTaggedMessage(this.log, text, level, channel, this.config.messageLimit);
    }

    /**
     * Tracks the >0 -> 0 transition. Returns true when this call killed the damageable.
     */
    private settle(cause: HealthMutation, damageClassification?: DamageClassification): boolean {
        const aliveNow = this.currentHealth > 0;
        if (aliveNow) {
            this.alive = true;
            return false;
        }
        if (!this.alive) return false;

        this.alive = false;
        this.record('CRITICAL', 'COMBAT', `${this.label} destroyed`);
        this.notifyDeath({ target: this, cause, damageClassification });
        return true;
    }

    private notifyDeath(event: DeathEvent): void {
        const errors: unknown[] = [];
        for (const listener of [...this.deathListeners]) {
            try {
                listener(event);
            } catch (err) {
                errors.push(err);
            }
        }
        // Every listener runs; the first failure surfaces to the caller.
        if (errors.length > 0) throw errors[0];
    }
}
