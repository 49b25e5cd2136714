import type { ReactionPack } from '../../data/contracts';
import { compileReactionPack, parseReactionPack } from '../../data/contract-parser';
import { CORE_REACTION_PACK } from '../../data/packs/core-pack';
import { appendTaggedMessage } from '../engine-messages';
import { readEngineConfig } from '../engine-config';
import type { ReactionRule } from '../../types/registry';
import { ReactionTable } from './reaction-table';

let sharedTable: ReactionTable | undefined;
let bootstrapLog: string[] = [];

export interface ReactionBootstrapResult {
    rulesRegistered: number;
    pairsRegistered: number;
}

export interface ReactionBootstrapOptions {
    /** Rules declared in code, registered after the pack's. */
    extraRules?: readonly ReactionRule[];
}

const installReactionTable = (
    input: ReactionPack | string,
    options: ReactionBootstrapOptions
): { table: ReactionTable; result: ReactionBootstrapResult } => {
    const pack = parseReactionPack(input);
    const table = new ReactionTable()
        .registerAll(compileReactionPack(pack))
        .registerAll(options.extraRules ?? [])
        .seal();
    sharedTable = table;

    const result = {
        rulesRegistered: table.rules().length,
        pairsRegistered: table.size
    };
    bootstrapLog = appendTaggedMessage(
        bootstrapLog,
        `Reaction table sealed: ${result.rulesRegistered} rules, ${result.pairsRegistered} pairs (pack v${pack.version})`,
        'INFO',
        'CONFIG',
        readEngineConfig().messageLimit
    );
    return { table, result };
};

/**
 * Builds and seals the shared reaction table. Must finish before any
 * damageable resolves damage against the shared table.
 */
export const bootstrapReactionTable = (
    input: ReactionPack | string = CORE_REACTION_PACK,
    options: ReactionBootstrapOptions = {}
): ReactionBootstrapResult => installReactionTable(input, options).result;

/** Reports the installed table's counts when one is already in place. */
export const ensureReactionTableBootstrapped = (): ReactionBootstrapResult => {
    if (sharedTable) {
        return {
            rulesRegistered: sharedTable.rules().length,
            pairsRegistered: sharedTable.size
        };
    }
    return bootstrapReactionTable();
};

/** The shared table, bootstrapped from the core pack on first use. */
export const getReactionTable = (): ReactionTable =>
    sharedTable ?? installReactionTable(CORE_REACTION_PACK, {}).table;

export const isReactionTableBootstrapped = (): boolean => sharedTable !== undefined;

export const getBootstrapMessages = (): readonly string[] => [...bootstrapLog];

export const resetReactionTableBootstrap = (): void => {
    sharedTable = undefined;
    bootstrapLog = [];
};
