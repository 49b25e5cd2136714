#!/usr/bin/env node
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { compileReactionPack, parseReactionPack } from '../src/data/contract-parser';
import { ConfigurationError } from '../src/errors';
import { createReactionTable } from '../src/systems/reactions/reaction-table';

const usage = () => {
    console.log('Usage: checkReactionPack <pack.json>');
    process.exit(1);
};

const file = process.argv[2];
if (!file) usage();

const full = resolve(process.cwd(), file ?? '');
if (!existsSync(full)) {
    console.error('File not found:', full);
    process.exit(2);
}

try {
    const pack = parseReactionPack(readFileSync(full, 'utf-8'));
    const table = createReactionTable(compileReactionPack(pack));
    console.log(`Reaction pack OK: ${table.rules().length} rules, ${table.size} pairs (v${pack.version})`);
    process.exit(0);
} catch (err) {
    if (err instanceof ConfigurationError) {
        console.error(err.message);
        process.exit(3);
    }
    throw err;
}
