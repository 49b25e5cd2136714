export * from './contracts';
export * from './contract-parser';
export * from './packs/core-pack';
