export * from './types/registry';
export * from './errors';
export * from './data';

// Systems
export * from './systems/classifications';
export * from './systems/damage-info';
export * from './systems/engine-messages';
export * from './systems/engine-config';

// Reactions
export * from './systems/reactions/reaction-table';
export * from './systems/reactions/transforms';
export * from './systems/reactions/reaction-bootstrap';

// Health
export * from './systems/health/health-bar-segment';
export * from './systems/health/damageable';

// Scenarios
export * from './scenarios';
