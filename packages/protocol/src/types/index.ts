// Re-export all protocol types

export * from './common.js';
export * from './entities.js';
export * from './visibility.js';
export * from './changes.js';
export * from './wire.js';
export * from './actions.js';
export * from './turns.js';
export * from './rules.js';
export * from './save.js';
export * from './audit.js';
