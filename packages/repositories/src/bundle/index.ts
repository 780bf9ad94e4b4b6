// Save bundle import/export.

export * from './types.js';
export * from './export.js';
export * from './import.js';
export * from './fs.js';
export * from './repository.js';
