export * from './enums.js';
export * from './battle-snapshot.js';
export * from './decision.js';
