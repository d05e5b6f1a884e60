export * from './events.js';
export * from './modes.js';
export * from './state.js';
export * from './shutdown-rules.js';
export * from './collaborators.js';
export * from './errors.js';
export * from './summary.js';
