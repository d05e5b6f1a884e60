export * from './types.js';
export * from './delivery.js';
export * from './monologue-handler.js';
export * from './comment-handler.js';
export * from './greeting-handler.js';
export * from './summary-handler.js';
export * from './memory-handler.js';
export * from './theme-handler.js';
