export * from './event-queue.js';
export * from './shutdown-signal.js';
export * from './conversation-history.js';
export * from './random.js';
export * from './cooldown.js';
export * from './timeouts.js';
export * from './mode-manager.js';
export * from './comment-filter.js';
export * from './pending-comments.js';
export * from './prompt-composer.js';
export * from './summary-tracker.js';
export * from './stream-memory.js';
export * from './stream-metrics.js';
export * from './text-segmenter.js';
export * from './handler-registry.js';
export * from './stream-controller.js';
export * from './handlers/index.js';
export * from './producers/index.js';
