export * from './daemon.js';
export * from './runtime.js';
export * from './pid-lock.js';
export * from './file-logger.js';
