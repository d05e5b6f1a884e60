export * from './marker-watcher.js';
