export * from './stream-archive-repository.js';
export * from './summary-markdown.js';
export * from './database.js';
