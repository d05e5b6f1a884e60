export * from './domain/stream/index.js';
export * from './app/stream/index.js';
export * from './infra/config/index.js';
export * from './infra/collaborators/index.js';
export * from './infra/persistence/index.js';
export * from './infra/prompts/template-loader.js';
export * from './infra/shutdown/index.js';
export * from './infra/scheduler/cron-adapter.js';
export * from './streamer-daemon/index.js';
