export * from './monologue-ticker.js';
export * from './chat-poller.js';
export * from './daily-summary-schedule.js';
