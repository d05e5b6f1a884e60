export * from './openai-text-generator.js';
export * from './mock-text-generator.js';
export * from './simulated-speech.js';
export * from './console-captions.js';
export * from './jsonl-chat-source.js';
