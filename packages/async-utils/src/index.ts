export * from './PromiseQueue.js';
export * from './ListenerCleaner.js';
export * from './Id.js';
