export * from './config/WatchConfig.js';
export * from './config/SupportedFileTypes.js';
export * from './errors/WatchErrors.js';
export * from './registry/FileRecord.js';
export * from './registry/ProcessedRegistry.js';
export * from './logic/ProcessingCallback.js';
export * from './logic/StabilityTracker.js';
export * from './logic/PendingQueue.js';
export * from './logic/WatchEngine.js';
export * from './logic/WatchController.js';
export * from './logic/CommandProcessor.js';
export * from './utils/TimeoutWrapper.js';
export {DiscoveryError, PathFilter} from '@dropwatch/folder-watcher';
