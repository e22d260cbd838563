//folder-watcher
export * from './folder-watcher/DiscoverySource.js';
export * from './folder-watcher/PathFilter.js';
export * from './folder-watcher/FolderWatcher.js';
export * from './folder-watcher/PollingWatcher.js';
export * from './folder-watcher/createDiscoverySource.js';

export * from './utils/ExistsAsync.js';
