import {defineWorkspace} from 'vitest/config';

export default defineWorkspace([
    'packages/async-utils',
    'packages/shared/folder-watcher',
    'packages/dropwatch-core',
]);
