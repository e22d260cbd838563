import {watch as fsWatch} from 'fs';
import {FolderWatcher} from "./FolderWatcher.js";
import {PollingWatcher} from "./PollingWatcher.js";
import {DiscoverySource, errorMessage} from "./DiscoverySource.js";

export type DiscoveryModeSetting = 'auto' | 'events' | 'polling';

export interface DiscoveryOptions {
    directory: string;
    mode: DiscoveryModeSetting;
    recursive: boolean;
    pollIntervalMs: number;
    coalesceMs?: number;
}

/**
 * Check whether native change notifications can be opened on the directory.
 * Some network and FUSE mounts refuse them outright.
 */
export function probeEventSupport(directory: string): boolean {
    try {
        const probe = fsWatch(directory);
        probe.on('error', (error: Error) => {
            console.warn(`[Discovery] Change notification probe reported an error:`, error.message);
        });
        probe.close();
        return true;
    } catch (error) {
        console.warn(`[Discovery] Change notifications unavailable for ${directory}: ${errorMessage(error)}`);
        return false;
    }
}

export function createDiscoverySource(options: DiscoveryOptions): DiscoverySource {
    let useEvents: boolean;
    switch (options.mode) {
        case 'events':
            useEvents = true;
            break;
        case 'polling':
            useEvents = false;
            break;
        case 'auto':
            useEvents = probeEventSupport(options.directory);
            break;
    }

    if (useEvents) {
        console.log(`[Discovery] Using filesystem events for ${options.directory}`);
        return new FolderWatcher({
            directory: options.directory,
            recursive: options.recursive,
            coalesceMs: options.coalesceMs,
        });
    }

    console.log(`[Discovery] Using polling every ${options.pollIntervalMs}ms for ${options.directory}`);
    return new PollingWatcher({
        directory: options.directory,
        intervalMs: options.pollIntervalMs,
        recursive: options.recursive,
    });
}
