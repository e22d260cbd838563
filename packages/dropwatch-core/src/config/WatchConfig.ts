import * as path from 'path';
import {DEFAULT_TRANSIENT_SUFFIXES, normalizeExtension, type DiscoveryModeSetting} from "@dropwatch/folder-watcher";
import {ConfigurationError} from "../errors/WatchErrors.js";

export const DISCOVERY_MODES: readonly DiscoveryModeSetting[] = ['auto', 'events', 'polling'];

/**
 * Immutable snapshot handed to the engine. Changing anything means stopping
 * and starting again with a new snapshot.
 */
export interface WatchConfig {
    readonly inputDirectory: string;
    readonly acceptedExtensions: ReadonlySet<string>;
    readonly pollIntervalSeconds: number;
    readonly debounceSeconds: number;
    readonly recursive: boolean;
    readonly registryFilePath: string;
    readonly discoveryMode: DiscoveryModeSetting;
    readonly transientSuffixes: readonly string[];
    readonly createIfMissing: boolean;
}

export interface WatchOptions {
    inputDirectory: string;
    acceptedExtensions: Iterable<string>;
    /** Polling discovery interval (default 5) */
    pollIntervalSeconds?: number;
    /** How long size and mtime must stay unchanged before dispatch (default 2) */
    debounceSeconds?: number;
    recursive?: boolean;
    /** default ./dropwatch-registry.json */
    registryFilePath?: string;
    discoveryMode?: DiscoveryModeSetting;
    transientSuffixes?: Iterable<string>;
    /** Create the input directory on start instead of failing */
    createIfMissing?: boolean;
}

export const WATCH_DEFAULTS = {
    pollIntervalSeconds: 5,
    debounceSeconds: 2,
    recursive: false,
    registryFilePath: 'dropwatch-registry.json',
    discoveryMode: 'auto',
    createIfMissing: false,
} as const;

export function isDiscoveryMode(value: string): value is DiscoveryModeSetting {
    return DISCOVERY_MODES.some(mode => mode === value);
}

function requireNumber(value: number, option: string, {allowZero}: { allowZero: boolean }): number {
    if (!Number.isFinite(value) || value < 0 || (!allowZero && value === 0)) {
        throw new ConfigurationError(`Expected a ${allowZero ? 'non-negative' : 'positive'} number, got ${value}`, option);
    }
    return value;
}

/**
 * Validate options, apply defaults and freeze the result.
 */
export function createWatchConfig(options: WatchOptions): WatchConfig {
    if (typeof options.inputDirectory !== 'string' || options.inputDirectory.trim().length === 0) {
        throw new ConfigurationError('Input directory is required', 'inputDirectory');
    }

    const acceptedExtensions = new Set(
        Array.from(options.acceptedExtensions, normalizeExtension).filter(ext => ext.length > 1)
    );
    if (acceptedExtensions.size === 0) {
        throw new ConfigurationError('At least one accepted extension is required', 'acceptedExtensions');
    }

    const discoveryMode = options.discoveryMode ?? WATCH_DEFAULTS.discoveryMode;
    if (!isDiscoveryMode(discoveryMode)) {
        throw new ConfigurationError(`Unknown discovery mode '${discoveryMode}', expected one of ${DISCOVERY_MODES.join(', ')}`, 'discoveryMode');
    }

    const registryFilePath = options.registryFilePath ?? WATCH_DEFAULTS.registryFilePath;
    if (registryFilePath.trim().length === 0) {
        throw new ConfigurationError('Registry file path must not be empty', 'registryFilePath');
    }

    return Object.freeze({
        inputDirectory: path.resolve(options.inputDirectory),
        acceptedExtensions,
        pollIntervalSeconds: requireNumber(options.pollIntervalSeconds ?? WATCH_DEFAULTS.pollIntervalSeconds, 'pollIntervalSeconds', {allowZero: false}),
        debounceSeconds: requireNumber(options.debounceSeconds ?? WATCH_DEFAULTS.debounceSeconds, 'debounceSeconds', {allowZero: true}),
        recursive: options.recursive ?? WATCH_DEFAULTS.recursive,
        registryFilePath: path.resolve(registryFilePath),
        discoveryMode,
        transientSuffixes: Object.freeze(Array.from(options.transientSuffixes ?? DEFAULT_TRANSIENT_SUFFIXES)),
        createIfMissing: options.createIfMissing ?? WATCH_DEFAULTS.createIfMissing,
    });
}
