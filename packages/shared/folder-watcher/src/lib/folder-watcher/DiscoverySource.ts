/**
 * Contract shared by every discovery strategy.
 *
 * A source produces candidate paths (files that appeared or changed). It does
 * no filtering and no deduplication; the consumer decides what a candidate is
 * worth. Both strategies report a lost watch root through `onFatal` instead of
 * spinning on a directory that no longer exists.
 */

export type DiscoveryMode = 'events' | 'polling';

export interface DiscoverySink {
    /** A file was created, or changed since it was last reported. */
    onCandidate(filePath: string): void;

    /**
     * The watched directory was deleted or became inaccessible.
     * Called at most once per session; the source stops emitting afterwards.
     */
    onFatal(error: DiscoveryError): void;
}

export interface DiscoverySource {
    readonly mode: DiscoveryMode;
    readonly directory: string;

    /**
     * Runs the initial full scan, emitting every file already present, then
     * begins live discovery. Rejects with a DiscoveryError if the directory
     * cannot be read.
     */
    start(sink: DiscoverySink): Promise<void>;

    stop(): Promise<void>;
}

export class DiscoveryError extends Error {
    constructor(
        message: string,
        public readonly directory: string,
        public readonly code?: string,
        cause?: unknown
    ) {
        super(`${message} (directory: ${directory})`, {cause});
        this.name = 'DiscoveryError';
    }
}

/** Error codes meaning "the root is gone or we may no longer read it". */
export const FATAL_ROOT_CODES = new Set(['ENOENT', 'ENOTDIR', 'EACCES', 'EPERM']);

export function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
