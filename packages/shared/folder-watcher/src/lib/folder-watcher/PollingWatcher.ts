import {readdir, stat} from "fs/promises";
import type {Dirent} from "fs";
import * as path from 'path';
import {
    DiscoveryError,
    DiscoverySink,
    DiscoverySource,
    errorCode,
    errorMessage,
    FATAL_ROOT_CODES
} from "./DiscoverySource.js";

export interface PollingWatcherOptions {
    directory: string;
    intervalMs: number;
    recursive?: boolean;
}

export interface FileSignature {
    size: number;
    mtimeMs: number;
}

/**
 * Paths present in `current` that were absent from `previous`, or present
 * with a different size or modification time.
 */
export function diffSnapshots(previous: ReadonlyMap<string, FileSignature>, current: ReadonlyMap<string, FileSignature>): string[] {
    const changed: string[] = [];
    for (const [filePath, signature] of current) {
        const before = previous.get(filePath);
        if (!before || before.size !== signature.size || before.mtimeMs !== signature.mtimeMs) {
            changed.push(filePath);
        }
    }
    return changed;
}

/**
 * PollingWatcher - Manual polling-based discovery (no chokidar)
 *
 * Lists the directory at a fixed interval using setInterval + readdir and
 * diffs the listing against the previous one.
 * Meant for network drives (SMB/NFS) where filesystem events don't work reliably.
 */
export class PollingWatcher implements DiscoverySource {
    readonly mode = 'polling' as const;
    readonly directory: string;
    private readonly intervalMs: number;
    private readonly recursive: boolean;
    private interval: NodeJS.Timeout | null = null;
    private snapshot: Map<string, FileSignature> = new Map();
    private sink: DiscoverySink | null = null;
    private currentPoll: Promise<void> | null = null;
    private failed = false;
    /** Bumped by stop(), so a start() still scanning knows it was cancelled */
    private generation = 0;

    constructor(options: PollingWatcherOptions) {
        if (!(options.intervalMs > 0)) {
            throw new Error(`[PollingWatcher] intervalMs must be > 0, got ${options.intervalMs}`);
        }
        this.directory = path.resolve(options.directory);
        this.intervalMs = options.intervalMs;
        this.recursive = options.recursive ?? false;
    }

    /**
     * List every regular file under the watched directory.
     * An unreadable root is a DiscoveryError; unreadable subdirectories are skipped.
     */
    async scan(): Promise<Map<string, FileSignature>> {
        const files = new Map<string, FileSignature>();
        await this.scanDirectory(this.directory, files, true);
        return files;
    }

    private async scanDirectory(directory: string, files: Map<string, FileSignature>, isRoot: boolean): Promise<void> {
        let entries: Dirent[];
        try {
            entries = await readdir(directory, {withFileTypes: true});
        } catch (error) {
            const code = errorCode(error);
            if (isRoot) {
                throw new DiscoveryError(`Cannot list watched directory: ${errorMessage(error)}`, directory, code, error);
            }
            if (code === 'EACCES' || code === 'EPERM') {
                console.warn(`[PollingWatcher] Permission denied: ${directory} - skipping`);
            } else {
                console.error(`[PollingWatcher] Error scanning directory ${directory}:`, errorMessage(error));
            }
            return;
        }

        for (const entry of entries) {
            const fullPath = path.join(directory, entry.name);
            if (entry.isDirectory()) {
                if (this.recursive) {
                    await this.scanDirectory(fullPath, files, false);
                }
                continue;
            }
            try {
                const stats = await stat(fullPath);
                if (stats.isFile()) {
                    files.set(fullPath, {size: stats.size, mtimeMs: stats.mtimeMs});
                }
            } catch (error) {
                // removed between readdir and stat
                if (errorCode(error) !== 'ENOENT') {
                    console.warn(`[PollingWatcher] Cannot stat ${fullPath}:`, errorMessage(error));
                }
            }
        }
    }

    /**
     * Poll once: scan, diff against the previous listing, emit the differences.
     * Returns the emitted paths.
     */
    async pollOnce(): Promise<string[]> {
        const startTime = Date.now();
        const current = await this.scan();
        const changed = diffSnapshots(this.snapshot, current);
        this.snapshot = current;

        for (const filePath of changed) {
            if (!this.sink) {
                break;
            }
            try {
                this.sink.onCandidate(filePath);
            } catch (error) {
                console.error(`[PollingWatcher] Candidate handler failed for ${filePath}:`, error);
            }
        }

        if (changed.length > 0) {
            console.log(`[PollingWatcher] ${changed.length} new or changed file(s) in ${this.directory} (${Date.now() - startTime}ms)`);
        }
        return changed;
    }

    async start(sink: DiscoverySink): Promise<void> {
        if (this.sink) {
            throw new Error('[PollingWatcher] Already started');
        }
        this.sink = sink;
        this.failed = false;
        this.snapshot = new Map();
        const generation = this.generation;

        console.log(`[PollingWatcher] Initial scan: ${this.directory} (interval: ${this.intervalMs}ms)`);
        const initialPoll = this.pollOnce();
        // stop() waits for the initial scan like any other poll
        const settled = initialPoll.then(() => undefined, () => undefined);
        this.currentPoll = settled;
        try {
            await initialPoll;
        } catch (error) {
            if (generation === this.generation) {
                this.sink = null;
            }
            throw error;
        } finally {
            if (this.currentPoll === settled) {
                this.currentPoll = null;
            }
        }

        if (generation !== this.generation) {
            console.log(`[PollingWatcher] Stopped during the initial scan of ${this.directory}`);
            return;
        }
        this.interval = setInterval(() => this.tick(), this.intervalMs);
        console.log(`[PollingWatcher] Polling started for ${this.directory} every ${this.intervalMs}ms`);
    }

    private tick(): void {
        if (this.currentPoll) {
            // previous poll still running on a slow share
            return;
        }
        this.currentPoll = this.pollOnce()
            .then(() => undefined)
            .catch((error: unknown) => {
                if (error instanceof DiscoveryError && (error.code === undefined || FATAL_ROOT_CODES.has(error.code))) {
                    this.fail(error);
                } else {
                    console.error(`[PollingWatcher] Error polling ${this.directory}:`, errorMessage(error));
                }
            })
            .finally(() => {
                this.currentPoll = null;
            });
    }

    private fail(error: DiscoveryError): void {
        if (this.failed) {
            return;
        }
        this.failed = true;
        this.clearTimer();
        const sink = this.sink;
        this.sink = null;
        console.error(`[PollingWatcher] ${error.message}`);
        sink?.onFatal(error);
    }

    private clearTimer(): void {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = null;
        }
    }

    /** True while the poll timer is installed */
    isActive(): boolean {
        return this.interval !== null;
    }

    async stop(): Promise<void> {
        this.generation++;
        this.clearTimer();
        this.sink = null;
        if (this.currentPoll) {
            await this.currentPoll;
        }
        console.log(`[PollingWatcher] Polling stopped for ${this.directory}`);
    }
}
