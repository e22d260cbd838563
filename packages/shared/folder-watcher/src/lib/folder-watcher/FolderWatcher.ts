import * as path from 'path';
import {watch, type FSWatcher} from 'chokidar';
import {readdir, stat} from "fs/promises";
import type {Dirent} from "fs";
import {
    DiscoveryError,
    DiscoverySink,
    DiscoverySource,
    errorCode,
    errorMessage,
    FATAL_ROOT_CODES
} from "./DiscoverySource.js";

export interface FolderWatcherOptions {
    directory: string;
    recursive?: boolean;
    /** Window in which add/change events for one path collapse into one emission (default 250ms). */
    coalesceMs?: number;
    /** How often the watch root itself is checked for existence (default 5000ms). */
    rootCheckIntervalMs?: number;
}

const DEFAULT_COALESCE_MS = 250;
const DEFAULT_ROOT_CHECK_INTERVAL_MS = 5000;

/**
 * Event-driven discovery on top of chokidar.
 *
 * On start the directory is walked once and every file is emitted, then live
 * watching begins with `ignoreInitial`. Files created while chokidar builds its
 * initial tree are picked up by a second walk once the watcher is ready.
 */
export class FolderWatcher implements DiscoverySource {
    readonly mode = 'events' as const;
    readonly directory: string;
    private readonly recursive: boolean;
    private readonly coalesceMs: number;
    private readonly rootCheckIntervalMs: number;
    private watcher: FSWatcher | null = null;
    private sink: DiscoverySink | null = null;
    private coalesceTimers: Map<string, NodeJS.Timeout> = new Map();
    private rootCheck: NodeJS.Timeout | null = null;
    private failed = false;
    private ready = false;
    /** Releases a start() waiting for chokidar when stop() closes the watcher first */
    private abandonReadyWait: (() => void) | null = null;
    /** Bumped by stop(), so a start() still scanning knows it was cancelled */
    private generation = 0;

    constructor(options: FolderWatcherOptions) {
        this.directory = path.resolve(options.directory);
        this.recursive = options.recursive ?? false;
        this.coalesceMs = options.coalesceMs ?? DEFAULT_COALESCE_MS;
        this.rootCheckIntervalMs = options.rootCheckIntervalMs ?? DEFAULT_ROOT_CHECK_INTERVAL_MS;
    }

    /**
     * Discover all files in given directories
     * Returns async generator that yields file paths as they're discovered
     *
     * @param directories - Array of directory paths to scan
     * @param recursive - Descend into subdirectories
     */
    async *discoverFiles(directories: string[], recursive: boolean = this.recursive): AsyncGenerator<string> {
        for (const dir of directories) {
            const normalizedDir = path.normalize(dir);
            yield* this.walkDirectory(normalizedDir, recursive, true);
        }
    }

    /**
     * Walk a directory tree, yielding file paths as they're discovered.
     * The root must be readable; unreadable subdirectories are skipped.
     */
    private async *walkDirectory(directory: string, recursive: boolean, isRoot: boolean): AsyncGenerator<string> {
        let entries: Dirent[];
        try {
            entries = await readdir(directory, {withFileTypes: true});
        } catch (error) {
            const code = errorCode(error);
            if (isRoot) {
                throw new DiscoveryError(`Cannot list watched directory: ${errorMessage(error)}`, directory, code, error);
            }
            if (code === 'EACCES' || code === 'EPERM') {
                console.warn(`[FolderWatcher] Permission denied: ${directory} - skipping`);
            } else if (code === 'ENOENT') {
                console.warn(`[FolderWatcher] Directory not found: ${directory} - skipping`);
            } else {
                console.error(`[FolderWatcher] Error reading directory ${directory}:`, errorMessage(error));
            }
            return;
        }

        // Collect subdirectories, files first keeps the scan order stable
        const subdirs: string[] = [];

        for (const entry of entries) {
            const fullPath = path.join(directory, entry.name);

            if (entry.isDirectory()) {
                subdirs.push(fullPath);
            } else {
                yield fullPath;
            }
        }

        if (!recursive) {
            return;
        }
        for (const subdir of subdirs) {
            yield* this.walkDirectory(subdir, recursive, false);
        }
    }

    async start(sink: DiscoverySink): Promise<void> {
        if (this.sink) {
            throw new Error('[FolderWatcher] Already started');
        }
        this.sink = sink;
        this.failed = false;
        this.ready = false;
        const generation = this.generation;
        const cancelled = () => generation !== this.generation;

        const seen = new Set<string>();
        try {
            for await (const filePath of this.discoverFiles([this.directory])) {
                seen.add(filePath);
                this.emit(filePath);
            }
            if (cancelled()) {
                return;
            }
            console.log(`[FolderWatcher] Initial scan found ${seen.size} file(s) in ${this.directory}`);

            // assigned before waiting, so a stop() in between closes it
            const watcher = this.createWatcher();
            this.watcher = watcher;
            await this.waitForReady(watcher);
            if (cancelled()) {
                return;
            }
            this.ready = true;

            // files created while chokidar was building its tree
            for await (const filePath of this.discoverFiles([this.directory])) {
                if (!seen.has(filePath)) {
                    this.emit(filePath);
                }
            }
        } catch (error) {
            if (!cancelled()) {
                await this.teardown();
            }
            throw error;
        }
        if (cancelled()) {
            return;
        }

        this.rootCheck = setInterval(() => {
            this.verifyRoot().catch((error: unknown) => {
                console.error(`[FolderWatcher] Root check failed:`, errorMessage(error));
            });
        }, this.rootCheckIntervalMs);

        console.log(`[FolderWatcher] Watching for file changes on ${this.directory}${this.recursive ? ' (recursive)' : ''}`);
    }

    /** True while chokidar or the root check is running */
    isActive(): boolean {
        return this.watcher !== null || this.rootCheck !== null;
    }

    protected createWatcher(): FSWatcher {
        const watcher = watch(this.directory, {
            ignoreInitial: true,  // the initial scan already emitted existing files
            persistent: true,
            depth: this.recursive ? undefined : 0,
            ignorePermissionErrors: true,
        });

        watcher.on('add', (filePath: string) => this.schedule(filePath));
        watcher.on('change', (filePath: string) => this.schedule(filePath));
        watcher.on('unlink', (filePath: string) => this.cancel(filePath));

        watcher.on('unlinkDir', (dirPath: string) => {
            if (path.resolve(dirPath) === this.directory) {
                this.fail(new DiscoveryError('Watched directory was removed', this.directory, 'ENOENT'));
            }
        });

        watcher.on('error', (error: Error) => {
            const code = errorCode(error);
            if (code === 'ENOSPC') {
                console.error(`[FolderWatcher] CRITICAL: No space left on device or inotify watch limit reached:`, error.message);
                console.error(`[FolderWatcher] Try increasing fs.inotify.max_user_watches: sysctl fs.inotify.max_user_watches=524288`);
            } else {
                console.warn(`[FolderWatcher] Watcher error:`, error.message);
            }
            if (!this.ready) {
                // start() rejects with it
                return;
            }
            this.verifyRoot().catch((checkError: unknown) => {
                console.error(`[FolderWatcher] Root check failed:`, errorMessage(checkError));
            });
        });

        return watcher;
    }

    /** Resolves on `ready`; an `error` before that rejects. */
    private waitForReady(watcher: FSWatcher): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const detach = () => {
                watcher.off('ready', onReady);
                watcher.off('error', onError);
                this.abandonReadyWait = null;
            };
            const onReady = () => {
                detach();
                resolve();
            };
            const onError = (error: Error) => {
                detach();
                reject(new DiscoveryError(`Watcher failed before it was ready: ${error.message}`, this.directory, errorCode(error), error));
            };
            watcher.once('ready', onReady);
            watcher.once('error', onError);
            // a closed watcher never becomes ready
            this.abandonReadyWait = onReady;
        });
    }

    /**
     * Events for a path inside one window collapse into a single emission at
     * the end of the window.
     */
    private schedule(filePath: string): void {
        if (this.coalesceTimers.has(filePath)) {
            return;
        }
        const timer = setTimeout(() => {
            this.coalesceTimers.delete(filePath);
            this.emit(filePath);
        }, this.coalesceMs);
        this.coalesceTimers.set(filePath, timer);
    }

    private cancel(filePath: string): void {
        const timer = this.coalesceTimers.get(filePath);
        if (timer) {
            clearTimeout(timer);
            this.coalesceTimers.delete(filePath);
        }
    }

    private emit(filePath: string): void {
        if (!this.sink) {
            return;
        }
        try {
            this.sink.onCandidate(filePath);
        } catch (error) {
            console.error(`[FolderWatcher] Candidate handler failed for ${filePath}:`, error);
        }
    }

    private async verifyRoot(): Promise<void> {
        if (!this.sink) {
            return;
        }
        try {
            const stats = await stat(this.directory);
            if (!stats.isDirectory()) {
                this.fail(new DiscoveryError('Watched path is no longer a directory', this.directory, 'ENOTDIR'));
            }
        } catch (error) {
            const code = errorCode(error);
            if (code !== undefined && FATAL_ROOT_CODES.has(code)) {
                this.fail(new DiscoveryError(`Watched directory is not accessible: ${errorMessage(error)}`, this.directory, code, error));
            } else {
                throw error;
            }
        }
    }

    private fail(error: DiscoveryError): void {
        if (this.failed || !this.sink) {
            return;
        }
        this.failed = true;
        const sink = this.sink;
        console.error(`[FolderWatcher] ${error.message}`);
        this.teardown()
            .catch((closeError: unknown) => {
                console.error(`[FolderWatcher] Error closing watcher:`, errorMessage(closeError));
            })
            .finally(() => sink.onFatal(error));
    }

    private async teardown(): Promise<void> {
        this.sink = null;
        if (this.rootCheck) {
            clearInterval(this.rootCheck);
            this.rootCheck = null;
        }
        for (const timer of this.coalesceTimers.values()) {
            clearTimeout(timer);
        }
        this.coalesceTimers.clear();
        const watcher = this.watcher;
        this.watcher = null;
        if (watcher) {
            await watcher.close();
        }
    }

    async stop(): Promise<void> {
        this.generation++;
        this.abandonReadyWait?.();
        await this.teardown();
        console.log(`[FolderWatcher] Stopped watching ${this.directory}`);
    }
}
