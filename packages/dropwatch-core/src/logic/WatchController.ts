import {ListenerCleaner} from "@dropwatch/async-utils";
import type {WatchConfig} from "../config/WatchConfig.js";
import {EngineStateError} from "../errors/WatchErrors.js";
import type {FileRecord, FileStatus} from "../registry/FileRecord.js";
import type {ProcessingCallback} from "./ProcessingCallback.js";
import {
    EngineState,
    FileStatusReport,
    StopReport,
    WatchEngine,
    WatchEngineOptions,
    WatchEvent,
    WatchEventListener
} from "./WatchEngine.js";

/**
 * Start/stop surface for the embedding application.
 *
 * Each start builds a new engine from the given config; subscribers stay
 * attached across restarts. A fatal discovery error is kept as `lastError`
 * while the engine stops itself.
 */
export class WatchController {
    private engine: WatchEngine | null = null;
    private readonly listeners: Set<WatchEventListener> = new Set();
    private readonly engineSubscriptions = new ListenerCleaner();
    private lastError: Error | null = null;

    constructor(private readonly engineOptions: WatchEngineOptions = {}) {
    }

    async start(config: WatchConfig, callback: ProcessingCallback): Promise<void> {
        const current = this.getState();
        if (current !== 'stopped') {
            throw new EngineStateError('Stop the watcher before starting it again', current);
        }

        this.engineSubscriptions.cleanUp();
        const engine = new WatchEngine(config, callback, this.engineOptions);
        this.engineSubscriptions.add(engine.subscribe(event => this.forward(event)));
        this.engine = engine;
        this.lastError = null;

        try {
            await engine.start();
        } catch (error) {
            this.lastError = error instanceof Error ? error : new Error(String(error));
            throw error;
        }
    }

    stop(timeoutMs?: number): Promise<StopReport> {
        if (!this.engine) {
            return Promise.resolve({forced: false, abandoned: null});
        }
        return this.engine.stop(timeoutMs);
    }

    pause(): void {
        this.requireEngine().pause();
    }

    resume(): void {
        this.requireEngine().resume();
    }

    setCallback(callback: ProcessingCallback): void {
        this.requireEngine().setCallback(callback);
    }

    markFileAsProcessed(filePath: string, metadata: Record<string, unknown> = {}): Promise<FileRecord> {
        return this.requireEngine().markFileAsProcessed(filePath, metadata);
    }

    resubmit(filePath: string): Promise<boolean> {
        return this.requireEngine().resubmit(filePath);
    }

    getPendingCount(): number {
        return this.engine?.getPendingCount() ?? 0;
    }

    getStatus(filePath: string): FileStatusReport {
        return this.requireEngine().getStatus(filePath);
    }

    getState(): EngineState {
        return this.engine?.getState() ?? 'stopped';
    }

    isPaused(): boolean {
        return this.engine?.isPaused() ?? false;
    }

    getRegistryCounts(): Record<FileStatus, number> {
        return this.requireEngine().getRegistry().countByStatus();
    }

    getLastError(): Error | null {
        return this.lastError;
    }

    subscribe(listener: WatchEventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private forward(event: WatchEvent): void {
        if (event.type === 'discovery-failed') {
            this.lastError = event.error;
        }
        for (const listener of this.listeners) {
            try {
                listener(event);
            } catch (error) {
                console.error(`[WatchController] Listener failed:`, error);
            }
        }
    }

    private requireEngine(): WatchEngine {
        if (!this.engine) {
            throw new EngineStateError('The watcher has not been started', 'stopped');
        }
        return this.engine;
    }
}
