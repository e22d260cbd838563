import {EventEmitter} from 'events';
import {promises as fs, type Stats} from 'fs';
import PQueue from "p-queue";
import {PromiseQueue} from "@dropwatch/async-utils";
import {
    createDiscoverySource,
    DiscoveryError,
    DiscoverySink,
    DiscoverySource,
    errorCode,
    existsAsync,
    PathFilter
} from "@dropwatch/folder-watcher";
import type {WatchConfig} from "../config/WatchConfig.js";
import {ConfigurationError, describeError, EngineStateError} from "../errors/WatchErrors.js";
import {FileRecord, FileStatus, toIdentity} from "../registry/FileRecord.js";
import {ProcessedRegistry} from "../registry/ProcessedRegistry.js";
import {withTimeout, raceTimeout} from "../utils/TimeoutWrapper.js";
import {PendingQueue} from "./PendingQueue.js";
import {failed, invokeCallback, ProcessingCallback, ProcessingOutcome} from "./ProcessingCallback.js";
import {StabilityTracker} from "./StabilityTracker.js";

export type EngineState = 'stopped' | 'running' | 'stopping';

export type WatchEvent =
    | { type: 'state'; state: EngineState; paused: boolean }
    | { type: 'queued'; path: string; pending: number }
    | { type: 'started'; path: string }
    | { type: 'completed'; path: string; result?: Record<string, unknown>; durationMs: number }
    | { type: 'failed'; path: string; error: string; durationMs: number }
    | { type: 'abandoned'; path: string; timeoutMs: number }
    | { type: 'discovery-failed'; error: DiscoveryError };

export type WatchEventListener = (event: WatchEvent) => void;

export interface StopReport {
    /** The stop timeout expired while a callback was still running */
    forced: boolean;
    /** Identity whose callback was left running, if any */
    abandoned: string | null;
}

/** Where a path stands right now, as far as the engine knows. */
export type FileState = FileStatus | 'stabilizing' | 'unknown';

export interface FileStatusReport {
    identity: string;
    status: FileState;
    record?: FileRecord;
}

export interface WatchEngineOptions {
    /** Replaces the discovery strategy picked from the config */
    createSource?: (config: WatchConfig) => DiscoverySource;
    /** Clock used by the debounce, in milliseconds */
    now?: () => number;
}

interface DispatchTicket {
    identity: string;
    abandoned: boolean;
}

const DISCOVERY_STOP_TIMEOUT_MS = 10000;
/** Delay before another attempt to claim a file whose in_progress write failed */
const DISPATCH_RETRY_MS = 500;

function defaultSource(config: WatchConfig): DiscoverySource {
    return createDiscoverySource({
        directory: config.inputDirectory,
        mode: config.discoveryMode,
        recursive: config.recursive,
        pollIntervalMs: config.pollIntervalSeconds * 1000,
    });
}

/**
 * WatchEngine
 *
 * Candidate paths from the discovery source go through the name filter, the
 * registry, the stability debounce and finally the pending queue; a single
 * dispatch worker feeds them to the processing callback one at a time.
 *
 * Every step that reads or changes the pending queue or the registry runs on
 * one serial lane, so discovery and dispatch never interleave mid-transition.
 */
export class WatchEngine extends EventEmitter {
    private state: EngineState = 'stopped';
    private paused = false;
    private starting = false;
    /** Set by a stop() that arrives before start() reached `running` */
    private startAborted = false;
    private stopping: Promise<StopReport> | null = null;

    private readonly filter: PathFilter;
    private readonly registry: ProcessedRegistry;
    private readonly tracker: StabilityTracker;
    private readonly pending = new PendingQueue();
    private readonly lane = new PromiseQueue('watch-engine');
    private readonly recheckTimers: Map<string, NodeJS.Timeout> = new Map();
    /** Failed or abandoned identities the caller asked to run again */
    private readonly resubmitted: Set<string> = new Set();

    private dispatcher: PQueue = this.createDispatcher();
    private activeDispatch: Promise<void> | null = null;
    private inFlight: DispatchTicket | null = null;
    private readonly dispatchRetries: Set<NodeJS.Timeout> = new Set();
    private source: DiscoverySource | null = null;
    private callback: ProcessingCallback;
    private readonly createSource: (config: WatchConfig) => DiscoverySource;
    private readonly now: () => number;

    constructor(
        private readonly config: WatchConfig,
        callback: ProcessingCallback,
        options: WatchEngineOptions = {}
    ) {
        super();
        this.callback = callback;
        this.filter = new PathFilter({
            acceptedExtensions: config.acceptedExtensions,
            transientSuffixes: config.transientSuffixes,
        });
        this.registry = new ProcessedRegistry(config.registryFilePath);
        this.tracker = new StabilityTracker(config.debounceSeconds * 1000);
        this.createSource = options.createSource ?? defaultSource;
        this.now = options.now ?? Date.now;
    }

    getConfig(): WatchConfig {
        return this.config;
    }

    getState(): EngineState {
        return this.state;
    }

    isPaused(): boolean {
        return this.paused;
    }

    getRegistry(): ProcessedRegistry {
        return this.registry;
    }

    // =========================================================================
    // Lifecycle
    // =========================================================================

    /**
     * `stopped → running`. Configuration and registry problems reject and leave
     * the engine stopped.
     */
    async start(): Promise<void> {
        if (this.state !== 'stopped' || this.starting) {
            throw new EngineStateError('Cannot start the engine', this.starting ? 'starting' : this.state);
        }
        this.starting = true;
        try {
            // on the lane, so a markFileAsProcessed issued earlier lands first
            await this.lane.run(async () => {
                await this.ensureInputDirectory();
                await this.registry.load();
                const interrupted = await this.registry.markInterruptedForReview();
                for (const identity of interrupted) {
                    console.warn(`[WatchEngine] Needs review (interrupted last session): ${identity}`);
                }
            });
            if (this.startAborted) {
                throw new EngineStateError('Stopped while starting', 'stopped');
            }

            const source = this.createSource(this.config);
            this.source = source;
            this.dispatcher = this.createDispatcher();
            this.setState('running');

            try {
                // the initial scan runs inside start; its candidates are handled as they arrive
                await source.start(this.createSink());
            } catch (error) {
                this.source = null;
                // a concurrent stop() already halted the engine
                if (this.getState() === 'running') {
                    this.setState('stopping');
                    await this.halt();
                }
                throw new ConfigurationError(`Cannot watch input directory: ${describeError(error)}`, 'inputDirectory', error);
            }
            if (this.getState() !== 'running') {
                throw new EngineStateError('Stopped while starting', this.getState());
            }
            console.log(`[WatchEngine] Watching ${this.config.inputDirectory} (${source.mode}, debounce ${this.config.debounceSeconds}s)`);
        } finally {
            this.starting = false;
            this.startAborted = false;
        }
    }

    /**
     * `running → stopping → stopped`. Waits for the running callback, at most
     * `timeoutMs` when given. A callback still running after that is abandoned:
     * its record stays `in_progress` with `needsReview` and whatever it
     * returns later is ignored.
     */
    stop(timeoutMs?: number): Promise<StopReport> {
        if (this.stopping) {
            return this.stopping;
        }
        if (this.state === 'stopped') {
            if (this.starting) {
                this.startAborted = true;
            }
            return Promise.resolve({forced: false, abandoned: null});
        }
        const stopping = this.performStop(timeoutMs).finally(() => {
            this.stopping = null;
        });
        this.stopping = stopping;
        return stopping;
    }

    private async performStop(timeoutMs: number | undefined): Promise<StopReport> {
        this.setState('stopping');
        this.dispatcher.pause();
        this.dispatcher.clear();
        this.clearRechecks();
        this.clearDispatchRetry();

        const source = this.source;
        this.source = null;
        if (source) {
            try {
                await withTimeout(() => source.stop(), DISCOVERY_STOP_TIMEOUT_MS, 'Discovery shutdown');
            } catch (error) {
                console.error(`[WatchEngine] Error stopping discovery:`, describeError(error));
            }
        }

        await this.lane.awaitQueueEmpty();

        let report: StopReport = {forced: false, abandoned: null};
        const active = this.activeDispatch;
        if (active) {
            if (timeoutMs === undefined) {
                await active;
            } else {
                const outcome = await raceTimeout(active, timeoutMs);
                if (outcome.timedOut) {
                    report = await this.abandonInFlight(timeoutMs);
                }
            }
        }

        await this.halt();
        return report;
    }

    private async abandonInFlight(timeoutMs: number): Promise<StopReport> {
        const ticket = this.inFlight;
        if (!ticket) {
            return {forced: true, abandoned: null};
        }
        ticket.abandoned = true;
        this.inFlight = null;
        const identity = ticket.identity;
        console.warn(`[WatchEngine] Callback for ${identity} still running after ${timeoutMs}ms, abandoning it`);
        await this.lane.run(() => this.registry.flagForReview(identity, `callback still running ${timeoutMs}ms after stop`));
        this.emitEvent({type: 'abandoned', path: identity, timeoutMs});
        return {forced: true, abandoned: identity};
    }

    /** Final step of stop and of a failed start */
    private async halt(): Promise<void> {
        // evaluations still queued see the stopping state and bail out
        await this.lane.awaitQueueEmpty();
        this.dispatcher.pause();
        this.dispatcher.clear();
        this.clearRechecks();
        this.clearDispatchRetry();
        // pending records stay `pending` on disk; the next initial scan picks them up
        this.pending.clear();
        await this.registry.flush();
        this.setState('stopped');
    }

    /** Hold the dispatch worker. Discovery and debounce keep running. */
    pause(): void {
        if (this.paused) {
            return;
        }
        this.paused = true;
        this.dispatcher.pause();
        this.emitEvent({type: 'state', state: this.state, paused: true});
    }

    resume(): void {
        if (!this.paused) {
            return;
        }
        this.paused = false;
        if (this.state === 'running') {
            this.dispatcher.start();
        }
        this.emitEvent({type: 'state', state: this.state, paused: false});
    }

    /** Takes effect from the next dispatch. */
    setCallback(callback: ProcessingCallback): void {
        this.callback = callback;
    }

    // =========================================================================
    // Operations for the embedding application
    // =========================================================================

    /**
     * Record a file as completed without dispatching it, e.g. a file handled
     * outside the engine. A later discovery of the path is a duplicate.
     */
    markFileAsProcessed(filePath: string, result: Record<string, unknown> = {}): Promise<FileRecord> {
        const identity = toIdentity(filePath);
        return this.lane.run(async () => {
            if (this.inFlight?.identity === identity) {
                throw new EngineStateError(`Cannot mark ${identity} as processed while its callback is running`, this.state);
            }
            await this.registry.ensureLoaded();
            this.pending.remove(identity);
            this.forget(identity);
            this.resubmitted.delete(identity);
            const stats = await this.statIfPresent(identity);
            const metadata = stats ? {size: stats.size, mtimeMs: stats.mtimeMs} : undefined;
            console.log(`[WatchEngine] Marked as processed: ${identity}`);
            return this.registry.recordCompleted(identity, result, metadata);
        });
    }

    /**
     * Allow a failed (or abandoned) file to be dispatched again. Returns false
     * when the record is in another state.
     */
    async resubmit(filePath: string): Promise<boolean> {
        const identity = toIdentity(filePath);
        const accepted = await this.lane.run(async () => {
            await this.registry.ensureLoaded();
            const record = this.registry.get(identity);
            if (!record || this.inFlight?.identity === identity) {
                return false;
            }
            const retryable = record.status === 'failed' || (record.status === 'in_progress' && record.needsReview === true);
            if (!retryable) {
                return false;
            }
            this.resubmitted.add(identity);
            return true;
        });
        if (accepted) {
            console.log(`[WatchEngine] Resubmitted: ${identity}`);
            if (this.state === 'running') {
                this.handleCandidate(identity);
            }
        }
        return accepted;
    }

    /** Files waiting for dispatch */
    getPendingCount(): number {
        return this.pending.size;
    }

    getStatus(filePath: string): FileStatusReport {
        const identity = toIdentity(filePath);
        const record = this.registry.get(identity);
        let status: FileState;
        if (this.inFlight?.identity === identity) {
            status = 'in_progress';
        } else if (this.pending.has(identity)) {
            status = 'pending';
        } else if (this.tracker.has(identity)) {
            status = 'stabilizing';
        } else {
            status = record?.status ?? 'unknown';
        }
        return record ? {identity, status, record} : {identity, status};
    }

    /** Listen to every engine event. Returns the unsubscribe function. */
    subscribe(listener: WatchEventListener): () => void {
        const guarded = (event: WatchEvent) => {
            try {
                listener(event);
            } catch (error) {
                console.error(`[WatchEngine] Event listener failed:`, error);
            }
        };
        this.on('event', guarded);
        return () => {
            this.off('event', guarded);
        };
    }

    // =========================================================================
    // Discovery side
    // =========================================================================

    private createSink(): DiscoverySink {
        return {
            onCandidate: (filePath: string) => this.handleCandidate(toIdentity(filePath)),
            onFatal: (error: DiscoveryError) => this.handleDiscoveryFailure(error),
        };
    }

    private handleCandidate(identity: string): void {
        if (this.state !== 'running') {
            return;
        }
        this.lane.run(() => this.evaluate(identity)).catch((error: unknown) => {
            console.error(`[WatchEngine] Error evaluating ${identity}:`, describeError(error));
        });
    }

    /** A record that must not be queued again from discovery */
    private isSettled(identity: string): boolean {
        if (this.resubmitted.has(identity)) {
            return false;
        }
        const record = this.registry.get(identity);
        if (!record) {
            return false;
        }
        // failed files wait for an explicit resubmit
        return this.registry.isKnown(identity) || record.status === 'failed';
    }

    private async evaluate(identity: string): Promise<void> {
        if (this.state !== 'running') {
            return;
        }
        if (!this.filter.matchesName(identity) || this.isSettled(identity)) {
            this.forget(identity);
            return;
        }
        if (this.pending.has(identity) || this.inFlight?.identity === identity) {
            return;
        }

        const stats = await this.statIfPresent(identity);
        if (this.state !== 'running') {
            return;
        }
        if (!stats || !this.filter.accepts(identity, stats)) {
            // vanished while settling, or not a regular file
            this.forget(identity);
            return;
        }

        const metadata = {size: stats.size, mtimeMs: stats.mtimeMs};
        const verdict = this.tracker.observe(identity, metadata, this.now());
        if (!verdict.stable) {
            this.scheduleRecheck(identity, verdict.remainingMs);
            return;
        }

        this.forget(identity);
        this.pending.enqueue(identity);
        this.resubmitted.delete(identity);
        await this.registry.recordPending(identity, metadata);
        console.log(`[WatchEngine] Queued ${identity} (${this.pending.size} pending)`);
        this.emitEvent({type: 'queued', path: identity, pending: this.pending.size});
        this.scheduleDispatch();
    }

    /** Observe the file again without waiting for another discovery event. */
    private scheduleRecheck(identity: string, delayMs: number): void {
        const existing = this.recheckTimers.get(identity);
        if (existing) {
            clearTimeout(existing);
        }
        const timer = setTimeout(() => {
            this.recheckTimers.delete(identity);
            this.handleCandidate(identity);
        }, delayMs);
        this.recheckTimers.set(identity, timer);
    }

    private forget(identity: string): void {
        this.tracker.forget(identity);
        const timer = this.recheckTimers.get(identity);
        if (timer) {
            clearTimeout(timer);
            this.recheckTimers.delete(identity);
        }
    }

    private clearRechecks(): void {
        for (const timer of this.recheckTimers.values()) {
            clearTimeout(timer);
        }
        this.recheckTimers.clear();
        this.tracker.clear();
    }

    private handleDiscoveryFailure(error: DiscoveryError): void {
        if (this.state !== 'running') {
            return;
        }
        console.error(`[WatchEngine] Discovery failed, stopping: ${error.message}`);
        this.emitEvent({type: 'discovery-failed', error});
        this.stop().catch((stopError: unknown) => {
            console.error(`[WatchEngine] Error stopping after discovery failure:`, describeError(stopError));
        });
    }

    // =========================================================================
    // Dispatch side
    // =========================================================================

    private createDispatcher(): PQueue {
        return new PQueue({concurrency: 1, autoStart: !this.paused});
    }

    private scheduleDispatch(): void {
        this.dispatcher.add(async () => {
            const job = this.dispatchNext().catch((error: unknown) => {
                console.error(`[WatchEngine] Dispatch failed:`, describeError(error));
            });
            this.activeDispatch = job;
            try {
                await job;
            } finally {
                if (this.activeDispatch === job) {
                    this.activeDispatch = null;
                }
            }
        }).catch((error: unknown) => {
            console.error(`[WatchEngine] Dispatch queue error:`, describeError(error));
        });
    }

    /** One retry per failed claim, so every queued file keeps a dispatch job. */
    private scheduleDispatchRetry(): void {
        const timer = setTimeout(() => {
            this.dispatchRetries.delete(timer);
            if (this.state === 'running') {
                this.scheduleDispatch();
            }
        }, DISPATCH_RETRY_MS);
        this.dispatchRetries.add(timer);
    }

    private clearDispatchRetry(): void {
        for (const timer of this.dispatchRetries) {
            clearTimeout(timer);
        }
        this.dispatchRetries.clear();
    }

    private async dispatchNext(): Promise<void> {
        const ticket = await this.lane.run(async () => {
            if (this.state !== 'running') {
                return null;
            }
            const identity = this.pending.dequeue();
            if (identity === undefined) {
                return null;
            }
            try {
                await this.registry.recordInProgress(identity);
            } catch (error) {
                // still pending in memory and on disk; keep its place in line
                this.pending.requeueFront(identity);
                console.error(`[WatchEngine] Cannot claim ${identity}, retrying in ${DISPATCH_RETRY_MS}ms:`, describeError(error));
                this.scheduleDispatchRetry();
                return null;
            }
            const claimed: DispatchTicket = {identity, abandoned: false};
            this.inFlight = claimed;
            return claimed;
        });
        if (!ticket) {
            return;
        }

        try {
            const startTime = this.now();
            let outcome: ProcessingOutcome;
            if (await existsAsync(ticket.identity)) {
                this.emitEvent({type: 'started', path: ticket.identity});
                outcome = await invokeCallback(this.callback, ticket.identity);
            } else {
                outcome = failed(`path vanished: ${ticket.identity}`);
            }
            const durationMs = this.now() - startTime;
            await this.lane.run(() => this.settle(ticket, outcome, durationMs));
        } finally {
            if (this.inFlight === ticket) {
                this.inFlight = null;
            }
        }
    }

    private async settle(ticket: DispatchTicket, outcome: ProcessingOutcome, durationMs: number): Promise<void> {
        const identity = ticket.identity;
        if (ticket.abandoned) {
            console.warn(`[WatchEngine] Ignoring late outcome for abandoned ${identity} (${outcome.ok ? 'success' : outcome.error})`);
            return;
        }
        if (outcome.ok) {
            await this.registry.recordCompleted(identity, outcome.result);
            console.log(`[WatchEngine] Completed ${identity} (${durationMs}ms)`);
            this.emitEvent({type: 'completed', path: identity, result: outcome.result, durationMs});
        } else {
            await this.registry.recordFailed(identity, outcome.error);
            console.warn(`[WatchEngine] Failed ${identity}: ${outcome.error}`);
            this.emitEvent({type: 'failed', path: identity, error: outcome.error, durationMs});
        }
    }

    // =========================================================================
    // Helpers
    // =========================================================================

    private async ensureInputDirectory(): Promise<void> {
        const directory = this.config.inputDirectory;
        if (!(await existsAsync(directory))) {
            if (!this.config.createIfMissing) {
                throw new ConfigurationError(`Input directory does not exist: ${directory}`, 'inputDirectory');
            }
            await fs.mkdir(directory, {recursive: true});
            console.log(`[WatchEngine] Created input directory ${directory}`);
        }

        let stats: Stats;
        try {
            stats = await fs.stat(directory);
            await fs.access(directory, fs.constants.R_OK);
        } catch (error) {
            throw new ConfigurationError(`Input directory is not accessible: ${describeError(error)}`, 'inputDirectory', error);
        }
        if (!stats.isDirectory()) {
            throw new ConfigurationError(`Input path is not a directory: ${directory}`, 'inputDirectory');
        }
    }

    private async statIfPresent(filePath: string): Promise<Stats | null> {
        try {
            return await fs.stat(filePath);
        } catch (error) {
            if (errorCode(error) === 'ENOENT') {
                return null;
            }
            throw error;
        }
    }

    private setState(state: EngineState): void {
        if (this.state === state) {
            return;
        }
        this.state = state;
        this.emitEvent({type: 'state', state, paused: this.paused});
    }

    private emitEvent(event: WatchEvent): void {
        this.emit(event.type, event);
        this.emit('event', event);
    }
}
