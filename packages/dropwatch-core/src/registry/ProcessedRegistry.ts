import {promises as fs} from 'fs';
import * as path from 'path';
import {PromiseQueue} from "@dropwatch/async-utils";
import {errorCode} from "@dropwatch/folder-watcher";
import {ConfigurationError, RegistryCorruptionError} from "../errors/WatchErrors.js";
import {FILE_STATUSES, FileMetadata, FileRecord, FileStatus, isFileStatus} from "./FileRecord.js";

export const REGISTRY_FORMAT_VERSION = 1;

/** Keys this version writes for each record; anything else is carried over untouched. */
const RECORD_KEYS = new Set(['status', 'size', 'mtimeMs', 'firstSeenAt', 'updatedAt', 'completedAt', 'result', 'error', 'needsReview', 'reviewReason']);
const DOCUMENT_KEYS = new Set(['version', 'savedAt', 'files']);

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickUnknownKeys(source: JsonObject, known: ReadonlySet<string>): JsonObject {
    const extra: JsonObject = {};
    for (const [key, value] of Object.entries(source)) {
        if (!known.has(key)) {
            extra[key] = value;
        }
    }
    return extra;
}

/**
 * Durable map of identity to FileRecord.
 *
 * Every transition rewrites the whole snapshot: the JSON document is written to
 * `<file>.tmp` and renamed over the registry file, so readers and crashes only
 * ever see a complete snapshot. Writes are serialized on their own queue.
 *
 * Document layout:
 * ```json
 * {"version": 1, "savedAt": "...", "files": {"/abs/path": {"status": "completed", ...}}}
 * ```
 */
export class ProcessedRegistry {
    private records: Map<string, FileRecord> = new Map();
    private recordExtras: Map<string, JsonObject> = new Map();
    private documentExtras: JsonObject = {};
    private readonly writeQueue = new PromiseQueue('registry-writes');
    private loaded = false;
    private directoryReady = false;

    constructor(
        private readonly filePath: string,
        private readonly clock: () => Date = () => new Date()
    ) {
        this.filePath = path.resolve(filePath);
    }

    getFilePath(): string {
        return this.filePath;
    }

    isLoaded(): boolean {
        return this.loaded;
    }

    get size(): number {
        return this.records.size;
    }

    /**
     * Read the persisted snapshot. A missing file means an empty registry;
     * anything unparsable raises RegistryCorruptionError.
     */
    async load(): Promise<void> {
        let content: string;
        try {
            content = await fs.readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (errorCode(error) === 'ENOENT') {
                this.reset();
                this.loaded = true;
                console.log(`[ProcessedRegistry] No registry at ${this.filePath}, starting empty`);
                return;
            }
            throw new ConfigurationError(`Registry file is not readable: ${this.filePath}`, 'registryFilePath', error);
        }

        if (content.trim().length === 0) {
            throw new RegistryCorruptionError('Registry file is empty', this.filePath);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (error) {
            throw new RegistryCorruptionError('Registry file is not valid JSON', this.filePath, error);
        }

        this.parseDocument(raw);
        this.loaded = true;
        console.log(`[ProcessedRegistry] Loaded ${this.records.size} record(s) from ${this.filePath}`);
    }

    /** Load unless a previous call already did. */
    async ensureLoaded(): Promise<void> {
        if (!this.loaded) {
            await this.load();
        }
    }

    private reset(): void {
        this.records = new Map();
        this.recordExtras = new Map();
        this.documentExtras = {};
    }

    private parseDocument(raw: unknown): void {
        if (!isObject(raw)) {
            throw new RegistryCorruptionError('Registry document must be an object', this.filePath);
        }
        if (typeof raw.version !== 'number') {
            throw new RegistryCorruptionError("Registry document has no numeric 'version'", this.filePath);
        }
        if (!isObject(raw.files)) {
            throw new RegistryCorruptionError("Registry document has no 'files' object", this.filePath);
        }

        const records = new Map<string, FileRecord>();
        const extras = new Map<string, JsonObject>();
        for (const [identity, entry] of Object.entries(raw.files)) {
            records.set(identity, this.parseRecord(identity, entry));
            if (isObject(entry)) {
                const extra = pickUnknownKeys(entry, RECORD_KEYS);
                if (Object.keys(extra).length > 0) {
                    extras.set(identity, extra);
                }
            }
        }

        this.records = records;
        this.recordExtras = extras;
        this.documentExtras = pickUnknownKeys(raw, DOCUMENT_KEYS);
    }

    private parseRecord(identity: string, entry: unknown): FileRecord {
        const invalid = (reason: string) =>
            new RegistryCorruptionError(`Invalid record for ${identity}: ${reason}`, this.filePath);

        if (!isObject(entry)) {
            throw invalid('not an object');
        }
        const {status, size, mtimeMs, firstSeenAt, updatedAt, completedAt, result, error, needsReview, reviewReason} = entry;
        if (!isFileStatus(status)) {
            throw invalid(`status must be one of ${FILE_STATUSES.join(', ')}`);
        }
        if (typeof size !== 'number' || typeof mtimeMs !== 'number') {
            throw invalid('size and mtimeMs must be numbers');
        }
        if (typeof firstSeenAt !== 'string' || typeof updatedAt !== 'string') {
            throw invalid('firstSeenAt and updatedAt must be strings');
        }
        if (completedAt !== null && completedAt !== undefined && typeof completedAt !== 'string') {
            throw invalid('completedAt must be a string or null');
        }
        if (result !== undefined && !isObject(result)) {
            throw invalid('result must be an object');
        }
        if (error !== undefined && typeof error !== 'string') {
            throw invalid('error must be a string');
        }
        if (needsReview !== undefined && typeof needsReview !== 'boolean') {
            throw invalid('needsReview must be a boolean');
        }
        if (reviewReason !== undefined && typeof reviewReason !== 'string') {
            throw invalid('reviewReason must be a string');
        }

        const record: FileRecord = {
            identity,
            status,
            size,
            mtimeMs,
            firstSeenAt,
            updatedAt,
            completedAt: completedAt ?? null,
        };
        if (result !== undefined) record.result = result;
        if (error !== undefined) record.error = error;
        if (needsReview !== undefined) record.needsReview = needsReview;
        if (reviewReason !== undefined) record.reviewReason = reviewReason;
        return record;
    }

    /** True when the file must not be queued again: completed, or dispatched. */
    isKnown(identity: string): boolean {
        const status = this.records.get(identity)?.status;
        return status === 'completed' || status === 'in_progress';
    }

    get(identity: string): FileRecord | undefined {
        const record = this.records.get(identity);
        return record ? structuredClone(record) : undefined;
    }

    entries(): FileRecord[] {
        return Array.from(this.records.values(), record => structuredClone(record));
    }

    countByStatus(): Record<FileStatus, number> {
        const counts: Record<FileStatus, number> = {pending: 0, in_progress: 0, completed: 0, failed: 0};
        for (const record of this.records.values()) {
            counts[record.status]++;
        }
        return counts;
    }

    // =========================================================================
    // Transitions (each one persists the full snapshot)
    // =========================================================================

    async recordPending(identity: string, metadata: FileMetadata): Promise<FileRecord> {
        const now = this.timestamp();
        const previous = this.records.get(identity);
        const record: FileRecord = {
            identity,
            status: 'pending',
            size: metadata.size,
            mtimeMs: metadata.mtimeMs,
            firstSeenAt: previous?.firstSeenAt ?? now,
            updatedAt: now,
            completedAt: null,
        };
        return this.commit(record);
    }

    async recordInProgress(identity: string): Promise<FileRecord> {
        const record = this.require(identity);
        record.status = 'in_progress';
        record.updatedAt = this.timestamp();
        return this.commit(record);
    }

    /**
     * Mark completed. Creates the record when the identity was never seen,
     * which is how files handled outside the engine get registered.
     */
    async recordCompleted(identity: string, result?: Record<string, unknown>, metadata?: FileMetadata): Promise<FileRecord> {
        const now = this.timestamp();
        const previous = this.records.get(identity);
        const record: FileRecord = {
            identity,
            status: 'completed',
            size: metadata?.size ?? previous?.size ?? 0,
            mtimeMs: metadata?.mtimeMs ?? previous?.mtimeMs ?? 0,
            firstSeenAt: previous?.firstSeenAt ?? now,
            updatedAt: now,
            completedAt: now,
        };
        if (result !== undefined) {
            record.result = result;
        }
        return this.commit(record);
    }

    async recordFailed(identity: string, error: string): Promise<FileRecord> {
        const record = this.require(identity);
        record.status = 'failed';
        record.error = error;
        record.updatedAt = this.timestamp();
        record.completedAt = null;
        delete record.result;
        return this.commit(record);
    }

    async flagForReview(identity: string, reason: string): Promise<FileRecord> {
        const record = this.require(identity);
        record.needsReview = true;
        record.reviewReason = reason;
        record.updatedAt = this.timestamp();
        return this.commit(record);
    }

    /**
     * Records still `in_progress` after a load were being processed when the
     * previous session ended. Flag them; they are never dispatched again on
     * their own. Returns the flagged identities.
     */
    async markInterruptedForReview(): Promise<string[]> {
        const now = this.timestamp();
        const flagged: FileRecord[] = [];
        for (const record of this.records.values()) {
            if (record.status === 'in_progress' && !record.needsReview) {
                flagged.push({...structuredClone(record), needsReview: true, reviewReason: 'interrupted before completion', updatedAt: now});
            }
        }
        if (flagged.length > 0) {
            console.warn(`[ProcessedRegistry] ${flagged.length} record(s) were in progress when the last session ended, flagged for review`);
            await this.commitAll(flagged);
        }
        return flagged.map(record => record.identity);
    }

    /** Resolves once every queued write has landed. */
    async flush(): Promise<void> {
        await this.writeQueue.awaitQueueEmpty();
    }

    /**
     * Move a corrupt registry aside so the next load starts empty.
     * Returns the path the file was moved to.
     */
    static async discardCorrupt(filePath: string): Promise<string> {
        const source = path.resolve(filePath);
        const target = `${source}.corrupt-${Date.now()}`;
        await fs.rename(source, target);
        console.warn(`[ProcessedRegistry] Moved corrupt registry ${source} to ${target}`);
        return target;
    }

    // =========================================================================
    // Helpers
    // =========================================================================

    private require(identity: string): FileRecord {
        const record = this.records.get(identity);
        if (!record) {
            throw new Error(`[ProcessedRegistry] No record for ${identity}`);
        }
        return structuredClone(record);
    }

    private timestamp(): string {
        return this.clock().toISOString();
    }

    private async commit(record: FileRecord): Promise<FileRecord> {
        await this.commitAll([record]);
        return structuredClone(record);
    }

    /**
     * Persist a snapshot with `records` applied, then adopt them. A failed
     * write leaves the in-memory state as it was, matching the file on disk.
     */
    private commitAll(records: FileRecord[]): Promise<void> {
        if (!this.loaded) {
            // a write before load would clobber whatever is on disk
            return Promise.reject(new Error(`[ProcessedRegistry] Registry ${this.filePath} must be loaded before it is modified`));
        }
        return this.writeQueue.run(async () => {
            const next = new Map(this.records);
            for (const record of records) {
                next.set(record.identity, record);
            }
            await this.writeAtomically(this.serialize(next));
            this.records = next;
        });
    }

    private serialize(records: ReadonlyMap<string, FileRecord>): string {
        const files: JsonObject = {};
        for (const [identity, record] of records) {
            const {identity: _identity, ...fields} = record;
            files[identity] = {...this.recordExtras.get(identity), ...fields};
        }
        const document = {
            ...this.documentExtras,
            version: REGISTRY_FORMAT_VERSION,
            savedAt: this.timestamp(),
            files,
        };
        return JSON.stringify(document, null, 2);
    }

    private async writeAtomically(content: string): Promise<void> {
        if (!this.directoryReady) {
            await fs.mkdir(path.dirname(this.filePath), {recursive: true});
            this.directoryReady = true;
        }
        // Atomic write: write to temp file, then rename
        const tempPath = `${this.filePath}.tmp`;
        await fs.writeFile(tempPath, content, 'utf-8');
        await fs.rename(tempPath, this.filePath);
    }
}
