import type {FileMetadata} from "../registry/FileRecord.js";

export interface StabilityVerdict {
    stable: boolean;
    /** How long until the next observation could be conclusive */
    remainingMs: number;
}

interface Observation extends FileMetadata {
    since: number;
}

/**
 * Debounce for files that may still be written.
 *
 * A file is stable once two consecutive observations agree on size and mtime
 * and are at least `windowMs` apart. Any difference restarts the window from
 * the newer observation.
 */
export class StabilityTracker {
    private observations: Map<string, Observation> = new Map();

    constructor(private readonly windowMs: number) {
        if (!(windowMs >= 0)) {
            throw new Error(`[StabilityTracker] windowMs must be >= 0, got ${windowMs}`);
        }
    }

    observe(identity: string, metadata: FileMetadata, now: number): StabilityVerdict {
        const previous = this.observations.get(identity);
        if (!previous || previous.size !== metadata.size || previous.mtimeMs !== metadata.mtimeMs) {
            this.observations.set(identity, {size: metadata.size, mtimeMs: metadata.mtimeMs, since: now});
            return {stable: false, remainingMs: this.windowMs};
        }

        const elapsed = now - previous.since;
        if (elapsed >= this.windowMs) {
            return {stable: true, remainingMs: 0};
        }
        return {stable: false, remainingMs: this.windowMs - elapsed};
    }

    has(identity: string): boolean {
        return this.observations.has(identity);
    }

    forget(identity: string): void {
        this.observations.delete(identity);
    }

    clear(): void {
        this.observations.clear();
    }

    get size(): number {
        return this.observations.size;
    }
}
