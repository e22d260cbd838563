import * as path from 'path';
import type {DiscoveryError, DiscoverySink, DiscoverySource} from "@dropwatch/folder-watcher";

/**
 * In-process discovery source for tests: candidates are pushed by hand.
 */
export class ManualDiscoverySource implements DiscoverySource {
    readonly mode = 'polling' as const;
    readonly directory: string;
    private sink: DiscoverySink | null = null;
    startCount = 0;
    stopCount = 0;

    constructor(directory: string, private readonly initial: string[] = []) {
        this.directory = path.resolve(directory);
    }

    async start(sink: DiscoverySink): Promise<void> {
        this.sink = sink;
        this.startCount++;
        for (const name of this.initial) {
            sink.onCandidate(path.join(this.directory, name));
        }
    }

    async stop(): Promise<void> {
        this.sink = null;
        this.stopCount++;
    }

    isStarted(): boolean {
        return this.sink !== null;
    }

    emit(name: string): void {
        this.sink?.onCandidate(path.join(this.directory, name));
    }

    fail(error: DiscoveryError): void {
        const sink = this.sink;
        this.sink = null;
        sink?.onFatal(error);
    }
}
