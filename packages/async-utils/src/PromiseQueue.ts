import {makeid} from "./Id.js";

/**
 * Runs tasks one after another, in the order they were added.
 *
 * A failing task does not break the chain: its rejection is delivered to the
 * caller of `add` and the next task starts as usual.
 */
export class PromiseQueue {
    // never rejects; failures are delivered to the caller of `add`
    private tail: Promise<unknown> = Promise.resolve();
    private queueSize = 0;

    constructor(private readonly name: string = "queue-" + makeid(6)) {
    }

    getName(): string {
        return this.name;
    }

    /** Number of tasks added and not yet settled (including the running one). */
    getQueueSize(): number {
        return this.queueSize;
    }

    async awaitQueueEmpty(): Promise<void> {
        while (this.queueSize !== 0) {
            await this.tail;
        }
    }

    add<T>(task: () => Promise<T>, id: string = "promise-" + makeid(8)): { id: string, promise: Promise<T> } {
        const previous = this.tail;
        this.queueSize++;
        const promise = (async () => {
            await previous;
            try {
                return await task();
            } finally {
                this.queueSize--;
            }
        })();
        // keep the chain alive without surfacing an unhandled rejection here
        this.tail = promise.catch(() => undefined);
        return {id, promise};
    }

    /** Shorthand for `add(task).promise`. */
    run<T>(task: () => Promise<T>): Promise<T> {
        return this.add(task).promise;
    }
}
