/**
 * FIFO of identities waiting for dispatch. Adding an identity that is already
 * queued is a no-op, so insertion order is first-enqueued order.
 */
export class PendingQueue {
    // Set iteration follows insertion order
    private items: Set<string> = new Set();

    enqueue(identity: string): boolean {
        if (this.items.has(identity)) {
            return false;
        }
        this.items.add(identity);
        return true;
    }

    dequeue(): string | undefined {
        const next = this.items.values().next();
        if (next.done) {
            return undefined;
        }
        this.items.delete(next.value);
        return next.value;
    }

    /** Put an identity back at the head, e.g. after a dequeue that could not be honoured. */
    requeueFront(identity: string): void {
        const rest = Array.from(this.items).filter(item => item !== identity);
        this.items = new Set([identity, ...rest]);
    }

    has(identity: string): boolean {
        return this.items.has(identity);
    }

    remove(identity: string): boolean {
        return this.items.delete(identity);
    }

    /** Empty the queue, returning what was in it. */
    clear(): string[] {
        const drained = Array.from(this.items);
        this.items.clear();
        return drained;
    }

    toArray(): string[] {
        return Array.from(this.items);
    }

    get size(): number {
        return this.items.size;
    }
}
