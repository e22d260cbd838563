/**
 * Collects unsubscribe callbacks so a group of listeners can be removed at once.
 */
export class ListenerCleaner {
    private cleaners: (() => void)[] = [];

    add(cleanerCallback: () => void): void {
        this.cleaners.push(cleanerCallback);
    }

    cleaner(): () => void {
        return () => {
            this.cleanUp();
        }
    }

    getSize(): number {
        return this.cleaners.length;
    }

    /**
     * Call all the cleaner callbacks and reset this cleaner to be reused.
     */
    cleanUp(): void {
        const cleaners = this.cleaners;
        this.cleaners = [];
        for (const cleaner of cleaners) {
            cleaner();
        }
    }
}
