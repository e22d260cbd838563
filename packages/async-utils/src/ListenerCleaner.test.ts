import {describe, expect, it} from 'vitest';
import {ListenerCleaner} from "./ListenerCleaner.js";

describe('ListenerCleaner', () => {
    it('calls every registered cleaner once and resets', () => {
        const cleaner = new ListenerCleaner();
        const calls: string[] = [];
        cleaner.add(() => calls.push('a'));
        cleaner.add(() => calls.push('b'));

        cleaner.cleaner()();
        cleaner.cleanUp();

        expect(calls).toEqual(['a', 'b']);
        expect(cleaner.getSize()).toBe(0);
    });
});
