import {describe, expect, it} from 'vitest';
import {PromiseQueue} from "./PromiseQueue.js";

function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

describe('PromiseQueue', () => {
    it('runs tasks one at a time in insertion order', async () => {
        const queue = new PromiseQueue('order');
        const events: string[] = [];
        const slow = queue.run(async () => {
            events.push('slow:start');
            await delay(20);
            events.push('slow:end');
            return 1;
        });
        const fast = queue.run(async () => {
            events.push('fast:start');
            events.push('fast:end');
            return 2;
        });

        expect(await Promise.all([slow, fast])).toEqual([1, 2]);
        expect(events).toEqual(['slow:start', 'slow:end', 'fast:start', 'fast:end']);
    });

    it('keeps going after a task rejects', async () => {
        const queue = new PromiseQueue();
        const failing = queue.run(async () => {
            throw new Error('boom');
        });
        const next = queue.run(async () => 'ok');

        await expect(failing).rejects.toThrow('boom');
        await expect(next).resolves.toBe('ok');
    });

    it('tracks the number of unsettled tasks', async () => {
        const queue = new PromiseQueue();
        let release: () => void = () => undefined;
        const gate = new Promise<void>(resolve => {
            release = resolve;
        });
        const first = queue.run(() => gate);
        const second = queue.run(async () => undefined);

        expect(queue.getQueueSize()).toBe(2);
        release();
        await Promise.all([first, second]);
        expect(queue.getQueueSize()).toBe(0);
    });

    it('awaitQueueEmpty resolves once every task settled', async () => {
        const queue = new PromiseQueue();
        const done: number[] = [];
        for (let i = 0; i < 3; i++) {
            queue.add(async () => {
                await delay(5);
                done.push(i);
            });
        }
        await queue.awaitQueueEmpty();
        expect(done).toEqual([0, 1, 2]);
    });

    it('returns the given id', () => {
        const queue = new PromiseQueue();
        const {id, promise} = queue.add(async () => undefined, 'persist-1');
        expect(id).toBe('persist-1');
        return promise;
    });
});
