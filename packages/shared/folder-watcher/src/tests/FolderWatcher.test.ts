import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';
import {appendFile, mkdir, mkdtemp, rm, writeFile} from "fs/promises";
import * as os from 'os';
import * as path from 'path';
import type {FSWatcher} from 'chokidar';
import {DiscoveryError, FolderWatcher} from "../lib/index.js";

function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

function collectingSink() {
    const candidates: string[] = [];
    const fatal: DiscoveryError[] = [];
    return {
        candidates,
        fatal,
        sink: {
            onCandidate: (filePath: string) => {
                candidates.push(filePath);
            },
            onFatal: (error: DiscoveryError) => {
                fatal.push(error);
            },
        },
    };
}

/** Chokidar reports an error before its initial tree is ready. */
class EarlyErrorWatcher extends FolderWatcher {
    protected createWatcher(): FSWatcher {
        const watcher = super.createWatcher();
        process.nextTick(() => watcher.emit('error', new Error('watch limit reached')));
        return watcher;
    }
}

describe('FolderWatcher', () => {
    let root: string;
    let watcher: FolderWatcher | null = null;

    beforeEach(async () => {
        root = await mkdtemp(path.join(os.tmpdir(), 'folder-watcher-'));
    });

    afterEach(async () => {
        if (watcher) {
            await watcher.stop();
            watcher = null;
        }
        await rm(root, {recursive: true, force: true});
    });

    it('discoverFiles yields files and skips directories when not recursive', async () => {
        await writeFile(path.join(root, 'one.mp3'), '1');
        await mkdir(path.join(root, 'nested'));
        await writeFile(path.join(root, 'nested', 'two.mp3'), '2');

        const flat = new FolderWatcher({directory: root});
        const found: string[] = [];
        for await (const filePath of flat.discoverFiles([root])) {
            found.push(filePath);
        }
        expect(found).toEqual([path.join(root, 'one.mp3')]);

        const deep: string[] = [];
        for await (const filePath of flat.discoverFiles([root], true)) {
            deep.push(filePath);
        }
        expect(deep).toEqual([path.join(root, 'one.mp3'), path.join(root, 'nested', 'two.mp3')]);
    });

    it('emits each pre-existing file exactly once on start', async () => {
        await writeFile(path.join(root, 'a.mp3'), 'a');
        await writeFile(path.join(root, 'b.wav'), 'b');
        const {candidates, sink} = collectingSink();

        watcher = new FolderWatcher({directory: root, coalesceMs: 20});
        await watcher.start(sink);
        await delay(150);

        expect([...candidates].sort()).toEqual([path.join(root, 'a.mp3'), path.join(root, 'b.wav')]);
    });

    it('emits files created after start', async () => {
        const {candidates, sink} = collectingSink();
        watcher = new FolderWatcher({directory: root, coalesceMs: 20});
        await watcher.start(sink);

        const created = path.join(root, 'late.mp4');
        await writeFile(created, 'late');

        await vi.waitFor(() => expect(candidates).toContain(created), {timeout: 5000});
    });

    it('fails to start on a missing directory', async () => {
        const {sink} = collectingSink();
        const missing = new FolderWatcher({directory: path.join(root, 'missing')});
        await expect(missing.start(sink)).rejects.toBeInstanceOf(DiscoveryError);
    });

    it('reports a removed root once through onFatal', async () => {
        const {fatal, sink} = collectingSink();
        watcher = new FolderWatcher({directory: root, rootCheckIntervalMs: 50});
        await watcher.start(sink);

        await rm(root, {recursive: true, force: true});

        await vi.waitFor(() => expect(fatal).toHaveLength(1), {timeout: 5000});
        await delay(150);
        expect(fatal).toHaveLength(1);
        expect(fatal[0].code).toBe('ENOENT');
    });

    it('collapses a burst of writes to one path into a single emission', async () => {
        const {candidates, sink} = collectingSink();
        watcher = new FolderWatcher({directory: root, coalesceMs: 400});
        await watcher.start(sink);

        const target = path.join(root, 'burst.wav');
        await writeFile(target, 'a');
        for (let i = 0; i < 3; i++) {
            await delay(30);
            await appendFile(target, 'more');
        }

        await vi.waitFor(() => expect(candidates).toEqual([target]), {timeout: 5000});
        await delay(600);
        expect(candidates).toEqual([target]);
    });

    it('leaves nothing running when stopped during start', async () => {
        await writeFile(path.join(root, 'a.wav'), 'a');
        const {candidates, sink} = collectingSink();
        watcher = new FolderWatcher({directory: root, coalesceMs: 20, rootCheckIntervalMs: 20});

        const starting = watcher.start(sink);
        await watcher.stop();
        await starting;

        expect(watcher.isActive()).toBe(false);
        await writeFile(path.join(root, 'late.wav'), 'late');
        await delay(150);
        expect(candidates).toEqual([]);
    });

    it('rejects start when chokidar fails before it is ready', async () => {
        const {fatal, sink} = collectingSink();
        const failing = new EarlyErrorWatcher({directory: root});
        watcher = failing;

        await expect(failing.start(sink)).rejects.toThrow('Watcher failed before it was ready: watch limit reached');
        expect(failing.isActive()).toBe(false);
        expect(fatal).toEqual([]);
    });
});
