import {afterEach, beforeEach, describe, expect, it} from 'vitest';
import {mkdir, mkdtemp, readdir, readFile, rm, writeFile} from "fs/promises";
import {existsSync} from 'fs';
import * as os from 'os';
import * as path from 'path';
import {ProcessedRegistry} from "./ProcessedRegistry.js";
import {ConfigurationError, RegistryCorruptionError} from "../errors/WatchErrors.js";

const NOW = '2026-01-02T03:04:05.000Z';
const clock = () => new Date(NOW);

async function readDocument(filePath: string): Promise<Record<string, unknown>> {
    return JSON.parse(await readFile(filePath, 'utf-8'));
}

describe('ProcessedRegistry', () => {
    let dir: string;
    let file: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'registry-'));
        file = path.join(dir, 'registry.json');
    });

    afterEach(async () => {
        await rm(dir, {recursive: true, force: true});
    });

    it('starts empty when the file does not exist', async () => {
        const registry = new ProcessedRegistry(file, clock);
        await registry.load();
        expect(registry.size).toBe(0);
        expect(registry.isLoaded()).toBe(true);
        expect(existsSync(file)).toBe(false);
    });

    it('persists every transition as a full snapshot', async () => {
        const registry = new ProcessedRegistry(file, clock);
        await registry.load();

        const pending = await registry.recordPending('/w/a.wav', {size: 10, mtimeMs: 100});
        expect(pending).toEqual({
            identity: '/w/a.wav',
            status: 'pending',
            size: 10,
            mtimeMs: 100,
            firstSeenAt: NOW,
            updatedAt: NOW,
            completedAt: null,
        });
        expect(registry.isKnown('/w/a.wav')).toBe(false);

        await registry.recordInProgress('/w/a.wav');
        expect(registry.isKnown('/w/a.wav')).toBe(true);

        await registry.recordCompleted('/w/a.wav', {transcript: 'ok'});

        const document = await readDocument(file);
        expect(document.version).toBe(1);
        expect(document.savedAt).toBe(NOW);
        expect(document.files).toEqual({
            '/w/a.wav': {
                status: 'completed',
                size: 10,
                mtimeMs: 100,
                firstSeenAt: NOW,
                updatedAt: NOW,
                completedAt: NOW,
                result: {transcript: 'ok'},
            },
        });
        expect(await readdir(dir)).toEqual(['registry.json']);
    });

    it('reloads what a previous instance wrote', async () => {
        const first = new ProcessedRegistry(file, clock);
        await first.load();
        await first.recordPending('/w/a.wav', {size: 1, mtimeMs: 2});
        await first.recordInProgress('/w/a.wav');
        await first.recordFailed('/w/a.wav', 'decoder crashed');

        const second = new ProcessedRegistry(file, clock);
        await second.load();
        expect(second.get('/w/a.wav')).toEqual({
            identity: '/w/a.wav',
            status: 'failed',
            size: 1,
            mtimeMs: 2,
            firstSeenAt: NOW,
            updatedAt: NOW,
            completedAt: null,
            error: 'decoder crashed',
        });
        expect(second.isKnown('/w/a.wav')).toBe(false);
        expect(second.countByStatus()).toEqual({pending: 0, in_progress: 0, completed: 0, failed: 1});
    });

    it('creates a completed record for an identity it has never seen', async () => {
        const registry = new ProcessedRegistry(file, clock);
        await registry.load();
        const record = await registry.recordCompleted('/w/d.wav', {source: 'manual'});
        expect(record.status).toBe('completed');
        expect(record.size).toBe(0);
        expect(record.result).toEqual({source: 'manual'});
        expect(registry.isKnown('/w/d.wav')).toBe(true);
    });

    it('keeps unknown document and record fields on rewrite', async () => {
        await writeFile(file, JSON.stringify({
            version: 1,
            savedAt: 'earlier',
            owner: 'ops',
            files: {
                '/w/a.wav': {
                    status: 'completed',
                    size: 1,
                    mtimeMs: 2,
                    firstSeenAt: 'earlier',
                    updatedAt: 'earlier',
                    completedAt: 'earlier',
                    checksum: 'abc',
                },
            },
        }));

        const registry = new ProcessedRegistry(file, clock);
        await registry.load();
        await registry.recordPending('/w/b.wav', {size: 3, mtimeMs: 4});

        const document = await readDocument(file);
        expect(document.owner).toBe('ops');
        expect(document.files).toEqual({
            '/w/a.wav': {
                status: 'completed',
                size: 1,
                mtimeMs: 2,
                firstSeenAt: 'earlier',
                updatedAt: 'earlier',
                completedAt: 'earlier',
                checksum: 'abc',
            },
            '/w/b.wav': {
                status: 'pending',
                size: 3,
                mtimeMs: 4,
                firstSeenAt: NOW,
                updatedAt: NOW,
                completedAt: null,
            },
        });
    });

    it('refuses unparsable, empty or malformed files', async () => {
        await writeFile(file, '{"version": 1, "files": ');
        await expect(new ProcessedRegistry(file).load()).rejects.toBeInstanceOf(RegistryCorruptionError);

        await writeFile(file, '   ');
        await expect(new ProcessedRegistry(file).load()).rejects.toThrow('Registry file is empty');

        await writeFile(file, JSON.stringify({version: 1, files: {'/w/a.wav': {status: 'done'}}}));
        await expect(new ProcessedRegistry(file).load()).rejects.toThrow('Invalid record for /w/a.wav');

        await writeFile(file, JSON.stringify([]));
        await expect(new ProcessedRegistry(file).load()).rejects.toThrow('Registry document must be an object');
    });

    it('reports an unreadable registry path as a configuration problem', async () => {
        // a directory where the file should be
        const registry = new ProcessedRegistry(dir);
        await expect(registry.load()).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('moves a corrupt file aside on request', async () => {
        await writeFile(file, 'garbage');
        const moved = await ProcessedRegistry.discardCorrupt(file);

        expect(moved.startsWith(`${file}.corrupt-`)).toBe(true);
        expect(await readFile(moved, 'utf-8')).toBe('garbage');
        expect(existsSync(file)).toBe(false);

        const registry = new ProcessedRegistry(file);
        await registry.load();
        expect(registry.size).toBe(0);
    });

    it('flags records left in progress by a previous session', async () => {
        await writeFile(file, JSON.stringify({
            version: 1,
            savedAt: 'earlier',
            files: {
                '/w/a.wav': {status: 'in_progress', size: 1, mtimeMs: 1, firstSeenAt: 'x', updatedAt: 'x', completedAt: null},
                '/w/b.wav': {status: 'completed', size: 1, mtimeMs: 1, firstSeenAt: 'x', updatedAt: 'x', completedAt: 'x'},
            },
        }));

        const registry = new ProcessedRegistry(file, clock);
        await registry.load();
        expect(await registry.markInterruptedForReview()).toEqual(['/w/a.wav']);

        const record = registry.get('/w/a.wav');
        expect(record?.status).toBe('in_progress');
        expect(record?.needsReview).toBe(true);
        expect(record?.reviewReason).toBe('interrupted before completion');
        expect(registry.get('/w/b.wav')?.needsReview).toBeUndefined();

        const reloaded = new ProcessedRegistry(file);
        await reloaded.load();
        expect(reloaded.get('/w/a.wav')?.needsReview).toBe(true);
    });

    it('rejects transitions for unknown identities and writes before load', async () => {
        const unloaded = new ProcessedRegistry(file);
        await expect(unloaded.recordPending('/w/a.wav', {size: 1, mtimeMs: 1})).rejects.toThrow('must be loaded');

        const registry = new ProcessedRegistry(file);
        await registry.load();
        await expect(registry.recordInProgress('/w/missing.wav')).rejects.toThrow('No record for /w/missing.wav');
    });

    it('hands out copies that do not alter the registry', async () => {
        const registry = new ProcessedRegistry(file);
        await registry.load();
        await registry.recordCompleted('/w/a.wav', {text: 'one'});

        const copy = registry.get('/w/a.wav');
        if (copy?.result) {
            copy.result.text = 'changed';
        }
        expect(registry.get('/w/a.wav')?.result).toEqual({text: 'one'});
    });

    it('keeps the previous state when a snapshot cannot be written', async () => {
        const registry = new ProcessedRegistry(file, clock);
        await registry.load();
        await registry.recordPending('/w/a.wav', {size: 10, mtimeMs: 100});

        // a directory in the way of the temp file makes the write fail
        await mkdir(`${file}.tmp`);
        await expect(registry.recordInProgress('/w/a.wav')).rejects.toMatchObject({code: 'EISDIR'});
        await expect(registry.recordFailed('/w/a.wav', 'decoder crashed')).rejects.toMatchObject({code: 'EISDIR'});

        expect(registry.get('/w/a.wav')?.status).toBe('pending');
        expect(registry.get('/w/a.wav')?.error).toBeUndefined();
        expect(registry.isKnown('/w/a.wav')).toBe(false);

        await rm(`${file}.tmp`, {recursive: true});
        await registry.recordInProgress('/w/a.wav');
        expect(registry.get('/w/a.wav')?.status).toBe('in_progress');

        const reloaded = new ProcessedRegistry(file);
        await reloaded.load();
        expect(reloaded.get('/w/a.wav')?.status).toBe('in_progress');
    });
});
