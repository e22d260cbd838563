import {describe, expect, it} from 'vitest';
import {buildArguments, createCommandProcessor} from "./CommandProcessor.js";
import {failed, invokeCallback, succeeded} from "./ProcessingCallback.js";

// the test runner's own node binary stands in for an external tool
const NODE = process.execPath;

describe('buildArguments', () => {
    it('substitutes every {file} placeholder', () => {
        expect(buildArguments(['--in', '{file}', '--out', '{file}.txt'], '/w/a.wav'))
            .toEqual(['--in', '/w/a.wav', '--out', '/w/a.wav.txt']);
    });

    it('appends the path when there is no placeholder', () => {
        expect(buildArguments(['--model', 'base'], '/w/a.wav')).toEqual(['--model', 'base', '/w/a.wav']);
        expect(buildArguments([], '/w/a.wav')).toEqual(['/w/a.wav']);
    });
});

describe('invokeCallback', () => {
    it('turns a thrown error into a failure', async () => {
        const outcome = await invokeCallback(() => {
            throw new Error('no decoder');
        }, '/w/a.wav');
        expect(outcome).toEqual({ok: false, error: 'no decoder'});
    });

    it('passes outcomes through', async () => {
        expect(await invokeCallback(async () => succeeded({words: 3}), '/w/a.wav')).toEqual({ok: true, result: {words: 3}});
        expect(await invokeCallback(() => failed('empty file'), '/w/a.wav')).toEqual({ok: false, error: 'empty file'});
        expect(succeeded()).toEqual({ok: true});
    });
});

describe('createCommandProcessor', () => {
    it('reports success with the command output', async () => {
        const processor = createCommandProcessor({
            command: NODE,
            args: ['-e', 'process.stdout.write("processed " + process.argv[1])', '{file}'],
        });

        const outcome = await processor('/w/a.wav');
        expect(outcome.ok).toBe(true);
        if (outcome.ok) {
            expect(outcome.result?.stdout).toBe('processed /w/a.wav');
            expect(outcome.result?.exitCode).toBe(0);
            expect(outcome.result?.command).toBe(NODE);
            expect(typeof outcome.result?.durationMs).toBe('number');
        }
    });

    it('reports a non-zero exit with the end of stderr', async () => {
        const processor = createCommandProcessor({
            command: NODE,
            args: ['-e', 'process.stderr.write("unsupported codec\\n"); process.exit(3)'],
        });

        expect(await processor('/w/a.wav')).toEqual({ok: false, error: 'command exited with code 3: unsupported codec'});
    });

    it('kills a command that runs past its timeout', async () => {
        const processor = createCommandProcessor({
            command: NODE,
            args: ['-e', 'setTimeout(() => {}, 10000)'],
            timeoutMs: 200,
        });

        expect(await processor('/w/a.wav')).toEqual({ok: false, error: 'command timed out after 200ms'});
    });

    it('reports a command that cannot be started', async () => {
        const processor = createCommandProcessor({command: '/nonexistent/dropwatch-tool'});
        const outcome = await processor('/w/a.wav');
        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error.startsWith('command failed to start (ENOENT)')).toBe(true);
        }
    });
});
