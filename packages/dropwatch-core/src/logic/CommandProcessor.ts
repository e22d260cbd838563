import {execFile} from 'child_process';
import {failed, ProcessingCallback, ProcessingOutcome, succeeded} from "./ProcessingCallback.js";

export const FILE_PLACEHOLDER = '{file}';

/** Keep only the end of captured output in records and error messages */
const OUTPUT_TAIL_LENGTH = 2000;
const MAX_BUFFER = 16 * 1024 * 1024;

export interface CommandProcessorOptions {
    /** Executable to run for every file, resolved through PATH */
    command: string;
    /** Arguments; `{file}` is replaced by the file path, otherwise the path is appended */
    args?: readonly string[];
    /** Kill the command after this long; 0 or absent waits forever */
    timeoutMs?: number;
    cwd?: string;
}

export function buildArguments(args: readonly string[], filePath: string): string[] {
    if (!args.some(arg => arg.includes(FILE_PLACEHOLDER))) {
        return [...args, filePath];
    }
    return args.map(arg => arg.split(FILE_PLACEHOLDER).join(filePath));
}

function tail(output: string): string {
    const trimmed = output.trim();
    return trimmed.length > OUTPUT_TAIL_LENGTH ? trimmed.slice(-OUTPUT_TAIL_LENGTH) : trimmed;
}

function describeFailure(error: Error, stderr: string, timeoutMs: number): string {
    const details = tail(stderr);
    const suffix = details.length > 0 ? `: ${details}` : '';

    if ('killed' in error && error.killed === true && timeoutMs > 0) {
        return `command timed out after ${timeoutMs}ms${suffix}`;
    }
    if ('code' in error) {
        if (typeof error.code === 'number') {
            return `command exited with code ${error.code}${suffix}`;
        }
        if (typeof error.code === 'string') {
            return `command failed to start (${error.code}): ${error.message}`;
        }
    }
    if ('signal' in error && typeof error.signal === 'string') {
        return `command terminated by ${error.signal}${suffix}`;
    }
    return `command failed: ${error.message}`;
}

/**
 * Processing callback that runs an external program per file, the way a
 * transcription or conversion tool is usually wired in. Exit code 0 is
 * success; anything else is a failure carrying the tail of stderr.
 */
export function createCommandProcessor(options: CommandProcessorOptions): ProcessingCallback {
    const args = options.args ?? [];
    const timeoutMs = options.timeoutMs ?? 0;

    return (filePath: string) => new Promise<ProcessingOutcome>(resolve => {
        const startTime = Date.now();
        execFile(options.command, buildArguments(args, filePath), {
            cwd: options.cwd,
            timeout: timeoutMs,
            maxBuffer: MAX_BUFFER,
            encoding: 'utf8',
            windowsHide: true,
        }, (error, stdout, stderr) => {
            const durationMs = Date.now() - startTime;
            if (error) {
                resolve(failed(describeFailure(error, stderr, timeoutMs)));
                return;
            }
            resolve(succeeded({
                command: options.command,
                exitCode: 0,
                durationMs,
                stdout: tail(stdout),
            }));
        });
    });
}
