import {describeError} from "../errors/WatchErrors.js";

export interface ProcessingSuccess {
    ok: true;
    result?: Record<string, unknown>;
}

export interface ProcessingFailure {
    ok: false;
    error: string;
}

export type ProcessingOutcome = ProcessingSuccess | ProcessingFailure;

/**
 * What the engine calls once per eligible file. Bookkeeping stays with the
 * engine: a callback reports its outcome and never touches the registry.
 * Throwing (or rejecting) counts as a failure.
 */
export type ProcessingCallback = (filePath: string) => ProcessingOutcome | Promise<ProcessingOutcome>;

export function succeeded(result?: Record<string, unknown>): ProcessingSuccess {
    return result === undefined ? {ok: true} : {ok: true, result};
}

export function failed(error: string): ProcessingFailure {
    return {ok: false, error};
}

export async function invokeCallback(callback: ProcessingCallback, filePath: string): Promise<ProcessingOutcome> {
    try {
        return await callback(filePath);
    } catch (error) {
        return failed(describeError(error));
    }
}
