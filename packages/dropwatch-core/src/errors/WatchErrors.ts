/**
 * Errors raised by the watch engine and its configuration layer.
 *
 * Per-file processing problems are not errors at this level; they end up as
 * `failed` records in the registry.
 */

/**
 * Invalid options, a missing or unreadable input directory, or a config file
 * that cannot be read. Raised before the engine leaves `stopped`.
 */
export class ConfigurationError extends Error {
    constructor(
        message: string,
        public readonly option?: string,
        cause?: unknown
    ) {
        super(option ? `${message} (option: ${option})` : message, {cause});
        this.name = 'ConfigurationError';
    }
}

/**
 * The persisted registry exists but cannot be trusted. The engine never resets
 * it on its own; see `ProcessedRegistry.discardCorrupt`.
 */
export class RegistryCorruptionError extends Error {
    constructor(
        message: string,
        public readonly filePath: string,
        cause?: unknown
    ) {
        super(`${message} (file: ${filePath})`, {cause});
        this.name = 'RegistryCorruptionError';
    }
}

/** Lifecycle misuse, e.g. starting twice. */
export class EngineStateError extends Error {
    constructor(
        message: string,
        public readonly state: string
    ) {
        super(`${message} (state: ${state})`);
        this.name = 'EngineStateError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
