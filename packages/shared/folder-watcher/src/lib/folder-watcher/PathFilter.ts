import * as path from 'path';

export interface PathFilterOptions {
    /** Extensions with or without the leading dot, any case. */
    acceptedExtensions: Iterable<string>;
    /** Name endings that mark a file still being downloaded or copied. */
    transientSuffixes?: Iterable<string>;
}

export const DEFAULT_TRANSIENT_SUFFIXES: readonly string[] = ['.part', '.partial', '.crdownload', '.download', '.tmp', '~'];

const SYSTEM_FILE_NAMES = new Set(['thumbs.db', 'desktop.ini', '.ds_store']);

export function normalizeExtension(extension: string): string {
    const trimmed = extension.trim().toLowerCase();
    if (trimmed.length === 0) {
        return trimmed;
    }
    return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * Decides whether a discovered path may enter the work queue.
 *
 * Rules, in order: regular file, extension in the allow-list, not transient.
 * Rejected paths are dropped silently; they are never recorded as failures.
 */
export class PathFilter {
    private readonly extensions: ReadonlySet<string>;
    private readonly transientSuffixes: readonly string[];

    constructor(options: PathFilterOptions) {
        this.extensions = new Set(
            Array.from(options.acceptedExtensions, normalizeExtension).filter(ext => ext.length > 0)
        );
        this.transientSuffixes = Array.from(options.transientSuffixes ?? DEFAULT_TRANSIENT_SUFFIXES, s => s.toLowerCase());
    }

    getAcceptedExtensions(): ReadonlySet<string> {
        return this.extensions;
    }

    isTransient(filePath: string): boolean {
        const name = path.basename(filePath).toLowerCase();
        if (name.startsWith('.') || name.startsWith('~$')) {
            return true;
        }
        if (SYSTEM_FILE_NAMES.has(name)) {
            return true;
        }
        return this.transientSuffixes.some(suffix => name.endsWith(suffix));
    }

    hasAcceptedExtension(filePath: string): boolean {
        return this.extensions.has(path.extname(filePath).toLowerCase());
    }

    /** Name-only check, usable before the file is stat'ed. */
    matchesName(filePath: string): boolean {
        return this.hasAcceptedExtension(filePath) && !this.isTransient(filePath);
    }

    accepts(filePath: string, stats: { isFile(): boolean }): boolean {
        if (!stats.isFile()) {
            return false;
        }
        return this.matchesName(filePath);
    }
}
