import * as path from 'path';

export type FileStatus = 'pending' | 'in_progress' | 'completed' | 'failed';

export const FILE_STATUSES: readonly FileStatus[] = ['pending', 'in_progress', 'completed', 'failed'];

export interface FileMetadata {
    size: number;
    mtimeMs: number;
}

/**
 * One entry per file ever seen. The identity is the absolute normalized path,
 * so a moved or renamed file is a new record.
 */
export interface FileRecord extends FileMetadata {
    identity: string;
    status: FileStatus;
    firstSeenAt: string;
    updatedAt: string;
    /** ISO timestamp, set once the record is completed */
    completedAt: string | null;
    /** Payload returned by the processing callback on success */
    result?: Record<string, unknown>;
    /** Failure description */
    error?: string;
    /** Set when a dispatch was abandoned at stop or interrupted by a crash */
    needsReview?: boolean;
    reviewReason?: string;
}

export function toIdentity(filePath: string): string {
    return path.resolve(filePath);
}

export function isFileStatus(value: unknown): value is FileStatus {
    return FILE_STATUSES.some(status => status === value);
}
