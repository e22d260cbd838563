/**
 * Media types picked up when no extension list is configured
 */
export const DEFAULT_MEDIA_EXTENSIONS: readonly string[] = [
    '.mp3',
    '.mp4',
    '.wav',
    '.m4a',
    '.avi',
    '.mov',
    '.wmv',
    '.flac'
];
