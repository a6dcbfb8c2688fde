export const DEFAULT_POLL_ATTEMPTS = 10;
export const DEFAULT_POLL_DELAY_MS = 1000;
export const DEFAULT_CLEANUP_INITIAL_DELAY_MS = 5000;
export const DEFAULT_MAX_CLEANUP_TIMEOUT_MS = 10 * 60 * 1000;

export const BACKUP_OBJECT_SUFFIX = '.json';
export const SENTINEL_VALUE = Buffer.from('sentinel').toString('base64');
