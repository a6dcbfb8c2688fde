import type { ListingEntry } from './object-storage';

/**
 * Raised when a bucket name already exists but belongs to a principal this
 * harness cannot mutate.
 */
export class BucketConflictError extends Error {
    readonly bucket: string;

    constructor(bucket: string) {
        super(
            `Unable to create bucket: ${bucket} since it already exists `
            + 'however permissions are inadequate',
        );
        this.name = 'BucketConflictError';
        this.bucket = bucket;
    }
}

/**
 * Raised by the listing poller when the expected storage state never
 * materialized within the attempt budget.
 */
export class PollingExhaustedError extends Error {
    readonly attempts: number;

    readonly lastReason: string;

    readonly lastSnapshot: readonly ListingEntry[];

    constructor(
        attempts: number,
        lastReason: string,
        lastSnapshot: readonly ListingEntry[],
        cause?: unknown,
    ) {
        super(
            `listing not ready after ${attempts} attempts: ${lastReason}`,
            cause === undefined ? undefined : { cause },
        );
        this.name = 'PollingExhaustedError';
        this.attempts = attempts;
        this.lastReason = lastReason;
        this.lastSnapshot = lastSnapshot;
    }
}

export class MalformedPayloadError extends Error {
    readonly path: string;

    constructor(path: string, detail: string) {
        super(`malformed record payload at ${path}: ${detail}`);
        this.name = 'MalformedPayloadError';
        this.path = path;
    }
}

export class InvalidEncodingError extends Error {
    readonly field: string;

    constructor(field: string) {
        super(`${field} is not valid base64`);
        this.name = 'InvalidEncodingError';
        this.field = field;
    }
}

/**
 * Raised when teardown could not delete every tracked bucket in time. The
 * listed buckets may have leaked.
 */
export class CleanupTimeoutError extends Error {
    readonly timeoutMs: number;

    readonly buckets: readonly string[];

    constructor(timeoutMs: number, buckets: readonly string[]) {
        super(
            `bucket cleanup did not finish within ${timeoutMs}ms `
            + `for buckets: ${buckets.join(',')}`,
        );
        this.name = 'CleanupTimeoutError';
        this.timeoutMs = timeoutMs;
        this.buckets = buckets;
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error && error.message) {
        return error.message;
    }

    return String(error);
}
