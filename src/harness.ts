import { randomUUID } from 'node:crypto';
import type { Arbitrary } from 'fast-check';
import { BACKUP_OBJECT_SUFFIX } from './constants';
import type { BucketLifecycleManager } from './bucket-lifecycle';
import {
    waitUntil,
    type Readiness,
} from './consistency-poller';
import { bucketNameArbitrary } from './generators';
import type {
    ListingSnapshot,
    ObjectStorage,
} from './object-storage';
import {
    decode,
    presentRecords,
} from './record-codec';
import { systemScheduler, type Scheduler } from './scheduler';
import type { DomainRecord } from './types';

const ISO_DATE_TIME_PREFIX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/;

export type BackupTestHarnessOptions = {
    bucketPrefix?: string;
    pollAttempts: number;
    pollDelayMs: number;
    scheduler?: Scheduler;
    /** Lets generated bucket names contain dots. */
    useVirtualDotHost?: boolean;
};

export type WaitForDownloadOptions = {
    attempts?: number;
    delayMs?: number;
};

/**
 * Milliseconds since epoch encoded at the front of a backup object key,
 * e.g. `2024-01-01T00:00:00Z.json`, or null for keys in another layout.
 */
export function keyToTimestamp(key: string): number | null {
    const base = key.endsWith(BACKUP_OBJECT_SUFFIX)
        ? key.slice(0, -BACKUP_OBJECT_SUFFIX.length)
        : key;
    const name = base.slice(base.lastIndexOf('/') + 1);

    if (!ISO_DATE_TIME_PREFIX.test(name)) {
        return null;
    }

    const parsed = Date.parse(name);

    return Number.isNaN(parsed) ? null : parsed;
}

export function compareBackupKeys(
    left: string,
    right: string,
): number {
    const leftTime = keyToTimestamp(left);
    const rightTime = keyToTimestamp(right);

    if (leftTime !== null && rightTime !== null && leftTime !== rightTime) {
        return leftTime - rightTime;
    }

    if (leftTime !== null && rightTime === null) {
        return -1;
    }

    if (leftTime === null && rightTime !== null) {
        return 1;
    }

    return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * What a backup test needs in one place: bucket setup and teardown,
 * waiting for the listing to settle, and reading records back.
 */
export class BackupTestHarness {
    private readonly scheduler: Scheduler;

    constructor(
        readonly storage: ObjectStorage,
        readonly lifecycle: BucketLifecycleManager,
        private readonly options: BackupTestHarnessOptions,
    ) {
        this.scheduler = options.scheduler ?? systemScheduler;
    }

    nextBucketName(): string {
        return `${this.options.bucketPrefix ?? ''}${randomUUID()}`;
    }

    /**
     * Random valid bucket names under the configured prefix, for property
     * tests that create their own buckets.
     */
    bucketNames(): Arbitrary<string> {
        return bucketNameArbitrary({
            prefix: this.options.bucketPrefix,
            useVirtualDotHost: this.options.useVirtualDotHost ?? false,
        });
    }

    createBucket(bucket: string): Promise<void> {
        return this.lifecycle.createBucket(bucket);
    }

    waitForDownload<T>(
        bucket: string,
        transform: (snapshot: ListingSnapshot) => Readiness<T>,
        options: WaitForDownloadOptions = {},
    ): Promise<T> {
        return waitUntil(
            () => this.storage.listObjects(bucket),
            transform,
            {
                attempts: options.attempts ?? this.options.pollAttempts,
                delayMs: options.delayMs ?? this.options.pollDelayMs,
                scheduler: this.scheduler,
            },
        );
    }

    /**
     * Downloads every object in `bucket`, oldest key first, and returns the
     * decoded records with padding entries dropped.
     */
    async downloadRecords(
        bucket: string,
        snapshot?: ListingSnapshot,
    ): Promise<DomainRecord[]> {
        const listing = snapshot ?? await this.storage.listObjects(bucket);
        const keys = listing
            .map((entry) => entry.key)
            .sort(compareBackupKeys);
        const objects = await Promise.all(keys.map((key) => {
            return this.storage.getObject(bucket, key);
        }));

        return objects.flatMap((body) => presentRecords(decode(body)));
    }

    afterAll(): Promise<void> {
        return this.lifecycle.shutdown();
    }
}
