import {
    DEFAULT_MAX_CLEANUP_TIMEOUT_MS,
} from './constants';
import {
    BucketConflictError,
    CleanupTimeoutError,
} from './errors';
import type { ObjectStorage } from './object-storage';
import {
    systemScheduler,
    withTimeout,
    type Scheduler,
} from './scheduler';

/**
 * Buckets awaiting deletion at teardown. Shared by every test that creates
 * buckets through one harness; names are kept once each and handed out by
 * a single `drain`, which first waits for creations still in flight.
 */
export class CleanupRegistry {
    private pending = new Set<string>();

    private readonly inFlight = new Set<Promise<unknown>>();

    private drained = false;

    register(bucket: string): boolean {
        if (this.drained) {
            throw new Error(
                `cannot track bucket ${bucket} after cleanup has started`,
            );
        }

        if (this.pending.has(bucket)) {
            return false;
        }

        this.pending.add(bucket);

        return true;
    }

    release(bucket: string): void {
        this.pending.delete(bucket);
    }

    /**
     * Holds `drain` back until `work` settles.
     */
    async track<T>(work: Promise<T>): Promise<T> {
        this.inFlight.add(work);

        try {
            return await work;
        } finally {
            this.inFlight.delete(work);
        }
    }

    get closed(): boolean {
        return this.drained;
    }

    has(bucket: string): boolean {
        return this.pending.has(bucket);
    }

    list(): string[] {
        return [...this.pending];
    }

    async drain(): Promise<string[]> {
        if (this.drained) {
            return [];
        }

        this.drained = true;
        await Promise.allSettled([...this.inFlight]);

        const buckets = [...this.pending];

        this.pending = new Set();

        return buckets;
    }
}

export type CleanupOptions = {
    initialDelayMs: number;
};

export type BucketLifecycleOptions = {
    /**
     * Cleanup is off when omitted. `initialDelayMs` gives the last
     * eventually-consistent writes time to land before deletion starts.
     */
    cleanup?: CleanupOptions;
    maxCleanupTimeoutMs?: number;
    scheduler?: Scheduler;
};

export class BucketLifecycleManager {
    private readonly cleanup?: CleanupOptions;

    private readonly maxCleanupTimeoutMs: number;

    private readonly scheduler: Scheduler;

    constructor(
        private readonly storage: ObjectStorage,
        private readonly registry: CleanupRegistry,
        options: BucketLifecycleOptions = {},
    ) {
        this.cleanup = options.cleanup;
        this.maxCleanupTimeoutMs = options.maxCleanupTimeoutMs
            ?? DEFAULT_MAX_CLEANUP_TIMEOUT_MS;
        this.scheduler = options.scheduler ?? systemScheduler;
    }

    get cleanupEnabled(): boolean {
        return this.cleanup !== undefined;
    }

    /**
     * Creates `bucket` from a clean slate. A bucket this principal can
     * already use is emptied and recreated; one owned by someone else is a
     * `BucketConflictError`. With cleanup enabled the name is tracked before
     * storage is touched.
     */
    async createBucket(bucket: string): Promise<void> {
        if (!this.cleanupEnabled) {
            await this.provisionBucket(bucket);
            return;
        }

        if (this.registry.closed) {
            throw new Error(
                `cannot create bucket ${bucket} after cleanup has started`,
            );
        }

        const reserved = this.registry.register(bucket);

        try {
            await this.registry.track(this.provisionBucket(bucket));
        } catch (error: unknown) {
            if (reserved && error instanceof BucketConflictError) {
                this.registry.release(bucket);
            }

            throw error;
        }
    }

    private async provisionBucket(bucket: string): Promise<void> {
        const access = await this.storage.bucketAccess(bucket);

        switch (access) {
            case 'denied':
                throw new BucketConflictError(bucket);
            case 'granted':
                console.log('deleting and recreating existing bucket', {
                    bucket,
                });
                await this.storage.deleteBucketRecursive(bucket);
                await this.storage.createBucket(bucket);
                break;
            case 'absent':
                await this.storage.createBucket(bucket);
                break;
        }
    }

    async shutdown(): Promise<void> {
        if (!this.cleanup) {
            return;
        }

        const initialDelayMs = this.cleanup.initialDelayMs;
        const buckets = await this.registry.drain();

        if (buckets.length === 0) {
            return;
        }

        console.log('cleaning up test buckets', {
            bucket_count: buckets.length,
            initial_delay_ms: initialDelayMs,
        });

        await withTimeout(
            this.scheduler,
            this.maxCleanupTimeoutMs,
            async () => {
                await this.scheduler.sleep(initialDelayMs);
                await Promise.all(
                    buckets.map((bucket) => this.cleanBucket(bucket)),
                );
            },
            () => new CleanupTimeoutError(this.maxCleanupTimeoutMs, buckets),
        );
    }

    private async cleanBucket(bucket: string): Promise<void> {
        try {
            const access = await this.storage.bucketAccess(bucket);

            switch (access) {
                case 'denied':
                    console.warn(
                        'cannot delete bucket due to access denied, it may '
                        + 'keep using storage in the account',
                        { bucket },
                    );
                    break;
                case 'granted':
                    console.log('cleaning up bucket', { bucket });
                    await this.storage.deleteBucketRecursive(bucket);
                    break;
                case 'absent':
                    console.log('not deleting bucket since it no longer exists', {
                        bucket,
                    });
                    break;
            }
        } catch (error: unknown) {
            console.error('error deleting bucket', { bucket }, error);
        }
    }
}
