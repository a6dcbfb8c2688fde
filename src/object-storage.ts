export type BucketAccess =
    | 'granted'
    | 'denied'
    | 'absent';

export type ListingEntry = {
    key: string;
    size: number;
    lastModified: Date | null;
    etag: string | null;
};

export type ListingSnapshot = ListingEntry[];

/**
 * The storage operations a backup test needs. Implemented on S3 by
 * `S3ObjectStorage` and in process by `InMemoryObjectStorage`.
 */
export interface ObjectStorage {
    bucketAccess(bucket: string): Promise<BucketAccess>;
    createBucket(bucket: string): Promise<void>;
    deleteBucketRecursive(bucket: string): Promise<void>;
    listObjects(bucket: string, prefix?: string): Promise<ListingSnapshot>;
    getObject(bucket: string, key: string): Promise<Uint8Array>;
    putObject(bucket: string, key: string, body: Uint8Array): Promise<void>;
}

type StoredObject = {
    body: Uint8Array;
    lastModified: Date;
    visibleAfterListCalls: number;
};

type InMemoryBucket = {
    objects: Map<string, StoredObject>;
    pendingUploads: Set<string>;
};

export type InMemoryObjectStorageOptions = {
    /**
     * Number of `listObjects` calls on a bucket after a put before the new
     * object shows up in listings.
     */
    listingLag?: number;
    timeProvider?: () => Date;
};

export type StorageCall = {
    bucket: string;
    key?: string;
    operation:
        | 'bucketAccess'
        | 'createBucket'
        | 'deleteBucketRecursive'
        | 'listObjects'
        | 'getObject'
        | 'putObject';
};

export class InMemoryObjectStorage implements ObjectStorage {
    public readonly calls: StorageCall[] = [];

    private readonly buckets = new Map<string, InMemoryBucket>();

    private readonly foreignBuckets = new Set<string>();

    private readonly listCounts = new Map<string, number>();

    private readonly listingLag: number;

    private readonly timeProvider: () => Date;

    constructor(options: InMemoryObjectStorageOptions = {}) {
        this.listingLag = Math.max(0, options.listingLag ?? 0);
        this.timeProvider = options.timeProvider ?? (() => new Date());
    }

    /**
     * Marks `bucket` as owned by another principal: it exists but every
     * access check reports `denied`.
     */
    addForeignBucket(bucket: string): void {
        this.foreignBuckets.add(bucket);
    }

    startMultipartUpload(bucket: string, key: string): void {
        this.requireBucket(bucket).pendingUploads.add(key);
    }

    hasBucket(bucket: string): boolean {
        return this.buckets.has(bucket);
    }

    pendingUploadCount(bucket: string): number {
        return this.buckets.get(bucket)?.pendingUploads.size ?? 0;
    }

    objectKeys(bucket: string): string[] {
        return [...this.requireBucket(bucket).objects.keys()].sort();
    }

    countCalls(operation: StorageCall['operation'], bucket?: string): number {
        return this.calls.filter((call) => {
            return call.operation === operation
                && (bucket === undefined || call.bucket === bucket);
        }).length;
    }

    async bucketAccess(bucket: string): Promise<BucketAccess> {
        this.calls.push({ bucket, operation: 'bucketAccess' });

        if (this.foreignBuckets.has(bucket)) {
            return 'denied';
        }

        return this.buckets.has(bucket) ? 'granted' : 'absent';
    }

    async createBucket(bucket: string): Promise<void> {
        this.calls.push({ bucket, operation: 'createBucket' });

        if (this.foreignBuckets.has(bucket) || this.buckets.has(bucket)) {
            throw new Error(`bucket already exists: ${bucket}`);
        }

        this.buckets.set(bucket, {
            objects: new Map(),
            pendingUploads: new Set(),
        });
        this.listCounts.set(bucket, 0);
    }

    async deleteBucketRecursive(bucket: string): Promise<void> {
        this.calls.push({ bucket, operation: 'deleteBucketRecursive' });
        this.requireBucket(bucket);
        this.buckets.delete(bucket);
        this.listCounts.delete(bucket);
    }

    async listObjects(
        bucket: string,
        prefix?: string,
    ): Promise<ListingSnapshot> {
        this.calls.push({ bucket, operation: 'listObjects' });

        const stored = this.requireBucket(bucket);
        const listCount = (this.listCounts.get(bucket) ?? 0) + 1;

        this.listCounts.set(bucket, listCount);

        const entries: ListingEntry[] = [];

        for (const [key, object] of stored.objects) {
            if (prefix && !key.startsWith(prefix)) {
                continue;
            }

            if (listCount < object.visibleAfterListCalls) {
                continue;
            }

            entries.push({
                etag: null,
                key,
                lastModified: object.lastModified,
                size: object.body.byteLength,
            });
        }

        return entries.sort((left, right) => {
            return left.key < right.key ? -1 : left.key > right.key ? 1 : 0;
        });
    }

    async getObject(bucket: string, key: string): Promise<Uint8Array> {
        this.calls.push({ bucket, key, operation: 'getObject' });

        const object = this.requireBucket(bucket).objects.get(key);

        if (!object) {
            throw new Error(`no such key: ${bucket}/${key}`);
        }

        return object.body.slice();
    }

    async putObject(
        bucket: string,
        key: string,
        body: Uint8Array,
    ): Promise<void> {
        this.calls.push({ bucket, key, operation: 'putObject' });

        const stored = this.requireBucket(bucket);
        const listCount = this.listCounts.get(bucket) ?? 0;

        stored.pendingUploads.delete(key);
        stored.objects.set(key, {
            body: body.slice(),
            lastModified: this.timeProvider(),
            visibleAfterListCalls: listCount + 1 + this.listingLag,
        });
    }

    private requireBucket(bucket: string): InMemoryBucket {
        const stored = this.buckets.get(bucket);

        if (!stored) {
            throw new Error(`no such bucket: ${bucket}`);
        }

        return stored;
    }
}
