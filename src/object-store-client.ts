import {
    AbortMultipartUploadCommand,
    CreateBucketCommand,
    DeleteBucketCommand,
    DeleteObjectsCommand,
    GetObjectCommand,
    HeadBucketCommand,
    ListMultipartUploadsCommand,
    ListObjectsV2Command,
    PutObjectCommand,
    S3Client,
    type S3ClientConfig,
} from '@aws-sdk/client-s3';
import type {
    BucketAccess,
    ListingEntry,
    ListingSnapshot,
    ObjectStorage,
} from './object-storage';

export type S3ObjectStorageConfig = {
    accessKeyId?: string;
    endpoint?: string;
    forcePathStyle?: boolean;
    region: string;
    secretAccessKey?: string;
    sessionToken?: string;
};

type ByteArrayBody = {
    transformToByteArray: () => Promise<Uint8Array>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return Boolean(value)
        && typeof value === 'object'
        && !Array.isArray(value);
}

function hasByteArrayTransform(body: unknown): body is ByteArrayBody {
    return isRecord(body)
        && typeof body.transformToByteArray === 'function';
}

function isAsyncIterable(body: unknown): body is AsyncIterable<unknown> {
    return typeof body === 'object'
        && body !== null
        && Symbol.asyncIterator in body;
}

async function readStreamBody(
    body: AsyncIterable<unknown>,
): Promise<Uint8Array> {
    const chunks: Buffer[] = [];

    for await (const chunk of body) {
        if (typeof chunk === 'string') {
            chunks.push(Buffer.from(chunk, 'utf8'));
            continue;
        }

        if (chunk instanceof Uint8Array) {
            chunks.push(Buffer.from(chunk));
            continue;
        }

        throw new Error('unsupported object-store body chunk type');
    }

    return new Uint8Array(Buffer.concat(chunks));
}

async function readBodyAsBytes(
    body: unknown,
): Promise<Uint8Array> {
    if (typeof body === 'string') {
        return new Uint8Array(Buffer.from(body, 'utf8'));
    }

    if (body instanceof Uint8Array) {
        return body;
    }

    if (hasByteArrayTransform(body)) {
        return body.transformToByteArray();
    }

    if (isAsyncIterable(body)) {
        return readStreamBody(body);
    }

    throw new Error('unsupported object-store body type');
}

function readStatusCode(error: unknown): number | null {
    if (!isRecord(error)) {
        return null;
    }

    const metadata = error.$metadata;

    if (isRecord(metadata) && typeof metadata.httpStatusCode === 'number') {
        return metadata.httpStatusCode;
    }

    return null;
}

function readErrorName(error: unknown): string {
    return error instanceof Error ? error.name : '';
}

function requireName(
    value: string,
    label: string,
): string {
    const normalized = String(value || '').trim();

    if (!normalized) {
        throw new Error(`${label} must not be empty`);
    }

    return normalized;
}

export class S3ObjectStorage implements ObjectStorage {
    constructor(
        private readonly client: S3Client,
    ) {}

    async bucketAccess(bucket: string): Promise<BucketAccess> {
        const name = requireName(bucket, 'bucket');

        try {
            await this.client.send(new HeadBucketCommand({ Bucket: name }));

            return 'granted';
        } catch (error) {
            const statusCode = readStatusCode(error);
            const errorName = readErrorName(error);

            if (statusCode === 404 || errorName === 'NotFound') {
                return 'absent';
            }

            if (statusCode === 403 || errorName === 'Forbidden') {
                return 'denied';
            }

            throw error;
        }
    }

    async createBucket(bucket: string): Promise<void> {
        await this.client.send(new CreateBucketCommand({
            Bucket: requireName(bucket, 'bucket'),
        }));
    }

    /**
     * Aborts incomplete multipart uploads, deletes every object, then
     * deletes the bucket itself.
     */
    async deleteBucketRecursive(bucket: string): Promise<void> {
        const name = requireName(bucket, 'bucket');

        await this.abortMultipartUploads(name);
        await this.deleteAllObjects(name);
        await this.client.send(new DeleteBucketCommand({ Bucket: name }));
    }

    async listObjects(
        bucket: string,
        prefix?: string,
    ): Promise<ListingSnapshot> {
        const name = requireName(bucket, 'bucket');
        const entries: ListingEntry[] = [];
        let continuationToken: string | undefined;

        while (true) {
            const response = await this.client.send(
                new ListObjectsV2Command({
                    Bucket: name,
                    ContinuationToken: continuationToken,
                    Prefix: prefix || undefined,
                }),
            );

            for (const item of response.Contents || []) {
                if (!item.Key) {
                    continue;
                }

                entries.push({
                    etag: item.ETag ?? null,
                    key: item.Key,
                    lastModified: item.LastModified ?? null,
                    size: item.Size ?? 0,
                });
            }

            if (!response.IsTruncated || !response.NextContinuationToken) {
                break;
            }

            continuationToken = response.NextContinuationToken;
        }

        return entries;
    }

    async getObject(bucket: string, key: string): Promise<Uint8Array> {
        const normalizedKey = requireName(key, 'object-store read key');
        const response = await this.client.send(
            new GetObjectCommand({
                Bucket: requireName(bucket, 'bucket'),
                Key: normalizedKey,
            }),
        );

        if (!response.Body) {
            throw new Error(`missing object body for key ${normalizedKey}`);
        }

        return readBodyAsBytes(response.Body);
    }

    async putObject(
        bucket: string,
        key: string,
        body: Uint8Array,
    ): Promise<void> {
        await this.client.send(new PutObjectCommand({
            Body: body,
            Bucket: requireName(bucket, 'bucket'),
            ContentType: 'application/json',
            Key: requireName(key, 'object-store write key'),
        }));
    }

    private async abortMultipartUploads(bucket: string): Promise<void> {
        let keyMarker: string | undefined;
        let uploadIdMarker: string | undefined;

        while (true) {
            const response = await this.client.send(
                new ListMultipartUploadsCommand({
                    Bucket: bucket,
                    KeyMarker: keyMarker,
                    UploadIdMarker: uploadIdMarker,
                }),
            );

            for (const upload of response.Uploads || []) {
                if (!upload.Key || !upload.UploadId) {
                    continue;
                }

                await this.client.send(new AbortMultipartUploadCommand({
                    Bucket: bucket,
                    Key: upload.Key,
                    UploadId: upload.UploadId,
                }));
            }

            if (!response.IsTruncated) {
                break;
            }

            keyMarker = response.NextKeyMarker;
            uploadIdMarker = response.NextUploadIdMarker;

            if (!keyMarker && !uploadIdMarker) {
                break;
            }
        }
    }

    private async deleteAllObjects(bucket: string): Promise<void> {
        let continuationToken: string | undefined;

        while (true) {
            const response = await this.client.send(
                new ListObjectsV2Command({
                    Bucket: bucket,
                    ContinuationToken: continuationToken,
                }),
            );
            const objects: Array<{ Key: string }> = [];

            for (const item of response.Contents || []) {
                if (item.Key) {
                    objects.push({ Key: item.Key });
                }
            }

            // DeleteObjects takes at most 1000 keys, one listing page.
            if (objects.length > 0) {
                const result = await this.client.send(
                    new DeleteObjectsCommand({
                        Bucket: bucket,
                        Delete: {
                            Objects: objects,
                            Quiet: true,
                        },
                    }),
                );
                const failed = result.Errors || [];

                if (failed.length > 0) {
                    throw new Error(
                        `failed to delete ${failed.length} objects from `
                        + `${bucket}: ${failed[0].Key ?? '?'} `
                        + `(${failed[0].Code ?? 'unknown'})`,
                    );
                }
            }

            if (!response.IsTruncated || !response.NextContinuationToken) {
                break;
            }

            continuationToken = response.NextContinuationToken;
        }
    }
}

export function createS3ObjectStorage(
    config: S3ObjectStorageConfig,
): ObjectStorage {
    const clientConfig: S3ClientConfig = {
        forcePathStyle: Boolean(config.forcePathStyle),
        region: config.region,
    };

    if (config.endpoint) {
        clientConfig.endpoint = config.endpoint;
    }

    if (config.accessKeyId && config.secretAccessKey) {
        clientConfig.credentials = {
            accessKeyId: config.accessKeyId,
            secretAccessKey: config.secretAccessKey,
            sessionToken: config.sessionToken,
        };
    }

    return new S3ObjectStorage(new S3Client(clientConfig));
}
