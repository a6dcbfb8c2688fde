import {
    BucketLifecycleManager,
    CleanupRegistry,
} from './bucket-lifecycle';
import {
    parseHarnessEnv,
    type HarnessEnv,
    type S3StorageEnv,
} from './env';
import { BackupTestHarness } from './harness';
import { createS3ObjectStorage } from './object-store-client';
import type { ObjectStorage } from './object-storage';
import type { Scheduler } from './scheduler';

export type RuntimeStorageSummary = {
    endpoint: string | null;
    forcePathStyle: boolean;
    region: string;
};

export type RuntimeBootstrap = {
    config: HarnessEnv;
    harness: BackupTestHarness;
    registry: CleanupRegistry;
    storage: RuntimeStorageSummary;
};

export type RuntimeDependencyOverrides = {
    createStorage?: (config: S3StorageEnv) => ObjectStorage;
    registry?: CleanupRegistry;
    scheduler?: Scheduler;
};

/**
 * Builds a harness from `BACKUP_HARNESS_*` variables. Pass one `registry`
 * to several harnesses to clean all of their buckets in one teardown.
 */
export function createHarness(
    env: NodeJS.ProcessEnv,
    dependencies: RuntimeDependencyOverrides = {},
): RuntimeBootstrap {
    const config = parseHarnessEnv(env);
    const createStorage = dependencies.createStorage
        || ((input: S3StorageEnv) => {
            return createS3ObjectStorage({
                accessKeyId: input.accessKeyId,
                endpoint: input.endpoint,
                forcePathStyle: input.forcePathStyle,
                region: input.region,
                secretAccessKey: input.secretAccessKey,
                sessionToken: input.sessionToken,
            });
        });
    const storage = createStorage(config.s3);
    const registry = dependencies.registry ?? new CleanupRegistry();
    const lifecycle = new BucketLifecycleManager(storage, registry, {
        cleanup: config.cleanup.enabled
            ? {
                initialDelayMs: config.cleanup.initialDelayMs,
            }
            : undefined,
        maxCleanupTimeoutMs: config.maxCleanupTimeoutMs,
        scheduler: dependencies.scheduler,
    });
    const harness = new BackupTestHarness(storage, lifecycle, {
        bucketPrefix: config.bucketPrefix,
        pollAttempts: config.pollAttempts,
        pollDelayMs: config.pollDelayMs,
        scheduler: dependencies.scheduler,
        useVirtualDotHost: config.useVirtualDotHost,
    });

    console.log('backup test harness configured', {
        bucket_prefix: config.bucketPrefix ?? null,
        cleanup_enabled: config.cleanup.enabled,
        endpoint: config.s3.endpoint ?? null,
        poll_attempts: config.pollAttempts,
        poll_delay_ms: config.pollDelayMs,
        region: config.s3.region,
        use_virtual_dot_host: config.useVirtualDotHost,
    });

    return {
        config,
        harness,
        registry,
        storage: {
            endpoint: config.s3.endpoint ?? null,
            forcePathStyle: config.s3.forcePathStyle,
            region: config.s3.region,
        },
    };
}
