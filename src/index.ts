export {
    BucketLifecycleManager,
    CleanupRegistry,
    type BucketLifecycleOptions,
    type CleanupOptions,
} from './bucket-lifecycle';
export {
    expectObjectCount,
    notYetReady,
    ready,
    waitUntil,
    type Readiness,
    type WaitUntilOptions,
} from './consistency-poller';
export {
    parseHarnessEnv,
    type HarnessEnv,
    type S3StorageEnv,
} from './env';
export {
    BucketConflictError,
    CleanupTimeoutError,
    InvalidEncodingError,
    MalformedPayloadError,
    PollingExhaustedError,
} from './errors';
export {
    bucketNameArbitrary,
    isValidBucketName,
    recordsWithTimePeriodArbitrary,
    type RecordsWithTimePeriod,
    type RecordsWithTimePeriodOptions,
} from './generators';
export {
    BackupTestHarness,
    compareBackupKeys,
    keyToTimestamp,
    type BackupTestHarnessOptions,
} from './harness';
export {
    InMemoryProducer,
    InMemoryRecordSource,
    produceThrottled,
    type BackupPipeline,
    type RecordProducer,
    type RecordSource,
} from './messaging';
export {
    createS3ObjectStorage,
    S3ObjectStorage,
    type S3ObjectStorageConfig,
} from './object-store-client';
export {
    InMemoryObjectStorage,
    type BucketAccess,
    type ListingEntry,
    type ListingSnapshot,
    type ObjectStorage,
} from './object-storage';
export {
    decode,
    encode,
    presentRecords,
} from './record-codec';
export {
    createHarness,
    type RuntimeBootstrap,
    type RuntimeDependencyOverrides,
} from './runtime';
export {
    systemScheduler,
    withTimeout,
    type Scheduler,
} from './scheduler';
export {
    emit,
    recordsPerTick,
    toWireRecords,
} from './throttled-generator';
export type {
    DomainRecord,
    ProducerRecord,
    WireRecord,
} from './types';
