import assert from 'node:assert/strict';
import { test } from 'node:test';
import fc from 'fast-check';
import { expectObjectCount } from './consistency-poller';
import { SENTINEL_VALUE } from './constants';
import { recordsWithTimePeriodArbitrary } from './generators';
import {
    InMemoryProducer,
    InMemoryRecordSource,
    produceThrottled,
} from './messaging';
import { InMemoryObjectStorage } from './object-storage';
import { createHarness } from './runtime';
import {
    sliceKey,
    TimeSlicedBackupPipeline,
    VirtualScheduler,
} from './test-helpers';
import { emit } from './throttled-generator';
import type { DomainRecord } from './types';

const RECORD_COUNT = 20;
const PERIOD_SLICE_MS = 1000;

function harnessEnv(): Record<string, string> {
    return {
        BACKUP_HARNESS_BUCKET_PREFIX: 'roundtrip-',
        BACKUP_HARNESS_CLEANUP_ENABLED: 'true',
        BACKUP_HARNESS_S3_REGION: 'us-east-1',
    };
}

function valuesByKey(records: readonly DomainRecord[]): Map<string, string[]> {
    const grouped = new Map<string, string[]>();

    for (const record of records) {
        const key = record.key ?? '';
        const values = grouped.get(key) ?? [];

        values.push(record.value);
        grouped.set(key, values);
    }

    return grouped;
}

const sliceSpacedRecords = recordsWithTimePeriodArbitrary({
    maxRecords: RECORD_COUNT,
    minRecords: RECORD_COUNT,
    padTimestampsMillis: {
        max: PERIOD_SLICE_MS,
        min: PERIOD_SLICE_MS,
    },
    trailingSentinelValue: true,
});

test('records written by a time-sliced backup download intact', async () => {
    await fc.assert(
        fc.asyncProperty(sliceSpacedRecords, async ({ data, spanMs }) => {
            const scheduler = new VirtualScheduler();
            const storage = new InMemoryObjectStorage({ listingLag: 3 });
            const { harness } = createHarness(harnessEnv(), {
                createStorage: () => storage,
                scheduler,
            });
            const bucket = harness.nextBucketName();
            const input = data.slice(0, -1);

            await harness.createBucket(bucket);

            const pipeline = new TimeSlicedBackupPipeline(
                new InMemoryRecordSource(emit(data, spanMs, { scheduler })),
                storage,
                bucket,
                PERIOD_SLICE_MS,
            );

            await pipeline.run();

            const snapshot = await harness.waitForDownload(
                bucket,
                expectObjectCount(RECORD_COUNT),
            );

            assert.deepEqual(
                snapshot.map((entry) => entry.key),
                input.map((record) => sliceKey(record.timestamp ?? 0)),
            );

            const downloaded = await harness.downloadRecords(bucket, snapshot);

            assert.deepEqual(downloaded, input);
            assert.deepEqual(valuesByKey(downloaded), valuesByKey(input));
            assert.equal(
                downloaded.some((record) => record.value === SENTINEL_VALUE),
                false,
            );
            assert.equal(storage.pendingUploadCount(bucket), 1);

            await harness.afterAll();

            assert.equal(storage.hasBucket(bucket), false);
            assert.equal(storage.pendingUploadCount(bucket), 0);
        }),
        { numRuns: 3 },
    );
});

test('throttled producer sends every record once in order', async () => {
    const [{ data, spanMs }] = fc.sample(sliceSpacedRecords, 1);
    const scheduler = new VirtualScheduler();
    const producer = new InMemoryProducer();

    const sent = await produceThrottled(producer, data, spanMs, {
        scheduler,
    });

    assert.equal(sent, RECORD_COUNT + 1);
    assert.deepEqual(
        producer.sent.map((record) => record.value.toString('base64')),
        data.map((record) => record.value),
    );
    assert.equal(producer.sent[RECORD_COUNT].key, undefined);
    assert.equal(scheduler.now(), RECORD_COUNT);
});
