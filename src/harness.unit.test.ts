import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import fc from 'fast-check';
import {
    BucketLifecycleManager,
    CleanupRegistry,
} from './bucket-lifecycle';
import { expectObjectCount } from './consistency-poller';
import { PollingExhaustedError } from './errors';
import { isValidBucketName } from './generators';
import {
    BackupTestHarness,
    compareBackupKeys,
    keyToTimestamp,
} from './harness';
import { InMemoryObjectStorage } from './object-storage';
import { encode } from './record-codec';
import {
    buildTestRecord,
    text64,
    VirtualScheduler,
} from './test-helpers';

function createTestHarness(input: {
    bucketPrefix?: string;
    listingLag?: number;
    useVirtualDotHost?: boolean;
} = {}) {
    const scheduler = new VirtualScheduler();
    const storage = new InMemoryObjectStorage({
        listingLag: input.listingLag ?? 0,
    });
    const registry = new CleanupRegistry();
    const lifecycle = new BucketLifecycleManager(storage, registry, {
        cleanup: { initialDelayMs: 100 },
        scheduler,
    });
    const harness = new BackupTestHarness(storage, lifecycle, {
        bucketPrefix: input.bucketPrefix,
        pollAttempts: 5,
        pollDelayMs: 250,
        scheduler,
        useVirtualDotHost: input.useVirtualDotHost,
    });

    return {
        harness,
        registry,
        scheduler,
        storage,
    };
}

describe('keyToTimestamp', () => {
    it('reads the time at the front of a backup key', () => {
        assert.equal(
            keyToTimestamp('2024-01-01T00:00:01.000Z.json'),
            Date.UTC(2024, 0, 1, 0, 0, 1),
        );
        assert.equal(
            keyToTimestamp('backups/2024-01-01T00:00:02.000Z.json'),
            Date.UTC(2024, 0, 1, 0, 0, 2),
        );
    });

    it('returns null for keys in another layout', () => {
        assert.equal(keyToTimestamp('notes.json'), null);
        assert.equal(keyToTimestamp('2024.json'), null);
        assert.equal(keyToTimestamp('2024-13-45T99:99:99Z.json'), null);
    });
});

describe('compareBackupKeys', () => {
    it('orders timed keys by time before other keys by name', () => {
        const keys = [
            'b.json',
            '2024-01-01T00:00:02.000Z.json',
            'a.json',
            '2024-01-01T00:00:01.000Z.json',
        ];

        assert.deepEqual([...keys].sort(compareBackupKeys), [
            '2024-01-01T00:00:01.000Z.json',
            '2024-01-01T00:00:02.000Z.json',
            'a.json',
            'b.json',
        ]);
    });
});

describe('BackupTestHarness', () => {
    it('prefixes generated bucket names', () => {
        const { harness } = createTestHarness({ bucketPrefix: 'backup-' });
        const first = harness.nextBucketName();
        const second = harness.nextBucketName();

        assert.match(first, /^backup-[0-9a-f-]{36}$/);
        assert.notEqual(first, second);
    });

    it('generates dot-free prefixed names by default', () => {
        const { harness } = createTestHarness({ bucketPrefix: 'backup-' });

        for (const name of fc.sample(harness.bucketNames(), 50)) {
            assert.ok(name.startsWith('backup-'));
            assert.ok(isValidBucketName(name, { allowDots: false }));
        }
    });

    it('generates dotted names with virtual dot host', () => {
        const { harness } = createTestHarness({
            bucketPrefix: 'backup.ci-',
            useVirtualDotHost: true,
        });

        for (const name of fc.sample(harness.bucketNames(), 50)) {
            assert.ok(name.startsWith('backup.ci-'));
            assert.ok(isValidBucketName(name, { allowDots: true }));
        }
    });

    it('refuses a dotted prefix without virtual dot host', () => {
        const { harness } = createTestHarness({ bucketPrefix: 'backup.ci-' });

        assert.throws(() => harness.bucketNames(), RangeError);
    });

    it('creates buckets through the lifecycle manager', async () => {
        const { harness, registry, storage } = createTestHarness();

        await harness.createBucket('harness-bucket');

        assert.equal(storage.hasBucket('harness-bucket'), true);
        assert.deepEqual(registry.list(), ['harness-bucket']);
    });

    it('polls with the configured delay until the listing is ready',
    async () => {
        const { harness, scheduler, storage } = createTestHarness({
            listingLag: 2,
        });

        await harness.createBucket('lagging-bucket');
        await storage.putObject(
            'lagging-bucket',
            '2024-01-01T00:00:00.000Z.json',
            encode([null]),
        );

        const snapshot = await harness.waitForDownload(
            'lagging-bucket',
            expectObjectCount(1),
        );

        assert.deepEqual(snapshot.map((entry) => entry.key), [
            '2024-01-01T00:00:00.000Z.json',
        ]);
        assert.deepEqual(scheduler.sleeps, [250, 250]);
        assert.equal(scheduler.now(), 500);
    });

    it('lets a single wait override attempts and delay', async () => {
        const { harness, scheduler, storage } = createTestHarness({
            listingLag: 5,
        });

        await harness.createBucket('slow-bucket');
        await storage.putObject('slow-bucket', 'a.json', encode([]));

        await assert.rejects(
            harness.waitForDownload('slow-bucket', expectObjectCount(1), {
                attempts: 2,
                delayMs: 10,
            }),
            (error: unknown) => {
                assert.ok(error instanceof PollingExhaustedError);
                assert.equal(error.attempts, 2);
                assert.equal(error.lastReason, 'expected 1 objects, found 0: ');
                return true;
            },
        );
        assert.deepEqual(scheduler.sleeps, [10]);
    });

    it('downloads records oldest object first without padding entries',
    async () => {
        const { harness, storage } = createTestHarness();
        const early = buildTestRecord({
            offset: 0,
            value: text64('early'),
        });
        const late = buildTestRecord({
            offset: 1,
            value: text64('late'),
        });

        await harness.createBucket('download-bucket');
        await storage.putObject(
            'download-bucket',
            '2024-01-01T00:00:01.000Z.json',
            encode([late, null]),
        );
        await storage.putObject(
            'download-bucket',
            '2024-01-01T00:00:00.000Z.json',
            encode([null, early]),
        );

        const records = await harness.downloadRecords('download-bucket');

        assert.deepEqual(records, [early, late]);
    });

    it('downloads only the objects in a given snapshot', async () => {
        const { harness, storage } = createTestHarness();
        const record = buildTestRecord();

        await harness.createBucket('snapshot-bucket');
        await storage.putObject('snapshot-bucket', 'a.json', encode([record]));

        const snapshot = await storage.listObjects('snapshot-bucket');

        await storage.putObject(
            'snapshot-bucket',
            'b.json',
            encode([buildTestRecord({ offset: 9 })]),
        );

        assert.deepEqual(
            await harness.downloadRecords('snapshot-bucket', snapshot),
            [record],
        );
    });

    it('deletes created buckets in afterAll', async () => {
        const { harness, scheduler, storage } = createTestHarness();

        await harness.createBucket('teardown-bucket');
        await harness.afterAll();

        assert.equal(storage.hasBucket('teardown-bucket'), false);
        assert.equal(scheduler.now(), 100);
    });
});
