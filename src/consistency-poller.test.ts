import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import {
    expectObjectCount,
    notYetReady,
    ready,
    waitUntil,
} from './consistency-poller';
import { PollingExhaustedError } from './errors';
import type {
    ListingEntry,
    ListingSnapshot,
} from './object-storage';
import { VirtualScheduler } from './test-helpers';

function entry(key: string): ListingEntry {
    return {
        etag: null,
        key,
        lastModified: null,
        size: 1,
    };
}

function scriptedListing(snapshots: ListingSnapshot[]) {
    let calls = 0;

    return {
        get calls() {
            return calls;
        },
        list: async (): Promise<ListingSnapshot> => {
            const snapshot = snapshots[Math.min(calls, snapshots.length - 1)];

            calls += 1;

            return snapshot;
        },
    };
}

describe('waitUntil', () => {
    it('returns immediately when the first snapshot is ready', async () => {
        const scheduler = new VirtualScheduler();
        const listing = scriptedListing([[entry('a.json')]]);

        const keys = await waitUntil(
            listing.list,
            (snapshot) => ready(snapshot.map((item) => item.key)),
            { scheduler },
        );

        assert.deepEqual(keys, ['a.json']);
        assert.equal(listing.calls, 1);
        assert.deepEqual(scheduler.sleeps, []);
    });

    it('retries with a fixed delay until the transform is ready', async () => {
        const scheduler = new VirtualScheduler();
        const listing = scriptedListing([
            [],
            [entry('a.json')],
            [entry('a.json'), entry('b.json')],
        ]);

        const snapshot = await waitUntil(
            listing.list,
            expectObjectCount(2),
            { attempts: 5, delayMs: 250, scheduler },
        );

        assert.equal(snapshot.length, 2);
        assert.equal(listing.calls, 3);
        assert.deepEqual(scheduler.sleeps, [250, 250]);
    });

    it('fails after exhausting every attempt', async () => {
        const scheduler = new VirtualScheduler();
        const listing = scriptedListing([[entry('a.json')]]);

        await assert.rejects(
            waitUntil(listing.list, expectObjectCount(3), {
                attempts: 4,
                delayMs: 1000,
                scheduler,
            }),
            (error: unknown) => {
                assert.ok(error instanceof PollingExhaustedError);
                assert.equal(error.attempts, 4);
                assert.equal(
                    error.lastReason,
                    'expected 3 objects, found 1: a.json',
                );
                assert.deepEqual(error.lastSnapshot, [entry('a.json')]);
                return true;
            },
        );
        assert.equal(listing.calls, 4);
        assert.ok(scheduler.now() >= 3 * 1000);
    });

    it('uses ten attempts and a one second delay by default', async () => {
        const scheduler = new VirtualScheduler();
        const listing = scriptedListing([[]]);

        await assert.rejects(
            waitUntil(listing.list, () => notYetReady('empty'), { scheduler }),
            PollingExhaustedError,
        );
        assert.equal(listing.calls, 10);
        assert.equal(scheduler.sleeps.length, 9);
        assert.ok(scheduler.sleeps.every((ms) => ms === 1000));
    });

    it('retries a listing that fails before the bucket is visible',
    async () => {
        const scheduler = new VirtualScheduler();
        let calls = 0;

        const result = await waitUntil(async () => {
            calls += 1;

            if (calls === 1) {
                throw new Error('NoSuchBucket');
            }

            return [];
        }, () => ready('ok'), { delayMs: 100, scheduler });

        assert.equal(result, 'ok');
        assert.equal(calls, 2);
        assert.deepEqual(scheduler.sleeps, [100]);
    });

    it('reports the last listing error once attempts run out', async () => {
        const scheduler = new VirtualScheduler();
        const failure = new Error('AccessDenied');
        let calls = 0;

        await assert.rejects(
            waitUntil(async () => {
                calls += 1;
                throw failure;
            }, () => ready(true), { attempts: 3, delayMs: 10, scheduler }),
            (error: unknown) => {
                assert.ok(error instanceof PollingExhaustedError);
                assert.equal(error.lastReason, 'listing failed: AccessDenied');
                assert.equal(error.cause, failure);
                assert.deepEqual(error.lastSnapshot, []);
                return true;
            },
        );
        assert.equal(calls, 3);
    });

    it('propagates errors thrown by the transform', async () => {
        const scheduler = new VirtualScheduler();
        const listing = scriptedListing([[]]);

        await assert.rejects(
            waitUntil(listing.list, () => {
                throw new TypeError('bad transform');
            }, { scheduler }),
            TypeError,
        );
        assert.equal(listing.calls, 1);
    });

    it('rejects a non-positive attempt count', async () => {
        const listing = scriptedListing([[]]);

        await assert.rejects(
            waitUntil(listing.list, () => ready(1), { attempts: 0 }),
            RangeError,
        );
        assert.equal(listing.calls, 0);
    });
});
