import { DEFAULT_POLL_ATTEMPTS, DEFAULT_POLL_DELAY_MS } from './constants';
import {
    describeError,
    PollingExhaustedError,
} from './errors';
import type { ListingSnapshot } from './object-storage';
import { systemScheduler, type Scheduler } from './scheduler';

export type Readiness<T> =
    | {
        ready: true;
        value: T;
    }
    | {
        ready: false;
        reason: string;
    };

export function ready<T>(value: T): Readiness<T> {
    return {
        ready: true,
        value,
    };
}

export function notYetReady(reason: string): Readiness<never> {
    return {
        ready: false,
        reason,
    };
}

export type WaitUntilOptions = {
    attempts?: number;
    delayMs?: number;
    scheduler?: Scheduler;
};

/**
 * Lists storage until `transform` reports the snapshot ready.
 *
 * Attempts run one after another with a fixed `delayMs` between them, and
 * `list` is called at most `attempts` times. A rejected `list` counts as a
 * failed attempt, since a new bucket may briefly report NoSuchBucket or
 * AccessDenied. Errors thrown by `transform` fail the wait at once.
 */
export async function waitUntil<T>(
    list: () => Promise<ListingSnapshot>,
    transform: (snapshot: ListingSnapshot) => Readiness<T>,
    options: WaitUntilOptions = {},
): Promise<T> {
    const attempts = options.attempts ?? DEFAULT_POLL_ATTEMPTS;
    const delayMs = options.delayMs ?? DEFAULT_POLL_DELAY_MS;
    const scheduler = options.scheduler ?? systemScheduler;

    if (!Number.isInteger(attempts) || attempts < 1) {
        throw new RangeError('poll attempts must be a positive integer');
    }

    if (!Number.isFinite(delayMs) || delayMs < 0) {
        throw new RangeError('poll delay must be a non-negative number');
    }

    let lastReason = 'no attempt made';
    let lastSnapshot: ListingSnapshot = [];
    let lastListError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
        if (attempt > 1) {
            await scheduler.sleep(delayMs);
        }

        let snapshot: ListingSnapshot;

        try {
            snapshot = await list();
        } catch (error: unknown) {
            console.warn('listing attempt failed', {
                attempt,
                attempts,
                error: describeError(error),
            });
            lastReason = `listing failed: ${describeError(error)}`;
            lastListError = error;
            continue;
        }

        const outcome = transform(snapshot);

        if (outcome.ready) {
            return outcome.value;
        }

        lastReason = outcome.reason;
        lastSnapshot = snapshot;
        lastListError = undefined;
    }

    throw new PollingExhaustedError(
        attempts,
        lastReason,
        lastSnapshot,
        lastListError,
    );
}

/**
 * Readiness transform that waits for exactly `expected` objects.
 */
export function expectObjectCount(
    expected: number,
): (snapshot: ListingSnapshot) => Readiness<ListingSnapshot> {
    return (snapshot) => {
        if (snapshot.length !== expected) {
            return notYetReady(
                `expected ${expected} objects, found ${snapshot.length}: `
                + snapshot.map((entry) => entry.key).join(','),
            );
        }

        return ready(snapshot);
    };
}
