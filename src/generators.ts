import fc, { type Arbitrary } from 'fast-check';
import { encodeBase64 } from './base64';
import { SENTINEL_VALUE } from './constants';
import type { DomainRecord } from './types';

const DEFAULT_TOPIC = 'backup-test-topic';
const LOWER_ALNUM = 'abcdefghijklmnopqrstuvwxyz0123456789'.split('');
const BUCKET_NAME_PATTERN = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;
const IP_ADDRESS_PATTERN = /^\d+\.\d+\.\d+\.\d+$/;

export type RecordsWithTimePeriod = {
    data: DomainRecord[];
    /** Milliseconds between the first and last record timestamps. */
    spanMs: number;
};

export type RecordsWithTimePeriodOptions = {
    minRecords: number;
    maxRecords: number;
    padTimestampsMillis: {
        min: number;
        max: number;
    };
    /**
     * Appends one key-less record, spaced a full padding after the last
     * one, that only exists to close the final time slice of a backup.
     */
    trailingSentinelValue?: boolean;
    topic?: string;
};

/**
 * Keyed records with one distinct key per record and timestamps spaced by
 * a padding drawn from `padTimestampsMillis`.
 */
export function recordsWithTimePeriodArbitrary(
    options: RecordsWithTimePeriodOptions,
): Arbitrary<RecordsWithTimePeriod> {
    const topic = options.topic ?? DEFAULT_TOPIC;
    const pad = options.padTimestampsMillis;

    if (options.minRecords < 1 || options.maxRecords < options.minRecords) {
        throw new RangeError('record count range must be non-empty');
    }

    if (pad.min < 0 || pad.max < pad.min) {
        throw new RangeError('timestamp padding range must be non-empty');
    }

    return fc.integer({
        max: options.maxRecords,
        min: options.minRecords,
    }).chain((count) => fc.record({
        keys: fc.uniqueArray(
            fc.uint8Array({ maxLength: 16, minLength: 1 }).map(encodeBase64),
            { maxLength: count, minLength: count },
        ),
        paddings: fc.array(
            fc.integer({ max: pad.max, min: pad.min }),
            { maxLength: count, minLength: count },
        ),
        start: fc.integer({
            max: Date.UTC(2030, 0, 1),
            min: Date.UTC(2020, 0, 1),
        }),
        values: fc.array(
            fc.uint8Array({ maxLength: 64, minLength: 1 }).map(encodeBase64),
            { maxLength: count, minLength: count },
        ),
    })).map(({ keys, paddings, start, values }) => {
        const data: DomainRecord[] = [];
        let timestamp = start;

        keys.forEach((key, index) => {
            if (index > 0) {
                timestamp += paddings[index];
            }

            data.push({
                key,
                offset: BigInt(index),
                partition: 0,
                timestamp,
                topic,
                value: values[index],
            });
        });

        if (options.trailingSentinelValue) {
            data.push({
                offset: BigInt(keys.length),
                partition: 0,
                timestamp: timestamp + pad.max,
                topic,
                value: SENTINEL_VALUE,
            });
        }

        const last = data[data.length - 1].timestamp ?? start;

        return {
            data,
            spanMs: last - start,
        };
    });
}

export function isValidBucketName(
    name: string,
    options: { allowDots: boolean },
): boolean {
    if (!BUCKET_NAME_PATTERN.test(name)) {
        return false;
    }

    if (name.includes('.')) {
        if (!options.allowDots) {
            return false;
        }

        if (name.includes('..') || IP_ADDRESS_PATTERN.test(name)) {
            return false;
        }
    }

    return !name.startsWith('xn--') && !name.endsWith('-s3alias');
}

/**
 * Bucket names valid for S3. Dots are only generated with virtual dot
 * host enabled, since dotted names need a matching TLS certificate.
 */
export function bucketNameArbitrary(
    options: {
        prefix?: string;
        useVirtualDotHost: boolean;
    },
): Arbitrary<string> {
    const prefix = options.prefix ?? '';

    if (!isValidBucketName(`${prefix}abc`, {
        allowDots: options.useVirtualDotHost,
    })) {
        throw new RangeError(
            `bucket prefix ${prefix} cannot start a valid bucket name`,
        );
    }

    const alnum = fc.constantFrom(...LOWER_ALNUM);
    const label = fc.tuple(
        alnum,
        fc.array(fc.constantFrom(...LOWER_ALNUM, '-'), {
            maxLength: 10,
            minLength: 1,
        }),
        alnum,
    ).map(([first, middle, last]) => `${first}${middle.join('')}${last}`);

    return fc.array(label, {
        maxLength: options.useVirtualDotHost ? 3 : 1,
        minLength: 1,
    })
        .map((labels) => `${prefix}${labels.join('.')}`)
        .filter((name) => isValidBucketName(name, {
            allowDots: options.useVirtualDotHost,
        }));
}
