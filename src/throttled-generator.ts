import { decodeBase64 } from './base64';
import { InvalidEncodingError } from './errors';
import { systemScheduler, type Scheduler } from './scheduler';
import type {
    DomainRecord,
    ProducerRecord,
} from './types';

const TICK_MS = 1;

export type EmitOptions = {
    scheduler?: Scheduler;
};

/**
 * Records released per 1ms tick so `count` records span roughly
 * `durationMs`, never fewer than one per tick.
 */
export function recordsPerTick(
    count: number,
    durationMs: number,
): number {
    if (!Number.isFinite(durationMs)) {
        throw new RangeError('emit duration must be a finite number');
    }

    const boundedDuration = Math.max(TICK_MS, Math.floor(durationMs));

    return Math.max(1, Math.floor(count / boundedDuration));
}

/**
 * Replays `records` in order, paced on a fixed 1ms ticker. Each iteration
 * of the returned iterable starts over from the first record.
 */
export function emit(
    records: readonly DomainRecord[],
    durationMs: number,
    options: EmitOptions = {},
): AsyncIterable<DomainRecord> {
    const scheduler = options.scheduler ?? systemScheduler;
    const snapshot = [...records];
    const perTick = recordsPerTick(snapshot.length, durationMs);

    return {
        [Symbol.asyncIterator]: async function* paced() {
            const startedAt = scheduler.now();

            for (let index = 0; index < snapshot.length; index += 1) {
                const tick = Math.floor(index / perTick);

                if (tick > 0 && index % perTick === 0) {
                    const waitMs = startedAt + (tick * TICK_MS)
                        - scheduler.now();

                    if (waitMs > 0) {
                        await scheduler.sleep(waitMs);
                    }
                }

                yield snapshot[index];
            }
        },
    };
}

function requireBytes(
    value: string,
    field: string,
): Buffer {
    const bytes = decodeBase64(value);

    if (bytes === null) {
        throw new InvalidEncodingError(field);
    }

    return bytes;
}

/**
 * Maps records to producer records, decoding base64 key and value.
 */
export function toWireRecords(
    records: readonly DomainRecord[],
): ProducerRecord[] {
    return records.map((record, index) => {
        const value = requireBytes(record.value, `records[${index}].value`);

        if (record.key === undefined) {
            return {
                topic: record.topic,
                value,
            };
        }

        return {
            key: requireBytes(record.key, `records[${index}].key`),
            topic: record.topic,
            value,
        };
    });
}
