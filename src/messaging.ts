import type { Scheduler } from './scheduler';
import {
    emit,
    toWireRecords,
} from './throttled-generator';
import type {
    DomainRecord,
    ProducerRecord,
} from './types';

/**
 * Where a backup pipeline reads records from. Tests plug in
 * `InMemoryRecordSource` in place of a broker connection.
 */
export interface RecordSource {
    consume(): AsyncIterable<DomainRecord>;
}

export interface RecordProducer {
    send(records: ProducerRecord[]): Promise<void>;
}

/**
 * The backup under test. `run` starts consuming from its source and
 * writing objects to its bucket.
 */
export interface BackupPipeline {
    run(): Promise<void>;
}

function isAsyncIterable(
    records: AsyncIterable<DomainRecord> | readonly DomainRecord[],
): records is AsyncIterable<DomainRecord> {
    return Symbol.asyncIterator in records;
}

export class InMemoryRecordSource implements RecordSource {
    constructor(
        private readonly records: AsyncIterable<DomainRecord>
            | readonly DomainRecord[],
    ) {}

    consume(): AsyncIterable<DomainRecord> {
        const records = this.records;

        if (isAsyncIterable(records)) {
            return records;
        }

        return {
            [Symbol.asyncIterator]: async function* replay() {
                yield* records;
            },
        };
    }
}

export class InMemoryProducer implements RecordProducer {
    public readonly sent: ProducerRecord[] = [];

    public sendCalls = 0;

    async send(records: ProducerRecord[]): Promise<void> {
        this.sendCalls += 1;
        this.sent.push(...records);
    }
}

/**
 * Sends `records` to `producer` one at a time, paced to span about
 * `durationMs`. Resolves with the number of records sent.
 */
export async function produceThrottled(
    producer: RecordProducer,
    records: readonly DomainRecord[],
    durationMs: number,
    options: { scheduler?: Scheduler } = {},
): Promise<number> {
    let sent = 0;

    for await (const record of emit(records, durationMs, options)) {
        await producer.send(toWireRecords([record]));
        sent += 1;
    }

    return sent;
}
