import { encodeBase64 } from './base64';
import type {
    BackupPipeline,
    RecordSource,
} from './messaging';
import type { InMemoryObjectStorage } from './object-storage';
import { encode } from './record-codec';
import type { Scheduler } from './scheduler';
import type { DomainRecord } from './types';

export type RecordOverrides = {
    key?: string | null;
    offset?: number | bigint;
    partition?: number;
    timestamp?: number | null;
    topic?: string;
    value?: string;
};

export function text64(value: string): string {
    return encodeBase64(Buffer.from(value, 'utf8'));
}

export function buildTestRecord(
    overrides: RecordOverrides = {},
): DomainRecord {
    const record: DomainRecord = {
        offset: BigInt(overrides.offset ?? 0),
        partition: overrides.partition ?? 0,
        topic: overrides.topic || 'backup-test-topic',
        value: overrides.value ?? text64('value-0'),
    };
    const key = overrides.key === undefined ? text64('key-0') : overrides.key;
    const timestamp = overrides.timestamp === undefined
        ? Date.UTC(2026, 1, 16, 12, 0, 0)
        : overrides.timestamp;

    if (key !== null) {
        record.key = key;
    }

    if (timestamp !== null) {
        record.timestamp = timestamp;
    }

    return record;
}

type PendingTimer = {
    at: number;
    resolve: () => void;
    seq: number;
};

/**
 * Virtual clock. Timers fire one at a time in due order, each after the
 * pending promise work of the test has run, and advance `now()` to their
 * due time without real waiting.
 */
export class VirtualScheduler implements Scheduler {
    public readonly sleeps: number[] = [];

    private current: number;

    private seq = 0;

    private timers: PendingTimer[] = [];

    private pumpScheduled = false;

    constructor(start = 0) {
        this.current = start;
    }

    now(): number {
        return this.current;
    }

    sleep(ms: number, signal?: AbortSignal): Promise<void> {
        this.sleeps.push(ms);

        return new Promise((resolve) => {
            if (signal?.aborted) {
                resolve();
                return;
            }

            const timer: PendingTimer = {
                at: this.current + Math.max(0, ms),
                resolve,
                seq: this.seq,
            };

            this.seq += 1;
            this.timers.push(timer);
            signal?.addEventListener('abort', () => {
                this.timers = this.timers.filter((entry) => entry !== timer);
                resolve();
            }, { once: true });
            this.schedulePump();
        });
    }

    private schedulePump(): void {
        if (this.pumpScheduled) {
            return;
        }

        this.pumpScheduled = true;
        setImmediate(() => {
            this.pumpScheduled = false;
            this.fireNext();
        });
    }

    private fireNext(): void {
        if (this.timers.length === 0) {
            return;
        }

        this.timers.sort((left, right) => {
            return left.at - right.at || left.seq - right.seq;
        });

        const next = this.timers.shift();

        if (!next) {
            return;
        }

        this.current = Math.max(this.current, next.at);
        next.resolve();

        if (this.timers.length > 0) {
            this.schedulePump();
        }
    }
}

export function sliceKey(sliceStart: number): string {
    return `${new Date(sliceStart).toISOString()}.json`;
}

/**
 * Stand-in for the backup under test. Groups records into fixed time
 * slices measured from the first record and writes each slice as one
 * object once a later record shows the slice is over. The slice that is
 * still open when the source ends stays unwritten, like an unfinished
 * multipart upload.
 */
export class TimeSlicedBackupPipeline implements BackupPipeline {
    public readonly writtenKeys: string[] = [];

    constructor(
        private readonly source: RecordSource,
        private readonly storage: InMemoryObjectStorage,
        private readonly bucket: string,
        private readonly periodSliceMs: number,
    ) {}

    async run(): Promise<void> {
        let firstTimestamp: number | null = null;
        let openSlice: number | null = null;
        let buffered: DomainRecord[] = [];

        for await (const record of this.source.consume()) {
            const timestamp = record.timestamp ?? 0;

            if (firstTimestamp === null) {
                firstTimestamp = timestamp;
            }

            const slice = firstTimestamp + Math.floor(
                (timestamp - firstTimestamp) / this.periodSliceMs,
            ) * this.periodSliceMs;

            if (openSlice !== null && slice !== openSlice) {
                await this.flush(openSlice, buffered);
                buffered = [];
            }

            openSlice = slice;
            buffered.push(record);

            if (buffered.length === 1) {
                this.storage.startMultipartUpload(
                    this.bucket,
                    sliceKey(slice),
                );
            }
        }
    }

    private async flush(
        sliceStart: number,
        records: DomainRecord[],
    ): Promise<void> {
        const key = sliceKey(sliceStart);

        await this.storage.putObject(this.bucket, key, encode([...records, null]));
        this.writtenKeys.push(key);
    }
}
