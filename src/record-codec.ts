import { isBase64 } from './base64';
import {
    describeError,
    MalformedPayloadError,
} from './errors';
import type {
    DomainRecord,
    WireRecord,
} from './types';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

function isRecord(value: unknown): value is Record<string, unknown> {
    return Boolean(value)
        && typeof value === 'object'
        && !Array.isArray(value);
}

const MAX_SAFE_OFFSET = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE_OFFSET = BigInt(Number.MIN_SAFE_INTEGER);

function toWireOffset(offset: bigint): number | string {
    if (offset >= MIN_SAFE_OFFSET && offset <= MAX_SAFE_OFFSET) {
        return Number(offset);
    }

    return offset.toString();
}

function toWireRecord(record: DomainRecord): WireRecord {
    const wire: WireRecord = {
        topic: record.topic,
        partition: record.partition,
        offset: toWireOffset(record.offset),
        value: record.value,
    };

    if (record.key !== undefined) {
        wire.key = record.key;
    }

    if (record.timestamp !== undefined) {
        wire.timestamp = record.timestamp;
    }

    return wire;
}

export function encode(
    records: ReadonlyArray<DomainRecord | null>,
): Uint8Array {
    const entries = records.map((record) => {
        return record === null ? null : toWireRecord(record);
    });

    return encoder.encode(JSON.stringify(entries));
}

function readString(
    value: unknown,
    fieldPath: string,
): string {
    if (typeof value !== 'string') {
        throw new MalformedPayloadError(fieldPath, 'must be a string');
    }

    return value;
}

function readBase64(
    value: unknown,
    fieldPath: string,
): string {
    const text = readString(value, fieldPath);

    if (!isBase64(text)) {
        throw new MalformedPayloadError(fieldPath, 'must be base64 text');
    }

    return text;
}

function readSafeInt(
    value: unknown,
    fieldPath: string,
): number {
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
        throw new MalformedPayloadError(fieldPath, 'must be a safe integer');
    }

    return value;
}

function readOffset(
    value: unknown,
    fieldPath: string,
): bigint {
    if (typeof value === 'string' && /^-?(0|[1-9][0-9]*)$/.test(value)) {
        return BigInt(value);
    }

    return BigInt(readSafeInt(value, fieldPath));
}

function readRecord(
    value: unknown,
    path: string,
): DomainRecord {
    if (!isRecord(value)) {
        throw new MalformedPayloadError(path, 'must be an object or null');
    }

    const record: DomainRecord = {
        topic: readString(value.topic, `${path}.topic`),
        partition: readSafeInt(value.partition, `${path}.partition`),
        offset: readOffset(value.offset, `${path}.offset`),
        value: readBase64(value.value, `${path}.value`),
    };

    if (value.key !== undefined && value.key !== null) {
        record.key = readBase64(value.key, `${path}.key`);
    }

    if (value.timestamp !== undefined && value.timestamp !== null) {
        record.timestamp = readSafeInt(
            value.timestamp,
            `${path}.timestamp`,
        );
    }

    return record;
}

/**
 * Decodes one backup object. `null` entries are padding written by the
 * backup and come back as `null`.
 */
export function decode(
    bytes: Uint8Array,
): Array<DomainRecord | null> {
    let parsed: unknown;

    try {
        parsed = JSON.parse(decoder.decode(bytes));
    } catch (error) {
        throw new MalformedPayloadError(
            '$',
            `invalid JSON (${describeError(error)})`,
        );
    }

    if (!Array.isArray(parsed)) {
        throw new MalformedPayloadError('$', 'must be a JSON array');
    }

    return parsed.map((entry: unknown, index) => {
        if (entry === null) {
            return null;
        }

        return readRecord(entry, `$[${index}]`);
    });
}

export function presentRecords(
    entries: ReadonlyArray<DomainRecord | null>,
): DomainRecord[] {
    return entries.filter((entry): entry is DomainRecord => entry !== null);
}
