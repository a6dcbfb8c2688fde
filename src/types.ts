/**
 * A consumed Kafka record reduced to the fields a backup persists.
 *
 * `key` and `value` hold base64 text so that arbitrary bytes survive the
 * JSON wire form unchanged.
 */
export type DomainRecord = {
    topic: string;
    partition: number;
    offset: bigint;
    key?: string;
    value: string;
    timestamp?: number;
};

export type WireRecord = {
    topic: string;
    partition: number;
    offset: number | string;
    key?: string | null;
    value: string;
    timestamp?: number | null;
};

/**
 * A record in the shape a Kafka producer sends. Key-less records omit
 * `key` so the broker picks the partition.
 */
export type ProducerRecord = {
    topic: string;
    key?: Buffer;
    value: Buffer;
};
