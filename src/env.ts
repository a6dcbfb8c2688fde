import {
    DEFAULT_CLEANUP_INITIAL_DELAY_MS,
    DEFAULT_MAX_CLEANUP_TIMEOUT_MS,
    DEFAULT_POLL_ATTEMPTS,
    DEFAULT_POLL_DELAY_MS,
} from './constants';

export type S3StorageEnv = {
    accessKeyId?: string;
    endpoint?: string;
    forcePathStyle: boolean;
    region: string;
    secretAccessKey?: string;
    sessionToken?: string;
};

export type HarnessEnv = {
    bucketPrefix?: string;
    cleanup: {
        enabled: boolean;
        initialDelayMs: number;
    };
    maxCleanupTimeoutMs: number;
    pollAttempts: number;
    pollDelayMs: number;
    s3: S3StorageEnv;
    useVirtualDotHost: boolean;
};

function parsePositiveInt(
    value: string | undefined,
    fallback: number,
    key: string,
): number {
    const normalized = readOptionalString(value);

    if (!normalized) {
        return fallback;
    }

    if (!/^\d+$/.test(normalized) || Number.parseInt(normalized, 10) <= 0) {
        throw new Error(`${key} must be a positive integer when provided`);
    }

    return Number.parseInt(normalized, 10);
}

function parseNonNegativeInt(
    value: string | undefined,
    fallback: number,
    key: string,
): number {
    const normalized = readOptionalString(value);

    if (!normalized) {
        return fallback;
    }

    if (!/^\d+$/.test(normalized)) {
        throw new Error(`${key} must be a non-negative integer when provided`);
    }

    return Number.parseInt(normalized, 10);
}

function readOptionalString(
    value: string | undefined,
): string | undefined {
    if (value === undefined) {
        return undefined;
    }

    const trimmed = String(value).trim();

    return trimmed || undefined;
}

function readRequiredString(
    env: NodeJS.ProcessEnv,
    key: string,
): string {
    const value = readOptionalString(env[key]);

    if (!value) {
        throw new Error(`${key} is required`);
    }

    return value;
}

function parseBoolean(
    value: string | undefined,
    fallback: boolean,
    key: string,
): boolean {
    const normalized = readOptionalString(value)?.toLowerCase();

    if (!normalized) {
        return fallback;
    }

    if (
        normalized === '1'
        || normalized === 'true'
        || normalized === 'yes'
        || normalized === 'on'
    ) {
        return true;
    }

    if (
        normalized === '0'
        || normalized === 'false'
        || normalized === 'no'
        || normalized === 'off'
    ) {
        return false;
    }

    throw new Error(`${key} must be true or false when provided`);
}

export function parseHarnessEnv(
    env: NodeJS.ProcessEnv,
): HarnessEnv {
    const accessKeyId = readOptionalString(
        env.BACKUP_HARNESS_S3_ACCESS_KEY_ID,
    );
    const secretAccessKey = readOptionalString(
        env.BACKUP_HARNESS_S3_SECRET_ACCESS_KEY,
    );

    if (
        (accessKeyId && !secretAccessKey)
        || (!accessKeyId && secretAccessKey)
    ) {
        throw new Error(
            'BACKUP_HARNESS_S3_ACCESS_KEY_ID and '
            + 'BACKUP_HARNESS_S3_SECRET_ACCESS_KEY must be set together '
            + 'when provided',
        );
    }

    const useVirtualDotHost = parseBoolean(
        env.BACKUP_HARNESS_USE_VIRTUAL_DOT_HOST,
        false,
        'BACKUP_HARNESS_USE_VIRTUAL_DOT_HOST',
    );
    const bucketPrefix = readOptionalString(env.BACKUP_HARNESS_BUCKET_PREFIX);

    if (bucketPrefix !== undefined && !/^[a-z0-9][a-z0-9.-]*$/.test(bucketPrefix)) {
        throw new Error(
            'BACKUP_HARNESS_BUCKET_PREFIX must start with a lowercase letter '
            + 'or digit and contain only lowercase letters, digits, dots and '
            + 'hyphens',
        );
    }

    if (bucketPrefix?.includes('.') && !useVirtualDotHost) {
        throw new Error(
            'BACKUP_HARNESS_BUCKET_PREFIX may only contain dots when '
            + 'BACKUP_HARNESS_USE_VIRTUAL_DOT_HOST=true',
        );
    }

    return {
        bucketPrefix,
        cleanup: {
            enabled: parseBoolean(
                env.BACKUP_HARNESS_CLEANUP_ENABLED,
                false,
                'BACKUP_HARNESS_CLEANUP_ENABLED',
            ),
            initialDelayMs: parseNonNegativeInt(
                env.BACKUP_HARNESS_CLEANUP_INITIAL_DELAY_MS,
                DEFAULT_CLEANUP_INITIAL_DELAY_MS,
                'BACKUP_HARNESS_CLEANUP_INITIAL_DELAY_MS',
            ),
        },
        maxCleanupTimeoutMs: parsePositiveInt(
            env.BACKUP_HARNESS_MAX_CLEANUP_TIMEOUT_MS,
            DEFAULT_MAX_CLEANUP_TIMEOUT_MS,
            'BACKUP_HARNESS_MAX_CLEANUP_TIMEOUT_MS',
        ),
        pollAttempts: parsePositiveInt(
            env.BACKUP_HARNESS_POLL_ATTEMPTS,
            DEFAULT_POLL_ATTEMPTS,
            'BACKUP_HARNESS_POLL_ATTEMPTS',
        ),
        pollDelayMs: parseNonNegativeInt(
            env.BACKUP_HARNESS_POLL_DELAY_MS,
            DEFAULT_POLL_DELAY_MS,
            'BACKUP_HARNESS_POLL_DELAY_MS',
        ),
        s3: {
            accessKeyId,
            endpoint: readOptionalString(env.BACKUP_HARNESS_S3_ENDPOINT),
            forcePathStyle: parseBoolean(
                env.BACKUP_HARNESS_S3_FORCE_PATH_STYLE,
                false,
                'BACKUP_HARNESS_S3_FORCE_PATH_STYLE',
            ),
            region: readRequiredString(env, 'BACKUP_HARNESS_S3_REGION'),
            secretAccessKey,
            sessionToken: readOptionalString(
                env.BACKUP_HARNESS_S3_SESSION_TOKEN,
            ),
        },
        useVirtualDotHost,
    };
}
