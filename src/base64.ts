const BASE64_PATTERN =
    /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function isBase64(value: string): boolean {
    return BASE64_PATTERN.test(value);
}

export function decodeBase64(value: string): Buffer | null {
    if (!isBase64(value)) {
        return null;
    }

    return Buffer.from(value, 'base64');
}

export function encodeBase64(value: Uint8Array): string {
    return Buffer.from(value).toString('base64');
}
