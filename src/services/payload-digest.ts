import { createHash } from 'node:crypto';

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

/** Field the Pi-hole API uses for request timing; it changes on every call. */
const TIMING_FIELD = 'took';

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Recursively drop every `took` key from objects, at any depth and inside arrays. */
export function stripTookField(value: JsonValue): JsonValue {
    if (Array.isArray(value)) {
        return value.map((item) => stripTookField(item));
    }

    if (isJsonObject(value)) {
        const stripped: { [key: string]: JsonValue } = {};
        for (const [key, child] of Object.entries(value)) {
            if (key === TIMING_FIELD) continue;
            stripped[key] = stripTookField(child);
        }
        return stripped;
    }

    return value;
}

function escapeNonAscii(serialized: string): string {
    return serialized.replace(/[\u007f-\uffff]/g, (char) =>
        `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`,
    );
}

/**
 * Serialize with sorted keys, compact separators and ASCII-only output so that
 * semantically identical documents always produce the same bytes.
 */
export function canonicalJson(value: JsonValue): string {
    if (Array.isArray(value)) {
        return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
    }

    if (isJsonObject(value)) {
        const members = Object.keys(value)
            .sort()
            .map((key) => `${escapeNonAscii(JSON.stringify(key))}:${canonicalJson(value[key])}`);
        return `{${members.join(',')}}`;
    }

    return escapeNonAscii(JSON.stringify(value));
}

function md5Hex(input: string): string {
    return createHash('md5').update(input, 'utf8').digest('hex');
}

/** MD5 of the canonical serialization of a normalized payload. */
export function digestPayload(payload: JsonValue): string {
    return md5Hex(canonicalJson(payload));
}

/** MD5 of the concatenated per-resource digests. Order matters. */
export function combineHashes(hashes: readonly string[]): string {
    return md5Hex(hashes.join(''));
}
