import * as fs from 'node:fs/promises';
import path from 'node:path';
import { logThought } from '../utils/logger.js';

/** Seconds shaved off the server-reported validity to absorb clock skew. */
export const EXPIRY_SAFETY_MARGIN_SECONDS = 5;

export interface CredentialCacheOptions {
    filePath: string;
    now?: () => number;
}

interface CachedCredentialRecord {
    sid: string;
    /** Epoch seconds, string-encoded. */
    expires: string;
}

/**
 * Persists the Pi-hole session id between runs so a check does not have to log
 * in every time. Missing or corrupt records are cache misses.
 */
export class CredentialCache {
    readonly #filePath: string;
    readonly #now: () => number;

    constructor(options: CredentialCacheOptions) {
        this.#filePath = options.filePath;
        this.#now = options.now ?? (() => Date.now());
    }

    get filePath(): string {
        return this.#filePath;
    }

    async load(): Promise<string | null> {
        let raw: string;
        try {
            raw = await fs.readFile(this.#filePath, 'utf-8');
        } catch (err) {
            const fsError = err as NodeJS.ErrnoException;
            if (fsError.code !== 'ENOENT') {
                await logThought(`[CredentialCache] Unable to read ${this.#filePath}: ${fsError.message}`, 'warn');
            }
            return null;
        }

        let payload: unknown;
        try {
            payload = JSON.parse(raw);
        } catch {
            await logThought(`[CredentialCache] Ignoring corrupt cache at ${this.#filePath}.`, 'debug');
            return null;
        }

        if (!isRecord(payload)) return null;

        const sid = payload.sid;
        if (typeof sid !== 'string' || sid.length === 0) return null;

        const expires = parseEpochSeconds(payload.expires);
        if (expires === null) return null;

        if (expires * 1000 <= this.#now()) {
            await logThought('[CredentialCache] Cached session expired.', 'debug');
            return null;
        }

        return sid;
    }

    /** Forget the cached session, e.g. after the server rejected it. */
    async clear(): Promise<void> {
        await fs.rm(this.#filePath, { force: true });
    }

    async store(sid: string, validitySeconds: number): Promise<void> {
        const ttl = Math.max(validitySeconds - EXPIRY_SAFETY_MARGIN_SECONDS, 0);
        const expires = this.#now() / 1000 + ttl;
        const record: CachedCredentialRecord = {
            sid,
            expires: Math.round(expires).toString(),
        };

        await fs.mkdir(path.dirname(this.#filePath), { recursive: true });
        await fs.writeFile(this.#filePath, `${JSON.stringify(record)}\n`, { encoding: 'utf-8', mode: 0o600 });
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEpochSeconds(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value !== 'string' || value.trim().length === 0) {
        return null;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
}
