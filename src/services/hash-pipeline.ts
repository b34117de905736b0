import { logThought } from '../utils/logger.js';
import { ApiError } from '../utils/errors.js';
import type { ChangeDetector, CheckResult } from '../types/check-result.js';
import { CredentialCache } from './credential-cache.js';
import { HashStore } from './hash-store.js';
import { combineHashes, digestPayload } from './payload-digest.js';
import { DEFAULT_ENDPOINTS, PiholeApiClient } from './pihole-api.js';

export interface HashPipelineOptions {
    client: PiholeApiClient;
    password: string;
    credentials: CredentialCache;
    hashStore: HashStore;
    endpoints?: readonly string[];
}

/**
 * Fetches every configured Pi-hole resource, reduces them to one summary hash
 * and compares it with the hash stored by the previous run.
 *
 * API failures become an `error` result; in that case the stored hash is left
 * untouched so the next run still compares against the last good state.
 */
export class HashPipeline implements ChangeDetector {
    readonly #client: PiholeApiClient;
    readonly #password: string;
    readonly #credentials: CredentialCache;
    readonly #hashStore: HashStore;
    readonly #endpoints: readonly string[];

    constructor(options: HashPipelineOptions) {
        this.#client = options.client;
        this.#password = options.password;
        this.#credentials = options.credentials;
        this.#hashStore = options.hashStore;
        this.#endpoints = options.endpoints ?? DEFAULT_ENDPOINTS;
    }

    get endpoints(): readonly string[] {
        return this.#endpoints;
    }

    async check(): Promise<CheckResult> {
        let summaryHash: string;
        try {
            summaryHash = await this.#computeSummaryHash();
        } catch (err) {
            if (err instanceof ApiError) {
                return {
                    status: 'error',
                    summaryHash: null,
                    previousHash: null,
                    message: err.message,
                };
            }
            throw err;
        }

        const previousHash = await this.#hashStore.read();
        await this.#hashStore.write(summaryHash);

        if (previousHash === null) {
            return {
                status: 'first-run',
                summaryHash,
                previousHash: null,
                message: 'No previous hash found; stored current summary hash.',
            };
        }

        if (previousHash === summaryHash) {
            return {
                status: 'unchanged',
                summaryHash,
                previousHash,
                message: 'Pi-hole configuration unchanged.',
            };
        }

        return {
            status: 'changed',
            summaryHash,
            previousHash,
            message: 'Pi-hole configuration has changed.',
        };
    }

    /** A cached session the server rejects with 401 is dropped and replaced by one fresh login. */
    async #computeSummaryHash(): Promise<string> {
        const cached = await this.#credentials.load();
        if (!cached) {
            return this.#fetchAll(await this.#login());
        }

        await logThought('[HashPipeline] Using cached session.', 'debug');
        try {
            return await this.#fetchAll(cached);
        } catch (err) {
            if (!(err instanceof ApiError) || err.status !== 401) throw err;
            await logThought('[HashPipeline] Cached session rejected; logging in again.', 'warn');
            await this.#credentials.clear();
            return this.#fetchAll(await this.#login());
        }
    }

    async #fetchAll(sid: string): Promise<string> {
        const digests: string[] = [];
        for (const endpoint of this.#endpoints) {
            const payload = await this.#client.fetchResource(endpoint, sid);
            digests.push(digestPayload(payload));
        }
        return combineHashes(digests);
    }

    async #login(): Promise<string> {
        await logThought('[HashPipeline] Authenticating against the Pi-hole API.', 'debug');
        const session = await this.#client.login(this.#password);
        await this.#credentials.store(session.sid, session.validity);
        return session.sid;
    }
}
