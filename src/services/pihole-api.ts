import { ApiError, describeError } from '../utils/errors.js';
import { stripTookField, type JsonValue } from './payload-digest.js';

export const LOGIN_ENDPOINT = '/api/auth';
export const SESSION_HEADER = 'X-FTL-SID';
export const REQUEST_TIMEOUT_MS = 10_000;

/** Resources that together describe the Pi-hole configuration. Order is significant. */
export const DEFAULT_ENDPOINTS: readonly string[] = [
    '/api/config',
    '/api/dhcp/leases',
    '/api/groups',
    '/api/lists',
    '/api/domains',
    '/api/clients',
];

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface PiholeSession {
    sid: string;
    /** Seconds the session stays valid, as reported by the server. */
    validity: number;
}

export interface PiholeApiClientOptions {
    baseUrl: string;
    fetch?: FetchLike;
    timeoutMs?: number;
}

export function joinUrl(base: string, endpoint: string): string {
    return `${base.replace(/\/+$/, '')}/${endpoint.replace(/^\/+/, '')}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Extract `{ session: { sid, validity } }` from a login response body. */
export function parseLoginPayload(payload: unknown): PiholeSession {
    const session = isRecord(payload) ? payload.session : undefined;
    if (!isRecord(session)) {
        throw new ApiError("Login response does not contain 'session' information", { endpoint: LOGIN_ENDPOINT });
    }

    const sid = session.sid;
    if (typeof sid !== 'string' || sid.length === 0) {
        throw new ApiError("Login response does not contain a valid 'sid'", { endpoint: LOGIN_ENDPOINT });
    }

    const validity = typeof session.validity === 'string' && session.validity.trim() !== ''
        ? Number(session.validity)
        : session.validity;
    if (typeof validity !== 'number' || !Number.isFinite(validity)) {
        throw new ApiError("Login response does not contain a valid 'validity' value", { endpoint: LOGIN_ENDPOINT });
    }

    return { sid, validity };
}

/**
 * Minimal client for the Pi-hole v6 REST API: password login and read-only
 * resource retrieval authenticated with the session id header.
 */
export class PiholeApiClient {
    readonly #baseUrl: string;
    readonly #fetch: FetchLike;
    readonly #timeoutMs: number;

    constructor(options: PiholeApiClientOptions) {
        this.#baseUrl = options.baseUrl;
        this.#fetch = options.fetch ?? ((input, init) => fetch(input, init));
        this.#timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    }

    async login(password: string): Promise<PiholeSession> {
        let response: Response;
        try {
            response = await this.#fetch(joinUrl(this.#baseUrl, LOGIN_ENDPOINT), {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ password }),
                signal: AbortSignal.timeout(this.#timeoutMs),
            });
        } catch (err) {
            throw new ApiError(`Login request failed: ${describeError(err)}`, { endpoint: LOGIN_ENDPOINT, cause: err });
        }

        if (!response.ok) {
            throw new ApiError(`Login failed with status ${response.status}`, {
                status: response.status,
                endpoint: LOGIN_ENDPOINT,
            });
        }

        const payload = await this.#readJson(response, LOGIN_ENDPOINT, 'Login response is not valid JSON');
        return parseLoginPayload(payload);
    }

    /** Fetch one resource and return its body with timing fields removed. */
    async fetchResource(endpoint: string, sid: string): Promise<JsonValue> {
        let response: Response;
        try {
            response = await this.#fetch(joinUrl(this.#baseUrl, endpoint), {
                method: 'GET',
                headers: { [SESSION_HEADER]: sid },
                signal: AbortSignal.timeout(this.#timeoutMs),
            });
        } catch (err) {
            throw new ApiError(`Failed to fetch ${endpoint}: ${describeError(err)}`, { endpoint, cause: err });
        }

        if (!response.ok) {
            throw new ApiError(`Failed to fetch ${endpoint}: status ${response.status}`, {
                status: response.status,
                endpoint,
            });
        }

        const payload = await this.#readJson(response, endpoint, `Response from ${endpoint} is not valid JSON`);
        return stripTookField(payload);
    }

    async #readJson(response: Response, endpoint: string, invalidMessage: string): Promise<JsonValue> {
        let text: string;
        try {
            text = await response.text();
        } catch (err) {
            throw new ApiError(`Failed to read response from ${endpoint}: ${describeError(err)}`, { endpoint, cause: err });
        }

        try {
            const parsed: JsonValue = JSON.parse(text);
            return parsed;
        } catch (err) {
            throw new ApiError(invalidMessage, { status: response.status, endpoint, cause: err });
        }
    }
}
