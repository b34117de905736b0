import type { FetchLike } from '../../src/services/pihole-api.js';

export const TEST_BASE_URL = 'http://pihole.test';
export const TEST_PASSWORD = 'test-password';
export const TEST_SID = 'test-sid';

export interface RecordedRequest {
    method: string;
    path: string;
    sid: string | null;
    body: string | null;
}

export type FakeRoute = (request: RecordedRequest) => Response;

/**
 * In-process stand-in for the Pi-hole HTTP API. Each route maps a path to a
 * handler; `serve` registers a plain JSON body answered with 200.
 */
export class FakePihole {
    readonly requests: RecordedRequest[] = [];
    readonly #routes: Map<string, FakeRoute> = new Map();
    loginValidity = 300;

    constructor(resources: Record<string, unknown> = {}) {
        for (const [routePath, body] of Object.entries(resources)) {
            this.serve(routePath, body);
        }
    }

    serve(routePath: string, body: unknown): void {
        this.#routes.set(routePath, () => jsonResponse(body));
    }

    route(routePath: string, handler: FakeRoute): void {
        this.#routes.set(routePath, handler);
    }

    get fetch(): FetchLike {
        return async (input, init) => this.#handle(input, init);
    }

    requestsTo(routePath: string): RecordedRequest[] {
        return this.requests.filter((request) => request.path === routePath);
    }

    #handle(input: string, init?: RequestInit): Response {
        const headers = new Headers(init?.headers);
        const body = init?.body;
        const request: RecordedRequest = {
            method: init?.method ?? 'GET',
            path: new URL(input).pathname,
            sid: headers.get('X-FTL-SID'),
            body: typeof body === 'string' ? body : null,
        };
        this.requests.push(request);

        const route = this.#routes.get(request.path);
        if (route) {
            return route(request);
        }

        if (request.path === '/api/auth') {
            return jsonResponse({ session: { valid: true, sid: TEST_SID, validity: this.loginValidity }, took: 0.01 });
        }

        return jsonResponse({ error: { key: 'not_found' } }, 404);
    }
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

/** The six configuration resources with some plausible content. */
export function defaultResources(): Record<string, unknown> {
    return {
        '/api/config': { config: { dns: { upstreams: ['9.9.9.9'], queryLogging: true } }, took: 0.004 },
        '/api/dhcp/leases': { leases: [], took: 0.001 },
        '/api/groups': { groups: [{ id: 0, name: 'Default', enabled: true }], took: 0.002 },
        '/api/lists': { lists: [{ id: 1, address: 'https://lists.example.test/hosts.txt', type: 'block' }], took: 0.003 },
        '/api/domains': { domains: [{ id: 1, domain: 'ads.example.test', type: 'deny', kind: 'exact' }], took: 0.001 },
        '/api/clients': { clients: [{ id: 1, client: '192.0.2.10', groups: [0] }], took: 0.002 },
    };
}
