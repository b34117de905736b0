import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CredentialCache } from '../../src/services/credential-cache.js';
import { HashPipeline } from '../../src/services/hash-pipeline.js';
import { HashStore } from '../../src/services/hash-store.js';
import { combineHashes, digestPayload, stripTookField, type JsonValue } from '../../src/services/payload-digest.js';
import { DEFAULT_ENDPOINTS, PiholeApiClient } from '../../src/services/pihole-api.js';
import { exitCodeFor } from '../../src/types/check-result.js';
import {
    defaultResources,
    FakePihole,
    jsonResponse,
    TEST_BASE_URL,
    TEST_PASSWORD,
    TEST_SID,
} from '../harness/fake-pihole.js';

describe('HashPipeline', () => {
    let tempDir: string;
    let hashPath: string;
    let sidPath: string;
    let fake: FakePihole;

    beforeEach(async () => {
        tempDir = await mkdtemp(path.join(os.tmpdir(), 'pihole-hash-'));
        hashPath = path.join(tempDir, 'config.md5');
        sidPath = path.join(tempDir, 'sid.json');
        fake = new FakePihole(defaultResources());
    });

    afterEach(async () => {
        await rm(tempDir, { recursive: true, force: true });
    });

    const createPipeline = (now?: () => number): HashPipeline =>
        new HashPipeline({
            client: new PiholeApiClient({ baseUrl: TEST_BASE_URL, fetch: fake.fetch }),
            password: TEST_PASSWORD,
            credentials: new CredentialCache({ filePath: sidPath, now }),
            hashStore: new HashStore(hashPath),
        });

    it('reports first-run, persists the summary hash and caches the session', async () => {
        const result = await createPipeline().check();

        const expected = combineHashes(
            DEFAULT_ENDPOINTS.map((endpoint) => {
                const body: JsonValue = JSON.parse(JSON.stringify(defaultResources()[endpoint]));
                return digestPayload(stripTookField(body));
            }),
        );

        expect(result).toEqual({
            status: 'first-run',
            summaryHash: expected,
            previousHash: null,
            message: 'No previous hash found; stored current summary hash.',
        });
        expect(await readFile(hashPath, 'ascii')).toBe(`${expected}\n`);
        expect(JSON.parse(await readFile(sidPath, 'utf-8'))).toMatchObject({ sid: TEST_SID });
        expect(exitCodeFor(result)).toBe(1);
        expect(exitCodeFor(result, 0)).toBe(0);
    });

    it('fetches the endpoints in their fixed order with the session header', async () => {
        await createPipeline().check();

        expect(fake.requests.map((request) => request.path)).toEqual(['/api/auth', ...DEFAULT_ENDPOINTS]);
        expect(fake.requests.slice(1).every((request) => request.sid === TEST_SID)).toBe(true);
    });

    it('reports unchanged on a repeat run and reuses the cached session', async () => {
        const first = await createPipeline().check();
        const second = await createPipeline().check();

        expect(second.status).toBe('unchanged');
        expect(second.previousHash).toBe(second.summaryHash);
        expect(second.summaryHash).toBe(first.summaryHash);
        expect(second.message).toBe('Pi-hole configuration unchanged.');
        expect(fake.requestsTo('/api/auth')).toHaveLength(1);
        expect(exitCodeFor(second)).toBe(0);
    });

    it('ignores timing noise in the responses', async () => {
        await createPipeline().check();
        fake.serve('/api/groups', { took: 9.99, groups: [{ enabled: true, name: 'Default', id: 0 }] });

        const result = await createPipeline().check();

        expect(result.status).toBe('unchanged');
    });

    it('reports changed when any resource content changes', async () => {
        const first = await createPipeline().check();
        fake.serve('/api/domains', { domains: [{ id: 1, domain: 'tracker.example.test', type: 'deny', kind: 'exact' }] });

        const result = await createPipeline().check();

        expect(result).toEqual({
            status: 'changed',
            summaryHash: expect.stringMatching(/^[0-9a-f]{32}$/),
            previousHash: first.summaryHash,
            message: 'Pi-hole configuration has changed.',
        });
        expect(result.summaryHash).not.toBe(first.summaryHash);
        expect(await readFile(hashPath, 'ascii')).toBe(`${result.summaryHash}\n`);
        expect(exitCodeFor(result)).toBe(1);
    });

    it('returns error and keeps the previous hash when the fourth endpoint fails', async () => {
        const first = await createPipeline().check();
        fake.route('/api/lists', () => jsonResponse({ error: { key: 'database_error' } }, 500));
        fake.serve('/api/config', { config: { dns: { upstreams: ['1.1.1.1'] } } });
        fake.requests.length = 0;

        const result = await createPipeline().check();

        expect(result).toEqual({
            status: 'error',
            summaryHash: null,
            previousHash: null,
            message: 'Failed to fetch /api/lists: status 500',
        });
        expect(fake.requests.map((request) => request.path)).toEqual([
            '/api/config',
            '/api/dhcp/leases',
            '/api/groups',
            '/api/lists',
        ]);
        expect(await readFile(hashPath, 'ascii')).toBe(`${first.summaryHash}\n`);
        expect(exitCodeFor(result)).toBe(3);
    });

    it('returns error without fetching resources when login fails', async () => {
        fake.route('/api/auth', () => jsonResponse({ session: { valid: false, sid: null, validity: -1 } }));

        const result = await createPipeline().check();

        expect(result.status).toBe('error');
        expect(result.message).toBe("Login response does not contain a valid 'sid'");
        expect(fake.requests.map((request) => request.path)).toEqual(['/api/auth']);
        await expect(readFile(hashPath, 'ascii')).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('logs in again once the cached session has expired', async () => {
        const start = Date.now();
        await createPipeline(() => start).check();
        await createPipeline(() => start + 296_000).check();

        expect(fake.requestsTo('/api/auth')).toHaveLength(2);
    });

    it('uses a pre-existing session file without logging in', async () => {
        const expires = Math.floor(Date.now() / 1000) + 600;
        await writeFile(sidPath, JSON.stringify({ sid: 'seeded-sid', expires: `${expires}` }));

        await createPipeline().check();

        expect(fake.requestsTo('/api/auth')).toHaveLength(0);
        expect(fake.requestsTo('/api/config')[0]?.sid).toBe('seeded-sid');
    });

    it('replaces a cached session the server rejects and retries once', async () => {
        const expires = Math.floor(Date.now() / 1000) + 600;
        await writeFile(sidPath, JSON.stringify({ sid: 'stale-sid', expires: `${expires}` }));
        const config = defaultResources()['/api/config'];
        fake.route('/api/config', (request) =>
            request.sid === 'stale-sid' ? jsonResponse({ error: { key: 'unauthorized' } }, 401) : jsonResponse(config),
        );

        const result = await createPipeline().check();

        expect(result.status).toBe('first-run');
        expect(fake.requests.map((request) => request.path)).toEqual([
            '/api/config',
            '/api/auth',
            ...DEFAULT_ENDPOINTS,
        ]);
        expect(JSON.parse(await readFile(sidPath, 'utf-8'))).toMatchObject({ sid: TEST_SID });
    });

    it('gives up with an error when a fresh session is rejected too', async () => {
        fake.route('/api/config', () => jsonResponse({ error: { key: 'unauthorized' } }, 401));

        const result = await createPipeline().check();

        expect(result.status).toBe('error');
        expect(result.message).toBe('Failed to fetch /api/config: status 401');
        expect(fake.requestsTo('/api/auth')).toHaveLength(1);
    });
});
