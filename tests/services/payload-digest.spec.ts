import { describe, expect, it } from 'vitest';
import {
    canonicalJson,
    combineHashes,
    digestPayload,
    stripTookField,
    type JsonValue,
} from '../../src/services/payload-digest.js';

describe('stripTookField', () => {
    it('removes took at every depth, including inside arrays', () => {
        const payload: JsonValue = {
            took: 0.0031,
            config: {
                dns: { upstreams: ['9.9.9.9'], took: 1 },
                lists: [{ id: 1, took: 2 }, { id: 2, nested: { took: 3, keep: true } }],
            },
        };

        expect(stripTookField(payload)).toEqual({
            config: {
                dns: { upstreams: ['9.9.9.9'] },
                lists: [{ id: 1 }, { id: 2, nested: { keep: true } }],
            },
        });
    });

    it('leaves primitives and similarly named keys alone', () => {
        expect(stripTookField('took')).toBe('took');
        expect(stripTookField(42)).toBe(42);
        expect(stripTookField(null)).toBeNull();
        expect(stripTookField({ took_ms: 5, Took: 6 })).toEqual({ took_ms: 5, Took: 6 });
    });
});

describe('canonicalJson', () => {
    it('sorts keys recursively and uses compact separators', () => {
        expect(canonicalJson({ b: 1, a: [true, null, 'x', { d: 2, c: 1 }] })).toBe(
            '{"a":[true,null,"x",{"c":1,"d":2}],"b":1}',
        );
    });

    it('escapes non-ASCII characters', () => {
        expect(canonicalJson({ name: 'café', list: ['ü'] })).toBe('{"list":["\\u00fc"],"name":"caf\\u00e9"}');
    });
});

describe('digestPayload', () => {
    it('hashes the canonical form with MD5', () => {
        expect(digestPayload({})).toBe('99914b932bd37a50b983c5e7c90ae93b');
        expect(digestPayload({ domains: [{ id: 1, domain: 'example.org' }] })).toBe(
            '9efa510f2edb112aabcafd75eb7ca5b5',
        );
    });

    it('ignores key order and took fields once payloads are normalized', () => {
        const first = stripTookField({ took: 0.5, clients: [{ name: 'laptop', id: 7, took: 3 }], total: 1 });
        const second = stripTookField({ total: 1, clients: [{ id: 7, name: 'laptop' }] });

        expect(digestPayload(first)).toBe(digestPayload(second));
    });

    it('changes when content changes', () => {
        expect(digestPayload({ enabled: true })).not.toBe(digestPayload({ enabled: false }));
    });

    it('keeps array order significant', () => {
        expect(digestPayload([1, 2])).not.toBe(digestPayload([2, 1]));
    });
});

describe('combineHashes', () => {
    const domains = '9efa510f2edb112aabcafd75eb7ca5b5';
    const groups = 'a10a60e447e306862f96243292179a7c';

    it('hashes the concatenation of the digests', () => {
        expect(combineHashes([domains, groups])).toBe('a4bf0a18b72fa4592af31e602d175ed4');
        expect(combineHashes([])).toBe('d41d8cd98f00b204e9800998ecf8427e');
    });

    it('is sensitive to digest order', () => {
        expect(combineHashes([groups, domains])).toBe('3a76e9321368583e8a907b7887c63b2c');
        expect(combineHashes([groups, domains])).not.toBe(combineHashes([domains, groups]));
    });
});
