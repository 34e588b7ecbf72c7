import { describe, it, expect } from 'vitest';
import type { HttpClient } from '../utils/httpClient.js';
import { buildBackendChain, describeBackendChain } from './registry.js';
import { BACKEND_NAMES } from './types.js';

const http: HttpClient = {
    async request() {
        return { statusCode: 200, body: '' };
    },
};

describe('buildBackendChain', () => {
    it('leaves API backends out when their key is missing', () => {
        const chain = buildBackendChain(http, { order: BACKEND_NAMES });
        expect(chain.map((b) => b.name)).toEqual(['duckduckgo', 'bing', 'google']);
        expect(chain.map((b) => b.kind)).toEqual(['html', 'html', 'redirect']);
    });

    it('includes keyed API backends in the configured order', () => {
        const chain = buildBackendChain(http, {
            order: ['serper', 'google', 'serpapi'],
            serpApiKey: 'test-key',
            serperApiKey: 'test-key',
        });
        expect(chain.map((b) => b.name)).toEqual(['serper', 'google', 'serpapi']);
        expect(chain[0].kind).toBe('api');
    });

    it('ignores repeated names', () => {
        const chain = buildBackendChain(http, { order: ['google', 'duckduckgo', 'google'] });
        expect(chain.map((b) => b.name)).toEqual(['google', 'duckduckgo']);
    });
});

describe('describeBackendChain', () => {
    it('explains why a backend is disabled', () => {
        expect(describeBackendChain({ order: BACKEND_NAMES, serperApiKey: 'test-key' })).toEqual([
            { name: 'serpapi', enabled: false, reason: 'SERPAPI_KEY not set' },
            { name: 'serper', enabled: true },
            { name: 'duckduckgo', enabled: true },
            { name: 'bing', enabled: true },
            { name: 'google', enabled: true },
        ]);
    });
});
