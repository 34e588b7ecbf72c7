/**
 * src/sources/registry.ts
 *
 * Builds the ordered fallback chain from configuration. API backends are only
 * part of the chain when their key is present; adding a backend means adding
 * a case here, the executor never changes.
 */

import { log } from 'crawlee';
import type { HttpClient } from '../utils/httpClient.js';
import { createGoogleRedirectBackend } from './googleSerp.js';
import { BING_ENGINE, DUCKDUCKGO_ENGINE, createHtmlSearchBackend } from './htmlSearch.js';
import { createSerpApiBackend } from './serpApi.js';
import { createSerperBackend } from './serperApi.js';
import { LINKEDIN_PROFILES } from './types.js';
import type { BackendName, ProfileTarget, SearchBackend } from './types.js';

export interface BackendChainOptions {
    order: readonly BackendName[];
    serpApiKey?: string;
    serperApiKey?: string;
    googleHost?: string;
    target?: ProfileTarget;
}

export interface BackendStatus {
    name: BackendName;
    enabled: boolean;
    reason?: string;
}

export function describeBackendChain(options: BackendChainOptions): BackendStatus[] {
    return options.order.map((name): BackendStatus => {
        if (name === 'serpapi' && !options.serpApiKey) {
            return { name, enabled: false, reason: 'SERPAPI_KEY not set' };
        }
        if (name === 'serper' && !options.serperApiKey) {
            return { name, enabled: false, reason: 'SERPER_API_KEY not set' };
        }
        return { name, enabled: true };
    });
}

function createBackend(name: BackendName, http: HttpClient, options: BackendChainOptions): SearchBackend | null {
    const target = options.target ?? LINKEDIN_PROFILES;
    switch (name) {
        case 'serpapi':
            return options.serpApiKey ? createSerpApiBackend(http, options.serpApiKey) : null;
        case 'serper':
            return options.serperApiKey ? createSerperBackend(http, options.serperApiKey) : null;
        case 'duckduckgo':
            return createHtmlSearchBackend(http, DUCKDUCKGO_ENGINE, target);
        case 'bing':
            return createHtmlSearchBackend(http, BING_ENGINE, target);
        case 'google':
            return createGoogleRedirectBackend(http, { host: options.googleHost, target });
    }
}

export function buildBackendChain(http: HttpClient, options: BackendChainOptions): SearchBackend[] {
    const chain: SearchBackend[] = [];
    const seen = new Set<BackendName>();

    for (const name of options.order) {
        if (seen.has(name)) continue;
        seen.add(name);

        const backend = createBackend(name, http, options);
        if (backend) {
            chain.push(backend);
        } else {
            log.debug(`[Backends] Skipping ${name}: no API key configured`);
        }
    }

    log.info(`[Backends] Fallback chain: ${chain.map((b) => b.name).join(' → ') || '(empty)'}`);
    return chain;
}
