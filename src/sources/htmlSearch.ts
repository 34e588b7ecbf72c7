/**
 * src/sources/htmlSearch.ts
 *
 * HTML SCRAPE BACKENDS: DuckDuckGo (html endpoint) and Bing
 *
 * STRATEGY
 * ────────
 * Plain HTTP GET with browser-like headers, then Cheerio over the result
 * page. Each engine is described by an endpoint, its query parameters and the
 * CSS selector of its organic result links; the extraction is shared:
 *
 *   result anchors → href → redirect unwrap → keep profile-host links
 *
 * Zero result anchors means the layout changed or we were served something
 * else entirely: a challenge page is rate_limited, anything else a
 * parse_failure. Pages that do have results are never checked for block
 * markers, since the query itself is echoed in the page.
 */

import { log } from 'crawlee';
import * as cheerio from 'cheerio';
import { assertNotBlocked, assertOkResponse } from '../utils/blockDetection.js';
import { BackendError, toBackendError } from '../utils/errors.js';
import { browserHeaders } from '../utils/httpClient.js';
import type { HttpClient, HttpResponse } from '../utils/httpClient.js';
import { isProfileHost, unwrapRedirect } from '../utils/profileUrl.js';
import { LINKEDIN_PROFILES } from './types.js';
import type { BackendName, BackendSearchOptions, ProfileTarget, SearchBackend, SearchHit } from './types.js';

// ─── Engine Descriptors ───────────────────────────────────────────────────────

export interface HtmlEngine {
    name: BackendName;
    label: string;
    endpoint: string;
    resultSelector: string;
    params(query: string, limit: number): Record<string, string>;
}

export const DUCKDUCKGO_ENGINE: HtmlEngine = {
    name: 'duckduckgo',
    label: 'DuckDuckGo',
    endpoint: 'https://html.duckduckgo.com/html/',
    resultSelector: 'a.result__a',
    params: (query) => ({ q: query, kl: 'us-en' }),
};

export const BING_ENGINE: HtmlEngine = {
    name: 'bing',
    label: 'Bing',
    endpoint: 'https://www.bing.com/search',
    resultSelector: 'li.b_algo h2 a',
    params: (query, limit) => ({ q: query, count: String(limit) }),
};

// ─── HTML Parser ──────────────────────────────────────────────────────────────

export interface ExtractedLinks {
    anchorCount: number;
    links: string[];
}

export function extractResultLinks(
    html: string,
    selector: string,
    target: ProfileTarget = LINKEDIN_PROFILES
): ExtractedLinks {
    const $ = cheerio.load(html);
    const links: string[] = [];
    const anchors = $(selector);

    anchors.each((_, el) => {
        const href = $(el).attr('href');
        if (!href) return;
        const resolved = unwrapRedirect(href);
        if (resolved && isProfileHost(resolved, target)) links.push(resolved);
    });

    return { anchorCount: anchors.length, links };
}

// ─── Public API ───────────────────────────────────────────────────────────────

export function createHtmlSearchBackend(
    http: HttpClient,
    engine: HtmlEngine,
    target: ProfileTarget = LINKEDIN_PROFILES
): SearchBackend {
    const tag = `[${engine.label}]`;

    return {
        name: engine.name,
        kind: 'html',

        async search(query: string, options: BackendSearchOptions): Promise<SearchHit[]> {
            log.debug(`${tag} Fetching results page: ${query}`);

            let response: HttpResponse;
            try {
                response = await http.request({
                    url: engine.endpoint,
                    headers: browserHeaders(),
                    searchParams: engine.params(query, options.limit),
                    timeoutMs: options.timeoutMs,
                });
            } catch (err) {
                throw toBackendError(err, engine.name);
            }

            assertOkResponse(response, engine.name);

            const { anchorCount, links } = extractResultLinks(response.body, engine.resultSelector, target);
            if (anchorCount === 0) {
                assertNotBlocked(response, engine.name);
                throw new BackendError(
                    `No result links matched "${engine.resultSelector}"`,
                    'parse_failure',
                    engine.name
                );
            }

            log.debug(`${tag} ${anchorCount} result links, ${links.length} on ${target.domain}`);
            return links
                .slice(0, options.limit)
                .map((url) => ({ url, backend: engine.name }));
        },
    };
}
