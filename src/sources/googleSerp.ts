/**
 * src/sources/googleSerp.ts
 *
 * REDIRECT-RESOLVING BACKEND: Google web results page
 *
 * Last resort in the default chain. Google randomises its result markup, so
 * instead of a result selector we scan EVERY anchor on the page, decoding
 * the `/url?q=<target>&...` wrapper Google puts around outbound links and
 * taking plain hrefs as they are. Only links that validate as profile URLs
 * survive: Google's own tab and pagination links repeat the `site:` query
 * and must not count as hits.
 *
 * No matching links is an empty result (the page parsed fine), not an error,
 * unless the page is a block/CAPTCHA page.
 */

import { log } from 'crawlee';
import * as cheerio from 'cheerio';
import { assertNotBlocked, assertOkResponse } from '../utils/blockDetection.js';
import { toBackendError } from '../utils/errors.js';
import { browserHeaders } from '../utils/httpClient.js';
import type { HttpClient, HttpResponse } from '../utils/httpClient.js';
import { normalizeProfileUrl, unwrapRedirect } from '../utils/profileUrl.js';
import { LINKEDIN_PROFILES } from './types.js';
import type { BackendSearchOptions, ProfileTarget, SearchBackend, SearchHit } from './types.js';

const BACKEND_NAME = 'google';
export const DEFAULT_GOOGLE_HOST = 'www.google.com';

// ─── URL Builder ──────────────────────────────────────────────────────────────

export function buildGoogleSearchUrl(host: string, query: string, num: number): string {
    const params = new URLSearchParams({ q: query, num: String(num) });
    return `https://${host}/search?${params.toString()}`;
}

// ─── HTML Parser ──────────────────────────────────────────────────────────────

export function parseRedirectLinks(html: string, target: ProfileTarget = LINKEDIN_PROFILES): string[] {
    const $ = cheerio.load(html);
    const links: string[] = [];

    $('a[href]').each((_, el) => {
        const resolved = unwrapRedirect($(el).attr('href') ?? '');
        if (resolved && normalizeProfileUrl(resolved, target)) links.push(resolved);
    });

    return links;
}

// ─── Public API ───────────────────────────────────────────────────────────────

export interface GoogleBackendOptions {
    host?: string;
    target?: ProfileTarget;
}

export function createGoogleRedirectBackend(http: HttpClient, options: GoogleBackendOptions = {}): SearchBackend {
    const host = options.host ?? DEFAULT_GOOGLE_HOST;
    const target = options.target ?? LINKEDIN_PROFILES;

    return {
        name: BACKEND_NAME,
        kind: 'redirect',

        async search(query: string, opts: BackendSearchOptions): Promise<SearchHit[]> {
            const url = buildGoogleSearchUrl(host, query, opts.limit);
            log.debug(`[GoogleSERP] Fetching: ${url}`);

            let response: HttpResponse;
            try {
                response = await http.request({
                    url,
                    headers: browserHeaders(),
                    timeoutMs: opts.timeoutMs,
                });
            } catch (err) {
                throw toBackendError(err, BACKEND_NAME);
            }

            assertOkResponse(response, BACKEND_NAME);

            const links = parseRedirectLinks(response.body, target);
            if (links.length === 0) assertNotBlocked(response, BACKEND_NAME);
            log.debug(`[GoogleSERP] ${links.length} redirect links on ${target.domain}`);
            return links
                .slice(0, opts.limit)
                .map((link) => ({ url: link, backend: BACKEND_NAME }));
        },
    };
}
