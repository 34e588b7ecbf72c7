/**
 * src/utils/blockDetection.ts
 *
 * Classifies search responses into the BackendError taxonomy:
 *
 *   429                      → rate_limited
 *   other non-2xx            → transport_failure
 *   2xx CAPTCHA / block page → rate_limited
 *
 * Search engines frequently answer bots with HTTP 200 and a challenge page, so
 * the body is checked too. Backends only run the body check on pages that
 * yielded no results: a results page echoes the query, which may itself
 * contain a word like "captcha".
 */

import { BackendError } from './errors.js';
import type { HttpResponse } from './httpClient.js';
import type { BackendName } from '../sources/types.js';

/** Lowercase fragments seen on block/CAPTCHA pages of the engines we query. */
const BLOCK_PAGE_PATTERNS: string[] = [
    'unusual traffic',           // Google
    'captcha',
    'are you a robot',
    'too many requests',
    'anomaly-modal',             // DuckDuckGo bot challenge
];

// Only the head of the document is checked
const BLOCK_SCAN_CHARS = 5000;

export function isBlockPage(body: string): boolean {
    const head = body.slice(0, BLOCK_SCAN_CHARS).toLowerCase();
    return BLOCK_PAGE_PATTERNS.some((pattern) => head.includes(pattern));
}

export function assertOkResponse(response: HttpResponse, backend: BackendName): void {
    const status = response.statusCode;
    if (status === 429) {
        throw new BackendError('Rate limited (HTTP 429)', 'rate_limited', backend, status);
    }
    if (status < 200 || status >= 300) {
        throw new BackendError(
            `HTTP ${status}: ${response.body.slice(0, 200)}`,
            'transport_failure',
            backend,
            status
        );
    }
}

export function assertNotBlocked(response: HttpResponse, backend: BackendName): void {
    if (isBlockPage(response.body)) {
        throw new BackendError('Block/CAPTCHA page served', 'rate_limited', backend, response.statusCode);
    }
}
