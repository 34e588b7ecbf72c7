/**
 * src/sources/serperApi.ts
 *
 * STRUCTURED API BACKEND: Serper.dev
 *
 * Same role as SerpAPI with a different provider; enabled when SERPER_API_KEY
 * is set. Organic links live under `organic[].link`.
 */

import { log } from 'crawlee';
import { z } from 'zod';
import { assertOkResponse } from '../utils/blockDetection.js';
import { toBackendError } from '../utils/errors.js';
import type { HttpClient, HttpResponse } from '../utils/httpClient.js';
import { parseJsonBody } from './jsonResponse.js';
import type { BackendSearchOptions, SearchBackend, SearchHit } from './types.js';

const BACKEND_NAME = 'serper';
const ENDPOINT = 'https://google.serper.dev/search';

const serperResponseSchema = z.object({
    organic: z.array(z.object({ link: z.string().optional() }).passthrough()),
});

export function createSerperBackend(http: HttpClient, apiKey: string): SearchBackend {
    return {
        name: BACKEND_NAME,
        kind: 'api',

        async search(query: string, options: BackendSearchOptions): Promise<SearchHit[]> {
            log.debug(`[SerperAPI] Searching: ${query}`);

            let response: HttpResponse;
            try {
                response = await http.request({
                    url: ENDPOINT,
                    method: 'POST',
                    headers: {
                        'X-API-KEY': apiKey,
                        'Content-Type': 'application/json',
                    },
                    json: { q: query, num: options.limit },
                    timeoutMs: options.timeoutMs,
                });
            } catch (err) {
                throw toBackendError(err, BACKEND_NAME);
            }

            assertOkResponse(response, BACKEND_NAME);
            const data = parseJsonBody(response.body, serperResponseSchema, BACKEND_NAME);

            const hits: SearchHit[] = [];
            for (const org of data.organic) {
                if (org.link) hits.push({ url: org.link, backend: BACKEND_NAME });
            }
            return hits.slice(0, options.limit);
        },
    };
}
