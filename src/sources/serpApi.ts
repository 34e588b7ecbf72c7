/**
 * src/sources/serpApi.ts
 *
 * STRUCTURED API BACKEND: SerpAPI (Google engine)
 *
 * Most reliable backend when a SERPAPI_KEY is configured. Reads the organic
 * result list; a response without `organic_results` is a parse_failure.
 */

import { log } from 'crawlee';
import { z } from 'zod';
import { assertOkResponse } from '../utils/blockDetection.js';
import { toBackendError } from '../utils/errors.js';
import type { HttpClient, HttpResponse } from '../utils/httpClient.js';
import { parseJsonBody } from './jsonResponse.js';
import type { BackendSearchOptions, SearchBackend, SearchHit } from './types.js';

const BACKEND_NAME = 'serpapi';
const ENDPOINT = 'https://serpapi.com/search';

const serpApiResponseSchema = z.object({
    organic_results: z.array(z.object({ link: z.string().optional() }).passthrough()),
});

export function createSerpApiBackend(http: HttpClient, apiKey: string): SearchBackend {
    return {
        name: BACKEND_NAME,
        kind: 'api',

        async search(query: string, options: BackendSearchOptions): Promise<SearchHit[]> {
            log.debug(`[SerpAPI] Searching: ${query}`);

            let response: HttpResponse;
            try {
                response = await http.request({
                    url: ENDPOINT,
                    searchParams: {
                        engine: 'google',
                        q: query,
                        num: String(options.limit),
                        api_key: apiKey,
                    },
                    timeoutMs: options.timeoutMs,
                });
            } catch (err) {
                throw toBackendError(err, BACKEND_NAME);
            }

            assertOkResponse(response, BACKEND_NAME);
            const data = parseJsonBody(response.body, serpApiResponseSchema, BACKEND_NAME);

            const hits: SearchHit[] = [];
            for (const result of data.organic_results) {
                if (result.link) hits.push({ url: result.link, backend: BACKEND_NAME });
            }
            return hits.slice(0, options.limit);
        },
    };
}
