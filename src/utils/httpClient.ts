/**
 * src/utils/httpClient.ts
 *
 * Thin HTTP seam used by every search backend. The default implementation
 * goes through got-scraping (optionally via a proxy); tests pass a fake.
 *
 * Requests never retry here. Retrying and falling back is the executor's job.
 */

import { gotScraping } from 'got-scraping';

export interface HttpRequest {
    url: string;
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    searchParams?: Record<string, string>;
    json?: Record<string, unknown>;
    timeoutMs: number;
}

export interface HttpResponse {
    statusCode: number;
    body: string;
}

export interface HttpClient {
    request(req: HttpRequest): Promise<HttpResponse>;
}

// ─── Browser-like Headers ─────────────────────────────────────────────────────

const USER_AGENTS = [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:128.0) Gecko/20100101 Firefox/128.0',
];

function randomUA(): string {
    return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
}

export function browserHeaders(): Record<string, string> {
    return {
        'User-Agent': randomUA(),
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
        'Upgrade-Insecure-Requests': '1',
        'Sec-Fetch-Dest': 'document',
        'Sec-Fetch-Mode': 'navigate',
        'Sec-Fetch-Site': 'none',
        'Cache-Control': 'max-age=0',
    };
}

// ─── Proxy ────────────────────────────────────────────────────────────────────

/** got-scraping wants credentials decoded (a '+' in a password breaks auth otherwise). */
export function normalizeProxyUrl(rawProxy: string | undefined): string | undefined {
    const trimmed = rawProxy?.trim();
    if (!trimmed) return undefined;
    if (!trimmed.includes('@')) return trimmed;

    try {
        const p = new URL(trimmed);
        const user = decodeURIComponent(p.username);
        const pass = decodeURIComponent(p.password);
        return `${p.protocol}//${user}:${pass}@${p.hostname}${p.port ? `:${p.port}` : ''}`;
    } catch {
        return trimmed;
    }
}

// ─── got-scraping Client ──────────────────────────────────────────────────────

export interface GotClientOptions {
    proxyUrl?: string;
}

export function createGotScrapingClient(options: GotClientOptions = {}): HttpClient {
    const proxyUrl = normalizeProxyUrl(options.proxyUrl);

    return {
        async request(req: HttpRequest): Promise<HttpResponse> {
            const response = await gotScraping({
                url: req.url,
                method: req.method ?? 'GET',
                headers: req.headers ?? {},
                ...(req.searchParams ? { searchParams: req.searchParams } : {}),
                ...(req.json ? { json: req.json } : {}),
                ...(proxyUrl ? { proxyUrl } : {}),
                timeout: { request: req.timeoutMs },
                retry: { limit: 0 },
                throwHttpErrors: false,
            });
            return { statusCode: response.statusCode, body: response.body };
        },
    };
}
