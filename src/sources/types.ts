/**
 * src/sources/types.ts
 *
 * Shared types for the search backends and the discovery pipeline.
 *
 * Every backend returns SearchHit objects. The executor feeds them through the
 * profile URL normaliser, and the aggregator turns them into ProfileUrl values.
 */

// ─── Role Attributes ──────────────────────────────────────────────────────────

export interface RoleAttributes {
    readonly title: string;
    readonly location: string;
    readonly skills: readonly string[];
    readonly searchKeywords: readonly string[];
}

// ─── Query ────────────────────────────────────────────────────────────────────

export type QueryStrategy =
    | 'keyword'          // one per analyzer search keyword
    | 'title_location'   // title + location, only when there are no keywords
    | 'title_exact'      // quoted title, optionally with quoted location
    | 'skill_pair'       // top two skills
    | 'title_skill'      // title + first skill
    | 'location_broad';  // location + generic role noun (low precision)

export interface Query {
    text: string;
    strategy: QueryStrategy;
    priority: number;        // Generation order, lower is tried first
}

// ─── Profile Target ───────────────────────────────────────────────────────────

export interface ProfileTarget {
    domain: string;          // e.g. "linkedin.com"
    pathPrefix: string;      // e.g. "/in/"
}

export const LINKEDIN_PROFILES: ProfileTarget = {
    domain: 'linkedin.com',
    pathPrefix: '/in/',
};

// ─── Hits & Profiles ──────────────────────────────────────────────────────────

export type BackendName = 'serpapi' | 'serper' | 'duckduckgo' | 'bing' | 'google';

export const BACKEND_NAMES: readonly BackendName[] = ['serpapi', 'serper', 'duckduckgo', 'bing', 'google'];

export interface SearchHit {
    url: string;             // Raw link as returned by the backend
    backend: BackendName;
}

export interface ProfileUrl {
    url: string;             // Canonical scheme://host/path, the dedup key
    profileId: string;       // Trailing identifier segment
}

// ─── Backend Capability ───────────────────────────────────────────────────────

export type BackendKind =
    | 'api'                  // Structured JSON search API (needs a key)
    | 'html'                 // Result-page scraper with a result-link selector
    | 'redirect';            // Generic anchor scan + redirect unwrapping

export interface BackendSearchOptions {
    limit: number;
    timeoutMs: number;
}

export interface SearchBackend {
    readonly name: BackendName;
    readonly kind: BackendKind;
    search(query: string, options: BackendSearchOptions): Promise<SearchHit[]>;
}

// ─── Budget ───────────────────────────────────────────────────────────────────

export interface SearchBudget {
    readonly maxTotalResults: number;
    readonly maxResultsPerQuery: number;
    queriesAttempted: number;
}

export function createSearchBudget(maxTotalResults: number, maxResultsPerQuery: number): SearchBudget {
    return {
        maxTotalResults: Math.max(0, Math.floor(maxTotalResults)),
        maxResultsPerQuery: Math.max(1, Math.floor(maxResultsPerQuery)),
        queriesAttempted: 0,
    };
}
