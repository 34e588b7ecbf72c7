/**
 * src/utils/fallbackExecutor.ts
 *
 * FALLBACK EXECUTOR
 *
 * Runs queries strictly in priority order. For every query the backends are
 * tried in chain order until one returns a non-empty list:
 *
 *   query 1 → serpapi ✗ timeout → duckduckgo ✓ 7 hits
 *   (sleep delayMs)
 *   query 2 → serpapi ✗ 429 → duckduckgo ✗ parse → google ✓ 0 → zero hits
 *   (sleep delayMs)
 *   ...
 *
 * RULES
 * ─────
 *  • A backend failure never aborts the run; a failed query records zero hits.
 *  • The inter-query delay applies after failures too (shared rate limits).
 *  • Raw hits are returned undeduplicated. The stop condition is checked
 *    against the count of DISTINCT valid profiles seen so far, so duplicate-heavy
 *    backends do not end the run early.
 *  • Cancellation is honoured between queries, never mid-call.
 */

import { log } from 'crawlee';
import { LINKEDIN_PROFILES } from '../sources/types.js';
import type { BackendName, ProfileTarget, Query, SearchBackend, SearchBudget, SearchHit } from '../sources/types.js';
import { toBackendError } from './errors.js';
import type { BackendError } from './errors.js';
import { normalizeProfileUrl } from './profileUrl.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ExecutorOptions {
    delayMs: number;
    timeoutMs: number;
    signal?: AbortSignal;
    target?: ProfileTarget;
    sleep?: SleepFn;
}

export interface QueryOutcome {
    query: Query;
    backend: BackendName | null;     // Backend whose hits were kept
    hitCount: number;
    errors: BackendError[];
}

export interface ExecutionResult {
    hits: SearchHit[];
    outcomes: QueryOutcome[];
    distinctProfiles: number;
    cancelled: boolean;
}

// ─── Sleep ────────────────────────────────────────────────────────────────────

/** Resolves after `ms`, or immediately once `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (ms <= 0 || signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

// ─── Single Query ─────────────────────────────────────────────────────────────

async function runQuery(
    query: Query,
    backends: readonly SearchBackend[],
    budget: SearchBudget,
    timeoutMs: number
): Promise<{ hits: SearchHit[]; outcome: QueryOutcome }> {
    const errors: BackendError[] = [];

    for (const backend of backends) {
        try {
            const hits = await backend.search(query.text, {
                limit: budget.maxResultsPerQuery,
                timeoutMs,
            });
            const bounded = hits.slice(0, budget.maxResultsPerQuery);

            if (bounded.length > 0) {
                log.info(`[Executor] ✓ ${backend.name}: ${bounded.length} hits`);
                return {
                    hits: bounded,
                    outcome: { query, backend: backend.name, hitCount: bounded.length, errors },
                };
            }
            log.info(`[Executor] ${backend.name}: no hits, trying next backend`);
        } catch (err) {
            const backendError = toBackendError(err, backend.name);
            errors.push(backendError);
            log.warning(`[Executor] ✗ ${backend.name} (${backendError.kind}): ${backendError.message}`);
        }
    }

    log.warning(`[Executor] All backends exhausted for "${query.text}"`);
    return { hits: [], outcome: { query, backend: null, hitCount: 0, errors } };
}

// ─── Public API ───────────────────────────────────────────────────────────────

export async function executeQueries(
    queries: readonly Query[],
    backends: readonly SearchBackend[],
    budget: SearchBudget,
    options: ExecutorOptions
): Promise<ExecutionResult> {
    const target = options.target ?? LINKEDIN_PROFILES;
    const wait = options.sleep ?? sleep;
    const ordered = [...queries].sort((a, b) => a.priority - b.priority);
    budget.queriesAttempted = 0;

    const hits: SearchHit[] = [];
    const outcomes: QueryOutcome[] = [];
    const distinct = new Set<string>();
    let cancelled = false;

    for (let i = 0; i < ordered.length; i++) {
        if (distinct.size >= budget.maxTotalResults) {
            log.info(`[Executor] Budget reached (${distinct.size}/${budget.maxTotalResults}), stopping`);
            break;
        }
        if (options.signal?.aborted) {
            cancelled = true;
            log.info('[Executor] Cancelled, stopping before next query');
            break;
        }

        const query = ordered[i];
        budget.queriesAttempted++;
        log.info(`[Executor] Query ${i + 1}/${ordered.length} [${query.strategy}]: ${query.text}`);

        const result = await runQuery(query, backends, budget, options.timeoutMs);
        hits.push(...result.hits);
        outcomes.push(result.outcome);

        for (const hit of result.hits) {
            const profile = normalizeProfileUrl(hit.url, target);
            if (profile) distinct.add(profile.url);
        }
        log.info(`[Executor] Distinct profiles so far: ${distinct.size}`);

        const hasNext = i < ordered.length - 1 && distinct.size < budget.maxTotalResults;
        if (hasNext) await wait(options.delayMs, options.signal);
    }

    return { hits, outcomes, distinctProfiles: distinct.size, cancelled };
}
