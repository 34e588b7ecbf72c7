/**
 * src/orchestrator.ts
 *
 * PROFILE DISCOVERY ORCHESTRATOR
 *
 *   role attributes → query builder → fallback executor → aggregator
 *
 * Everything a run needs (backend chain, budget, delays) is passed in by the
 * caller; two concurrent runs share nothing.
 *
 * Outcomes
 * ────────
 *  • No usable query          → BuilderError('NO_QUERIES'), nothing was searched
 *  • Searched, nothing found  → profiles: []  (a valid result)
 */

import { log } from 'crawlee';
import { LINKEDIN_PROFILES } from './sources/types.js';
import type { ProfileTarget, ProfileUrl, Query, RoleAttributes, SearchBackend, SearchBudget } from './sources/types.js';
import { aggregateHitsWithStats, buildProfileReport, saveProfileReport } from './utils/aggregator.js';
import { BuilderError } from './utils/errors.js';
import { executeQueries } from './utils/fallbackExecutor.js';
import type { QueryOutcome, SleepFn } from './utils/fallbackExecutor.js';
import { buildQueries, defaultMaxQueries } from './utils/queryBuilder.js';
import { createRunContext } from './utils/runContext.js';

export interface DiscoveryOptions {
    backends: readonly SearchBackend[];
    budget: SearchBudget;
    delayMs: number;
    timeoutMs: number;
    maxQueries?: number;
    signal?: AbortSignal;
    target?: ProfileTarget;
    reportFile?: string;
    sleep?: SleepFn;
}

export interface DiscoveryResult {
    runId: string;
    profiles: ProfileUrl[];
    queries: Query[];
    outcomes: QueryOutcome[];
    budget: SearchBudget;
    rejectedCount: number;
    duplicateCount: number;
    cancelled: boolean;
    reportSaved: boolean;
    durationMs: number;
}

export async function discoverProfiles(
    attrs: RoleAttributes,
    options: DiscoveryOptions
): Promise<DiscoveryResult> {
    const start = Date.now();
    const run = createRunContext();
    const target = options.target ?? LINKEDIN_PROFILES;

    const queries = buildQueries(attrs, options.maxQueries ?? defaultMaxQueries(attrs), target);
    if (queries.length === 0) {
        throw new BuilderError(
            'No discoverable queries: title, location, skills and keywords are all empty',
            'NO_QUERIES'
        );
    }

    log.info('\n' + '█'.repeat(60));
    log.info(`  PROFILE DISCOVERY (run ${run.runId})`);
    log.info(`  Queries:  ${queries.length}`);
    log.info(`  Backends: ${options.backends.map((b) => b.name).join(', ') || '(none)'}`);
    log.info(`  Budget:   ${options.budget.maxTotalResults} total / ${options.budget.maxResultsPerQuery} per query`);
    log.info('█'.repeat(60));

    if (options.backends.length === 0) {
        log.warning('[Orchestrator] Backend chain is empty; every query will record zero hits');
    }

    const execution = await executeQueries(queries, options.backends, options.budget, {
        delayMs: options.delayMs,
        timeoutMs: options.timeoutMs,
        signal: options.signal,
        target,
        sleep: options.sleep,
    });

    const stats = aggregateHitsWithStats(execution.hits, options.budget.maxTotalResults, target);

    let reportSaved = false;
    if (options.reportFile) {
        reportSaved = saveProfileReport(buildProfileReport(stats.profiles), options.reportFile);
    }

    const durationMs = Date.now() - start;

    log.info(`\n${'█'.repeat(60)}`);
    log.info('  DISCOVERY COMPLETE');
    log.info(`  Profiles:   ${stats.profiles.length}`);
    log.info(`  Duplicates: ${stats.duplicateCount}`);
    log.info(`  Rejected:   ${stats.rejectedCount}`);
    log.info(`  Queries:    ${options.budget.queriesAttempted}/${queries.length}`);
    log.info(`  Duration:   ${(durationMs / 1000).toFixed(1)}s`);
    log.info(`${'█'.repeat(60)}\n`);

    return {
        runId: run.runId,
        profiles: stats.profiles,
        queries,
        outcomes: execution.outcomes,
        budget: options.budget,
        rejectedCount: stats.rejectedCount,
        duplicateCount: stats.duplicateCount,
        cancelled: execution.cancelled,
        reportSaved,
        durationMs,
    };
}
