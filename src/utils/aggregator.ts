/**
 * src/utils/aggregator.ts
 *
 * Final stage of a discovery run: normalise, dedupe (first-seen order wins),
 * cap at the result budget. Also owns the optional JSON report.
 */

import * as fs from 'fs';
import * as path from 'path';
import { log } from 'crawlee';
import { LINKEDIN_PROFILES } from '../sources/types.js';
import type { ProfileTarget, ProfileUrl, SearchHit } from '../sources/types.js';
import { normalizeProfileUrl } from './profileUrl.js';

// ─── Aggregation ──────────────────────────────────────────────────────────────

export interface AggregateStats {
    profiles: ProfileUrl[];
    rejectedCount: number;       // failed validation
    duplicateCount: number;
    truncatedCount: number;      // valid + unique but over budget
}

export function aggregateHitsWithStats(
    hits: readonly SearchHit[],
    maxTotal: number,
    target: ProfileTarget = LINKEDIN_PROFILES
): AggregateStats {
    const seen = new Map<string, ProfileUrl>();
    let rejectedCount = 0;
    let duplicateCount = 0;

    for (const hit of hits) {
        const profile = normalizeProfileUrl(hit.url, target);
        if (!profile) {
            rejectedCount++;
            log.debug(`[Aggregator] Rejected (${hit.backend}): ${hit.url}`);
            continue;
        }
        if (seen.has(profile.url)) {
            duplicateCount++;
            continue;
        }
        seen.set(profile.url, profile);
    }

    const unique = [...seen.values()];
    const limit = Math.max(0, maxTotal);
    const profiles = unique.slice(0, limit);

    return {
        profiles,
        rejectedCount,
        duplicateCount,
        truncatedCount: unique.length - profiles.length,
    };
}

export function aggregateHits(
    hits: readonly SearchHit[],
    maxTotal: number,
    target: ProfileTarget = LINKEDIN_PROFILES
): ProfileUrl[] {
    return aggregateHitsWithStats(hits, maxTotal, target).profiles;
}

// ─── Report ───────────────────────────────────────────────────────────────────

export interface ProfileReport {
    total_profiles: number;
    profiles: Array<{ url: string; profile_id: string }>;
    timestamp: string;
}

export function buildProfileReport(profiles: readonly ProfileUrl[], now: Date = new Date()): ProfileReport {
    return {
        total_profiles: profiles.length,
        profiles: profiles.map((p) => ({ url: p.url, profile_id: p.profileId })),
        timestamp: now.toISOString(),
    };
}

/**
 * Writes the report as pretty JSON. Returns false (and logs) on failure; the
 * in-memory result of the run is unaffected either way.
 */
export function saveProfileReport(report: ProfileReport, outputFile: string): boolean {
    const target = path.resolve(outputFile);
    try {
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, JSON.stringify(report, null, 2) + '\n', 'utf-8');
        log.info(`[Aggregator] Report saved to ${target}`);
        return true;
    } catch (err) {
        log.error(`[Aggregator] Could not write report to ${target}: ${err instanceof Error ? err.message : String(err)}`);
        return false;
    }
}
