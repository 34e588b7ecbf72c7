/**
 * src/summaries.ts
 *
 * Hand-off to the profile-summary collaborator. Profiles are passed one at a
 * time; a failed summary is recorded against its URL and the loop goes on.
 */

import { log } from 'crawlee';
import type { ProfileUrl } from './sources/types.js';

export type ProfileSummary = Record<string, unknown>;

export interface ProfileSummarizer {
    summarize(profile: ProfileUrl): Promise<ProfileSummary>;
}

export type SummaryEntry = ProfileSummary | { error: string };

export async function summarizeProfiles(
    profiles: readonly ProfileUrl[],
    summarizer: ProfileSummarizer
): Promise<Record<string, SummaryEntry>> {
    const results: Record<string, SummaryEntry> = {};

    for (const profile of profiles) {
        try {
            results[profile.url] = await summarizer.summarize(profile);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            log.warning(`[Summaries] ${profile.url}: ${message}`);
            results[profile.url] = { error: message };
        }
    }

    return results;
}
