import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, it, expect } from 'vitest';
import type { SearchHit } from '../sources/types.js';
import { aggregateHits, aggregateHitsWithStats, buildProfileReport, saveProfileReport } from './aggregator.js';

const HITS: SearchHit[] = [
    { url: 'https://www.linkedin.com/in/alice/', backend: 'duckduckgo' },
    { url: 'https://www.linkedin.com/in/bob?trk=x', backend: 'serpapi' },
    { url: 'https://linkedin.com/company/acme', backend: 'bing' },
    { url: 'https://www.linkedin.com/in/alice', backend: 'google' },
    { url: 'https://www.linkedin.com/in/carol-1', backend: 'google' },
];

describe('aggregateHits', () => {
    it('keeps each canonical profile once, in first-seen order', () => {
        expect(aggregateHits(HITS, 10).map((p) => p.url)).toEqual([
            'https://www.linkedin.com/in/alice',
            'https://www.linkedin.com/in/bob',
            'https://www.linkedin.com/in/carol-1',
        ]);
    });

    it('returns nothing for a zero budget', () => {
        expect(aggregateHits(HITS, 0)).toEqual([]);
    });

    it('truncates to the budget', () => {
        const stats = aggregateHitsWithStats(HITS, 2);
        expect(stats.profiles.map((p) => p.profileId)).toEqual(['alice', 'bob']);
        expect(stats.truncatedCount).toBe(1);
    });

    it('counts rejected and duplicate hits', () => {
        const stats = aggregateHitsWithStats(HITS, 50);
        expect(stats.rejectedCount).toBe(1);
        expect(stats.duplicateCount).toBe(1);
        expect(stats.truncatedCount).toBe(0);
    });
});

describe('profile report', () => {
    let tmpDir: string | null = null;

    afterEach(() => {
        if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
        tmpDir = null;
    });

    it('serialises count, profiles and timestamp', () => {
        const report = buildProfileReport(aggregateHits(HITS, 2), new Date('2026-01-02T03:04:05.000Z'));
        expect(report).toEqual({
            total_profiles: 2,
            profiles: [
                { url: 'https://www.linkedin.com/in/alice', profile_id: 'alice' },
                { url: 'https://www.linkedin.com/in/bob', profile_id: 'bob' },
            ],
            timestamp: '2026-01-02T03:04:05.000Z',
        });
    });

    it('writes the report as JSON', () => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'profile-report-'));
        const file = path.join(tmpDir, 'nested', 'profiles.json');
        const report = buildProfileReport(aggregateHits(HITS, 1), new Date('2026-01-02T03:04:05.000Z'));

        expect(saveProfileReport(report, file)).toBe(true);
        expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual(report);
    });

    it('reports a failed write without throwing', () => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'profile-report-'));
        const blocker = path.join(tmpDir, 'blocker');
        fs.writeFileSync(blocker, 'not a directory');

        expect(saveProfileReport(buildProfileReport([]), path.join(blocker, 'profiles.json'))).toBe(false);
    });
});
