/**
 * src/utils/queryBuilder.ts
 *
 * Turns role attributes into an ordered list of `site:` search queries.
 *
 * STRATEGY ORDER
 * ──────────────
 *   1. keyword         one query per analyzer keyword (+ location)
 *   2. title_location  only when (1) produced nothing
 *   3. title_exact     "title", then "title" "location"
 *   4. skill_pair      "skill1" "skill2", then with "location"
 *   5. title_skill     "title" "skill1"
 *   6. location_broad  "location" developer / engineer
 *
 * Missing fields simply switch off the strategies that need them. Output is
 * deduplicated on exact text and capped at maxQueries.
 */

import { LINKEDIN_PROFILES } from '../sources/types.js';
import type { ProfileTarget, Query, QueryStrategy, RoleAttributes } from '../sources/types.js';

export const DEFAULT_MAX_QUERIES = 4;
const MAX_KEYWORD_QUERIES = 10;
const BROAD_ROLE_NOUNS = ['developer', 'engineer'] as const;

function clean(values: readonly string[]): string[] {
    return values.map((v) => v.trim()).filter(Boolean);
}

function quote(value: string): string {
    return `"${value}"`;
}

export function sitePrefix(target: ProfileTarget = LINKEDIN_PROFILES): string {
    return `site:${target.domain}${target.pathPrefix}`;
}

/** 4 for attribute-only searches; more headroom when explicit keywords exist. */
export function defaultMaxQueries(attrs: RoleAttributes): number {
    const keywords = clean(attrs.searchKeywords).length;
    if (keywords === 0) return DEFAULT_MAX_QUERIES;
    return Math.max(DEFAULT_MAX_QUERIES, Math.min(keywords + 2, MAX_KEYWORD_QUERIES));
}

export function buildQueries(
    attrs: RoleAttributes,
    maxQueries: number = defaultMaxQueries(attrs),
    target: ProfileTarget = LINKEDIN_PROFILES
): Query[] {
    if (maxQueries <= 0) return [];

    const prefix = sitePrefix(target);
    const title = attrs.title.trim();
    const location = attrs.location.trim();
    const skills = clean(attrs.skills);
    const keywords = clean(attrs.searchKeywords);

    const candidates: Array<{ text: string; strategy: QueryStrategy }> = [];
    const add = (strategy: QueryStrategy, ...parts: string[]): void => {
        candidates.push({ text: [prefix, ...parts].join(' '), strategy });
    };

    // 1. Keyword-driven
    for (const keyword of keywords) {
        add('keyword', ...(location ? [keyword, location] : [keyword]));
    }

    // 2. Title/location fallback
    if (candidates.length === 0) {
        const parts = [title, location].filter(Boolean);
        if (parts.length > 0) add('title_location', ...parts);
    }

    // 3. Title-exact
    if (title) {
        add('title_exact', quote(title));
        if (location) add('title_exact', quote(title), quote(location));
    }

    // 4. Skill-pair
    if (skills.length >= 2) {
        const [first, second] = skills;
        add('skill_pair', quote(first), quote(second));
        if (location) add('skill_pair', quote(first), quote(second), quote(location));
    }

    // 5. Title + primary skill
    if (title && skills.length > 0) {
        add('title_skill', quote(title), quote(skills[0]));
    }

    // 6. Location-broad
    if (location) {
        for (const noun of BROAD_ROLE_NOUNS) add('location_broad', quote(location), noun);
    }

    const seen = new Set<string>();
    const queries: Query[] = [];
    for (const candidate of candidates) {
        if (queries.length >= maxQueries) break;
        if (seen.has(candidate.text)) continue;
        seen.add(candidate.text);
        queries.push({ ...candidate, priority: queries.length });
    }
    return queries;
}
