/**
 * src/utils/profileUrl.ts
 *
 * Canonicalises raw search-result links into ProfileUrl values.
 *
 *   1. Unwrap search-engine redirects (Google `/url?q=`, DuckDuckGo `/l/?uddg=`)
 *   2. Drop query string + fragment, strip trailing slashes, lower-case host
 *   3. Validate scheme, host, path prefix and the identifier segment
 *
 * A rejected link is an ordinary outcome: the function returns null.
 */

import { LINKEDIN_PROFILES } from '../sources/types.js';
import type { ProfileTarget, ProfileUrl } from '../sources/types.js';

const PROFILE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const MIN_PROFILE_ID_LENGTH = 2;

// Relative hrefs such as "/url?q=..." are resolved against this base.
const WRAPPER_BASE = 'https://www.google.com';

// ─── Redirect Unwrapping ──────────────────────────────────────────────────────

function safeDecode(value: string): string | null {
    try {
        return decodeURIComponent(value);
    } catch {
        return null;
    }
}

/**
 * Returns the embedded target of a redirect wrapper, the input itself when it
 * is not wrapped, or null when the wrapper cannot be decoded.
 */
export function unwrapRedirect(raw: string): string | null {
    const trimmed = raw.trim();

    const googleIdx = trimmed.indexOf('/url?q=');
    if (googleIdx !== -1) {
        const embedded = trimmed.slice(googleIdx + '/url?q='.length).split('&')[0];
        return safeDecode(embedded);
    }

    if (trimmed.includes('/l/?') && trimmed.includes('uddg=')) {
        try {
            const wrapper = new URL(trimmed, WRAPPER_BASE);
            return wrapper.searchParams.get('uddg');
        } catch {
            return null;
        }
    }

    return trimmed;
}

// ─── Host Matching ────────────────────────────────────────────────────────────

function hostMatches(hostname: string, domain: string): boolean {
    const d = domain.toLowerCase();
    return hostname === d || hostname.endsWith(`.${d}`);
}

/** True for an absolute http(s) URL served from the profile domain or a subdomain of it. */
export function isProfileHost(raw: string, target: ProfileTarget = LINKEDIN_PROFILES): boolean {
    let parsed: URL;
    try {
        parsed = new URL(raw);
    } catch {
        return false;
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false;
    return hostMatches(parsed.hostname.toLowerCase(), target.domain);
}

// ─── Public API ───────────────────────────────────────────────────────────────

export function normalizeProfileUrl(raw: string, target: ProfileTarget = LINKEDIN_PROFILES): ProfileUrl | null {
    if (!raw) return null;

    const unwrapped = unwrapRedirect(raw);
    if (!unwrapped) return null;

    let parsed: URL;
    try {
        parsed = new URL(unwrapped);
    } catch {
        return null;
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return null;

    const hostname = parsed.hostname.toLowerCase();
    if (!hostMatches(hostname, target.domain)) return null;

    const path = parsed.pathname.replace(/\/+$/, '');
    if (!path.startsWith(target.pathPrefix)) return null;

    const profileId = path.slice(target.pathPrefix.length);
    if (profileId.length < MIN_PROFILE_ID_LENGTH) return null;
    if (!PROFILE_ID_PATTERN.test(profileId)) return null;

    return {
        url: `${parsed.protocol}//${hostname}${path}`,
        profileId,
    };
}

export function extractProfileId(url: string, target: ProfileTarget = LINKEDIN_PROFILES): string | null {
    return normalizeProfileUrl(url, target)?.profileId ?? null;
}
