import { describe, it, expect } from 'vitest';
import { extractProfileId, isProfileHost, normalizeProfileUrl, unwrapRedirect } from './profileUrl.js';

describe('normalizeProfileUrl', () => {
    it('drops tracking params and the trailing slash', () => {
        expect(normalizeProfileUrl('https://www.linkedin.com/in/jane-doe-123/?trk=abc')).toEqual({
            url: 'https://www.linkedin.com/in/jane-doe-123',
            profileId: 'jane-doe-123',
        });
    });

    it('rejects non-profile paths on the profile domain', () => {
        expect(normalizeProfileUrl('https://linkedin.com/company/acme')).toBeNull();
        expect(normalizeProfileUrl('https://www.linkedin.com/in/')).toBeNull();
        expect(normalizeProfileUrl('https://www.linkedin.com/in/jane/details/experience')).toBeNull();
    });

    it('unwraps Google /url?q= redirects before validating', () => {
        expect(normalizeProfileUrl('/url?q=https://www.linkedin.com/in/john-smith&sa=U&ved=xyz')?.url)
            .toBe('https://www.linkedin.com/in/john-smith');
        expect(normalizeProfileUrl('/url?q=https%3A%2F%2Fuk.linkedin.com%2Fin%2Fa_b-9%2F&sa=U')?.url)
            .toBe('https://uk.linkedin.com/in/a_b-9');
    });

    it('unwraps DuckDuckGo uddg redirects', () => {
        const raw = '//duckduckgo.com/l/?uddg=https%3A%2F%2Fwww.linkedin.com%2Fin%2Fmaria%2Dlopez&rut=abc';
        expect(normalizeProfileUrl(raw)?.url).toBe('https://www.linkedin.com/in/maria-lopez');
    });

    it('is idempotent on canonical output', () => {
        const first = normalizeProfileUrl('https://WWW.LinkedIn.com/in/Jane-Doe/#about');
        expect(first?.url).toBe('https://www.linkedin.com/in/Jane-Doe');
        expect(normalizeProfileUrl(first?.url ?? '')).toEqual(first);
    });

    it('enforces identifier length and characters', () => {
        expect(normalizeProfileUrl('https://www.linkedin.com/in/a')).toBeNull();
        expect(normalizeProfileUrl('https://www.linkedin.com/in/ab')?.profileId).toBe('ab');
        expect(normalizeProfileUrl('https://www.linkedin.com/in/j%C3%A9r%C3%B4me')).toBeNull();
    });

    it('rejects other schemes and look-alike hosts', () => {
        expect(normalizeProfileUrl('ftp://linkedin.com/in/jane')).toBeNull();
        expect(normalizeProfileUrl('https://linkedin.com.evil.io/in/jane')).toBeNull();
        expect(normalizeProfileUrl('https://notlinkedin.com/in/jane')).toBeNull();
    });

    it('returns null for unparseable input', () => {
        expect(normalizeProfileUrl('')).toBeNull();
        expect(normalizeProfileUrl('not a url')).toBeNull();
        expect(normalizeProfileUrl('/url?q=%E0%A4%A&sa=U')).toBeNull();
    });

    it('supports a custom profile target', () => {
        const github = { domain: 'github.com', pathPrefix: '/' };
        expect(normalizeProfileUrl('https://github.com/octocat?tab=repositories', github)).toEqual({
            url: 'https://github.com/octocat',
            profileId: 'octocat',
        });
        expect(normalizeProfileUrl('https://www.linkedin.com/in/octocat', github)).toBeNull();
    });
});

describe('unwrapRedirect', () => {
    it('passes plain links through trimmed', () => {
        expect(unwrapRedirect('  https://www.linkedin.com/in/x-y ')).toBe('https://www.linkedin.com/in/x-y');
    });
});

describe('extractProfileId', () => {
    it('returns the identifier or null', () => {
        expect(extractProfileId('https://www.linkedin.com/in/sam-lee/')).toBe('sam-lee');
        expect(extractProfileId('https://www.linkedin.com/pub/dir')).toBeNull();
    });
});

describe('isProfileHost', () => {
    it('matches the profile domain and its subdomains only', () => {
        expect(isProfileHost('https://uk.linkedin.com/company/acme')).toBe(true);
        expect(isProfileHost('https://www.google.com/search?q=site:linkedin.com/in/x')).toBe(false);
        expect(isProfileHost('/search?q=site:linkedin.com/in/x')).toBe(false);
        expect(isProfileHost('https://linkedin.com.evil.io/in/jane')).toBe(false);
    });
});
