import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import chalk from 'chalk';
import { log } from 'crawlee';
import { afterEach, beforeAll, describe, it, expect, vi } from 'vitest';
import { loadEnv } from '../config/env.js';
import type { HttpClient } from '../utils/httpClient.js';
import { resolveAttributes, runSearchCommand } from './search.js';

const DDG_PAGE = `
<a class="result__a" href="https://www.linkedin.com/in/kim-p">Kim</a>
<a class="result__a" href="https://www.linkedin.com/in/lee-s/">Lee</a>`;

function httpReturning(body: string): HttpClient {
    return {
        async request() {
            return { statusCode: 200, body };
        },
    };
}

const env = loadEnv({ BACKEND_ORDER: 'duckduckgo', QUERY_DELAY_MS: '0' });

let tmpDir: string | null = null;

function writeInput(content: string): string {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'search-cmd-'));
    const file = path.join(tmpDir, 'attributes.json');
    fs.writeFileSync(file, content);
    return file;
}

beforeAll(() => {
    log.setLevel(log.LEVELS.OFF);
});

afterEach(() => {
    vi.restoreAllMocks();
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = null;
});

describe('resolveAttributes', () => {
    it('lets flags override the input file', () => {
        const file = writeInput(JSON.stringify({
            title: 'Analyst',
            location: 'Madrid',
            skills: ['excel'],
            search_keywords: ['fp&a'],
        }));

        expect(resolveAttributes({ input: file, title: 'Finance Analyst', skills: 'excel, sap ,' })).toEqual({
            title: 'Finance Analyst',
            location: 'Madrid',
            skills: ['excel', 'sap'],
            searchKeywords: ['fp&a'],
        });
    });

    it('reads flags alone', () => {
        expect(resolveAttributes({ location: 'Oslo', keywords: 'kotlin' })).toEqual({
            title: '',
            location: 'Oslo',
            skills: [],
            searchKeywords: ['kotlin'],
        });
    });
});

describe('runSearchCommand', () => {
    it('prints the report as JSON and exits 0', async () => {
        const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        const code = await runSearchCommand({ title: 'QA Engineer', delay: '0', json: true }, env, httpReturning(DDG_PAGE));

        expect(code).toBe(0);
        expect(out).toHaveBeenCalledTimes(1);
        const report = JSON.parse(String(out.mock.calls[0][0]));
        expect(report.total_profiles).toBe(2);
        expect(report.profiles).toEqual([
            { url: 'https://www.linkedin.com/in/kim-p', profile_id: 'kim-p' },
            { url: 'https://www.linkedin.com/in/lee-s', profile_id: 'lee-s' },
        ]);
    });

    it('exits 0 with a notice when nothing is found', async () => {
        const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const page = '<a class="result__a" href="https://www.example.org/people">People</a>';

        const code = await runSearchCommand({ title: 'QA Engineer' }, env, httpReturning(page));

        expect(code).toBe(0);
        expect(out).toHaveBeenCalledWith(chalk.yellow('No matching profiles found.'));
    });

    it('exits 1 when no query can be built', async () => {
        const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const code = await runSearchCommand({ title: '  ' }, env, httpReturning(DDG_PAGE));

        expect(code).toBe(1);
        expect(err).toHaveBeenCalledWith(
            chalk.red('No discoverable queries: title, location, skills and keywords are all empty')
        );
    });

    it('exits 1 on an invalid numeric flag', async () => {
        const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const code = await runSearchCommand({ title: 'QA', maxResults: 'many' }, env, httpReturning(DDG_PAGE));

        expect(code).toBe(1);
        expect(err).toHaveBeenCalledWith(chalk.red('--max-results must be an integer >= 0 (got "many")'));
    });

    it('exits 1 on an input file that is not JSON', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const file = writeInput('{ title: ');

        expect(await runSearchCommand({ input: file }, env, httpReturning(DDG_PAGE))).toBe(1);
    });
});
