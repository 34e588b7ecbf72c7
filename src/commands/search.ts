import * as fs from 'fs';
import chalk from 'chalk';
import { backendChainOptionsFromEnv, profileTargetFromEnv } from '../config/env.js';
import type { Env } from '../config/env.js';
import { discoverProfiles } from '../orchestrator.js';
import { buildBackendChain } from '../sources/registry.js';
import { createSearchBudget } from '../sources/types.js';
import type { RoleAttributes } from '../sources/types.js';
import { buildProfileReport } from '../utils/aggregator.js';
import { BuilderError, ConfigError } from '../utils/errors.js';
import type { HttpClient } from '../utils/httpClient.js';
import { parseRoleAttributes } from '../utils/roleAttributes.js';

export interface SearchCommandOptions {
    title?: string;
    location?: string;
    skills?: string;
    keywords?: string;
    input?: string;
    maxResults?: string;
    maxQueries?: string;
    perQuery?: string;
    delay?: string;
    output?: string;
    json?: boolean;
}

function splitList(value: string | undefined): string[] | undefined {
    if (value === undefined) return undefined;
    return value.split(',').map((s) => s.trim()).filter(Boolean);
}

function parseIntOption(name: string, value: string | undefined, min: number): number | undefined {
    if (value === undefined) return undefined;
    const n = Number(value);
    if (!Number.isInteger(n) || n < min) {
        throw new ConfigError(`--${name} must be an integer >= ${min} (got "${value}")`);
    }
    return n;
}

function readInputFile(file: string): unknown {
    let text: string;
    try {
        text = fs.readFileSync(file, 'utf-8');
    } catch (err) {
        throw new ConfigError(`Cannot read --input file ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
    try {
        return JSON.parse(text);
    } catch {
        throw new BuilderError(`--input file ${file} is not valid JSON`, 'MALFORMED_ATTRIBUTES');
    }
}

/** File attributes first, command-line flags override them. */
export function resolveAttributes(opts: SearchCommandOptions): RoleAttributes {
    const fromFile = opts.input ? readInputFile(opts.input) : {};
    if (typeof fromFile !== 'object' || fromFile === null || Array.isArray(fromFile)) {
        throw new BuilderError('Role attributes must be a JSON object', 'MALFORMED_ATTRIBUTES');
    }

    const flags = {
        title: opts.title,
        location: opts.location,
        skills: splitList(opts.skills),
        searchKeywords: splitList(opts.keywords),
    };
    const overrides = Object.fromEntries(Object.entries(flags).filter(([, v]) => v !== undefined));

    return parseRoleAttributes({ ...fromFile, ...overrides });
}

function printProfiles(urls: string[]): void {
    if (urls.length === 0) {
        console.log(chalk.yellow('No matching profiles found.'));
        return;
    }
    console.log(chalk.cyan(`\nFound ${urls.length} profiles:`));
    urls.forEach((url, i) => console.log(`${chalk.dim(`${i + 1}.`)} ${url}`));
}

/**
 * Runs one discovery and prints the result. Resolves to the process exit code:
 * 0 for any completed run (zero profiles included), 1 for configuration or
 * input errors raised before searching.
 */
export async function runSearchCommand(
    opts: SearchCommandOptions,
    env: Env,
    http: HttpClient,
    signal?: AbortSignal
): Promise<number> {
    try {
        const attrs = resolveAttributes(opts);
        const maxTotal = parseIntOption('max-results', opts.maxResults, 0) ?? env.MAX_TOTAL_RESULTS;
        const perQuery = parseIntOption('per-query', opts.perQuery, 1) ?? env.MAX_RESULTS_PER_QUERY;
        const maxQueries = parseIntOption('max-queries', opts.maxQueries, 1) ?? env.MAX_QUERIES;
        const delayMs = parseIntOption('delay', opts.delay, 0) ?? env.QUERY_DELAY_MS;

        const backends = buildBackendChain(http, backendChainOptionsFromEnv(env));

        const result = await discoverProfiles(attrs, {
            backends,
            budget: createSearchBudget(maxTotal, perQuery),
            delayMs,
            timeoutMs: env.BACKEND_TIMEOUT_MS,
            maxQueries,
            signal,
            target: profileTargetFromEnv(env),
            reportFile: opts.output ?? env.OUTPUT_FILE,
        });

        if (opts.json) {
            console.log(JSON.stringify(buildProfileReport(result.profiles), null, 2));
        } else {
            printProfiles(result.profiles.map((p) => p.url));
            if (result.cancelled) console.log(chalk.yellow('Run cancelled before all queries completed.'));
        }
        return 0;
    } catch (error) {
        if (error instanceof ConfigError || error instanceof BuilderError) {
            console.error(chalk.red(error.message));
            return 1;
        }
        throw error;
    }
}
