#!/usr/bin/env node
/**
 * src/main.ts
 *
 * ENTRY POINT: profile-discovery CLI
 *
 *   profile-discovery search --title "AI Engineer" --location "Berlin" --skills python,sql
 *   profile-discovery search --input attributes.json --output profiles.json
 *   profile-discovery backends
 *
 * Configuration comes from the environment (.env is loaded here and only
 * here). Ctrl-C cancels a search between two queries.
 */

import 'dotenv/config';
import { createRequire } from 'node:module';
import chalk from 'chalk';
import { Command } from 'commander';
import { log } from 'crawlee';
import { runBackendsCommand } from './commands/backends.js';
import { runSearchCommand } from './commands/search.js';
import type { SearchCommandOptions } from './commands/search.js';
import { loadEnv } from './config/env.js';
import type { Env } from './config/env.js';
import { ConfigError } from './utils/errors.js';
import { createGotScrapingClient } from './utils/httpClient.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { name: string; version: string };

type LogLevel = (typeof log.LEVELS)[keyof typeof log.LEVELS];

const LOG_LEVELS: Record<string, LogLevel> = {
    DEBUG: log.LEVELS.DEBUG,
    INFO: log.LEVELS.INFO,
    WARNING: log.LEVELS.WARNING,
    ERROR: log.LEVELS.ERROR,
    OFF: log.LEVELS.OFF,
};

function configureLogging(env: Env, verbose: boolean): void {
    const name = verbose ? 'DEBUG' : env.LOG_LEVEL.toUpperCase();
    log.setLevel(LOG_LEVELS[name] ?? log.LEVELS.INFO);
}

function loadEnvOrExit(): Env | null {
    try {
        return loadEnv();
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(chalk.red(error.message));
            process.exitCode = 1;
            return null;
        }
        throw error;
    }
}

async function main(): Promise<void> {
    const program = new Command();

    program
        .name('profile-discovery')
        .description('Discover public profile URLs matching a job role through search engines')
        .version(pkg.version)
        .option('-v, --verbose', 'Enable debug logging', false);

    program
        .command('search')
        .description('Build queries from role attributes and collect matching profile URLs')
        .option('-t, --title <title>', 'Job title')
        .option('-l, --location <location>', 'Job location')
        .option('-s, --skills <list>', 'Comma-separated skills, most important first')
        .option('-k, --keywords <list>', 'Comma-separated search keywords')
        .option('-i, --input <file>', 'JSON file with title/location/skills/search_keywords')
        .option('-n, --max-results <n>', 'Total profile budget (MAX_TOTAL_RESULTS)')
        .option('--max-queries <n>', 'Maximum number of queries (MAX_QUERIES)')
        .option('--per-query <n>', 'Results requested per query (MAX_RESULTS_PER_QUERY)')
        .option('--delay <ms>', 'Delay between queries in ms (QUERY_DELAY_MS)')
        .option('-o, --output <file>', 'Write a JSON report to this file (OUTPUT_FILE)')
        .option('--json', 'Print the report as JSON instead of a list', false)
        .action(async (opts: SearchCommandOptions) => {
            const env = loadEnvOrExit();
            if (!env) return;
            configureLogging(env, program.opts<{ verbose: boolean }>().verbose);

            const controller = new AbortController();
            const onSigint = (): void => {
                log.warning('[CLI] Interrupt received, finishing current query...');
                controller.abort();
            };
            process.once('SIGINT', onSigint);

            try {
                const http = createGotScrapingClient({ proxyUrl: env.PROXY_URL });
                process.exitCode = await runSearchCommand(opts, env, http, controller.signal);
            } finally {
                process.removeListener('SIGINT', onSigint);
            }
        });

    program
        .command('backends')
        .description('Show the configured backend fallback chain')
        .action(() => {
            const env = loadEnvOrExit();
            if (!env) return;
            runBackendsCommand(env);
        });

    await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(chalk.red(`CLI failed: ${message}`));
    process.exitCode = 1;
});
