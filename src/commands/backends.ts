import chalk from 'chalk';
import { backendChainOptionsFromEnv } from '../config/env.js';
import type { Env } from '../config/env.js';
import { describeBackendChain } from '../sources/registry.js';

export function runBackendsCommand(env: Env): void {
    const statuses = describeBackendChain(backendChainOptionsFromEnv(env));

    console.log(chalk.cyan('Backend fallback chain (tried in this order):'));
    statuses.forEach((s, i) => {
        const state = s.enabled ? chalk.green('enabled') : chalk.dim(`disabled (${s.reason ?? 'unavailable'})`);
        console.log(`${i + 1}. ${s.name.padEnd(12)} ${state}`);
    });
}
