import { ZodError } from 'zod';
import { ConfigError } from '../utils/errors.js';
import type { ProfileTarget } from '../sources/types.js';
import type { BackendChainOptions } from '../sources/registry.js';
import { envSchema, type Env } from './envSchema.js';

export function formatEnvIssues(err: ZodError): string {
    const lines = err.issues.map((i) => {
        const key = i.path.join('.') || '(root)';
        return `- ${key}: ${i.message}`;
    });
    return 'Invalid environment variables:\n' + lines.join('\n');
}

export function loadEnv(raw: NodeJS.ProcessEnv = process.env): Env {
    try {
        return envSchema.parse(raw);
    } catch (err) {
        if (err instanceof ZodError) {
            throw new ConfigError(formatEnvIssues(err));
        }
        throw err;
    }
}

export function profileTargetFromEnv(env: Env): ProfileTarget {
    return {
        domain: env.PROFILE_DOMAIN.toLowerCase(),
        pathPrefix: env.PROFILE_PATH_PREFIX,
    };
}

export function backendChainOptionsFromEnv(env: Env): BackendChainOptions {
    return {
        order: env.BACKEND_ORDER,
        serpApiKey: env.SERPAPI_KEY,
        serperApiKey: env.SERPER_API_KEY,
        googleHost: env.GOOGLE_SEARCH_HOST,
        target: profileTargetFromEnv(env),
    };
}

export type { Env };
