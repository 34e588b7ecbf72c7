import { z } from 'zod';
import { BACKEND_NAMES } from '../sources/types.js';
import type { BackendName } from '../sources/types.js';

// Unset and blank variables both fall back to `fallback`.
function numFromEnv<T extends z.ZodTypeAny>(schema: T, fallback?: number) {
    return z.preprocess((v) => {
        if (v === undefined || (typeof v === 'string' && v.trim() === '')) return fallback;
        if (typeof v === 'string') return Number(v);
        return v;
    }, schema);
}

const optionalString = z.preprocess((v) => {
    if (typeof v === 'string' && v.trim() === '') return undefined;
    return v;
}, z.string().optional());

function isBackendName(value: string): value is BackendName {
    return BACKEND_NAMES.some((name) => name === value);
}

const backendOrder = z
    .string()
    .default(BACKEND_NAMES.join(','))
    .transform((val, ctx): BackendName[] => {
        const names = val.split(',').map((s) => s.trim().toLowerCase()).filter(Boolean);
        const order: BackendName[] = [];
        for (const name of names) {
            if (isBackendName(name)) {
                order.push(name);
            } else {
                ctx.addIssue({
                    code: 'custom',
                    message: `Unknown backend "${name}" (expected one of: ${BACKEND_NAMES.join(', ')})`,
                });
            }
        }
        if (names.length === 0) {
            ctx.addIssue({ code: 'custom', message: 'At least one backend is required' });
        }
        return order;
    });

const pathPrefix = z
    .string()
    .default('/in/')
    .refine((v) => v.startsWith('/') && v.endsWith('/'), 'Must start and end with "/"');

export const envSchema = z.object({
    SERPAPI_KEY: optionalString,
    SERPER_API_KEY: optionalString,

    MAX_RESULTS_PER_QUERY: numFromEnv(z.number().int().min(1).max(100), 10),
    MAX_TOTAL_RESULTS: numFromEnv(z.number().int().min(0), 50),
    MAX_QUERIES: numFromEnv(z.number().int().min(1).optional()),
    QUERY_DELAY_MS: numFromEnv(z.number().min(0), 1000),
    BACKEND_TIMEOUT_MS: numFromEnv(z.number().int().min(1), 10_000),
    BACKEND_ORDER: backendOrder,

    GOOGLE_SEARCH_HOST: z.string().default('www.google.com'),
    PROXY_URL: optionalString,

    PROFILE_DOMAIN: z.string().min(1).default('linkedin.com'),
    PROFILE_PATH_PREFIX: pathPrefix,
    OUTPUT_FILE: optionalString,

    LOG_LEVEL: z.string().default('INFO'),
}).passthrough();

export type Env = z.infer<typeof envSchema>;
