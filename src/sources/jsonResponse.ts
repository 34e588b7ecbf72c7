import type { z } from 'zod';
import { BackendError } from '../utils/errors.js';
import type { BackendName } from './types.js';

/** Parses a JSON body against `schema`; anything unexpected is a parse_failure. */
export function parseJsonBody<T extends z.ZodTypeAny>(
    body: string,
    schema: T,
    backend: BackendName
): z.infer<T> {
    let data: unknown;
    try {
        data = JSON.parse(body);
    } catch {
        throw new BackendError('Response body is not valid JSON', 'parse_failure', backend);
    }

    const result = schema.safeParse(data);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown shape';
        throw new BackendError(`Unexpected response shape (${where})`, 'parse_failure', backend);
    }
    return result.data;
}
