import { z, ZodError } from 'zod';
import { BuilderError } from './errors.js';
import type { RoleAttributes } from '../sources/types.js';

// Analyzer output uses snake_case keys and carries extra fields we ignore.
const roleAttributesSchema = z.object({
    title: z.string().default(''),
    location: z.string().default(''),
    skills: z.array(z.string()).default([]),
    searchKeywords: z.array(z.string()).optional(),
    search_keywords: z.array(z.string()).optional(),
});

function formatIssues(err: ZodError): string {
    return err.issues
        .map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n');
}

export function parseRoleAttributes(input: unknown): RoleAttributes {
    const result = roleAttributesSchema.safeParse(input);
    if (!result.success) {
        throw new BuilderError(
            `Malformed role attributes:\n${formatIssues(result.error)}`,
            'MALFORMED_ATTRIBUTES'
        );
    }

    const data = result.data;
    return {
        title: data.title,
        location: data.location,
        skills: data.skills,
        searchKeywords: data.searchKeywords ?? data.search_keywords ?? [],
    };
}
