import { ZodError } from 'zod';
import { envSchema, type Env } from './envSchema.js';
import { ConfigError } from '../utils/errors.js';

/** Blank assignments in .env (`NUM_PAGES=`) mean "use the default". */
function withoutBlanks(raw: NodeJS.ProcessEnv): Record<string, string> {
    const next: Record<string, string> = {};
    for (const [key, value] of Object.entries(raw)) {
        if (value !== undefined && value.trim() !== '') next[key] = value;
    }
    return next;
}

export function formatEnvIssues(err: ZodError): string {
    const lines = err.issues.map((i) => {
        const key = i.path.join('.') || '(root)';
        return `- ${key}: ${i.message}`;
    });
    return 'Invalid environment variables:\n' + lines.join('\n');
}

/**
 * Parse an environment into a typed Env. Throws ConfigError listing every
 * invalid key.
 */
export function parseEnv(raw: NodeJS.ProcessEnv = process.env): Env {
    try {
        return envSchema.parse(withoutBlanks(raw));
    } catch (err) {
        if (err instanceof ZodError) {
            throw new ConfigError(formatEnvIssues(err), { cause: err });
        }
        throw err;
    }
}

/** The job-search key is the one secret whose absence stops a live run. */
export function requireSearchKey(env: Env): string {
    if (!env.RAPIDAPI_KEY) {
        throw new ConfigError('Missing RAPIDAPI_KEY. Copy .env.example to .env and fill it in.');
    }
    return env.RAPIDAPI_KEY;
}

export type { Env };
