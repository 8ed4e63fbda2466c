import { ZodError } from 'zod';
import { envSchema, type Env } from './envSchema.js';

export class EnvValidationError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super('Invalid environment variables:\n' + issues.join('\n'));
        this.name = 'EnvValidationError';
        this.issues = issues;
    }
}

/** @throws EnvValidationError listing every offending variable. */
export function parseEnv(raw: NodeJS.ProcessEnv): Env {
    try {
        return envSchema.parse(raw);
    } catch (err) {
        if (err instanceof ZodError) {
            throw new EnvValidationError(
                err.issues.map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`)
            );
        }
        throw err;
    }
}

/** Entry-point helper: prints the issues and exits 1 on a bad environment. */
export function loadEnvOrExit(raw: NodeJS.ProcessEnv = process.env): Env {
    try {
        return parseEnv(raw);
    } catch (err) {
        if (err instanceof EnvValidationError) {
            console.error(err.message);
            process.exit(1);
        }
        throw err;
    }
}

export type { Env };
