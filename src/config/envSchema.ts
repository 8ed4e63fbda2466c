import { z } from 'zod';
import * as path from 'path';
import { DEFAULT_LISTING_URL } from './kstartup.js';

export const ENGINE_NAMES = ['chromium', 'webkit', 'firefox'] as const;
export type EngineName = (typeof ENGINE_NAMES)[number];

const blankAsUndefined = (v: unknown): unknown =>
    typeof v === 'string' && v.trim() === '' ? undefined : v;

function numFromEnv(schema: z.ZodNumber, fallback: number) {
    return z.preprocess((v) => {
        const value = blankAsUndefined(v);
        if (value === undefined) return fallback;
        if (typeof value === 'string') return Number(value);
        return value;
    }, schema.finite());
}

const optionalSecret = z.preprocess(blankAsUndefined, z.string().trim().optional());

const engineList = z.preprocess(blankAsUndefined, z
    .string()
    .default(ENGINE_NAMES.join(','))
    .transform((val, ctx) => {
        const names = val
            .split(',')
            .map((s) => s.trim().toLowerCase())
            .filter(Boolean);
        const engines: EngineName[] = [];
        for (const name of names) {
            const match = ENGINE_NAMES.find((e) => e === name);
            if (!match) {
                ctx.addIssue({ code: 'custom', message: `Unknown browser engine "${name}"` });
                return z.NEVER;
            }
            if (!engines.includes(match)) engines.push(match);
        }
        if (engines.length === 0) {
            ctx.addIssue({ code: 'custom', message: 'At least one browser engine is required' });
            return z.NEVER;
        }
        return engines;
    }));

export const envSchema = z.object({
    LISTING_URL: z.string().url().default(DEFAULT_LISTING_URL),
    STATE_FILE: z.string().min(1).default('last_seen.json'),
    SEEN_STATE_LIMIT: numFromEnv(z.number().int().min(1), 100),

    NAVIGATION_TIMEOUT_MS: numFromEnv(z.number().int().positive(), 60_000),
    TITLE_WAIT_MS: numFromEnv(z.number().int().min(0), 5_000),
    BROWSER_ENGINES: engineList,
    USER_AGENT: z.string().default(
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
    ),
    DIAGNOSTICS_DIR: z.string().default(process.cwd()),

    TELEGRAM_BOT_TOKEN: optionalSecret,
    TELEGRAM_CHAT_ID: optionalSecret,
    TELEGRAM_API_BASE: z.string().url().default('https://api.telegram.org'),
    NOTIFY_TIMEOUT_MS: numFromEnv(z.number().int().positive(), 8_000),

    LOG_FILE: z.string().default(path.join(process.cwd(), 'log.txt')),
    CRAWLEE_LOG_LEVEL: z.string().default(''),
}).passthrough();

export type Env = z.infer<typeof envSchema>;
