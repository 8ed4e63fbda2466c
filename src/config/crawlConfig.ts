import * as path from 'path';
import type { Env, EngineName } from './envSchema.js';

/**
 * Everything one run needs, resolved up front. The orchestrator and the
 * components it builds never read process.env themselves.
 */
export interface CrawlConfig {
    listingUrl: string;
    stateFilePath: string;
    seenStateLimit: number;
    navigationTimeoutMs: number;
    titleWaitMs: number;
    engines: EngineName[];
    userAgent: string;
    diagnosticsDir: string;
    deliveryToken?: string;
    channelId?: string;
    telegramApiBase: string;
    notifyTimeoutMs: number;
}

export function buildCrawlConfig(env: Env): CrawlConfig {
    return {
        listingUrl: env.LISTING_URL,
        stateFilePath: path.resolve(env.STATE_FILE),
        seenStateLimit: env.SEEN_STATE_LIMIT,
        navigationTimeoutMs: env.NAVIGATION_TIMEOUT_MS,
        titleWaitMs: env.TITLE_WAIT_MS,
        engines: env.BROWSER_ENGINES,
        userAgent: env.USER_AGENT,
        diagnosticsDir: path.resolve(env.DIAGNOSTICS_DIR),
        deliveryToken: env.TELEGRAM_BOT_TOKEN,
        channelId: env.TELEGRAM_CHAT_ID,
        telegramApiBase: env.TELEGRAM_API_BASE,
        notifyTimeoutMs: env.NOTIFY_TIMEOUT_MS,
    };
}
