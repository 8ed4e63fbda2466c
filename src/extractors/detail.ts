/**
 * src/extractors/detail.ts
 *
 * Detail-page extractor. Each field has its own selector chain; a field that
 * cannot be found becomes UNAVAILABLE rather than failing the item. Only
 * navigation failures and unexpected query errors surface, as ExtractionError.
 */

import { log } from 'crawlee';
import type { BrowserSession, PageHandle } from '../utils/browserSession.js';
import { ExtractionError, errorMessage } from '../utils/errors.js';
import { KStartupSelectors, UNAVAILABLE } from '../config/kstartup.js';
import type { CandidateItem } from './listing.js';

export interface ExtractedDetail {
    id: string;
    title: string;
    period: string;
    eligibilityText: string;
}

export interface DetailExtractorOptions {
    navigationTimeoutMs: number;
    titleWaitMs: number;
}

async function extractTitle(page: PageHandle, waitMs: number): Promise<string> {
    const { title, titleFallback } = KStartupSelectors.detail;
    const primary = await page.queryText(title, { waitMs });
    if (primary) return primary;

    log.debug('[Detail] Title container missing, trying fallback heading');
    const fallback = await page.queryText(titleFallback);
    return fallback || UNAVAILABLE;
}

export async function extractDetail(
    session: BrowserSession,
    item: CandidateItem,
    options: DetailExtractorOptions
): Promise<ExtractedDetail> {
    log.info(`[Detail] Checking ${item.detailUrl}`);

    try {
        const page = await session.navigate(item.detailUrl, options.navigationTimeoutMs);

        const title = await extractTitle(page, options.titleWaitMs);
        const period = (await page.queryText(KStartupSelectors.detail.period)) || UNAVAILABLE;
        const eligibilityText = (await page.queryText(KStartupSelectors.detail.eligibility)) || UNAVAILABLE;

        log.info(`[Detail]   Title: ${title}`);
        log.info(`[Detail]   Period: ${period}`);
        log.info(`[Detail]   Age: ${eligibilityText}`);

        return { id: item.id, title, period, eligibilityText };
    } catch (err) {
        throw new ExtractionError(item.id, errorMessage(err), { cause: err });
    }
}
