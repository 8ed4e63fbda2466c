/**
 * src/extractors/listing.ts
 *
 * Listing-page scanner for the K-Startup board: every "view" link carries the
 * announcement ID inside its javascript: href.
 */

import { log } from 'crawlee';
import type { PageHandle } from '../utils/browserSession.js';
import { KStartupSelectors, VIEW_REFERENCE_PATTERN, buildDetailUrl } from '../config/kstartup.js';

export interface CandidateItem {
    id: string;
    detailUrl: string;
}

/** `javascript:go_view(176543);` → "176543"; null for anything else. */
export function parseIdentifier(href: string | null): string | null {
    if (!href) return null;
    const match = VIEW_REFERENCE_PATTERN.exec(href);
    return match?.[1] ?? null;
}

/** IDs in listing order, first occurrence wins. */
export async function scanListing(page: PageHandle): Promise<string[]> {
    const { viewLink, viewLinkAttribute } = KStartupSelectors.listing;
    const links = await page.query(viewLink);
    log.info(`[Listing] Found ${links.length} view links on ${page.url}`);

    const ids: string[] = [];
    const seen = new Set<string>();
    for (const link of links) {
        const href = await link.attribute(viewLinkAttribute);
        const id = parseIdentifier(href);
        if (id === null) {
            log.debug(`[Listing] Skipping unparseable reference: ${href ?? '(none)'}`);
            continue;
        }
        if (seen.has(id)) continue;
        seen.add(id);
        ids.push(id);
    }
    return ids;
}

export function toCandidates(listingUrl: string, ids: readonly string[]): CandidateItem[] {
    return ids.map((id) => ({ id, detailUrl: buildDetailUrl(listingUrl, id) }));
}
