/**
 * src/config/kstartup.ts — selectors, URL helpers and filter markers for the
 * K-Startup ongoing-announcements board.
 */

export const DEFAULT_LISTING_URL = 'https://www.k-startup.go.kr/web/contents/bizpbanc-ongoing.do';

export const KStartupSelectors = {
    listing: {
        // <a href="javascript:go_view(176543);">
        viewLink: 'a[href^="javascript:go_view"]',
        viewLinkAttribute: 'href',
    },
    detail: {
        title: 'div.view_tit h3',
        titleFallback: 'h3',
        period: '#rcptPeriod',
        eligibility: '//li[contains(., "대상연령")]//p[@class="txt"]',
    },
};

export const VIEW_REFERENCE_PATTERN = /go_view\((\d+)\)/;

/** Placeholder for any field the detail page did not yield. */
export const UNAVAILABLE = '정보 없음';

/** "All ages" and "40 years" markers on the eligibility line. */
export const ELIGIBILITY_MARKERS = ['전체', '40세'] as const;

export function buildDetailUrl(listingUrl: string, id: string): string {
    const url = new URL(listingUrl);
    url.searchParams.set('schM', 'view');
    url.searchParams.set('pbancSn', id);
    return url.toString();
}
