import { describe, it, expect } from 'vitest';
import { parseIdentifier, scanListing, toCandidates } from './listing.js';
import { FakePage } from '../testing/fakeBrowser.js';
import { DEFAULT_LISTING_URL } from '../config/kstartup.js';

describe('parseIdentifier', () => {
    it('extracts the numeric reference from a go_view href', () => {
        expect(parseIdentifier('javascript:go_view(176543);')).toBe('176543');
    });

    it('returns null for links without a reference', () => {
        expect(parseIdentifier('javascript:go_view();')).toBeNull();
        expect(parseIdentifier('javascript:go_list(2);')).toBeNull();
        expect(parseIdentifier(null)).toBeNull();
    });
});

describe('scanListing', () => {
    it('returns parsed IDs in listing order without duplicates', async () => {
        const page = new FakePage(DEFAULT_LISTING_URL, {
            hrefs: [
                'javascript:go_view(3);',
                'javascript:go_view(1);',
                'javascript:go_view(3);',
                'javascript:void(0);',
                null,
                'javascript:go_view(2);',
            ],
        });

        await expect(scanListing(page)).resolves.toEqual(['3', '1', '2']);
    });

    it('returns an empty list when the page has no view links', async () => {
        await expect(scanListing(new FakePage(DEFAULT_LISTING_URL, {}))).resolves.toEqual([]);
    });
});

describe('toCandidates', () => {
    it('builds detail URLs from the listing URL', () => {
        expect(toCandidates(DEFAULT_LISTING_URL, ['42'])).toEqual([
            {
                id: '42',
                detailUrl: 'https://www.k-startup.go.kr/web/contents/bizpbanc-ongoing.do?schM=view&pbancSn=42',
            },
        ]);
    });
});
