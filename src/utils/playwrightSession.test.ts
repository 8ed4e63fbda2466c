import { describe, it, expect } from 'vitest';
import { errors } from 'playwright';
import {
    PlaywrightPage,
    PlaywrightSession,
    type MinimalBrowser,
    type MinimalLocator,
    type MinimalPage,
    type MinimalResponse,
} from './playwrightSession.js';
import { NavigationError, NavigationTimeoutError } from './errors.js';

interface StubNode {
    text: string;
    attrs?: Record<string, string>;
}

class StubLocator implements MinimalLocator {
    constructor(
        private readonly nodes: StubNode[],
        private readonly waitError: Error | null = null
    ) {}

    async all(): Promise<MinimalLocator[]> {
        return this.nodes.map((node) => new StubLocator([node]));
    }

    first(): MinimalLocator {
        return new StubLocator(this.nodes.slice(0, 1), this.waitError);
    }

    async waitFor(_options: { timeout: number }): Promise<void> {
        if (this.waitError) throw this.waitError;
    }

    async count(): Promise<number> {
        return this.nodes.length;
    }

    async innerText(): Promise<string> {
        const node = this.nodes[0];
        if (!node) throw new Error('no element');
        return node.text;
    }

    async getAttribute(name: string): Promise<string | null> {
        return this.nodes[0]?.attrs?.[name] ?? null;
    }
}

interface StubPageOptions {
    nodes?: Record<string, StubNode[]>;
    waitErrors?: Record<string, Error>;
    response?: MinimalResponse | null;
    gotoError?: Error;
}

class StubPage implements MinimalPage {
    readonly gotoCalls: Array<{ url: string; options: { waitUntil: 'networkidle'; timeout: number } }> = [];
    private currentUrl = 'about:blank';

    constructor(private readonly options: StubPageOptions = {}) {}

    url(): string {
        return this.currentUrl;
    }

    locator(selector: string): MinimalLocator {
        return new StubLocator(this.options.nodes?.[selector] ?? [], this.options.waitErrors?.[selector] ?? null);
    }

    async goto(url: string, options: { waitUntil: 'networkidle'; timeout: number }): Promise<MinimalResponse | null> {
        this.gotoCalls.push({ url, options });
        this.currentUrl = url;
        if (this.options.gotoError) throw this.options.gotoError;
        return this.options.response === undefined ? { status: () => 200 } : this.options.response;
    }

    async screenshot(_options: { path: string; fullPage: boolean }): Promise<unknown> {
        return undefined;
    }

    async content(): Promise<string> {
        return '<html></html>';
    }
}

class StubBrowser implements MinimalBrowser {
    closeCalls = 0;

    constructor(private readonly closeError: Error | null = null) {}

    async close(): Promise<void> {
        this.closeCalls++;
        if (this.closeError) throw this.closeError;
    }
}

const URL_UNDER_TEST = 'https://example.test/list';

describe('PlaywrightSession.navigate', () => {
    it('waits for network idle within the given timeout', async () => {
        const page = new StubPage();
        const session = new PlaywrightSession('chromium', new StubBrowser(), page);

        const handle = await session.navigate(URL_UNDER_TEST, 60_000);

        expect(page.gotoCalls).toEqual([{ url: URL_UNDER_TEST, options: { waitUntil: 'networkidle', timeout: 60_000 } }]);
        expect(handle.url).toBe(URL_UNDER_TEST);
    });

    it('turns a Playwright timeout into NavigationTimeoutError', async () => {
        const page = new StubPage({ gotoError: new errors.TimeoutError('page.goto: Timeout 60000ms exceeded.') });
        const session = new PlaywrightSession('chromium', new StubBrowser(), page);

        const err = await session.navigate(URL_UNDER_TEST, 60_000).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(NavigationTimeoutError);
        if (!(err instanceof NavigationTimeoutError)) return;
        expect(err.message).toBe(`Navigation to ${URL_UNDER_TEST} timed out after 60000 ms`);
        expect(err.timeoutMs).toBe(60_000);
    });

    it('turns any other goto failure into NavigationError without a status', async () => {
        const page = new StubPage({ gotoError: new Error('net::ERR_NAME_NOT_RESOLVED') });
        const session = new PlaywrightSession('chromium', new StubBrowser(), page);

        const err = await session.navigate(URL_UNDER_TEST, 60_000).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(NavigationError);
        if (!(err instanceof NavigationError)) return;
        expect(err.message).toBe(`Navigation to ${URL_UNDER_TEST} failed: net::ERR_NAME_NOT_RESOLVED`);
        expect(err.status).toBeNull();
    });

    it('rejects an HTTP error status with NavigationError carrying the status', async () => {
        const page = new StubPage({ response: { status: () => 404 } });
        const session = new PlaywrightSession('chromium', new StubBrowser(), page);

        const err = await session.navigate(URL_UNDER_TEST, 60_000).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(NavigationError);
        if (!(err instanceof NavigationError)) return;
        expect(err.status).toBe(404);
        expect(err.message).toBe(`Navigation to ${URL_UNDER_TEST} failed: HTTP 404`);
    });

    it('accepts a navigation that produced no response', async () => {
        const session = new PlaywrightSession('chromium', new StubBrowser(), new StubPage({ response: null }));

        await expect(session.navigate(URL_UNDER_TEST, 60_000)).resolves.toBeInstanceOf(PlaywrightPage);
    });

    it('exposes the page for diagnostics only once a navigation was attempted', async () => {
        const page = new StubPage({ gotoError: new Error('boom') });
        const session = new PlaywrightSession('chromium', new StubBrowser(), page);

        expect(session.currentPage()).toBeNull();
        await session.navigate(URL_UNDER_TEST, 1000).catch(() => undefined);

        expect(session.currentPage()?.url).toBe(URL_UNDER_TEST);
    });
});

describe('PlaywrightSession.close', () => {
    it('closes the browser once however often it is called', async () => {
        const browser = new StubBrowser();
        const session = new PlaywrightSession('webkit', browser, new StubPage());

        await session.close();
        await session.close();

        expect(browser.closeCalls).toBe(1);
    });

    it('never throws when the browser fails to close', async () => {
        const browser = new StubBrowser(new Error('already gone'));
        const session = new PlaywrightSession('firefox', browser, new StubPage());

        await expect(session.close()).resolves.toBeUndefined();
        await expect(session.close()).resolves.toBeUndefined();
        expect(browser.closeCalls).toBe(1);
    });
});

describe('PlaywrightPage', () => {
    it('returns the trimmed text of the first match', async () => {
        const page = new PlaywrightPage(
            new StubPage({ nodes: { h3: [{ text: '  첫 번째 공고 \n' }, { text: '두 번째' }] } })
        );

        expect(await page.queryText('h3')).toBe('첫 번째 공고');
    });

    it('returns null when nothing matches', async () => {
        const page = new PlaywrightPage(new StubPage());

        expect(await page.queryText('#rcptPeriod')).toBeNull();
    });

    it('returns null when the wait for a selector times out', async () => {
        const page = new PlaywrightPage(
            new StubPage({
                waitErrors: { 'div.view_tit h3': new errors.TimeoutError('locator.waitFor: Timeout 5000ms exceeded.') },
            })
        );

        expect(await page.queryText('div.view_tit h3', { waitMs: 5000 })).toBeNull();
    });

    it('lets other wait failures propagate', async () => {
        const page = new PlaywrightPage(
            new StubPage({ waitErrors: { h3: new Error('Target page, context or browser has been closed') } })
        );

        await expect(page.queryText('h3', { waitMs: 5000 })).rejects.toThrow(
            'Target page, context or browser has been closed'
        );
    });

    it('maps every match to an element exposing its attributes', async () => {
        const page = new PlaywrightPage(
            new StubPage({
                nodes: {
                    'a[href^="javascript:go_view"]': [
                        { text: 'A', attrs: { href: 'javascript:go_view(101);' } },
                        { text: 'B', attrs: { href: 'javascript:go_view(102);' } },
                    ],
                },
            })
        );

        const elements = await page.query('a[href^="javascript:go_view"]');

        expect(elements).toHaveLength(2);
        expect(await elements[1]?.attribute('href')).toBe('javascript:go_view(102);');
        expect(await elements[0]?.text()).toBe('A');
    });
});
