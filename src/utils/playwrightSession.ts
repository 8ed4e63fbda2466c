/**
 * src/utils/playwrightSession.ts
 *
 * Playwright binding for BrowserSession. One browser, one context, one page
 * reused for the listing and every detail navigation.
 */

import { chromium, firefox, webkit, errors } from 'playwright';
import type { BrowserType } from 'playwright';
import { log } from 'crawlee';
import type { EngineName } from '../config/envSchema.js';
import { NavigationError, NavigationTimeoutError, errorMessage } from './errors.js';
import type {
    BrowserSession,
    EngineLauncher,
    PageElement,
    PageHandle,
    QueryTextOptions,
} from './browserSession.js';

const LAUNCH_ARGS = ['--no-sandbox', '--disable-gpu', '--disable-dev-shm-usage'];

const ENGINE_TYPES: Record<EngineName, BrowserType> = {
    chromium,
    webkit,
    firefox,
};

export interface PlaywrightLaunchOptions {
    userAgent: string;
    headless?: boolean;
}

// The slices of Playwright's Page, Locator and Browser this binding touches;
// the real objects satisfy them, and so can a test stub.
export type MinimalLocator = {
    all(): Promise<MinimalLocator[]>;
    first(): MinimalLocator;
    waitFor(options: { timeout: number }): Promise<void>;
    count(): Promise<number>;
    innerText(): Promise<string>;
    getAttribute(name: string): Promise<string | null>;
};

export type MinimalResponse = { status(): number };

export type MinimalPage = {
    url(): string;
    locator(selector: string): MinimalLocator;
    goto(url: string, options: { waitUntil: 'networkidle'; timeout: number }): Promise<MinimalResponse | null>;
    screenshot(options: { path: string; fullPage: boolean }): Promise<unknown>;
    content(): Promise<string>;
};

export type MinimalBrowser = { close(): Promise<void> };

export class PlaywrightPage implements PageHandle {
    constructor(private readonly page: MinimalPage) {}

    get url(): string {
        return this.page.url();
    }

    async query(selector: string): Promise<PageElement[]> {
        const locator = this.page.locator(selector);
        const elements = await locator.all();
        return elements.map((el) => ({
            attribute: (name: string) => el.getAttribute(name),
            text: () => el.innerText(),
        }));
    }

    async queryText(selector: string, options: QueryTextOptions = {}): Promise<string | null> {
        const first = this.page.locator(selector).first();
        if (options.waitMs && options.waitMs > 0) {
            try {
                await first.waitFor({ timeout: options.waitMs });
            } catch (err) {
                if (err instanceof errors.TimeoutError) return null;
                throw err;
            }
        }
        if ((await first.count()) === 0) return null;
        const text = await first.innerText();
        return text.trim();
    }

    async screenshot(filePath: string): Promise<void> {
        await this.page.screenshot({ path: filePath, fullPage: true });
    }

    content(): Promise<string> {
        return this.page.content();
    }
}

export class PlaywrightSession implements BrowserSession {
    private readonly page: PlaywrightPage;
    private navigated = false;
    private closed = false;

    constructor(
        readonly engine: string,
        private readonly browser: MinimalBrowser,
        private readonly rawPage: MinimalPage
    ) {
        this.page = new PlaywrightPage(rawPage);
    }

    async navigate(url: string, timeoutMs: number): Promise<PageHandle> {
        // A failed goto still leaves a page worth capturing.
        this.navigated = true;
        let response: MinimalResponse | null;
        try {
            response = await this.rawPage.goto(url, { waitUntil: 'networkidle', timeout: timeoutMs });
        } catch (err) {
            if (err instanceof errors.TimeoutError) {
                throw new NavigationTimeoutError(url, timeoutMs, { cause: err });
            }
            throw new NavigationError(url, errorMessage(err), null, { cause: err });
        }

        if (response && response.status() >= 400) {
            throw new NavigationError(url, `HTTP ${response.status()}`, response.status());
        }

        return this.page;
    }

    currentPage(): PageHandle | null {
        return this.navigated ? this.page : null;
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        try {
            await this.browser.close();
            log.debug(`[Browser] ${this.engine} closed.`);
        } catch (err) {
            log.warning(`[Browser] Failed to close ${this.engine}: ${errorMessage(err)}`);
        }
    }
}

async function launchPlaywright(engine: EngineName, options: PlaywrightLaunchOptions): Promise<BrowserSession> {
    const browser = await ENGINE_TYPES[engine].launch({
        headless: options.headless ?? true,
        args: LAUNCH_ARGS,
    });
    try {
        const context = await browser.newContext({ userAgent: options.userAgent });
        const page = await context.newPage();
        return new PlaywrightSession(engine, browser, page);
    } catch (err) {
        await browser.close().catch((closeErr: unknown) => {
            log.debug(`[Browser] Cleanup after failed ${engine} start also failed: ${errorMessage(closeErr)}`);
        });
        throw err;
    }
}

/** Launchers for the configured engines, in fallback order. */
export function createPlaywrightLaunchers(
    engines: readonly EngineName[],
    options: PlaywrightLaunchOptions
): EngineLauncher[] {
    return engines.map((engine) => ({
        engine,
        launch: () => launchPlaywright(engine, options),
    }));
}
