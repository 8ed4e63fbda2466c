/**
 * src/utils/browserSession.ts
 *
 * Engine-agnostic view of a headless browsing session, plus the ordered
 * engine fallback used to open one.
 *
 * The extractors and the orchestrator only see these minimal shapes, so the
 * Playwright binding (playwrightSession.ts) can be swapped for an in-process
 * fake in tests.
 *
 * ENGINE FALLBACK
 * ───────────────
 *   launchers = [chromium, webkit, firefox]
 *   Each launcher is tried once, in order. Every attempt produces a
 *   LaunchAttempt record; the first 'started' one wins and is used for the
 *   remainder of the run. If none starts, NoEngineAvailableError carries the
 *   full list of failures.
 */

import { log } from 'crawlee';
import { NoEngineAvailableError, errorMessage, type EngineFailure } from './errors.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface PageElement {
    attribute(name: string): Promise<string | null>;
    text(): Promise<string>;
}

export interface QueryTextOptions {
    /** Wait up to this long for the selector to appear before reading. */
    waitMs?: number;
}

export interface PageHandle {
    readonly url: string;
    /** All elements matching a CSS or XPath selector; empty when none match. */
    query(selector: string): Promise<PageElement[]>;
    /** Trimmed inner text of the first match, or null when nothing matches. */
    queryText(selector: string, options?: QueryTextOptions): Promise<string | null>;
    screenshot(filePath: string): Promise<void>;
    content(): Promise<string>;
}

export interface BrowserSession {
    readonly engine: string;
    /** Loads `url` and waits for network idle; the returned page is reused across calls. */
    navigate(url: string, timeoutMs: number): Promise<PageHandle>;
    /** The page as it currently stands, if anything was ever navigated. */
    currentPage(): PageHandle | null;
    close(): Promise<void>;
}

export interface EngineLauncher {
    readonly engine: string;
    launch(): Promise<BrowserSession>;
}

export type LaunchAttempt =
    | { status: 'started'; engine: string; session: BrowserSession }
    | { status: 'failed'; engine: string; reason: string };

// ─── Fallback ─────────────────────────────────────────────────────────────────

export async function attemptLaunch(launcher: EngineLauncher): Promise<LaunchAttempt> {
    log.info(`[Browser] Trying to launch ${launcher.engine}…`);
    try {
        const session = await launcher.launch();
        log.info(`[Browser] ✓ Launched ${launcher.engine}`);
        return { status: 'started', engine: launcher.engine, session };
    } catch (err) {
        const reason = errorMessage(err);
        log.warning(`[Browser] Failed to launch ${launcher.engine}: ${reason}`);
        return { status: 'failed', engine: launcher.engine, reason };
    }
}

/**
 * Opens a session with the first launcher that starts.
 * @throws NoEngineAvailableError when every launcher fails.
 */
export async function openSession(launchers: readonly EngineLauncher[]): Promise<BrowserSession> {
    const failures: EngineFailure[] = [];

    for (const launcher of launchers) {
        const attempt = await attemptLaunch(launcher);
        if (attempt.status === 'started') {
            return attempt.session;
        }
        failures.push({ engine: attempt.engine, reason: attempt.reason });
    }

    throw new NoEngineAvailableError(failures);
}
