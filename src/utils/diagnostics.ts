/**
 * src/utils/diagnostics.ts
 *
 * Best-effort snapshot of a page after a fatal listing failure: a full-page
 * screenshot and the serialized HTML, written to fixed filenames so the last
 * failure is always in the same place. Never throws.
 */

import * as fs from 'fs';
import * as path from 'path';
import { log } from 'crawlee';
import type { PageHandle } from './browserSession.js';
import { errorMessage } from './errors.js';

export const SCREENSHOT_FILE = 'error_screenshot.png';
export const HTML_DUMP_FILE = 'error_debug_page.html';

export interface DiagnosticsResult {
    screenshotPath: string | null;
    htmlPath: string | null;
}

export async function captureDiagnostics(page: PageHandle | null, dir: string): Promise<DiagnosticsResult> {
    const result: DiagnosticsResult = { screenshotPath: null, htmlPath: null };
    if (!page) {
        log.warning('[Diagnostics] No page available — nothing captured.');
        return result;
    }

    try {
        fs.mkdirSync(dir, { recursive: true });
    } catch (err) {
        log.warning(`[Diagnostics] Cannot create ${dir}: ${errorMessage(err)}`);
        return result;
    }

    const screenshotPath = path.join(dir, SCREENSHOT_FILE);
    try {
        await page.screenshot(screenshotPath);
        result.screenshotPath = screenshotPath;
    } catch (err) {
        log.warning(`[Diagnostics] Screenshot failed: ${errorMessage(err)}`);
    }

    const htmlPath = path.join(dir, HTML_DUMP_FILE);
    try {
        const html = await page.content();
        fs.writeFileSync(htmlPath, html, 'utf-8');
        result.htmlPath = htmlPath;
    } catch (err) {
        log.warning(`[Diagnostics] HTML dump failed: ${errorMessage(err)}`);
    }

    log.info(
        `[Diagnostics] Captured: screenshot=${result.screenshotPath ?? 'none'} html=${result.htmlPath ?? 'none'}`
    );
    return result;
}
