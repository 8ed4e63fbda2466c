import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { captureDiagnostics, HTML_DUMP_FILE, SCREENSHOT_FILE } from './diagnostics.js';
import { FakePage } from '../testing/fakeBrowser.js';

let dir: string;

beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'diagnostics-'));
});

afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
});

describe('captureDiagnostics', () => {
    it('writes the screenshot and the page HTML to fixed names', async () => {
        const page = new FakePage('https://example.test', { html: '<html><body>down</body></html>' });

        const result = await captureDiagnostics(page, dir);

        expect(page.screenshots).toEqual([path.join(dir, SCREENSHOT_FILE)]);
        expect(result).toEqual({
            screenshotPath: path.join(dir, SCREENSHOT_FILE),
            htmlPath: path.join(dir, HTML_DUMP_FILE),
        });
        expect(fs.readFileSync(path.join(dir, HTML_DUMP_FILE), 'utf-8')).toBe('<html><body>down</body></html>');
    });

    it('still dumps HTML when the screenshot fails', async () => {
        const page = new FakePage('https://example.test', { screenshotError: new Error('page crashed') });

        const result = await captureDiagnostics(page, dir);

        expect(result.screenshotPath).toBeNull();
        expect(result.htmlPath).toBe(path.join(dir, HTML_DUMP_FILE));
    });

    it('resolves without output when there is no page', async () => {
        await expect(captureDiagnostics(null, dir)).resolves.toEqual({ screenshotPath: null, htmlPath: null });
        expect(fs.readdirSync(dir)).toEqual([]);
    });
});
