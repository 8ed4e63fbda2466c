/**
 * src/utils/notifier.ts
 *
 * Telegram delivery for qualifying announcements.
 *
 * CHANNEL
 * ───────
 * POST {chat_id, text} to <apiBase>/bot<token>/sendMessage. Only HTTP 200
 * counts as delivered; anything else raises DeliveryError with the response
 * body so the log shows what Telegram rejected.
 *
 * LOG-ONLY MODE
 * ─────────────
 * Without a token or chat id the message is written to the log and the call
 * succeeds. Useful locally and in forks that have no secrets configured.
 */

import * as https from 'https';
import * as http from 'http';
import { log } from 'crawlee';
import { DeliveryError, errorMessage } from './errors.js';
import type { ExtractedDetail } from '../extractors/detail.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface QualifyingPost extends ExtractedDetail {
    detailUrl: string;
}

export interface NotifierOptions {
    token?: string;
    chatId?: string;
    apiBase?: string;
    timeoutMs?: number;
}

export interface Notifier {
    notify(message: string): Promise<void>;
}

interface HttpResult {
    statusCode: number;
    body: string;
}

// ─── HTTP POST Helper ─────────────────────────────────────────────────────────

function httpPost(url: string, body: string, timeoutMs: number): Promise<HttpResult> {
    return new Promise((resolve, reject) => {
        const parsed = new URL(url);
        const isHttps = parsed.protocol === 'https:';
        const transport = isHttps ? https : http;
        const options = {
            hostname: parsed.hostname,
            port: parsed.port || (isHttps ? 443 : 80),
            path: parsed.pathname + parsed.search,
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                'Content-Length': Buffer.byteLength(body),
            },
            timeout: timeoutMs,
        };

        const req = transport.request(options, (res) => {
            const chunks: Buffer[] = [];
            res.on('data', (chunk: Buffer) => chunks.push(chunk));
            res.on('end', () => {
                resolve({
                    statusCode: res.statusCode ?? 0,
                    body: Buffer.concat(chunks).toString('utf-8'),
                });
            });
            res.on('error', reject);
        });

        req.on('error', reject);
        req.on('timeout', () => { req.destroy(new Error('Request timed out')); });
        req.write(body);
        req.end();
    });
}

// ─── Formatting ───────────────────────────────────────────────────────────────

export function formatPostMessage(post: QualifyingPost): string {
    return (
        `[새로운 공고]\n` +
        `제목: ${post.title}\n` +
        `기간: ${post.period}\n` +
        `대상: ${post.eligibilityText}\n` +
        `${post.detailUrl}`
    );
}

// ─── Telegram ─────────────────────────────────────────────────────────────────

export class TelegramNotifier implements Notifier {
    private readonly token?: string;
    private readonly chatId?: string;
    private readonly apiBase: string;
    private readonly timeoutMs: number;

    constructor(options: NotifierOptions = {}) {
        this.token = options.token;
        this.chatId = options.chatId;
        this.apiBase = (options.apiBase ?? 'https://api.telegram.org').replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs ?? 8000;
    }

    get isConfigured(): boolean {
        return Boolean(this.token && this.chatId);
    }

    /** @throws DeliveryError on a non-200 response or a transport failure. */
    async notify(message: string): Promise<void> {
        if (!this.token || !this.chatId) {
            log.info('[Notifier] Telegram configuration missing. Skipping message.');
            log.info(`[Notifier] Message would be:\n${message}`);
            return;
        }

        const url = `${this.apiBase}/bot${this.token}/sendMessage`;
        const payload = JSON.stringify({ chat_id: this.chatId, text: message });

        let result: HttpResult;
        try {
            result = await httpPost(url, payload, this.timeoutMs);
        } catch (err) {
            throw new DeliveryError(errorMessage(err), null, '', { cause: err });
        }

        if (result.statusCode !== 200) {
            throw new DeliveryError(`HTTP ${result.statusCode}`, result.statusCode, result.body);
        }
        log.info('[Notifier] Telegram message sent.');
    }
}
