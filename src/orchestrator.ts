/**
 * src/orchestrator.ts
 *
 * ONE WATCHER RUN
 *
 *   init ──► session-opened ──► listing-scanned ──► processing ──► notifying
 *     │             │                                                  │
 *     ▼             ▼                                                  ▼
 *  aborted       aborted                                       state-persisted ──► done
 * (no engine)  (listing failed)
 *
 * RULES
 * ──────
 *  • Only engine startup and the listing page may abort a run. An aborted run
 *    sends nothing and leaves the state file untouched.
 *  • Every identifier new to this run is recorded as processed exactly once,
 *    whether it qualified, was filtered out, or failed extraction. A detail
 *    page that keeps failing is therefore not re-checked forever.
 *  • The browser is closed before any notification is sent.
 *  • State is written once, after notifications, regardless of delivery
 *    outcome, so a failed delivery is never re-sent by the next run. Every
 *    ID on this run's listing (new or already seen) goes to the front.
 */

import { log } from 'crawlee';
import type { CrawlConfig } from './config/crawlConfig.js';
import { openSession, type BrowserSession, type EngineLauncher, type PageHandle } from './utils/browserSession.js';
import { createPlaywrightLaunchers } from './utils/playwrightSession.js';
import { captureDiagnostics } from './utils/diagnostics.js';
import { SeenStore, type SeenState } from './utils/seenStore.js';
import { TelegramNotifier, formatPostMessage, type Notifier, type QualifyingPost } from './utils/notifier.js';
import { isEligible } from './utils/eligibility.js';
import { errorMessage } from './utils/errors.js';
import { createRunContext, elapsedSeconds } from './utils/runContext.js';
import { scanListing, toCandidates, type CandidateItem } from './extractors/listing.js';
import { extractDetail } from './extractors/detail.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type RunPhase =
    | 'init'
    | 'session-opened'
    | 'listing-scanned'
    | 'processing'
    | 'notifying'
    | 'state-persisted'
    | 'done'
    | 'aborted';

export type AbortReason = 'no-engine' | 'listing-failed';

export interface RunSummary {
    runId: string;
    status: 'completed' | 'aborted';
    abortReason?: AbortReason;
    engine?: string;
    candidates: number;
    newItems: number;
    qualifying: number;
    notified: number;
    deliveryFailures: number;
    extractionFailures: number;
    statePersisted: boolean;
    durationSec: number;
}

export interface SeenStateStore {
    load(): SeenState;
    save(state: readonly string[]): SeenState;
    merge(prior: readonly string[], listed: readonly string[]): SeenState;
}

export interface OrchestratorDeps {
    launchers: readonly EngineLauncher[];
    store: SeenStateStore;
    notifier: Notifier;
    captureDiagnostics: (page: PageHandle | null, dir: string) => Promise<unknown>;
}

interface ProcessingResult {
    processed: string[];
    pending: QualifyingPost[];
    extractionFailures: number;
}

// ─── Orchestrator ─────────────────────────────────────────────────────────────

export class CrawlOrchestrator {
    private readonly deps: OrchestratorDeps;
    private phase: RunPhase = 'init';

    constructor(private readonly config: CrawlConfig, deps: Partial<OrchestratorDeps> = {}) {
        this.deps = {
            launchers: deps.launchers ?? createPlaywrightLaunchers(config.engines, { userAgent: config.userAgent }),
            store: deps.store ?? new SeenStore(config.stateFilePath, config.seenStateLimit),
            notifier: deps.notifier ?? new TelegramNotifier({
                token: config.deliveryToken,
                chatId: config.channelId,
                apiBase: config.telegramApiBase,
                timeoutMs: config.notifyTimeoutMs,
            }),
            captureDiagnostics: deps.captureDiagnostics ?? captureDiagnostics,
        };
    }

    get currentPhase(): RunPhase {
        return this.phase;
    }

    private enter(phase: RunPhase): void {
        log.debug(`[Orchestrator] ${this.phase} → ${phase}`);
        this.phase = phase;
    }

    async run(): Promise<RunSummary> {
        const ctx = createRunContext(this.config.listingUrl);
        this.phase = 'init';
        log.info(`[Orchestrator] Starting run ${ctx.runId} at ${ctx.startedAt}`);

        const summary: RunSummary = {
            runId: ctx.runId,
            status: 'completed',
            candidates: 0,
            newItems: 0,
            qualifying: 0,
            notified: 0,
            deliveryFailures: 0,
            extractionFailures: 0,
            statePersisted: false,
            durationSec: 0,
        };
        const finish = (): RunSummary => {
            summary.durationSec = elapsedSeconds(ctx);
            return summary;
        };

        const prior = this.deps.store.load();

        let session: BrowserSession;
        try {
            session = await openSession(this.deps.launchers);
        } catch (err) {
            log.error(`[Orchestrator] ${errorMessage(err)}. Exiting without changes.`);
            this.enter('aborted');
            summary.status = 'aborted';
            summary.abortReason = 'no-engine';
            return finish();
        }
        summary.engine = session.engine;
        this.enter('session-opened');

        let result: ProcessingResult;
        let listed: string[];
        try {
            let candidates: CandidateItem[];
            try {
                candidates = await this.scan(session);
            } catch (err) {
                log.error(`[Orchestrator] Error during crawl: ${errorMessage(err)}`);
                await this.deps.captureDiagnostics(session.currentPage(), this.config.diagnosticsDir);
                this.enter('aborted');
                summary.status = 'aborted';
                summary.abortReason = 'listing-failed';
                return finish();
            }
            this.enter('listing-scanned');
            listed = candidates.map((c) => c.id);

            const seen = new Set(prior);
            const fresh = candidates.filter((c) => !seen.has(c.id));
            summary.candidates = candidates.length;
            summary.newItems = fresh.length;
            log.info(`[Orchestrator] New items to check: ${fresh.length} (of ${candidates.length} listed)`);

            this.enter('processing');
            result = await this.processItems(session, fresh);
        } finally {
            await session.close();
        }

        summary.extractionFailures = result.extractionFailures;
        summary.qualifying = result.pending.length;

        this.enter('notifying');
        await this.notifyAll(result.pending, summary);

        // Every ID still on the listing moves to the front, so an announcement
        // that stays up is never evicted and re-notified.
        const next = this.deps.store.merge(prior, listed);
        log.info(`[Orchestrator] Recording ${result.processed.length} processed and ${listed.length - result.processed.length} re-listed IDs`);
        try {
            this.deps.store.save(next);
            summary.statePersisted = true;
            this.enter('state-persisted');
        } catch (err) {
            log.error(`[Orchestrator] ${errorMessage(err)}`);
        }

        this.enter('done');
        return finish();
    }

    private async scan(session: BrowserSession): Promise<CandidateItem[]> {
        log.info(`[Orchestrator] Navigating to ${this.config.listingUrl}…`);
        const page = await session.navigate(this.config.listingUrl, this.config.navigationTimeoutMs);
        const ids = await scanListing(page);
        return toCandidates(this.config.listingUrl, ids);
    }

    private async processItems(session: BrowserSession, items: readonly CandidateItem[]): Promise<ProcessingResult> {
        const processed: string[] = [];
        const recorded = new Set<string>();
        const pending: QualifyingPost[] = [];
        let extractionFailures = 0;

        for (const item of items) {
            try {
                const detail = await extractDetail(session, item, {
                    navigationTimeoutMs: this.config.navigationTimeoutMs,
                    titleWaitMs: this.config.titleWaitMs,
                });
                if (isEligible(detail.eligibilityText)) {
                    pending.push({ ...detail, detailUrl: item.detailUrl });
                } else {
                    log.info(`[Orchestrator]   Skipping: Age '${detail.eligibilityText}' does not match criteria`);
                }
            } catch (err) {
                extractionFailures++;
                log.warning(`[Orchestrator]   Error processing ${item.detailUrl}: ${errorMessage(err)}`);
            } finally {
                if (!recorded.has(item.id)) {
                    recorded.add(item.id);
                    processed.push(item.id);
                }
            }
        }

        return { processed, pending, extractionFailures };
    }

    private async notifyAll(posts: readonly QualifyingPost[], summary: RunSummary): Promise<void> {
        if (posts.length === 0) {
            log.info('[Orchestrator] No new valid posts found.');
            return;
        }

        log.info(`[Orchestrator] Found ${posts.length} new valid posts`);
        for (const post of posts) {
            try {
                await this.deps.notifier.notify(formatPostMessage(post));
                summary.notified++;
            } catch (err) {
                summary.deliveryFailures++;
                log.error(`[Orchestrator] Failed to notify about ${post.id}: ${errorMessage(err)}`);
            }
        }
    }
}
