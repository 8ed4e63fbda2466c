/**
 * src/main.ts
 *
 * ENTRY POINT — one pass of the K-Startup announcement watcher.
 *
 * Meant to be started by an external scheduler (cron, CI schedule); each
 * invocation does a single best-effort run and exits.
 *
 * EXIT CODES
 * ──────────
 *  0  run completed or aborted cleanly (see log for which)
 *  1  invalid environment, or another run holds the state-file lock
 */

import 'dotenv/config';
import { log } from 'crawlee';
import { loadEnvOrExit } from './config/env.js';
import { buildCrawlConfig } from './config/crawlConfig.js';
import { CrawlOrchestrator } from './orchestrator.js';
import { initFileLogger, closeFileLogger } from './utils/fileLogger.js';
import { acquireRunLock, type RunLock } from './utils/runLock.js';
import { RunLockError, errorMessage } from './utils/errors.js';

const env = loadEnvOrExit();

// ─── File Logger (first, so the whole run lands in the file) ──────────────────
const logPath = initFileLogger(env.LOG_FILE);

// ─── Logging ──────────────────────────────────────────────────────────────────
const isVerbose = process.argv.includes('--verbose') || process.argv.includes('-v');
const LEVELS: Record<string, (typeof log.LEVELS)[keyof typeof log.LEVELS]> = {
    DEBUG: log.LEVELS.DEBUG,
    INFO: log.LEVELS.INFO,
    WARNING: log.LEVELS.WARNING,
    ERROR: log.LEVELS.ERROR,
    OFF: log.LEVELS.OFF,
};
const levelName = isVerbose ? 'DEBUG' : env.CRAWLEE_LOG_LEVEL.toUpperCase();
log.setLevel(LEVELS[levelName] ?? log.LEVELS.INFO);

// ─── Main ─────────────────────────────────────────────────────────────────────

async function main(): Promise<number> {
    const config = buildCrawlConfig(env);

    log.info('╔══════════════════════════════════════════════╗');
    log.info('║  K-Startup Announcement Watcher              ║');
    log.info('╚══════════════════════════════════════════════╝');
    log.info(`Listing URL   : ${config.listingUrl}`);
    log.info(`State file    : ${config.stateFilePath} (keeps ${config.seenStateLimit})`);
    log.info(`Engines       : ${config.engines.join(' → ')}`);
    log.info(`Telegram      : ${config.deliveryToken && config.channelId ? 'CONFIGURED ✓' : 'NOT CONFIGURED — log only'}`);
    log.info(`Log file      : ${logPath ?? 'disabled'}`);

    let lock: RunLock;
    try {
        lock = acquireRunLock(`${config.stateFilePath}.lock`);
    } catch (err) {
        if (err instanceof RunLockError) {
            log.error(`[Main] ${err.message}. Exiting.`);
            return 1;
        }
        throw err;
    }

    try {
        const summary = await new CrawlOrchestrator(config).run();
        log.info(
            `[Main] Run ${summary.runId} ${summary.status}` +
            `${summary.abortReason ? ` (${summary.abortReason})` : ''} in ${summary.durationSec}s — ` +
            `listed=${summary.candidates} new=${summary.newItems} qualifying=${summary.qualifying} ` +
            `notified=${summary.notified} deliveryFailures=${summary.deliveryFailures} ` +
            `extractionFailures=${summary.extractionFailures} statePersisted=${summary.statePersisted}`
        );
        return 0;
    } finally {
        lock.release();
    }
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        log.exception(err instanceof Error ? err : new Error(errorMessage(err)), '[Main] Unexpected failure');
        process.exitCode = 1;
    })
    .finally(() => {
        closeFileLogger();
    });
