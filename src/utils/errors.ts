/**
 * src/utils/errors.ts
 *
 * Typed failures raised by the watcher pipeline.
 *
 * FATAL vs RECOVERABLE
 * ─────────────────────
 *  • NoEngineAvailableError, and navigation errors on the LISTING page, abort
 *    the run: no notifications, no state write.
 *  • ExtractionError (one detail page) and DeliveryError (one message) are
 *    logged and counted; the run continues.
 *  • StateSaveError is logged; the summary reports statePersisted=false.
 *  • RunLockError stops the process before anything is crawled.
 */

export type WatcherErrorCode =
    | 'NO_ENGINE_AVAILABLE'
    | 'NAVIGATION_TIMEOUT'
    | 'NAVIGATION_ERROR'
    | 'EXTRACTION_ERROR'
    | 'DELIVERY_ERROR'
    | 'STATE_SAVE_ERROR'
    | 'RUN_LOCKED';

export class WatcherError extends Error {
    readonly code: WatcherErrorCode;

    constructor(code: WatcherErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export interface EngineFailure {
    engine: string;
    reason: string;
}

export class NoEngineAvailableError extends WatcherError {
    readonly attempts: EngineFailure[];

    constructor(attempts: EngineFailure[]) {
        const tried = attempts.map((a) => `${a.engine} (${a.reason})`).join('; ');
        super('NO_ENGINE_AVAILABLE', `No browser engine could be launched. Tried: ${tried || 'none'}`);
        this.attempts = attempts;
    }
}

export class NavigationTimeoutError extends WatcherError {
    readonly url: string;
    readonly timeoutMs: number;

    constructor(url: string, timeoutMs: number, options?: { cause?: unknown }) {
        super('NAVIGATION_TIMEOUT', `Navigation to ${url} timed out after ${timeoutMs} ms`, options);
        this.url = url;
        this.timeoutMs = timeoutMs;
    }
}

export class NavigationError extends WatcherError {
    readonly url: string;
    readonly status: number | null;

    constructor(url: string, detail: string, status: number | null = null, options?: { cause?: unknown }) {
        super('NAVIGATION_ERROR', `Navigation to ${url} failed: ${detail}`, options);
        this.url = url;
        this.status = status;
    }
}

export class ExtractionError extends WatcherError {
    readonly id: string;

    constructor(id: string, detail: string, options?: { cause?: unknown }) {
        super('EXTRACTION_ERROR', `Extraction failed for item ${id}: ${detail}`, options);
        this.id = id;
    }
}

const MAX_BODY_IN_MESSAGE = 300;

export class DeliveryError extends WatcherError {
    readonly status: number | null;
    readonly responseBody: string;

    constructor(detail: string, status: number | null = null, responseBody = '', options?: { cause?: unknown }) {
        const body = responseBody.trim().replace(/\s+/g, ' ');
        const shown = body.length > MAX_BODY_IN_MESSAGE ? `${body.slice(0, MAX_BODY_IN_MESSAGE)}…` : body;
        super('DELIVERY_ERROR', `Notification delivery failed: ${detail}${shown ? ` ${shown}` : ''}`, options);
        this.status = status;
        this.responseBody = responseBody;
    }
}

export class StateSaveError extends WatcherError {
    readonly filePath: string;

    constructor(filePath: string, detail: string, options?: { cause?: unknown }) {
        super('STATE_SAVE_ERROR', `Could not save seen state to ${filePath}: ${detail}`, options);
        this.filePath = filePath;
    }
}

export class RunLockError extends WatcherError {
    readonly lockPath: string;
    readonly holderPid: number | null;

    constructor(lockPath: string, holderPid: number | null) {
        super(
            'RUN_LOCKED',
            `Another run holds ${lockPath}${holderPid !== null ? ` (pid ${holderPid})` : ''}`
        );
        this.lockPath = lockPath;
        this.holderPid = holderPid;
    }
}

/** Message text of any thrown value. */
export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
