import * as crypto from 'crypto';

export interface RunContext {
    runId: string;
    listingUrl: string;
    startedAt: string;
    startedAtMs: number;
}

export function createRunContext(listingUrl: string, now: () => number = Date.now): RunContext {
    const startedAtMs = now();
    return {
        runId: crypto.randomUUID(),
        listingUrl,
        startedAt: new Date(startedAtMs).toISOString(),
        startedAtMs,
    };
}

export function elapsedSeconds(ctx: RunContext, now: () => number = Date.now): number {
    return Math.round((now() - ctx.startedAtMs) / 100) / 10;
}
