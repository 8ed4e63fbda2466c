/**
 * src/utils/seenStore.ts
 *
 * Persistent record of announcement IDs already processed — survives process
 * restarts so the next run only looks at what is new.
 *
 * STRUCTURE ON DISK:
 * {
 *   "version": 1,
 *   "ids": ["176543", "176540", ...]   // most recent first
 * }
 *
 * Older files of the shape {"titles": [176543, "176540", ...]} are still
 * read; they are rewritten in the current shape on the next save.
 *
 * RECENCY:
 * merge() puts the IDs on this run's listing first (listing order), then the
 * previously seen IDs that are no longer listed, and cuts the tail at the
 * limit. The list therefore holds the `limit` most recently seen IDs.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { log } from 'crawlee';
import { StateSaveError, errorMessage } from './errors.js';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Previously processed IDs, most recent first. */
export type SeenState = string[];

const idValue = z.union([z.string().min(1), z.number().int().nonnegative()]).transform((v) => String(v));

const currentFileSchema = z.object({
    version: z.literal(1),
    ids: z.array(idValue),
});

const legacyFileSchema = z.object({
    titles: z.array(idValue),
});

const storeFileSchema = z.union([currentFileSchema, legacyFileSchema]);

interface StoreFile {
    version: 1;
    ids: string[];
}

export const DEFAULT_SEEN_LIMIT = 100;

// ─── Pure helpers ─────────────────────────────────────────────────────────────

function dedupeInOrder(ids: Iterable<string>): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const id of ids) {
        if (seen.has(id)) continue;
        seen.add(id);
        out.push(id);
    }
    return out;
}

/**
 * New seen state after a run: `listed` first, then prior IDs no longer
 * listed, truncated to `limit`.
 */
export function mergeSeenState(
    prior: readonly string[],
    listed: readonly string[],
    limit = DEFAULT_SEEN_LIMIT
): SeenState {
    return dedupeInOrder([...listed, ...prior]).slice(0, limit);
}

// ─── Store ────────────────────────────────────────────────────────────────────

export class SeenStore {
    constructor(
        readonly filePath: string,
        readonly limit = DEFAULT_SEEN_LIMIT
    ) {}

    /** Never throws: a missing, unreadable or malformed file is an empty state. */
    load(): SeenState {
        if (!fs.existsSync(this.filePath)) {
            log.info(`[SeenStore] No state file at ${this.filePath} — starting fresh.`);
            return [];
        }

        let raw: string;
        try {
            raw = fs.readFileSync(this.filePath, 'utf-8');
        } catch (err) {
            log.warning(`[SeenStore] State file unreadable — starting fresh. (${errorMessage(err)})`);
            return [];
        }

        let parsedJson: unknown;
        try {
            parsedJson = JSON.parse(raw);
        } catch (err) {
            log.warning(`[SeenStore] State file corrupt — starting fresh. (${errorMessage(err)})`);
            return [];
        }

        const parsed = storeFileSchema.safeParse(parsedJson);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            log.warning(
                `[SeenStore] State file has an unexpected shape — starting fresh. ` +
                `(${issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown issue'})`
            );
            return [];
        }

        const ids = dedupeInOrder('ids' in parsed.data ? parsed.data.ids : parsed.data.titles);
        log.info(`[SeenStore] Loaded ${ids.length} previously seen IDs.`);
        return ids;
    }

    /**
     * Writes the state truncated to the limit: temp file, then rename over the
     * target, so a reader never sees a half-written file.
     * @throws StateSaveError
     */
    save(state: readonly string[]): SeenState {
        const ids = dedupeInOrder(state).slice(0, this.limit);
        const file: StoreFile = {
            version: 1,
            ids,
        };

        const tmp = `${this.filePath}.tmp`;
        try {
            fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
            fs.writeFileSync(tmp, JSON.stringify(file, null, 2), 'utf-8');
            fs.renameSync(tmp, this.filePath);
        } catch (err) {
            try {
                fs.rmSync(tmp, { force: true });
            } catch (cleanupErr) {
                log.debug(`[SeenStore] Could not remove ${tmp}: ${errorMessage(cleanupErr)}`);
            }
            throw new StateSaveError(this.filePath, errorMessage(err), { cause: err });
        }

        log.info(`[SeenStore] Saved ${ids.length} IDs to ${this.filePath}.`);
        return ids;
    }

    merge(prior: readonly string[], listed: readonly string[]): SeenState {
        return mergeSeenState(prior, listed, this.limit);
    }
}
