/**
 * src/utils/runLock.ts
 *
 * Keeps two runs from working on the same state file at once. The lock is a
 * sibling file created with O_EXCL holding the owner's PID; a lock left by a
 * process that no longer exists is taken over. A lock without a PID yet is
 * only stale once it is older than FRESH_LOCK_MS: its owner may not have
 * written the PID yet.
 */

import * as fs from 'fs';
import { log } from 'crawlee';
import { RunLockError, errorMessage } from './errors.js';

const FRESH_LOCK_MS = 5000;

export interface RunLock {
    readonly path: string;
    release(): void;
}

function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (err) {
        // EPERM: the process exists but belongs to someone else.
        return err instanceof Error && 'code' in err && err.code === 'EPERM';
    }
}

function readHolder(lockPath: string): number | null {
    try {
        const pid = Number.parseInt(fs.readFileSync(lockPath, 'utf-8').trim(), 10);
        return Number.isInteger(pid) && pid > 0 ? pid : null;
    } catch {
        return null;
    }
}

function isFresh(lockPath: string): boolean {
    try {
        return Date.now() - fs.statSync(lockPath).mtimeMs < FRESH_LOCK_MS;
    } catch {
        return false;
    }
}

function tryCreate(lockPath: string): boolean {
    try {
        fs.writeFileSync(lockPath, String(process.pid), { encoding: 'utf-8', flag: 'wx' });
        return true;
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'EEXIST') return false;
        throw err;
    }
}

/** @throws RunLockError when a live process holds the lock. */
export function acquireRunLock(lockPath: string, alive: (pid: number) => boolean = isProcessAlive): RunLock {
    if (!tryCreate(lockPath)) {
        const holder = readHolder(lockPath);
        if (holder !== null ? alive(holder) : isFresh(lockPath)) {
            throw new RunLockError(lockPath, holder);
        }
        log.warning(`[RunLock] Removing stale lock ${lockPath} (pid ${holder ?? 'unknown'}).`);
        fs.rmSync(lockPath, { force: true });
        if (!tryCreate(lockPath)) {
            throw new RunLockError(lockPath, readHolder(lockPath));
        }
    }

    let released = false;
    return {
        path: lockPath,
        release(): void {
            if (released) return;
            released = true;
            try {
                fs.rmSync(lockPath, { force: true });
            } catch (err) {
                log.warning(`[RunLock] Could not remove ${lockPath}: ${errorMessage(err)}`);
            }
        },
    };
}
