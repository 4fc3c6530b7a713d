// src/durable/lock.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

import { LockHeldError, errnoCode } from "../structured_error";

export interface LockHandle {
    fd: number;
    lockPath: string;
    /** Written into the lock file; release only removes a file that still carries it */
    token: string;
}

interface LockRecord {
    pid?: number;
    token?: string;
    started_ms?: number;
}

const DEFAULT_STALE_LOCK_MS = 600000; // 10 minutes
const DEFAULT_UNREADABLE_GRACE_MS = 5000;

function sleep(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

function backoff(attempt: number): number {
    // 50,100,200,400,800,... capped at 1000
    return Math.min(50 * Math.pow(2, attempt), 1000);
}

function readLockRecord(lockPath: string): LockRecord {
    const parsed: unknown = JSON.parse(fs.readFileSync(lockPath, "utf8"));
    if (typeof parsed !== "object" || parsed === null) return {};
    const rec: LockRecord = {};
    if ("pid" in parsed && typeof parsed.pid === "number") rec.pid = parsed.pid;
    if ("token" in parsed && typeof parsed.token === "string") rec.token = parsed.token;
    if ("started_ms" in parsed && typeof parsed.started_ms === "number") rec.started_ms = parsed.started_ms;
    return rec;
}

function isPidAlive(pid: number): boolean {
    try {
        // signal 0 checks existence without signalling
        process.kill(pid, 0);
        return true;
    } catch (e) {
        return errnoCode(e) === "EPERM";
    }
}

/** Milliseconds since the lock file was last modified, or null if it is gone. */
function lockFileAge(lockPath: string): number | null {
    try {
        return Date.now() - fs.statSync(lockPath).mtimeMs;
    } catch (e) {
        if (errnoCode(e) === "ENOENT") return null;
        throw e;
    }
}

/** Unlink, tolerating a concurrent unlink by another process. */
function unlinkIfPresent(p: string): void {
    try {
        fs.unlinkSync(p);
    } catch (e) {
        if (errnoCode(e) !== "ENOENT") throw e;
    }
}

/**
 * Exclusive lock file (O_CREAT | O_EXCL). A lock is stale when its PID is
 * dead, or when it names no PID and is older than `staleTtlMs`. A lock whose
 * PID is alive is never taken over. An unreadable lock counts as held (its
 * owner may still be writing it) until its mtime is older than
 * `unreadableGraceMs`. Stale locks are removed and acquisition retried.
 * Throws LockHeldError after `timeoutMs`.
 */
export async function acquireLock(params: {
    lockPath: string;
    timeoutMs: number;
    warnings: string[];
    identity: Record<string, unknown>;
    staleTtlMs?: number;
    unreadableGraceMs?: number;
}): Promise<LockHandle> {
    const { lockPath, timeoutMs, warnings, identity } = params;
    const staleMs = params.staleTtlMs ?? DEFAULT_STALE_LOCK_MS;
    const graceMs = params.unreadableGraceMs ?? DEFAULT_UNREADABLE_GRACE_MS;

    fs.mkdirSync(path.dirname(lockPath), { recursive: true, mode: 0o755 });

    const started = Date.now();
    let attempt = 0;

    while (true) {
        let fd: number | null = null;
        try {
            fd = fs.openSync(lockPath, "wx");
        } catch (e) {
            if (errnoCode(e) !== "EEXIST") throw e;
        }
        if (fd !== null) {
            const token = crypto.randomBytes(8).toString("hex");
            const lockData = {
                ...identity,
                pid: process.pid,
                token,
                started_utc: new Date().toISOString(),
                started_ms: Date.now(),
            };
            try {
                fs.writeSync(fd, JSON.stringify(lockData, null, 2));
            } catch (e) {
                fs.closeSync(fd);
                unlinkIfPresent(lockPath);
                throw e;
            }
            return { fd, lockPath, token };
        }

        let record: LockRecord | null = null;
        try {
            record = readLockRecord(lockPath);
        } catch (readErr) {
            // deleted in between: retry
            if (errnoCode(readErr) === "ENOENT") continue;
        }

        let stale = false;
        if (record === null) {
            const mtimeAge = lockFileAge(lockPath);
            if (mtimeAge === null) continue;
            if (mtimeAge > graceMs) {
                stale = true;
                warnings.push(`STALE_LOCK(UNREADABLE) ${lockPath} age=${mtimeAge}ms`);
            }
        } else if (record.pid !== undefined) {
            if (!isPidAlive(record.pid)) {
                stale = true;
                warnings.push(`STALE_LOCK(PID_DEAD) ${lockPath} pid=${record.pid}`);
            }
        } else {
            const age = Date.now() - (record.started_ms ?? 0);
            if (age > staleMs) {
                stale = true;
                warnings.push(`STALE_LOCK(AGE) ${lockPath} age=${age}ms`);
            }
        }
        if (stale) {
            unlinkIfPresent(lockPath);
            continue;
        }

        if (Date.now() - started >= timeoutMs) {
            throw new LockHeldError(lockPath);
        }

        const wait = backoff(attempt++);
        warnings.push(`LOCK_RETRY after ${wait}ms on ${lockPath}`);
        await sleep(wait);
    }
}

/**
 * Close the handle and remove the lock file, unless the file on disk no
 * longer carries this handle's token (another holder took it over).
 * Returns whether the file was removed.
 */
export function releaseLock(handle: LockHandle): boolean {
    fs.closeSync(handle.fd);
    let record: LockRecord;
    try {
        record = readLockRecord(handle.lockPath);
    } catch (e) {
        if (errnoCode(e) === "ENOENT") return false;
        record = {};
    }
    if (record.token !== handle.token) return false;
    unlinkIfPresent(handle.lockPath);
    return true;
}
