// src/recipe_io/lock.ts

import * as fs from "fs";
import * as path from "path";
import { ErrorFactory } from "../structured_error";

export interface LockHandle {
    fd: number;
    lockPath: string;
}

export interface LockIdentity {
    package: string;
    command: string;
}

type LockRecord = Record<string, unknown>;

function isLockRecord(value: unknown): value is LockRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sleep(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

function backoff(attempt: number): number {
    // 50,100,200,400,800,... capped at 1000
    const v = 50 * Math.pow(2, attempt);
    return Math.min(v, 1000);
}

function errnoCode(e: unknown): string | undefined {
    if (typeof e === "object" && e !== null && "code" in e) {
        const code = e.code;
        return typeof code === "string" ? code : undefined;
    }
    return undefined;
}

function pidAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (e) {
        // EPERM: the process exists but belongs to someone else
        return errnoCode(e) === "EPERM";
    }
}

function readLockRecord(lockPath: string): LockRecord | null {
    try {
        const parsed: unknown = JSON.parse(fs.readFileSync(lockPath, "utf8"));
        return isLockRecord(parsed) ? parsed : null;
    } catch (e) {
        if (errnoCode(e) === "ENOENT") return {};
        return null;
    }
}

/** Reason the existing lock may be taken over, or null while it is live. */
function staleReason(lockPath: string, staleTtlMs: number): string | null {
    const record = readLockRecord(lockPath);
    if (record === null) return "UNREADABLE";

    const pid = record.pid;
    if (typeof pid === "number" && !pidAlive(pid)) return `PID_DEAD pid=${pid}`;

    const started = typeof record.started_ms === "number" ? record.started_ms : 0;
    const age = Date.now() - started;
    if (age > staleTtlMs) return `AGE age=${age}ms`;
    return null;
}

/**
 * Take the per-target build lock. Creation uses O_CREAT|O_EXCL so only one
 * driver wins; a lock left by a dead process or older than `staleTtlMs` is
 * removed and retried.
 */
export async function acquireBuildLock(params: {
    lockPath: string;
    timeoutMs: number;
    warnings: string[];
    identity: LockIdentity;
    staleTtlMs: number;
}): Promise<LockHandle> {
    const { lockPath, timeoutMs, warnings, identity, staleTtlMs } = params;

    fs.mkdirSync(path.dirname(lockPath), { recursive: true, mode: 0o755 });

    const started = Date.now();
    let attempt = 0;

    while (true) {
        try {
            const fd = fs.openSync(lockPath, "wx");
            const lockData = {
                ...identity,
                pid: process.pid,
                started_utc: new Date().toISOString(),
                started_ms: Date.now(),
            };
            fs.writeSync(fd, JSON.stringify(lockData, null, 2));
            return { fd, lockPath };
        } catch (e) {
            if (errnoCode(e) !== "EEXIST") throw e;
        }

        const stale = staleReason(lockPath, staleTtlMs);
        if (stale !== null) {
            warnings.push(`STALE_LOCK(${stale}) ${lockPath}`);
            try {
                fs.unlinkSync(lockPath);
            } catch (e) {
                // Another driver removed it first
                if (errnoCode(e) !== "ENOENT") throw e;
            }
            continue;
        }

        if (Date.now() - started >= timeoutMs) {
            throw ErrorFactory.lockHeld(lockPath);
        }

        const wait = backoff(attempt++);
        warnings.push(`LOCK_RETRY after ${wait}ms on ${lockPath}`);
        await sleep(wait);
    }
}

export function releaseBuildLock(handle: LockHandle): void {
    fs.closeSync(handle.fd);
    try {
        fs.unlinkSync(handle.lockPath);
    } catch (e) {
        if (errnoCode(e) !== "ENOENT") throw e;
    }
}
