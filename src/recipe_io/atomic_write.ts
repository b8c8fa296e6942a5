// src/recipe_io/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

export type FsyncMode = "BEST_EFFORT" | "REQUIRED";

function errnoCode(e: unknown): string | undefined {
    if (typeof e === "object" && e !== null && "code" in e) {
        const code = e.code;
        return typeof code === "string" ? code : undefined;
    }
    return undefined;
}

function isFatalBestEffort(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

function fsyncPath(target: string, flags: string, fsyncMode: FsyncMode, warnings: string[]): void {
    try {
        const fd = fs.openSync(target, flags);
        try {
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e) {
        const code = errnoCode(e);
        if (fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw e;
        warnings.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${target}`);
    }
}

/**
 * Write `content` to `filePath` through a temp file and a rename, so a reader
 * never sees a half-written recipe. Non-fatal fsync failures land in `warnings`.
 */
export function atomicWriteFileSync(params: {
    filePath: string;
    content: Buffer | string;
    mode: number;
    fsyncMode: FsyncMode;
    warnings: string[];
}): void {
    const { filePath, content, mode, fsyncMode, warnings } = params;

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString("hex")}`;
    const dir = path.dirname(filePath);

    try {
        fs.mkdirSync(dir, { recursive: true, mode: 0o755 });

        // tmp always 0600 initially
        fs.writeFileSync(tmp, content, { mode: 0o600 });
        fsyncPath(tmp, "r+", fsyncMode, warnings);

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);

        fsyncPath(dir, "r", fsyncMode, warnings);
    } catch (e) {
        if (fs.existsSync(tmp)) {
            try {
                fs.unlinkSync(tmp);
            } catch (cleanupErr) {
                warnings.push(`TMP_CLEANUP_FAILED ${tmp}: ${cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr)}`);
            }
        }
        throw e;
    }
}
