// src/durable/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

import { errnoCode } from "../structured_error";

export type FsyncMode = "BEST_EFFORT" | "REQUIRED";

function isFatalBestEffort(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

/**
 * Write `content` to `filePath` through a sibling temp file, fsync and rename,
 * so readers only ever observe the previous or the new content.
 *
 * Under BEST_EFFORT, fsync failures other than ENOSPC/EIO are collected in
 * `warnings` instead of thrown.
 */
export function atomicWriteFileSync(params: {
    filePath: string;
    content: Buffer | string;
    mode?: number;
    fsyncMode: FsyncMode;
    warnings: string[];
}): void {
    const { filePath, content, fsyncMode, warnings } = params;
    const mode = params.mode ?? 0o644;

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString("hex")}`;
    const dir = path.dirname(filePath);

    try {
        fs.mkdirSync(dir, { recursive: true, mode: 0o755 });

        // tmp always 0600 initially
        fs.writeFileSync(tmp, content, { mode: 0o600 });

        try {
            const fd = fs.openSync(tmp, "r+");
            try {
                fs.fdatasyncSync(fd);
            } finally {
                fs.closeSync(fd);
            }
        } catch (e) {
            const code = errnoCode(e);
            if (fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw e;
            warnings.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${tmp}`);
        }

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);

        // directory entry for the rename
        try {
            const dirFd = fs.openSync(dir, "r");
            try {
                fs.fsyncSync(dirFd);
            } finally {
                fs.closeSync(dirFd);
            }
        } catch (e) {
            const code = errnoCode(e);
            if (fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw e;
            warnings.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${dir}`);
        }
    } catch (e) {
        if (fs.existsSync(tmp)) fs.rmSync(tmp, { force: true });
        throw e;
    }
}

export function atomicWriteJsonSync(params: {
    filePath: string;
    data: unknown;
    mode?: number;
    fsyncMode: FsyncMode;
    warnings: string[];
}): void {
    atomicWriteFileSync({
        filePath: params.filePath,
        content: JSON.stringify(params.data, null, 2),
        mode: params.mode,
        fsyncMode: params.fsyncMode,
        warnings: params.warnings,
    });
}

/**
 * Append one line and fsync before returning. Used for append-only records
 * where a crash right after the call must not lose the line. If the file's
 * last line was torn (no trailing newline), a newline is written first so
 * the new line never joins it.
 */
export function appendLineDurableSync(filePath: string, line: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true, mode: 0o755 });
    const fd = fs.openSync(filePath, "a+");
    try {
        const size = fs.fstatSync(fd).size;
        let prefix = "";
        if (size > 0) {
            const last = Buffer.alloc(1);
            fs.readSync(fd, last, 0, 1, size - 1);
            if (last[0] !== 0x0a) prefix = "\n";
        }
        fs.writeSync(fd, prefix + line);
        fs.fsyncSync(fd);
    } finally {
        fs.closeSync(fd);
    }
}
