// src/atomic_write.ts

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

export type FsyncMode = 'BEST_EFFORT' | 'REQUIRED';

export interface AtomicWriteParams {
    filePath: string;
    content: Buffer | string;
    mode: number;
    fsyncMode: FsyncMode;
    warnings: string[];
}

function errnoCode(e: unknown): string | undefined {
    if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
        return e.code;
    }
    return undefined;
}

// disk full / IO errors are never downgraded to a warning
function isFatalBestEffort(code?: string): boolean {
    return code === 'ENOSPC' || code === 'EIO';
}

function syncPath(target: string, flags: string, fsyncMode: FsyncMode, warnings: string[]): void {
    try {
        const fd = fs.openSync(target, flags);
        try {
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e) {
        const code = errnoCode(e);
        if (fsyncMode === 'REQUIRED' || isFatalBestEffort(code)) throw e;
        warnings.push(`FSYNC_WARN(${code || 'UNKNOWN'}) on ${target}`);
    }
}

/**
 * Write to a sibling temp file, fsync, then rename over the target.
 * Readers see either the old file or the new one, never a torn write.
 */
export function atomicWriteFileSync(params: AtomicWriteParams): void {
    const { filePath, content, mode, fsyncMode, warnings } = params;

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString('hex')}`;
    const dir = path.dirname(filePath);

    try {
        fs.mkdirSync(dir, { recursive: true, mode: 0o755 });
        fs.writeFileSync(tmp, content, { mode: 0o600 });
        syncPath(tmp, 'r+', fsyncMode, warnings);

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);

        syncPath(dir, 'r', fsyncMode, warnings);
    } catch (e) {
        if (fs.existsSync(tmp)) {
            try {
                fs.unlinkSync(tmp);
            } catch (cleanupErr) {
                warnings.push(`TMP_CLEANUP_FAILED(${errnoCode(cleanupErr) || 'UNKNOWN'}) on ${tmp}`);
            }
        }
        throw e;
    }
}

export function atomicWriteJsonSync(params: Omit<AtomicWriteParams, 'content'> & { data: unknown }): void {
    atomicWriteFileSync({
        filePath: params.filePath,
        content: JSON.stringify(params.data, null, 2) + '\n',
        mode: params.mode,
        fsyncMode: params.fsyncMode,
        warnings: params.warnings,
    });
}
