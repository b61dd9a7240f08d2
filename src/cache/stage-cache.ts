import { mkdirSync, existsSync, readFileSync, readdirSync, renameSync, rmSync, statSync, unlinkSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Map a paper identifier to a file-system-safe key.
 * Old-style arXiv ids contain a slash ("math/0601001").
 */
export function cacheKey(paperId: string): string {
    return paperId.replace(/[^\w.-]/g, '_');
}

/**
 * Write a file so that readers see either nothing or the complete content.
 * The temp file lives in the same directory so the rename stays on one file system.
 */
export function writeFileAtomic(filePath: string, data: string | Uint8Array): void {
    const tempPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
    try {
        writeFileSync(tempPath, data);
        renameSync(tempPath, filePath);
    } catch (error) {
        rmSync(tempPath, { force: true });
        throw error;
    }
}

export interface StageCacheStats {
    stage: string;
    directory: string;
    entries: number;
    bytes: number;
}

/**
 * Per-stage JSON cache keyed by paper identifier.
 *
 * Entries are validated on read; an unreadable or non-conforming entry is treated
 * as absent so the stage recomputes it.
 */
export class StageCache<T> {
    readonly directory: string;

    constructor(
        workDir: string,
        readonly stage: string,
        private readonly schema: z.ZodType<T>
    ) {
        this.directory = join(workDir, stage);
        mkdirSync(this.directory, { recursive: true });
        logger.debug({ stage, directory: this.directory }, 'Stage cache initialized');
    }

    pathFor(paperId: string): string {
        return join(this.directory, `${cacheKey(paperId)}.json`);
    }

    /**
     * Read an entry, or null if absent or invalid.
     */
    get(paperId: string): T | null {
        const filePath = this.pathFor(paperId);
        if (!existsSync(filePath)) return null;

        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(filePath, 'utf-8'));
        } catch (error) {
            logger.warn({ paperId, stage: this.stage, error }, 'Unreadable cache entry, ignoring');
            return null;
        }

        const parsed = this.schema.safeParse(raw);
        if (!parsed.success) {
            logger.warn({ paperId, stage: this.stage }, 'Cache entry does not match the expected shape, ignoring');
            return null;
        }

        logger.debug({ paperId, stage: this.stage }, 'Cache hit');
        return parsed.data;
    }

    set(paperId: string, value: T): void {
        writeFileAtomic(this.pathFor(paperId), JSON.stringify(value));
    }
}

/**
 * Count finished entries with the given extension (temp files are not entries).
 */
export function directoryStats(stage: string, directory: string, extension: string): StageCacheStats {
    if (!existsSync(directory)) return { stage, directory, entries: 0, bytes: 0 };

    let entries = 0;
    let bytes = 0;
    for (const name of readdirSync(directory)) {
        if (!name.endsWith(extension)) continue;
        entries++;
        bytes += statSync(join(directory, name)).size;
    }
    return { stage, directory, entries, bytes };
}

export function clearDirectory(directory: string, extension: string): number {
    if (!existsSync(directory)) return 0;

    let removed = 0;
    for (const name of readdirSync(directory)) {
        if (name.endsWith(extension) || name.endsWith('.tmp')) {
            unlinkSync(join(directory, name));
            if (name.endsWith(extension)) removed++;
        }
    }
    logger.info({ directory, removed }, 'Cache cleared');
    return removed;
}
