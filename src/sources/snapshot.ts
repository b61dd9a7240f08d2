import { createReadStream, existsSync } from 'node:fs';
import { createInterface } from 'node:readline';
import { z } from 'zod';
import type { MetadataFilterConfig, PaperRecord } from '../types/index.js';
import { matchesMetadata } from '../filters/metadata-filter.js';
import { ConfigError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { collapseWhitespace, extractArxivId, stripDoiPrefix, toIsoDate } from './utils.js';

const logger = getLogger();

/**
 * One line of the arXiv OAI metadata snapshot. Extra fields are kept in `raw`.
 */
const snapshotLineSchema = z
    .object({
        id: z.string().min(1),
        title: z.string().min(1),
        abstract: z.string().nullish(),
        categories: z.string().nullish(),
        update_date: z.string().nullish(),
        doi: z.string().nullish(),
        versions: z.array(z.object({ created: z.string().nullish() }).passthrough()).nullish(),
    })
    .passthrough();

/**
 * Turn one snapshot line into a PaperRecord, or null if it is malformed.
 */
export function parseSnapshotLine(line: string): PaperRecord | null {
    let json: unknown;
    try {
        json = JSON.parse(line);
    } catch {
        return null;
    }

    const parsed = snapshotLineSchema.safeParse(json);
    if (!parsed.success) return null;

    const entry = parsed.data;
    const id = extractArxivId(entry.id);
    if (!id) return null;

    const firstVersion = entry.versions?.[0]?.created;
    const updatedAt = toIsoDate(entry.update_date);

    return {
        id,
        title: collapseWhitespace(entry.title),
        abstract: collapseWhitespace(entry.abstract ?? ''),
        categories: (entry.categories ?? '').split(/\s+/).filter((category) => category.length > 0),
        submittedAt: toIsoDate(firstVersion) ?? updatedAt,
        updatedAt,
        doi: stripDoiPrefix(entry.doi),
        raw: entry,
    };
}

export type SnapshotLine = { kind: 'record'; record: PaperRecord } | { kind: 'malformed'; lineNumber: number };

/**
 * Stream the snapshot line by line. Blank lines are skipped silently.
 */
export async function* readSnapshot(path: string, signal?: AbortSignal): AsyncGenerator<SnapshotLine> {
    if (!existsSync(path)) {
        throw new ConfigError(`Metadata snapshot not found: ${path}`, 'snapshot');
    }

    const lines = createInterface({ input: createReadStream(path, 'utf-8'), crlfDelay: Infinity });
    let lineNumber = 0;

    try {
        for await (const line of lines) {
            lineNumber++;
            if (signal?.aborted) return;
            if (line.trim().length === 0) continue;

            const record = parseSnapshotLine(line);
            yield record ? { kind: 'record', record } : { kind: 'malformed', lineNumber };
        }
    } finally {
        lines.close();
    }
}

export interface SnapshotScan {
    candidates: PaperRecord[];
    scanned: number;
    malformed: number;
}

/**
 * Scan the snapshot and keep the records that satisfy the metadata predicate.
 * Output order follows the snapshot.
 */
export async function scanSnapshot(
    path: string,
    config: MetadataFilterConfig,
    signal?: AbortSignal
): Promise<SnapshotScan> {
    const candidates: PaperRecord[] = [];
    const seen = new Set<string>();
    let scanned = 0;
    let malformed = 0;

    logger.info({ path }, 'Scanning metadata snapshot');

    for await (const line of readSnapshot(path, signal)) {
        if (config.maxScan >= 0 && scanned + malformed >= config.maxScan) break;

        if (line.kind === 'malformed') {
            malformed++;
            logger.debug({ lineNumber: line.lineNumber }, 'Skipping malformed snapshot line');
            continue;
        }

        scanned++;
        if (seen.has(line.record.id)) continue;
        if (matchesMetadata(line.record, config)) {
            seen.add(line.record.id);
            candidates.push(line.record);
        }

        if (scanned % 100000 === 0) {
            logger.info({ scanned, candidates: candidates.length }, 'Scan progress');
        }
    }

    logger.info({ scanned, malformed, candidates: candidates.length }, 'Metadata scan complete');
    return { candidates, scanned, malformed };
}
