import type { ExtractionResult, LeaderboardRow } from '../types/index.js';
import type { SotaboardDatabase } from '../storage/database.js';
import { normalizeValue } from '../extraction/metrics.js';

/**
 * Flatten successful extraction results into leaderboard rows.
 *
 * Pure: the output depends only on the input set, not its order. Percentages are
 * ranked as fractions next to values reported that way. Exact duplicates
 * (same method, benchmark, metric, value and paper) collapse to the first row seen
 * after sorting. Rows are ordered by benchmark, metric, value (descending), method, paper.
 */
export function aggregateLeaderboard(results: readonly ExtractionResult[]): LeaderboardRow[] {
    const rows: LeaderboardRow[] = [];

    for (const result of results) {
        if (result.status !== 'success') continue;
        const { record } = result;

        const categories = new Map(record.methods.map((method) => [method.name.trim().toLowerCase(), method.category]));

        for (const entry of record.results) {
            const { value, unit } = normalizeValue(entry) ?? entry;
            rows.push({
                method: entry.method.trim(),
                methodCategory: categories.get(entry.method.trim().toLowerCase()) ?? null,
                benchmark: entry.benchmark.trim(),
                metric: entry.metric.trim(),
                value,
                unit,
                split: entry.split,
                paperId: result.paperId,
                paperTitle: record.paper.title,
                evidence: entry.evidence,
            });
        }
    }

    rows.sort(compareRows);

    const seen = new Set<string>();
    return rows.filter((row) => {
        const key = JSON.stringify([row.method, row.benchmark, row.metric, row.value, row.paperId]);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
    });
}

/**
 * Rebuild the leaderboard from persisted results for one schema version.
 */
export function buildLeaderboard(db: SotaboardDatabase, schemaVersion: string): LeaderboardRow[] {
    return aggregateLeaderboard(db.listExtractions(schemaVersion, 'success'));
}

function compareRows(a: LeaderboardRow, b: LeaderboardRow): number {
    return (
        compareText(a.benchmark, b.benchmark) ||
        compareText(a.metric, b.metric) ||
        b.value - a.value ||
        compareText(a.method, b.method) ||
        compareText(a.paperId, b.paperId) ||
        compareText(a.split ?? '', b.split ?? '') ||
        compareText(a.unit ?? '', b.unit ?? '') ||
        compareText(a.evidence, b.evidence)
    );
}

// Locale-independent so output is identical across machines
function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}
