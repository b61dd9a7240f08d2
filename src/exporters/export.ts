import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LeaderboardRow } from '../types/index.js';
import { writeFileAtomic } from '../cache/stage-cache.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'csv' | 'json' | 'markdown';

export const EXPORT_EXTENSIONS: Record<ExportFormat, string> = {
    csv: 'csv',
    json: 'json',
    markdown: 'md',
};

const COLUMNS = [
    'method',
    'method_category',
    'benchmark',
    'metric',
    'value',
    'unit',
    'split',
    'paper_id',
    'paper_title',
    'evidence',
] as const;

type Column = (typeof COLUMNS)[number];

// ─── Main Export Function ────────────────────────────────

/**
 * Render leaderboard rows. The output carries no timestamps, so the same rows
 * always render to the same bytes.
 */
export function renderLeaderboard(rows: readonly LeaderboardRow[], format: ExportFormat): string {
    switch (format) {
        case 'csv':
            return exportCSV(rows);
        case 'json':
            return exportJson(rows);
        case 'markdown':
            return exportMarkdown(rows);
    }
}

/**
 * Render and write the leaderboard atomically.
 */
export function writeLeaderboard(rows: readonly LeaderboardRow[], outputPath: string, format: ExportFormat): void {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileAtomic(outputPath, renderLeaderboard(rows, format));
    logger.info({ format, outputPath, rows: rows.length }, 'Leaderboard exported');
}

// ─── Format Implementations ─────────────────────────────

function cells(row: LeaderboardRow): Record<Column, string> {
    return {
        method: row.method,
        method_category: row.methodCategory ?? '',
        benchmark: row.benchmark,
        metric: row.metric,
        value: String(row.value),
        unit: row.unit ?? '',
        split: row.split ?? '',
        paper_id: row.paperId,
        paper_title: row.paperTitle,
        evidence: row.evidence,
    };
}

function exportCSV(rows: readonly LeaderboardRow[]): string {
    const quote = (value: string): string => (/[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value);

    let csv = COLUMNS.join(',') + '\n';
    for (const row of rows) {
        const values = cells(row);
        csv += COLUMNS.map((column) => quote(values[column])).join(',') + '\n';
    }
    return csv;
}

function exportJson(rows: readonly LeaderboardRow[]): string {
    return JSON.stringify(rows.map(cells), null, 2) + '\n';
}

function exportMarkdown(rows: readonly LeaderboardRow[]): string {
    const esc = (value: string): string => value.replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ');

    let markdown = '| ' + COLUMNS.join(' | ') + ' |\n';
    markdown += '|' + COLUMNS.map(() => ' --- ').join('|') + '|\n';
    for (const row of rows) {
        const values = cells(row);
        markdown += '| ' + COLUMNS.map((column) => esc(values[column])).join(' | ') + ' |\n';
    }
    return markdown;
}
