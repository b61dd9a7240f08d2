import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import type { MetadataFilterConfig } from '../types/index.js';
import { parseSnapshotLine, readSnapshot, scanSnapshot } from '../sources/snapshot.js';
import { filterCandidates, matchedKeywords, matchesMetadata } from '../filters/metadata-filter.js';
import { extractArxivId, stripDoiPrefix, toIsoDate } from '../sources/utils.js';
import { ConfigError } from '../utils/errors.js';
import { makePaper, makeTempDir, removeDir } from './helpers.js';

function filterConfig(overrides: Partial<MetadataFilterConfig> = {}): MetadataFilterConfig {
    return {
        keywordGroups: [],
        categories: [],
        excludeTitleKeywords: [],
        requireDoi: false,
        maxScan: -1,
        ...overrides,
    };
}

function snapshotLine(id: string, title: string, extra: Record<string, unknown> = {}): string {
    return JSON.stringify({
        id,
        title,
        abstract: '  A study of\n  robust models. ',
        categories: 'cs.LG stat.ML',
        update_date: '2024-03-01',
        versions: [{ version: 'v1', created: 'Mon, 15 Jan 2024 10:00:00 GMT' }],
        ...extra,
    });
}

describe('Source utils', () => {
    describe('extractArxivId', () => {
        it('should strip the version from new-style ids', () => {
            expect(extractArxivId('2401.01234v2')).toBe('2401.01234');
        });

        it('should read ids from abs and pdf URLs', () => {
            expect(extractArxivId('https://arxiv.org/abs/2401.01234v2')).toBe('2401.01234');
            expect(extractArxivId('https://arxiv.org/pdf/2312.00001')).toBe('2312.00001');
        });

        it('should accept the arXiv: prefix and old-style ids', () => {
            expect(extractArxivId('arXiv:2401.01234')).toBe('2401.01234');
            expect(extractArxivId('math/0601001v1')).toBe('math/0601001');
        });

        it('should return null for non-ids', () => {
            expect(extractArxivId('not an id')).toBeNull();
            expect(extractArxivId(null)).toBeNull();
        });
    });

    it('should strip DOI URL prefixes', () => {
        expect(stripDoiPrefix('https://doi.org/10.1234/test')).toBe('10.1234/test');
        expect(stripDoiPrefix('')).toBeNull();
    });

    it('should reduce ISO and RFC 2822 dates to YYYY-MM-DD', () => {
        expect(toIsoDate('2024-03-01')).toBe('2024-03-01');
        expect(toIsoDate('Mon, 2 Apr 2007 19:18:42 GMT')).toBe('2007-04-02');
        expect(toIsoDate('someday')).toBeNull();
    });
});

describe('parseSnapshotLine', () => {
    it('should normalize a well-formed line', () => {
        const record = parseSnapshotLine(snapshotLine('2401.00001', 'Robust\n  Models', { doi: 'https://doi.org/10.1/x' }));

        expect(record).not.toBeNull();
        expect(record?.id).toBe('2401.00001');
        expect(record?.title).toBe('Robust Models');
        expect(record?.abstract).toBe('A study of robust models.');
        expect(record?.categories).toEqual(['cs.LG', 'stat.ML']);
        expect(record?.submittedAt).toBe('2024-01-15');
        expect(record?.updatedAt).toBe('2024-03-01');
        expect(record?.doi).toBe('10.1/x');
    });

    it('should fall back to the update date without versions', () => {
        const record = parseSnapshotLine(snapshotLine('2401.00001', 'T', { versions: null }));
        expect(record?.submittedAt).toBe('2024-03-01');
    });

    it('should keep the whole line in raw', () => {
        const record = parseSnapshotLine(snapshotLine('2401.00001', 'T', { journal_ref: 'ICML 2024' }));
        expect(record?.raw['journal_ref']).toBe('ICML 2024');
    });

    it('should reject invalid JSON, missing titles and unreadable ids', () => {
        expect(parseSnapshotLine('{not json')).toBeNull();
        expect(parseSnapshotLine(JSON.stringify({ id: '2401.00001' }))).toBeNull();
        expect(parseSnapshotLine(JSON.stringify({ id: 'garbage', title: 'T' }))).toBeNull();
    });
});

describe('matchesMetadata', () => {
    const spurious = filterConfig({ keywordGroups: [{ fields: ['title'], keywords: ['spurious correlation'] }] });

    it('should pass a title containing the keyword group phrase', () => {
        expect(matchesMetadata(makePaper('a', { title: 'Spurious Correlations in Deep Learning' }), spurious)).toBe(true);
    });

    it('should reject a title without it', () => {
        expect(matchesMetadata(makePaper('b', { title: 'Image Segmentation Survey' }), spurious)).toBe(false);
    });

    it('should require a match in every keyword group', () => {
        const config = filterConfig({
            keywordGroups: [
                { fields: ['title', 'abstract'], keywords: ['robust'] },
                { fields: ['abstract'], keywords: ['imagenet', 'cifar'] },
            ],
        });

        expect(matchesMetadata(makePaper('a', { title: 'Robust nets', abstract: 'Results on CIFAR-10.' }), config)).toBe(true);
        expect(matchesMetadata(makePaper('b', { title: 'Robust nets', abstract: 'Results on MNIST.' }), config)).toBe(false);
    });

    it('should match categories case-insensitively', () => {
        const config = filterConfig({ categories: ['CS.CV'] });
        expect(matchesMetadata(makePaper('a', { categories: ['cs.LG', 'cs.CV'] }), config)).toBe(true);
        expect(matchesMetadata(makePaper('b', { categories: ['math.OC'] }), config)).toBe(false);
    });

    it('should apply inclusive date bounds and reject unknown dates', () => {
        const config = filterConfig({ dateFrom: '2024-01-01', dateTo: '2024-01-31' });
        expect(matchesMetadata(makePaper('a', { submittedAt: '2024-01-01' }), config)).toBe(true);
        expect(matchesMetadata(makePaper('b', { submittedAt: '2024-01-31' }), config)).toBe(true);
        expect(matchesMetadata(makePaper('c', { submittedAt: '2024-02-01' }), config)).toBe(false);
        expect(matchesMetadata(makePaper('d', { submittedAt: null }), config)).toBe(false);
    });

    it('should exclude titles by keyword and honor requireDoi', () => {
        expect(matchesMetadata(makePaper('a', { title: 'A Survey of Things' }), filterConfig({ excludeTitleKeywords: ['survey'] }))).toBe(false);
        expect(matchesMetadata(makePaper('b'), filterConfig({ requireDoi: true }))).toBe(false);
        expect(matchesMetadata(makePaper('c', { doi: '10.1/x' }), filterConfig({ requireDoi: true }))).toBe(true);
    });

    it('should list matched keywords in configuration order', () => {
        const paper = makePaper('a', { title: 'CIFAR and ImageNet results' });
        expect(matchedKeywords(paper, { fields: ['title'], keywords: ['imagenet', 'mnist', 'cifar'] })).toEqual(['imagenet', 'cifar']);
    });

    it('should be idempotent when filtering its own output', () => {
        const papers = [
            makePaper('a', { title: 'Spurious correlation removal' }),
            makePaper('b', { title: 'Unrelated' }),
            makePaper('c', { title: 'On spurious correlations' }),
        ];
        const once = filterCandidates(papers, spurious);
        expect(once.map((paper) => paper.id)).toEqual(['a', 'c']);
        expect(filterCandidates(once, spurious)).toEqual(once);
    });
});

describe('Snapshot scanning', () => {
    let dir = '';

    afterEach(() => {
        if (dir) removeDir(dir);
    });

    function writeSnapshot(lines: string[]): string {
        dir = makeTempDir();
        const file = path.join(dir, 'snapshot.jsonl');
        fs.writeFileSync(file, lines.join('\n') + '\n');
        return file;
    }

    it('should count malformed lines and skip blank ones', async () => {
        const file = writeSnapshot([
            snapshotLine('2401.00001', 'Spurious Correlations in Deep Learning'),
            '',
            '{broken',
            snapshotLine('2401.00002', 'Image Segmentation Survey'),
        ]);

        const kinds: string[] = [];
        for await (const line of readSnapshot(file)) kinds.push(line.kind === 'record' ? line.record.id : `malformed@${line.lineNumber}`);
        expect(kinds).toEqual(['2401.00001', 'malformed@3', '2401.00002']);
    });

    it('should keep matching records in snapshot order without duplicates', async () => {
        const file = writeSnapshot([
            snapshotLine('2401.00003', 'Spurious correlation in NLP'),
            snapshotLine('2401.00001', 'Spurious Correlations in Deep Learning'),
            snapshotLine('2401.00002', 'Image Segmentation Survey'),
            snapshotLine('2401.00003v2', 'Spurious correlation in NLP'),
            '{broken',
        ]);

        const scan = await scanSnapshot(file, filterConfig({ keywordGroups: [{ fields: ['title'], keywords: ['spurious correlation'] }] }));

        expect(scan.candidates.map((paper) => paper.id)).toEqual(['2401.00003', '2401.00001']);
        expect(scan.scanned).toBe(4);
        expect(scan.malformed).toBe(1);
    });

    it('should stop after maxScan lines', async () => {
        const file = writeSnapshot([
            snapshotLine('2401.00001', 'One'),
            snapshotLine('2401.00002', 'Two'),
            snapshotLine('2401.00003', 'Three'),
        ]);

        const scan = await scanSnapshot(file, filterConfig({ maxScan: 2 }));
        expect(scan.candidates.map((paper) => paper.id)).toEqual(['2401.00001', '2401.00002']);
        expect(scan.scanned).toBe(2);
    });

    it('should fail with a configuration error when the snapshot is missing', async () => {
        dir = makeTempDir();
        await expect(scanSnapshot(path.join(dir, 'nope.jsonl'), filterConfig())).rejects.toBeInstanceOf(ConfigError);
    });
});
