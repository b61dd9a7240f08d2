import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import type { ContentFilterConfig } from '../types/index.js';
import { FRONT_MATTER, extractCaptions, headingTitle, splitSections } from '../parser/sections.js';
import { PaperParser, PARSER_VERSION } from '../parser/paper-parser.js';
import { PdfjsLoader } from '../parser/pdf-loader.js';
import { evaluateContent } from '../filters/content-filter.js';
import { TextPdfLoader, makeParsed, makeTempDir, pdfBytes, removeDir } from './helpers.js';

const PAPER_TEXT = [
    'Deep Nets for X',
    'Alice Example',
    'Abstract',
    'We study things.',
    '1 Introduction',
    'Intro text.',
    '2 Method',
    'Our method.',
    '3 Experiments',
    'Table 1: Results on ImageNet.',
    'We get 81.2.',
    'References',
    '[1] A paper.',
].join('\n');

describe('Sections', () => {
    describe('headingTitle', () => {
        it('should recognize numbered and known headings', () => {
            expect(headingTitle('1 Introduction')).toBe('Introduction');
            expect(headingTitle('4.2 Results on ImageNet')).toBe('Results on ImageNet');
            expect(headingTitle('IV. EVALUATION')).toBe('EVALUATION');
            expect(headingTitle('Conclusion:')).toBe('Conclusion');
        });

        it('should ignore sentences and numeric rows', () => {
            expect(headingTitle('We study things.')).toBeNull();
            expect(headingTitle('3 12.5 13.2 14.1')).toBeNull();
            expect(headingTitle('1 We propose a method that works well.')).toBeNull();
            expect(headingTitle('')).toBeNull();
        });
    });

    it('should split text into ordered sections with front matter', () => {
        const sections = splitSections(PAPER_TEXT);

        expect(sections.map((section) => section.title)).toEqual([
            FRONT_MATTER,
            'Abstract',
            'Introduction',
            'Method',
            'Experiments',
            'References',
        ]);
        expect(sections.map((section) => section.order)).toEqual([0, 1, 2, 3, 4, 5]);
        expect(sections[0]?.content).toBe('Deep Nets for X\nAlice Example');
        expect(sections[4]?.content).toBe('Table 1: Results on ImageNet.\nWe get 81.2.');
    });

    it('should omit an empty front matter section', () => {
        expect(splitSections('1 Introduction\nBody')).toEqual([{ title: 'Introduction', content: 'Body', order: 0 }]);
    });

    it('should collect captions once each', () => {
        const text = 'Figure 1: Overview of the model.\nbody\nTable 2. Accuracy on CIFAR.\nFigure 1: Overview of the model.\nFigures are nice';
        expect(extractCaptions(text)).toEqual(['Figure 1: Overview of the model.', 'Table 2. Accuracy on CIFAR.']);
    });
});

describe('PaperParser', () => {
    let workDir: string;
    let loader: TextPdfLoader;

    beforeEach(() => {
        workDir = makeTempDir();
        loader = new TextPdfLoader();
    });

    afterEach(() => {
        removeDir(workDir);
    });

    function writePdf(name: string, pages: string[]): string {
        const file = path.join(workDir, `${name}.pdf`);
        fs.writeFileSync(file, pdfBytes(pages.join('\f')));
        return file;
    }

    it('should parse every page into text and sections', async () => {
        const parser = new PaperParser(workDir, { maxPages: 0 }, loader);
        const file = writePdf('ok', ['1 Introduction\nText a', '3 Experiments\nTable 2: Accuracy.\nMore']);

        const { paper, cached } = await parser.parse('2401.00001', file);

        expect(cached).toBe(false);
        expect(paper.status).toBe('ok');
        expect(paper.reason).toBeNull();
        expect(paper.pages).toHaveLength(2);
        expect(paper.fullText).toBe('1 Introduction\nText a\n\n3 Experiments\nTable 2: Accuracy.\nMore');
        expect(paper.sections.map((section) => [section.title, section.content])).toEqual([
            ['Introduction', 'Text a'],
            ['Experiments', 'Table 2: Accuracy.\nMore'],
        ]);
        expect(paper.captions).toEqual(['Table 2: Accuracy.']);
        expect(paper.parserVersion).toBe(PARSER_VERSION);
    });

    it('should keep unreadable pages as empty and mark the paper partial', async () => {
        const parser = new PaperParser(workDir, { maxPages: 0 }, loader);
        const file = writePdf('partial', ['1 Introduction\nFine', '<<broken>>', 'Tail']);

        const { paper } = await parser.parse('2401.00002', file);

        expect(paper.status).toBe('partial');
        expect(paper.failedPages).toEqual([2]);
        expect(paper.pages).toEqual(['1 Introduction\nFine', '', 'Tail']);
        expect(paper.reason).toBe('PartialParse: pages 2 could not be read');
    });

    it('should fail when no page yields text', async () => {
        const parser = new PaperParser(workDir, { maxPages: 0 }, loader);
        const file = writePdf('broken', ['<<broken>>', '<<broken>>']);

        const { paper } = await parser.parse('2401.00003', file);
        expect(paper.status).toBe('failed');
        expect(paper.reason).toBe('DocumentUnreadable: no page yielded text');
        expect(paper.fullText).toBe('');
    });

    it('should fail on bytes the loader cannot open', async () => {
        const parser = new PaperParser(workDir, { maxPages: 0 }, loader);
        const file = path.join(workDir, 'garbage.pdf');
        fs.writeFileSync(file, 'not a pdf');

        const { paper } = await parser.parse('2401.00004', file);
        expect(paper.status).toBe('failed');
        expect(paper.reason).toBe('DocumentUnreadable: invalid PDF (Invalid PDF structure)');
    });

    it('should fail on a missing file', async () => {
        const parser = new PaperParser(workDir, { maxPages: 0 }, loader);
        const { paper } = await parser.parse('2401.00005', path.join(workDir, 'missing.pdf'));
        expect(paper.status).toBe('failed');
        expect(paper.reason?.startsWith('DocumentUnreadable: cannot read')).toBe(true);
    });

    it('should stop at maxPages', async () => {
        const parser = new PaperParser(workDir, { maxPages: 1 }, loader);
        const file = writePdf('long', ['One', 'Two', 'Three']);

        const { paper } = await parser.parse('2401.00006', file);
        expect(paper.pages).toEqual(['One']);
    });

    it('should serve repeated parses from the cache', async () => {
        const parser = new PaperParser(workDir, { maxPages: 0 }, loader);
        const file = writePdf('cached', ['1 Introduction\nBody']);

        await parser.parse('2401.00007', file);
        const second = await parser.parse('2401.00007', file);

        expect(second.cached).toBe(true);
        expect(loader.loads).toBe(1);
        expect(fs.readdirSync(parser.cacheStore.directory)).toEqual(['2401.00007.json']);
    });

    it('should re-parse entries written by another parser version', async () => {
        const parser = new PaperParser(workDir, { maxPages: 0 }, loader);
        const file = writePdf('stale', ['1 Introduction\nBody']);
        parser.cacheStore.set('2401.00008', { ...makeParsed('2401.00008', 'old text'), parserVersion: PARSER_VERSION + 1 });

        const { paper, cached } = await parser.parse('2401.00008', file);
        expect(cached).toBe(false);
        expect(paper.fullText).toBe('1 Introduction\nBody');
    });
});

/**
 * Smallest well-formed one-page PDF showing `text` in Helvetica, with a correct xref table.
 */
function onePagePdf(text: string): Uint8Array {
    const stream = `BT /F1 12 Tf 72 720 Td (${text}) Tj ET`;
    const objects = [
        '<< /Type /Catalog /Pages 2 0 R >>',
        '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
        '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 5 0 R >> >> /Contents 4 0 R >>',
        `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`,
        '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
    ];

    let pdf = '%PDF-1.4\n';
    const offsets: number[] = [];
    objects.forEach((body, index) => {
        offsets.push(pdf.length);
        pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
    });
    const xrefOffset = pdf.length;
    pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
    for (const offset of offsets) pdf += `${String(offset).padStart(10, '0')} 00000 n \n`;
    pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

    return new TextEncoder().encode(pdf);
}

describe('PdfjsLoader', () => {
    it('should reject bytes that are not a PDF', async () => {
        await expect(new PdfjsLoader().load(new TextEncoder().encode('plain text'))).rejects.toThrow();
    });

    it('should read the text of a real PDF page', async () => {
        const document = await new PdfjsLoader().load(onePagePdf('Results 81.2 accuracy'));
        try {
            expect(document.numPages).toBe(1);
            expect(await document.pageText(1)).toBe('Results 81.2 accuracy');
        } finally {
            await document.close();
        }
    });

    it('should reject a page that does not exist', async () => {
        const document = await new PdfjsLoader().load(onePagePdf('Only page'));
        try {
            await expect(document.pageText(2)).rejects.toThrow();
        } finally {
            await document.close();
        }
    });

    it('should be the parser default for files on disk', async () => {
        const workDir = makeTempDir();
        try {
            const file = path.join(workDir, 'real.pdf');
            fs.writeFileSync(file, onePagePdf('Results 81.2 accuracy'));

            const { paper } = await new PaperParser(workDir, { maxPages: 0 }).parse('2401.00042', file);
            expect(paper).toMatchObject({ status: 'ok', reason: null, pages: ['Results 81.2 accuracy'], failedPages: [] });
        } finally {
            removeDir(workDir);
        }
    });
});

describe('evaluateContent', () => {
    const config: ContentFilterConfig = {
        keywords: ['imagenet', 'cifar'],
        requiredSectionKeywords: ['experiment', 'result'],
        minTextLength: 50,
    };

    it('should include a long paper with a keyword and an experiments section', () => {
        const decision = evaluateContent(makeParsed('a', PAPER_TEXT), config);

        expect(decision.included).toBe(true);
        expect(decision.reasons).toEqual([]);
        expect(decision.matchedKeywords).toEqual(['imagenet']);
        expect(decision.matchedSections).toEqual(['Experiments']);
        expect(decision.textLength).toBe(PAPER_TEXT.length);
    });

    it('should list every reason a paper is rejected', () => {
        const decision = evaluateContent(makeParsed('b', '1 Introduction\nShort.'), config);

        expect(decision.included).toBe(false);
        expect(decision.reasons).toEqual([
            'text too short (21 < 50)',
            'no content keyword found',
            'no section matching experiment/result',
        ]);
    });

    it('should reject failed parses', () => {
        const failed = { ...makeParsed('c', PAPER_TEXT), status: 'failed' as const, reason: 'DocumentUnreadable: x' };
        expect(evaluateContent(failed, config).reasons[0]).toBe('parse failed: DocumentUnreadable: x');
    });

    it('should accept everything when no keywords are configured', () => {
        const decision = evaluateContent(makeParsed('d', 'anything at all'), { keywords: [], requiredSectionKeywords: [], minTextLength: 0 });
        expect(decision.included).toBe(true);
    });
});
