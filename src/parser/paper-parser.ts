import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { ParseConfig, ParsedPaper } from '../types/index.js';
import { StageCache } from '../cache/stage-cache.js';
import { ParseError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { PdfjsLoader, type PdfDocumentHandle, type PdfLoader } from './pdf-loader.js';
import { extractCaptions, splitSections } from './sections.js';

const logger = getLogger();

/**
 * Bump when the ParsedPaper layout or the text extraction changes; older cache entries are re-parsed.
 */
export const PARSER_VERSION = 1;

const parsedPaperSchema: z.ZodType<ParsedPaper> = z.object({
    paperId: z.string(),
    status: z.enum(['ok', 'partial', 'failed']),
    reason: z.string().nullable(),
    pages: z.array(z.string()),
    failedPages: z.array(z.number().int()),
    sections: z.array(z.object({ title: z.string(), content: z.string(), order: z.number().int() })),
    captions: z.array(z.string()),
    fullText: z.string(),
    parserVersion: z.number().int(),
    parsedAt: z.string(),
});

export interface ParseOutcome {
    paper: ParsedPaper;
    cached: boolean;
}

/**
 * Turns cached PDFs into ParsedPaper documents.
 *
 * A page that cannot be read is kept as an empty page and marks the document partial.
 * An unreadable document yields a failed ParsedPaper; neither case throws.
 */
export class PaperParser {
    private readonly cache: StageCache<ParsedPaper>;

    constructor(
        workDir: string,
        private readonly config: ParseConfig,
        private readonly loader: PdfLoader = new PdfjsLoader()
    ) {
        this.cache = new StageCache(workDir, 'parsed', parsedPaperSchema);
    }

    get cacheStore(): StageCache<ParsedPaper> {
        return this.cache;
    }

    async parse(paperId: string, pdfPath: string): Promise<ParseOutcome> {
        const cached = this.cache.get(paperId);
        if (cached && cached.parserVersion === PARSER_VERSION) {
            return { paper: cached, cached: true };
        }

        const paper = await this.parseFile(paperId, pdfPath);
        this.cache.set(paperId, paper);

        if (paper.status !== 'ok') {
            logger.warn({ paperId, status: paper.status, reason: paper.reason }, 'Paper parsed with problems');
        }
        return { paper, cached: false };
    }

    private async parseFile(paperId: string, pdfPath: string): Promise<ParsedPaper> {
        try {
            return await this.readDocument(paperId, pdfPath);
        } catch (error) {
            const reason = error instanceof ParseError ? `${error.kind}: ${error.message}` : errorMessage(error);
            return failedPaper(paperId, reason);
        }
    }

    private async readDocument(paperId: string, pdfPath: string): Promise<ParsedPaper> {
        const document = await this.open(pdfPath);

        const pageCount = this.config.maxPages > 0 ? Math.min(this.config.maxPages, document.numPages) : document.numPages;
        const pages: string[] = [];
        const failedPages: number[] = [];

        try {
            for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
                try {
                    pages.push(await document.pageText(pageNumber));
                } catch (error) {
                    logger.debug({ paperId, pageNumber, error: errorMessage(error) }, 'Page text extraction failed');
                    pages.push('');
                    failedPages.push(pageNumber);
                }
            }
        } finally {
            await document.close().catch((error: unknown) => {
                logger.debug({ paperId, error: errorMessage(error) }, 'Failed to release PDF document');
            });
        }

        if (pageCount === 0 || failedPages.length === pageCount) {
            throw new ParseError('no page yielded text', 'DocumentUnreadable');
        }

        const fullText = pages.join('\n\n');
        let status: ParsedPaper['status'] = 'ok';
        let reason: string | null = null;
        if (failedPages.length > 0) {
            status = 'partial';
            reason = `PartialParse: pages ${failedPages.join(', ')} could not be read`;
        }

        return {
            paperId,
            status,
            reason,
            pages,
            failedPages,
            sections: splitSections(fullText),
            captions: extractCaptions(fullText),
            fullText,
            parserVersion: PARSER_VERSION,
            parsedAt: new Date().toISOString(),
        };
    }

    private async open(pdfPath: string): Promise<PdfDocumentHandle> {
        let bytes: Uint8Array;
        try {
            bytes = new Uint8Array(readFileSync(pdfPath));
        } catch (error) {
            throw new ParseError(`cannot read ${pdfPath}`, 'DocumentUnreadable', { cause: error });
        }

        try {
            return await this.loader.load(bytes);
        } catch (error) {
            throw new ParseError(`invalid PDF (${errorMessage(error)})`, 'DocumentUnreadable', { cause: error });
        }
    }
}

function failedPaper(paperId: string, reason: string): ParsedPaper {
    return {
        paperId,
        status: 'failed',
        reason,
        pages: [],
        failedPages: [],
        sections: [],
        captions: [],
        fullText: '',
        parserVersion: PARSER_VERSION,
        parsedAt: new Date().toISOString(),
    };
}
