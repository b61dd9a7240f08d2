import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type {
    ExtractionRecord,
    ExtractionResult,
    ModelProvider,
    ModelRequest,
    ModelResponse,
    ParsedPaper,
    PaperRecord,
} from '../types/index.js';
import { splitSections } from '../parser/sections.js';
import { PARSER_VERSION } from '../parser/paper-parser.js';
import type { PdfDocumentHandle, PdfLoader } from '../parser/pdf-loader.js';
import type { PdfSource } from '../sources/arxiv-pdf.js';

/**
 * Shared fixtures for the test suites.
 */

export function makeTempDir(prefix = 'sotaboard-test-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

export function makePaper(id: string, overrides: Partial<PaperRecord> = {}): PaperRecord {
    return {
        id,
        title: `Paper ${id}`,
        abstract: 'We evaluate a new method on standard benchmarks.',
        categories: ['cs.LG'],
        submittedAt: '2024-01-15',
        updatedAt: '2024-01-15',
        doi: null,
        raw: {},
        ...overrides,
    };
}

export function makeParsed(paperId: string, fullText: string): ParsedPaper {
    return {
        paperId,
        status: 'ok',
        reason: null,
        pages: [fullText],
        failedPages: [],
        sections: splitSections(fullText),
        captions: [],
        fullText,
        parserVersion: PARSER_VERSION,
        parsedAt: '2024-02-01T00:00:00.000Z',
    };
}

export function sampleRecord(title = 'Sample Paper'): ExtractionRecord {
    return {
        paper: { title, paperType: 'Method', domain: 'Machine Learning', applicationField: 'Image Classification' },
        methods: [
            { name: 'FastNet', category: 'CNN', proposed: true },
            { name: 'ResNet-50', category: 'CNN', proposed: false },
        ],
        benchmarks: ['ImageNet'],
        results: [
            {
                method: 'FastNet',
                benchmark: 'ImageNet',
                metric: 'Top-1 Accuracy',
                value: 81.2,
                unit: '%',
                split: 'val',
                evidence: 'FastNet reaches 81.2% top-1 accuracy on ImageNet.',
            },
            {
                method: 'ResNet-50',
                benchmark: 'ImageNet',
                metric: 'Top-1 Accuracy',
                value: 76.1,
                unit: '%',
                split: 'val',
                evidence: 'ResNet-50 obtains 76.1%.',
            },
        ],
    };
}

export function successResult(paperId: string, record: ExtractionRecord, schemaVersion = '1'): ExtractionResult {
    return {
        paperId,
        schemaVersion,
        provider: 'gemini',
        model: 'test-model',
        attempts: 1,
        createdAt: '2024-02-01T00:00:00.000Z',
        status: 'success',
        record,
    };
}

const USAGE = { promptTokens: 10, completionTokens: 5, totalTokens: 15 };

export function completion(text: string): ModelResponse {
    return { kind: 'completion', text, usage: USAGE };
}

/**
 * Provider stand-in that answers from a script and records every request.
 * Once the script runs out it keeps repeating the last answer.
 */
export class ScriptedProvider implements ModelProvider {
    readonly name = 'gemini';
    readonly model = 'test-model';
    readonly requests: ModelRequest[] = [];

    constructor(
        private readonly script: Array<ModelResponse | Error | ((request: ModelRequest) => ModelResponse | Promise<ModelResponse>)>,
        readonly supportsPdfInput = false
    ) {}

    get calls(): number {
        return this.requests.length;
    }

    async complete(request: ModelRequest): Promise<ModelResponse> {
        this.requests.push(request);
        const step = this.script[Math.min(this.requests.length - 1, this.script.length - 1)];
        if (step === undefined) throw new Error('ScriptedProvider has an empty script');
        if (step instanceof Error) throw step;
        return typeof step === 'function' ? step(request) : step;
    }
}

/**
 * PDF source stand-in serving fixed bytes per identifier.
 */
export class FakePdfSource implements PdfSource {
    readonly name = 'fake';
    readonly requested: string[] = [];

    constructor(private readonly handler: (paperId: string) => Uint8Array | Error) {}

    async fetchPdf(paperId: string): Promise<Uint8Array> {
        this.requested.push(paperId);
        const result = this.handler(paperId);
        if (result instanceof Error) throw result;
        return result;
    }
}

export function pdfBytes(text: string): Uint8Array {
    return new TextEncoder().encode(`%PDF-1.7\n${text}`);
}

/**
 * PDF loader stand-in: the "document" is the file's text after the header,
 * split into pages on form feeds. A page containing "<<broken>>" fails to extract.
 */
export class TextPdfLoader implements PdfLoader {
    loads = 0;

    async load(bytes: Uint8Array): Promise<PdfDocumentHandle> {
        this.loads++;
        const text = new TextDecoder().decode(bytes);
        if (!text.startsWith('%PDF-')) throw new Error('Invalid PDF structure');
        const pages = text.slice(text.indexOf('\n') + 1).split('\f');

        return {
            numPages: pages.length,
            async pageText(pageNumber: number): Promise<string> {
                const page = pages[pageNumber - 1] ?? '';
                if (page.includes('<<broken>>')) throw new Error(`bad content stream on page ${pageNumber}`);
                return page;
            },
            async close(): Promise<void> {},
        };
    }
}
