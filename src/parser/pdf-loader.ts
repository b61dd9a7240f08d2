/**
 * Opened PDF document, read page by page.
 */
export interface PdfDocumentHandle {
    readonly numPages: number;
    /** Text of a 1-based page; rejects when the page cannot be read */
    pageText(pageNumber: number): Promise<string>;
    close(): Promise<void>;
}

/**
 * Opens PDF bytes. Rejects when the document itself is unreadable.
 */
export interface PdfLoader {
    load(bytes: Uint8Array): Promise<PdfDocumentHandle>;
}

/**
 * pdf.js-backed loader. The library is imported on first use so commands that
 * never parse (scan, leaderboard) do not pay for loading it.
 */
export class PdfjsLoader implements PdfLoader {
    async load(bytes: Uint8Array): Promise<PdfDocumentHandle> {
        const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');

        // pdf.js takes ownership of the buffer it is given
        const task = getDocument({ data: new Uint8Array(bytes), isEvalSupported: false, verbosity: 0 });
        const document = await task.promise;

        return {
            numPages: document.numPages,
            async pageText(pageNumber: number): Promise<string> {
                const page = await document.getPage(pageNumber);
                try {
                    const content = await page.getTextContent();
                    let text = '';
                    for (const item of content.items) {
                        if (!('str' in item)) continue;
                        text += item.str;
                        text += item.hasEOL ? '\n' : ' ';
                    }
                    return text.replace(/[ \t]+\n/g, '\n').replace(/[ \t]{2,}/g, ' ').trim();
                } finally {
                    page.cleanup();
                }
            },
            async close(): Promise<void> {
                await task.destroy();
            },
        };
    }
}
