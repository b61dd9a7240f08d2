import { HttpClient, getHttpClient } from '../utils/http-client.js';

/**
 * Collaborator that turns a paper identifier into PDF bytes.
 * Implementations make a single attempt; retry policy belongs to the fetcher.
 */
export interface PdfSource {
    readonly name: string;
    fetchPdf(paperId: string): Promise<Uint8Array>;
}

/**
 * Downloads PDFs from arxiv.org (or a mirror with the same URL layout).
 */
export class ArxivPdfSource implements PdfSource {
    readonly name = 'arxiv';
    private readonly client: HttpClient;

    constructor(
        private readonly baseUrl: string,
        private readonly timeoutMs: number,
        client?: HttpClient
    ) {
        this.client = client ?? getHttpClient();
    }

    urlFor(paperId: string): string {
        return `${this.baseUrl.replace(/\/+$/, '')}/${paperId}`;
    }

    async fetchPdf(paperId: string): Promise<Uint8Array> {
        const response = await this.client.get<Uint8Array>(this.urlFor(paperId), {
            source: 'arxiv',
            responseType: 'buffer',
            timeout: this.timeoutMs,
            headers: { Accept: 'application/pdf' },
        });
        return response.data;
    }
}
