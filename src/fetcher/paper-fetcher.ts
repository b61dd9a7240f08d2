import { existsSync, mkdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { FetchConfig } from '../types/index.js';
import type { PdfSource } from '../sources/arxiv-pdf.js';
import { cacheKey, writeFileAtomic } from '../cache/stage-cache.js';
import { HttpError } from '../utils/http-client.js';
import { FetchError, errorMessage } from '../utils/errors.js';
import { retryDelay, sleep } from '../utils/rate-limit.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const PDF_MAGIC = '%PDF-';

export interface FetchedPdf {
    paperId: string;
    path: string;
    /** True when served from the local cache without a network call */
    cached: boolean;
}

/**
 * Resolves paper identifiers to local PDF files.
 *
 * Cached files are returned without touching the network. Downloads retry transient
 * failures with exponential backoff and land in the cache through a temp-file rename.
 */
export class PaperFetcher {
    readonly directory: string;

    constructor(
        workDir: string,
        private readonly config: FetchConfig,
        private readonly source: PdfSource
    ) {
        this.directory = join(workDir, 'pdf');
        mkdirSync(this.directory, { recursive: true });
    }

    pathFor(paperId: string): string {
        return join(this.directory, `${cacheKey(paperId)}.pdf`);
    }

    isCached(paperId: string): boolean {
        const path = this.pathFor(paperId);
        return existsSync(path) && statSync(path).size > 0;
    }

    /**
     * Return the local path of the paper's PDF, downloading it if needed.
     * Throws FetchError when the PDF cannot be obtained.
     */
    async fetch(paperId: string): Promise<FetchedPdf> {
        const path = this.pathFor(paperId);
        if (this.isCached(paperId)) {
            logger.debug({ paperId }, 'PDF cache hit');
            return { paperId, path, cached: true };
        }

        const bytes = await this.download(paperId);
        writeFileAtomic(path, bytes);
        logger.debug({ paperId, bytes: bytes.length }, 'PDF downloaded');
        return { paperId, path, cached: false };
    }

    /**
     * Read a cached PDF.
     */
    read(paperId: string): Uint8Array {
        return new Uint8Array(readFileSync(this.pathFor(paperId)));
    }

    private async download(paperId: string): Promise<Uint8Array> {
        const { maxRetries, initialBackoffMs, maxBackoffMs } = this.config;
        let lastError: unknown;

        for (let attempt = 0; attempt <= maxRetries; attempt++) {
            let bytes: Uint8Array;
            try {
                bytes = await this.source.fetchPdf(paperId);
            } catch (error) {
                lastError = error;

                if (error instanceof HttpError && !error.retryable && error.status >= 400 && error.status < 500) {
                    throw new FetchError(
                        `PDF not available for ${paperId} (HTTP ${error.status})`,
                        'NotFound',
                        paperId,
                        attempt + 1,
                        { cause: error }
                    );
                }

                if (attempt < maxRetries) {
                    const retryAfterMs = error instanceof HttpError ? error.retryAfterMs : undefined;
                    const backoff = retryDelay(attempt, initialBackoffMs, maxBackoffMs, retryAfterMs);
                    logger.warn(
                        { paperId, attempt: attempt + 1, backoffMs: Math.round(backoff), error: errorMessage(error) },
                        'PDF download failed, retrying'
                    );
                    await sleep(backoff);
                }
                continue;
            }

            if (!isPdf(bytes)) {
                throw new FetchError(
                    `Downloaded file for ${paperId} is not a PDF (${bytes.length} bytes)`,
                    'CorruptDownload',
                    paperId,
                    attempt + 1
                );
            }
            return bytes;
        }

        throw new FetchError(
            `PDF download for ${paperId} failed after ${maxRetries + 1} attempts: ${errorMessage(lastError)}`,
            'TransientFailure',
            paperId,
            maxRetries + 1,
            { cause: lastError }
        );
    }
}

function isPdf(bytes: Uint8Array): boolean {
    if (bytes.length < PDF_MAGIC.length) return false;
    return Buffer.from(bytes.subarray(0, 1024)).toString('latin1').includes(PDF_MAGIC);
}
