/**
 * PaperRecord: one entry of the arXiv metadata snapshot, normalized.
 * Immutable once read; every later stage refers to it by `id`.
 */
export interface PaperRecord {
    /** arXiv identifier without version suffix (e.g., "2401.01234" or "math/0601001") */
    readonly id: string;

    /** Title with whitespace collapsed */
    readonly title: string;

    /** Abstract with whitespace collapsed (empty string when missing) */
    readonly abstract: string;

    /** arXiv categories (e.g., ["cs.LG", "stat.ML"]) */
    readonly categories: readonly string[];

    /** Submission date of the first version as YYYY-MM-DD (null if unknown) */
    readonly submittedAt: string | null;

    /** Last update date as YYYY-MM-DD (null if unknown) */
    readonly updatedAt: string | null;

    /** DOI if the paper has been published */
    readonly doi: string | null;

    /** The snapshot line as read, for downstream auditing */
    readonly raw: Readonly<Record<string, unknown>>;
}

/**
 * Ordered sequence of papers surviving the metadata filter.
 */
export type CandidateSet = readonly PaperRecord[];

/**
 * Parse outcome for a whole document.
 * - ok: every page yielded text
 * - partial: at least one page failed and was recorded as empty
 * - failed: document unreadable, nothing extracted
 */
export type ParseStatus = 'ok' | 'partial' | 'failed';

/**
 * A heading-delimited block of document text.
 */
export interface ParsedSection {
    title: string;
    content: string;
    /** Position in document order (0-indexed) */
    order: number;
}

/**
 * Normalized document representation produced by the paper parser.
 * Cached on disk keyed by paper identifier.
 */
export interface ParsedPaper {
    paperId: string;
    status: ParseStatus;

    /** Why the document is partial/failed (null when ok) */
    reason: string | null;

    /** Page texts in order; a page that failed extraction is an empty string */
    pages: string[];

    /** 1-based numbers of pages whose extraction failed */
    failedPages: number[];

    sections: ParsedSection[];

    /** Figure and table captions found in the text (best-effort) */
    captions: string[];

    /** All page texts joined */
    fullText: string;

    /** Parser format version; a mismatch invalidates the cached entry */
    parserVersion: number;

    /** ISO timestamp */
    parsedAt: string;
}
