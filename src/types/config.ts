import type { TaxonomyNodeInput } from './taxonomy.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Model providers with a built-in adapter.
 */
export type ProviderName = 'gemini' | 'openai' | 'ollama';

/**
 * Snapshot fields a keyword group can match against.
 */
export type MetadataField = 'title' | 'abstract';

/**
 * A paper must match at least one keyword of every configured group.
 */
export interface KeywordGroup {
    fields: MetadataField[];
    keywords: string[];
}

/**
 * Metadata filter configuration.
 */
export interface MetadataFilterConfig {
    keywordGroups: KeywordGroup[];
    /** Allowed arXiv categories (any-of); empty accepts all */
    categories: string[];
    /** Inclusive lower bound on the submission date (YYYY-MM-DD) */
    dateFrom?: string;
    /** Inclusive upper bound on the submission date (YYYY-MM-DD) */
    dateTo?: string;
    /** Reject papers whose title contains any of these */
    excludeTitleKeywords: string[];
    /** Only accept papers that carry a DOI */
    requireDoi: boolean;
    /** Stop scanning after this many snapshot records (-1 = unlimited) */
    maxScan: number;
}

/**
 * Paper fetcher configuration.
 */
export interface FetchConfig {
    baseUrl: string;
    concurrency: number;
    maxRetries: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
    timeoutMs: number;
    /** Cap on new downloads per run (-1 = unlimited) */
    maxDownloads: number;
    /** Try again papers remembered as NotFound */
    retryFailed: boolean;
}

/**
 * Paper parser configuration.
 */
export interface ParseConfig {
    /** Pages to extract per document (0 = all) */
    maxPages: number;
}

/**
 * Content filter configuration.
 */
export interface ContentFilterConfig {
    /** Full-text keywords (any-of); empty accepts all */
    keywords: string[];
    /** Section-title keywords (any-of); empty accepts all */
    requiredSectionKeywords: string[];
    minTextLength: number;
}

/**
 * What the extraction targets, used to build the prompt.
 */
export interface TargetConfig {
    topic: string;
    benchmarks: string[];
    metrics: string[];
}

/**
 * Bounded excerpt policy for oversized documents.
 */
export interface ExcerptConfig {
    /** Sections whose title contains any of these are sent first */
    priorityKeywords: string[];
    /** Sections whose title contains any of these are never sent */
    excludeSections: string[];
}

/**
 * Model call configuration.
 */
export interface LlmConfig {
    provider: ProviderName;
    model: string;
    temperature: number;
    /** Maximum model calls per run (-1 = unlimited) */
    budget: number;
    concurrency: number;
    /** Minimum spacing between call starts */
    delayMs: number;
    maxRetries: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
    timeoutMs: number;
    maxInputChars: number;
    /** Send the PDF inline to providers that accept documents */
    attachPdf: boolean;
    /** Re-prompt once with the validation errors appended */
    repair: boolean;
    /** Ignore cached results and call the model again */
    force: boolean;
    /** Re-run papers whose cached result is a failure */
    retryFailed: boolean;
    baseUrl?: string;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface SotaboardConfig {
    /** JSON-lines metadata snapshot */
    snapshot: string;

    /** Root directory for caches, the database and outputs */
    workDir: string;

    /** Extraction schema version; bump to invalidate cached extractions */
    schemaVersion: string;

    metadata: MetadataFilterConfig;
    fetch: FetchConfig;
    parse: ParseConfig;
    content: ContentFilterConfig;
    taxonomy: TaxonomyNodeInput[];
    target: TargetConfig;
    excerpt: ExcerptConfig;
    llm: LlmConfig;

    // Output
    format: 'csv' | 'json' | 'markdown';
    out?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: SotaboardConfig = {
    snapshot: './data/arxiv-metadata-oai-snapshot.json',
    workDir: './.sotaboard',
    schemaVersion: '1',
    metadata: {
        keywordGroups: [],
        categories: ['cs.LG', 'stat.ML'],
        excludeTitleKeywords: [],
        requireDoi: false,
        maxScan: -1,
    },
    fetch: {
        baseUrl: 'https://arxiv.org/pdf',
        concurrency: 2,
        maxRetries: 3,
        initialBackoffMs: 1000,
        maxBackoffMs: 30000,
        timeoutMs: 60000,
        maxDownloads: -1,
        retryFailed: false,
    },
    parse: {
        maxPages: 30,
    },
    content: {
        keywords: [],
        requiredSectionKeywords: ['result', 'experiment', 'evaluation'],
        minTextLength: 2000,
    },
    taxonomy: [],
    target: {
        topic: '',
        benchmarks: [],
        metrics: [],
    },
    excerpt: {
        priorityKeywords: ['result', 'experiment', 'evaluation', 'benchmark', 'ablation', 'comparison'],
        excludeSections: [
            'references', 'bibliography', 'appendix', 'supplementary',
            'acknowledgment', 'acknowledgement', 'author contributions',
            'funding', 'ethics statement', 'checklist',
        ],
    },
    llm: {
        provider: 'gemini',
        model: 'gemini-2.5-flash',
        temperature: 0,
        budget: 50,
        concurrency: 2,
        delayMs: 500,
        maxRetries: 3,
        initialBackoffMs: 2000,
        maxBackoffMs: 60000,
        timeoutMs: 120000,
        maxInputChars: 50000,
        attachPdf: false,
        repair: true,
        force: false,
        retryFailed: false,
    },
    format: 'csv',
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    sotaboard_version: string;
    schema_version: string;
    config_json: string;
    stop_reason: string;
    summary_json: string;
}
