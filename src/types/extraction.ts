/**
 * Paper types an extraction can report.
 */
export const PAPER_TYPES = ['Method', 'Theoretical', 'Survey', 'Benchmark', 'Analysis', 'Position'] as const;

export type PaperType = (typeof PAPER_TYPES)[number];

/**
 * A method discussed in the paper, classified into the taxonomy.
 */
export interface ExtractedMethod {
    name: string;
    /** Canonical taxonomy node name */
    category: string;
    /** Whether the paper proposes this method (as opposed to a baseline) */
    proposed: boolean;
}

/**
 * One reported quantitative result.
 */
export interface ExtractedResult {
    method: string;
    benchmark: string;
    metric: string;
    value: number;
    unit: string | null;
    split: string | null;
    /** Verbatim quote from the paper supporting the value */
    evidence: string;
}

/**
 * The structured record a model must populate for each paper.
 */
export interface ExtractionRecord {
    paper: {
        title: string;
        paperType: PaperType;
        domain: string;
        applicationField: string;
    };
    methods: ExtractedMethod[];
    benchmarks: string[];
    results: ExtractedResult[];
}

/**
 * Why an extraction ended without a record.
 */
export type ExtractionFailureKind = 'SchemaValidationError' | 'Refused';

/**
 * Persisted outcome of extraction for one (paper, schema version).
 */
export type ExtractionResult = ExtractionSuccess | ExtractionFailure;

interface ExtractionResultBase {
    paperId: string;
    schemaVersion: string;
    provider: string;
    model: string;
    /** Model invocations spent on this paper (2 when a repair retry was made) */
    attempts: number;
    /** ISO timestamp */
    createdAt: string;
}

export interface ExtractionSuccess extends ExtractionResultBase {
    status: 'success';
    record: ExtractionRecord;
}

export interface ExtractionFailure extends ExtractionResultBase {
    status: 'failed';
    failureKind: ExtractionFailureKind;
    reason: string;
}

/**
 * Leaderboard row, flattened from a successful ExtractionResult.
 */
export interface LeaderboardRow {
    method: string;
    methodCategory: string | null;
    benchmark: string;
    metric: string;
    value: number;
    unit: string | null;
    split: string | null;
    paperId: string;
    paperTitle: string;
    evidence: string;
}
