import type { ModelUsage } from './llm-provider.js';

/**
 * Why a run ended.
 * budget_exhausted and model_unavailable stop early but keep all persisted work.
 */
export type StopReason = 'completed' | 'budget_exhausted' | 'model_unavailable' | 'cancelled';

/**
 * Content filter verdict for one parsed paper, kept for auditing.
 */
export interface ContentDecision {
    paperId: string;
    included: boolean;
    matchedKeywords: string[];
    matchedSections: string[];
    textLength: number;
    /** Rejection reasons (empty when included) */
    reasons: string[];
}

/**
 * Counts per stage and failure kind, reported at the end of a run.
 */
export interface RunSummary {
    schemaVersion: string;
    stopReason: StopReason;
    metadata: {
        scanned: number;
        malformed: number;
        candidates: number;
    };
    fetch: {
        attempted: number;
        cached: number;
        downloaded: number;
        skipped: number;
        NotFound: number;
        TransientFailure: number;
        CorruptDownload: number;
    };
    parse: {
        cached: number;
        ok: number;
        partial: number;
        failed: number;
    };
    content: {
        passed: number;
        rejected: number;
    };
    extraction: {
        eligible: number;
        cached: number;
        succeeded: number;
        SchemaValidationError: number;
        Refused: number;
        deferred: number;
        modelCalls: number;
        tokens: ModelUsage;
    };
    leaderboard: {
        rows: number;
        output: string | null;
    };
    elapsedMs: number;
}
