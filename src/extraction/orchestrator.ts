import type {
    ExcerptConfig,
    ExtractionResult,
    LlmConfig,
    ModelProvider,
    ModelRequest,
    ModelResponse,
    ModelUsage,
    PaperRecord,
    ParsedPaper,
    StopReason,
    TargetConfig,
} from '../types/index.js';
import type { Taxonomy } from '../taxonomy/registry.js';
import { buildResponseSchema } from '../taxonomy/schema.js';
import type { SotaboardDatabase } from '../storage/database.js';
import { buildExcerpt } from '../llm/excerpt.js';
import { buildPrompt, buildRepairPrompt, type Prompt } from '../llm/prompt.js';
import { ModelUnavailableError, errorMessage } from '../utils/errors.js';
import { TokenBucket, retryDelay, sleep } from '../utils/rate-limit.js';
import { mapPool } from '../utils/pool.js';
import { getLogger } from '../utils/logger.js';
import { parseModelResponse, validationReason, type ValidationOutcome } from './validator.js';

const logger = getLogger();

/**
 * One paper ready for extraction.
 */
export interface ExtractionTask {
    paper: PaperRecord;
    parsed: ParsedPaper;
}

export interface OrchestratorOptions {
    llm: LlmConfig;
    excerpt: ExcerptConfig;
    target: TargetConfig;
    schemaVersion: string;
    taxonomy: Taxonomy;
    provider: ModelProvider;
    db: SotaboardDatabase;
    /** Source of PDF bytes for providers with document input */
    readPdf?: (paperId: string) => Uint8Array;
    signal?: AbortSignal;
}

export interface ExtractionStats {
    eligible: number;
    cached: number;
    succeeded: number;
    SchemaValidationError: number;
    Refused: number;
    /** Eligible papers left without a stored result for a later run */
    deferred: number;
    modelCalls: number;
    /** Tokens reported by the provider across every answered call */
    tokens: ModelUsage;
    stopReason: StopReason;
}

/**
 * Counts logical model invocations against the per-run ceiling (-1 = unlimited).
 * Consumption is synchronous so concurrent workers can never overspend.
 */
export class CallBudget {
    private spent = 0;

    constructor(private readonly limit: number) {}

    tryConsume(): boolean {
        if (this.exhausted) return false;
        this.spent++;
        return true;
    }

    /** Give back a unit whose call was never made. */
    refund(): void {
        if (this.spent > 0) this.spent--;
    }

    get used(): number {
        return this.spent;
    }

    get exhausted(): boolean {
        return this.limit >= 0 && this.spent >= this.limit;
    }
}

type ResultBase = Omit<ExtractionResult, 'status' | 'record' | 'failureKind' | 'reason'>;

type TaskOutcome =
    | { kind: 'stored'; result: ExtractionResult }
    | { kind: 'deferred' }
    /** Model outage or cancellation: nothing stored, the paper stays eligible */
    | { kind: 'stopped' };

/**
 * Runs schema-constrained extraction over papers that passed the content filter.
 *
 * Papers with a stored result for the current schema version are skipped without a
 * model call. Calls are bounded by the budget, the concurrency ceiling and the
 * inter-call delay. A model outage halts further calls but keeps stored results.
 */
export class ExtractionOrchestrator {
    private readonly budget: CallBudget;
    private readonly spacing: TokenBucket;
    private readonly responseSchema: Record<string, unknown>;
    private halted = false;
    private readonly tokens: ModelUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

    constructor(private readonly options: OrchestratorOptions) {
        this.budget = new CallBudget(options.llm.budget);
        this.spacing = TokenBucket.spacing(options.llm.delayMs);
        this.responseSchema = buildResponseSchema(options.taxonomy);
    }

    /**
     * Whether a stored result lets this paper skip the model.
     */
    isSettled(paperId: string): boolean {
        const { llm, db, schemaVersion } = this.options;
        if (llm.force) return false;

        const existing = db.getExtraction(paperId, schemaVersion);
        if (!existing) return false;
        return existing.status === 'success' || !llm.retryFailed;
    }

    async run(tasks: readonly ExtractionTask[]): Promise<ExtractionStats> {
        const { llm, signal } = this.options;
        const stats: ExtractionStats = {
            eligible: tasks.length,
            cached: 0,
            succeeded: 0,
            SchemaValidationError: 0,
            Refused: 0,
            deferred: 0,
            modelCalls: 0,
            tokens: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
            stopReason: 'completed',
        };

        const pending = tasks.filter((task) => {
            if (this.isSettled(task.paper.id)) {
                stats.cached++;
                logger.debug({ paperId: task.paper.id }, 'Extraction cached, skipping model call');
                return false;
            }
            return true;
        });

        logger.info(
            { pending: pending.length, cached: stats.cached, budget: llm.budget, provider: this.options.provider.name },
            'Starting extraction'
        );

        const outcomes = await mapPool(pending, llm.concurrency, (task) => this.extract(task), {
            signal,
            shouldStop: () => this.halted || this.budget.exhausted,
        });

        for (const outcome of outcomes) {
            if (outcome?.kind !== 'stored') {
                stats.deferred++;
                continue;
            }
            const { result } = outcome;
            if (result.status === 'success') stats.succeeded++;
            else stats[result.failureKind]++;
        }
        stats.modelCalls = this.budget.used;
        stats.tokens = { ...this.tokens };

        if (signal?.aborted) stats.stopReason = 'cancelled';
        else if (this.halted) stats.stopReason = 'model_unavailable';
        else if (stats.deferred > 0 && this.budget.exhausted) stats.stopReason = 'budget_exhausted';

        logger.info({ ...stats }, 'Extraction finished');
        return stats;
    }

    private async extract(task: ExtractionTask): Promise<TaskOutcome> {
        const paperId = task.paper.id;
        if (!this.budget.tryConsume()) return { kind: 'deferred' };

        const { llm, taxonomy, db, schemaVersion, provider } = this.options;
        const excerpt = buildExcerpt(task.parsed, task.paper.abstract, this.options.excerpt, llm.maxInputChars);
        const pdf = this.attachment(paperId);
        const prompt = buildPrompt({
            paper: task.paper,
            excerpt: excerpt.text,
            truncated: excerpt.truncated,
            taxonomy,
            target: this.options.target,
            responseSchema: this.responseSchema,
            pdfAttached: pdf !== undefined,
        });

        let attempts = 1;
        let outcome: ValidationOutcome;
        try {
            let response = await this.invoke(this.request(prompt, pdf), paperId);
            if (!response) return { kind: 'stopped' };
            outcome = parseModelResponse(response, taxonomy);

            if (outcome.kind === 'validation_failure' && llm.repair && response.kind === 'completion') {
                if (this.stopped) return { kind: 'stopped' };
                if (this.budget.tryConsume()) {
                    logger.debug({ paperId, issues: outcome.issues }, 'Response failed validation, attempting repair');
                    const repair = buildRepairPrompt(prompt, response.text, outcome.issues);
                    response = await this.invoke(this.request(repair, pdf), paperId);
                    if (!response) return { kind: 'stopped' };
                    attempts = 2;
                    outcome = parseModelResponse(response, taxonomy);
                }
            }
        } catch (error) {
            if (!(error instanceof ModelUnavailableError)) throw error;
            if (!this.halted) {
                logger.error({ paperId, status: error.status, error: error.message }, 'Model unavailable, halting further calls');
            }
            this.halted = true;
            return { kind: 'stopped' };
        }

        const base: ResultBase = {
            paperId,
            schemaVersion,
            provider: provider.name,
            model: provider.model,
            attempts,
            createdAt: new Date().toISOString(),
        };

        const result = toResult(base, outcome);
        db.upsertExtraction(result);
        return { kind: 'stored', result };
    }

    private request(prompt: Prompt, pdf: Uint8Array | undefined): ModelRequest {
        return {
            systemPrompt: prompt.systemPrompt,
            userPrompt: prompt.userPrompt,
            responseSchema: this.responseSchema,
            temperature: this.options.llm.temperature,
            pdf,
        };
    }

    private attachment(paperId: string): Uint8Array | undefined {
        const { llm, provider, readPdf } = this.options;
        if (!llm.attachPdf || !provider.supportsPdfInput || !readPdf) return undefined;
        try {
            return readPdf(paperId);
        } catch (error) {
            logger.warn({ paperId, error: errorMessage(error) }, 'Cannot read PDF for attachment, sending text only');
            return undefined;
        }
    }

    /** No further model call may start: outage or cancellation. */
    private get stopped(): boolean {
        return this.halted || (this.options.signal?.aborted ?? false);
    }

    /**
     * One logical invocation. Transport-level outages are retried with backoff
     * without consuming budget. Resolves to undefined, with the budget unit
     * refunded, when the run stopped before the provider was called.
     */
    private async invoke(request: ModelRequest, paperId: string): Promise<ModelResponse | undefined> {
        const { llm, provider } = this.options;

        for (let attempt = 0; ; attempt++) {
            if (!this.stopped) await this.spacing.acquire();
            if (this.stopped) {
                if (attempt === 0) this.budget.refund();
                return undefined;
            }

            try {
                const response = await provider.complete(request);
                this.tokens.promptTokens += response.usage.promptTokens;
                this.tokens.completionTokens += response.usage.completionTokens;
                this.tokens.totalTokens += response.usage.totalTokens;
                return response;
            } catch (error) {
                if (!(error instanceof ModelUnavailableError)) throw error;
                if (attempt >= llm.maxRetries || this.stopped) throw error;

                const backoff = retryDelay(attempt, llm.initialBackoffMs, llm.maxBackoffMs, error.retryAfterMs);
                logger.warn(
                    { paperId, attempt: attempt + 1, backoffMs: Math.round(backoff), error: error.message },
                    'Model call failed, retrying'
                );
                await sleep(backoff);
            }
        }
    }
}

function toResult(base: ResultBase, outcome: ValidationOutcome): ExtractionResult {
    switch (outcome.kind) {
        case 'success':
            return { ...base, status: 'success', record: outcome.record };
        case 'validation_failure':
            logger.warn({ paperId: base.paperId, kind: 'SchemaValidationError', issues: outcome.issues.length }, 'Extraction failed validation');
            return { ...base, status: 'failed', failureKind: 'SchemaValidationError', reason: validationReason(outcome.issues) };
        case 'refused':
            logger.warn({ paperId: base.paperId, kind: 'Refused', reason: outcome.reason }, 'Model refused extraction');
            return { ...base, status: 'failed', failureKind: 'Refused', reason: outcome.reason };
    }
}
