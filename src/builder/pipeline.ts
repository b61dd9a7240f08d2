import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { LeaderboardRow, ModelProvider, PaperRecord, RunSummary, SotaboardConfig } from '../types/index.js';
import { Taxonomy } from '../taxonomy/registry.js';
import { scanSnapshot, type SnapshotScan } from '../sources/snapshot.js';
import { ArxivPdfSource, type PdfSource } from '../sources/arxiv-pdf.js';
import { PaperFetcher } from '../fetcher/paper-fetcher.js';
import { PaperParser } from '../parser/paper-parser.js';
import type { PdfLoader } from '../parser/pdf-loader.js';
import { evaluateContent } from '../filters/content-filter.js';
import { ExtractionOrchestrator, type ExtractionTask } from '../extraction/orchestrator.js';
import { createProvider } from '../llm/index.js';
import { buildLeaderboard } from '../aggregator/leaderboard.js';
import { EXPORT_EXTENSIONS, writeLeaderboard } from '../exporters/export.js';
import { SotaboardDatabase } from '../storage/database.js';
import { writeFileAtomic } from '../cache/stage-cache.js';
import { FetchError } from '../utils/errors.js';
import { mapPool } from '../utils/pool.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

const logger = getLogger();

/**
 * Collaborators the pipeline would otherwise build from configuration.
 */
export interface PipelineDeps {
    pdfSource?: PdfSource;
    pdfLoader?: PdfLoader;
    provider?: ModelProvider;
    db?: SotaboardDatabase;
    signal?: AbortSignal;
}

export interface PipelineResult {
    summary: RunSummary;
    rows: LeaderboardRow[];
    runId: number;
}

export function databasePath(config: SotaboardConfig): string {
    return join(config.workDir, 'sotaboard.db');
}

export function leaderboardPath(config: SotaboardConfig): string {
    return config.out ?? join(config.workDir, `leaderboard.${EXPORT_EXTENSIONS[config.format]}`);
}

/**
 * Metadata stage on its own: scan the snapshot and write the candidate preview.
 */
export async function scanCandidates(config: SotaboardConfig, signal?: AbortSignal): Promise<SnapshotScan> {
    mkdirSync(config.workDir, { recursive: true });
    const scan = await scanSnapshot(config.snapshot, config.metadata, signal);

    const preview = scan.candidates.map((paper) => ({
        id: paper.id,
        title: paper.title,
        categories: paper.categories,
        submittedAt: paper.submittedAt,
        doi: paper.doi,
    }));
    writeFileAtomic(join(config.workDir, 'candidates.json'), JSON.stringify(preview, null, 2) + '\n');
    return scan;
}

/**
 * Full pipeline:
 *
 * 1. Metadata filter over the snapshot
 * 2. Fetch PDFs (cached, retried, capped)
 * 3. Parse PDFs (cached)
 * 4. Content filter
 * 5. Extraction (budgeted, idempotent per schema version)
 * 6. Leaderboard from persisted results
 *
 * Per-paper failures are recorded and never abort the run.
 */
export async function runPipeline(config: SotaboardConfig, deps: PipelineDeps = {}): Promise<PipelineResult> {
    const startTime = Date.now();
    const { signal } = deps;

    // Configuration problems surface before any stage runs
    const taxonomy = Taxonomy.fromNodes(config.taxonomy);
    const provider = deps.provider ?? createProvider(config.llm);

    mkdirSync(config.workDir, { recursive: true });
    const db = deps.db ?? new SotaboardDatabase(databasePath(config));

    logger.info(
        { snapshot: config.snapshot, workDir: config.workDir, schemaVersion: config.schemaVersion, provider: provider.name, model: provider.model },
        'Starting pipeline'
    );

    try {
        const summary = emptySummary(config.schemaVersion);

        // ──────────────────────────────────────────────────
        // Step 1: Metadata filter
        // ──────────────────────────────────────────────────
        const scan = await scanCandidates(config, signal);
        summary.metadata = { scanned: scan.scanned, malformed: scan.malformed, candidates: scan.candidates.length };

        // ──────────────────────────────────────────────────
        // Step 2: Fetch
        // ──────────────────────────────────────────────────
        const fetcher = new PaperFetcher(
            config.workDir,
            config.fetch,
            deps.pdfSource ?? new ArxivPdfSource(config.fetch.baseUrl, config.fetch.timeoutMs)
        );

        const ready = new Map<string, string>();
        const toDownload: PaperRecord[] = [];
        for (const paper of scan.candidates) {
            if (fetcher.isCached(paper.id)) {
                summary.fetch.cached++;
                ready.set(paper.id, fetcher.pathFor(paper.id));
                continue;
            }

            const remembered = db.getStageFailure(paper.id, 'fetch');
            if (remembered?.kind === 'NotFound' && !config.fetch.retryFailed) {
                summary.fetch.skipped++;
                continue;
            }

            if (config.fetch.maxDownloads >= 0 && toDownload.length >= config.fetch.maxDownloads) {
                summary.fetch.skipped++;
                continue;
            }
            toDownload.push(paper);
        }

        const downloads = await mapPool(
            toDownload,
            config.fetch.concurrency,
            async (paper) => {
                try {
                    const fetched = await fetcher.fetch(paper.id);
                    db.clearStageFailure(paper.id, 'fetch');
                    return fetched;
                } catch (error) {
                    if (!(error instanceof FetchError)) throw error;
                    logger.warn({ paperId: paper.id, kind: error.kind, attempts: error.attempts }, error.message);
                    db.recordStageFailure({
                        paperId: paper.id,
                        stage: 'fetch',
                        kind: error.kind,
                        reason: error.message,
                        attempts: error.attempts,
                    });
                    summary.fetch[error.kind]++;
                    return null;
                }
            },
            { signal }
        );

        for (const fetched of downloads) {
            if (fetched === undefined) continue;
            summary.fetch.attempted++;
            if (fetched) {
                summary.fetch.downloaded++;
                ready.set(fetched.paperId, fetched.path);
            }
        }
        logger.info({ ...summary.fetch }, 'Fetch stage complete');

        // ──────────────────────────────────────────────────
        // Step 3: Parse
        // ──────────────────────────────────────────────────
        const parser = new PaperParser(config.workDir, config.parse, deps.pdfLoader);
        const fetchedPapers = scan.candidates.filter((paper) => ready.has(paper.id));

        const parsedPapers = await mapPool(
            fetchedPapers,
            config.fetch.concurrency,
            async (paper) => {
                const path = ready.get(paper.id) ?? fetcher.pathFor(paper.id);
                const outcome = await parser.parse(paper.id, path);
                if (outcome.cached) summary.parse.cached++;
                summary.parse[outcome.paper.status]++;

                if (outcome.paper.status === 'failed') {
                    db.recordStageFailure({
                        paperId: paper.id,
                        stage: 'parse',
                        kind: 'DocumentUnreadable',
                        reason: outcome.paper.reason ?? 'unreadable',
                        attempts: 1,
                    });
                } else {
                    db.clearStageFailure(paper.id, 'parse');
                }
                return { paper, parsed: outcome.paper };
            },
            { signal }
        );
        logger.info({ ...summary.parse }, 'Parse stage complete');

        // ──────────────────────────────────────────────────
        // Step 4: Content filter
        // ──────────────────────────────────────────────────
        const tasks: ExtractionTask[] = [];
        for (const entry of parsedPapers) {
            if (!entry || entry.parsed.status === 'failed') continue;
            const decision = evaluateContent(entry.parsed, config.content);
            db.upsertContentDecision(decision);
            if (decision.included) {
                summary.content.passed++;
                tasks.push({ paper: entry.paper, parsed: entry.parsed });
            } else {
                summary.content.rejected++;
                logger.debug({ paperId: entry.paper.id, reasons: decision.reasons }, 'Rejected by content filter');
            }
        }
        logger.info({ ...summary.content }, 'Content filter complete');

        // ──────────────────────────────────────────────────
        // Step 5: Extraction
        // ──────────────────────────────────────────────────
        const orchestrator = new ExtractionOrchestrator({
            llm: config.llm,
            excerpt: config.excerpt,
            target: config.target,
            schemaVersion: config.schemaVersion,
            taxonomy,
            provider,
            db,
            readPdf: (paperId) => fetcher.read(paperId),
            signal,
        });
        const { stopReason, ...extraction } = await orchestrator.run(tasks);
        summary.extraction = extraction;
        summary.stopReason = signal?.aborted ? 'cancelled' : stopReason;

        // ──────────────────────────────────────────────────
        // Step 6: Leaderboard
        // ──────────────────────────────────────────────────
        const rows = buildLeaderboard(db, config.schemaVersion);
        const output = leaderboardPath(config);
        writeLeaderboard(rows, output, config.format);
        summary.leaderboard = { rows: rows.length, output };

        summary.elapsedMs = Date.now() - startTime;
        const runId = db.insertRun({
            created_at: new Date().toISOString(),
            sotaboard_version: VERSION,
            schema_version: config.schemaVersion,
            config_json: JSON.stringify(config),
            stop_reason: summary.stopReason,
            summary_json: JSON.stringify(summary),
        });

        logger.info({ runId, stopReason: summary.stopReason, rows: rows.length, elapsedMs: summary.elapsedMs }, 'Pipeline finished');
        return { summary, rows, runId };
    } finally {
        if (!deps.db) db.close();
    }
}

export function emptySummary(schemaVersion: string): RunSummary {
    return {
        schemaVersion,
        stopReason: 'completed',
        metadata: { scanned: 0, malformed: 0, candidates: 0 },
        fetch: { attempted: 0, cached: 0, downloaded: 0, skipped: 0, NotFound: 0, TransientFailure: 0, CorruptDownload: 0 },
        parse: { cached: 0, ok: 0, partial: 0, failed: 0 },
        content: { passed: 0, rejected: 0 },
        extraction: {
            eligible: 0,
            cached: 0,
            succeeded: 0,
            SchemaValidationError: 0,
            Refused: 0,
            deferred: 0,
            modelCalls: 0,
            tokens: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
        },
        leaderboard: { rows: 0, output: null },
        elapsedMs: 0,
    };
}
