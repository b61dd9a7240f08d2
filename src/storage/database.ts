import Database from 'better-sqlite3';
import type { ContentDecision, ExtractionFailureKind, ExtractionResult, RunRecord } from '../types/index.js';
import { extractionRecordSchema } from '../taxonomy/schema.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: one row per pipeline invocation
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  sotaboard_version TEXT NOT NULL,
  schema_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stop_reason TEXT NOT NULL,
  summary_json TEXT NOT NULL DEFAULT '{}'
);

-- Extraction results: one per (paper, schema version), latest write wins
CREATE TABLE IF NOT EXISTS extraction_results (
  paper_id TEXT NOT NULL,
  schema_version TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('success', 'failed')),
  failure_kind TEXT,
  reason TEXT,
  record_json TEXT,
  provider TEXT NOT NULL,
  model TEXT NOT NULL,
  attempts INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL,
  PRIMARY KEY (paper_id, schema_version)
);

-- Stage failures: last recorded failure per paper and stage
CREATE TABLE IF NOT EXISTS stage_failures (
  paper_id TEXT NOT NULL,
  stage TEXT NOT NULL,
  kind TEXT NOT NULL,
  reason TEXT NOT NULL,
  attempts INTEGER NOT NULL DEFAULT 1,
  updated_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (paper_id, stage)
);

-- Content filter verdicts, kept for auditing
CREATE TABLE IF NOT EXISTS content_decisions (
  paper_id TEXT PRIMARY KEY,
  included INTEGER NOT NULL,
  matched_keywords_json TEXT NOT NULL DEFAULT '[]',
  matched_sections_json TEXT NOT NULL DEFAULT '[]',
  text_length INTEGER NOT NULL,
  reasons_json TEXT NOT NULL DEFAULT '[]',
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_extraction_schema_status ON extraction_results(schema_version, status);
CREATE INDEX IF NOT EXISTS idx_stage_failures_stage ON stage_failures(stage, kind);
`;

interface ExtractionRow {
    paper_id: string;
    schema_version: string;
    status: string;
    failure_kind: string | null;
    reason: string | null;
    record_json: string | null;
    provider: string;
    model: string;
    attempts: number;
    created_at: string;
}

export type FailureStage = 'fetch' | 'parse';

export interface StageFailure {
    paperId: string;
    stage: FailureStage;
    kind: string;
    reason: string;
    attempts: number;
}

/**
 * Persistent store for extraction results, stage failures, content decisions and runs.
 * Wraps better-sqlite3 with WAL mode and versioned migrations.
 */
export class SotaboardDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('busy_timeout = 5000');

        // Run migrations
        this.migrate();

        logger.debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true }) as number;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            logger.debug('Database migrated to v1');
        }
    }

    // ─── Extraction results ───────────────────────────────────

    getExtraction(paperId: string, schemaVersion: string): ExtractionResult | undefined {
        const row = this.db
            .prepare('SELECT * FROM extraction_results WHERE paper_id = ? AND schema_version = ?')
            .get(paperId, schemaVersion) as ExtractionRow | undefined;
        return row ? rowToExtraction(row) : undefined;
    }

    /**
     * Insert or replace the result for (paper, schema version).
     */
    upsertExtraction(result: ExtractionResult): void {
        this.db
            .prepare(
                `
      INSERT INTO extraction_results (paper_id, schema_version, status, failure_kind, reason, record_json, provider, model, attempts, created_at)
      VALUES (@paper_id, @schema_version, @status, @failure_kind, @reason, @record_json, @provider, @model, @attempts, @created_at)
      ON CONFLICT(paper_id, schema_version) DO UPDATE SET
        status = excluded.status,
        failure_kind = excluded.failure_kind,
        reason = excluded.reason,
        record_json = excluded.record_json,
        provider = excluded.provider,
        model = excluded.model,
        attempts = excluded.attempts,
        created_at = excluded.created_at
    `
            )
            .run({
                paper_id: result.paperId,
                schema_version: result.schemaVersion,
                status: result.status,
                failure_kind: result.status === 'failed' ? result.failureKind : null,
                reason: result.status === 'failed' ? result.reason : null,
                record_json: result.status === 'success' ? JSON.stringify(result.record) : null,
                provider: result.provider,
                model: result.model,
                attempts: result.attempts,
                created_at: result.createdAt,
            });
    }

    /**
     * All results for a schema version, ordered by paper identifier.
     */
    listExtractions(schemaVersion: string, status?: ExtractionResult['status']): ExtractionResult[] {
        const rows = (
            status
                ? this.db
                      .prepare('SELECT * FROM extraction_results WHERE schema_version = ? AND status = ? ORDER BY paper_id')
                      .all(schemaVersion, status)
                : this.db.prepare('SELECT * FROM extraction_results WHERE schema_version = ? ORDER BY paper_id').all(schemaVersion)
        ) as ExtractionRow[];

        const results: ExtractionResult[] = [];
        for (const row of rows) {
            const result = rowToExtraction(row);
            if (result) results.push(result);
        }
        return results;
    }

    /**
     * Result counts for a schema version keyed by "success" or failure kind.
     */
    countExtractions(schemaVersion: string): Record<string, number> {
        const rows = this.db
            .prepare(
                `SELECT COALESCE(failure_kind, status) AS outcome, COUNT(*) AS count
         FROM extraction_results WHERE schema_version = ? GROUP BY outcome ORDER BY outcome`
            )
            .all(schemaVersion) as Array<{ outcome: string; count: number }>;
        return Object.fromEntries(rows.map((row) => [row.outcome, row.count]));
    }

    // ─── Stage failures ───────────────────────────────────────

    recordStageFailure(failure: StageFailure): void {
        this.db
            .prepare(
                `
      INSERT INTO stage_failures (paper_id, stage, kind, reason, attempts, updated_at)
      VALUES (@paperId, @stage, @kind, @reason, @attempts, datetime('now'))
      ON CONFLICT(paper_id, stage) DO UPDATE SET
        kind = excluded.kind,
        reason = excluded.reason,
        attempts = excluded.attempts,
        updated_at = excluded.updated_at
    `
            )
            .run(failure);
    }

    getStageFailure(paperId: string, stage: FailureStage): StageFailure | undefined {
        const row = this.db
            .prepare('SELECT paper_id, stage, kind, reason, attempts FROM stage_failures WHERE paper_id = ? AND stage = ?')
            .get(paperId, stage) as { paper_id: string; stage: FailureStage; kind: string; reason: string; attempts: number } | undefined;
        if (!row) return undefined;
        return { paperId: row.paper_id, stage: row.stage, kind: row.kind, reason: row.reason, attempts: row.attempts };
    }

    clearStageFailure(paperId: string, stage: FailureStage): void {
        this.db.prepare('DELETE FROM stage_failures WHERE paper_id = ? AND stage = ?').run(paperId, stage);
    }

    countStageFailures(): Record<string, number> {
        const rows = this.db
            .prepare("SELECT stage || '.' || kind AS key, COUNT(*) AS count FROM stage_failures GROUP BY key ORDER BY key")
            .all() as Array<{ key: string; count: number }>;
        return Object.fromEntries(rows.map((row) => [row.key, row.count]));
    }

    // ─── Content decisions ────────────────────────────────────

    upsertContentDecision(decision: ContentDecision): void {
        this.db
            .prepare(
                `
      INSERT INTO content_decisions (paper_id, included, matched_keywords_json, matched_sections_json, text_length, reasons_json, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, datetime('now'))
      ON CONFLICT(paper_id) DO UPDATE SET
        included = excluded.included,
        matched_keywords_json = excluded.matched_keywords_json,
        matched_sections_json = excluded.matched_sections_json,
        text_length = excluded.text_length,
        reasons_json = excluded.reasons_json,
        updated_at = excluded.updated_at
    `
            )
            .run(
                decision.paperId,
                decision.included ? 1 : 0,
                JSON.stringify(decision.matchedKeywords),
                JSON.stringify(decision.matchedSections),
                decision.textLength,
                JSON.stringify(decision.reasons)
            );
    }

    getContentDecision(paperId: string): ContentDecision | undefined {
        const row = this.db.prepare('SELECT * FROM content_decisions WHERE paper_id = ?').get(paperId) as
            | {
                  paper_id: string;
                  included: number;
                  matched_keywords_json: string;
                  matched_sections_json: string;
                  text_length: number;
                  reasons_json: string;
              }
            | undefined;
        if (!row) return undefined;
        return {
            paperId: row.paper_id,
            included: row.included === 1,
            matchedKeywords: parseStringArray(row.matched_keywords_json),
            matchedSections: parseStringArray(row.matched_sections_json),
            textLength: row.text_length,
            reasons: parseStringArray(row.reasons_json),
        };
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, sotaboard_version, schema_version, config_json, stop_reason, summary_json)
      VALUES (@created_at, @sotaboard_version, @schema_version, @config_json, @stop_reason, @summary_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getRuns(limit = 10): RunRecord[] {
        return this.db.prepare('SELECT * FROM runs ORDER BY run_id DESC LIMIT ?').all(limit) as RunRecord[];
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(schemaVersion: string): {
        runs: number;
        extractions: Record<string, number>;
        stageFailures: Record<string, number>;
        contentDecisions: { included: number; rejected: number };
    } {
        const runs = (this.db.prepare('SELECT COUNT(*) as count FROM runs').get() as { count: number }).count;
        const decisions = this.db
            .prepare('SELECT included, COUNT(*) as count FROM content_decisions GROUP BY included')
            .all() as Array<{ included: number; count: number }>;

        return {
            runs,
            extractions: this.countExtractions(schemaVersion),
            stageFailures: this.countStageFailures(),
            contentDecisions: {
                included: decisions.find((row) => row.included === 1)?.count ?? 0,
                rejected: decisions.find((row) => row.included === 0)?.count ?? 0,
            },
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        logger.debug('Database closed');
    }
}

function rowToExtraction(row: ExtractionRow): ExtractionResult | undefined {
    const base = {
        paperId: row.paper_id,
        schemaVersion: row.schema_version,
        provider: row.provider,
        model: row.model,
        attempts: row.attempts,
        createdAt: row.created_at,
    };

    if (row.status === 'failed') {
        return {
            ...base,
            status: 'failed',
            failureKind: toFailureKind(row.failure_kind),
            reason: row.reason ?? '',
        };
    }

    const parsed = extractionRecordSchema.safeParse(JSON.parse(row.record_json ?? 'null'));
    if (!parsed.success) {
        logger.warn({ paperId: row.paper_id, schemaVersion: row.schema_version }, 'Stored extraction record is invalid, ignoring');
        return undefined;
    }
    return { ...base, status: 'success', record: parsed.data };
}

function toFailureKind(value: string | null): ExtractionFailureKind {
    return value === 'Refused' ? 'Refused' : 'SchemaValidationError';
}

function parseStringArray(json: string): string[] {
    const value: unknown = JSON.parse(json);
    return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}
