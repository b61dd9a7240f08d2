import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import Database from 'better-sqlite3';
import { SotaboardDatabase } from '../storage/database.js';
import { makeTempDir, removeDir, sampleRecord, successResult } from './helpers.js';

describe('SotaboardDatabase', () => {
    let db: SotaboardDatabase;
    let workDir: string;

    // Second connection onto the same file, for checks the class does not expose
    const withRaw = <T>(fn: (raw: Database.Database) => T): T => {
        const raw = new Database(path.join(workDir, 'test.db'));
        try {
            return fn(raw);
        } finally {
            raw.close();
        }
    };

    beforeEach(() => {
        workDir = makeTempDir();
        db = new SotaboardDatabase(path.join(workDir, 'test.db'));
    });

    afterEach(() => {
        db.close();
        removeDir(workDir);
    });

    describe('initialization', () => {
        it('should create all tables', () => {
            const tables = withRaw(
                (raw) =>
                    raw
                        .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
                        .all() as Array<{ name: string }>
            );

            expect(tables.map((t) => t.name)).toEqual(['content_decisions', 'extraction_results', 'runs', 'stage_failures']);
        });

        it('should set schema version to 1', () => {
            expect(withRaw((raw) => raw.pragma('user_version', { simple: true }))).toBe(1);
        });

        it('should reopen an existing database without migrating again', () => {
            db.upsertExtraction(successResult('2401.00001', sampleRecord()));
            db.close();

            db = new SotaboardDatabase(path.join(workDir, 'test.db'));
            expect(db.listExtractions('1')).toHaveLength(1);
        });
    });

    describe('extraction results', () => {
        it('should round-trip a successful result', () => {
            const result = successResult('2401.00001', sampleRecord());
            db.upsertExtraction(result);
            expect(db.getExtraction('2401.00001', '1')).toEqual(result);
        });

        it('should keep results per schema version and replace on upsert', () => {
            db.upsertExtraction(successResult('2401.00001', sampleRecord('v1 title'), '1'));
            db.upsertExtraction(successResult('2401.00001', sampleRecord('v2 title'), '2'));
            db.upsertExtraction({
                paperId: '2401.00001',
                schemaVersion: '1',
                provider: 'gemini',
                model: 'test-model',
                attempts: 2,
                createdAt: '2024-02-02T00:00:00.000Z',
                status: 'failed',
                failureKind: 'Refused',
                reason: 'blocked',
            });

            expect(db.getExtraction('2401.00001', '1')).toMatchObject({ status: 'failed', failureKind: 'Refused', attempts: 2 });
            expect(db.getExtraction('2401.00001', '2')).toMatchObject({ status: 'success' });
            expect(db.getExtraction('2401.00001', '3')).toBeUndefined();
        });

        it('should list by schema version and status in paper order', () => {
            db.upsertExtraction(successResult('2401.00003', sampleRecord()));
            db.upsertExtraction(successResult('2401.00001', sampleRecord()));
            db.upsertExtraction({
                ...successResult('2401.00002', sampleRecord()),
                status: 'failed',
                failureKind: 'SchemaValidationError',
                reason: 'Schema validation failed: paper: Required',
            });

            expect(db.listExtractions('1').map((r) => r.paperId)).toEqual(['2401.00001', '2401.00002', '2401.00003']);
            expect(db.listExtractions('1', 'success').map((r) => r.paperId)).toEqual(['2401.00001', '2401.00003']);
            expect(db.countExtractions('1')).toEqual({ SchemaValidationError: 1, success: 2 });
        });

        it('should skip stored records that no longer validate', () => {
            withRaw((raw) =>
                raw
                    .prepare(
                        `INSERT INTO extraction_results (paper_id, schema_version, status, record_json, provider, model, created_at)
                         VALUES ('bad', '1', 'success', '{"paper":{}}', 'gemini', 'm', '2024-01-01')`
                    )
                    .run()
            );

            expect(db.getExtraction('bad', '1')).toBeUndefined();
            expect(db.listExtractions('1')).toEqual([]);
        });
    });

    describe('stage failures', () => {
        it('should record, update and clear failures', () => {
            db.recordStageFailure({ paperId: 'a', stage: 'fetch', kind: 'TransientFailure', reason: 'timeout', attempts: 4 });
            db.recordStageFailure({ paperId: 'a', stage: 'fetch', kind: 'NotFound', reason: 'HTTP 404', attempts: 1 });
            db.recordStageFailure({ paperId: 'b', stage: 'parse', kind: 'DocumentUnreadable', reason: 'bad', attempts: 1 });

            expect(db.getStageFailure('a', 'fetch')).toEqual({ paperId: 'a', stage: 'fetch', kind: 'NotFound', reason: 'HTTP 404', attempts: 1 });
            expect(db.countStageFailures()).toEqual({ 'fetch.NotFound': 1, 'parse.DocumentUnreadable': 1 });

            db.clearStageFailure('a', 'fetch');
            expect(db.getStageFailure('a', 'fetch')).toBeUndefined();
        });
    });

    describe('content decisions', () => {
        it('should round-trip a decision', () => {
            const decision = {
                paperId: 'a',
                included: false,
                matchedKeywords: ['imagenet'],
                matchedSections: [],
                textLength: 120,
                reasons: ['text too short (120 < 2000)'],
            };
            db.upsertContentDecision(decision);
            db.upsertContentDecision({ ...decision, paperId: 'b', included: true, reasons: [] });

            expect(db.getContentDecision('a')).toEqual(decision);
            expect(db.getContentDecision('missing')).toBeUndefined();
        });
    });

    describe('runs and stats', () => {
        it('should insert runs and summarize the store', () => {
            const runId = db.insertRun({
                created_at: '2024-02-01T00:00:00.000Z',
                sotaboard_version: '1.0.0',
                schema_version: '1',
                config_json: '{}',
                stop_reason: 'completed',
                summary_json: '{}',
            });
            db.upsertExtraction(successResult('a', sampleRecord()));
            db.upsertContentDecision({ paperId: 'a', included: true, matchedKeywords: [], matchedSections: [], textLength: 1, reasons: [] });

            expect(runId).toBe(1);
            expect(db.getRuns()[0]).toMatchObject({ run_id: 1, stop_reason: 'completed' });
            expect(db.getStats('1')).toEqual({
                runs: 1,
                extractions: { success: 1 },
                stageFailures: {},
                contentDecisions: { included: 1, rejected: 0 },
            });
        });
    });
});
