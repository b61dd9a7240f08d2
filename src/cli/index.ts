#!/usr/bin/env node
import { join } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { getHttpClient } from '../utils/http-client.js';
import { runPipeline, scanCandidates, databasePath, leaderboardPath } from '../builder/pipeline.js';
import { buildLeaderboard } from '../aggregator/leaderboard.js';
import { writeLeaderboard, renderLeaderboard } from '../exporters/export.js';
import { clearDirectory, directoryStats } from '../cache/stage-cache.js';
import { SotaboardDatabase } from '../storage/database.js';
import type { LogLevel, ProviderName, RunSummary, SotaboardConfig } from '../types/index.js';
import { VERSION } from '../version.js';

const PROVIDERS: readonly ProviderName[] = ['gemini', 'openai', 'ollama'];
const FORMATS: readonly SotaboardConfig['format'][] = ['csv', 'json', 'markdown'];
const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];
const CACHE_STAGES = ['pdf', 'parsed'] as const;

interface CommonOptions {
    config?: string;
    workDir?: string;
    schemaVersion?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface RunOptions extends CommonOptions {
    snapshot?: string;
    budget?: number;
    concurrency?: number;
    provider?: ProviderName;
    model?: string;
    force?: boolean;
    retryFailed?: boolean;
    attachPdf?: boolean;
    maxDownloads?: number;
    format?: SotaboardConfig['format'];
    out?: string;
}

const program = new Command();

program
    .name('sotaboard')
    .description('Mine arXiv metadata and full-text PDFs into a leaderboard of reported results.')
    .version(VERSION);

// ─── Option parsers ───────────────────────────────────────

function integer(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) throw new InvalidArgumentError('Not an integer.');
    return parsed;
}

function choice<T extends string>(choices: readonly T[]): (value: string) => T {
    return (value) => {
        const match = choices.find((candidate) => candidate === value.toLowerCase());
        if (!match) throw new InvalidArgumentError(`Expected one of: ${choices.join(', ')}.`);
        return match;
    };
}

function withCommonOptions(command: Command): Command {
    return command
        .option('-c, --config <path>', 'Config file (default: search for sotaboard.config.json)')
        .option('-w, --work-dir <dir>', 'Working directory for caches, database and outputs')
        .option('--schema-version <version>', 'Extraction schema version')
        .option('--log-level <level>', 'Log level: error | warn | info | debug | silent', choice(LOG_LEVELS))
        .option('--json-logs', 'Output JSON logs');
}

async function setup(overrides: ConfigOverrides, configPath?: string): Promise<SotaboardConfig> {
    const config = await resolveConfig(overrides, configPath);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    getHttpClient({ version: VERSION });
    return config;
}

function commonOverrides(opts: CommonOptions): ConfigOverrides {
    return {
        workDir: opts.workDir,
        schemaVersion: opts.schemaVersion,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
    };
}

function fail(error: unknown): never {
    if (error instanceof ConfigError) {
        console.error(`Configuration error (${error.field}): ${error.message}`);
        process.exit(2);
    }
    getLogger().error({ error: errorMessage(error) }, 'Command failed');
    process.exit(1);
}

// ─── RUN command ──────────────────────────────────────────

withCommonOptions(
    program
        .command('run')
        .description('Run the full pipeline and export the leaderboard')
        .option('-s, --snapshot <path>', 'arXiv metadata snapshot (JSON lines)')
        .option('-b, --budget <n>', 'Maximum model calls for this run (-1 = unlimited)', integer)
        .option('--concurrency <n>', 'Concurrent model calls', integer)
        .option('--provider <name>', 'Model provider: gemini | openai | ollama', choice(PROVIDERS))
        .option('-m, --model <model>', 'Model identifier')
        .option('--force', 'Ignore stored extraction results')
        .option('--retry-failed', 'Retry papers whose download or extraction failed before')
        .option('--attach-pdf', 'Send the PDF to providers that accept documents')
        .option('--max-downloads <n>', 'Cap on new PDF downloads (-1 = unlimited)', integer)
        .option('-f, --format <format>', 'Leaderboard format: csv | json | markdown', choice(FORMATS))
        .option('-o, --out <path>', 'Leaderboard output path')
).action(async (opts: RunOptions) => {
    let config: SotaboardConfig;
    try {
        config = await setup(
            {
                ...commonOverrides(opts),
                snapshot: opts.snapshot,
                format: opts.format,
                out: opts.out,
                fetch: { maxDownloads: opts.maxDownloads, retryFailed: opts.retryFailed },
                llm: {
                    budget: opts.budget,
                    concurrency: opts.concurrency,
                    provider: opts.provider,
                    model: opts.model,
                    force: opts.force,
                    retryFailed: opts.retryFailed,
                    attachPdf: opts.attachPdf,
                },
            },
            opts.config
        );
    } catch (error) {
        fail(error);
    }

    const logger = getLogger();
    const controller = new AbortController();
    process.once('SIGINT', () => {
        logger.warn('Interrupted, finishing in-flight work (press Ctrl+C again to force quit)');
        controller.abort();
    });

    try {
        const { summary } = await runPipeline(config, { signal: controller.signal });
        printSummary(summary);
        logger.debug({ requests: getHttpClient().getAllRequestCounts() }, 'HTTP requests by source');
        if (summary.stopReason === 'model_unavailable') process.exitCode = 3;
        if (summary.stopReason === 'cancelled') process.exitCode = 130;
    } catch (error) {
        fail(error);
    }
});

// ─── SCAN command ─────────────────────────────────────────

withCommonOptions(
    program
        .command('scan')
        .description('Run the metadata filter only and write the candidate preview')
        .option('-s, --snapshot <path>', 'arXiv metadata snapshot (JSON lines)')
).action(async (opts: CommonOptions & { snapshot?: string }) => {
    try {
        const config = await setup({ ...commonOverrides(opts), snapshot: opts.snapshot }, opts.config);
        const scan = await scanCandidates(config);
        console.log(`\n🔎 Scanned ${scan.scanned} records (${scan.malformed} malformed)`);
        console.log(`   Candidates: ${scan.candidates.length}`);
        console.log(`   Preview:    ${join(config.workDir, 'candidates.json')}\n`);
    } catch (error) {
        fail(error);
    }
});

// ─── LEADERBOARD command ──────────────────────────────────

withCommonOptions(
    program
        .command('leaderboard')
        .description('Rebuild the leaderboard from stored extraction results')
        .option('-f, --format <format>', 'Output format: csv | json | markdown', choice(FORMATS))
        .option('-o, --out <path>', 'Output path ("-" for stdout)')
).action(async (opts: CommonOptions & { format?: SotaboardConfig['format']; out?: string }) => {
    try {
        const config = await setup({ ...commonOverrides(opts), format: opts.format, out: opts.out }, opts.config);
        const db = new SotaboardDatabase(databasePath(config));
        try {
            const rows = buildLeaderboard(db, config.schemaVersion);
            if (opts.out === '-') {
                process.stdout.write(renderLeaderboard(rows, config.format));
                return;
            }
            const output = leaderboardPath(config);
            writeLeaderboard(rows, output, config.format);
            console.log(`Leaderboard: ${rows.length} rows written to ${output}`);
        } finally {
            db.close();
        }
    } catch (error) {
        fail(error);
    }
});

// ─── INSPECT command ──────────────────────────────────────

withCommonOptions(program.command('inspect').description('Show stored result counts')).action(async (opts: CommonOptions) => {
    try {
        const config = await setup(commonOverrides(opts), opts.config);
        const db = new SotaboardDatabase(databasePath(config));
        const stats = db.getStats(config.schemaVersion);
        const lastRun = db.getRuns(1)[0];
        db.close();

        console.log(`\n📊 sotaboard store (schema version ${config.schemaVersion})\n`);
        console.log(`  Runs:               ${stats.runs}`);
        console.log(`  Content included:   ${stats.contentDecisions.included}`);
        console.log(`  Content rejected:   ${stats.contentDecisions.rejected}`);

        console.log('\n  Extraction results:');
        if (Object.keys(stats.extractions).length === 0) console.log('    (none)');
        for (const [outcome, count] of Object.entries(stats.extractions)) {
            console.log(`    ${outcome}: ${count}`);
        }

        if (Object.keys(stats.stageFailures).length > 0) {
            console.log('\n  Stage failures:');
            for (const [kind, count] of Object.entries(stats.stageFailures)) {
                console.log(`    ${kind}: ${count}`);
            }
        }

        if (lastRun) {
            console.log(`\n  Last run: #${lastRun.run_id ?? '?'} at ${lastRun.created_at} (${lastRun.stop_reason})`);
        }
        console.log('');
    } catch (error) {
        fail(error);
    }
});

// ─── CACHE command ────────────────────────────────────────

withCommonOptions(
    program
        .command('cache')
        .description('Show or clear stage caches')
        .argument('<action>', 'Action: stats | clear', choice(['stats', 'clear'] as const))
        .option('--stage <stage>', 'Limit to one stage: pdf | parsed', choice(CACHE_STAGES))
).action(async (action: 'stats' | 'clear', opts: CommonOptions & { stage?: (typeof CACHE_STAGES)[number] }) => {
    try {
        const config = await setup(commonOverrides(opts), opts.config);
        const stages = opts.stage ? [opts.stage] : CACHE_STAGES;

        for (const stage of stages) {
            const directory = join(config.workDir, stage);
            const extension = stage === 'pdf' ? '.pdf' : '.json';
            if (action === 'clear') {
                const removed = clearDirectory(directory, extension);
                console.log(`${stage}: removed ${removed} entries`);
            } else {
                const stats = directoryStats(stage, directory, extension);
                console.log(`${stage}: ${stats.entries} entries, ${(stats.bytes / 1024).toFixed(1)} KB (${stats.directory})`);
            }
        }
    } catch (error) {
        fail(error);
    }
});

// ─── Output ───────────────────────────────────────────────

function printSummary(summary: RunSummary): void {
    const { metadata, fetch, parse, content, extraction, leaderboard } = summary;
    console.log(`\n📊 Run summary (schema version ${summary.schemaVersion}, ${(summary.elapsedMs / 1000).toFixed(1)}s)\n`);
    console.log(`  Stop reason:  ${summary.stopReason}`);
    console.log(`  Metadata:     ${metadata.scanned} scanned, ${metadata.malformed} malformed, ${metadata.candidates} candidates`);
    console.log(
        `  Fetch:        ${fetch.cached} cached, ${fetch.downloaded} downloaded, ${fetch.skipped} skipped, ` +
            `NotFound ${fetch.NotFound}, TransientFailure ${fetch.TransientFailure}, CorruptDownload ${fetch.CorruptDownload}`
    );
    console.log(`  Parse:        ${parse.ok} ok, ${parse.partial} partial, ${parse.failed} failed (${parse.cached} cached)`);
    console.log(`  Content:      ${content.passed} passed, ${content.rejected} rejected`);
    console.log(
        `  Extraction:   ${extraction.succeeded} succeeded, ${extraction.cached} cached, ` +
            `SchemaValidationError ${extraction.SchemaValidationError}, Refused ${extraction.Refused}, ` +
            `${extraction.deferred} deferred, ${extraction.modelCalls} model calls`
    );
    console.log(
        `  Tokens:       ${extraction.tokens.totalTokens} total ` +
            `(${extraction.tokens.promptTokens} prompt, ${extraction.tokens.completionTokens} completion)`
    );
    console.log(`  Leaderboard:  ${leaderboard.rows} rows${leaderboard.output ? ` → ${leaderboard.output}` : ''}\n`);
}

program.parseAsync().catch(fail);
