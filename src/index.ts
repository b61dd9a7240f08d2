/**
 * Programmatic API. The CLI in `cli/index.ts` is a thin layer over these.
 */
export * from './types/index.js';

export { resolveConfig, mergeConfig, configSchema, type ConfigOverrides } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export {
    FetchError,
    ParseError,
    ModelUnavailableError,
    ConfigError,
    type FetchErrorKind,
    type ParseErrorKind,
} from './utils/errors.js';

export { Taxonomy } from './taxonomy/registry.js';
export { extractionRecordSchema, buildResponseSchema } from './taxonomy/schema.js';

export { parseSnapshotLine, readSnapshot, scanSnapshot, type SnapshotScan } from './sources/snapshot.js';
export { ArxivPdfSource, type PdfSource } from './sources/arxiv-pdf.js';
export { matchesMetadata, filterCandidates } from './filters/metadata-filter.js';
export { evaluateContent } from './filters/content-filter.js';

export { PaperFetcher, type FetchedPdf } from './fetcher/paper-fetcher.js';
export { PaperParser, PARSER_VERSION, type ParseOutcome } from './parser/paper-parser.js';
export { PdfjsLoader, type PdfLoader, type PdfDocumentHandle } from './parser/pdf-loader.js';
export { splitSections, extractCaptions } from './parser/sections.js';

export { createProvider, GeminiProvider, OpenAIProvider, OllamaProvider, buildPrompt, buildExcerpt } from './llm/index.js';
export { parseModelResponse, validationReason, type ValidationOutcome } from './extraction/validator.js';
export { normalizeValue } from './extraction/metrics.js';
export { ExtractionOrchestrator, CallBudget, type ExtractionTask, type ExtractionStats } from './extraction/orchestrator.js';

export { aggregateLeaderboard, buildLeaderboard } from './aggregator/leaderboard.js';
export { renderLeaderboard, writeLeaderboard, type ExportFormat } from './exporters/export.js';
export { SotaboardDatabase, type StageFailure } from './storage/database.js';
export { runPipeline, scanCandidates, type PipelineDeps, type PipelineResult } from './builder/pipeline.js';
export { VERSION } from './version.js';
