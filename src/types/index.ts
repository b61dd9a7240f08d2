/**
 * Barrel export for all shared types.
 */
export type { PaperRecord, CandidateSet, ParsedPaper, ParsedSection, ParseStatus } from './paper.js';
export type { TaxonomyNode, TaxonomyNodeInput } from './taxonomy.js';
export { PAPER_TYPES } from './extraction.js';
export type {
    PaperType,
    ExtractedMethod,
    ExtractedResult,
    ExtractionRecord,
    ExtractionFailureKind,
    ExtractionResult,
    ExtractionSuccess,
    ExtractionFailure,
    LeaderboardRow,
} from './extraction.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    SotaboardConfig,
    LogLevel,
    ProviderName,
    MetadataField,
    KeywordGroup,
    MetadataFilterConfig,
    FetchConfig,
    ParseConfig,
    ContentFilterConfig,
    TargetConfig,
    ExcerptConfig,
    LlmConfig,
    RunRecord,
} from './config.js';
export type {
    ModelProvider,
    ModelRequest,
    ModelResponse,
    ModelUsage,
    ModelProviderOptions,
} from './llm-provider.js';
export type { RunSummary, StopReason, ContentDecision } from './run.js';
