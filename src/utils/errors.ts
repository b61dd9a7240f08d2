/**
 * Error classes for the pipeline stages.
 *
 * Per-paper errors (FetchError, ParseError) are recorded against the paper and
 * never abort a run; a response that fails validation is stored as a failed
 * extraction result rather than thrown. ModelUnavailableError halts further
 * model calls. ConfigError is raised before any stage starts.
 */

export type FetchErrorKind = 'NotFound' | 'TransientFailure' | 'CorruptDownload';

/**
 * PDF could not be obtained for a paper.
 */
export class FetchError extends Error {
    constructor(
        message: string,
        public readonly kind: FetchErrorKind,
        public readonly paperId: string,
        public readonly attempts: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'FetchError';
    }
}

export type ParseErrorKind = 'PartialParse' | 'DocumentUnreadable';

/**
 * PDF could not be (fully) turned into text.
 */
export class ParseError extends Error {
    constructor(
        message: string,
        public readonly kind: ParseErrorKind,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ParseError';
    }
}

/**
 * Model endpoint unreachable, unauthorized, over quota, or failing server-side.
 */
export class ModelUnavailableError extends Error {
    /** Server's Retry-After hint */
    readonly retryAfterMs?: number;

    constructor(
        message: string,
        public readonly status: number,
        options?: { cause?: unknown; retryAfterMs?: number }
    ) {
        super(message, options);
        this.name = 'ModelUnavailableError';
        this.retryAfterMs = options?.retryAfterMs;
    }
}

/**
 * Invalid or incomplete configuration.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly field: string
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
