import { TokenBucket } from './rate-limit.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, { tokensPerSecond: number; maxBurst: number }> = {
    arxiv: { tokensPerSecond: 0.33, maxBurst: 1 },     // arXiv asks for ~1 request every 3s
    gemini: { tokensPerSecond: 5, maxBurst: 5 },
    openai: { tokensPerSecond: 5, maxBurst: 5 },
    ollama: { tokensPerSecond: 100, maxBurst: 100 },   // Local, effectively unlimited
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

export type HttpResponseType = 'json' | 'text' | 'buffer' | 'auto';

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
    source?: string;  // For per-source rate limiting
    /** How to decode a successful body; 'auto' follows the content type */
    responseType?: HttpResponseType;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * HTTP error with classification.
 * `retryAfterMs` carries the server's Retry-After hint, when it sent one.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown,
        public readonly retryAfterMs?: number
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Centralized HTTP client with per-source rate limiting and failure classification.
 * Each call is a single attempt; the stage that owns the work decides whether to retry.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;

    constructor(options?: { timeout?: number; version?: string; email?: string }) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '1.0.0';
        const email = options?.email ?? 'sotaboard@example.com';
        this.userAgent = `sotaboard/${version} (mailto:${email})`;
    }

    /**
     * Make one rate-limited HTTP request.
     * The caller decides the decoded type of `data` through `responseType`.
     */
    async request<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
            responseType = 'auto',
        } = options;

        // Build request options
        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (body) {
            if (typeof body === 'object') {
                requestBody = JSON.stringify(body);
                requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
            } else {
                requestBody = body;
            }
        }

        // Acquire rate limit token
        await this.getBucket(source).acquire();
        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        let response: Response;
        try {
            response = await fetch(url, {
                method,
                headers: requestHeaders,
                body: requestBody,
                signal: controller.signal,
            });
        } catch (error) {
            clearTimeout(timeoutId);
            throw networkError(error, url, timeout);
        }

        try {
            if (!response.ok) {
                throw new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    RETRYABLE_STATUS_CODES.has(response.status),
                    await decodeErrorBody(response),
                    parseRetryAfter(response.headers.get('retry-after'))
                );
            }

            let data: unknown;
            try {
                data = await decodeBody(response, responseType);
            } catch (error) {
                if (error instanceof Error && error.name === 'AbortError') throw networkError(error, url, timeout);
                throw new HttpError(
                    `Invalid response body from ${url}: ${error instanceof Error ? error.message : String(error)}`,
                    response.status,
                    false
                );
            }

            // Build headers map
            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            return { status: response.status, headers: responseHeaders, data: data as T, ok: true };
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Convenience method for GET requests.
     */
    async get<T = unknown>(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'GET' });
    }

    /**
     * Convenience method for POST requests.
     */
    async post<T = unknown>(url: string, body: string | object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'POST', body });
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? { tokensPerSecond: 5, maxBurst: 5 };
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }
}

async function decodeBody(response: Response, responseType: HttpResponseType): Promise<unknown> {
    switch (responseType) {
        case 'buffer':
            return new Uint8Array(await response.arrayBuffer());
        case 'text':
            return response.text();
        case 'json':
            return response.json();
        case 'auto': {
            const contentType = response.headers.get('content-type') ?? '';
            return contentType.includes('application/json') ? response.json() : response.text();
        }
    }
}

/**
 * Error bodies are diagnostics only: JSON when it parses, otherwise the raw text.
 */
async function decodeErrorBody(response: Response): Promise<unknown> {
    const text = await response.text().catch((error: unknown) => `<unreadable body: ${String(error)}>`);
    if (!(response.headers.get('content-type') ?? '').includes('application/json')) return text;
    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
}

/**
 * Retry-After as milliseconds: delta-seconds or an HTTP date.
 */
export function parseRetryAfter(header: string | null): number | undefined {
    if (!header) return undefined;

    const seconds = Number(header.trim());
    if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;

    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - Date.now());
    }

    return undefined;
}

function networkError(error: unknown, url: string, timeout: number): HttpError {
    if (error instanceof Error && error.name === 'AbortError') {
        return new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
    }
    const errorCode = networkErrorCode(error);
    return new HttpError(
        `Network error: ${error instanceof Error ? error.message : String(error)}`,
        0,
        errorCode ? RETRYABLE_ERROR_CODES.has(errorCode) : false
    );
}

function networkErrorCode(error: unknown): string | undefined {
    // undici wraps the socket error in `cause`
    for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: { timeout?: number; version?: string; email?: string }): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}
