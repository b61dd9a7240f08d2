import { z } from 'zod';
import type { ModelProvider, ModelProviderOptions, ModelRequest, ModelResponse } from '../../types/index.js';
import { HttpClient, getHttpClient } from '../../utils/http-client.js';
import { ConfigError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import { NO_USAGE, classifyFailure, parseBody } from './http.js';

const logger = getLogger();

const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

/** Inline request payloads are capped at 20 MB; base64 inflates by a third. */
export const GEMINI_INLINE_PDF_LIMIT = 14 * 1024 * 1024;

const BLOCKING_FINISH_REASONS = new Set(['SAFETY', 'RECITATION', 'BLOCKLIST', 'PROHIBITED_CONTENT', 'SPII', 'LANGUAGE']);

const generateContentResponse = z.object({
    candidates: z
        .array(
            z.object({
                content: z.object({ parts: z.array(z.object({ text: z.string().optional() }).passthrough()).optional() }).optional(),
                finishReason: z.string().optional(),
            })
        )
        .optional(),
    promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
    usageMetadata: z
        .object({
            promptTokenCount: z.number().optional(),
            candidatesTokenCount: z.number().optional(),
            totalTokenCount: z.number().optional(),
        })
        .optional(),
});

/**
 * Google Gemini adapter (generateContent REST endpoint).
 * Accepts the PDF inline next to the text prompt.
 */
export class GeminiProvider implements ModelProvider {
    readonly name = 'gemini';
    readonly supportsPdfInput = true;
    readonly model: string;
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly client: HttpClient;

    constructor(options: ModelProviderOptions, client?: HttpClient) {
        if (!options.apiKey) {
            throw new ConfigError('GEMINI_API_KEY is not set', 'llm.provider');
        }
        this.apiKey = options.apiKey;
        this.model = options.model;
        this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs;
        this.client = client ?? getHttpClient();
    }

    async complete(request: ModelRequest): Promise<ModelResponse> {
        const parts: Array<Record<string, unknown>> = [];
        if (request.pdf && request.pdf.length <= GEMINI_INLINE_PDF_LIMIT) {
            parts.push({ inline_data: { mime_type: 'application/pdf', data: Buffer.from(request.pdf).toString('base64') } });
        } else if (request.pdf) {
            logger.debug({ bytes: request.pdf.length }, 'PDF too large to inline, sending text only');
        }
        parts.push({ text: request.userPrompt });

        const body = {
            systemInstruction: { parts: [{ text: request.systemPrompt }] },
            contents: [{ role: 'user', parts }],
            generationConfig: {
                temperature: request.temperature,
                responseMimeType: 'application/json',
                responseSchema: toGeminiSchema(request.responseSchema),
            },
        };

        let data: unknown;
        try {
            const response = await this.client.post<unknown>(
                `${this.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent`,
                body,
                {
                    source: 'gemini',
                    responseType: 'json',
                    timeout: this.timeoutMs,
                    headers: { 'x-goog-api-key': this.apiKey },
                }
            );
            data = response.data;
        } catch (error) {
            return classifyFailure('gemini', error);
        }

        const decoded = parseBody('gemini', generateContentResponse, data);
        if (!decoded.ok) return decoded.response;
        const parsed = decoded.data;
        const usage = parsed.usageMetadata
            ? {
                  promptTokens: parsed.usageMetadata.promptTokenCount ?? 0,
                  completionTokens: parsed.usageMetadata.candidatesTokenCount ?? 0,
                  totalTokens: parsed.usageMetadata.totalTokenCount ?? 0,
              }
            : NO_USAGE;

        if (parsed.promptFeedback?.blockReason) {
            return { kind: 'refusal', reason: `prompt blocked: ${parsed.promptFeedback.blockReason}`, usage };
        }

        const candidate = parsed.candidates?.[0];
        if (!candidate) {
            return { kind: 'refusal', reason: 'no candidates returned', usage };
        }
        if (candidate.finishReason && BLOCKING_FINISH_REASONS.has(candidate.finishReason)) {
            return { kind: 'refusal', reason: `response blocked: ${candidate.finishReason}`, usage };
        }

        const text = (candidate.content?.parts ?? []).map((part) => part.text ?? '').join('');
        if (text.trim().length === 0) {
            return { kind: 'refusal', reason: `empty response (${candidate.finishReason ?? 'no finish reason'})`, usage };
        }

        return { kind: 'completion', text, usage };
    }
}

/**
 * Gemini spells schema types in upper case ("OBJECT", "STRING").
 */
export function toGeminiSchema(schema: unknown): unknown {
    if (Array.isArray(schema)) return schema.map(toGeminiSchema);
    if (typeof schema !== 'object' || schema === null) return schema;

    const converted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(schema)) {
        converted[key] = key === 'type' && typeof value === 'string' ? value.toUpperCase() : toGeminiSchema(value);
    }
    return converted;
}
