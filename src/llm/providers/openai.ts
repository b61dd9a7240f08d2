import { z } from 'zod';
import type { ModelProvider, ModelProviderOptions, ModelRequest, ModelResponse } from '../../types/index.js';
import { HttpClient, getHttpClient } from '../../utils/http-client.js';
import { ConfigError } from '../../utils/errors.js';
import { NO_USAGE, classifyFailure, parseBody } from './http.js';

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

const chatCompletionResponse = z.object({
    choices: z.array(
        z.object({
            message: z.object({
                content: z.string().nullable().optional(),
                refusal: z.string().nullable().optional(),
            }),
            finish_reason: z.string().nullable().optional(),
        })
    ),
    usage: z
        .object({
            prompt_tokens: z.number(),
            completion_tokens: z.number(),
            total_tokens: z.number(),
        })
        .optional(),
});

/**
 * OpenAI chat completions adapter in JSON mode.
 * The schema travels in the system prompt.
 */
export class OpenAIProvider implements ModelProvider {
    readonly name = 'openai';
    readonly supportsPdfInput = false;
    readonly model: string;
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly client: HttpClient;

    constructor(options: ModelProviderOptions, client?: HttpClient) {
        if (!options.apiKey) {
            throw new ConfigError('OPENAI_API_KEY is not set', 'llm.provider');
        }
        this.apiKey = options.apiKey;
        this.model = options.model;
        this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs;
        this.client = client ?? getHttpClient();
    }

    async complete(request: ModelRequest): Promise<ModelResponse> {
        let data: unknown;
        try {
            const response = await this.client.post<unknown>(
                `${this.baseUrl}/chat/completions`,
                {
                    model: this.model,
                    temperature: request.temperature,
                    response_format: { type: 'json_object' },
                    messages: [
                        { role: 'system', content: request.systemPrompt },
                        { role: 'user', content: request.userPrompt },
                    ],
                },
                {
                    source: 'openai',
                    responseType: 'json',
                    timeout: this.timeoutMs,
                    headers: { Authorization: `Bearer ${this.apiKey}` },
                }
            );
            data = response.data;
        } catch (error) {
            return classifyFailure('openai', error);
        }

        const decoded = parseBody('openai', chatCompletionResponse, data);
        if (!decoded.ok) return decoded.response;
        const parsed = decoded.data;
        const usage = parsed.usage
            ? {
                  promptTokens: parsed.usage.prompt_tokens,
                  completionTokens: parsed.usage.completion_tokens,
                  totalTokens: parsed.usage.total_tokens,
              }
            : NO_USAGE;

        const choice = parsed.choices[0];
        if (!choice) return { kind: 'refusal', reason: 'no choices returned', usage };
        if (choice.message.refusal) return { kind: 'refusal', reason: choice.message.refusal, usage };
        if (choice.finish_reason === 'content_filter') {
            return { kind: 'refusal', reason: 'response blocked by content filter', usage };
        }

        const text = choice.message.content ?? '';
        if (text.trim().length === 0) return { kind: 'refusal', reason: 'empty response', usage };

        return { kind: 'completion', text, usage };
    }
}
