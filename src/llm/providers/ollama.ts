import { z } from 'zod';
import type { ModelProvider, ModelProviderOptions, ModelRequest, ModelResponse } from '../../types/index.js';
import { HttpClient, getHttpClient } from '../../utils/http-client.js';
import { classifyFailure, parseBody } from './http.js';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

const chatResponse = z.object({
    message: z.object({ content: z.string() }).optional(),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
});

/**
 * Local Ollama adapter (/api/chat, non-streaming, JSON format).
 */
export class OllamaProvider implements ModelProvider {
    readonly name = 'ollama';
    readonly supportsPdfInput = false;
    readonly model: string;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly client: HttpClient;

    constructor(options: ModelProviderOptions, client?: HttpClient) {
        this.model = options.model;
        this.baseUrl = (options.baseUrl ?? DEFAULT_OLLAMA_URL).replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs;
        this.client = client ?? getHttpClient();
    }

    async complete(request: ModelRequest): Promise<ModelResponse> {
        let data: unknown;
        try {
            const response = await this.client.post<unknown>(
                `${this.baseUrl}/api/chat`,
                {
                    model: this.model,
                    stream: false,
                    format: 'json',
                    options: { temperature: request.temperature },
                    messages: [
                        { role: 'system', content: request.systemPrompt },
                        { role: 'user', content: request.userPrompt },
                    ],
                },
                { source: 'ollama', responseType: 'json', timeout: this.timeoutMs }
            );
            data = response.data;
        } catch (error) {
            return classifyFailure('ollama', error);
        }

        const decoded = parseBody('ollama', chatResponse, data);
        if (!decoded.ok) return decoded.response;
        const parsed = decoded.data;
        const promptTokens = parsed.prompt_eval_count ?? 0;
        const completionTokens = parsed.eval_count ?? 0;
        const usage = { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };

        const text = parsed.message?.content ?? '';
        if (text.trim().length === 0) return { kind: 'refusal', reason: 'empty response', usage };
        return { kind: 'completion', text, usage };
    }
}
