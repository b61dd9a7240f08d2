import type { ProviderName } from './config.js';

/**
 * Interface for model provider adapters (Gemini, OpenAI, Ollama).
 * One adapter per provider, selected by configuration.
 */
export interface ModelProvider {
    /** Provider name */
    readonly name: ProviderName;

    /** Model identifier sent with every request */
    readonly model: string;

    /** Whether this provider accepts a PDF document alongside the text */
    readonly supportsPdfInput: boolean;

    /**
     * Send one extraction request.
     * Throws ModelUnavailableError on network, auth, quota or server failures.
     */
    complete(request: ModelRequest): Promise<ModelResponse>;
}

/**
 * Provider-independent request: the prompt parts plus the output contract.
 */
export interface ModelRequest {
    /** Instructions: targets, taxonomy, rules */
    systemPrompt: string;
    /** Document content (title, abstract, excerpt) */
    userPrompt: string;
    /** JSON schema the response must conform to */
    responseSchema: Record<string, unknown>;
    temperature: number;
    /** Raw PDF bytes for providers with document input */
    pdf?: Uint8Array;
}

/**
 * Result from a model request.
 * A refusal (safety block, empty candidate) is an answer, not a transport failure.
 */
export type ModelResponse =
    | {
          kind: 'completion';
          text: string;
          usage: ModelUsage;
      }
    | {
          kind: 'refusal';
          reason: string;
          usage: ModelUsage;
      };

/**
 * Token usage reported by the provider (zeros when not reported).
 */
export interface ModelUsage {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
}

/**
 * Provider initialization options.
 */
export interface ModelProviderOptions {
    /** API key (for cloud providers) */
    apiKey?: string;
    /** Base URL (for Ollama or custom endpoints) */
    baseUrl?: string;
    model: string;
    timeoutMs: number;
}
