import type { LlmConfig, ModelProvider } from '../types/index.js';
import { getApiKey } from '../utils/config.js';
import type { HttpClient } from '../utils/http-client.js';
import { GeminiProvider } from './providers/gemini.js';
import { OpenAIProvider } from './providers/openai.js';
import { OllamaProvider } from './providers/ollama.js';

/**
 * Select the model adapter named by configuration.
 * Keys come from the environment; a missing key raises ConfigError.
 */
export function createProvider(config: LlmConfig, client?: HttpClient): ModelProvider {
    const base = { model: config.model, timeoutMs: config.timeoutMs, baseUrl: config.baseUrl };

    switch (config.provider) {
        case 'gemini':
            return new GeminiProvider({ ...base, apiKey: getApiKey('GEMINI_API_KEY') }, client);
        case 'openai':
            return new OpenAIProvider({ ...base, apiKey: getApiKey('OPENAI_API_KEY') }, client);
        case 'ollama':
            return new OllamaProvider({ ...base, baseUrl: config.baseUrl ?? process.env['OLLAMA_BASE_URL'] }, client);
    }
}

export { GeminiProvider, OpenAIProvider, OllamaProvider };
export { buildPrompt, buildRepairPrompt } from './prompt.js';
export { buildExcerpt } from './excerpt.js';
