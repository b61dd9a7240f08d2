import type { z } from 'zod';
import type { ModelResponse, ModelUsage } from '../../types/index.js';
import { HttpError } from '../../utils/http-client.js';
import { ModelUnavailableError, errorMessage } from '../../utils/errors.js';

/** Statuses that mean the endpoint cannot serve us right now, whatever the paper. */
const UNAVAILABLE_STATUSES = new Set([401, 403, 404, 408, 429]);

export const NO_USAGE: ModelUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

/**
 * Map a transport failure onto the provider contract.
 *
 * Auth, quota, missing model, server and network failures become ModelUnavailableError.
 * Any other 4xx is specific to this request (oversized document, rejected content) and is
 * answered as a refusal so the run moves on to the next paper, as is a success status
 * whose body could not be decoded.
 */
export function classifyFailure(provider: string, error: unknown): ModelResponse {
    if (error instanceof HttpError) {
        if (error.status === 0 || error.status >= 500 || UNAVAILABLE_STATUSES.has(error.status)) {
            throw new ModelUnavailableError(`${provider} unavailable: ${error.message}`, error.status, {
                cause: error,
                retryAfterMs: error.retryAfterMs,
            });
        }
        if (error.status < 300) {
            return { kind: 'refusal', reason: `${provider} returned an unreadable response body`, usage: NO_USAGE };
        }
        return { kind: 'refusal', reason: `${provider} rejected the request: ${error.message}`, usage: NO_USAGE };
    }
    throw new ModelUnavailableError(`${provider} request failed: ${errorMessage(error)}`, 0, { cause: error });
}

/**
 * Validate a provider response body. An unexpected shape is a problem with this answer,
 * not with the endpoint, so it yields a refusal instead of an outage.
 */
export function parseBody<T>(provider: string, schema: z.ZodType<T>, body: unknown): { ok: true; data: T } | { ok: false; response: ModelResponse } {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? ` (${issue.path.join('.') || 'body'}: ${issue.message})` : '';
        return { ok: false, response: { kind: 'refusal', reason: `${provider} returned an unexpected response body${where}`, usage: NO_USAGE } };
    }
    return { ok: true, data: parsed.data };
}
