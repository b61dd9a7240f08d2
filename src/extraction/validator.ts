import type { ExtractionRecord, ModelResponse } from '../types/index.js';
import type { Taxonomy } from '../taxonomy/registry.js';
import { extractionRecordSchema, formatIssues } from '../taxonomy/schema.js';
import { errorMessage } from '../utils/errors.js';
import { normalizeValue } from './metrics.js';

/**
 * Tagged outcome of reading one model response.
 */
export type ValidationOutcome =
    | { kind: 'success'; record: ExtractionRecord }
    | { kind: 'validation_failure'; issues: string[] }
    | { kind: 'refused'; reason: string };

/**
 * Parse a model response into a validated extraction record.
 *
 * Never throws: malformed JSON, schema violations, unknown taxonomy categories,
 * dangling method/benchmark references and impossible percentages all come back
 * as a validation failure. Percentages are stored as fractions.
 */
export function parseModelResponse(response: ModelResponse, taxonomy: Taxonomy): ValidationOutcome {
    if (response.kind === 'refusal') {
        return { kind: 'refused', reason: response.reason };
    }

    let json: unknown;
    try {
        json = JSON.parse(extractJsonText(response.text));
    } catch (error) {
        return { kind: 'validation_failure', issues: [`response is not valid JSON: ${errorMessage(error)}`] };
    }

    const parsed = extractionRecordSchema.safeParse(json);
    if (!parsed.success) {
        return { kind: 'validation_failure', issues: formatIssues(parsed.error) };
    }

    const record = parsed.data;
    const issues: string[] = [];

    const methods = record.methods.map((method, index) => {
        if (taxonomy.size === 0) return method;
        const node = taxonomy.resolve(method.category);
        if (!node) {
            issues.push(`methods.${index}.category: unknown taxonomy category "${method.category}"`);
            return method;
        }
        return { ...method, category: node.name };
    });

    const methodNames = new Set(record.methods.map((method) => normalize(method.name)));
    const benchmarkNames = new Set(record.benchmarks.map(normalize));
    const results = record.results.map((result, index) => {
        const scaled = normalizeValue(result);
        if (!scaled) {
            issues.push(`results.${index}.value: ${result.value} is not a percentage between 0 and 100`);
        }
        if (!methodNames.has(normalize(result.method))) {
            issues.push(`results.${index}.method: "${result.method}" is not listed in methods`);
        }
        if (!benchmarkNames.has(normalize(result.benchmark))) {
            issues.push(`results.${index}.benchmark: "${result.benchmark}" is not listed in benchmarks`);
        }
        return scaled ? { ...result, ...scaled } : result;
    });

    if (issues.length > 0) {
        return { kind: 'validation_failure', issues };
    }

    return { kind: 'success', record: { ...record, methods, results } };
}

/**
 * Reason stored on a result that failed validation.
 */
export function validationReason(issues: readonly string[]): string {
    return `Schema validation failed: ${issues.join('; ')}`;
}

/**
 * Pull the JSON object out of a response that may be fenced or wrapped in prose.
 */
export function extractJsonText(text: string): string {
    const trimmed = text.trim();
    const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
    if (fenced?.[1] !== undefined) return fenced[1];

    if (trimmed.startsWith('{')) return trimmed;
    const start = trimmed.indexOf('{');
    const end = trimmed.lastIndexOf('}');
    return start >= 0 && end > start ? trimmed.slice(start, end + 1) : trimmed;
}

function normalize(name: string): string {
    return name.trim().toLowerCase();
}
