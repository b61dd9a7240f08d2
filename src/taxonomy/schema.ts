import { z } from 'zod';
import { PAPER_TYPES, type ExtractionRecord } from '../types/index.js';
import type { Taxonomy } from './registry.js';

/**
 * Structural contract for one extraction record.
 *
 * Unknown keys are rejected so a drifting model cannot smuggle fields past validation.
 * Taxonomy membership is checked separately because the allowed categories depend on the run.
 */
export const extractionRecordSchema: z.ZodType<ExtractionRecord> = z
    .object({
        paper: z
            .object({
                title: z.string().min(1),
                paperType: z.enum(PAPER_TYPES),
                domain: z.string(),
                applicationField: z.string(),
            })
            .strict(),
        methods: z.array(
            z
                .object({
                    name: z.string().min(1),
                    category: z.string().min(1),
                    proposed: z.boolean(),
                })
                .strict()
        ),
        benchmarks: z.array(z.string().min(1)),
        results: z.array(
            z
                .object({
                    method: z.string().min(1),
                    benchmark: z.string().min(1),
                    metric: z.string().min(1),
                    value: z.number().finite(),
                    unit: z.string().nullable(),
                    split: z.string().nullable(),
                    evidence: z.string().trim().min(1, 'evidence quote is required'),
                })
                .strict()
        ),
    })
    .strict();

/**
 * Render zod issues as "path: message" strings.
 */
export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
    });
}

// ─── Response schema sent to the model ───────────────────────

type SchemaNode = Record<string, unknown>;

const str = (description?: string): SchemaNode => (description ? { type: 'string', description } : { type: 'string' });
const nullableStr = (description: string): SchemaNode => ({ type: 'string', nullable: true, description });

function object(properties: Record<string, SchemaNode>): SchemaNode {
    return { type: 'object', properties, required: Object.keys(properties) };
}

/**
 * Build the response schema in the OpenAPI subset that model endpoints accept.
 * Category values are restricted to the taxonomy when it is non-empty.
 */
export function buildResponseSchema(taxonomy: Taxonomy): SchemaNode {
    const categoryNames = taxonomy.nodes().map((node) => node.name);
    const category: SchemaNode =
        categoryNames.length > 0
            ? { type: 'string', enum: categoryNames, description: 'Taxonomy category of the method' }
            : str('Method category');

    return object({
        paper: object({
            title: str('Paper title as printed'),
            paperType: { type: 'string', enum: [...PAPER_TYPES] },
            domain: str('Research domain, e.g. "Computer Vision"'),
            applicationField: str('Application field the results apply to'),
        }),
        methods: {
            type: 'array',
            items: object({
                name: str('Method name as used in the paper'),
                category,
                proposed: { type: 'boolean', description: 'True if the paper introduces this method' },
            }),
        },
        benchmarks: { type: 'array', items: str('Benchmark or dataset name') },
        results: {
            type: 'array',
            items: object({
                method: str('Must match one of methods[].name'),
                benchmark: str('Must match one of benchmarks[]'),
                metric: str('Metric name, e.g. "Accuracy"'),
                value: { type: 'number', description: 'Numeric value as reported' },
                unit: nullableStr('Unit such as "%", or null'),
                split: nullableStr('Evaluation split such as "test", or null'),
                evidence: str('Verbatim sentence or table cell from the paper supporting the value'),
            }),
        },
    });
}
