import type { PaperRecord, TargetConfig } from '../types/index.js';
import { PAPER_TYPES } from '../types/index.js';
import type { Taxonomy } from '../taxonomy/registry.js';

export interface PromptInput {
    paper: PaperRecord;
    excerpt: string;
    truncated: boolean;
    taxonomy: Taxonomy;
    target: TargetConfig;
    responseSchema: Record<string, unknown>;
    pdfAttached: boolean;
}

export interface Prompt {
    systemPrompt: string;
    userPrompt: string;
}

/**
 * Build the extraction prompt for one paper.
 */
export function buildPrompt(input: PromptInput): Prompt {
    const { target, taxonomy } = input;
    const lines: string[] = [
        'You extract quantitative results reported in research papers into a strict JSON record.',
        '',
    ];

    if (target.topic) lines.push(`Topic of interest: ${target.topic}`);
    if (target.benchmarks.length > 0) lines.push(`Target benchmarks/datasets: ${target.benchmarks.join(', ')}`);
    if (target.metrics.length > 0) lines.push(`Target metrics: ${target.metrics.join(', ')}`);
    if (target.topic || target.benchmarks.length > 0 || target.metrics.length > 0) {
        lines.push('Report results on the target benchmarks and metrics; include other results only if clearly comparable.', '');
    }

    if (taxonomy.size > 0) {
        lines.push(
            'Classify every method into exactly one of these categories (use the category name, not an alias):',
            taxonomy.describe(),
            ''
        );
    }

    lines.push(
        'Rules:',
        `- paper.paperType is one of: ${PAPER_TYPES.join(', ')}.`,
        '- Every results[].method must appear in methods[].name and every results[].benchmark in benchmarks[].',
        '- value is a number exactly as reported (no unit, no ± part); put "%" or other units in unit.',
        '- evidence is a verbatim quote (sentence or table row) from the paper that contains the value.',
        '- Use null for unit or split when the paper does not state them.',
        '- Do not infer or compute values that are not printed in the paper.',
        '- If the paper reports no quantitative results, return empty methods, benchmarks and results arrays.',
        '',
        'Respond with a single JSON object matching this schema and nothing else:',
        JSON.stringify(input.responseSchema)
    );

    const user: string[] = [
        `arXiv id: ${input.paper.id}`,
        `Title: ${input.paper.title}`,
        `Categories: ${input.paper.categories.join(' ')}`,
        '',
    ];
    if (input.pdfAttached) {
        user.push('The full PDF is attached. The extracted text below may miss table layout; prefer the PDF for tables.', '');
    }
    user.push(input.truncated ? 'Paper content (excerpt):' : 'Paper content:', input.excerpt);

    return { systemPrompt: lines.join('\n'), userPrompt: user.join('\n') };
}

/**
 * Follow-up prompt after a response failed validation.
 */
export function buildRepairPrompt(original: Prompt, previousResponse: string, issues: string[]): Prompt {
    return {
        systemPrompt: original.systemPrompt,
        userPrompt: [
            original.userPrompt,
            '',
            'Your previous response was:',
            previousResponse,
            '',
            'It was rejected for these reasons:',
            ...issues.map((issue) => `- ${issue}`),
            '',
            'Return a corrected JSON object that satisfies the schema and rules.',
        ].join('\n'),
    };
}
