import { describe, it, expect } from 'vitest';
import type { ExcerptConfig, ParsedPaper } from '../types/index.js';
import { TRUNCATION_MARKER, buildExcerpt } from '../llm/excerpt.js';
import { buildPrompt, buildRepairPrompt } from '../llm/prompt.js';
import { Taxonomy } from '../taxonomy/registry.js';
import { makePaper, makeParsed } from './helpers.js';

const CONFIG: ExcerptConfig = {
    priorityKeywords: ['experiment'],
    excludeSections: ['references'],
};

function paperWithSections(): ParsedPaper {
    return {
        ...makeParsed('2401.00001', ''),
        sections: [
            { title: 'Introduction', content: 'I'.repeat(300), order: 0 },
            { title: 'Experiments', content: 'E'.repeat(300), order: 1 },
            { title: 'References', content: 'R'.repeat(300), order: 2 },
        ],
        captions: ['Table 1: Acc.'],
    };
}

describe('buildExcerpt', () => {
    it('should send a document that fits whole, in reading order, abstract first', () => {
        const excerpt = buildExcerpt(paperWithSections(), 'Short abstract.', CONFIG, 10_000);

        expect(excerpt.truncated).toBe(false);
        expect(excerpt.blocks).toEqual(['Abstract', 'Introduction', 'Experiments']);
        expect(excerpt.text).toBe(
            `## Abstract\nShort abstract.\n\n## Introduction\n${'I'.repeat(300)}\n\n## Experiments\n${'E'.repeat(300)}`
        );
    });

    it('should not duplicate an abstract the document already has', () => {
        const paper = { ...paperWithSections(), sections: [{ title: 'Abstract', content: 'From the PDF.', order: 0 }] };
        const excerpt = buildExcerpt(paper, 'From the snapshot.', CONFIG, 10_000);
        expect(excerpt.text).toBe('## Abstract\nFrom the PDF.');
    });

    it('should prioritize result sections and captions when the document is too long', () => {
        const excerpt = buildExcerpt(paperWithSections(), 'Short abstract.', CONFIG, 400);

        expect(excerpt.truncated).toBe(true);
        expect(excerpt.blocks).toEqual(['Experiments', 'Figure and Table Captions', 'Abstract']);
        expect(excerpt.text.length).toBe(388);
        expect(excerpt.text).not.toContain('## References');
    });

    it('should cut the overflowing block when enough room remains', () => {
        const excerpt = buildExcerpt(paperWithSections(), 'Short abstract.', CONFIG, 650);

        expect(excerpt.blocks).toEqual(['Experiments', 'Figure and Table Captions', 'Abstract', 'Introduction']);
        expect(excerpt.text.length).toBe(650);
        expect(excerpt.text.endsWith(`## Introduction\n${'I'.repeat(229)}${TRUNCATION_MARKER}`)).toBe(true);
    });
});

describe('buildPrompt', () => {
    const taxonomy = Taxonomy.fromNodes([{ name: 'CNN', aliases: ['ConvNet'] }]);
    const paper = makePaper('2401.00001', { title: 'FastNet', categories: ['cs.CV', 'cs.LG'] });

    it('should state the targets, taxonomy and schema', () => {
        const prompt = buildPrompt({
            paper,
            excerpt: '## Results\nFastNet gets 81.2%.',
            truncated: false,
            taxonomy,
            target: { topic: 'image classification', benchmarks: ['ImageNet'], metrics: ['Top-1 Accuracy'] },
            responseSchema: { type: 'object' },
            pdfAttached: false,
        });

        const system = prompt.systemPrompt.split('\n');
        expect(system).toContain('Topic of interest: image classification');
        expect(system).toContain('Target benchmarks/datasets: ImageNet');
        expect(system).toContain('Target metrics: Top-1 Accuracy');
        expect(system).toContain('- CNN (aliases: ConvNet)');
        expect(system[system.length - 1]).toBe('{"type":"object"}');
        expect(prompt.userPrompt).toBe(
            ['arXiv id: 2401.00001', 'Title: FastNet', 'Categories: cs.CV cs.LG', '', 'Paper content:', '## Results\nFastNet gets 81.2%.'].join('\n')
        );
    });

    it('should mention the attachment and the excerpt', () => {
        const prompt = buildPrompt({
            paper,
            excerpt: 'text',
            truncated: true,
            taxonomy: Taxonomy.fromNodes([]),
            target: { topic: '', benchmarks: [], metrics: [] },
            responseSchema: {},
            pdfAttached: true,
        });

        expect(prompt.userPrompt).toContain('The full PDF is attached.');
        expect(prompt.userPrompt.endsWith('Paper content (excerpt):\ntext')).toBe(true);
        expect(prompt.systemPrompt).not.toContain('Classify every method');
    });

    it('should append the rejected response and issues for a repair', () => {
        const repair = buildRepairPrompt({ systemPrompt: 'S', userPrompt: 'U' }, '{"bad":true}', ['paper: Required']);

        expect(repair.systemPrompt).toBe('S');
        expect(repair.userPrompt).toBe(
            [
                'U',
                '',
                'Your previous response was:',
                '{"bad":true}',
                '',
                'It was rejected for these reasons:',
                '- paper: Required',
                '',
                'Return a corrected JSON object that satisfies the schema and rules.',
            ].join('\n')
        );
    });
});
