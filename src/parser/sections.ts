import type { ParsedSection } from '../types/index.js';

/** Title given to text that precedes the first detected heading. */
export const FRONT_MATTER = 'Front Matter';

const KNOWN_HEADINGS = [
    'abstract',
    'introduction',
    'related work',
    'background',
    'preliminaries',
    'method',
    'methods',
    'methodology',
    'approach',
    'proposed method',
    'experiments',
    'experiment',
    'experimental setup',
    'experimental results',
    'results',
    'evaluation',
    'analysis',
    'ablation study',
    'ablation studies',
    'discussion',
    'conclusion',
    'conclusions',
    'limitations',
    'references',
    'bibliography',
    'acknowledgments',
    'acknowledgements',
    'acknowledgment',
    'acknowledgement',
    'appendix',
    'supplementary material',
];

const KNOWN_HEADING_SET = new Set(KNOWN_HEADINGS);

// "3 Experiments", "4.2 Results on ImageNet", "IV. EVALUATION"
const NUMBERED_HEADING = /^(?:\d{1,2}(?:\.\d{1,2})*\.?|[IVX]+\.)\s+([A-Z][A-Za-z0-9\-,:&()' ]{1,80})$/;
const CAPTION = /^(?:Figure|Fig\.|Table)\s*\d+[.:]?\s+\S/i;

/**
 * Decide whether a line is a section heading, returning its cleaned title.
 */
export function headingTitle(line: string): string | null {
    const text = line.trim();
    if (text.length === 0 || text.length > 90) return null;

    const bare = text.replace(/^(?:\d{1,2}(?:\.\d{1,2})*\.?|[IVX]+\.)\s*/, '').replace(/[:.]$/, '').trim();
    if (KNOWN_HEADING_SET.has(bare.toLowerCase())) return bare;

    const numbered = text.match(NUMBERED_HEADING);
    const title = numbered?.[1]?.trim();
    if (!title) return null;

    const words = title.split(/\s+/);
    if (words.length > 10 || title.endsWith('.')) return null;
    // A heading is mostly letters; numeric table rows are not
    const letters = title.replace(/[^A-Za-z]/g, '').length;
    if (letters < title.replace(/\s/g, '').length * 0.7) return null;

    return title;
}

/**
 * Split document text into heading-delimited sections.
 * Text before the first heading becomes a front-matter section.
 */
export function splitSections(text: string): ParsedSection[] {
    const sections: ParsedSection[] = [];
    let currentTitle = FRONT_MATTER;
    let buffer: string[] = [];

    const flush = (): void => {
        const content = buffer.join('\n').trim();
        if (content.length > 0 || currentTitle !== FRONT_MATTER) {
            sections.push({ title: currentTitle, content, order: sections.length });
        }
        buffer = [];
    };

    for (const line of text.split('\n')) {
        const title = headingTitle(line);
        if (title) {
            flush();
            currentTitle = title;
        } else {
            buffer.push(line);
        }
    }
    flush();

    return sections;
}

/**
 * Figure and table captions, in document order, without duplicates.
 */
export function extractCaptions(text: string): string[] {
    const captions: string[] = [];
    const seen = new Set<string>();
    for (const line of text.split('\n')) {
        const caption = line.trim();
        if (CAPTION.test(caption) && !seen.has(caption)) {
            seen.add(caption);
            captions.push(caption);
        }
    }
    return captions;
}
