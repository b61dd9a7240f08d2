import type { ExcerptConfig, ParsedPaper, ParsedSection } from '../types/index.js';

export const TRUNCATION_MARKER = '\n[...truncated]';

/** Below this many characters a cut block is dropped instead of sent. */
const MIN_PARTIAL_BLOCK = 200;

export interface Excerpt {
    text: string;
    truncated: boolean;
    /** Titles of the blocks included, in the order sent */
    blocks: string[];
}

interface Block {
    title: string;
    body: string;
}

/**
 * Bounded document content for a model request.
 *
 * Documents that fit are sent whole in reading order (minus excluded sections).
 * Larger ones are assembled by priority: result-bearing sections and captions first,
 * then the abstract, then the remaining sections, cutting the block that overflows.
 */
export function buildExcerpt(
    paper: ParsedPaper,
    abstract: string,
    config: ExcerptConfig,
    maxChars: number
): Excerpt {
    const kept = paper.sections.filter((section) => !titleMatches(section, config.excludeSections));

    const whole: Block[] = [];
    if (abstract && !kept.some(isAbstract)) whole.push({ title: 'Abstract', body: abstract });
    whole.push(...kept.map(toBlock));

    const wholeText = render(whole);
    if (wholeText.length <= maxChars) {
        return { text: wholeText, truncated: false, blocks: whole.map((block) => block.title) };
    }

    const priority = kept.filter((section) => titleMatches(section, config.priorityKeywords));
    const rest = kept.filter((section) => !priority.includes(section) && !(abstract && isAbstract(section)));

    const ordered: Block[] = priority.map(toBlock);
    if (paper.captions.length > 0) {
        ordered.push({ title: 'Figure and Table Captions', body: paper.captions.join('\n') });
    }
    if (abstract) ordered.push({ title: 'Abstract', body: abstract });
    ordered.push(...rest.map(toBlock));

    const chosen: Block[] = [];
    let used = 0;
    for (const block of ordered) {
        const separator = chosen.length > 0 ? 2 : 0;
        const size = renderBlock(block).length + separator;

        if (used + size <= maxChars) {
            chosen.push(block);
            used += size;
            continue;
        }

        // Header, separator and marker must fit alongside the cut body
        const header = `## ${block.title}\n`;
        const room = maxChars - used - separator - header.length - TRUNCATION_MARKER.length;
        if (room >= MIN_PARTIAL_BLOCK) {
            chosen.push({ title: block.title, body: block.body.slice(0, room).trimEnd() + TRUNCATION_MARKER });
        }
        break;
    }

    return { text: render(chosen), truncated: true, blocks: chosen.map((block) => block.title) };
}

function toBlock(section: ParsedSection): Block {
    return { title: section.title, body: section.content };
}

function renderBlock(block: Block): string {
    return `## ${block.title}\n${block.body}`;
}

function render(blocks: Block[]): string {
    return blocks.map(renderBlock).join('\n\n');
}

function titleMatches(section: ParsedSection, keywords: string[]): boolean {
    const title = section.title.toLowerCase();
    return keywords.some((keyword) => title.includes(keyword.toLowerCase()));
}

function isAbstract(section: ParsedSection): boolean {
    return section.title.toLowerCase() === 'abstract';
}
