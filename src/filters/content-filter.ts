import type { ContentDecision, ContentFilterConfig, ParsedPaper } from '../types/index.js';

/**
 * Content-level predicate over a parsed paper.
 *
 * Included when the document parsed, is long enough, mentions at least one configured
 * keyword and has a section whose title contains a required section keyword.
 * The matched keywords and sections are returned as evidence for the decision.
 */
export function evaluateContent(paper: ParsedPaper, config: ContentFilterConfig): ContentDecision {
    const reasons: string[] = [];
    const text = paper.fullText.toLowerCase();

    if (paper.status === 'failed') {
        reasons.push(`parse failed: ${paper.reason ?? 'unknown reason'}`);
    }

    const textLength = paper.fullText.length;
    if (textLength < config.minTextLength) {
        reasons.push(`text too short (${textLength} < ${config.minTextLength})`);
    }

    const matchedKeywords = config.keywords.filter((keyword) => text.includes(keyword.toLowerCase()));
    if (config.keywords.length > 0 && matchedKeywords.length === 0) {
        reasons.push('no content keyword found');
    }

    const matchedSections = paper.sections
        .filter((section) => {
            const title = section.title.toLowerCase();
            return config.requiredSectionKeywords.some((keyword) => title.includes(keyword.toLowerCase()));
        })
        .map((section) => section.title);
    if (config.requiredSectionKeywords.length > 0 && matchedSections.length === 0) {
        reasons.push(`no section matching ${config.requiredSectionKeywords.join('/')}`);
    }

    return {
        paperId: paper.paperId,
        included: reasons.length === 0,
        matchedKeywords,
        matchedSections,
        textLength,
        reasons,
    };
}
