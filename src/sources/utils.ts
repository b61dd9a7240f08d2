/**
 * Identifier and text helpers shared by the snapshot reader and the PDF source.
 */

const NEW_STYLE_ID = /(\d{4}\.\d{4,5})(?:v\d+)?/;
const OLD_STYLE_ID = /([a-z-]+(?:\.[A-Z]{2})?\/\d{7})(?:v\d+)?/;

/**
 * Extract an arXiv ID (without version) from various formats.
 * "https://arxiv.org/abs/2401.01234v2" → "2401.01234"
 * "arXiv:2401.01234" → "2401.01234"
 * "math/0601001v1" → "math/0601001"
 */
export function extractArxivId(input: string | null | undefined): string | null {
    if (!input) return null;
    const text = input.trim();

    const patterns = [
        new RegExp(`arxiv\\.org/(?:abs|pdf)/${NEW_STYLE_ID.source}`, 'i'),
        new RegExp(`arxiv\\.org/(?:abs|pdf)/${OLD_STYLE_ID.source}`, 'i'),
        new RegExp(`^arxiv:${NEW_STYLE_ID.source}$`, 'i'),
        new RegExp(`^arxiv:${OLD_STYLE_ID.source}$`, 'i'),
        new RegExp(`^${NEW_STYLE_ID.source}$`),
        new RegExp(`^${OLD_STYLE_ID.source}$`),
    ];

    for (const pattern of patterns) {
        const match = text.match(pattern);
        if (match?.[1]) return match[1];
    }

    return null;
}

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .trim() || null;
}

/**
 * Collapse runs of whitespace (snapshot titles carry hard line breaks).
 */
export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Reduce a date-like string to YYYY-MM-DD, or null when it cannot be read.
 * Accepts ISO dates and RFC 2822 dates ("Mon, 2 Apr 2007 19:18:42 GMT").
 */
export function toIsoDate(value: string | null | undefined): string | null {
    if (!value) return null;
    const iso = value.match(/^(\d{4}-\d{2}-\d{2})/);
    if (iso?.[1]) return iso[1];

    const parsed = new Date(value);
    if (isNaN(parsed.getTime())) return null;
    return parsed.toISOString().slice(0, 10);
}
