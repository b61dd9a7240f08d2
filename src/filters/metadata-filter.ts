import type { CandidateSet, KeywordGroup, MetadataFilterConfig, PaperRecord } from '../types/index.js';

/**
 * Metadata predicate.
 *
 * A record is a candidate when it matches at least one keyword of every keyword group
 * (case-insensitive substring over the group's fields) and passes the category, date,
 * title-exclusion and DOI rules. Every rule left empty accepts all records.
 */
export function matchesMetadata(record: PaperRecord, config: MetadataFilterConfig): boolean {
    if (config.requireDoi && !record.doi) return false;

    if (config.categories.length > 0) {
        const allowed = new Set(config.categories.map((category) => category.toLowerCase()));
        if (!record.categories.some((category) => allowed.has(category.toLowerCase()))) return false;
    }

    if (config.dateFrom || config.dateTo) {
        // ISO dates compare correctly as strings
        const date = record.submittedAt;
        if (!date) return false;
        if (config.dateFrom && date < config.dateFrom) return false;
        if (config.dateTo && date > config.dateTo) return false;
    }

    const title = record.title.toLowerCase();
    if (config.excludeTitleKeywords.some((keyword) => title.includes(keyword.toLowerCase()))) return false;

    return config.keywordGroups.every((group) => matchesGroup(record, group));
}

/**
 * Keywords of a group that occur in the record, in configuration order.
 */
export function matchedKeywords(record: PaperRecord, group: KeywordGroup): string[] {
    const haystacks = group.fields.map((field) => record[field].toLowerCase());
    return group.keywords.filter((keyword) => {
        const needle = keyword.toLowerCase();
        return haystacks.some((text) => text.includes(needle));
    });
}

function matchesGroup(record: PaperRecord, group: KeywordGroup): boolean {
    return matchedKeywords(record, group).length > 0;
}

/**
 * Apply the metadata predicate to an in-memory sequence, keeping input order.
 * Filtering the output again with the same configuration returns it unchanged.
 */
export function filterCandidates(records: Iterable<PaperRecord>, config: MetadataFilterConfig): CandidateSet {
    const candidates: PaperRecord[] = [];
    for (const record of records) {
        if (matchesMetadata(record, config)) candidates.push(record);
    }
    return candidates;
}
