import type { ExtractedResult } from '../types/index.js';

const PERCENT_UNITS = new Set(['%', 'percent', 'percentage', 'pct']);

/**
 * Put a reported value on one scale: percentages become fractions (81.2 % -> 0.812)
 * and drop their unit, so rows reported either way rank against each other.
 * Returns null for a percentage outside 0-100. Applying it twice changes nothing.
 */
export function normalizeValue(result: Pick<ExtractedResult, 'value' | 'unit'>): { value: number; unit: string | null } | null {
    const unit = result.unit?.trim() ?? null;
    if (unit === null || !PERCENT_UNITS.has(unit.toLowerCase())) {
        return { value: result.value, unit: unit === '' ? null : unit };
    }
    if (result.value < 0 || result.value > 100) return null;
    // toPrecision drops the binary noise of the division (81.2 / 100)
    return { value: Number((result.value / 100).toPrecision(12)), unit: null };
}
