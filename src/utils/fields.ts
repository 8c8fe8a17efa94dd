import type { ExtractionItem } from '../types/index.js';

/**
 * Truthiness as upstream JSON producers mean it: empty strings, zero,
 * empty arrays and empty objects count as "not populated".
 */
export function isPopulated(value: unknown): boolean {
    if (value === null || value === undefined || value === false) return false;
    if (typeof value === 'string') return value.length > 0;
    if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
    if (Array.isArray(value)) return value.length > 0;
    if (typeof value === 'object') return Object.keys(value).length > 0;
    return true;
}

/**
 * Item text, or '' when absent or not a string.
 */
export function textOf(item: ExtractionItem): string {
    return typeof item.text === 'string' ? item.text : '';
}

/**
 * Item summary, or '' when absent or not a string.
 */
export function summaryOf(item: ExtractionItem): string {
    return typeof item.summary === 'string' ? item.summary : '';
}

/**
 * Read a descriptive field: the item itself wins over its `attributes` mapping.
 */
export function readField(item: ExtractionItem, key: string): unknown {
    const own = item[key];
    if (isPopulated(own)) return own;
    return item.attributes?.[key];
}

/**
 * Render an attribute value for human-readable output.
 */
export function formatValue(value: unknown): string {
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) return value.map(formatValue).join(', ');
    if (value !== null && typeof value === 'object') return JSON.stringify(value);
    return String(value);
}
