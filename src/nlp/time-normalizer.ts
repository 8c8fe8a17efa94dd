import type { ExtractionItem } from '../types/index.js';

/**
 * Attribute keys holding dates.
 */
export const TIME_FIELDS: readonly string[] = [
    'period_start',
    'period_end',
    'start_date',
    'end_date',
    'date',
    'expiry',
];

const MONTHS: Readonly<Record<string, string>> = {
    jan: '01', feb: '02', mar: '03', apr: '04', may: '05', jun: '06',
    jul: '07', aug: '08', sep: '09', oct: '10', nov: '11', dec: '12',
    january: '01', february: '02', march: '03', april: '04', june: '06',
    july: '07', august: '08', september: '09', october: '10',
    november: '11', december: '12',
};

/** Open-ended period markers, kept as written. */
const PASSTHROUGH: ReadonlySet<string> = new Set(['至今', '至今在职', '在职', 'present', 'now', 'current']);

function pad(month: string): string {
    return month.padStart(2, '0');
}

/**
 * Normalize one date-like value to `YYYY.MM`.
 * Unrecognized values come back trimmed.
 */
export function normalizeTime(value: string): string {
    const v = value.trim();
    if (!v) return v;

    if (PASSTHROUGH.has(v.toLowerCase())) return v;
    if (/^\d{4}\.\d{2}$/.test(v)) return v;

    let m = /^(\d{4})\.(\d)$/.exec(v);
    if (m) return `${m[1]}.${pad(m[2] ?? '')}`;

    m = /^(\d{4})\s*年?$/.exec(v);
    if (m) return `${m[1]}.01`;

    m = /^(\d{4})\s*年\s*(\d{1,2})\s*月?$/.exec(v);
    if (m) return `${m[1]}.${pad(m[2] ?? '')}`;

    m = /^(\d{4})[/-](\d{1,2})$/.exec(v);
    if (m) return `${m[1]}.${pad(m[2] ?? '')}`;

    m = /^([A-Za-z]+)\s+(\d{4})$/.exec(v);
    if (m) {
        const month = MONTHS[(m[1] ?? '').toLowerCase()];
        if (month) return `${m[2]}.${month}`;
    }

    return v;
}

/**
 * Normalize the date attributes of every item.
 * Items whose dates are already normalized are returned as-is.
 */
export function normalizeTimes(extractions: ExtractionItem[]): ExtractionItem[] {
    return extractions.map((ext) => {
        const attrs = ext.attributes;
        if (!attrs) return ext;

        let patched: Record<string, unknown> | null = null;
        for (const field of TIME_FIELDS) {
            const value = attrs[field];
            if (typeof value !== 'string') continue;

            const normalized = normalizeTime(value);
            if (normalized !== value) {
                patched = patched ?? { ...attrs };
                patched[field] = normalized;
            }
        }

        return patched ? { ...ext, attributes: patched } : ext;
    });
}
