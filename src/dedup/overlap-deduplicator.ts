import type { ExtractionItem } from '../types/index.js';
import { isPopulated, textOf } from '../utils/fields.js';

/** Keys that describe grounding or scoring rather than content. */
const NON_CONTENT_KEYS: ReadonlySet<string> = new Set(['text', 'source_location', 'type', 'confidence']);

type Interval = readonly [number, number];

/**
 * Options for overlap deduplication.
 */
export interface OverlapDedupOptions {
    /** Overlap ratio above which two items conflict (default 0.5) */
    overlapThreshold?: number;

    /** Never merge items of different types (default false) */
    typeAware?: boolean;
}

/**
 * Outcome of one deduplication pass.
 */
export interface DedupResult {
    extractions: ExtractionItem[];
    removed: number;
}

/**
 * The item's grounded interval, or null when unlocated.
 */
export function intervalOf(item: ExtractionItem): Interval | null {
    const interval = item.source_location?.char_interval;
    if (!interval || interval.length !== 2) return null;

    const [start, end] = interval;
    if (typeof start !== 'number' || typeof end !== 'number') return null;
    return [start, end];
}

/**
 * Overlap length relative to the shorter interval, in [0, 1].
 * Zero when the intervals do not intersect or either is empty.
 */
export function overlapRatio(a: Interval, b: Interval): number {
    const overlapStart = Math.max(a[0], b[0]);
    const overlapEnd = Math.min(a[1], b[1]);
    if (overlapStart >= overlapEnd) return 0;

    const minLen = Math.min(a[1] - a[0], b[1] - b[0]);
    if (minLen <= 0) return 0;

    return (overlapEnd - overlapStart) / minLen;
}

/**
 * Number of populated content keys on an item.
 */
export function countPopulatedKeys(item: ExtractionItem): number {
    let count = 0;
    for (const [key, value] of Object.entries(item)) {
        if (!NON_CONTENT_KEYS.has(key) && isPopulated(value)) count++;
    }
    return count;
}

/**
 * Whether `a` should win over `b`: more populated keys, then longer text,
 * then higher confidence. A full tie keeps `b`.
 */
export function isBetter(a: ExtractionItem, b: ExtractionItem): boolean {
    const countA = countPopulatedKeys(a);
    const countB = countPopulatedKeys(b);
    if (countA !== countB) return countA > countB;

    const lenA = textOf(a).length;
    const lenB = textOf(b).length;
    if (lenA !== lenB) return lenA > lenB;

    return (a.confidence ?? 0) > (b.confidence ?? 0);
}

/**
 * Collapses items whose grounded spans substantially overlap.
 *
 * Located items are walked by start offset and compared with every item kept
 * so far; kept items are not interval-disjoint once removals happen, so the
 * scan is pairwise. Unlocated items bypass comparison and are appended.
 */
export class OverlapDeduplicator {
    private readonly overlapThreshold: number;
    private readonly typeAware: boolean;

    constructor(options: OverlapDedupOptions = {}) {
        this.overlapThreshold = options.overlapThreshold ?? 0.5;
        this.typeAware = options.typeAware ?? false;
    }

    process(extractions: ExtractionItem[]): DedupResult {
        const located: Array<{ item: ExtractionItem; interval: Interval }> = [];
        const unlocated: ExtractionItem[] = [];

        for (const item of extractions) {
            const interval = intervalOf(item);
            if (interval) {
                located.push({ item, interval });
            } else {
                unlocated.push(item);
            }
        }

        // Array.prototype.sort is stable: equal starts keep input order
        located.sort((x, y) => x.interval[0] - y.interval[0]);

        let kept: Array<{ item: ExtractionItem; interval: Interval }> = [];
        let removed = 0;

        for (const candidate of located) {
            let keep = true;

            for (const existing of [...kept]) {
                if (this.typeAware && candidate.item.type !== existing.item.type) continue;
                if (overlapRatio(candidate.interval, existing.interval) <= this.overlapThreshold) continue;

                removed++;
                if (isBetter(candidate.item, existing.item)) {
                    kept = kept.filter((entry) => entry !== existing);
                } else {
                    keep = false;
                    break;
                }
            }

            if (keep) kept.push(candidate);
        }

        return {
            extractions: [...kept.map((entry) => entry.item), ...unlocated],
            removed,
        };
    }
}
