import { sequenceRatio } from './sequence-matcher.js';

/**
 * Similarity between two entity names, symmetric, in [0, 1].
 *
 * - identical                → 1.0
 * - one contains the other   → 0.9 × shorter / longer
 * - otherwise                → matching-blocks ratio
 *
 * An empty name never matches anything.
 */
export function nameSimilarity(a: string, b: string): number {
    if (!a || !b) return 0;
    if (a === b) return 1.0;

    if (a.includes(b) || b.includes(a)) {
        const shorter = Math.min(a.length, b.length);
        const longer = Math.max(a.length, b.length);
        return 0.9 * (shorter / longer);
    }

    return sequenceRatio(a, b);
}
