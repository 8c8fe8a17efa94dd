import { describe, it, expect } from 'vitest';
import {
    OverlapDeduplicator,
    overlapRatio,
    isBetter,
    countPopulatedKeys,
    intervalOf,
} from '../dedup/overlap-deduplicator.js';
import type { ExtractionItem } from '../types/index.js';

// Helper: an item grounded at [start, end)
function located(start: number, end: number, fields: Partial<ExtractionItem> = {}): ExtractionItem {
    return {
        type: 'entity',
        text: 'x'.repeat(end - start),
        source_location: {
            char_start: start,
            char_end: end,
            char_interval: [start, end],
            line: 1,
            match_type: 'exact',
            confidence: 1.0,
        },
        ...fields,
    };
}

describe('overlapRatio', () => {
    it('should measure overlap against the shorter interval', () => {
        expect(overlapRatio([0, 12], [6, 12])).toBe(1.0);
        expect(overlapRatio([0, 10], [5, 20])).toBe(0.5);
    });

    it('should be symmetric', () => {
        const pairs: Array<[[number, number], [number, number]]> = [
            [[0, 12], [6, 12]],
            [[3, 9], [5, 40]],
            [[0, 4], [2, 3]],
        ];
        for (const [a, b] of pairs) {
            expect(overlapRatio(a, b)).toBe(overlapRatio(b, a));
        }
    });

    it('should be zero for disjoint or touching intervals', () => {
        expect(overlapRatio([0, 5], [10, 15])).toBe(0);
        expect(overlapRatio([0, 5], [5, 10])).toBe(0);
    });

    it('should be zero for empty intervals', () => {
        expect(overlapRatio([4, 4], [0, 10])).toBe(0);
    });
});

describe('isBetter', () => {
    it('should prefer more populated keys', () => {
        const rich = located(0, 5, { summary: 'Level class' });
        const bare = located(0, 8);
        expect(isBetter(rich, bare)).toBe(true);
        expect(isBetter(bare, rich)).toBe(false);
    });

    it('should not count empty values or grounding fields', () => {
        const item = located(0, 5, { summary: '', attributes: {}, related_entities: [], confidence: 0.9 });
        expect(countPopulatedKeys(item)).toBe(0);
    });

    it('should break key ties by text length, then confidence', () => {
        expect(isBetter(located(0, 8), located(0, 5))).toBe(true);
        expect(isBetter(located(0, 5, { confidence: 0.9 }), located(0, 5, { confidence: 0.4 }))).toBe(true);
        expect(isBetter(located(0, 5), located(0, 5))).toBe(false);
    });
});

describe('intervalOf', () => {
    it('should treat a null endpoint as unlocated', () => {
        const item: ExtractionItem = {
            text: 'x',
            source_location: {
                char_start: null,
                char_end: null,
                char_interval: [null, null],
                line: null,
                match_type: 'none',
                confidence: 0.1,
            },
        };
        expect(intervalOf(item)).toBeNull();
        expect(intervalOf({ text: 'x' })).toBeNull();
    });

    it('should treat intervals without exactly two endpoints as unlocated', () => {
        const partial = located(0, 5);
        if (partial.source_location) partial.source_location.char_interval = [5];
        const long = located(0, 5);
        if (long.source_location) long.source_location.char_interval = [0, 5, 9];

        expect(intervalOf(partial)).toBeNull();
        expect(intervalOf(long)).toBeNull();
        expect(intervalOf(located(2, 7))).toEqual([2, 7]);
    });
});

describe('OverlapDeduplicator', () => {
    it('should keep the richer of two overlapping items', () => {
        const full = located(0, 12, { text: 'class MLevel', summary: 'Level class' });
        const partial = located(6, 12, { text: 'MLevel' });

        const { extractions, removed } = new OverlapDeduplicator().process([partial, full]);

        expect(extractions).toEqual([full]);
        expect(removed).toBe(1);
    });

    it('should replace a kept item when a later one is better', () => {
        const short = located(50, 60, { type: 'rule', text: 'do not edit' });
        const long = located(50, 65, { type: 'rule', text: 'do not edit config', summary: 'Config is read-only' });

        const { extractions } = new OverlapDeduplicator().process([short, long]);

        expect(extractions).toEqual([long]);
    });

    it('should compare a candidate against every kept item', () => {
        // left and right overlap by 0.4 and both survive; wide sits inside both
        const left = located(0, 10);
        const right = located(6, 16);
        const wide = located(7, 10, { summary: 'covers both', reason: 'merged span' });

        const { extractions, removed } = new OverlapDeduplicator().process([left, right, wide]);

        expect(extractions).toEqual([wide]);
        expect(removed).toBe(2);
    });

    it('should keep items at exactly the threshold', () => {
        const a = located(0, 10);
        const b = located(5, 15);
        const { extractions } = new OverlapDeduplicator({ overlapThreshold: 0.5 }).process([a, b]);
        expect(extractions).toEqual([a, b]);
    });

    it('should not merge different types in type-aware mode', () => {
        const entity = located(0, 10, { type: 'entity' });
        const rule = located(0, 10, { type: 'rule', summary: 'richer' });

        const aware = new OverlapDeduplicator({ typeAware: true }).process([entity, rule]);
        const blind = new OverlapDeduplicator().process([entity, rule]);

        expect(aware.extractions).toEqual([entity, rule]);
        expect(blind.extractions).toEqual([rule]);
    });

    it('should append unlocated items after kept ones, in input order', () => {
        const loose1: ExtractionItem = { type: 'relation', from: 'A', to: 'B' };
        const loose2: ExtractionItem = { type: 'skill', text: 'Go' };
        const late = located(30, 40);
        const early = located(0, 10);

        const { extractions } = new OverlapDeduplicator().process([loose1, late, loose2, early]);

        expect(extractions).toEqual([early, late, loose1, loose2]);
    });

    it('should return an empty list for an empty batch', () => {
        expect(new OverlapDeduplicator().process([]).extractions).toEqual([]);
    });

    it('should not mutate its input', () => {
        const input = [located(6, 12), located(0, 12, { summary: 'x' })];
        const snapshot = structuredClone(input);
        new OverlapDeduplicator().process(input);
        expect(input).toEqual(snapshot);
    });
});
