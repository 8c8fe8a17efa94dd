import { describe, it, expect } from 'vitest';
import { SequenceMatcher, sequenceRatio } from '../nlp/sequence-matcher.js';
import { nameSimilarity } from '../nlp/similarity.js';
import { normalizeTime, normalizeTimes } from '../nlp/time-normalizer.js';
import type { ExtractionItem } from '../types/index.js';

describe('SequenceMatcher', () => {
    describe('findLongestMatch', () => {
        it('should find the longest common block', () => {
            const matcher = new SequenceMatcher('abcd abcd');
            expect(matcher.findLongestMatch(' abcd')).toEqual({ a: 0, b: 4, size: 5 });
        });

        it('should prefer the block starting earliest in the first string', () => {
            const matcher = new SequenceMatcher('xyz abc');
            // "abc" and "xyz" are both length 3; "abc" comes first in the query
            expect(matcher.findLongestMatch('abc xyz')).toEqual({ a: 0, b: 4, size: 3 });
        });

        it('should report size 0 when nothing matches', () => {
            const matcher = new SequenceMatcher('abc');
            expect(matcher.findLongestMatch('xyz').size).toBe(0);
        });

        it('should respect the search window', () => {
            const matcher = new SequenceMatcher('abcabc');
            expect(matcher.findLongestMatch('abc', 0, 3, 1, 6)).toEqual({ a: 0, b: 3, size: 3 });
        });
    });

    describe('getMatchingBlocks', () => {
        it('should decompose around the longest match', () => {
            const matcher = new SequenceMatcher('abcd');
            expect(matcher.getMatchingBlocks('abxcd')).toEqual([
                { a: 0, b: 0, size: 2 },
                { a: 3, b: 2, size: 2 },
            ]);
        });

        it('should return blocks sorted by position', () => {
            const matcher = new SequenceMatcher('abycdf');
            expect(matcher.getMatchingBlocks('qabxcd')).toEqual([
                { a: 1, b: 0, size: 2 },
                { a: 4, b: 3, size: 2 },
            ]);
        });
    });

    describe('ratio', () => {
        it('should be 2M/T', () => {
            expect(sequenceRatio('abcd', 'bcde')).toBeCloseTo(0.75);
            expect(sequenceRatio('MLevel', 'MGLevel')).toBeCloseTo(12 / 13);
        });

        it('should be 1.0 for two empty strings', () => {
            expect(sequenceRatio('', '')).toBe(1.0);
        });

        it('should be 0 when one side is empty', () => {
            expect(sequenceRatio('abc', '')).toBe(0);
        });
    });
});

describe('nameSimilarity', () => {
    it('should return 1.0 for identical names', () => {
        expect(nameSimilarity('MLevel', 'MLevel')).toBe(1.0);
    });

    it('should scale containment by length', () => {
        expect(nameSimilarity('Level', 'MLevel')).toBeCloseTo(0.9 * (5 / 6));
        expect(nameSimilarity('MLevel', 'Level')).toBeCloseTo(0.9 * (5 / 6));
    });

    it('should fall back to the matching-blocks ratio', () => {
        expect(nameSimilarity('MLevel', 'MMultiGateLevel')).toBeCloseTo(12 / 21);
        expect(nameSimilarity('MLevel', 'MGLevel')).toBeCloseTo(12 / 13);
    });

    it('should be symmetric', () => {
        const pairs: Array<[string, string]> = [
            ['Zhang San', 'ZhangSan'],
            ['Redis', 'Reddit'],
            ['PostgreSQL', 'Postgres SQL'],
        ];
        for (const [a, b] of pairs) {
            expect(nameSimilarity(a, b)).toBeCloseTo(nameSimilarity(b, a));
        }
    });

    it('should return 0 for empty names', () => {
        expect(nameSimilarity('', 'MLevel')).toBe(0);
        expect(nameSimilarity('', '')).toBe(0);
    });
});

describe('Time Normalizer', () => {
    it('should keep YYYY.MM', () => {
        expect(normalizeTime('2021.03')).toBe('2021.03');
    });

    it('should zero-pad single-digit months', () => {
        expect(normalizeTime('2025.9')).toBe('2025.09');
        expect(normalizeTime('2020/7')).toBe('2020.07');
        expect(normalizeTime('2020-07')).toBe('2020.07');
    });

    it('should expand bare years', () => {
        expect(normalizeTime('2025')).toBe('2025.01');
        expect(normalizeTime('2025 年')).toBe('2025.01');
    });

    it('should convert year-month with CJK markers', () => {
        expect(normalizeTime('2019年7月')).toBe('2019.07');
        expect(normalizeTime('2019 年 11 月')).toBe('2019.11');
    });

    it('should convert English month names', () => {
        expect(normalizeTime('Jul 2020')).toBe('2020.07');
        expect(normalizeTime('September 2018')).toBe('2018.09');
    });

    it('should keep open-ended markers as written', () => {
        expect(normalizeTime('Present')).toBe('Present');
        expect(normalizeTime('至今')).toBe('至今');
    });

    it('should return unrecognized values trimmed', () => {
        expect(normalizeTime('  Spring 2020 ')).toBe('Spring 2020');
    });

    it('should copy only the items it changes', () => {
        const untouched: ExtractionItem = { type: 'skill', attributes: { name: 'Go' } };
        const dated: ExtractionItem = {
            type: 'experience',
            attributes: { company: 'Acme Corp', start_date: '2019/6', end_date: 'present' },
        };

        const [first, second] = normalizeTimes([untouched, dated]);

        expect(first).toBe(untouched);
        expect(second).not.toBe(dated);
        expect(second?.attributes).toEqual({ company: 'Acme Corp', start_date: '2019.06', end_date: 'present' });
        expect(dated.attributes?.['start_date']).toBe('2019/6');
    });
});
