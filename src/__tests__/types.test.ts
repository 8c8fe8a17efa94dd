import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, ENTITY_LIKE_KINDS, classifyType } from '../types/index.js';

describe('Types', () => {
    describe('classifyType', () => {
        it('should keep known tags', () => {
            expect(classifyType('entity')).toBe('entity');
            expect(classifyType('certification')).toBe('certification');
        });

        it('should separate missing from unrecognized tags', () => {
            expect(classifyType(undefined)).toBe('untyped');
            expect(classifyType('')).toBe('untyped');
            expect(classifyType('hobby')).toBe('unknown');
        });

        it('should be case sensitive', () => {
            expect(classifyType('Entity')).toBe('unknown');
        });
    });

    describe('ENTITY_LIKE_KINDS', () => {
        it('should cover the five entity-like kinds', () => {
            expect([...ENTITY_LIKE_KINDS]).toEqual(['entity', 'rule', 'constraint', 'event', 'state']);
        });

        it('should not include relations or resume records', () => {
            expect(ENTITY_LIKE_KINDS.has('relation')).toBe(false);
            expect(ENTITY_LIKE_KINDS.has('candidate')).toBe(false);
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should enable the core stages', () => {
            expect(DEFAULT_CONFIG.sourceGrounding).toBe(true);
            expect(DEFAULT_CONFIG.overlapDedup).toBe(true);
            expect(DEFAULT_CONFIG.confidenceScoring).toBe(true);
            expect(DEFAULT_CONFIG.entityResolution).toBe(true);
            expect(DEFAULT_CONFIG.relationInference).toBe(true);
        });

        it('should leave KG injection and time normalization off', () => {
            expect(DEFAULT_CONFIG.kgInjection).toBe(false);
            expect(DEFAULT_CONFIG.timeNormalization).toBe(false);
        });

        it('should use the documented thresholds', () => {
            expect(DEFAULT_CONFIG.confidenceThreshold).toBe(0.3);
            expect(DEFAULT_CONFIG.overlapThreshold).toBe(0.5);
            expect(DEFAULT_CONFIG.entitySimilarityThreshold).toBe(0.7);
        });

        it('should use greedy clustering', () => {
            expect(DEFAULT_CONFIG.entityClustering).toBe('greedy');
        });
    });
});
