import type { ExtractionItem, ItemKind, MatchType } from '../types/index.js';
import { classifyType } from '../types/index.js';
import { isPopulated, readField, summaryOf, textOf } from '../utils/fields.js';

/**
 * Scoring configuration weights (must sum to 1.0).
 */
export interface ConfidenceWeights {
    matchQuality: number;
    attributeCompleteness: number;
    textSpecificity: number;
    typeConsistency: number;
}

export const DEFAULT_WEIGHTS: ConfidenceWeights = {
    matchQuality: 0.35,
    attributeCompleteness: 0.25,
    textSpecificity: 0.2,
    typeConsistency: 0.2,
};

const MATCH_SCORES: Readonly<Record<MatchType, number>> = {
    exact: 1.0,
    normalized: 0.85,
    fuzzy: 0.6,
    none: 0.1,
};

const TYPE_SCORES: Readonly<Record<ItemKind, number>> = {
    entity: 0.9,
    rule: 0.9,
    constraint: 0.9,
    event: 0.9,
    state: 0.9,
    relation: 0.9,
    candidate: 0.7,
    experience: 0.7,
    education: 0.7,
    skill: 0.7,
    certification: 0.7,
    unknown: 0.7,
    untyped: 0.5,
};

/** Descriptive fields counted on top of the summary. */
export const DESCRIPTIVE_FIELDS: readonly string[] = [
    'trigger_context',
    'consequence',
    'reason',
    'related_entities',
];

/**
 * The four sub-scores behind a composite confidence.
 */
export interface ScoreBreakdown {
    matchQuality: number;
    attributeCompleteness: number;
    textSpecificity: number;
    typeConsistency: number;
}

function isMatchType(value: string): value is MatchType {
    return Object.hasOwn(MATCH_SCORES, value);
}

export function matchQuality(ext: ExtractionItem): number {
    const matchType = ext.source_location?.match_type;
    return matchType && isMatchType(matchType) ? MATCH_SCORES[matchType] : MATCH_SCORES.none;
}

/**
 * Summary counts one point, each descriptive field another; three points
 * is complete.
 */
export function attributeCompleteness(ext: ExtractionItem): number {
    const hasSummary = summaryOf(ext) ? 1 : 0;
    const others = DESCRIPTIVE_FIELDS.filter((field) => isPopulated(readField(ext, field))).length;
    return Math.min(1.0, (hasSummary + others) / 3);
}

/**
 * 10–200 characters is ideal; shorter ramps up linearly, longer decays
 * linearly to a floor of 0.3 at 760 characters.
 */
export function textSpecificity(ext: ExtractionItem): number {
    const length = textOf(ext).length;

    if (length === 0) return 0;
    if (length >= 10 && length <= 200) return 1.0;
    if (length < 10) return length / 10;
    return Math.max(0.3, 1.0 - (length - 200) / 800);
}

export function typeConsistency(ext: ExtractionItem): number {
    const kind = classifyType(ext.type);
    return TYPE_SCORES[kind];
}

export function scoreBreakdown(ext: ExtractionItem): ScoreBreakdown {
    return {
        matchQuality: matchQuality(ext),
        attributeCompleteness: attributeCompleteness(ext),
        textSpecificity: textSpecificity(ext),
        typeConsistency: typeConsistency(ext),
    };
}

/**
 * Weighted composite, clamped to [0, 1] and rounded to 3 decimals.
 */
export function computeConfidence(
    ext: ExtractionItem,
    weights: ConfidenceWeights = DEFAULT_WEIGHTS
): number {
    const parts = scoreBreakdown(ext);
    const score =
        parts.matchQuality * weights.matchQuality +
        parts.attributeCompleteness * weights.attributeCompleteness +
        parts.textSpecificity * weights.textSpecificity +
        parts.typeConsistency * weights.typeConsistency;

    const clamped = Math.min(1.0, Math.max(0.0, score));
    return Math.round(clamped * 1000) / 1000;
}

/**
 * Return a copy of each item with `confidence` set (overwriting any prior value).
 */
export function scoreExtractions(
    extractions: ExtractionItem[],
    weights: ConfidenceWeights = DEFAULT_WEIGHTS
): ExtractionItem[] {
    return extractions.map((ext) => ({ ...ext, confidence: computeConfidence(ext, weights) }));
}
