import type { ExtractionItem, KgEntity, KgRelation, KnowledgeGraph, RelationLike } from '../types/index.js';
import { classifyType, ENTITY_LIKE_KINDS } from '../types/index.js';
import { formatValue, isPopulated, readField, summaryOf, textOf } from '../utils/fields.js';

const MAX_NAME_LENGTH = 50;
const MAX_TEXT_OBSERVATION = 100;

/** Attributes copied into observations as `key: value`. */
const OBSERVED_FIELDS: readonly string[] = ['trigger_context', 'consequence', 'reason'];

const DEFAULT_RELATION_TYPE = 'relates_to';

/**
 * Two decimals; exact halves (0.125, 0.375...) round to the even digit.
 */
export function formatConfidence(value: number): string {
    const eighths = value * 8;
    if (Number.isInteger(eighths) && eighths % 2 !== 0) {
        const cents = Math.floor(value * 100);
        return ((cents % 2 === 0 ? cents : cents + 1) / 100).toFixed(2);
    }
    return value.toFixed(2);
}

/**
 * KG name: summary, else whitespace-collapsed text, else a placeholder
 * unique within the batch.
 */
export function entityName(ext: ExtractionItem, index: number): string {
    const summary = summaryOf(ext);
    if (summary) return summary.slice(0, MAX_NAME_LENGTH);

    const cleaned = textOf(ext).split(/\s+/).filter(Boolean).join(' ');
    if (cleaned) return cleaned.slice(0, MAX_NAME_LENGTH);

    return `Entity_${index}`;
}

export function toKgEntity(ext: ExtractionItem, index: number): KgEntity {
    const observations: string[] = [];

    const summary = summaryOf(ext);
    if (summary) observations.push(summary);

    const line = ext.source_location?.line;
    if (line) {
        observations.push(`Source: ${ext.source_file ?? 'unknown'}:${line}`);
    }

    if (typeof ext.confidence === 'number') {
        observations.push(`Confidence: ${formatConfidence(ext.confidence)}`);
    }

    for (const key of OBSERVED_FIELDS) {
        const value = readField(ext, key);
        if (isPopulated(value)) {
            observations.push(`${key}: ${formatValue(value)}`);
        }
    }

    if (!summary) {
        const text = textOf(ext).slice(0, MAX_TEXT_OBSERVATION);
        if (text) observations.push(`Text: ${text}`);
    }

    return {
        name: entityName(ext, index),
        entityType: ext.type ?? 'entity',
        observations,
    };
}

/**
 * Explicit relations carry `relation_type`; inferred ones carry their
 * relation in `type`.
 */
export function toKgRelation(rel: RelationLike): KgRelation {
    const inferredType = rel.type && rel.type !== 'relation' ? rel.type : undefined;
    return {
        from: rel.from ?? '',
        to: rel.to ?? '',
        relationType: rel.relation_type ?? inferredType ?? DEFAULT_RELATION_TYPE,
    };
}

/**
 * Reshapes confident items into a consumer-agnostic entity/relation graph.
 */
export class KgInjector {
    constructor(private readonly confidenceThreshold = 0.3) {}

    private passes(record: { confidence?: number }): boolean {
        return (record.confidence ?? 0) >= this.confidenceThreshold;
    }

    convert(extractions: readonly ExtractionItem[], relations: readonly RelationLike[] = []): KnowledgeGraph {
        const entities: KgEntity[] = [];
        const kgRelations: KgRelation[] = [];

        extractions.forEach((ext, index) => {
            if (!this.passes(ext)) return;

            const kind = classifyType(ext.type);
            if (ENTITY_LIKE_KINDS.has(kind)) {
                entities.push(toKgEntity(ext, index));
            } else if (kind === 'relation') {
                kgRelations.push(toKgRelation(ext));
            }
        });

        for (const rel of relations) {
            if (this.passes(rel)) {
                kgRelations.push(toKgRelation(rel));
            }
        }

        return { entities, relations: kgRelations };
    }
}
