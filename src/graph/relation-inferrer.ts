import type { ExtractionItem, InferredRelation, RelationRule, RelationRuleTable } from '../types/index.js';
import { summaryOf, textOf } from '../utils/fields.js';

/**
 * Resume rules: how each dependent record links to the candidate.
 */
export const RESUME_RELATION_RULES: RelationRuleTable = new Map<string, RelationRule>([
    ['experience', { relationType: 'worked_at', nameField: 'company' }],
    ['education', { relationType: 'studied_at', nameField: 'school' }],
    ['skill', { relationType: 'has_skill', nameField: 'name' }],
    ['certification', { relationType: 'certified_by', nameField: 'name' }],
]);

/** Confidence assumed for sub-records that were never scored. */
const DEFAULT_ITEM_CONFIDENCE = 0.7;

/** Inferred links are weaker than extracted facts. */
const INFERENCE_DECAY = 0.85;

/**
 * Options for relation inference.
 */
export interface RelationInferrerOptions {
    rules?: RelationRuleTable;

    /** Type tag of root records (default `candidate`) */
    rootType?: string;

    /** Label written to every inferred relation (default `resume`) */
    scope?: string;
}

/**
 * Outcome of one inference pass. `extractions` is the input list itself.
 */
export interface InferenceResult {
    extractions: ExtractionItem[];
    relations: InferredRelation[];
}

/**
 * Display name of a relation target: the rule's attribute, then the
 * summary, then the raw text.
 */
export function targetName(item: ExtractionItem, field: string): string {
    const value = item.attributes?.[field];
    if (typeof value === 'string' && value) return value;
    if (typeof value === 'number') return String(value);

    return summaryOf(item) || textOf(item);
}

export function inferredConfidence(item: ExtractionItem): number {
    const base = typeof item.confidence === 'number' ? item.confidence : DEFAULT_ITEM_CONFIDENCE;
    return Math.round(base * INFERENCE_DECAY * 1000) / 1000;
}

/**
 * Links every root record to each dependent record covered by the rule table.
 */
export class RelationInferrer {
    private readonly rules: RelationRuleTable;
    private readonly rootType: string;
    private readonly scope: string;

    constructor(options: RelationInferrerOptions = {}) {
        this.rules = options.rules ?? RESUME_RELATION_RULES;
        this.rootType = options.rootType ?? 'candidate';
        this.scope = options.scope ?? 'resume';
    }

    process(extractions: ExtractionItem[]): InferenceResult {
        const roots = extractions.filter((ext) => ext.type === this.rootType);
        if (roots.length === 0) {
            return { extractions, relations: [] };
        }

        const relations: InferredRelation[] = [];
        for (const root of roots) {
            relations.push(...this.inferForRoot(root.id ?? '', extractions));
        }

        return { extractions, relations };
    }

    private inferForRoot(rootId: string, extractions: readonly ExtractionItem[]): InferredRelation[] {
        const relations: InferredRelation[] = [];

        for (const ext of extractions) {
            const rule = ext.type ? this.rules.get(ext.type) : undefined;
            if (!rule) continue;

            relations.push({
                from: rootId,
                to: ext.id ?? '',
                type: rule.relationType,
                target_name: targetName(ext, rule.nameField),
                scope: this.scope,
                confidence: inferredConfidence(ext),
                inferred: true,
            });
        }

        return relations;
    }
}
