/**
 * A relation derived from structural rules rather than read from the document.
 */
export interface InferredRelation {
    from: string;
    to: string;
    type: string;
    target_name: string;
    scope: string;
    confidence: number;
    inferred: true;
}

/**
 * Any relation-shaped record the KG Injector can consume:
 * explicit `relation` items or inferred relations.
 */
export interface RelationLike {
    from?: string;
    to?: string;
    type?: string;
    relation_type?: string;
    confidence?: number;
}

/**
 * How a dependent record links back to its root.
 */
export interface RelationRule {
    /** Relation type emitted, e.g. `worked_at` */
    relationType: string;

    /** Attribute holding the target's display name */
    nameField: string;
}

/**
 * Map from item type tag to its inference rule.
 */
export type RelationRuleTable = ReadonlyMap<string, RelationRule>;
