/**
 * Generic knowledge-graph entity.
 */
export interface KgEntity {
    name: string;
    entityType: string;
    observations: string[];
}

/**
 * Generic knowledge-graph relation.
 */
export interface KgRelation {
    from: string;
    to: string;
    relationType: string;
}

/**
 * Consumer-agnostic graph handed to downstream knowledge stores.
 */
export interface KnowledgeGraph {
    entities: KgEntity[];
    relations: KgRelation[];
}
