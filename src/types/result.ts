import type { ExtractionItem } from './extraction.js';
import type { InferredRelation } from './relation.js';
import type { KnowledgeGraph } from './graph.js';

/**
 * Histogram of item confidences.
 */
export interface ConfidenceDistribution {
    'high (>=0.7)': number;
    'medium (0.3-0.7)': number;
    'low (<0.3)': number;
}

/**
 * Summary statistics for one pipeline run.
 */
export interface PipelineStats {
    total_extractions: number;
    by_type: Record<string, number>;
    avg_confidence: number;
    confidence_distribution: ConfidenceDistribution;
    match_quality: Record<string, number>;
    inferred_relations: number;
}

/**
 * Everything a pipeline run produces.
 */
export interface PipelineResult {
    extractions: ExtractionItem[];
    inferred_relations: InferredRelation[];
    kg_format: KnowledgeGraph | null;
    stats: PipelineStats;
}
