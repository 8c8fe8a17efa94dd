/**
 * Barrel export for all shared types.
 */
export type { ExtractionItem, SourceLocation, MatchType, ItemKind } from './extraction.js';
export { classifyType, ENTITY_LIKE_KINDS } from './extraction.js';
export type { InferredRelation, RelationLike, RelationRule, RelationRuleTable } from './relation.js';
export type { KgEntity, KgRelation, KnowledgeGraph } from './graph.js';
export { DEFAULT_CONFIG } from './config.js';
export type { PipelineConfig, LogLevel, ClusteringMethod } from './config.js';
export type { PipelineResult, PipelineStats, ConfidenceDistribution } from './result.js';
