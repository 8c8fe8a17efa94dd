/**
 * Public API.
 */
export * from './types/index.js';
export { ExtractionPipeline, computeStats, type PipelineOptions } from './builder/pipeline.js';
export { SourceGrounder } from './grounding/source-grounder.js';
export { OverlapDeduplicator, overlapRatio, isBetter, type OverlapDedupOptions, type DedupResult } from './dedup/overlap-deduplicator.js';
export { scoreExtractions, computeConfidence, scoreBreakdown, DEFAULT_WEIGHTS, type ConfidenceWeights } from './scoring/confidence-scorer.js';
export { EntityResolver, type EntityResolverOptions, type ResolutionResult } from './graph/entity-resolver.js';
export {
    GreedySeedClustering,
    ConnectedComponentsClustering,
    getClusteringStrategy,
    type ClusteringStrategy,
    type SimilarityFn,
} from './graph/clustering.js';
export { RelationInferrer, RESUME_RELATION_RULES, type RelationInferrerOptions } from './graph/relation-inferrer.js';
export { KgInjector } from './exporters/kg-injector.js';
export { normalizeTime, normalizeTimes } from './nlp/time-normalizer.js';
export { nameSimilarity } from './nlp/similarity.js';
export { SequenceMatcher, sequenceRatio } from './nlp/sequence-matcher.js';
export { parseExtractionBatch, assertSourceText } from './io/schemas.js';
export { PipelineInputError, type PipelineErrorCode } from './utils/errors.js';
export { loadExtractions, loadSource, serializeResult, writeResult } from './io/files.js';
export { resolveConfig, parseConfigFile } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
