/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Entity clustering strategies.
 *
 * greedy:     seed-based single pass in input order
 * components: connected components of the similarity graph
 */
export type ClusteringMethod = 'greedy' | 'components';

/**
 * Full pipeline configuration merged from CLI flags, env vars, and config file.
 */
export interface PipelineConfig {
    // Stage toggles
    timeNormalization: boolean;
    sourceGrounding: boolean;
    overlapDedup: boolean;
    confidenceScoring: boolean;
    entityResolution: boolean;
    relationInference: boolean;
    kgInjection: boolean;

    // Thresholds
    confidenceThreshold: number;
    overlapThreshold: number;
    entitySimilarityThreshold: number;

    // Stage options
    entityClustering: ClusteringMethod;
    typeAwareDedup: boolean;
    rootType: string;
    relationScope: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PipelineConfig = {
    timeNormalization: false,
    sourceGrounding: true,
    overlapDedup: true,
    confidenceScoring: true,
    entityResolution: true,
    relationInference: true,
    kgInjection: false,
    confidenceThreshold: 0.3,
    overlapThreshold: 0.5,
    entitySimilarityThreshold: 0.7,
    entityClustering: 'greedy',
    typeAwareDedup: false,
    rootType: 'candidate',
    relationScope: 'resume',
    logLevel: 'info',
    jsonLogs: false,
};
