import type {
    ExtractionItem,
    InferredRelation,
    KnowledgeGraph,
    PipelineConfig,
    PipelineResult,
    PipelineStats,
    RelationRuleTable,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { normalizeTimes } from '../nlp/time-normalizer.js';
import { SourceGrounder } from '../grounding/source-grounder.js';
import { OverlapDeduplicator } from '../dedup/overlap-deduplicator.js';
import { scoreExtractions } from '../scoring/confidence-scorer.js';
import { EntityResolver } from '../graph/entity-resolver.js';
import { getClusteringStrategy } from '../graph/clustering.js';
import { RelationInferrer, RESUME_RELATION_RULES } from '../graph/relation-inferrer.js';
import { KgInjector } from '../exporters/kg-injector.js';
import { assertSourceText, parseExtractionBatch } from '../io/schemas.js';
import { getLogger } from '../utils/logger.js';

/**
 * Per-run collaborators that are not plain settings.
 */
export interface PipelineOptions {
    /** File name written into `source_file` and KG observations */
    sourceFile?: string;

    /** Relation inference rules (defaults to the resume rules) */
    rules?: RelationRuleTable;
}

const MATCHED_TYPES: ReadonlySet<string> = new Set(['exact', 'normalized', 'fuzzy']);

/**
 * Summary statistics over the final items.
 */
export function computeStats(extractions: readonly ExtractionItem[], relations: readonly InferredRelation[]): PipelineStats {
    const byType: Record<string, number> = {};
    const matchQuality: Record<string, number> = {};
    let sum = 0;
    let high = 0;
    let medium = 0;
    let low = 0;

    for (const ext of extractions) {
        const type = ext.type || 'unknown';
        byType[type] = (byType[type] ?? 0) + 1;

        const matchType = ext.source_location?.match_type ?? 'none';
        matchQuality[matchType] = (matchQuality[matchType] ?? 0) + 1;

        const confidence = ext.confidence ?? 0;
        sum += confidence;
        if (confidence >= 0.7) high++;
        else if (confidence >= 0.3) medium++;
        else low++;
    }

    const avg = extractions.length > 0 ? sum / extractions.length : 0;

    return {
        total_extractions: extractions.length,
        by_type: byType,
        avg_confidence: Math.round(avg * 1000) / 1000,
        confidence_distribution: {
            'high (>=0.7)': high,
            'medium (0.3-0.7)': medium,
            'low (<0.3)': low,
        },
        match_quality: matchQuality,
        inferred_relations: relations.length,
    };
}

/**
 * Extraction refinement pipeline. Runs the stages in fixed order:
 *
 * 0. Time normalization (optional)
 * 1. Source grounding
 * 2. Overlap deduplication
 * 3. Confidence scoring
 * 4. Entity resolution
 * 5. Relation inference
 * 6. KG injection
 *
 * Holds only configuration and the grounder built for its source text;
 * every `process` call is independent.
 */
export class ExtractionPipeline {
    readonly config: PipelineConfig;

    private readonly grounder: SourceGrounder;
    private readonly deduplicator: OverlapDeduplicator;
    private readonly resolver: EntityResolver;
    private readonly inferrer: RelationInferrer;
    private readonly injector: KgInjector;
    private readonly sourceFile: string | undefined;

    constructor(sourceText: string, config: Partial<PipelineConfig> = {}, options: PipelineOptions = {}) {
        assertSourceText(sourceText);

        this.config = { ...DEFAULT_CONFIG, ...config };
        this.sourceFile = options.sourceFile;

        this.grounder = new SourceGrounder(sourceText);
        this.deduplicator = new OverlapDeduplicator({
            overlapThreshold: this.config.overlapThreshold,
            typeAware: this.config.typeAwareDedup,
        });
        this.resolver = new EntityResolver({
            threshold: this.config.entitySimilarityThreshold,
            strategy: getClusteringStrategy(this.config.entityClustering),
        });
        this.inferrer = new RelationInferrer({
            rules: options.rules ?? RESUME_RELATION_RULES,
            rootType: this.config.rootType,
            scope: this.config.relationScope,
        });
        this.injector = new KgInjector(this.config.confidenceThreshold);
    }

    /**
     * Run every enabled stage over one batch.
     * @throws PipelineInputError when the batch is not an array of items
     */
    process(rawExtractions: unknown): PipelineResult {
        const logger = getLogger();
        const { config } = this;

        let extractions = parseExtractionBatch(rawExtractions);
        let inferredRelations: InferredRelation[] = [];

        logger.info({ items: extractions.length }, 'Pipeline started');

        if (config.timeNormalization) {
            extractions = normalizeTimes(extractions);
            logger.info('[0/6] Time normalization done');
        }

        if (config.sourceGrounding) {
            extractions = this.grounder.process(extractions);
            const matched = extractions.filter((e) => MATCHED_TYPES.has(e.source_location?.match_type ?? 'none')).length;
            logger.info({ matched, total: extractions.length }, '[1/6] Source grounding');
        }

        // The one in-place mutation: items here are owned by this run
        if (this.sourceFile) {
            for (const ext of extractions) {
                if (ext.source_file === undefined) {
                    ext.source_file = this.sourceFile;
                }
            }
        }

        if (config.overlapDedup) {
            const { extractions: kept, removed } = this.deduplicator.process(extractions);
            extractions = kept;
            logger.info({ removed, remaining: extractions.length }, '[2/6] Overlap deduplication');
        }

        if (config.confidenceScoring) {
            extractions = scoreExtractions(extractions);
            const avg = extractions.length > 0
                ? extractions.reduce((s, e) => s + (e.confidence ?? 0), 0) / extractions.length
                : 0;
            logger.info({ avgConfidence: Number(avg.toFixed(3)) }, '[3/6] Confidence scoring');
        }

        if (config.entityResolution) {
            const { extractions: resolved, merged } = this.resolver.process(extractions);
            extractions = resolved;
            logger.info({ merged }, '[4/6] Entity resolution');
        } else {
            logger.info('[4/6] Entity resolution (skipped)');
        }

        if (config.relationInference) {
            const { extractions: unchanged, relations } = this.inferrer.process(extractions);
            extractions = unchanged;
            inferredRelations = relations;
            logger.info({ inferred: relations.length }, '[5/6] Relation inference');
        } else {
            logger.info('[5/6] Relation inference (skipped)');
        }

        let kgFormat: KnowledgeGraph | null = null;
        if (config.kgInjection) {
            kgFormat = this.injector.convert(extractions, inferredRelations);
            logger.info(
                { entities: kgFormat.entities.length, relations: kgFormat.relations.length },
                '[6/6] KG injection'
            );
        } else {
            logger.info('[6/6] KG injection (skipped)');
        }

        const stats = computeStats(extractions, inferredRelations);
        logger.info({ total: stats.total_extractions, avgConfidence: stats.avg_confidence }, 'Pipeline complete');

        return {
            extractions,
            inferred_relations: inferredRelations,
            kg_format: kgFormat,
            stats,
        };
    }
}
