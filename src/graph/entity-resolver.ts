import type { ExtractionItem } from '../types/index.js';
import { nameSimilarity } from '../nlp/similarity.js';
import { textOf } from '../utils/fields.js';
import { GreedySeedClustering, type ClusteringStrategy, type SimilarityFn } from './clustering.js';

/**
 * Options for entity resolution.
 */
export interface EntityResolverOptions {
    /** Minimum name similarity to merge (default 0.7) */
    threshold?: number;
    strategy?: ClusteringStrategy;
    similarity?: SimilarityFn;
}

/**
 * Outcome of one resolution pass.
 */
export interface ResolutionResult {
    extractions: ExtractionItem[];

    /** Entity items dropped because another member of their cluster won */
    merged: number;
}

/**
 * Preference order for canonical names: identifier-like names (no spaces)
 * first, then longer names.
 */
export function canonicalScore(name: string): [number, number] {
    return [name.includes(' ') ? 0 : 1, name.length];
}

/**
 * Cluster member with the highest canonical score; the first wins ties.
 */
export function pickCanonical(cluster: readonly ExtractionItem[]): ExtractionItem | undefined {
    let best: ExtractionItem | undefined;
    let bestScore: [number, number] = [-1, -1];

    for (const entity of cluster) {
        const score = canonicalScore(textOf(entity));
        if (score[0] > bestScore[0] || (score[0] === bestScore[0] && score[1] > bestScore[1])) {
            best = entity;
            bestScore = score;
        }
    }

    return best;
}

/**
 * Map each non-canonical member name to its cluster's canonical name.
 */
export function buildAliasMap(clusters: readonly ExtractionItem[][]): Map<string, string> {
    const aliases = new Map<string, string>();

    for (const cluster of clusters) {
        const canonical = pickCanonical(cluster);
        if (!canonical) continue;
        const canonicalName = textOf(canonical);

        for (const entity of cluster) {
            const name = textOf(entity);
            if (name !== canonicalName) {
                aliases.set(name, canonicalName);
            }
        }
    }

    return aliases;
}

/**
 * Point relation endpoints at canonical names. Relations are copied;
 * everything else is passed through.
 */
export function rewriteReferences(
    extractions: readonly ExtractionItem[],
    aliases: ReadonlyMap<string, string>
): ExtractionItem[] {
    return extractions.map((ext) => {
        if (ext.type !== 'relation') return ext;

        const copy = { ...ext };
        if (typeof ext.from === 'string') copy.from = aliases.get(ext.from) ?? ext.from;
        if (typeof ext.to === 'string') copy.to = aliases.get(ext.to) ?? ext.to;
        return copy;
    });
}

/**
 * Merges near-duplicate `entity` items into one representative per cluster
 * and rewrites relation endpoints to the representative's name.
 */
export class EntityResolver {
    private readonly threshold: number;
    private readonly strategy: ClusteringStrategy;
    private readonly similarity: SimilarityFn;

    constructor(options: EntityResolverOptions = {}) {
        this.threshold = options.threshold ?? 0.7;
        this.strategy = options.strategy ?? new GreedySeedClustering();
        this.similarity = options.similarity ?? nameSimilarity;
    }

    /**
     * Group entity items into clusters of near-duplicates.
     */
    cluster(entities: readonly ExtractionItem[]): ExtractionItem[][] {
        const names = entities.map(textOf);
        return this.strategy
            .cluster(names, this.similarity, this.threshold)
            .map((indices) => indices.flatMap((i) => {
                const entity = entities[i];
                return entity ? [entity] : [];
            }));
    }

    process(extractions: ExtractionItem[]): ResolutionResult {
        const entities = extractions.filter((ext) => ext.type === 'entity');
        if (entities.length <= 1) {
            return { extractions, merged: 0 };
        }

        const clusters = this.cluster(entities);
        const aliases = buildAliasMap(clusters);

        const representatives = new Set<ExtractionItem>();
        for (const cluster of clusters) {
            const canonical = pickCanonical(cluster);
            if (canonical) representatives.add(canonical);
        }

        // Representatives keep their position; merged-away entities drop out
        const result: ExtractionItem[] = [];
        for (const ext of rewriteReferences(extractions, aliases)) {
            if (ext.type !== 'entity' || representatives.has(ext)) {
                result.push(ext);
            }
        }

        return { extractions: result, merged: entities.length - representatives.size };
    }
}
