import { UndirectedGraph } from 'graphology';
import type { ClusteringMethod } from '../types/index.js';

/**
 * Pairwise similarity between two names, in [0, 1].
 */
export type SimilarityFn = (a: string, b: string) => number;

/**
 * Groups names into clusters of near-duplicates.
 * Returns clusters of indices into `names`, each sorted ascending,
 * clusters ordered by their first member.
 */
export interface ClusteringStrategy {
    readonly method: ClusteringMethod;
    cluster(names: readonly string[], similarity: SimilarityFn, threshold: number): number[][];
}

/**
 * Seed-based single pass: the first unassigned name seeds a cluster and
 * absorbs every later unassigned name similar to the seed.
 *
 * Similarity is not transitive, so the result depends on input order:
 * two names can land in different clusters even though a third name is
 * similar to both.
 */
export class GreedySeedClustering implements ClusteringStrategy {
    readonly method = 'greedy' as const;

    cluster(names: readonly string[], similarity: SimilarityFn, threshold: number): number[][] {
        const clusters: number[][] = [];
        const assigned = new Set<number>();

        for (let i = 0; i < names.length; i++) {
            if (assigned.has(i)) continue;

            const seed = names[i] ?? '';
            const cluster = [i];
            assigned.add(i);

            for (let j = i + 1; j < names.length; j++) {
                if (assigned.has(j)) continue;
                if (similarity(seed, names[j] ?? '') >= threshold) {
                    cluster.push(j);
                    assigned.add(j);
                }
            }

            clusters.push(cluster);
        }

        return clusters;
    }
}

/**
 * Connected components of the graph whose edges join every pair at or above
 * the threshold. Order independent, but chains of pairwise-similar names
 * merge into one cluster.
 */
export class ConnectedComponentsClustering implements ClusteringStrategy {
    readonly method = 'components' as const;

    cluster(names: readonly string[], similarity: SimilarityFn, threshold: number): number[][] {
        const graph = new UndirectedGraph();

        for (let i = 0; i < names.length; i++) {
            graph.addNode(String(i));
        }

        for (let i = 0; i < names.length; i++) {
            for (let j = i + 1; j < names.length; j++) {
                if (similarity(names[i] ?? '', names[j] ?? '') >= threshold) {
                    graph.addEdge(String(i), String(j));
                }
            }
        }

        const clusters: number[][] = [];
        const visited = new Set<string>();

        for (let i = 0; i < names.length; i++) {
            const start = String(i);
            if (visited.has(start)) continue;

            const members: number[] = [];
            const stack = [start];
            visited.add(start);

            while (stack.length > 0) {
                const node = stack.pop();
                if (node === undefined) break;
                members.push(Number(node));

                graph.forEachNeighbor(node, (neighbor) => {
                    if (!visited.has(neighbor)) {
                        visited.add(neighbor);
                        stack.push(neighbor);
                    }
                });
            }

            clusters.push(members.sort((a, b) => a - b));
        }

        return clusters;
    }
}

/**
 * Resolve a strategy by configured method.
 */
export function getClusteringStrategy(method: ClusteringMethod): ClusteringStrategy {
    switch (method) {
        case 'components':
            return new ConnectedComponentsClustering();
        case 'greedy':
        default:
            return new GreedySeedClustering();
    }
}
