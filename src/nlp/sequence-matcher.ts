/**
 * A contiguous run shared by two strings: `a[a..a+size] === b[b..b+size]`.
 */
export interface MatchBlock {
    a: number;
    b: number;
    size: number;
}

/**
 * Longest-common-block matcher against a fixed second string.
 *
 * The character index of `b` is built once, so one matcher can align many
 * queries against the same (possibly large) text. Offsets are UTF-16 code
 * unit positions, the same units `String.prototype.slice` uses.
 */
export class SequenceMatcher {
    private readonly positions = new Map<string, number[]>();

    constructor(private readonly b: string) {
        for (let j = 0; j < b.length; j++) {
            const ch = b.charAt(j);
            const list = this.positions.get(ch);
            if (list) {
                list.push(j);
            } else {
                this.positions.set(ch, [j]);
            }
        }
    }

    /**
     * Longest block common to `a[alo..ahi)` and `b[blo..bhi)`.
     * Of all maximal blocks, returns the one starting earliest in `a`,
     * then earliest in `b`. Size 0 when nothing matches.
     */
    findLongestMatch(
        a: string,
        alo = 0,
        ahi = a.length,
        blo = 0,
        bhi = this.b.length
    ): MatchBlock {
        let best: MatchBlock = { a: alo, b: blo, size: 0 };

        // runLengths[j] = length of the match ending at a[i-1], b[j]
        let runLengths = new Map<number, number>();

        for (let i = alo; i < ahi; i++) {
            const next = new Map<number, number>();
            for (const j of this.positions.get(a.charAt(i)) ?? []) {
                if (j < blo) continue;
                if (j >= bhi) break;
                const k = (runLengths.get(j - 1) ?? 0) + 1;
                next.set(j, k);
                if (k > best.size) {
                    best = { a: i - k + 1, b: j - k + 1, size: k };
                }
            }
            runLengths = next;
        }

        return best;
    }

    /**
     * All non-overlapping matching blocks, found by recursively taking the
     * longest match and splitting around it. Sorted; adjacent blocks merged.
     */
    getMatchingBlocks(a: string): MatchBlock[] {
        const found: MatchBlock[] = [];
        const queue: Array<[number, number, number, number]> = [[0, a.length, 0, this.b.length]];

        while (queue.length > 0) {
            const range = queue.pop();
            if (!range) break;
            const [alo, ahi, blo, bhi] = range;

            const match = this.findLongestMatch(a, alo, ahi, blo, bhi);
            if (match.size === 0) continue;

            found.push(match);
            if (alo < match.a && blo < match.b) {
                queue.push([alo, match.a, blo, match.b]);
            }
            if (match.a + match.size < ahi && match.b + match.size < bhi) {
                queue.push([match.a + match.size, ahi, match.b + match.size, bhi]);
            }
        }

        found.sort((x, y) => x.a - y.a || x.b - y.b);

        const merged: MatchBlock[] = [];
        for (const block of found) {
            const last = merged[merged.length - 1];
            if (last && last.a + last.size === block.a && last.b + last.size === block.b) {
                last.size += block.size;
            } else {
                merged.push({ ...block });
            }
        }

        return merged;
    }

    /**
     * Similarity in [0, 1]: 2·M / T, where M is the number of matched
     * characters and T the combined length. Two empty strings score 1.0.
     */
    ratio(a: string): number {
        const total = a.length + this.b.length;
        if (total === 0) return 1.0;

        const matched = this.getMatchingBlocks(a).reduce((sum, block) => sum + block.size, 0);
        return (2 * matched) / total;
    }
}

/**
 * One-shot matching-blocks ratio between two strings.
 */
export function sequenceRatio(a: string, b: string): number {
    return new SequenceMatcher(b).ratio(a);
}
