import type { ExtractionItem, SourceLocation, MatchType } from '../types/index.js';
import { SequenceMatcher } from '../nlp/sequence-matcher.js';

/** Confidence per successful match tier. */
const EXACT_CONFIDENCE = 1.0;
const NORMALIZED_CONFIDENCE = 0.85;
const FUZZY_SCALE = 0.8;
const UNMATCHED_CONFIDENCE = 0.1;

/** Minimum share of the query a fuzzy block must cover. */
const MIN_FUZZY_COVERAGE = 0.3;

const WHITESPACE = /\s+/g;

function stripWhitespace(text: string): string {
    return text.replace(WHITESPACE, '');
}

/**
 * Aligns extracted text spans to offsets in one source document.
 *
 * Three tiers are tried in order, first hit wins:
 * 1. exact substring
 * 2. whitespace-insensitive substring
 * 3. longest common block covering ≥ 30% of the query
 *
 * The normalized source and its offset index belong to this instance and are
 * built once in the constructor.
 */
export class SourceGrounder {
    private readonly normalized: string;

    /** normalizedToReal[i] = offset in the source of the i-th non-whitespace char */
    private readonly normalizedToReal: number[] = [];

    private matcher: SequenceMatcher | null = null;

    constructor(private readonly sourceText: string) {
        this.normalized = stripWhitespace(sourceText);

        for (let pos = 0; pos < sourceText.length; pos++) {
            if (!/\s/.test(sourceText.charAt(pos))) {
                this.normalizedToReal.push(pos);
            }
        }
    }

    /**
     * Return a copy of each item with `source_location` attached.
     * Items without text are passed through unchanged.
     */
    process(extractions: ExtractionItem[]): ExtractionItem[] {
        return extractions.map((ext) => {
            const text = typeof ext.text === 'string' ? ext.text : '';
            if (!text) return ext;

            return { ...ext, source_location: this.align(text) };
        });
    }

    /**
     * Locate a single query in the source.
     */
    align(query: string): SourceLocation {
        const exact = this.sourceText.indexOf(query);
        if (exact !== -1) {
            return this.makeLocation(exact, exact + query.length, 'exact', EXACT_CONFIDENCE);
        }

        const normQuery = stripWhitespace(query);
        if (normQuery) {
            const normPos = this.normalized.indexOf(normQuery);
            if (normPos !== -1) {
                const start = this.toRealOffset(normPos);
                const end = this.toRealEnd(normPos + normQuery.length);
                return this.makeLocation(start, end, 'normalized', NORMALIZED_CONFIDENCE);
            }
        }

        const match = this.getMatcher().findLongestMatch(query);
        if (match.size > 0) {
            const coverage = match.size / query.length;
            if (coverage >= MIN_FUZZY_COVERAGE) {
                return this.makeLocation(match.b, match.b + match.size, 'fuzzy', coverage * FUZZY_SCALE);
            }
        }

        return {
            char_start: null,
            char_end: null,
            char_interval: [null, null],
            line: null,
            match_type: 'none',
            confidence: UNMATCHED_CONFIDENCE,
        };
    }

    /** Built lazily: most batches never reach the fuzzy tier. */
    private getMatcher(): SequenceMatcher {
        if (!this.matcher) {
            this.matcher = new SequenceMatcher(this.sourceText);
        }
        return this.matcher;
    }

    private toRealOffset(normOffset: number): number {
        if (normOffset < 0) return 0;
        return this.normalizedToReal[normOffset] ?? this.sourceText.length;
    }

    /** Exclusive end: one past the last matched non-whitespace character. */
    private toRealEnd(normEnd: number): number {
        if (normEnd <= 0) return 0;
        const last = this.normalizedToReal[normEnd - 1];
        return last === undefined ? this.sourceText.length : last + 1;
    }

    private makeLocation(start: number, end: number, matchType: MatchType, confidence: number): SourceLocation {
        let line = 1;
        for (let i = 0; i < start; i++) {
            if (this.sourceText.charCodeAt(i) === 10) line++;
        }

        return {
            char_start: start,
            char_end: end,
            char_interval: [start, end],
            line,
            match_type: matchType,
            confidence,
        };
    }
}
