/**
 * Precision tier of a grounding match.
 */
export type MatchType = 'exact' | 'normalized' | 'fuzzy' | 'none';

/**
 * Where an item's text was found in the source document.
 * Offsets are null when grounding failed.
 */
export interface SourceLocation {
    char_start: number | null;
    char_end: number | null;

    /** Half-open interval [start, end); anything but two numbers counts as unlocated */
    char_interval?: Array<number | null>;

    /** 1-based line of char_start */
    line: number | null;

    match_type: MatchType;
    confidence: number;
}

/**
 * One structured fact produced by the upstream extraction process.
 * The shape is open: unknown keys are carried through every stage untouched.
 */
export interface ExtractionItem {
    id?: string;
    type?: string;
    text?: string;
    summary?: string;
    attributes?: Record<string, unknown>;
    source_location?: SourceLocation;
    source_file?: string;
    confidence?: number;

    /** Relation endpoints (only meaningful on `relation` items) */
    from?: string;
    to?: string;
    relation_type?: string;

    [key: string]: unknown;
}

/**
 * Closed classification of the open `type` tag.
 * `untyped` = no tag at all, `unknown` = a tag outside the known vocabulary.
 */
export type ItemKind =
    | 'entity'
    | 'rule'
    | 'constraint'
    | 'event'
    | 'state'
    | 'relation'
    | 'candidate'
    | 'experience'
    | 'education'
    | 'skill'
    | 'certification'
    | 'unknown'
    | 'untyped';

const KNOWN_KINDS: ReadonlySet<string> = new Set<ItemKind>([
    'entity',
    'rule',
    'constraint',
    'event',
    'state',
    'relation',
    'candidate',
    'experience',
    'education',
    'skill',
    'certification',
]);

function isKnownKind(tag: string): tag is ItemKind {
    return KNOWN_KINDS.has(tag);
}

/**
 * Classify an item's `type` tag.
 */
export function classifyType(type: string | undefined): ItemKind {
    if (!type) return 'untyped';
    return isKnownKind(type) ? type : 'unknown';
}

/** Kinds that become KG entities. */
export const ENTITY_LIKE_KINDS: ReadonlySet<ItemKind> = new Set<ItemKind>([
    'entity',
    'rule',
    'constraint',
    'event',
    'state',
]);
