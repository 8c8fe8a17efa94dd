import { z } from 'zod';
import type { ExtractionItem } from '../types/index.js';
import { PipelineInputError } from '../utils/errors.js';

/**
 * Optional field that falls back to absent when the value has the wrong shape.
 */
function lenient<T extends z.ZodTypeAny>(schema: T) {
    return schema.optional().catch(undefined);
}

const NameSchema = z.union([z.string(), z.number()]).transform(String);

const SourceLocationSchema = z
    .object({
        char_start: z.number().nullable().catch(null),
        char_end: z.number().nullable().catch(null),
        char_interval: lenient(z.array(z.number().nullable())),
        line: z.number().nullable().catch(null),
        match_type: z.enum(['exact', 'normalized', 'fuzzy', 'none']).catch('none'),
        confidence: z.number().catch(0.1),
    })
    .passthrough();

/**
 * One extraction item as handed over by the extraction step.
 * Unknown keys are preserved; a known key holding the wrong kind of value
 * is dropped rather than failing the batch. `summary_cn` is accepted as a
 * legacy spelling of `summary`.
 */
export const ExtractionItemSchema = z
    .object({
        id: lenient(NameSchema),
        type: lenient(z.string()),
        text: lenient(z.string()),
        summary: lenient(z.string()),
        attributes: lenient(z.record(z.unknown())),
        source_location: lenient(SourceLocationSchema),
        source_file: lenient(z.string()),
        confidence: lenient(z.number()),
        from: lenient(NameSchema),
        to: lenient(NameSchema),
        relation_type: lenient(z.string()),
    })
    .passthrough()
    .transform((item) => {
        const legacy = item['summary_cn'];
        if (item.summary === undefined && typeof legacy === 'string') {
            return { ...item, summary: legacy };
        }
        return item;
    });

export const ExtractionBatchSchema = z.array(ExtractionItemSchema);

/**
 * Validate a raw batch. A non-array, or an element that is not an object,
 * is a caller error.
 */
export function parseExtractionBatch(raw: unknown): ExtractionItem[] {
    if (!Array.isArray(raw)) {
        throw new PipelineInputError(
            `Extraction batch must be an array, got ${raw === null ? 'null' : typeof raw}`,
            'INVALID_BATCH'
        );
    }

    const result = ExtractionBatchSchema.safeParse(raw);
    if (!result.success) {
        throw new PipelineInputError('Extraction batch contains malformed items', 'INVALID_BATCH', result.error.issues);
    }

    return result.data;
}

/**
 * Reject a source text that is not a string.
 */
export function assertSourceText(value: unknown): asserts value is string {
    if (typeof value !== 'string') {
        throw new PipelineInputError(
            `Source text must be a string, got ${value === null ? 'null' : typeof value}`,
            'INVALID_SOURCE'
        );
    }
}

const unit = z.number().min(0).max(1);

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'silent']);

/**
 * Pipeline settings accepted from a config file. Every key is optional.
 */
export const PipelineConfigSchema = z
    .object({
        timeNormalization: z.boolean(),
        sourceGrounding: z.boolean(),
        overlapDedup: z.boolean(),
        confidenceScoring: z.boolean(),
        entityResolution: z.boolean(),
        relationInference: z.boolean(),
        kgInjection: z.boolean(),
        confidenceThreshold: unit,
        overlapThreshold: unit,
        entitySimilarityThreshold: unit,
        entityClustering: z.enum(['greedy', 'components']),
        typeAwareDedup: z.boolean(),
        rootType: z.string().min(1),
        relationScope: z.string(),
        logLevel: LogLevelSchema,
        jsonLogs: z.boolean(),
    })
    .partial();

export type PipelineConfigInput = z.infer<typeof PipelineConfigSchema>;
