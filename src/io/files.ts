import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { basename } from 'node:path';
import type { PipelineResult } from '../types/index.js';
import { PipelineInputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

function readText(path: string, what: string): string {
    if (!existsSync(path)) {
        throw new PipelineInputError(`${what} not found: ${path}`, 'INPUT_NOT_FOUND');
    }
    return readFileSync(path, 'utf-8');
}

/**
 * Read a raw extraction batch. Accepts a bare array or an object wrapping
 * the array under `extractions`; anything else is left for batch
 * validation to reject.
 */
export function loadExtractions(path: string): unknown {
    const text = readText(path, 'Input file');

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new PipelineInputError(`Input file is not valid JSON: ${path} (${message})`, 'INPUT_NOT_FOUND', error);
    }

    if (raw !== null && typeof raw === 'object' && !Array.isArray(raw) && 'extractions' in raw) {
        return raw.extractions;
    }
    return raw;
}

/**
 * Read the plain-text rendering of the source document.
 */
export function loadSource(path: string): { text: string; fileName: string } {
    return { text: readText(path, 'Source file'), fileName: basename(path) };
}

/**
 * Serialize a run for downstream consumers. `kg_format` is only written
 * when KG injection produced one.
 */
export function serializeResult(result: PipelineResult): string {
    const output: Record<string, unknown> = {
        extractions: result.extractions,
        inferred_relations: result.inferred_relations,
        stats: result.stats,
    };
    if (result.kg_format) {
        output['kg_format'] = result.kg_format;
    }
    return JSON.stringify(output, null, 2);
}

export function writeResult(path: string, result: PipelineResult): void {
    writeFileSync(path, serializeResult(result), 'utf-8');
    getLogger().info({ path }, 'Result saved');
}
