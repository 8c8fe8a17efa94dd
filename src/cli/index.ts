#!/usr/bin/env node
import { Command } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { ExtractionPipeline } from '../builder/pipeline.js';
import { loadExtractions, loadSource, serializeResult, writeResult } from '../io/files.js';
import { PipelineInputError } from '../utils/errors.js';
import { LogLevelSchema } from '../io/schemas.js';
import type { LogLevel, PipelineConfig } from '../types/index.js';

const VERSION = '1.0.0';

const program = new Command();

function parseLogLevel(value: unknown): LogLevel {
    const parsed = LogLevelSchema.safeParse(value);
    if (!parsed.success) {
        throw new PipelineInputError(`Invalid log level: ${String(value)}`, 'INVALID_CONFIG');
    }
    return parsed.data;
}

program
    .name('refine')
    .description('Ground, deduplicate, score and link extracted facts against their source document.')
    .version(VERSION);

// ─── RUN command ──────────────────────────────────────────

program
    .command('run')
    .description('Run the refinement pipeline over one extraction batch')
    .requiredOption('-i, --input <path>', 'Extraction batch JSON (array or {"extractions": [...]})')
    .requiredOption('-s, --source <path>', 'Plain-text source document')
    .option('-c, --config <path>', 'Config JSON file')
    .option('-o, --output <path>', 'Output JSON file (default: stdout)')
    .option('--enable-entity-resolution', 'Enable entity resolution')
    .option('--enable-relation-inference', 'Enable relation inference')
    .option('--enable-kg-injection', 'Enable KG output')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts) => {
        try {
            const cliConfig: Partial<PipelineConfig> = {};
            if (opts.enableEntityResolution) cliConfig.entityResolution = true;
            if (opts.enableRelationInference) cliConfig.relationInference = true;
            if (opts.enableKgInjection) cliConfig.kgInjection = true;
            if (opts.jsonLogs) cliConfig.jsonLogs = true;
            if (opts.logLevel) cliConfig.logLevel = parseLogLevel(opts.logLevel);

            const config = await resolveConfig(cliConfig, opts.config);
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

            const source = loadSource(opts.source);
            const raw = loadExtractions(opts.input);

            const pipeline = new ExtractionPipeline(source.text, config, { sourceFile: source.fileName });
            const result = pipeline.process(raw);

            if (opts.output) {
                writeResult(opts.output, result);
            } else {
                process.stdout.write(`${serializeResult(result)}\n`);
            }
        } catch (error) {
            if (error instanceof PipelineInputError) {
                getLogger().error({ code: error.code, details: error.details }, error.message);
            } else {
                getLogger().error({ error }, 'Pipeline failed');
            }
            process.exitCode = 1;
        }
    });

program.parseAsync().catch((error: unknown) => {
    console.error('Unexpected failure:', error);
    process.exitCode = 1;
});
