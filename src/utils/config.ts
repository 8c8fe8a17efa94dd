import { existsSync } from 'node:fs';
import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';
import { DEFAULT_CONFIG, type PipelineConfig } from '../types/index.js';
import { LogLevelSchema, PipelineConfigSchema, type PipelineConfigInput } from '../io/schemas.js';
import { PipelineInputError } from './errors.js';
import { getLogger } from './logger.js';

const MODULE_NAME = 'refiner';

/**
 * Unwrap presets that nest settings under `pipeline`, then validate.
 */
export function parseConfigFile(raw: unknown, filepath = '<inline>'): PipelineConfigInput {
    const body =
        raw !== null && typeof raw === 'object' && 'pipeline' in raw
            ? raw.pipeline
            : raw;

    const result = PipelineConfigSchema.safeParse(body);
    if (!result.success) {
        throw new PipelineInputError(`Invalid config file: ${filepath}`, 'INVALID_CONFIG', result.error.issues);
    }
    return result.data;
}

/**
 * Load configuration from an explicit path or from refiner.config.json /
 * .refinerrc.json found by cosmiconfig.
 * Returns null if no config file is found; defaults are used then.
 * An explicit path must exist.
 */
async function loadConfigFile(explicitPath?: string): Promise<PipelineConfigInput | null> {
    const explorer = cosmiconfig(MODULE_NAME, {
        searchPlaces: ['refiner.config.json', '.refinerrc.json'],
    });

    if (explicitPath && !existsSync(explicitPath)) {
        throw new PipelineInputError(`Config file not found: ${explicitPath}`, 'INPUT_NOT_FOUND');
    }

    let result: CosmiconfigResult;
    try {
        result = explicitPath ? await explorer.load(explicitPath) : await explorer.search();
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new PipelineInputError(`Unreadable config file: ${message}`, 'INVALID_CONFIG', error);
    }
    if (!result || result.isEmpty) return null;

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parseConfigFile(result.config, result.filepath);
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): PipelineConfigInput {
    const level = process.env['REFINER_LOG_LEVEL'];
    if (!level) return {};

    const parsed = LogLevelSchema.safeParse(level);
    if (!parsed.success) {
        getLogger().warn({ level }, 'Ignoring unknown REFINER_LOG_LEVEL');
        return {};
    }
    return { logLevel: parsed.data };
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<PipelineConfig>,
    configPath?: string
): Promise<PipelineConfig> {
    const fileConfig = await loadConfigFile(configPath);
    const envConfig = loadEnvVars();

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
    };
}
