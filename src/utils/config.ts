import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, configSchema, isLogLevel, isSourcePreference, type CitefetchConfig } from '../types/index.js';
import { isJsonObject } from '../sources/utils.js';
import { getLogger } from './logger.js';

const MODULE_NAME = 'citefetch';

/**
 * Every field optional, unknown fields rejected. Used one field at a time.
 */
const fieldSchema = configSchema.partial().strict();

/**
 * Keep only the fields of `raw` that pass the config schema. Anything else is
 * reported and dropped, so a bad value falls back to the next layer down.
 * Undefined values are skipped silently: an unset CLI flag masks nothing.
 */
export function parseConfigObject(raw: unknown, origin: string): Partial<CitefetchConfig> {
    const parsed: Partial<CitefetchConfig> = {};
    if (!isJsonObject(raw)) {
        getLogger().warn({ origin }, 'Config is not an object, ignoring it');
        return parsed;
    }

    const invalid: string[] = [];

    for (const [field, value] of Object.entries(raw)) {
        if (value === undefined) continue;
        const result = fieldSchema.safeParse({ [field]: value });
        if (result.success) {
            Object.assign(parsed, result.data);
        } else {
            invalid.push(field);
        }
    }

    if (invalid.length > 0) {
        getLogger().warn({ origin, fields: invalid }, 'Ignoring unknown or invalid config fields');
    }

    return parsed;
}

/**
 * Load configuration from citefetch.config.json or .citefetchrc.json using
 * cosmiconfig, or from an explicit path.
 * Returns null if no config file is found; defaults apply then.
 */
async function loadConfigFile(configPath?: string): Promise<Partial<CitefetchConfig> | null> {
    const explorer = cosmiconfig(MODULE_NAME, {
        searchPlaces: [`${MODULE_NAME}.config.json`, `.${MODULE_NAME}rc.json`],
    });

    try {
        const result = configPath ? await explorer.load(configPath) : await explorer.search();
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parseConfigObject(result.config, result.filepath);
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 * The ADS token is read separately through `getApiKey` and never stored here.
 */
function loadEnvVars(): Partial<CitefetchConfig> {
    const env: Partial<CitefetchConfig> = {};

    const source = process.env['CITEFETCH_SOURCE'];
    if (source !== undefined) {
        if (isSourcePreference(source)) env.source = source;
        else getLogger().warn({ source }, 'Ignoring invalid CITEFETCH_SOURCE');
    }

    const logLevel = process.env['CITEFETCH_LOG_LEVEL'];
    if (logLevel !== undefined) {
        if (isLogLevel(logLevel)) env.logLevel = logLevel;
        else getLogger().warn({ logLevel }, 'Ignoring invalid CITEFETCH_LOG_LEVEL');
    }

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Record<string, unknown>,
    configPath?: string
): Promise<CitefetchConfig> {
    const fileConfig = await loadConfigFile(configPath);
    const envConfig = loadEnvVars();

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...parseConfigObject(cliFlags, 'command line'),
    };
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name] || undefined;
}
