/**
 * Loads raw configuration from a file and the environment.
 * Validation happens in ConfigService; this layer only reads and merges.
 */

import { ReadConfigFile } from './Common/ConfigReader.js';
import { EVENT_NAMES } from './Domain/Utility.js';
import { MAIN_EVENT_BUS } from './Events/MainEventBus.js';

/** Environment variable overriding the configured log level. */
export const ENV_LOG_LEVEL = `LZC_LOG_LEVEL`;

/** Unvalidated configuration document. */
export type RawConfig = Record<string, unknown>;

function IsRecord(value: unknown): value is RawConfig {
    return typeof value === `object` && value !== null && !Array.isArray(value);
}

/**
 * Applies environment overrides on top of a parsed document.
 * An empty document (null, e.g. a blank YAML file) counts as `{}`; any other non-object is kept
 * as is so validation can reject it.
 * @param parsed unknown - Document as read from disk
 * @param env NodeJS.ProcessEnv - Environment to read overrides from
 */
export function ApplyEnvOverrides(parsed: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
    let merged: RawConfig;
    if (IsRecord(parsed)) {
        merged = { ...parsed };
    } else if (parsed === null || parsed === undefined) {
        merged = {};
    } else {
        return parsed;
    }
    const envLogLevel = env[ENV_LOG_LEVEL];
    if (envLogLevel) {
        merged.logLevel = envLogLevel;
    }
    return merged;
}

/**
 * Reads the configuration file and applies environment overrides.
 * Supports JSON and YAML; emits `config.error` when the file cannot be read or parsed.
 * @param configPath string - Path to configuration file (JSON or YAML format)
 * @returns Promise<unknown> - Merged, still unvalidated, configuration
 * @example
 * const raw = await LoadConfig('./config/lzc.yaml');
 */
export async function LoadConfig(configPath: string): Promise<unknown> {
    try {
        const parsedConfig = await ReadConfigFile(configPath); // parsed configuration data
        return ApplyEnvOverrides(parsedConfig);
    } catch(configError) {
        MAIN_EVENT_BUS.Emit(EVENT_NAMES.configError, configError);
        throw configError;
    }
}
