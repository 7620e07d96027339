/**
 * Reads configuration files from disk.
 * Generic: not tied to the event bus or to any particular configuration shape.
 */
import { readFile } from 'fs/promises';
import { ValidationError } from './Errors.js';

/**
 * Loads and parses a config file (JSON or YAML). Does not emit any events.
 * @param configPath string - Path to config file (e.g. './lzc.json')
 * @returns Promise<unknown> - Parsed document, unvalidated
 * @throws ValidationError for an unsupported extension or a document that does not parse
 * @example
 * const raw = await ReadConfigFile('./lzc.yaml');
 */
export async function ReadConfigFile(configPath: string): Promise<unknown> {
    const raw = await readFile(configPath, `utf-8`);

    if (configPath.endsWith(`.json`)) {
        try {
            return JSON.parse(raw);
        } catch(err) {
            throw new ValidationError(`Config file '${configPath}' is not valid JSON`, { configPath }, err);
        }
    }
    if (configPath.endsWith(`.yaml`) || configPath.endsWith(`.yml`)) {
        // Lazy-load yaml parser only if needed
        const yaml = await import(`js-yaml`);
        try {
            return yaml.load(raw);
        } catch(err) {
            throw new ValidationError(`Config file '${configPath}' is not valid YAML`, { configPath }, err);
        }
    }
    throw new ValidationError(`Unsupported config file format. Use .json or .yaml`, { configPath });
}
